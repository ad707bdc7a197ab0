import { describe, it, expect } from "vitest";
import { TypedStack } from "../../../src/core/stack/typedStack";
import { FIFO, LIFO, flipped, parsePerspectiveMode, renderItems } from "../../../src/core/stack/perspective";
import type { Value } from "../../../src/core/value/value";
import { VFloat, VInt, VStr, formatValue } from "../../../src/core/value/value";

const ints = (...ns: number[]) => ns.map((n) => VInt(BigInt(n)));
const shown = (values: Value[]) => values.map(formatValue);

function stackOf(...ns: number[]): TypedStack {
  const s = new TypedStack("s", "int");
  s.push(...ints(...ns));
  return s;
}

describe("perspective", () => {
  it("maps depth to storage index", () => {
    expect(LIFO.indexOf(0, 5)).toBe(4);
    expect(LIFO.indexOf(4, 5)).toBe(0);
    expect(FIFO.indexOf(0, 5)).toBe(0);
    expect(LIFO.insertionIndex(5)).toBe(5);
    expect(FIFO.insertionIndex(5)).toBe(0);
    expect(flipped(LIFO)).toBe(FIFO);
  });

  it("brackets the designated end", () => {
    expect(renderItems(["1", "2", "3"], LIFO)).toBe("1 2 [3]");
    expect(renderItems(["1", "2", "3"], FIFO)).toBe("[1] 2 3");
    expect(renderItems([], LIFO)).toBe("empty");
  });

  it("parses mode names", () => {
    expect(parsePerspectiveMode("FIFO")).toBe("fifo");
    expect(parsePerspectiveMode("stack")).toBeUndefined();
  });
});

describe("TypedStack", () => {
  it("pushes and pops at the end under LIFO", () => {
    const s = stackOf(1, 2, 3);
    const popped = s.pop(2);
    expect(popped.tag === "Done" && shown(popped.value)).toEqual(["3", "2"]);
    expect(s.depth).toBe(1);
  });

  it("inserts at the front under FIFO", () => {
    const s = stackOf(1, 2, 3);
    s.setPerspective("fifo");
    s.push(VInt(0n));
    expect(s.render()).toBe("@s (FIFO): [0] 1 2 3");
    const top = s.peek(1);
    expect(top.tag === "Done" && shown(top.value)).toEqual(["0"]);
  });

  it("reads values pushed under LIFO in push order after switching to FIFO", () => {
    const s = stackOf(1, 2, 3);
    s.setPerspective("fifo");
    const popped = s.pop(3);
    expect(popped.tag === "Done" && shown(popped.value)).toEqual(["1", "2", "3"]);
  });

  it("never moves elements when flipping", () => {
    const s = stackOf(4, 5, 6);
    const before = s.snapshot();
    expect(s.flip()).toBe("fifo");
    expect(s.flip()).toBe("lifo");
    expect(s.snapshot()).toEqual(before);
    expect(s.render()).toBe("@s (LIFO): 4 5 [6]");
  });

  it("rejects a mistyped push without changing anything", () => {
    const s = stackOf(1);
    const pushed = s.push(VInt(2n), VStr("x"));
    expect(pushed.tag === "Fail" && pushed.failure.message).toBe("cannot push str onto int stack 's'");
    expect(s.depth).toBe(1);
  });

  it("enforces its capacity", () => {
    const s = new TypedStack("small", "float", { capacity: 2 });
    expect(s.push(VFloat(1), VFloat(2)).tag).toBe("Done");
    const over = s.push(VFloat(3));
    expect(over.tag === "Fail" && over.failure.reason).toBe("capacity-exceeded");
    expect(s.depth).toBe(2);
  });

  it("reports underflow without popping", () => {
    const s = stackOf(1);
    const popped = s.pop(2);
    expect(popped.tag === "Fail" && popped.failure.message).toBe("'s' needs 2 elements, has 1");
    expect(s.depth).toBe(1);
  });

  it("addresses elements by depth", () => {
    const s = stackOf(10, 20, 30);
    const second = s.at(1);
    expect(second.tag === "Done" && formatValue(second.value)).toBe("20");
    const bad = s.at(3);
    expect(bad.tag === "Fail" && bad.failure.message).toBe("depth 3 is outside 0..2");
    const removed = s.removeAt(2);
    expect(removed.tag === "Done" && formatValue(removed.value)).toBe("10");
    expect(s.exchange(0, 1).tag).toBe("Done");
    expect(shown(s.snapshot())).toEqual(["30", "20"]);
  });

  it("renders an empty stack", () => {
    const s = new TypedStack("e", "str");
    expect(s.render()).toBe("@e (LIFO): empty");
    expect(s.info()).toEqual({ name: "e", type: "str", perspective: "lifo", depth: 0, capacity: 65_536 });
  });
});

import { describe, it, expect } from "vitest";
import { applyVerb, stacksTouched, transfer } from "../../../src/core/engine/engine";
import type { Verb } from "../../../src/core/engine/verbs";
import { VERBS, describeArity, isVerb, verbNames } from "../../../src/core/engine/verbs";
import { GlobalMemory } from "../../../src/core/memory/globalMemory";
import { StackRegistry } from "../../../src/core/stack/registry";
import { formatValue } from "../../../src/core/value/value";
import { describeOutcome, unwrap } from "../../../src/outcome/matchers";

async function setup() {
  const stacks = new StackRegistry();
  await stacks.create("dstack", "int");
  await stacks.create("rstack", "int");
  await stacks.create("sstack", "str");
  await stacks.create("fstack", "float");
  const memory = new GlobalMemory(16);

  const apply = (name: string, verb: Verb, ...args: string[]) =>
    applyVerb(
      { stack: unwrap(stacks.resolve(name)), memory, lookup: (n) => stacks.resolve(n), returnStack: "rstack" },
      verb,
      args
    );
  /** Status line, as the dispatcher would print it. */
  const run = (name: string, verb: Verb, ...args: string[]) => describeOutcome(apply(name, verb, ...args));
  const items = (name: string) => unwrap(stacks.resolve(name)).snapshot().map(formatValue);

  return { stacks, memory, apply, run, items };
}

describe("verb table", () => {
  it("knows every verb and its arity", () => {
    expect(verbNames()).toHaveLength(34);
    expect(isVerb("tuck")).toBe(true);
    expect(isVerb("toString")).toBe(false);
    expect(VERBS.shl.arity.str).toBeUndefined();
    expect(describeArity([1, Number.POSITIVE_INFINITY])).toBe("1 or more");
    expect(describeArity([0, 1])).toBe("0 to 1");
  });

  it("lists the stacks a call touches", () => {
    expect(stacksTouched("bring", ["int", "@other"], "dstack", "rstack")).toEqual(["dstack", "other"]);
    expect(stacksTouched("popr", [], "dstack", "rstack")).toEqual(["dstack", "rstack"]);
    expect(stacksTouched("add", [], "dstack", "rstack")).toEqual(["dstack"]);
  });
});

describe("stack manipulation", () => {
  it("pushes, pops and peeks", async () => {
    const { run, items } = await setup();
    expect(run("dstack", "push", "1", "2", "3")).toBe("pushed 1 2 3 onto @dstack");
    expect(run("dstack", "pop")).toBe("3");
    expect(run("dstack", "peek")).toBe("2");
    expect(items("dstack")).toEqual(["1", "2"]);
  });

  it("validates every pushed value before pushing any", async () => {
    const { run, items } = await setup();
    expect(run("dstack", "push", "1", '"42"')).toBe(`TypeMismatch: '"42"' is not an integer`);
    expect(items("dstack")).toEqual([]);
  });

  it("checks argument counts", async () => {
    const { run } = await setup();
    expect(run("dstack", "push")).toBe("MalformedCommand: 'push' takes 1 or more argument(s), got 0");
    expect(run("dstack", "pick")).toBe("MalformedCommand: 'pick' takes 1 argument(s), got 0");
    expect(run("dstack", "pop")).toBe("EmptyStack: stack 'dstack' is empty");
  });

  it("dup, over, swap and tuck", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "1", "2");
    expect(run("dstack", "dup")).toBe("dup on @dstack");
    expect(items("dstack")).toEqual(["1", "2", "2"]);
    run("dstack", "drop");
    run("dstack", "over");
    expect(items("dstack")).toEqual(["1", "2", "1"]);
    run("dstack", "swap");
    expect(items("dstack")).toEqual(["1", "1", "2"]);
  });

  it("tuck copies the top below the second element", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "1", "2");
    expect(run("dstack", "tuck")).toBe("tuck on @dstack");
    expect(items("dstack")).toEqual(["2", "1", "2"]);
  });

  it("pick and roll address by depth", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "10", "20", "30");
    run("dstack", "pick", "2");
    expect(items("dstack")).toEqual(["10", "20", "30", "10"]);
    run("dstack", "drop");
    run("dstack", "roll", "2");
    expect(items("dstack")).toEqual(["20", "30", "10"]);
    expect(run("dstack", "pick", "3")).toBe("IndexOutOfRange: depth 3 is outside 0..2");
    expect(run("dstack", "roll", "-1")).toBe("IndexOutOfRange: depth -1 is outside 0..2");
  });

  it("pair verbs treat two elements as a unit", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "1", "2");
    run("dstack", "dup2");
    expect(items("dstack")).toEqual(["1", "2", "1", "2"]);

    run("dstack", "drop2");
    run("dstack", "push", "3", "4");
    run("dstack", "over2");
    expect(items("dstack")).toEqual(["1", "2", "3", "4", "1", "2"]);

    run("dstack", "drop2");
    run("dstack", "swap2");
    expect(items("dstack")).toEqual(["3", "4", "1", "2"]);
    expect(run("dstack", "drop2")).toBe("drop2 on @dstack");
    expect(run("dstack", "swap2")).toBe("EmptyStack: 'dstack' needs 4 elements, has 2");
  });

  it("reports depth, rendering and perspective changes", async () => {
    const { run } = await setup();
    run("dstack", "push", "1", "2", "3");
    expect(run("dstack", "depth")).toBe("3");
    expect(run("dstack", "print")).toBe("@dstack (LIFO): 1 2 [3]");
    expect(run("dstack", "fifo")).toBe("@dstack is now FIFO");
    expect(run("dstack", "print")).toBe("@dstack (FIFO): [1] 2 3");
    expect(run("dstack", "flip")).toBe("@dstack is now LIFO");
  });
});

describe("arithmetic", () => {
  it("pops b then a and pushes a op b", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "7", "2");
    expect(run("dstack", "sub")).toBe("sub = 5");
    run("dstack", "push", "-7", "2");
    expect(run("dstack", "div")).toBe("div = -3");
    expect(run("dstack", "mul")).toBe("mul = -15");
    expect(items("dstack")).toEqual(["-15"]);
  });

  it("consumes both operands on division by zero", async () => {
    const { apply, run, items } = await setup();
    expect(run("dstack", "push", "5", "0")).toBe("pushed 5 0 onto @dstack");
    expect(run("dstack", "div")).toBe(
      "DivisionByZero: division by zero on 'dstack'; both operands were consumed"
    );

    apply("dstack", "push", "1", "0");
    const failed = apply("dstack", "div");
    expect(failed.tag === "Fail" && failed.failure.mutated).toBe(true);
    expect(items("dstack")).toEqual([]);
  });

  it("wraps integer overflow", async () => {
    const { run } = await setup();
    run("dstack", "push", "9223372036854775807", "1");
    expect(run("dstack", "add")).toBe("add = -9223372036854775808");
  });

  it("works on floats", async () => {
    const { run } = await setup();
    expect(run("fstack", "push", "1.5", "2")).toBe("pushed 1.5 2.0 onto @fstack");
    expect(run("fstack", "add")).toBe("add = 3.5");
    run("fstack", "push", "0");
    expect(run("fstack", "div")).toBe(
      "DivisionByZero: division by zero on 'fstack'; both operands were consumed"
    );
  });
});

describe("text operations", () => {
  it("concatenates and rewrites the top string", async () => {
    const { run, items } = await setup();
    run("sstack", "push", '"ab"', '"cd"');
    expect(run("sstack", "add")).toBe('add = "abcd"');
    run("sstack", "push", '"helloxxx"');
    expect(run("sstack", "sub", '"x"')).toBe('sub = "hello"');
    run("sstack", "push", '"ab"');
    expect(run("sstack", "mul", "3")).toBe('mul = "ababab"');
    run("sstack", "push", '"a,b,c"');
    expect(run("sstack", "div", '","')).toBe('div = "a b c"');
    expect(items("sstack")).toEqual(['"abcd"', '"hello"', '"ababab"', '"a b c"']);
  });

  it("rejects bad text arguments without consuming", async () => {
    const { run, items } = await setup();
    run("sstack", "push", '"abc"');
    expect(run("sstack", "sub")).toBe("MalformedCommand: 'sub' takes 1 argument(s), got 0");
    expect(run("sstack", "mul", "-1")).toBe("IndexOutOfRange: repeat count -1 is outside 0..5592405");
    expect(run("sstack", "mul", "1000000000000")).toBe(
      "IndexOutOfRange: repeat count 1000000000000 is outside 0..5592405"
    );
    expect(run("sstack", "div", '""')).toBe('MalformedCommand: div needs a non-empty delimiter: ""');
    expect(items("sstack")).toEqual(['"abc"']);
  });

  it("has no bitwise verbs", async () => {
    const { run } = await setup();
    expect(run("sstack", "and")).toBe("UnknownOperation: 'and' is not defined for str stacks");
  });
});

describe("bitwise", () => {
  it("applies and, or, xor and shifts", async () => {
    const { run } = await setup();
    run("dstack", "push", "6", "3");
    expect(run("dstack", "and")).toBe("and = 2");
    run("dstack", "push", "5");
    expect(run("dstack", "or")).toBe("or = 7");
    run("dstack", "push", "2");
    expect(run("dstack", "xor")).toBe("xor = 5");
    run("dstack", "push", "2");
    expect(run("dstack", "shl")).toBe("shl = 20");
    run("dstack", "push", "-16", "2");
    expect(run("dstack", "shr")).toBe("shr = -4");
  });

  it("leaves the stack alone when the shift amount is out of range", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "1", "64");
    expect(run("dstack", "shl")).toBe("IndexOutOfRange: shift amount 64 is outside 0..63");
    expect(items("dstack")).toEqual(["1", "64"]);
  });
});

describe("global memory", () => {
  it("stores and loads with an address argument", async () => {
    const { run, items, memory } = await setup();
    run("dstack", "push", "42");
    expect(run("dstack", "store", "5")).toBe("stored 42 at 5");
    expect(unwrap(memory.read(5))).toBe(42n);
    expect(run("dstack", "load", "5")).toBe("loaded 42 from 5");
    expect(items("dstack")).toEqual(["42"]);
  });

  it("takes the address from the stack without an argument", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "99", "3");
    expect(run("dstack", "store")).toBe("stored 99 at 3");
    run("dstack", "push", "3");
    expect(run("dstack", "load")).toBe("loaded 99 from 3");
    expect(items("dstack")).toEqual(["99"]);
  });

  it("checks bounds before popping", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "1");
    expect(run("dstack", "store", "16")).toBe("IndexOutOfRange: address 16 is outside 0..15");
    run("dstack", "push", "100");
    expect(run("dstack", "store")).toBe("IndexOutOfRange: address 100 is outside 0..15");
    expect(items("dstack")).toEqual(["1", "100"]);
  });

  it("is integer only", async () => {
    const { run } = await setup();
    expect(run("fstack", "load", "0")).toBe("UnknownOperation: 'load' is not defined for float stacks");
  });
});

describe("cross-stack transfer", () => {
  it("brings a value, converting it to the target type", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "104");
    expect(run("sstack", "bring", "int", "@dstack")).toBe('brought "104" from @dstack to @sstack');
    expect(items("dstack")).toEqual([]);
    expect(items("sstack")).toEqual(['"104"']);
  });

  it("fails without mutation", async () => {
    const { run, items } = await setup();
    expect(run("sstack", "bring", "int", "dstack")).toBe("EmptyStack: stack 'dstack' is empty");
    run("dstack", "push", "7");
    expect(run("sstack", "bring", "str", "dstack")).toBe("TypeMismatch: @dstack holds int values, not str");
    expect(run("sstack", "bring", "blob", "dstack")).toBe("MalformedCommand: unknown element type: blob");
    expect(run("sstack", "bring", "int", "ghost")).toBe("UnknownTarget: no stack named 'ghost'");
    run("sstack", "push", '"abc"');
    expect(run("dstack", "bring", "str", "sstack")).toBe('TypeMismatch: cannot convert "abc" to int');
    expect(items("dstack")).toEqual(["7"]);
    expect(items("sstack")).toEqual(['"abc"']);
  });

  it("moves through the return stack", async () => {
    const { run, items } = await setup();
    run("dstack", "push", "5");
    expect(run("dstack", "pushr")).toBe("moved 5 to @rstack");
    expect(run("dstack", "peekr")).toBe("copied 5 from @rstack");
    expect(run("dstack", "popr")).toBe("moved 5 from @rstack");
    expect(items("dstack")).toEqual(["5", "5"]);
    expect(items("rstack")).toEqual([]);
    expect(run("dstack", "popr")).toBe("EmptyStack: stack 'rstack' is empty");
  });

  it("transfer copies when asked", async () => {
    const { stacks, items } = await setup();
    const f = unwrap(stacks.resolve("fstack"));
    await stacks.create("src", "int");
    const src = unwrap(stacks.resolve("src"));
    src.push({ tag: "Int", n: 3n });
    const copied = unwrap(transfer(src, f, true));
    expect(formatValue(copied)).toBe("3.0");
    expect(items("src")).toEqual(["3"]);
    expect(items("fstack")).toEqual(["3.0"]);
  });
});

describe("retired handles", () => {
  it("report the stack as unknown", async () => {
    const { stacks, memory } = await setup();
    const old = unwrap(stacks.resolve("dstack"));
    await stacks.remove("dstack");
    const outcome = applyVerb(
      { stack: old, memory, lookup: (n) => stacks.resolve(n), returnStack: "rstack" },
      "depth",
      []
    );
    expect(describeOutcome(outcome)).toBe("UnknownTarget: no stack named 'dstack'");
  });
});

import { describe, it, expect } from "vitest";
import type { Scope, SpawnTargets } from "../../../src/core/dispatch/dispatcher";
import { Dispatcher, formatReport, reportFailed } from "../../../src/core/dispatch/dispatcher";
import { GlobalMemory } from "../../../src/core/memory/globalMemory";
import { StackRegistry } from "../../../src/core/stack/registry";
import { ok } from "../../../src/outcome/constructors";
import type { Outcome } from "../../../src/outcome/outcome";

/** Records deposits instead of running them. */
class RecordingSpawns implements SpawnTargets {
  readonly deposits: Array<[string, string]> = [];
  constructor(private readonly names: string[]) {}

  has(name: string): boolean {
    return this.names.includes(name);
  }

  async deposit(name: string, script: string): Promise<Outcome<string>> {
    this.deposits.push([name, script]);
    return ok(`queued for ${name}`);
  }
}

async function setup() {
  const stacks = new StackRegistry();
  await stacks.create("dstack", "int");
  await stacks.create("rstack", "int");
  await stacks.create("sstack", "str");
  const spawns = new RecordingSpawns(["w"]);
  const dispatcher = new Dispatcher({ stacks, memory: new GlobalMemory(), spawns, returnStack: "rstack" });
  const scope: Scope = {};
  const lines = async (line: string) => formatReport(await dispatcher.dispatch(line, scope));
  return { stacks, spawns, dispatcher, scope, lines };
}

describe("Dispatcher", () => {
  it("runs each sub-command on the selected stack in order", async () => {
    const { dispatcher } = await setup();
    const report = await dispatcher.dispatch("@dstack: 1 2 add print", {});
    expect(report.kind).toBe("stack");
    expect(report.target).toBe("dstack");
    expect(formatReport(report)).toEqual([
      "pushed 1 onto @dstack",
      "pushed 2 onto @dstack",
      "add = 3",
      "@dstack (LIFO): [3]",
    ]);
    expect(report.results[2].outcome.meta.target).toBe("dstack");
    expect(reportFailed(report)).toBe(false);
  });

  it("keeps going after a failing sub-command", async () => {
    const { dispatcher } = await setup();
    const report = await dispatcher.dispatch("@dstack: pop 5 frob depth", {});
    expect(formatReport(report)).toEqual([
      "EmptyStack: stack 'dstack' is empty",
      "pushed 5 onto @dstack",
      "UnknownOperation: unknown operation 'frob'",
      "1",
    ]);
    expect(reportFailed(report)).toBe(true);
  });

  it("reports unknown targets without side effects", async () => {
    const { lines, spawns } = await setup();
    expect(await lines("@ghost: 1 2")).toEqual(["UnknownTarget: no stack or spawn named 'ghost'"]);
    expect(await lines("@ghost")).toEqual(["UnknownTarget: no stack or spawn named 'ghost'"]);
    expect(spawns.deposits).toEqual([]);
  });

  it("needs a selection for bare lines", async () => {
    const { lines, scope } = await setup();
    expect(await lines("dup")).toEqual(["MalformedCommand: no target selected: dup"]);
    expect(await lines("@dstack")).toEqual(["selected @dstack"]);
    expect(scope.selection).toBe("dstack");
    expect(await lines("7 dup add")).toEqual(["pushed 7 onto @dstack", "dup on @dstack", "add = 14"]);
  });

  it("ignores blank lines and comments", async () => {
    const { dispatcher } = await setup();
    expect(await dispatcher.dispatch("   ", {})).toEqual({ kind: "none", results: [] });
    expect(await dispatcher.dispatch("# note", {})).toEqual({ kind: "none", results: [] });
  });

  it("deposits the body of a spawn line as its script", async () => {
    const { dispatcher, spawns } = await setup();
    const report = await dispatcher.dispatch("@w: 1 2 add; print", {});
    expect(report.kind).toBe("spawn");
    expect(formatReport(report)).toEqual(["queued for w"]);
    expect(spawns.deposits).toEqual([["w", "1 2 add; print"]]);
  });

  it("keeps quoted arguments as text", async () => {
    const { lines } = await setup();
    expect(await lines(`@dstack: push("42")`)).toEqual([`TypeMismatch: '"42"' is not an integer`]);
    expect(await lines(`@sstack: "a b" push:'c'`)).toEqual([
      `pushed "a b" onto @sstack`,
      `pushed "c" onto @sstack`,
    ]);
  });

  it("brings between stacks", async () => {
    const { lines } = await setup();
    await lines("@dstack: 104");
    expect(await lines("@sstack: bring:int,@dstack print")).toEqual([
      'brought "104" from @dstack to @sstack',
      '@sstack (LIFO): ["104"]',
    ]);
  });

  it("reports a malformed line as one result", async () => {
    const { lines } = await setup();
    expect(await lines(`@dstack: 1 "open`)).toEqual([`MalformedCommand: unbalanced quotes: 1 "open`]);
  });

  it("sees a stack replaced between lines", async () => {
    const { lines, stacks } = await setup();
    await lines("@dstack: 1");
    await stacks.create("dstack", "float", { replace: true });
    expect(await lines("@dstack: 2.5 print")).toEqual(["pushed 2.5 onto @dstack", "@dstack (LIFO): [2.5]"]);
  });

  it("serializes concurrent lines on one stack", async () => {
    const { lines } = await setup();
    await lines("@dstack: 0");
    await Promise.all(Array.from({ length: 20 }, () => lines("@dstack: 1 add")));
    expect(await lines("@dstack: depth peek")).toEqual(["1", "20"]);
  });
});

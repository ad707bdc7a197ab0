// src/core/dispatch/dispatcher.ts
// Routes compound command lines to the engine or to a spawn's mailbox

import type { Outcome } from "../../outcome/outcome";
import { withTarget } from "../../outcome/outcome";
import {
  ok,
  err,
  emptyStack,
  malformedCommand,
  typeMismatch,
  unknownTarget,
  unknownOperation,
  internalError,
} from "../../outcome/constructors";
import { makeDiagnostic } from "../../outcome/codes";
import { describeOutcome } from "../../outcome/matchers";
import type { Mutex } from "../concurrency/mutex";
import { inLockOrder, withLocks } from "../concurrency/mutex";
import { applyVerb, sourceName, stacksTouched } from "../engine/engine";
import type { Verb } from "../engine/verbs";
import { isVerb } from "../engine/verbs";
import type { GlobalMemory } from "../memory/globalMemory";
import type { StackRegistry } from "../stack/registry";
import { formatValue, parseElemType, unquote } from "../value/value";
import { parseLine, parseSubCommand, splitSubCommands } from "./parse";

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

/** Selection state a line is dispatched against: the interactive one, or a spawn's own. */
export type Scope = {
  selection?: string;
};

export type CommandKind = "stack" | "spawn" | "select" | "none";

export type CommandResult = {
  command: string;
  outcome: Outcome<string>;
};

export type CommandReport = {
  target?: string;
  kind: CommandKind;
  results: CommandResult[];
};

/** What the dispatcher needs from the task registry. */
export interface SpawnTargets {
  has(name: string): boolean;
  deposit(name: string, script: string): Promise<Outcome<string>>;
}

export type DispatcherOptions = {
  stacks: StackRegistry;
  memory: GlobalMemory;
  spawns: SpawnTargets;
  /** Stack used by pushr/popr/peekr. */
  returnStack: string;
};

/** One status line per sub-command: success text, or `Kind: message`. */
export function formatReport(report: CommandReport): string[] {
  return report.results.map((r) => describeOutcome(r.outcome));
}

export function reportFailed(report: CommandReport): boolean {
  return report.results.some((r) => r.outcome.tag === "Fail");
}

// ─────────────────────────────────────────────────────────────────
// Dispatcher
// ─────────────────────────────────────────────────────────────────

export class Dispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  async dispatch(line: string, scope: Scope): Promise<CommandReport> {
    const text = line.trim();
    if (text === "" || text.startsWith("#")) {
      return { kind: "none", results: [] };
    }

    const parsed = parseLine(text);
    if (parsed.tag === "Fail") {
      return { kind: "none", results: [{ command: text, outcome: parsed }] };
    }

    const p = parsed.value;
    switch (p.kind) {
      case "select":
        return this.select(p.target, scope, text);
      case "selector":
        return this.route(p.target, p.body);
      case "bare":
        if (!scope.selection) {
          return {
            kind: "none",
            results: [
              {
                command: text,
                outcome: err("malformed-command", `no target selected: ${text}`, {
                  diagnostics: [makeDiagnostic("E0003")],
                  context: { text },
                }),
              },
            ],
          };
        }
        return this.route(scope.selection, p.body);
    }
  }

  private select(target: string, scope: Scope, text: string): CommandReport {
    const { stacks, spawns } = this.options;
    if (!stacks.has(target) && !spawns.has(target)) {
      return { kind: "none", results: [{ command: text, outcome: unknownTarget(target) }] };
    }
    scope.selection = target;
    return { target, kind: "select", results: [{ command: text, outcome: ok(`selected @${target}`) }] };
  }

  private async route(target: string, body: string): Promise<CommandReport> {
    if (this.options.stacks.has(target)) {
      return { target, kind: "stack", results: await this.runOnStack(target, body) };
    }
    if (this.options.spawns.has(target)) {
      const source = scriptSource(body);
      const outcome = source
        ? await this.loadScript(target, source.type, source.stack)
        : await this.options.spawns.deposit(target, body);
      return { target, kind: "spawn", results: [{ command: body, outcome }] };
    }
    return { kind: "none", results: [{ command: body, outcome: unknownTarget(target) }] };
  }

  /** Every sub-command runs, left to right, whatever the earlier ones returned. */
  private async runOnStack(target: string, body: string): Promise<CommandResult[]> {
    const split = splitSubCommands(body);
    if (split.tag === "Fail") {
      return [{ command: body, outcome: split }];
    }

    const results: CommandResult[] = [];
    for (const token of split.value) {
      const sub = parseSubCommand(token);
      if (sub.tag === "Fail") {
        results.push({ command: token, outcome: sub });
        continue;
      }
      const { op, args } = sub.value;
      const outcome = isVerb(op) ? await this.runVerb(target, op, args) : unknownOperation(op);
      results.push({ command: token, outcome: withTarget(outcome, target) });
    }
    return results;
  }

  private async runVerb(target: string, verb: Verb, args: string[]): Promise<Outcome<string>> {
    const { stacks, memory, returnStack } = this.options;
    const names = inLockOrder(stacksTouched(verb, args, target, returnStack));

    try {
      return await this.withStacks(names, () => {
        const current = stacks.resolve(target);
        if (current.tag === "Fail") return current;
        return applyVerb(
          { stack: current.value, memory, lookup: (name) => stacks.resolve(name), returnStack },
          verb,
          args
        );
      });
    } catch (e) {
      return internalError(e instanceof Error ? e.message : String(e));
    }
  }

  /**
   * Pop every line off a str stack, oldest first, and deposit them as one script.
   * The stack keeps its lines when the spawn refuses the script.
   */
  private async loadScript(spawn: string, typeArg: string, source: string): Promise<Outcome<string>> {
    const declared = parseElemType(unquote(typeArg));
    if (!declared) return malformedCommand(typeArg, "unknown element type");
    if (declared !== "str") {
      return typeMismatch("str", declared, `spawn scripts load from str stacks, not ${declared}`);
    }
    const { stacks, spawns } = this.options;

    try {
      return await this.withStacks([source], async () => {
        const found = stacks.resolve(source);
        if (found.tag === "Fail") return found;
        const stack = found.value;
        if (stack.type !== "str") {
          return typeMismatch("str", stack.type, `@${stack.name} holds ${stack.type} values, not str`);
        }
        const count = stack.depth;
        if (count === 0) return emptyStack(stack.name, 1, 0);
        const top = stack.peek(count);
        if (top.tag === "Fail") return top;

        const script = [...top.value]
          .reverse()
          .map((v) => (v.tag === "Str" ? v.s : formatValue(v)))
          .join("\n");
        const deposited = await spawns.deposit(spawn, script);
        if (deposited.tag === "Fail") return deposited;
        const popped = stack.pop(count);
        if (popped.tag === "Fail") return popped;
        return ok(`loaded ${count} line${count === 1 ? "" : "s"} from @${stack.name} into spawn '${spawn}'`);
      });
    } catch (e) {
      return internalError(e instanceof Error ? e.message : String(e));
    }
  }

  private locksFor(names: string[]): Mutex[] {
    return names.flatMap((name) => {
      const stack = this.options.stacks.get(name);
      return stack ? [stack.lock] : [];
    });
  }

  /**
   * Hold the locks of the named stacks, taken in name order, while `fn` runs.
   * If the registry swapped one of them while we waited, retake the new set.
   */
  private async withStacks(
    names: string[],
    fn: () => Outcome<string> | Promise<Outcome<string>>
  ): Promise<Outcome<string>> {
    for (;;) {
      const held = this.locksFor(names);
      const outcome = await withLocks(held, async () => {
        const current = this.locksFor(names);
        const unchanged = current.length === held.length && current.every((lock, i) => lock === held[i]);
        return unchanged ? await fn() : undefined;
      });
      if (outcome) return outcome;
    }
  }
}

/** A spawn line whose whole body is `bring(type, src)` loads its script from a stack. */
function scriptSource(body: string): { type: string; stack: string } | undefined {
  const split = splitSubCommands(body);
  if (split.tag === "Fail" || split.value.length !== 1) return undefined;
  const sub = parseSubCommand(split.value[0]);
  if (sub.tag === "Fail" || sub.value.op !== "bring" || sub.value.args.length !== 2) return undefined;
  const [type, src] = sub.value.args;
  return { type, stack: sourceName(src) };
}

// src/runtime.ts
// StackRuntime - composition root and lifecycle API
//
// Usage:
//   import { StackRuntime } from "stackweave";
//
//   const rt = await StackRuntime.create();
//   const result = await rt.execute("@dstack: push:1 push:2 add");
//   console.log(result.lines); // ["pushed 1 onto @dstack", "pushed 2 onto @dstack", "add = 3"]

import type { Outcome } from "./outcome/outcome";
import { ok } from "./outcome/constructors";
import { mapOutcome } from "./outcome/matchers";
import { formatFailure } from "./outcome/failure";
import type { StackweaveConfig } from "./core/config/config";
import { DEFAULT_CONFIG } from "./core/config/config";
import { compareLockNames, withLocks } from "./core/concurrency/mutex";
import type { CommandReport, Scope } from "./core/dispatch/dispatcher";
import { Dispatcher, formatReport, reportFailed } from "./core/dispatch/dispatcher";
import { transfer } from "./core/engine/engine";
import { GlobalMemory } from "./core/memory/globalMemory";
import type { PerspectiveMode } from "./core/stack/perspective";
import type { StackInfo } from "./core/stack/typedStack";
import { TypedStack } from "./core/stack/typedStack";
import { StackRegistry } from "./core/stack/registry";
import type { MailboxPolicy, SpawnInfo } from "./core/spawn/spawn";
import { Spawn } from "./core/spawn/spawn";
import { TaskRegistry } from "./core/spawn/taskRegistry";
import type { ElemType } from "./core/value/value";
import { formatValue } from "./core/value/value";
import type { OutputSink } from "./ports/sink";
import { ConsoleSink } from "./ports/sink";

/**
 * Options for StackRuntime
 */
export type StackRuntimeOptions = {
  /** Resolved configuration (default: DEFAULT_CONFIG) */
  config?: StackweaveConfig;

  /** Where interactive results and spawn output go (default: console) */
  sink?: OutputSink;
};

/**
 * Result of executing one interactive line
 */
export type ExecuteResult = {
  /** True when every sub-command succeeded */
  ok: boolean;

  report: CommandReport;

  /** One status line per sub-command */
  lines: string[];
};

export type CreateStackRequest = {
  perspective?: PerspectiveMode;
  capacity?: number;
  /** Replace an existing stack of the same name */
  replace?: boolean;
};

export type CreateSpawnRequest = {
  stackType?: ElemType;
  mailbox?: MailboxPolicy;
};

/** Name the interactive scope reports under. */
export const MAIN_SOURCE = "main";

/**
 * StackRuntime owns memory, both registries, the interactive selection and the sink.
 */
export class StackRuntime {
  readonly config: StackweaveConfig;
  readonly memory: GlobalMemory;
  readonly stacks: StackRegistry;
  readonly spawns: TaskRegistry;
  readonly sink: OutputSink;
  private readonly dispatcher: Dispatcher;
  private readonly scope: Scope = {};

  private constructor(options: StackRuntimeOptions) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.sink = options.sink ?? new ConsoleSink({ verbose: this.config.output.verbose });
    this.memory = new GlobalMemory(this.config.memory.size);
    this.stacks = new StackRegistry({
      capacity: this.config.stacks.capacity,
      isReserved: (name) => this.spawns.has(name),
    });
    this.spawns = new TaskRegistry({ isReserved: (name) => this.stacks.has(name) });
    this.dispatcher = this.dispatcherFor(this.stacks);
  }

  /**
   * Build a runtime and create the configured default stacks.
   */
  static async create(options: StackRuntimeOptions = {}): Promise<StackRuntime> {
    const rt = new StackRuntime(options);
    for (const decl of rt.config.stacks.defaults) {
      const created = await rt.stacks.create(decl.name, decl.type, {
        perspective: decl.perspective,
        capacity: decl.capacity,
      });
      if (created.tag === "Fail") {
        throw new Error(`default stack '${decl.name}': ${formatFailure(created.failure)}`);
      }
    }
    return rt;
  }

  get selection(): string | undefined {
    return this.scope.selection;
  }

  // ─────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────

  /**
   * Dispatch one line against the interactive selection.
   */
  async execute(line: string): Promise<ExecuteResult> {
    const report = await this.dispatcher.dispatch(line, this.scope);
    if (report.results.length > 0) {
      this.sink.emit({ kind: "report", source: MAIN_SOURCE, line, report });
    }
    return { ok: !reportFailed(report), report, lines: formatReport(report) };
  }

  /** Run each line of a script in order through the interactive scope. */
  async executeAll(lines: string[]): Promise<ExecuteResult[]> {
    const results: ExecuteResult[] = [];
    for (const line of lines) {
      results.push(await this.execute(line));
    }
    return results;
  }

  // ─────────────────────────────────────────────────────────────────
  // Stacks
  // ─────────────────────────────────────────────────────────────────

  async createStack(name: string, type: ElemType, request: CreateStackRequest = {}): Promise<Outcome<StackInfo>> {
    const created = await this.stacks.create(name, type, request);
    return mapOutcome(created, (s) => s.info());
  }

  async destroyStack(name: string): Promise<Outcome<string>> {
    const removed = await this.stacks.remove(name);
    return mapOutcome(removed, (s) => `stack @${s.name} removed`);
  }

  listStacks(): StackInfo[] {
    return this.stacks.list();
  }

  // ─────────────────────────────────────────────────────────────────
  // Spawns
  // ─────────────────────────────────────────────────────────────────

  /**
   * Create and start a spawn. Its private stack carries the spawn's name
   * and sits in a registry layered over the shared one.
   */
  async createSpawn(name: string, request: CreateSpawnRequest = {}): Promise<Outcome<SpawnInfo>> {
    const { capacity } = this.config.stacks;
    const added = await this.spawns.add(name, () => {
      const local = new StackRegistry({ parent: this.stacks, capacity });
      const stack = local.adopt(new TypedStack(name, request.stackType ?? this.config.spawns.stackType, { capacity }));
      return ok(
        new Spawn({
          name,
          stack,
          runner: this.dispatcherFor(local),
          sink: this.sink,
          mailbox: request.mailbox ?? this.config.spawns.mailbox,
        })
      );
    });
    return mapOutcome(added, (s) => s.info());
  }

  listSpawns(): SpawnInfo[] {
    return this.spawns.list();
  }

  pauseSpawn(name: string): Outcome<string> {
    return this.spawns.pause(name);
  }

  resumeSpawn(name: string): Outcome<string> {
    return this.spawns.resume(name);
  }

  stopSpawn(name: string): Outcome<string> {
    return this.spawns.stop(name);
  }

  destroySpawn(name: string): Promise<Outcome<string>> {
    return this.spawns.destroy(name);
  }

  deposit(name: string, script: string): Promise<Outcome<string>> {
    return this.spawns.deposit(name, script);
  }

  /**
   * Move the top of a shared stack onto a spawn's private stack.
   */
  async send(stackName: string, spawnName: string): Promise<Outcome<string>> {
    const spawn = this.spawns.resolve(spawnName);
    if (spawn.tag === "Fail") return spawn;
    const source = this.stacks.resolve(stackName);
    if (source.tag === "Fail") return source;

    const from = source.value;
    const to = spawn.value.stack;
    const ordered = [from, to].sort((a, b) => compareLockNames(a.name, b.name));
    const moved = await withLocks(
      ordered.map((s) => s.lock),
      () => transfer(from, to, false)
    );
    return mapOutcome(moved, (v) => `sent ${formatValue(v)} from @${from.name} to spawn '${spawnName}'`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Memory & lifecycle
  // ─────────────────────────────────────────────────────────────────

  peekMemory(addr: number | bigint): Outcome<bigint> {
    return this.memory.read(addr);
  }

  /** Stop every spawn and wait for their loops to exit. */
  async shutdown(): Promise<void> {
    await this.spawns.shutdown();
  }

  private dispatcherFor(stacks: StackRegistry): Dispatcher {
    return new Dispatcher({
      stacks,
      memory: this.memory,
      spawns: this.spawns,
      returnStack: this.config.stacks.returnStack,
    });
  }
}

/**
 * Convenience: build a runtime, run the lines, shut down, return the results.
 */
export async function runLines(lines: string[], options: StackRuntimeOptions = {}): Promise<ExecuteResult[]> {
  const rt = await StackRuntime.create(options);
  try {
    return await rt.executeAll(lines);
  } finally {
    await rt.shutdown();
  }
}

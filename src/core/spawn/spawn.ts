// src/core/spawn/spawn.ts
// A named task that waits for scripts and runs them line by line

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Outcome } from "../../outcome/outcome";
import { ok, mailboxFull, spawnStopped } from "../../outcome/constructors";
import type { OutputSink } from "../../ports/sink";
import { Signal } from "../concurrency/signal";
import type { CommandReport, Scope } from "../dispatch/dispatcher";
import { splitScript } from "../dispatch/parse";
import type { TypedStack } from "../stack/typedStack";

export type SpawnState = "WaitingForScript" | "Executing" | "Stopped";

/**
 * reject: one pending script at most, further deposits fail until it is taken.
 * queue: scripts wait in deposit order.
 */
export type MailboxPolicy = "reject" | "queue";

/** Runs one line against a scope; the spawn's own dispatcher. */
export interface LineRunner {
  dispatch(line: string, scope: Scope): Promise<CommandReport>;
}

export type SpawnOptions = {
  name: string;
  /** Private stack; the initial selection. */
  stack: TypedStack;
  runner: LineRunner;
  sink: OutputSink;
  mailbox?: MailboxPolicy;
};

export type SpawnInfo = {
  name: string;
  state: SpawnState;
  paused: boolean;
  pending: number;
  scriptsRun: number;
  stack: string;
};

export class Spawn {
  readonly name: string;
  readonly stack: TypedStack;
  readonly policy: MailboxPolicy;
  private readonly runner: LineRunner;
  private readonly sink: OutputSink;
  private readonly scope: Scope;
  private readonly mailbox: string[] = [];
  private readonly wake = new Signal();
  private stateValue: SpawnState = "WaitingForScript";
  private pausedFlag = false;
  private stopRequested = false;
  private completed = 0;
  private loop?: Promise<void>;

  constructor(options: SpawnOptions) {
    this.name = options.name;
    this.stack = options.stack;
    this.runner = options.runner;
    this.sink = options.sink;
    this.policy = options.mailbox ?? "reject";
    this.scope = { selection: options.stack.name };
  }

  get state(): SpawnState {
    return this.stateValue;
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  get pending(): number {
    return this.mailbox.length;
  }

  get scriptsRun(): number {
    return this.completed;
  }

  /** Start the control loop. Idempotent. */
  start(): void {
    if (!this.loop) {
      this.loop = this.run();
    }
  }

  deposit(script: string): Outcome<string> {
    if (this.stopRequested) return spawnStopped(this.name);
    if (this.policy === "reject" && this.mailbox.length > 0) return mailboxFull(this.name);

    this.mailbox.push(script);
    this.wake.notify();
    const lines = splitScript(script).length;
    return ok(`queued ${lines} line${lines === 1 ? "" : "s"} for spawn '${this.name}'`);
  }

  pause(): void {
    this.pausedFlag = true;
  }

  resume(): void {
    this.pausedFlag = false;
    this.wake.notify();
  }

  stop(): void {
    this.stopRequested = true;
    this.wake.notify();
  }

  /** Resolves once the control loop has exited. */
  join(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  info(): SpawnInfo {
    return {
      name: this.name,
      state: this.stateValue,
      paused: this.pausedFlag,
      pending: this.mailbox.length,
      scriptsRun: this.completed,
      stack: this.stack.name,
    };
  }

  private async run(): Promise<void> {
    this.sink.emit({ kind: "lifecycle", source: this.name, message: `spawn '${this.name}' started` });
    while (!this.stopRequested) {
      const script = this.pausedFlag ? undefined : this.mailbox.shift();
      if (script === undefined) {
        await this.wake.wait();
        continue;
      }
      this.stateValue = "Executing";
      await this.execute(script);
      this.completed++;
      this.stateValue = "WaitingForScript";
    }
    this.stateValue = "Stopped";
    this.sink.emit({ kind: "lifecycle", source: this.name, message: `spawn '${this.name}' stopped` });
  }

  private async execute(script: string): Promise<void> {
    for (const line of splitScript(script)) {
      if (this.stopRequested) return;
      try {
        const report = await this.runner.dispatch(line, this.scope);
        this.sink.emit({ kind: "report", source: this.name, line, report });
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        this.sink.emit({ kind: "error", source: this.name, message: `InternalError: ${message}` });
      }
      await yieldToEventLoop();
    }
  }
}

// src/core/spawn/taskRegistry.ts
// Name → spawn mapping owned by the runtime

import type { Outcome } from "../../outcome/outcome";
import { ok, unknownTarget, duplicateTarget } from "../../outcome/constructors";
import { Mutex } from "../concurrency/mutex";
import type { SpawnTargets } from "../dispatch/dispatcher";
import { checkName } from "../stack/registry";
import type { Spawn, SpawnInfo } from "./spawn";

export type TaskRegistryOptions = {
  /** Names owned elsewhere (shared stacks). */
  isReserved?: (name: string) => boolean;
};

/**
 * TaskRegistry: every live spawn, by name.
 * Structural changes are serialized; control requests act on the spawn directly.
 */
export class TaskRegistry implements SpawnTargets {
  readonly lock = new Mutex("spawns");
  private readonly spawns = new Map<string, Spawn>();
  private readonly isReserved: (name: string) => boolean;

  constructor(options: TaskRegistryOptions = {}) {
    this.isReserved = options.isReserved ?? (() => false);
  }

  has(name: string): boolean {
    return this.spawns.has(name);
  }

  get(name: string): Spawn | undefined {
    return this.spawns.get(name);
  }

  resolve(name: string): Outcome<Spawn> {
    const spawn = this.spawns.get(name);
    return spawn ? ok(spawn) : unknownTarget(name, "spawn");
  }

  /**
   * Register and start a spawn built by `make` once the name is known to be free.
   */
  add(name: string, make: () => Outcome<Spawn> | Promise<Outcome<Spawn>>): Promise<Outcome<Spawn>> {
    return this.lock.runExclusive<Outcome<Spawn>>(async () => {
      const named = checkName(name);
      if (named.tag === "Fail") return named;
      if (this.spawns.has(name) || this.isReserved(name)) return duplicateTarget(name);
      const made = await make();
      if (made.tag === "Fail") return made;
      this.spawns.set(name, made.value);
      made.value.start();
      return made;
    });
  }

  async deposit(name: string, script: string): Promise<Outcome<string>> {
    const spawn = this.resolve(name);
    if (spawn.tag === "Fail") return spawn;
    return spawn.value.deposit(script);
  }

  pause(name: string): Outcome<string> {
    return this.control(name, (s) => s.pause(), "paused");
  }

  resume(name: string): Outcome<string> {
    return this.control(name, (s) => s.resume(), "resumed");
  }

  stop(name: string): Outcome<string> {
    return this.control(name, (s) => s.stop(), "stopping");
  }

  /** Stop the spawn, wait for its loop to exit, then drop the entry. */
  destroy(name: string): Promise<Outcome<string>> {
    return this.lock.runExclusive<Outcome<string>>(async () => {
      const spawn = this.spawns.get(name);
      if (!spawn) return unknownTarget(name, "spawn");
      spawn.stop();
      await spawn.join();
      this.spawns.delete(name);
      return ok(`spawn '${name}' destroyed`);
    });
  }

  names(): string[] {
    return [...this.spawns.keys()].sort();
  }

  list(): SpawnInfo[] {
    return this.names().flatMap((name) => {
      const spawn = this.spawns.get(name);
      return spawn ? [spawn.info()] : [];
    });
  }

  /** Stop every spawn and wait for all loops. */
  async shutdown(): Promise<void> {
    const all = [...this.spawns.values()];
    for (const spawn of all) spawn.stop();
    await Promise.all(all.map((s) => s.join()));
    await this.lock.runExclusive(() => this.spawns.clear());
  }

  private control(name: string, act: (s: Spawn) => void, verb: string): Outcome<string> {
    const spawn = this.resolve(name);
    if (spawn.tag === "Fail") return spawn;
    act(spawn.value);
    return ok(`spawn '${name}' ${verb}`);
  }
}

// src/core/stack/registry.ts
// Name → stack mapping with serialized structural changes

import type { Outcome } from "../../outcome/outcome";
import { ok, unknownTarget, duplicateTarget, malformedCommand } from "../../outcome/constructors";
import { Mutex } from "../concurrency/mutex";
import type { ElemType } from "../value/value";
import type { StackInfo, TypedStackOptions } from "./typedStack";
import { TypedStack, DEFAULT_CAPACITY } from "./typedStack";

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

export function checkName(name: string): Outcome<string> {
  return isValidName(name) ? ok(name) : malformedCommand(name, "invalid name");
}

export type StackRegistryOptions = {
  /** Capacity for stacks created without an explicit one. */
  capacity?: number;
  /** Names owned elsewhere (spawns); creating a stack under one is a duplicate. */
  isReserved?: (name: string) => boolean;
  /** Registry consulted by lookups that miss here. A spawn's private registry points at the shared one. */
  parent?: StackRegistry;
};

export type CreateStackOptions = TypedStackOptions & {
  /** Swap out an existing stack of the same name instead of failing. */
  replace?: boolean;
};

/**
 * StackRegistry: owns every shared stack.
 * Structural changes go through `lock`; lookups read the current map.
 */
export class StackRegistry {
  readonly lock = new Mutex("stacks");
  private readonly stacks = new Map<string, TypedStack>();
  private readonly capacity: number;
  private readonly isReserved: (name: string) => boolean;
  private readonly parent?: StackRegistry;

  constructor(options: StackRegistryOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.isReserved = options.isReserved ?? (() => false);
    this.parent = options.parent;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  get(name: string): TypedStack | undefined {
    return this.stacks.get(name) ?? this.parent?.get(name);
  }

  resolve(name: string): Outcome<TypedStack> {
    const stack = this.get(name);
    return stack ? ok(stack) : unknownTarget(name, "stack");
  }

  create(name: string, type: ElemType, options: CreateStackOptions = {}): Promise<Outcome<TypedStack>> {
    return this.lock.runExclusive<Outcome<TypedStack>>(() => {
      const named = checkName(name);
      if (named.tag === "Fail") return named;
      if (this.isReserved(name)) return duplicateTarget(name);

      const previous = this.stacks.get(name);
      if (previous && !options.replace) return duplicateTarget(name);

      const stack = new TypedStack(name, type, {
        perspective: options.perspective,
        capacity: options.capacity ?? this.capacity,
      });
      this.stacks.set(name, stack);
      previous?.retire();
      return ok(stack);
    });
  }

  /** Insert a stack built elsewhere; used for a fresh private registry. */
  adopt(stack: TypedStack): TypedStack {
    this.stacks.get(stack.name)?.retire();
    this.stacks.set(stack.name, stack);
    return stack;
  }

  remove(name: string): Promise<Outcome<TypedStack>> {
    return this.lock.runExclusive<Outcome<TypedStack>>(() => {
      const stack = this.stacks.get(name);
      if (!stack) return unknownTarget(name, "stack");
      this.stacks.delete(name);
      stack.retire();
      return ok(stack);
    });
  }

  /** Names held directly by this registry. */
  names(): string[] {
    return [...this.stacks.keys()].sort();
  }

  list(): StackInfo[] {
    return this.names().flatMap((name) => {
      const stack = this.stacks.get(name);
      return stack ? [stack.info()] : [];
    });
  }
}

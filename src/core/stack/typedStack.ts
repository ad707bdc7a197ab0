// src/core/stack/typedStack.ts
// Named, typed, growable stack with a perspective and its own lock

import type { Outcome } from "../../outcome/outcome";
import { ok, typeMismatch, emptyStack, capacityExceeded, indexOutOfRange } from "../../outcome/constructors";
import { Mutex } from "../concurrency/mutex";
import type { ElemType, Value } from "../value/value";
import { elemTypeOf, formatValue } from "../value/value";
import type { Perspective, PerspectiveMode } from "./perspective";
import { LIFO, perspectiveFor, flipped, renderItems } from "./perspective";

export const DEFAULT_CAPACITY = 65_536;

export type TypedStackOptions = {
  perspective?: PerspectiveMode;
  capacity?: number;
};

export type StackInfo = {
  name: string;
  type: ElemType;
  perspective: PerspectiveMode;
  depth: number;
  capacity: number;
};

/**
 * TypedStack holds values of one element type.
 *
 * Every mutating method either completes or leaves the stack untouched.
 * Callers that combine several steps (pop then push) hold `lock` and
 * check `require`/`ensureRoom` up front.
 */
export class TypedStack {
  readonly lock: Mutex;
  readonly capacity: number;
  private readonly items: Value[] = [];
  private view: Perspective;
  private retiredFlag = false;

  constructor(
    readonly name: string,
    readonly type: ElemType,
    options: TypedStackOptions = {}
  ) {
    this.lock = new Mutex(`stack:${name}`);
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.view = options.perspective ? perspectiveFor(options.perspective) : LIFO;
  }

  get depth(): number {
    return this.items.length;
  }

  get perspective(): PerspectiveMode {
    return this.view.mode;
  }

  get retired(): boolean {
    return this.retiredFlag;
  }

  /** Called by the registry when this handle is replaced or removed. */
  retire(): void {
    this.retiredFlag = true;
  }

  setPerspective(mode: PerspectiveMode): void {
    this.view = perspectiveFor(mode);
  }

  flip(): PerspectiveMode {
    this.view = flipped(this.view);
    return this.view.mode;
  }

  /** Storage-order copy of the elements. */
  snapshot(): Value[] {
    return [...this.items];
  }

  require(count: number): Outcome<void> {
    return this.items.length >= count ? ok(undefined) : emptyStack(this.name, count, this.items.length);
  }

  ensureRoom(count: number): Outcome<void> {
    return this.items.length + count <= this.capacity
      ? ok(undefined)
      : capacityExceeded(this.name, this.capacity);
  }

  accepts(v: Value): Outcome<void> {
    const actual = elemTypeOf(v);
    if (actual === this.type) return ok(undefined);
    return typeMismatch(this.type, actual, `cannot push ${actual} onto ${this.type} stack '${this.name}'`);
  }

  /** Push values in order; all are checked before the first is stored. */
  push(...values: Value[]): Outcome<void> {
    for (const v of values) {
      const accepted = this.accepts(v);
      if (accepted.tag === "Fail") return accepted;
    }
    const room = this.ensureRoom(values.length);
    if (room.tag === "Fail") return room;

    for (const v of values) {
      this.items.splice(this.view.insertionIndex(this.items.length), 0, v);
    }
    return ok(undefined);
  }

  /** Values from depth 0 downward, without removing them. */
  peek(count = 1): Outcome<Value[]> {
    const present = this.require(count);
    if (present.tag === "Fail") return present;
    const values: Value[] = [];
    for (let depth = 0; depth < count; depth++) {
      values.push(this.items[this.view.indexOf(depth, this.items.length)]);
    }
    return ok(values);
  }

  /** Remove `count` values, returned top first. */
  pop(count = 1): Outcome<Value[]> {
    const present = this.require(count);
    if (present.tag === "Fail") return present;
    const values: Value[] = [];
    for (let i = 0; i < count; i++) {
      const [v] = this.items.splice(this.view.indexOf(0, this.items.length), 1);
      values.push(v);
    }
    return ok(values);
  }

  checkDepth(depth: number): Outcome<number> {
    if (!Number.isInteger(depth) || depth < 0 || depth >= this.items.length) {
      return indexOutOfRange(depth, this.items.length, "depth");
    }
    return ok(depth);
  }

  at(depth: number): Outcome<Value> {
    const checked = this.checkDepth(depth);
    if (checked.tag === "Fail") return checked;
    return ok(this.items[this.view.indexOf(depth, this.items.length)]);
  }

  removeAt(depth: number): Outcome<Value> {
    const checked = this.checkDepth(depth);
    if (checked.tag === "Fail") return checked;
    const [v] = this.items.splice(this.view.indexOf(depth, this.items.length), 1);
    return ok(v);
  }

  /** Exchange the elements at two depths. */
  exchange(a: number, b: number): Outcome<void> {
    const first = this.checkDepth(a);
    if (first.tag === "Fail") return first;
    const second = this.checkDepth(b);
    if (second.tag === "Fail") return second;
    const i = this.view.indexOf(a, this.items.length);
    const j = this.view.indexOf(b, this.items.length);
    [this.items[i], this.items[j]] = [this.items[j], this.items[i]];
    return ok(undefined);
  }

  clear(): void {
    this.items.length = 0;
  }

  render(): string {
    return `@${this.name} (${this.view.mode.toUpperCase()}): ${renderItems(this.items.map(formatValue), this.view)}`;
  }

  info(): StackInfo {
    return {
      name: this.name,
      type: this.type,
      perspective: this.view.mode,
      depth: this.items.length,
      capacity: this.capacity,
    };
  }
}

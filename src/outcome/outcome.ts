import type { Failure } from "./failure";
import type { Span } from "./diagnostic";

/** Where and how long: attached to every sub-command result. */
export interface OutcomeMeta {
  span?: Span;
  durationMs?: number;
  /** Stack or spawn the outcome was produced against. */
  target?: string;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;
export type Ok<A> = Done<A>;
export type Err = Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}

/** Stamp the stack or spawn an outcome belongs to. */
export function withTarget<A>(o: Outcome<A>, target: string): Outcome<A> {
  return { ...o, meta: { ...o.meta, target } };
}

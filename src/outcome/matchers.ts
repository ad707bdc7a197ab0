import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";
import { formatFailure } from "./failure";

export function match<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  if (isDone(o)) {
    return { ...o, value: fn(o.value) };
  }
  return o;
}

export async function flatMapOutcome<A, B>(
  o: Outcome<A>,
  fn: (a: A) => Promise<Outcome<B>> | Outcome<B>
): Promise<Outcome<B>> {
  if (isDone(o)) {
    return await fn(o.value);
  }
  return o;
}

export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(formatFailure(o.failure));
}

export function unwrapOr<A>(o: Outcome<A>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}

/** One status line: the success text, or `Kind: message`. */
export function describeOutcome(o: Outcome<string>): string {
  return match(o, {
    done: (d) => d.value,
    fail: (f) => formatFailure(f.failure),
  });
}

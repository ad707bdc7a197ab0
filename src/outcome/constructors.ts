import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(failure(reason, message, opts), meta);
}

export function unknownTarget(name: string, what = "stack or spawn"): Fail {
  return err("unknown-target", `no ${what} named '${name}'`, {
    diagnostics: [makeDiagnostic("E0101", { name })],
    context: { name },
  });
}

export function typeMismatch(expected: string, actual: string, message: string): Fail {
  return err("type-mismatch", message, {
    diagnostics: [makeDiagnostic("E0100", { expected, actual })],
    context: { expected, actual },
  });
}

export function emptyStack(name: string, needed: number, actual: number): Fail {
  const message =
    actual === 0 ? `stack '${name}' is empty` : `'${name}' needs ${needed} elements, has ${actual}`;
  return err("empty-stack", message, {
    diagnostics: [makeDiagnostic("E0202", { needed, actual })],
    context: { name, needed, actual },
  });
}

export function indexOutOfRange(index: number | bigint, bound: number, what: string): Fail {
  return err("index-out-of-range", `${what} ${index} is outside 0..${bound - 1}`, {
    diagnostics: [makeDiagnostic("E0201", { index: String(index) })],
    context: { index: String(index), bound },
  });
}

/** Both operands were popped before the zero divisor was seen; the message says so. */
export function divisionByZero(name: string): Fail {
  return err("division-by-zero", `division by zero on '${name}'; both operands were consumed`, {
    diagnostics: [makeDiagnostic("E0200")],
    context: { name },
    mutated: true,
  });
}

export function malformedCommand(text: string, why: string): Fail {
  return err("malformed-command", `${why}: ${text}`, {
    diagnostics: [makeDiagnostic("E0001", { text })],
    context: { text },
  });
}

export function unknownOperation(verb: string, stackType?: string): Fail {
  const message = stackType
    ? `'${verb}' is not defined for ${stackType} stacks`
    : `unknown operation '${verb}'`;
  return err("unknown-operation", message, {
    diagnostics: [makeDiagnostic("E0103", { verb })],
    context: { verb, stackType },
  });
}

export function arityMismatch(verb: string, expected: string, actual: number): Fail {
  return err("malformed-command", `'${verb}' takes ${expected} argument(s), got ${actual}`, {
    diagnostics: [makeDiagnostic("E0102", { verb, expected, actual })],
    context: { verb },
  });
}

export function capacityExceeded(name: string, capacity: number): Fail {
  return err("capacity-exceeded", `stack '${name}' is at its capacity of ${capacity}`, {
    diagnostics: [makeDiagnostic("E0203", { capacity })],
    context: { name, capacity },
  });
}

export function duplicateTarget(name: string): Fail {
  return err("duplicate-target", `the name '${name}' is already in use`, {
    diagnostics: [makeDiagnostic("E0300", { name })],
    context: { name },
  });
}

export function mailboxFull(name: string): Fail {
  return err("mailbox-full", `spawn '${name}' already has a pending script`, {
    diagnostics: [makeDiagnostic("E0400", { name })],
    context: { name },
  });
}

export function spawnStopped(name: string): Fail {
  return err("spawn-stopped", `spawn '${name}' has been stopped`, {
    diagnostics: [makeDiagnostic("E0401", { name })],
    context: { name },
  });
}

export function internalError(message: string): Fail {
  return err("internal-error", message, {
    diagnostics: [makeDiagnostic("E0900", { message })],
  });
}

import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "unknown-target"
  | "type-mismatch"
  | "empty-stack"
  | "index-out-of-range"
  | "division-by-zero"
  | "malformed-command"
  | "unknown-operation"
  | "capacity-exceeded"
  | "duplicate-target"
  | "mailbox-full"
  | "spawn-stopped"
  | "internal-error";

/** Display names used in status lines, e.g. `DivisionByZero: ...`. */
export const FAILURE_KINDS: Record<FailureReason, string> = {
  "unknown-target": "UnknownTarget",
  "type-mismatch": "TypeMismatch",
  "empty-stack": "EmptyStack",
  "index-out-of-range": "IndexOutOfRange",
  "division-by-zero": "DivisionByZero",
  "malformed-command": "MalformedCommand",
  "unknown-operation": "UnknownOperation",
  "capacity-exceeded": "CapacityExceeded",
  "duplicate-target": "DuplicateTarget",
  "mailbox-full": "MailboxFull",
  "spawn-stopped": "SpawnStopped",
  "internal-error": "InternalError",
};

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  /** True when the operation consumed input before failing. */
  mutated: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    mutated: opts?.mutated ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function failureKind(f: Failure): string {
  return FAILURE_KINDS[f.reason];
}

export function formatFailure(f: Failure): string {
  return `${failureKind(f)}: ${f.message}`;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}

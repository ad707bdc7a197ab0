export type { Outcome, Done, Fail, Ok, Err, OutcomeMeta } from "./outcome";
export { isDone, isFail, withTarget } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure, isFailureReason, failureKind, formatFailure, allDiagnostics, FAILURE_KINDS } from "./failure";
export type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";
export { errorDiag, warnDiag } from "./diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./codes";
export * from "./constructors";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr, describeOutcome } from "./matchers";

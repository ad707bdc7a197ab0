export type DiagnosticSeverity = "error" | "warning";

/** Position of a sub-command within its command line. */
export interface Span {
  line?: number;
  column: number;
  length: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  /** Template parameters the message was filled from. */
  data?: Record<string, string | number>;
}

export function errorDiag(code: string, message: string, span?: Span): Diagnostic {
  return { code, severity: "error", message, span };
}

export function warnDiag(code: string, message: string, span?: Span): Diagnostic {
  return { code, severity: "warning", message, span };
}

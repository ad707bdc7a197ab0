import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed sub-command: {text}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced {what}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Missing target selector" },

  E0100: { code: "E0100", severity: "error", category: "Type", template: "Type mismatch: expected {expected}, got {actual}" },
  E0101: { code: "E0101", severity: "error", category: "Type", template: "Unknown target: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Type", template: "Wrong number of arguments to {verb}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Type", template: "Unknown operation: {verb}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "Division by zero" },
  E0201: { code: "E0201", severity: "error", category: "Runtime", template: "Index out of range: {index}" },
  E0202: { code: "E0202", severity: "error", category: "Runtime", template: "Stack underflow: need {needed}, have {actual}" },
  E0203: { code: "E0203", severity: "error", category: "Runtime", template: "Capacity exceeded: {capacity}" },

  E0300: { code: "E0300", severity: "error", category: "Registry", template: "Name already in use: {name}" },

  E0400: { code: "E0400", severity: "error", category: "Spawn", template: "Mailbox full: {name}" },
  E0401: { code: "E0401", severity: "error", category: "Spawn", template: "Spawn stopped: {name}" },

  E0900: { code: "E0900", severity: "error", category: "Internal", template: "Internal error: {message}" },

  W0001: { code: "W0001", severity: "warning", category: "Config", template: "Small memory: {size} cells" },
  W0002: { code: "W0002", severity: "warning", category: "Config", template: "Return stack not declared: {name}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}

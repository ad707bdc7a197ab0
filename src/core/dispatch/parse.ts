// src/core/dispatch/parse.ts
// Compound command lines: target selector, sub-command splitting, op/arg forms

import type { Outcome } from "../../outcome/outcome";
import { ok, err, malformedCommand } from "../../outcome/constructors";
import { makeDiagnostic } from "../../outcome/codes";
import { isLiteralToken } from "../value/value";

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type ParsedLine =
  /** `@name: sub sub …` */
  | { kind: "selector"; target: string; body: string }
  /** `@name` alone */
  | { kind: "select"; target: string }
  /** `sub sub …` against the current selection */
  | { kind: "bare"; body: string };

export type SubCommand = {
  /** The sub-command as written. */
  text: string;
  op: string;
  /** Trimmed arguments; quotes are kept so the engine can tell text from numbers. */
  args: string[];
};

const SELECTOR = /^@([A-Za-z_][A-Za-z0-9_-]*)\s*(?::([\s\S]*))?$/;
const OP_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FUNCTION_FORM = /^([^()]*)\(([\s\S]*)\)$/;
const BRING = /^bring\s*[:(]/;
const QUOTED = /"[^"]*"|'[^']*'/g;

function unbalanced(text: string, what: string): Outcome<never> {
  return err("malformed-command", `unbalanced ${what}: ${text}`, {
    diagnostics: [makeDiagnostic("E0002", { what })],
    context: { text },
  });
}

// ─────────────────────────────────────────────────────────────────
// Lines
// ─────────────────────────────────────────────────────────────────

export function parseLine(line: string): Outcome<ParsedLine> {
  const text = line.trim();
  if (!text.startsWith("@")) {
    return ok({ kind: "bare", body: text });
  }
  const m = SELECTOR.exec(text);
  if (!m) {
    return malformedCommand(text, "expected '@name' or '@name: commands'");
  }
  const target = m[1];
  const body: string | undefined = m[2];
  if (body === undefined) {
    return ok({ kind: "select", target });
  }
  return ok({ kind: "selector", target, body: body.trim() });
}

/**
 * Split where `isSeparator` holds, outside quotes and parentheses.
 * Reports unbalanced quotes or parentheses.
 */
function splitOutside(text: string, isSeparator: (ch: string) => boolean): Outcome<string[]> {
  const parts: string[] = [];
  let current = "";
  let quote: string | undefined;
  let depth = 0;

  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === "(") depth++;
    if (ch === ")") {
      depth--;
      if (depth < 0) return unbalanced(text, "parentheses");
    }
    if (depth === 0 && isSeparator(ch)) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }

  if (quote) return unbalanced(text, "quotes");
  if (depth !== 0) return unbalanced(text, "parentheses");
  parts.push(current);
  return ok(parts);
}

/** Sub-commands are separated by whitespace outside quotes and parentheses. */
export function splitSubCommands(body: string): Outcome<string[]> {
  const split = splitOutside(body, (ch) => /\s/.test(ch));
  if (split.tag === "Fail") return split;
  return ok(split.value.filter((part) => part.length > 0));
}

/** Split on separator characters outside quotes, keeping at most `limit` pieces. */
function splitUnquoted(text: string, isSeparator: (ch: string) => boolean, limit = Infinity): string[] {
  const pieces: string[] = [];
  let current = "";
  let quote: string | undefined;
  for (const ch of text) {
    if (quote) {
      if (ch === quote) quote = undefined;
      current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (isSeparator(ch) && pieces.length < limit - 1) {
      pieces.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  pieces.push(current);
  return pieces;
}

function keepLines(lines: string[]): string[] {
  return lines.map((l) => l.trim()).filter((l) => l.length > 0 && !l.startsWith("#"));
}

/**
 * Script lines are separated by newlines or `;` outside quotes.
 * Blank lines and `#` comments are dropped.
 */
export function splitScript(script: string): string[] {
  return keepLines(splitUnquoted(script, (ch) => ch === "\n" || ch === ";"));
}

/** Newline-separated lines only; `;` stays inside its line. */
export function splitPhysicalLines(script: string): string[] {
  return keepLines(splitUnquoted(script, (ch) => ch === "\n"));
}

/** The text before the first `;` outside quotes, and the rest when there is one. */
export function splitFirstLine(text: string): [string, string | undefined] {
  const [head, rest] = splitUnquoted(text, (ch) => ch === ";", 2);
  return [head, rest];
}

// ─────────────────────────────────────────────────────────────────
// Sub-commands
// ─────────────────────────────────────────────────────────────────

function splitArgs(inner: string): Outcome<string[]> {
  if (inner.trim() === "") return ok([]);
  const split = splitOutside(inner, (ch) => ch === ",");
  if (split.tag === "Fail") return split;
  return ok(split.value.map((a) => a.trim()));
}

function checkOp(op: string, text: string): Outcome<string> {
  if (op === "") return malformedCommand(text, "empty operation name");
  if (!OP_NAME.test(op)) return malformedCommand(text, "illegal characters in operation name");
  return ok(op);
}

function withArgs(text: string, op: string, args: string[]): Outcome<SubCommand> {
  const checked = checkOp(op, text);
  if (checked.tag === "Fail") return checked;
  if (args.some((a) => a === "")) return malformedCommand(text, "empty argument");
  return ok({ text, op, args });
}

/**
 * One sub-command in any of its shapes:
 * a bare literal (`5`, `"hi"`) is a push; `bring:t,s` and `bring(t, s)`;
 * `op(a, b)`; `op:arg`; `op`.
 */
export function parseSubCommand(text: string): Outcome<SubCommand> {
  if (isLiteralToken(text)) {
    return ok({ text, op: "push", args: [text] });
  }

  if (BRING.test(text)) {
    const fn = FUNCTION_FORM.exec(text);
    const inner = fn ? fn[2] : text.slice(text.indexOf(":") + 1);
    if (!fn && text.slice(0, text.indexOf(":")).trim() !== "bring") {
      return malformedCommand(text, "malformed bring");
    }
    const args = splitArgs(inner);
    if (args.tag === "Fail") return args;
    return withArgs(text, "bring", args.value);
  }

  const fn = FUNCTION_FORM.exec(text);
  if (fn) {
    const args = splitArgs(fn[2]);
    if (args.tag === "Fail") return args;
    return withArgs(text, fn[1].trim(), args.value);
  }
  if (/[()]/.test(text.replace(QUOTED, ""))) {
    return malformedCommand(text, "text after ')'");
  }

  const colon = text.indexOf(":");
  if (colon >= 0) {
    const arg = text.slice(colon + 1).trim();
    if (arg === "") return malformedCommand(text, "missing argument after ':'");
    return withArgs(text, text.slice(0, colon), [arg]);
  }

  return withArgs(text, text, []);
}

// src/core/value/value.ts
// Tagged scalar values held by typed stacks and global memory

import type { Outcome } from "../../outcome/outcome";
import { ok, typeMismatch } from "../../outcome/constructors";

export type ElemType = "int" | "float" | "str";

export type IntVal = { tag: "Int"; n: bigint };
export type FloatVal = { tag: "Float"; x: number };
export type StrVal = { tag: "Str"; s: string };

export type Value = IntVal | FloatVal | StrVal;

export const ELEM_TYPES: readonly ElemType[] = ["int", "float", "str"];

const ELEM_TYPE_ALIASES: Record<string, ElemType> = {
  int: "int",
  integer: "int",
  float: "float",
  double: "float",
  str: "str",
  string: "str",
  text: "str",
};

const INT_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

export function VInt(n: bigint): IntVal {
  return { tag: "Int", n: BigInt.asIntN(64, n) };
}

export function VFloat(x: number): FloatVal {
  return { tag: "Float", x };
}

export function VStr(s: string): StrVal {
  return { tag: "Str", s };
}

export function parseElemType(text: string): ElemType | undefined {
  return ELEM_TYPE_ALIASES[text.trim().toLowerCase()];
}

export function elemTypeOf(v: Value): ElemType {
  switch (v.tag) {
    case "Int": return "int";
    case "Float": return "float";
    case "Str": return "str";
  }
}

export function isQuoted(text: string): boolean {
  if (text.length < 2) return false;
  const first = text[0];
  return (first === '"' || first === "'") && text[text.length - 1] === first;
}

export function unquote(text: string): string {
  return isQuoted(text) ? text.slice(1, -1) : text;
}

/**
 * True for tokens that stand for a value on their own: numbers and quoted strings.
 * Such a token used as a sub-command is shorthand for `push`.
 */
export function isLiteralToken(token: string): boolean {
  return INT_LITERAL.test(token) || FLOAT_LITERAL.test(token) || isQuoted(token);
}

export function parseLiteral(text: string, type: ElemType): Outcome<Value> {
  const raw = text.trim();
  switch (type) {
    case "int": {
      if (!INT_LITERAL.test(raw)) {
        return typeMismatch("int", describeLiteral(raw), `'${raw}' is not an integer`);
      }
      const n = BigInt(raw);
      if (n < I64_MIN || n > I64_MAX) {
        return typeMismatch("int", "big integer", `'${raw}' does not fit in 64 bits`);
      }
      return ok(VInt(n));
    }
    case "float": {
      if (!FLOAT_LITERAL.test(raw)) {
        return typeMismatch("float", describeLiteral(raw), `'${raw}' is not a number`);
      }
      return ok(VFloat(Number(raw)));
    }
    case "str":
      return ok(VStr(unquote(raw)));
  }
}

function describeLiteral(raw: string): string {
  if (INT_LITERAL.test(raw)) return "int";
  if (FLOAT_LITERAL.test(raw)) return "float";
  return "str";
}

/**
 * Convert a value to another element type.
 * int→float and int/float→str always succeed; float→int truncates; str parses.
 */
export function convertValue(v: Value, target: ElemType): Outcome<Value> {
  const source = elemTypeOf(v);
  if (source === target) return ok(v);

  switch (v.tag) {
    case "Int":
      return target === "float" ? ok(VFloat(Number(v.n))) : ok(VStr(v.n.toString()));
    case "Float":
      if (target === "str") return ok(VStr(String(v.x)));
      if (!Number.isFinite(v.x)) {
        return typeMismatch("int", "float", `cannot convert ${String(v.x)} to int`);
      }
      return ok(VInt(BigInt(Math.trunc(v.x))));
    case "Str": {
      const parsed = parseLiteral(v.s, target);
      if (parsed.tag === "Fail") {
        return typeMismatch(target, "str", `cannot convert "${v.s}" to ${target}`);
      }
      return parsed;
    }
  }
}

/** Floats print rounded to six decimals, always with a decimal point. */
export function formatFloat(x: number): string {
  if (!Number.isFinite(x)) return String(x);
  const rounded = Number(x.toFixed(6));
  const text = String(rounded);
  return Number.isInteger(rounded) && !text.includes("e") ? `${text}.0` : text;
}

export function formatValue(v: Value): string {
  switch (v.tag) {
    case "Int": return v.n.toString();
    case "Float": return formatFloat(v.x);
    case "Str": return JSON.stringify(v.s);
  }
}


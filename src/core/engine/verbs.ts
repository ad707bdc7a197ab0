// src/core/engine/verbs.ts
// The closed verb set and what each verb accepts

import type { ElemType } from "../value/value";

export type Verb =
  | "push" | "pop" | "peek"
  | "dup" | "drop" | "swap" | "over" | "tuck"
  | "pick" | "roll"
  | "dup2" | "drop2" | "swap2" | "over2"
  | "depth" | "print"
  | "lifo" | "fifo" | "flip"
  | "add" | "sub" | "mul" | "div"
  | "and" | "or" | "xor" | "shl" | "shr"
  | "store" | "load"
  | "bring"
  | "pushr" | "popr" | "peekr";

/** Inclusive argument-count range. */
export type Arity = readonly [min: number, max: number];

export type VerbSpec = {
  /** Element types the verb is defined for, with the argument counts it takes on each. */
  arity: Partial<Record<ElemType, Arity>>;
  summary: string;
};

const NONE: Arity = [0, 0];
const ONE: Arity = [1, 1];

function anyType(arity: Arity): Record<ElemType, Arity> {
  return { int: arity, float: arity, str: arity };
}

export const VERBS: Record<Verb, VerbSpec> = {
  push: { arity: anyType([1, Number.POSITIVE_INFINITY]), summary: "push one or more values" },
  pop: { arity: anyType(NONE), summary: "remove and report the top" },
  peek: { arity: anyType(NONE), summary: "report the top" },
  dup: { arity: anyType(NONE), summary: "copy the top" },
  drop: { arity: anyType(NONE), summary: "discard the top" },
  swap: { arity: anyType(NONE), summary: "exchange the top two" },
  over: { arity: anyType(NONE), summary: "copy the second element to the top" },
  tuck: { arity: anyType(NONE), summary: "copy the top below the second element" },
  pick: { arity: anyType(ONE), summary: "copy the element at depth n to the top" },
  roll: { arity: anyType(ONE), summary: "move the element at depth n to the top" },
  dup2: { arity: anyType(NONE), summary: "copy the top pair" },
  drop2: { arity: anyType(NONE), summary: "discard the top pair" },
  swap2: { arity: anyType(NONE), summary: "exchange the top two pairs" },
  over2: { arity: anyType(NONE), summary: "copy the second pair to the top" },
  depth: { arity: anyType(NONE), summary: "report the element count" },
  print: { arity: anyType(NONE), summary: "render the stack" },
  lifo: { arity: anyType(NONE), summary: "read and write at the end" },
  fifo: { arity: anyType(NONE), summary: "read and write at the front" },
  flip: { arity: anyType(NONE), summary: "toggle the perspective" },
  add: { arity: anyType(NONE), summary: "a + b, or concatenation" },
  sub: { arity: { int: NONE, float: NONE, str: ONE }, summary: "a - b, or strip a trailing run" },
  mul: { arity: { int: NONE, float: NONE, str: ONE }, summary: "a * b, or repeat n times" },
  div: { arity: { int: NONE, float: NONE, str: ONE }, summary: "a / b, or split and rejoin" },
  and: { arity: { int: NONE }, summary: "bitwise and" },
  or: { arity: { int: NONE }, summary: "bitwise or" },
  xor: { arity: { int: NONE }, summary: "bitwise xor" },
  shl: { arity: { int: NONE }, summary: "shift left by the top" },
  shr: { arity: { int: NONE }, summary: "arithmetic shift right by the top" },
  store: { arity: { int: [0, 1] }, summary: "write a value to global memory" },
  load: { arity: { int: [0, 1] }, summary: "read a global memory cell" },
  bring: { arity: anyType([2, 2]), summary: "move the top of another stack here" },
  pushr: { arity: anyType(NONE), summary: "move the top to the return stack" },
  popr: { arity: anyType(NONE), summary: "move the return stack's top here" },
  peekr: { arity: anyType(NONE), summary: "copy the return stack's top here" },
};

export function isVerb(name: string): name is Verb {
  return Object.prototype.hasOwnProperty.call(VERBS, name);
}

export function verbNames(): Verb[] {
  return Object.keys(VERBS).filter(isVerb);
}

export function describeArity([min, max]: Arity): string {
  if (min === max) return String(min);
  if (max === Number.POSITIVE_INFINITY) return `${min} or more`;
  return `${min} to ${max}`;
}

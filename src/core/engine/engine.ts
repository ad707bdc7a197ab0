// src/core/engine/engine.ts
// Applies one verb to a selected stack

import type { Outcome } from "../../outcome/outcome";
import {
  ok,
  typeMismatch,
  divisionByZero,
  indexOutOfRange,
  malformedCommand,
  unknownOperation,
  unknownTarget,
  arityMismatch,
  internalError,
} from "../../outcome/constructors";
import type { GlobalMemory } from "../memory/globalMemory";
import type { TypedStack } from "../stack/typedStack";
import type { Value } from "../value/value";
import {
  VInt,
  VFloat,
  VStr,
  convertValue,
  formatValue,
  parseElemType,
  parseLiteral,
  unquote,
} from "../value/value";
import type { Verb } from "./verbs";
import { VERBS, describeArity } from "./verbs";

// ─────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────

/**
 * Everything a verb may touch besides its selected stack.
 * The caller holds the locks of every stack `stacksTouched` names.
 */
export type EngineContext = {
  stack: TypedStack;
  memory: GlobalMemory;
  lookup: (name: string) => Outcome<TypedStack>;
  returnStack: string;
};

type Handler = (ctx: EngineContext, args: string[]) => Outcome<string>;

/** `@name` and `name` both name a stack in `bring`. */
export function sourceName(arg: string): string {
  const bare = unquote(arg.trim());
  return bare.startsWith("@") ? bare.slice(1) : bare;
}

/**
 * Names of the stacks a call will read or write, selected stack first.
 */
export function stacksTouched(verb: Verb, args: readonly string[], selected: string, returnStack: string): string[] {
  switch (verb) {
    case "bring":
      return args.length === 2 ? [selected, sourceName(args[1])] : [selected];
    case "pushr":
    case "popr":
    case "peekr":
      return [selected, returnStack];
    default:
      return [selected];
  }
}

/**
 * Run `verb` against `ctx.stack`. Failures come back as values; only a
 * division by zero reports a mutation (both operands consumed).
 */
export function applyVerb(ctx: EngineContext, verb: Verb, args: string[]): Outcome<string> {
  const { stack } = ctx;
  if (stack.retired) return unknownTarget(stack.name, "stack");

  const arity = VERBS[verb].arity[stack.type];
  if (!arity) return unknownOperation(verb, stack.type);
  if (args.length < arity[0] || args.length > arity[1]) {
    return arityMismatch(verb, describeArity(arity), args.length);
  }
  return HANDLERS[verb](ctx, args);
}

// ─────────────────────────────────────────────────────────────────
// Argument helpers
// ─────────────────────────────────────────────────────────────────

function intOf(v: Value): Outcome<bigint> {
  return v.tag === "Int" ? ok(v.n) : typeMismatch("int", v.tag.toLowerCase(), `expected an integer, got ${formatValue(v)}`);
}

function intArg(text: string): Outcome<bigint> {
  const parsed = parseLiteral(text, "int");
  if (parsed.tag === "Fail") return parsed;
  return intOf(parsed.value);
}

/** Non-negative count or depth argument. */
function countArg(text: string, what: string, bound: number): Outcome<number> {
  const parsed = intArg(text);
  if (parsed.tag === "Fail") return parsed;
  if (parsed.value < 0n || parsed.value >= BigInt(bound)) {
    return indexOutOfRange(parsed.value, bound, what);
  }
  return ok(Number(parsed.value));
}

// ─────────────────────────────────────────────────────────────────
// Stack manipulation
// ─────────────────────────────────────────────────────────────────

function push({ stack }: EngineContext, args: string[]): Outcome<string> {
  const values: Value[] = [];
  for (const arg of args) {
    const parsed = parseLiteral(arg, stack.type);
    if (parsed.tag === "Fail") return parsed;
    values.push(parsed.value);
  }
  const pushed = stack.push(...values);
  if (pushed.tag === "Fail") return pushed;
  return ok(`pushed ${values.map(formatValue).join(" ")} onto @${stack.name}`);
}

function pop({ stack }: EngineContext): Outcome<string> {
  const popped = stack.pop(1);
  if (popped.tag === "Fail") return popped;
  return ok(formatValue(popped.value[0]));
}

function peek({ stack }: EngineContext): Outcome<string> {
  const top = stack.peek(1);
  if (top.tag === "Fail") return top;
  return ok(formatValue(top.value[0]));
}

function acknowledge(verb: Verb, stack: TypedStack): Outcome<string> {
  return ok(`${verb} on @${stack.name}`);
}

/**
 * Copy the elements at `depths` (read before any push) onto the top, in order.
 */
function copyToTop(verb: Verb, depthsNeeded: number, depths: number[]): Handler {
  return ({ stack }) => {
    const present = stack.require(depthsNeeded);
    if (present.tag === "Fail") return present;
    const room = stack.ensureRoom(depths.length);
    if (room.tag === "Fail") return room;

    const values: Value[] = [];
    for (const depth of depths) {
      const v = stack.at(depth);
      if (v.tag === "Fail") return v;
      values.push(v.value);
    }
    const pushed = stack.push(...values);
    if (pushed.tag === "Fail") return pushed;
    return acknowledge(verb, stack);
  };
}

function dropTop(verb: Verb, count: number): Handler {
  return ({ stack }) => {
    const popped = stack.pop(count);
    if (popped.tag === "Fail") return popped;
    return acknowledge(verb, stack);
  };
}

function swap({ stack }: EngineContext): Outcome<string> {
  const present = stack.require(2);
  if (present.tag === "Fail") return present;
  const swapped = stack.exchange(0, 1);
  if (swapped.tag === "Fail") return swapped;
  return acknowledge("swap", stack);
}

function swap2({ stack }: EngineContext): Outcome<string> {
  const present = stack.require(4);
  if (present.tag === "Fail") return present;
  const first = stack.exchange(0, 2);
  if (first.tag === "Fail") return first;
  const second = stack.exchange(1, 3);
  if (second.tag === "Fail") return second;
  return acknowledge("swap2", stack);
}

/** a b → b a b, reading from the top. */
function tuck({ stack }: EngineContext): Outcome<string> {
  const present = stack.require(2);
  if (present.tag === "Fail") return present;
  const room = stack.ensureRoom(1);
  if (room.tag === "Fail") return room;

  const popped = stack.pop(2);
  if (popped.tag === "Fail") return popped;
  const [b, a] = popped.value;
  const pushed = stack.push(b, a, b);
  if (pushed.tag === "Fail") return pushed;
  return acknowledge("tuck", stack);
}

function pick(ctx: EngineContext, [n]: string[]): Outcome<string> {
  const depth = countArg(n, "depth", ctx.stack.depth);
  if (depth.tag === "Fail") return depth;
  return copyToTop("pick", depth.value + 1, [depth.value])(ctx, []);
}

function roll({ stack }: EngineContext, [n]: string[]): Outcome<string> {
  const depth = countArg(n, "depth", stack.depth);
  if (depth.tag === "Fail") return depth;
  const moved = stack.removeAt(depth.value);
  if (moved.tag === "Fail") return moved;
  const pushed = stack.push(moved.value);
  if (pushed.tag === "Fail") return pushed;
  return acknowledge("roll", stack);
}

function depth({ stack }: EngineContext): Outcome<string> {
  return ok(String(stack.depth));
}

function print({ stack }: EngineContext): Outcome<string> {
  return ok(stack.render());
}

function perspective(set: (stack: TypedStack) => void): Handler {
  return ({ stack }) => {
    set(stack);
    return ok(`@${stack.name} is now ${stack.perspective.toUpperCase()}`);
  };
}

// ─────────────────────────────────────────────────────────────────
// Arithmetic
// ─────────────────────────────────────────────────────────────────

type ArithOp = "add" | "sub" | "mul" | "div";

function combine(op: ArithOp, a: Value, b: Value, stackName: string): Outcome<Value> {
  if (a.tag === "Int" && b.tag === "Int") {
    switch (op) {
      case "add": return ok(VInt(a.n + b.n));
      case "sub": return ok(VInt(a.n - b.n));
      case "mul": return ok(VInt(a.n * b.n));
      case "div":
        return b.n === 0n ? divisionByZero(stackName) : ok(VInt(a.n / b.n));
    }
  }
  if (a.tag === "Float" && b.tag === "Float") {
    switch (op) {
      case "add": return ok(VFloat(a.x + b.x));
      case "sub": return ok(VFloat(a.x - b.x));
      case "mul": return ok(VFloat(a.x * b.x));
      case "div":
        return b.x === 0 ? divisionByZero(stackName) : ok(VFloat(a.x / b.x));
    }
  }
  if (a.tag === "Str" && b.tag === "Str" && op === "add") {
    return ok(VStr(a.s + b.s));
  }
  return internalError(`cannot ${op} ${formatValue(a)} and ${formatValue(b)}`);
}

function replaceTop(verb: Verb, stack: TypedStack, result: Value): Outcome<string> {
  const pushed = stack.push(result);
  if (pushed.tag === "Fail") return pushed;
  return ok(`${verb} = ${formatValue(result)}`);
}

/** Pop b, then a; push `a op b`. */
function arithmetic(op: ArithOp): Handler {
  return ({ stack }) => {
    const popped = stack.pop(2);
    if (popped.tag === "Fail") return popped;
    const [b, a] = popped.value;
    const result = combine(op, a, b, stack.name);
    if (result.tag === "Fail") return result;
    return replaceTop(op, stack, result.value);
  };
}

/** Text operand forms: each rewrites the top string using one argument. */
function textTransform(verb: "sub" | "mul" | "div", rewrite: (s: string, arg: string) => Outcome<string>): Handler {
  return ({ stack }, [arg]) => {
    const top = stack.peek(1);
    if (top.tag === "Fail") return top;
    const [v] = top.value;
    if (v.tag !== "Str") return internalError(`text ${verb} on a ${v.tag} value`);
    const rewritten = rewrite(v.s, arg);
    if (rewritten.tag === "Fail") return rewritten;
    const popped = stack.pop(1);
    if (popped.tag === "Fail") return popped;
    return replaceTop(verb, stack, VStr(rewritten.value));
  };
}

const stripTrailing = textTransform("sub", (s, arg) => {
  const ch = unquote(arg);
  if (ch === "") return malformedCommand(arg, "sub needs a non-empty suffix");
  let out = s;
  while (out.endsWith(ch)) out = out.slice(0, out.length - ch.length);
  return ok(out);
});

/** Longest string a text verb may produce. */
export const MAX_TEXT_LENGTH = 1 << 24;

const repeat = textTransform("mul", (s, arg) => {
  const n = intArg(unquote(arg));
  if (n.tag === "Fail") return n;
  const limit = s.length === 0 ? Number.MAX_SAFE_INTEGER - 1 : Math.floor(MAX_TEXT_LENGTH / s.length);
  if (n.value < 0n || n.value > BigInt(limit)) return indexOutOfRange(n.value, limit + 1, "repeat count");
  return ok(s.repeat(Number(n.value)));
});

const splitJoin = textTransform("div", (s, arg) => {
  const delim = unquote(arg);
  if (delim === "") return malformedCommand(arg, "div needs a non-empty delimiter");
  return ok(s.split(delim).join(" "));
});

function byType(numeric: Handler, text: Handler): Handler {
  return (ctx, args) => (ctx.stack.type === "str" ? text(ctx, args) : numeric(ctx, args));
}

// ─────────────────────────────────────────────────────────────────
// Bitwise (integer only)
// ─────────────────────────────────────────────────────────────────

type BitOp = "and" | "or" | "xor" | "shl" | "shr";

/** The shift amount (top) is checked before anything is popped. */
function bitwise(op: BitOp): Handler {
  return ({ stack }) => {
    const present = stack.peek(2);
    if (present.tag === "Fail") return present;
    const b = intOf(present.value[0]);
    if (b.tag === "Fail") return b;
    const a = intOf(present.value[1]);
    if (a.tag === "Fail") return a;

    const isShift = op === "shl" || op === "shr";
    if (isShift && (b.value < 0n || b.value > 63n)) {
      return indexOutOfRange(b.value, 64, "shift amount");
    }

    const popped = stack.pop(2);
    if (popped.tag === "Fail") return popped;
    return replaceTop(op, stack, VInt(bits(op, a.value, b.value)));
  };
}

function bits(op: BitOp, a: bigint, b: bigint): bigint {
  switch (op) {
    case "and": return a & b;
    case "or": return a | b;
    case "xor": return a ^ b;
    case "shl": return a << b;
    case "shr": return a >> b;
  }
}

// ─────────────────────────────────────────────────────────────────
// Global memory
// ─────────────────────────────────────────────────────────────────

function store({ stack, memory }: EngineContext, args: string[]): Outcome<string> {
  let address: number;
  let valueDepth: number;
  if (args.length === 1) {
    const parsed = intArg(args[0]);
    if (parsed.tag === "Fail") return parsed;
    const checked = memory.address(parsed.value);
    if (checked.tag === "Fail") return checked;
    const present = stack.require(1);
    if (present.tag === "Fail") return present;
    address = checked.value;
    valueDepth = 0;
  } else {
    const present = stack.peek(2);
    if (present.tag === "Fail") return present;
    const addr = intOf(present.value[0]);
    if (addr.tag === "Fail") return addr;
    const checked = memory.address(addr.value);
    if (checked.tag === "Fail") return checked;
    address = checked.value;
    valueDepth = 1;
  }

  const popped = stack.pop(valueDepth + 1);
  if (popped.tag === "Fail") return popped;
  const value = intOf(popped.value[valueDepth]);
  if (value.tag === "Fail") return value;
  const written = memory.write(address, value.value);
  if (written.tag === "Fail") return written;
  return ok(`stored ${value.value} at ${address}`);
}

function load({ stack, memory }: EngineContext, args: string[]): Outcome<string> {
  let address: number;
  if (args.length === 1) {
    const parsed = intArg(args[0]);
    if (parsed.tag === "Fail") return parsed;
    const checked = memory.address(parsed.value);
    if (checked.tag === "Fail") return checked;
    const room = stack.ensureRoom(1);
    if (room.tag === "Fail") return room;
    address = checked.value;
  } else {
    const top = stack.peek(1);
    if (top.tag === "Fail") return top;
    const addr = intOf(top.value[0]);
    if (addr.tag === "Fail") return addr;
    const checked = memory.address(addr.value);
    if (checked.tag === "Fail") return checked;
    const popped = stack.pop(1);
    if (popped.tag === "Fail") return popped;
    address = checked.value;
  }

  const cell = memory.read(address);
  if (cell.tag === "Fail") return cell;
  const pushed = stack.push(VInt(cell.value));
  if (pushed.tag === "Fail") return pushed;
  return ok(`loaded ${cell.value} from ${address}`);
}

// ─────────────────────────────────────────────────────────────────
// Cross-stack transfer
// ─────────────────────────────────────────────────────────────────

/**
 * Move (or copy) the top of `from` onto `to`, converted to `to`'s type.
 * Checks everything first; nothing changes on failure.
 */
export function transfer(from: TypedStack, to: TypedStack, copy: boolean): Outcome<Value> {
  if (from.retired) return unknownTarget(from.name, "stack");
  if (to.retired) return unknownTarget(to.name, "stack");
  const top = from.peek(1);
  if (top.tag === "Fail") return top;
  const converted = convertValue(top.value[0], to.type);
  if (converted.tag === "Fail") return converted;
  if (copy || from !== to) {
    const room = to.ensureRoom(1);
    if (room.tag === "Fail") return room;
  }
  if (!copy) {
    const popped = from.pop(1);
    if (popped.tag === "Fail") return popped;
  }
  const pushed = to.push(converted.value);
  if (pushed.tag === "Fail") return pushed;
  return ok(converted.value);
}

function bring(ctx: EngineContext, [typeArg, srcArg]: string[]): Outcome<string> {
  const declared = parseElemType(unquote(typeArg));
  if (!declared) return malformedCommand(typeArg, "unknown element type");
  const source = ctx.lookup(sourceName(srcArg));
  if (source.tag === "Fail") return source;
  if (source.value.type !== declared) {
    return typeMismatch(
      declared,
      source.value.type,
      `@${source.value.name} holds ${source.value.type} values, not ${declared}`
    );
  }
  const moved = transfer(source.value, ctx.stack, false);
  if (moved.tag === "Fail") return moved;
  return ok(`brought ${formatValue(moved.value)} from @${source.value.name} to @${ctx.stack.name}`);
}

function returnTransfer(direction: "pushr" | "popr" | "peekr"): Handler {
  return (ctx) => {
    const rstack = ctx.lookup(ctx.returnStack);
    if (rstack.tag === "Fail") return rstack;
    const r = rstack.value;
    switch (direction) {
      case "pushr": {
        const moved = transfer(ctx.stack, r, false);
        if (moved.tag === "Fail") return moved;
        return ok(`moved ${formatValue(moved.value)} to @${r.name}`);
      }
      case "popr": {
        const moved = transfer(r, ctx.stack, false);
        if (moved.tag === "Fail") return moved;
        return ok(`moved ${formatValue(moved.value)} from @${r.name}`);
      }
      case "peekr": {
        const copied = transfer(r, ctx.stack, true);
        if (copied.tag === "Fail") return copied;
        return ok(`copied ${formatValue(copied.value)} from @${r.name}`);
      }
    }
  };
}

// ─────────────────────────────────────────────────────────────────
// Verb table
// ─────────────────────────────────────────────────────────────────

const HANDLERS: Record<Verb, Handler> = {
  push,
  pop,
  peek,
  dup: copyToTop("dup", 1, [0]),
  drop: dropTop("drop", 1),
  swap,
  over: copyToTop("over", 2, [1]),
  tuck,
  pick,
  roll,
  dup2: copyToTop("dup2", 2, [1, 0]),
  drop2: dropTop("drop2", 2),
  swap2,
  over2: copyToTop("over2", 4, [3, 2]),
  depth,
  print,
  lifo: perspective((s) => s.setPerspective("lifo")),
  fifo: perspective((s) => s.setPerspective("fifo")),
  flip: perspective((s) => {
    s.flip();
  }),
  add: arithmetic("add"),
  sub: byType(arithmetic("sub"), stripTrailing),
  mul: byType(arithmetic("mul"), repeat),
  div: byType(arithmetic("div"), splitJoin),
  and: bitwise("and"),
  or: bitwise("or"),
  xor: bitwise("xor"),
  shl: bitwise("shl"),
  shr: bitwise("shr"),
  store,
  load,
  bring,
  pushr: returnTransfer("pushr"),
  popr: returnTransfer("popr"),
  peekr: returnTransfer("peekr"),
};

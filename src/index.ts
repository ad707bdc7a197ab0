// src/index.ts
// stackweave - Public API
//
// Entry point for the CLI, the HTTP service and embedding hosts.

// ═══════════════════════════════════════════════════════════════════════════════
// CORE RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export {
  StackRuntime,
  runLines,
  MAIN_SOURCE,
  type StackRuntimeOptions,
  type ExecuteResult,
  type CreateStackRequest,
  type CreateSpawnRequest,
} from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & FAILURES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES, STACKS & MEMORY
// ═══════════════════════════════════════════════════════════════════════════════

export type { ElemType, Value, IntVal, FloatVal, StrVal } from "./core/value/value";
export {
  VInt,
  VFloat,
  VStr,
  ELEM_TYPES,
  parseElemType,
  parseLiteral,
  convertValue,
  formatValue,
  formatFloat,
} from "./core/value/value";

export type { Perspective, PerspectiveMode } from "./core/stack/perspective";
export { LIFO, FIFO, perspectiveFor, flipped, parsePerspectiveMode, renderItems } from "./core/stack/perspective";
export { TypedStack, DEFAULT_CAPACITY, type StackInfo, type TypedStackOptions } from "./core/stack/typedStack";
export {
  StackRegistry,
  isValidName,
  type StackRegistryOptions,
  type CreateStackOptions,
} from "./core/stack/registry";
export { GlobalMemory, DEFAULT_MEMORY_SIZE } from "./core/memory/globalMemory";

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE & DISPATCH
// ═══════════════════════════════════════════════════════════════════════════════

export type { Verb, VerbSpec, Arity } from "./core/engine/verbs";
export { VERBS, isVerb, verbNames, describeArity } from "./core/engine/verbs";
export { applyVerb, transfer, stacksTouched, type EngineContext } from "./core/engine/engine";
export {
  parseLine,
  parseSubCommand,
  splitSubCommands,
  splitScript,
  type ParsedLine,
  type SubCommand,
} from "./core/dispatch/parse";
export {
  Dispatcher,
  formatReport,
  reportFailed,
  type Scope,
  type CommandKind,
  type CommandResult,
  type CommandReport,
  type SpawnTargets,
  type DispatcherOptions,
} from "./core/dispatch/dispatcher";

// ═══════════════════════════════════════════════════════════════════════════════
// SPAWNS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Spawn,
  type SpawnState,
  type SpawnInfo,
  type SpawnOptions,
  type MailboxPolicy,
  type LineRunner,
} from "./core/spawn/spawn";
export { TaskRegistry, type TaskRegistryOptions } from "./core/spawn/taskRegistry";
export { Mutex, withLocks } from "./core/concurrency/mutex";
export { Signal } from "./core/concurrency/signal";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT SINKS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ConsoleSink,
  MemorySink,
  TeeSink,
  toWire,
  type OutputSink,
  type OutputEvent,
  type WireEvent,
  type ConsoleSinkOptions,
} from "./ports/sink";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./server";

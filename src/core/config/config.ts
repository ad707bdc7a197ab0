// src/core/config/config.ts
// Configuration for the stack runtime: defaults, environment, file, overrides

import * as fs from "fs";
import * as path from "path";
import type { ElemType } from "../value/value";
import { parseElemType } from "../value/value";
import type { PerspectiveMode } from "../stack/perspective";
import { parsePerspectiveMode } from "../stack/perspective";
import type { MailboxPolicy } from "../spawn/spawn";
import { DEFAULT_CAPACITY } from "../stack/typedStack";
import { DEFAULT_MEMORY_SIZE } from "../memory/globalMemory";
import { makeDiagnostic } from "../../outcome/codes";

// =========================================================================
// Configuration Types
// =========================================================================

export type StackDecl = {
  name: string;
  type: ElemType;
  perspective?: PerspectiveMode;
  capacity?: number;
};

export type MemoryConfig = {
  /** Number of integer cells */
  size: number;
};

export type StacksConfig = {
  /** Capacity for stacks created without one */
  capacity: number;
  /** Stack used by pushr/popr/peekr */
  returnStack: string;
  /** Stacks created at startup */
  defaults: StackDecl[];
};

export type SpawnsConfig = {
  mailbox: MailboxPolicy;
  /** Element type of each spawn's private stack */
  stackType: ElemType;
};

export type ServerConfig = {
  port: number;
};

export type OutputConfig = {
  /** Echo each line before its results */
  verbose: boolean;
};

export type StackweaveConfig = {
  memory: MemoryConfig;
  stacks: StacksConfig;
  spawns: SpawnsConfig;
  server: ServerConfig;
  output: OutputConfig;
};

/** Partial config as read from env, file or flags; sections merge key by key. */
export type ConfigLayer = {
  memory?: Partial<MemoryConfig>;
  stacks?: Partial<StacksConfig>;
  spawns?: Partial<SpawnsConfig>;
  server?: Partial<ServerConfig>;
  output?: Partial<OutputConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_STACKS: StackDecl[] = [
  { name: "dstack", type: "int" },
  { name: "rstack", type: "int" },
  { name: "sstack", type: "str" },
];

export const DEFAULT_CONFIG: StackweaveConfig = {
  memory: { size: DEFAULT_MEMORY_SIZE },
  stacks: { capacity: DEFAULT_CAPACITY, returnStack: "rstack", defaults: DEFAULT_STACKS },
  spawns: { mailbox: "reject", stackType: "int" },
  server: { port: 7420 },
  output: { verbose: false },
};

export const CONFIG_FILE_NAMES = ["stackweave.config.json", "stackweave.config.yaml", "stackweave.config.yml"];

// =========================================================================
// Value readers
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readInt(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return parseInt(v, 10);
  return undefined;
}

function readBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "true" || s === "1" || s === "yes") return true;
    if (s === "false" || s === "0" || s === "no") return false;
  }
  return undefined;
}

function readString(v: unknown): string | undefined {
  return typeof v === "string" && v.trim() !== "" ? v.trim() : undefined;
}

function readMailbox(v: unknown): MailboxPolicy | undefined {
  const s = readString(v)?.toLowerCase();
  return s === "reject" || s === "queue" ? s : undefined;
}

function readElemType(v: unknown): ElemType | undefined {
  const s = readString(v);
  return s === undefined ? undefined : parseElemType(s);
}

/** Drop keys whose value is undefined so they do not override lower layers. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "STACKWEAVE"): ConfigLayer {
  const v = (key: string) => env[`${prefix}_${key}`];
  return {
    memory: defined({ size: readInt(v("MEMORY_SIZE")) }),
    stacks: defined({
      capacity: readInt(v("STACK_CAPACITY")),
      returnStack: readString(v("RETURN_STACK")),
    }),
    spawns: defined({
      mailbox: readMailbox(v("MAILBOX")),
      stackType: readElemType(v("SPAWN_STACK_TYPE")),
    }),
    server: defined({ port: readInt(v("PORT")) }),
    output: defined({ verbose: readBool(v("VERBOSE")) }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data);
}

function readStackDecls(v: unknown): StackDecl[] | undefined {
  if (Array.isArray(v)) {
    return v.flatMap((entry) => {
      const decl = readStackDecl(entry);
      return decl ? [decl] : [];
    });
  }
  // YAML maps: `defaults:\n  dstack: int` or `dstack:\n    type: int`
  if (isRecord(v)) {
    return Object.entries(v).flatMap(([name, entry]) => {
      const decl = readStackDecl(isRecord(entry) ? { name, ...entry } : { name, type: entry });
      return decl ? [decl] : [];
    });
  }
  return undefined;
}

function readStackDecl(v: unknown): StackDecl | undefined {
  if (!isRecord(v)) return undefined;
  const name = readString(v.name);
  const type = readElemType(v.type);
  if (!name || !type) return undefined;
  const perspective = typeof v.perspective === "string" ? parsePerspectiveMode(v.perspective) : undefined;
  return { name, type, ...defined({ perspective, capacity: readInt(v.capacity) }) };
}

/**
 * Create a config layer from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): ConfigLayer {
  const section = (key: string): Record<string, unknown> => {
    const value = data[key];
    return isRecord(value) ? value : {};
  };
  const memory = section("memory");
  const stacks = section("stacks");
  const spawns = section("spawns");
  const server = section("server");
  const output = section("output");

  return {
    memory: defined({ size: readInt(memory.size) }),
    stacks: defined({
      capacity: readInt(stacks.capacity),
      returnStack: readString(stacks.returnStack ?? stacks.return_stack),
      defaults: readStackDecls(stacks.defaults),
    }),
    spawns: defined({
      mailbox: readMailbox(spawns.mailbox),
      stackType: readElemType(spawns.stackType ?? spawns.stack_type),
    }),
    server: defined({ port: readInt(server.port) }),
    output: defined({ verbose: readBool(output.verbose) }),
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): StackweaveConfig {
  const result: StackweaveConfig = {
    memory: { ...DEFAULT_CONFIG.memory },
    stacks: { ...DEFAULT_CONFIG.stacks },
    spawns: { ...DEFAULT_CONFIG.spawns },
    server: { ...DEFAULT_CONFIG.server },
    output: { ...DEFAULT_CONFIG.output },
  };

  for (const layer of layers) {
    if (layer.memory) result.memory = { ...result.memory, ...layer.memory };
    if (layer.stacks) result.stacks = { ...result.stacks, ...layer.stacks };
    if (layer.spawns) result.spawns = { ...result.spawns, ...layer.spawns };
    if (layer.server) result.server = { ...result.server, ...layer.server };
    if (layer.output) result.output = { ...result.output, ...layer.output };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
}): StackweaveConfig {
  const layers: ConfigLayer[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    // Try to find default config files
    const cwd = options?.cwd ?? process.cwd();
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  const lines = content.split("\n");

  for (const rawLine of lines) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    // Pop to the parent at a shallower indent
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      // Nested object
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseScalar(value);
    }
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: StackweaveConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.memory.size < 1) {
    errors.push("memory.size must be at least 1");
  } else if (config.memory.size < 16) {
    warnings.push(makeDiagnostic("W0001", { size: config.memory.size }).message);
  }

  if (config.stacks.capacity < 1) {
    errors.push("stacks.capacity must be at least 1");
  }

  const seen = new Set<string>();
  for (const decl of config.stacks.defaults) {
    if (seen.has(decl.name)) errors.push(`stack '${decl.name}' is declared twice`);
    seen.add(decl.name);
    if (decl.capacity !== undefined && decl.capacity < 1) {
      errors.push(`stack '${decl.name}' capacity must be at least 1`);
    }
  }

  if (!seen.has(config.stacks.returnStack)) {
    warnings.push(makeDiagnostic("W0002", { name: config.stacks.returnStack }).message);
  }

  if (config.server.port < 0 || config.server.port > 65535) {
    errors.push(`server.port ${config.server.port} is outside 0..65535`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

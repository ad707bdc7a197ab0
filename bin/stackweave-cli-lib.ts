// bin/stackweave-cli-lib.ts
// Shared CLI utilities for the stackweave command
// Exported functions for testing

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { StackRuntime } from "../src/runtime";
import type { ConfigLayer, StackweaveConfig } from "../src/core/config/config";
import { loadConfig } from "../src/core/config/config";
import type { Outcome } from "../src/outcome/outcome";
import { describeOutcome } from "../src/outcome/matchers";
import { parseElemType } from "../src/core/value/value";
import { parsePerspectiveMode } from "../src/core/stack/perspective";
import { parseLine, splitFirstLine, splitPhysicalLines } from "../src/core/dispatch/parse";
import type { StackInfo } from "../src/core/stack/typedStack";
import type { SpawnInfo } from "../src/core/spawn/spawn";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "repl" | "exec" | "serve";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  verbose?: boolean;
  serve?: boolean;
  port?: number;
  configFile?: string;
  mode?: CliMode;
  /** Flags that could not be understood */
  errors?: string[];
};

export type CliConfig = {
  mode: CliMode;
  verbose: boolean;
  code?: string;
  file?: string;
  port?: number;
  configFile?: string;
};

/** Result of a REPL global word; `undefined` from the router means "not global". */
export type GlobalResult = {
  ok: boolean;
  lines: string[];
  quit?: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};
  const errors: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--serve") {
      result.serve = true;
      result.mode = "serve";
    } else if (arg === "--port" || arg === "-p") {
      const text = args[++i] ?? "";
      const port = /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
      if (Number.isNaN(port) || port > 65535) {
        errors.push(`invalid port: ${text}`);
      } else {
        result.port = port;
      }
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = args[++i];
    } else if (arg.startsWith("-")) {
      errors.push(`unknown option: ${arg}`);
    } else if (!result.file) {
      // First non-flag argument is the file
      result.file = arg;
      if (!result.mode) result.mode = "exec";
    }
  }

  if (!result.mode) {
    result.mode = "repl";
  }
  if (errors.length > 0) {
    result.errors = errors;
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
stackweave - typed stacks, perspectives and concurrent spawns

USAGE:
  stackweave [options] [file]

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version number
  -e, --eval <script>                Run a script (';' separates lines)
      --serve                        Start the HTTP + WebSocket service
  -p, --port <n>                     Port for --serve
  -c, --config <file>                Config file (JSON or YAML)
      --verbose                      Echo each line before its results

COMMAND LINES:
  @<name>: <sub> <sub> ...           Run sub-commands on a stack, or deposit a script in a spawn
  @<name>                            Select a stack or spawn for bare lines
  <sub> <sub> ...                    Run against the selection

SUB-COMMANDS:
  5, "text", push:5, push(1, 2)      Push values
  pop peek dup drop swap over tuck   Stack manipulation
  pick:n roll:n dup2 drop2 swap2 over2
  add sub mul div                    Arithmetic (text: sub:c mul:n div:d)
  and or xor shl shr                 Bitwise (int stacks)
  store store:a load load:a          Global memory
  bring(type, @src)                  Move the top of another stack here
  pushr popr peekr                   Return stack transfer
  lifo fifo flip depth print         Perspective and inspection

GLOBAL WORDS:
  new <name> <int|float|str> [lifo|fifo]   Create a stack
  spawn <name> [int|float|str]             Create a spawn
  pause|resume|stop <name>                 Control a spawn
  destroy <name>                           Remove a stack or spawn
  send <stack> <spawn>                     Move a stack's top into a spawn
  list                                     Show stacks and spawns
  help                                     Show this help
  quit, exit                               Leave the REPL

EXAMPLES:
  stackweave                                   # Start REPL
  stackweave program.sw                        # Run a script file
  stackweave --eval "@dstack: 1 2 add print"   # Run one line
  stackweave --serve --port 7420               # Start the service
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `stackweave v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "stackweave v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.mode) {
    return args.mode;
  }
  if (args.serve) {
    return "serve";
  }
  if (args.eval !== undefined || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose ?? false,
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }
  if (args.file) {
    config.file = args.file;
  }
  if (args.port !== undefined) {
    config.port = args.port;
  }
  if (args.configFile) {
    config.configFile = args.configFile;
  }

  return config;
}

/**
 * Resolve runtime configuration: command-line flags override file and environment.
 */
export function resolveRuntimeConfig(cli: CliConfig, env: NodeJS.ProcessEnv = process.env): StackweaveConfig {
  const overrides: ConfigLayer = {};
  if (cli.verbose) overrides.output = { verbose: true };
  if (cli.port !== undefined) overrides.server = { port: cli.port };
  return loadConfig({ configFile: cli.configFile, env, overrides });
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL WORDS
// ═══════════════════════════════════════════════════════════════════════════════

const GLOBAL_WORDS = new Set(["new", "spawn", "pause", "resume", "stop", "destroy", "send", "list", "help", "quit", "exit"]);

export function isGlobalWord(word: string): boolean {
  return GLOBAL_WORDS.has(word.toLowerCase());
}

function stripAt(name: string): string {
  return name.startsWith("@") ? name.slice(1) : name;
}

function fromOutcome(outcome: Outcome<string>): GlobalResult {
  return { ok: outcome.tag === "Done", lines: [describeOutcome(outcome)] };
}

function usage(text: string): GlobalResult {
  return { ok: false, lines: [`Usage: ${text}`] };
}

export function formatStackLine(info: StackInfo): string {
  return `@${info.name} ${info.type} ${info.perspective.toUpperCase()} depth ${info.depth}`;
}

export function formatSpawnLine(info: SpawnInfo): string {
  const flags = info.paused ? " paused" : "";
  return `spawn '${info.name}' ${info.state}${flags} pending ${info.pending}`;
}

/**
 * Handle a REPL global word. Returns undefined when the line is a command
 * line for the dispatcher instead.
 */
export async function routeGlobalCommand(line: string, rt: StackRuntime): Promise<GlobalResult | undefined> {
  const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0 || !isGlobalWord(tokens[0])) {
    return undefined;
  }
  const [word, ...rest] = tokens;

  switch (word.toLowerCase()) {
    case "quit":
    case "exit":
      return { ok: true, lines: [], quit: true };

    case "help":
      return { ok: true, lines: [getHelpText()] };

    case "list":
      return {
        ok: true,
        lines: [...rt.listStacks().map(formatStackLine), ...rt.listSpawns().map(formatSpawnLine)],
      };

    case "new": {
      if (rest.length < 2 || rest.length > 3) return usage("new <name> <int|float|str> [lifo|fifo]");
      const [name, typeText, perspectiveText] = rest;
      const type = parseElemType(typeText);
      if (!type) return { ok: false, lines: [`Unknown stack type '${typeText}'. Use int, float or str.`] };
      const perspective = perspectiveText === undefined ? undefined : parsePerspectiveMode(perspectiveText);
      if (perspectiveText !== undefined && !perspective) {
        return { ok: false, lines: [`Unknown perspective '${perspectiveText}'. Use lifo or fifo.`] };
      }
      const created = await rt.createStack(stripAt(name), type, { perspective });
      if (created.tag === "Fail") return fromOutcome(created);
      const info = created.value;
      return { ok: true, lines: [`created @${info.name} (${info.type}, ${info.perspective.toUpperCase()})`] };
    }

    case "spawn": {
      if (rest.length < 1 || rest.length > 2) return usage("spawn <name> [int|float|str]");
      const [name, typeText] = rest;
      const stackType = typeText === undefined ? undefined : parseElemType(typeText);
      if (typeText !== undefined && !stackType) {
        return { ok: false, lines: [`Unknown stack type '${typeText}'. Use int, float or str.`] };
      }
      const created = await rt.createSpawn(stripAt(name), { stackType });
      if (created.tag === "Fail") return fromOutcome(created);
      return { ok: true, lines: [`spawn '${created.value.name}' created`] };
    }

    case "pause":
    case "resume":
    case "stop": {
      if (rest.length !== 1) return usage(`${word.toLowerCase()} <spawn>`);
      const name = stripAt(rest[0]);
      const lowered = word.toLowerCase();
      if (lowered === "pause") return fromOutcome(rt.pauseSpawn(name));
      if (lowered === "resume") return fromOutcome(rt.resumeSpawn(name));
      return fromOutcome(rt.stopSpawn(name));
    }

    case "destroy": {
      if (rest.length !== 1) return usage("destroy <stack|spawn>");
      const name = stripAt(rest[0]);
      if (rt.spawns.has(name)) return fromOutcome(await rt.destroySpawn(name));
      return fromOutcome(await rt.destroyStack(name));
    }

    case "send": {
      if (rest.length !== 2) return usage("send <stack> <spawn>");
      return fromOutcome(await rt.send(stripAt(rest[0]), stripAt(rest[1])));
    }

    default:
      return undefined;
  }
}

/**
 * Run one REPL or script line: a global word, or a command line for the runtime.
 * Command results reach the runtime's sink; global results are returned for printing.
 */
export async function runCliLine(line: string, rt: StackRuntime): Promise<GlobalResult> {
  const global = await routeGlobalCommand(line, rt);
  if (global) return global;
  const result = await rt.execute(line);
  return { ok: result.ok, lines: [] };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPTS
// ═══════════════════════════════════════════════════════════════════════════════

/** True when `text` would be deposited into a spawn rather than run on a stack. */
function targetsSpawn(text: string, rt: StackRuntime): boolean {
  const first = text.split(/\s+/)[0];
  if (first === undefined || isGlobalWord(first)) return false;
  const parsed = parseLine(text);
  if (parsed.tag === "Fail") return false;
  switch (parsed.value.kind) {
    case "selector":
      return rt.spawns.has(parsed.value.target);
    case "bare":
      return rt.selection !== undefined && rt.spawns.has(rt.selection);
    case "select":
      return false;
  }
}

/**
 * Run a script file or --eval text. Lines split on newlines and `;`, except that
 * a line going to a spawn takes the rest of its physical line as the script.
 */
export async function runCliScript(
  script: string,
  rt: StackRuntime,
  onResult: (result: GlobalResult) => void = () => {}
): Promise<GlobalResult[]> {
  const results: GlobalResult[] = [];
  for (const physical of splitPhysicalLines(script)) {
    let remaining: string | undefined = physical;
    while (remaining !== undefined) {
      const [head, rest] = splitFirstLine(remaining);
      let line = head.trim();
      let next = rest;
      if (targetsSpawn(line, rt)) {
        line = remaining.trim();
        next = undefined;
      }
      remaining = next;
      if (line === "" || line.startsWith("#")) continue;

      const result = await runCliLine(line, rt);
      results.push(result);
      onResult(result);
      if (result.quit) return results;
    }
  }
  return results;
}

#!/usr/bin/env -S npx tsx
// bin/stackweave.ts
// stackweave CLI - REPL, script execution and the HTTP service
//
//   - Interactive REPL (global words plus command lines)
//   - Script file or --eval execution
//   - --serve: HTTP + WebSocket service
//
// Run:  npx tsx bin/stackweave.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  resolveRuntimeConfig,
  runCliLine,
  runCliScript,
  type CliConfig,
  type GlobalResult,
} from "./stackweave-cli-lib";
import { StackRuntime } from "../src/runtime";
import { validateConfig, type StackweaveConfig } from "../src/core/config/config";
import { ConsoleSink } from "../src/ports/sink";
import { startStackServer } from "../src/server";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.errors) {
    for (const e of cliArgs.errors) console.error(`Error: ${e}`);
    console.error("Run with --help for usage.");
    process.exit(2);
  }

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const cli = buildConfig(cliArgs);
  const config = resolveRuntimeConfig(cli);

  const validation = validateConfig(config);
  for (const warning of validation.warnings) console.warn(`Warning: ${warning}`);
  if (!validation.valid) {
    for (const e of validation.errors) console.error(`Config error: ${e}`);
    process.exit(2);
  }

  switch (cli.mode) {
    case "exec":
      await executeMode(cli, config);
      break;
    case "serve":
      await serveMode(config);
      break;
    case "repl":
      await replMode(config);
      break;
  }
}

function printResult(result: GlobalResult): void {
  for (const line of result.lines) {
    if (result.ok) console.log(line);
    else console.error(line);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

async function executeMode(cli: CliConfig, config: StackweaveConfig): Promise<void> {
  let script: string;
  if (cli.file) {
    script = fs.readFileSync(cli.file, "utf8");
  } else if (cli.code !== undefined) {
    script = cli.code;
  } else {
    console.error("Error: No script or file specified");
    process.exit(1);
  }

  const rt = await StackRuntime.create({ config, sink: new ConsoleSink({ verbose: config.output.verbose, lifecycle: false }) });
  let failed = false;
  try {
    const results = await runCliScript(script, rt, printResult);
    failed = results.some((r) => !r.ok);
  } finally {
    await rt.shutdown();
  }
  process.exit(failed ? 1 : 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVE MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function serveMode(config: StackweaveConfig): Promise<void> {
  const server = await startStackServer({
    config,
    sink: new ConsoleSink({ verbose: config.output.verbose }),
  });
  console.log(`stackweave service listening on ${server.url} (WebSocket at /ws)`);

  process.on("SIGINT", () => {
    console.log("\nShutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        console.error("Shutdown failed:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

function promptFor(rt: StackRuntime): string {
  return rt.selection ? `@${rt.selection}> ` : "sw> ";
}

async function replMode(config: StackweaveConfig): Promise<void> {
  const rt = await StackRuntime.create({ config, sink: new ConsoleSink({ verbose: config.output.verbose }) });
  const isTTY = process.stdin.isTTY === true;

  // Piped input: process line by line, then leave
  if (!isTTY) {
    const rl = readline.createInterface({ input: process.stdin });
    try {
      for await (const line of rl) {
        const result = await runCliLine(line, rt);
        printResult(result);
        if (result.quit) break;
      }
    } finally {
      rl.close();
      await rt.shutdown();
    }
    return;
  }

  console.log(`${getVersion()} - type 'help' for commands, 'quit' to leave`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: promptFor(rt),
  });

  rl.prompt();

  // Lines are handled one at a time even when typed faster than they finish
  let pending: Promise<void> = Promise.resolve();

  rl.on("line", (line) => {
    pending = pending
      .then(async () => {
        const result = await runCliLine(line, rt);
        printResult(result);
        if (result.quit) {
          rl.close();
          return;
        }
        rl.setPrompt(promptFor(rt));
        rl.prompt();
      })
      .catch((e: unknown) => {
        console.error("InternalError:", e instanceof Error ? e.message : String(e));
        rl.prompt();
      });
  });

  rl.on("close", () => {
    pending
      .then(() => rt.shutdown())
      .then(() => {
        console.log("\nGoodbye!");
        process.exit(0);
      })
      .catch((e: unknown) => {
        console.error("Fatal error:", e instanceof Error ? e.message : String(e));
        process.exit(1);
      });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});

// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns empty sections when no env vars are set", () => {
    const layer = configFromEnv({});
    expect(layer).toEqual({ memory: {}, stacks: {}, spawns: {}, server: {}, output: {} });
    expect(mergeConfigs(layer)).toEqual(DEFAULT_CONFIG);
  });

  it("reads prefixed variables and drops unreadable ones", () => {
    const layer = configFromEnv({
      STACKWEAVE_MEMORY_SIZE: "64",
      STACKWEAVE_MAILBOX: "QUEUE",
      STACKWEAVE_VERBOSE: "yes",
      STACKWEAVE_SPAWN_STACK_TYPE: "float",
      STACKWEAVE_PORT: "abc",
    });
    expect(layer).toEqual({
      memory: { size: 64 },
      stacks: {},
      spawns: { mailbox: "queue", stackType: "float" },
      server: {},
      output: { verbose: true },
    });
  });

  it("reads process.env by default", () => {
    process.env.STACKWEAVE_RETURN_STACK = "aux";
    expect(configFromEnv().stacks).toEqual({ returnStack: "aux" });
  });
});

describe("configFromObject", () => {
  it("accepts snake_case keys and stack declarations", () => {
    const layer = configFromObject({
      memory: { size: 32 },
      stacks: {
        return_stack: "aux",
        defaults: [
          { name: "aux", type: "int" },
          { name: "txt", type: "string", perspective: "fifo" },
          { name: "broken" },
        ],
      },
      spawns: { stack_type: "str" },
    });
    expect(layer.memory).toEqual({ size: 32 });
    expect(layer.stacks).toEqual({
      returnStack: "aux",
      defaults: [
        { name: "aux", type: "int" },
        { name: "txt", type: "str", perspective: "fifo" },
      ],
    });
    expect(layer.spawns).toEqual({ stackType: "str" });
  });
});

describe("parseSimpleYaml", () => {
  it("parses nested maps and scalars", () => {
    const yaml = [
      "# stackweave",
      "memory:",
      "  size: 128",
      "stacks:",
      "  defaults:",
      "    dstack: int",
      "    words:",
      "      type: str",
      "      perspective: fifo",
      "output:",
      "  verbose: true",
    ].join("\n");
    expect(parseSimpleYaml(yaml)).toEqual({
      memory: { size: 128 },
      stacks: { defaults: { dstack: "int", words: { type: "str", perspective: "fifo" } } },
      output: { verbose: true },
    });
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "stackweave-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads YAML stack maps", () => {
    const file = path.join(dir, "stackweave.config.yaml");
    fs.writeFileSync(file, "stacks:\n  defaults:\n    dstack: int\n    words:\n      type: str\n      perspective: fifo\n");
    expect(configFromFile(file).stacks?.defaults).toEqual([
      { name: "dstack", type: "int" },
      { name: "words", type: "str", perspective: "fifo" },
    ]);
  });

  it("rejects missing files and unknown formats", () => {
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");
    const toml = path.join(dir, "config.toml");
    fs.writeFileSync(toml, "");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });

  it("layers defaults, env, file and overrides", () => {
    fs.writeFileSync(
      path.join(dir, "stackweave.config.json"),
      JSON.stringify({ memory: { size: 32 }, spawns: { mailbox: "queue" } })
    );
    const env = { STACKWEAVE_MEMORY_SIZE: "64", STACKWEAVE_PORT: "9000" };

    const fromFile = loadConfig({ cwd: dir, env });
    expect(fromFile.memory.size).toBe(32);
    expect(fromFile.server.port).toBe(9000);
    expect(fromFile.spawns).toEqual({ mailbox: "queue", stackType: "int" });

    const overridden = loadConfig({ cwd: dir, env, overrides: { memory: { size: 16 } } });
    expect(overridden.memory.size).toBe(16);
    expect(overridden.stacks).toEqual(DEFAULT_CONFIG.stacks);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports errors and warnings", () => {
    const config = mergeConfigs({
      memory: { size: 8 },
      stacks: {
        capacity: 0,
        returnStack: "aux",
        defaults: [
          { name: "dstack", type: "int" },
          { name: "dstack", type: "str" },
        ],
      },
      server: { port: 70000 },
    });
    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: [
        "stacks.capacity must be at least 1",
        "stack 'dstack' is declared twice",
        "server.port 70000 is outside 0..65535",
      ],
      warnings: ["Small memory: 8 cells", "Return stack not declared: aux"],
    });
  });
});

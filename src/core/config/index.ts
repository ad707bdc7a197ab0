// src/core/config/index.ts
// Configuration system exports

export {
  type StackDecl,
  type MemoryConfig,
  type StacksConfig,
  type SpawnsConfig,
  type ServerConfig,
  type OutputConfig,
  type StackweaveConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_STACKS,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";

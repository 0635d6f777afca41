// ============================================
// depsync Config - Barrel Export
// ============================================

export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type DepsyncConfig,
  type DepsyncConfigInput,
  DepsyncConfigSchema,
  type HttpConfig,
  HttpConfigSchema,
  LogFormatSchema,
  LogLevelSchema,
  type RegistryConfig,
  RegistryConfigSchema,
} from "./schema.js";

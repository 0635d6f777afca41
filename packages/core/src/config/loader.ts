import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@depsync/shared";
import { type DepsyncConfig, DepsyncConfigSchema, type DepsyncConfigInput } from "./schema.js";

// ============================================
// Configuration Loader Module
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: DepsyncConfigInput;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["depsync.toml", ".depsync.toml", ".config/depsync.toml"];

/**
 * Find project configuration file by searching up from startDir to root.
 *
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

/**
 * Environment variable to config path mappings.
 * Earlier entries win when two variables map to the same path.
 */
const ENV_MAPPINGS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["DEPSYNC_VERSIONS_FILE", ["versionsFile"]],
  ["DEPSYNC_LOG_LEVEL", ["logLevel"]],
  ["DEPSYNC_LOG_FORMAT", ["logFormat"]],
  ["DEPSYNC_USER_AGENT", ["userAgent"]],
  ["GITHUB_TOKEN", ["githubToken"]],
  ["GH_TOKEN", ["githubToken"]],
  ["GITHUB_OUTPUT", ["githubOutput"]],
];

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  let current = obj;
  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (!isPlainObject(next)) {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    } else {
      current = next;
    }
  }
  const lastKey = keys[keys.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * // With DEPSYNC_LOG_LEVEL=debug and GITHUB_TOKEN=test-token set:
 * parseEnvConfig();
 * // { logLevel: "debug", githubToken: "test-token" }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const assigned = new Set<string>();

  for (const [envVar, configPath] of ENV_MAPPINGS) {
    const value = env[envVar];
    const pathKey = configPath.join(".");
    if (value !== undefined && value !== "" && !assigned.has(pathKey)) {
      setNestedValue(result, configPath, value);
      assigned.add(pathKey);
    }
  }

  return result;
}

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated) and undefined values don't overwrite.
 *
 * @example
 * ```typescript
 * deepMerge({ http: { maxAttempts: 3 } }, { http: { baseDelayMs: 10 } });
 * // { http: { maxAttempts: 3, baseDelayMs: 10 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

/**
 * Read and parse a TOML config file
 */
function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Paths in a project file are relative to the directory holding it, so the
 * file works from any subdirectory. Environment and CLI paths stay relative
 * to the working directory.
 */
function anchorToConfigDir(layer: Record<string, unknown>, configDir: string): Record<string, unknown> {
  const { versionsFile } = layer;
  if (typeof versionsFile !== "string" || versionsFile === "") {
    return layer;
  }
  return { ...layer, versionsFile: path.resolve(configDir, versionsFile) };
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Project config: findProjectConfig()
 * 3. Environment variables (unless skipEnv)
 * 4. CLI overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { logLevel: "debug" } });
 * if (result.ok) {
 *   console.log(result.value.versionsFile);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<DepsyncConfig, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false, env } = options;
  const layers: Record<string, unknown>[] = [];

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      layers.push(anchorToConfigDir(projectResult.value, path.dirname(projectPath)));
    }
  }

  if (!skipEnv) {
    layers.push(parseEnvConfig(env));
  }

  if (overrides) {
    layers.push({ ...overrides });
  }

  const parseResult = DepsyncConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}

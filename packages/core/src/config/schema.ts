import { z } from "zod";
import { LOG_LEVELS } from "../logger/types.js";

// ============================================
// depsync Configuration Schema
// ============================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

export const LogFormatSchema = z.enum(["pretty", "json"]);

/**
 * Tag listing limits for paginated registries.
 */
export const RegistryConfigSchema = z
  .object({
    /** Tags requested per page (GitHub per_page, GitLab per_page, BitBucket pagelen) */
    pageSize: z.number().int().min(1).max(100).default(100),
    /** Upper bound on GitHub tag pages read per repository */
    maxPages: z.number().int().min(1).default(2),
  })
  .default({});

/**
 * HTTP retry and timeout policy.
 */
export const HttpConfigSchema = z
  .object({
    /** Total attempts per request, including the first one */
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(30_000),
    /** Per-attempt timeout for registry API calls */
    requestTimeoutMs: z.number().int().min(1).default(30_000),
    /** Per-attempt timeout for checksum downloads */
    downloadTimeoutMs: z.number().int().min(1).default(300_000),
  })
  .default({});

export const DepsyncConfigSchema = z.object({
  /** Path of the versions file, relative to the working directory */
  versionsFile: z.string().min(1).default("versions.properties"),
  logLevel: LogLevelSchema.default("info"),
  logFormat: LogFormatSchema.default("pretty"),
  userAgent: z.string().min(1).default("depsync-version-fetcher/1.0"),
  /** Token sent to the GitHub API to lift anonymous rate limits */
  githubToken: z.string().min(1).optional(),
  /** CI output file that receives the update summary block */
  githubOutput: z.string().min(1).optional(),
  registry: RegistryConfigSchema,
  http: HttpConfigSchema,
});

export type DepsyncConfig = z.infer<typeof DepsyncConfigSchema>;
export type DepsyncConfigInput = z.input<typeof DepsyncConfigSchema>;
export type RegistryConfig = DepsyncConfig["registry"];
export type HttpConfig = DepsyncConfig["http"];

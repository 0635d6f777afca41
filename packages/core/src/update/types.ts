/**
 * Update Run Types
 *
 * @module core/update/types
 */

import type { DepsyncConfig } from "../config/index.js";
import type { DependencyDescriptor } from "../dependencies/index.js";
import type { ErrorCode } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import type { FetchContext, FetchLike } from "../registry/index.js";
import type { VersionUpdates } from "../versions-file/index.js";

/**
 * Outcome of checking one dependency. Never persisted.
 */
export interface UpdateResult {
  readonly name: string;
  /** Pinned value, or "unknown" when the versions file has none */
  readonly currentVersion: string;
  /** Stored form of the latest stable release, or "error" */
  readonly latestVersion: string;
  readonly updated: boolean;
  /** Archive digest, set when an update was verified */
  readonly sha256?: string;
  /** Why the dependency could not be checked */
  readonly error?: string;
  readonly errorCode?: ErrorCode;
  /** Why checksum verification of an available update failed */
  readonly checksumError?: string;
}

export interface PartitionedResults {
  /** Every result with an available update, held-back ones included */
  readonly updated: readonly UpdateResult[];
  /** Updates whose checksum could not be computed */
  readonly heldBack: readonly UpdateResult[];
  readonly errors: readonly UpdateResult[];
  readonly unchanged: readonly UpdateResult[];
}

export interface CheckOptions {
  readonly context: FetchContext;
  readonly logger?: Logger;
}

export interface RunUpdateOptions {
  readonly config: DepsyncConfig;
  /** Path of the versions file (default: config.versionsFile) */
  readonly versionsFile?: string;
  /** Persist updates instead of only reporting them */
  readonly writeMode: boolean;
  /** Dependencies to check (default: the full registry) */
  readonly dependencies?: readonly DependencyDescriptor[];
  readonly fetch?: FetchLike;
  readonly logger?: Logger;
  /** Clock for the timestamp anchor */
  readonly now?: Date;
  readonly signal?: AbortSignal;
}

export interface RunSummary extends PartitionedResults {
  readonly versionsFile: string;
  readonly writeMode: boolean;
  readonly results: readonly UpdateResult[];
  /** Key/value pairs that were (or, in dry-run mode, would be) written */
  readonly updates: VersionUpdates;
  /** Number of dependencies whose new pin was written */
  readonly written: number;
  readonly exitCode: 0 | 1;
}

// ============================================
// depsync Synchronization Errors
// ============================================

import { DepsyncError, ErrorCode } from "./types.js";

/**
 * A registry returned tags but none matched the pattern or all were prereleases.
 * Distinct from a transport failure: the source answered, it just had nothing eligible.
 */
export class NoStableTagsFoundError extends DepsyncError {
  readonly pattern: string;
  readonly candidates: number;

  constructor(pattern: RegExp, candidates: number) {
    super(`No stable tags found matching ${pattern}`, ErrorCode.NO_STABLE_TAGS, {
      context: { pattern: String(pattern), candidates },
    });
    this.name = "NoStableTagsFoundError";
    this.pattern = String(pattern);
    this.candidates = candidates;
  }
}

/**
 * The artifact download used for checksum verification failed.
 * The dependency stays "updated" but its new pin is held back from write-back.
 */
export class ChecksumDownloadError extends DepsyncError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to download ${url} for checksum: ${reason}`, ErrorCode.CHECKSUM_DOWNLOAD_FAILED, {
      cause,
      context: { url },
    });
    this.name = "ChecksumDownloadError";
    this.url = url;
  }
}

/**
 * The versions file does not exist. Fatal for the whole run.
 */
export class VersionsFileNotFoundError extends DepsyncError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Versions file not found: ${path}`, ErrorCode.VERSIONS_FILE_NOT_FOUND, {
      cause,
      context: { path },
      isRetryable: false,
    });
    this.name = "VersionsFileNotFoundError";
    this.path = path;
  }
}

/**
 * A dependency's version key has no entry in the versions file.
 */
export class PinNotFoundError extends DepsyncError {
  constructor(dependency: string, versionKey: string) {
    super(`${dependency} has no ${versionKey} entry in the versions file`, ErrorCode.PIN_NOT_FOUND, {
      context: { dependency, versionKey },
    });
    this.name = "PinNotFoundError";
  }
}

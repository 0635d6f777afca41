// ============================================
// depsync Dependency Descriptor Types
// ============================================

export interface License {
  name: string;
  url: string;
}

/**
 * Where the latest upstream release of a dependency is discovered.
 */
export type FetchSource =
  | { type: "static"; version: string }
  | { type: "github"; repo: string; tagPattern: RegExp }
  | { type: "gitlab"; host: string; project: string; tagPattern: RegExp }
  | { type: "bitbucket"; repo: string; tagPattern: RegExp };

export type FetchSourceType = FetchSource["type"];

interface DependencyBase {
  /** Display identifier */
  readonly name: string;
  readonly homepage: string;
  readonly releasesUrl: string;
  readonly license: License;
  /** Versions file key holding the pinned version */
  readonly versionKey: string;
  /** Versions file key holding the source archive URL */
  readonly urlKey?: string;
  /** Versions file key holding the git clone URL (informational, never rewritten) */
  readonly gitUrlKey?: string;
  readonly fetchSource: FetchSource;
  /**
   * Maps the raw upstream tag to the form stored in the versions file.
   * Identity when omitted.
   */
  readonly normalize?: (rawTag: string) => string;
}

interface ChecksummedDependency extends DependencyBase {
  /** Versions file key holding the archive SHA-256 */
  readonly sha256Key: string;
  readonly downloadUrl: (version: string) => string;
}

interface UnchecksummedDependency extends DependencyBase {
  readonly sha256Key?: undefined;
  readonly downloadUrl?: (version: string) => string;
}

/**
 * Immutable description of one tracked dependency.
 * A checksum key can only be declared together with a download URL.
 */
export type DependencyDescriptor = ChecksummedDependency | UnchecksummedDependency;

/**
 * Update Orchestrator
 *
 * Checks every dependency concurrently, isolates per-dependency failures in
 * their results, and writes the versions file once after all checks settle.
 *
 * @module core/update/orchestrator
 */

import { computeChecksum } from "../checksum/index.js";
import {
  DEPENDENCIES,
  type DependencyDescriptor,
  validateRegistry,
} from "../dependencies/index.js";
import { AbortError, DepsyncError, describeError, PinNotFoundError } from "../errors/index.js";
import { fetchLatestTag, RegistryHttpClient } from "../registry/index.js";
import { compareVersions, isNumericVersion } from "../version/index.js";
import {
  parseVersionsFile,
  updateVersionsFile,
  type VersionsMap,
  type VersionUpdates,
} from "../versions-file/index.js";
import { writeGitHubOutput } from "./report.js";
import type {
  CheckOptions,
  PartitionedResults,
  RunSummary,
  RunUpdateOptions,
  UpdateResult,
} from "./types.js";

/**
 * Decide whether `latest` supersedes `current`.
 *
 * Version numbers are compared numerically so an older or equivalent
 * upstream tag never downgrades a pin. Moving targets such as branch names
 * count as updated whenever they differ.
 */
export function isNewerPin(current: string, latest: string): boolean {
  if (current === latest) {
    return false;
  }
  if (isNumericVersion(current) && isNumericVersion(latest)) {
    return compareVersions(latest, current) > 0;
  }
  return true;
}

async function checkDependency(
  dependency: DependencyDescriptor,
  currentVersions: VersionsMap,
  options: CheckOptions
): Promise<UpdateResult> {
  const { context, logger } = options;
  const current = currentVersions.get(dependency.versionKey);

  try {
    if (current === undefined) {
      throw new PinNotFoundError(dependency.name, dependency.versionKey);
    }
    logger?.info(`Checking ${dependency.name} (current: ${current})`);

    const rawTag = await fetchLatestTag(dependency.fetchSource, context);
    const latest = dependency.normalize ? dependency.normalize(rawTag) : rawTag;

    if (!isNewerPin(current, latest)) {
      logger?.info(`${dependency.name}: Up to date`);
      return { name: dependency.name, currentVersion: current, latestVersion: latest, updated: false };
    }

    logger?.info(`${dependency.name}: Update available: ${current} → ${latest}`);

    if (dependency.sha256Key === undefined) {
      return { name: dependency.name, currentVersion: current, latestVersion: latest, updated: true };
    }

    const url = dependency.downloadUrl(latest);
    logger?.debug(`${dependency.name}: Downloading ${url} to verify checksum`);
    try {
      const sha256 = await computeChecksum(url, context.client);
      return {
        name: dependency.name,
        currentVersion: current,
        latestVersion: latest,
        updated: true,
        sha256,
      };
    } catch (error) {
      const checksumError = describeError(error);
      logger?.error(`${dependency.name}: Checksum failed: ${checksumError}`);
      return {
        name: dependency.name,
        currentVersion: current,
        latestVersion: latest,
        updated: true,
        checksumError,
      };
    }
  } catch (error) {
    const message = describeError(error);
    logger?.error(`${dependency.name}: Error: ${message}`);
    return {
      name: dependency.name,
      currentVersion: current ?? "unknown",
      latestVersion: "error",
      updated: false,
      error: message,
      errorCode: error instanceof DepsyncError ? error.code : undefined,
    };
  }
}

/**
 * Check all dependencies concurrently. Results keep the order of
 * `dependencies`; a failing dependency yields an error result instead of
 * rejecting.
 */
export async function checkForUpdates(
  dependencies: readonly DependencyDescriptor[],
  currentVersions: VersionsMap,
  options: CheckOptions
): Promise<UpdateResult[]> {
  return Promise.all(
    dependencies.map((dependency) => checkDependency(dependency, currentVersions, options))
  );
}

export function partitionResults(results: readonly UpdateResult[]): PartitionedResults {
  return {
    updated: results.filter((r) => r.updated),
    heldBack: results.filter((r) => r.updated && r.checksumError !== undefined),
    errors: results.filter((r) => r.error !== undefined),
    unchanged: results.filter((r) => !r.updated && r.error === undefined),
  };
}

/**
 * Build the key/value pairs to persist. Updates whose checksum could not be
 * computed are left out entirely so a pin never moves without its digest.
 */
export function buildUpdatesMap(
  results: readonly UpdateResult[],
  dependencies: readonly DependencyDescriptor[]
): Record<string, string> {
  const updates: Record<string, string> = {};

  for (const result of results) {
    if (!result.updated || result.checksumError !== undefined) continue;

    const dependency = dependencies.find((d) => d.name === result.name);
    if (!dependency) continue;

    updates[dependency.versionKey] = result.latestVersion;
    if (dependency.sha256Key !== undefined && result.sha256 !== undefined) {
      updates[dependency.sha256Key] = result.sha256;
    }
    if (dependency.urlKey !== undefined && dependency.downloadUrl) {
      updates[dependency.urlKey] = dependency.downloadUrl(result.latestVersion);
    }
  }

  return updates;
}

export interface ExitCodeInput {
  /** Failed dependencies, held-back checksum failures included */
  errors: number;
  /** Dependencies whose new pin was written */
  written: number;
  writeMode: boolean;
}

/**
 * A run that wrote at least one update succeeds even if unrelated
 * dependencies failed; otherwise any error fails it.
 */
export function resolveExitCode({ errors, written, writeMode }: ExitCodeInput): 0 | 1 {
  if (errors > 0 && !(writeMode && written > 0)) {
    return 1;
  }
  return 0;
}

function countWritable(partitioned: PartitionedResults): number {
  return partitioned.updated.length - partitioned.heldBack.length;
}

/**
 * Run a full check: read the versions file, check every dependency, write
 * the file once in write mode, and append the CI summary when configured.
 *
 * @throws VersionsFileNotFoundError if the versions file does not exist
 * @throws AbortError if `signal` fired before the results were written
 */
export async function runUpdate(options: RunUpdateOptions): Promise<RunSummary> {
  const { config, writeMode, logger } = options;
  const dependencies = options.dependencies ?? DEPENDENCIES;
  const versionsFile = options.versionsFile ?? config.versionsFile;
  validateRegistry(dependencies);

  const document = await parseVersionsFile(versionsFile);
  const client = new RegistryHttpClient({
    userAgent: config.userAgent,
    http: config.http,
    fetch: options.fetch,
    logger,
    signal: options.signal,
  });

  logger?.info(`Checking ${dependencies.length} dependencies for updates`);
  const results = await checkForUpdates(dependencies, document.values, {
    context: { client, registry: config.registry, githubToken: config.githubToken, logger },
    logger,
  });

  if (options.signal?.aborted) {
    throw new AbortError("Update interrupted; versions file left unchanged");
  }

  const partitioned = partitionResults(results);
  const updates: VersionUpdates = buildUpdatesMap(results, dependencies);
  const writable = countWritable(partitioned);

  let written = 0;
  if (writeMode && writable > 0) {
    await updateVersionsFile(versionsFile, updates, { now: options.now });
    written = writable;
    logger?.debug(`Wrote ${Object.keys(updates).length} keys to ${versionsFile}`);
  }

  if (config.githubOutput) {
    try {
      await writeGitHubOutput(config.githubOutput, results);
    } catch (error) {
      logger?.error(`Failed to write GitHub output: ${describeError(error)}`);
    }
  }

  return {
    ...partitioned,
    versionsFile,
    writeMode,
    results,
    updates,
    written,
    exitCode: resolveExitCode({
      errors: partitioned.errors.length + partitioned.heldBack.length,
      written,
      writeMode,
    }),
  };
}


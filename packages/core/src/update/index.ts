/**
 * Update Module
 *
 * Dependency update checks, write-back and CI reporting.
 *
 * @module core/update
 */

export {
  buildUpdatesMap,
  checkForUpdates,
  type ExitCodeInput,
  isNewerPin,
  partitionResults,
  resolveExitCode,
  runUpdate,
} from "./orchestrator.js";
export { formatGitHubOutput, writeGitHubOutput } from "./report.js";
export type {
  CheckOptions,
  PartitionedResults,
  RunSummary,
  RunUpdateOptions,
  UpdateResult,
} from "./types.js";

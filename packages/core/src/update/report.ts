import { appendFile } from "node:fs/promises";

import type { UpdateResult } from "./types.js";

/**
 * Format the step output block consumed by CI workflows.
 *
 * @example
 * ```text
 * updates_available=true
 * update_summary<<EOF
 * - **Opus**: 1.5.1 → 1.5.2
 * EOF
 * ```
 */
export function formatGitHubOutput(results: readonly UpdateResult[]): string {
  const updates = results.filter((r) => r.updated);
  const summary =
    updates.length > 0
      ? updates.map((u) => `- **${u.name}**: ${u.currentVersion} → ${u.latestVersion}`)
      : ["No updates available"];

  return [`updates_available=${updates.length > 0}`, "update_summary<<EOF", ...summary, "EOF", ""].join(
    "\n"
  );
}

/**
 * Append the step output block to the file named by `GITHUB_OUTPUT`.
 */
export async function writeGitHubOutput(
  filePath: string,
  results: readonly UpdateResult[]
): Promise<void> {
  await appendFile(filePath, formatGitHubOutput(results), "utf-8");
}

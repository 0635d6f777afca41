/**
 * Console Report
 *
 * Human-readable rendering of a run summary and of the dependency registry.
 *
 * @module cli/commands/report
 */

import type { DependencyDescriptor, FetchSource, RunSummary } from "@depsync/core";
import { getIcons } from "@depsync/shared";
import chalk from "chalk";
import { table } from "table";

/**
 * Render the end-of-run summary as lines.
 */
export function formatSummary(summary: RunSummary): string[] {
  const icons = getIcons();
  const lines: string[] = ["", chalk.bold("Summary"), ""];

  if (summary.updated.length > 0) {
    lines.push(chalk.yellow(`${icons.update} ${summary.updated.length} update(s) available:`));
    for (const update of summary.updated) {
      lines.push(`  ${icons.bullet} ${update.name}: ${update.currentVersion} ${icons.arrow} ${update.latestVersion}`);
    }
  } else {
    lines.push(chalk.green(`${icons.success} All dependencies up to date`));
  }

  if (summary.errors.length > 0) {
    lines.push("", chalk.red(`${icons.error} ${summary.errors.length} error(s) occurred:`));
    for (const failure of summary.errors) {
      lines.push(`  ${icons.bullet} ${failure.name}: ${failure.error ?? "unknown error"}`);
    }
  }

  if (summary.heldBack.length > 0) {
    lines.push(
      "",
      chalk.red(`${icons.error} ${summary.heldBack.length} update(s) held back, checksum failed:`)
    );
    for (const held of summary.heldBack) {
      lines.push(`  ${icons.bullet} ${held.name}: ${held.checksumError ?? "unknown error"}`);
    }
  }

  const writable = summary.updated.length - summary.heldBack.length;
  lines.push("");
  if (summary.writeMode && summary.written > 0) {
    lines.push(chalk.green(`${icons.success} Updated ${summary.versionsFile}`));
  } else if (summary.writeMode) {
    lines.push(chalk.green(`${icons.success} No updates to write`));
  } else if (writable > 0) {
    lines.push(chalk.cyan(`${icons.info} Run with --write to update ${summary.versionsFile}`));
  }

  return lines;
}

export function describeSource(source: FetchSource): string {
  switch (source.type) {
    case "static":
      return `static (${source.version})`;
    case "github":
      return `github:${source.repo}`;
    case "gitlab":
      return `gitlab:${source.host}/${source.project}`;
    case "bitbucket":
      return `bitbucket:${source.repo}`;
  }
}

/**
 * Render the dependency registry as a table.
 */
export function formatDependencyTable(dependencies: readonly DependencyDescriptor[]): string {
  const data = [
    ["Name", "Source", "Version key", "Checksum", "License", "Homepage", "Releases"].map((h) =>
      chalk.bold(h)
    ),
    ...dependencies.map((dependency) => [
      dependency.name,
      describeSource(dependency.fetchSource),
      dependency.versionKey,
      dependency.sha256Key ?? "-",
      dependency.license.name,
      dependency.homepage,
      dependency.releasesUrl,
    ]),
  ];
  return table(data).trimEnd();
}

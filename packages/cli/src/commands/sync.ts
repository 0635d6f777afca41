/**
 * Sync Command
 *
 * Checks every tracked dependency for a newer upstream release and, with
 * `--write`, persists the new pins to the versions file.
 *
 * @module cli/commands/sync
 */

import { resolve } from "node:path";
import {
  DEPENDENCIES,
  type DependencyDescriptor,
  type DepsyncConfigInput,
  describeError,
  type FetchLike,
  getDependency,
  type LogLevel,
  createLogger,
  loadConfig,
  runUpdate,
} from "@depsync/core";
import { getIcons } from "@depsync/shared";
import chalk from "chalk";

import { EXIT_CODES, type ExitCode, exitCodeForError } from "./exit-codes.js";
import { formatDependencyTable, formatSummary } from "./report.js";

export interface SyncCommandOptions {
  write?: boolean;
  file?: string;
  only?: string[];
  json?: boolean;
  logLevel?: LogLevel;
  list?: boolean;
}

/**
 * Process boundary of the command. Tests replace every member.
 */
export interface CommandIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Log sink; defaults to stderr in JSON mode and the console otherwise */
  log?: (line: string) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  now?: Date;
  signal?: AbortSignal;
}

type Selection = { ok: true; dependencies: readonly DependencyDescriptor[] } | { ok: false; unknown: string[] };

function selectDependencies(only: readonly string[] | undefined): Selection {
  if (!only || only.length === 0) {
    return { ok: true, dependencies: DEPENDENCIES };
  }

  const unknown = only.filter((name) => getDependency(name) === undefined);
  if (unknown.length > 0) {
    return { ok: false, unknown };
  }

  const wanted = new Set(only.map((name) => name.toLowerCase()));
  return { ok: true, dependencies: DEPENDENCIES.filter((d) => wanted.has(d.name.toLowerCase())) };
}

export async function runSyncCommand(options: SyncCommandOptions, io: CommandIO): Promise<ExitCode> {
  const icons = getIcons();

  if (options.list) {
    io.stdout(formatDependencyTable(DEPENDENCIES));
    return EXIT_CODES.SUCCESS;
  }

  const selection = selectDependencies(options.only);
  if (!selection.ok) {
    io.stderr(chalk.red(`${icons.error} Unknown dependency: ${selection.unknown.join(", ")}`));
    io.stderr("Run with --list to see tracked dependencies");
    return EXIT_CODES.USAGE_ERROR;
  }

  const cwd = io.cwd ?? process.cwd();
  const overrides: DepsyncConfigInput = {};
  if (options.file !== undefined) overrides.versionsFile = options.file;
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;

  const configResult = loadConfig({ cwd, env: io.env, overrides });
  if (!configResult.ok) {
    io.stderr(chalk.red(`${icons.error} ${configResult.error.message}`));
    return EXIT_CODES.ERROR;
  }
  const config = configResult.value;

  const logger = createLogger({
    name: "depsync",
    level: config.logLevel,
    json: config.logFormat === "json",
    output: io.log ?? (options.json ? io.stderr : undefined),
  });

  try {
    const summary = await runUpdate({
      config,
      versionsFile: resolve(cwd, config.versionsFile),
      writeMode: options.write === true,
      dependencies: selection.dependencies,
      fetch: io.fetch,
      logger,
      now: io.now,
      signal: io.signal,
    });

    if (options.json) {
      io.stdout(JSON.stringify(summary.results, null, 2));
    } else {
      for (const line of formatSummary(summary)) {
        io.stdout(line);
      }
    }
    return summary.exitCode;
  } catch (error) {
    io.stderr(chalk.red(`${icons.error} Fatal error: ${describeError(error)}`));
    return exitCodeForError(error);
  } finally {
    await logger.flush();
  }
}

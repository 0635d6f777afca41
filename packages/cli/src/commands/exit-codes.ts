/**
 * Exit Codes
 *
 * Standardized process exit codes following Unix conventions:
 * - 0: Success
 * - 1: General error (failed checks, fatal file or config errors)
 * - 2: Usage/argument error
 * - 130: Interrupted (128 + SIGINT)
 *
 * @module cli/commands/exit-codes
 */

import { AbortError } from "@depsync/core";
import { CommanderError } from "commander";

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error that escaped a command to an exit code.
 *
 * Commander reports `--help` and `--version` as errors with exit code 0;
 * every other parse failure is a usage error.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof AbortError) {
    return EXIT_CODES.INTERRUPTED;
  }
  return EXIT_CODES.ERROR;
}

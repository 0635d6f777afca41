#!/usr/bin/env node
import { closeDefaultPool } from "@depsync/shared";

import { EXIT_CODES, exitCodeForError } from "./commands/exit-codes.js";
import { createProgram } from "./program.js";

const controller = new AbortController();

process.once("SIGINT", () => {
  console.error("\nInterrupted, cancelling pending requests...");
  controller.abort();
});

const program = createProgram(
  {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    signal: controller.signal,
  },
  (code) => {
    process.exitCode = code;
  }
);

try {
  await program.parseAsync();
} catch (error) {
  process.exitCode = exitCodeForError(error);
} finally {
  await closeDefaultPool();
}

if (controller.signal.aborted) {
  process.exitCode = EXIT_CODES.INTERRUPTED;
}

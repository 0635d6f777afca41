import { LOG_LEVELS } from "@depsync/core";
import { Command, Option } from "commander";

import type { ExitCode } from "./commands/exit-codes.js";
import { type CommandIO, runSyncCommand, type SyncCommandOptions } from "./commands/sync.js";
import { version } from "./version.js";

/**
 * Build the `depsync` program. Parse errors throw a CommanderError instead
 * of exiting, so the caller decides the exit code.
 */
export function createProgram(io: CommandIO, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name("depsync")
    .description("Check tracked dependencies for new upstream releases and update their pins")
    .version(version)
    .option("--write", "Write updates to the versions file (default: dry run)")
    .option("-f, --file <path>", "Versions file to check")
    .option("--only <names...>", "Check only the named dependencies")
    .option("--json", "Print results as JSON")
    .addOption(new Option("--log-level <level>", "Minimum log level").choices(LOG_LEVELS))
    .option("--list", "List tracked dependencies and exit")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout(str.trimEnd()),
      writeErr: (str) => io.stderr(str.trimEnd()),
    })
    .action(async () => {
      onExit(await runSyncCommand(program.opts<SyncCommandOptions>(), io));
    });

  return program;
}

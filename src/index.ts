import { CommanderError, type Command } from "commander";

import { EXIT_USAGE, renderCliError, resolveExitCode } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
  for (const command of program.commands) command.exitOverride();
}

const CLEAN_EXIT_CODES = new Set([
  "commander.helpDisplayed",
  "commander.help",
  "commander.version",
]);

function isHelpOrVersionExit(error: unknown): boolean {
  return error instanceof CommanderError && CLEAN_EXIT_CODES.has(error.code);
}

// Only flags before a bare `--` count.
function hasDebugFlag(argv: readonly string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = 0;
      return;
    }

    // Commander has already printed its own usage message.
    if (error instanceof CommanderError) {
      process.exitCode = EXIT_USAGE;
      return;
    }

    console.error(renderCliError(error, { debug: hasDebugFlag(argv) }));
    process.exitCode = resolveExitCode(error);
  }
}

/*
Purpose: render errors for the terminal and map them to process exit codes.
Assumptions: stderr is the default stream; colour only on a TTY.
Usage: console.error(renderCliError(err, { debug })); process.exitCode = resolveExitCode(err);
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import { ConfigError, EnvironmentError, UserFacingError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export const EXIT_OK = 0;
export const EXIT_REPOSITORY_FAILED = 1;
export const EXIT_USAGE = 2;

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// Usage, config and environment problems are 2; anything unexpected is 1.
export function resolveExitCode(error: unknown): number {
  if (error instanceof UserFacingError) return error.exitCode;
  if (error instanceof ConfigError || error instanceof EnvironmentError) return EXIT_USAGE;
  return EXIT_REPOSITORY_FAILED;
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "detail":
      return `  - ${line.text}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return format(`${line.kind[0].toUpperCase()}${line.kind.slice(1)}: ${line.text}`, ["dim"]);
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
    default:
      return line.text;
  }
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

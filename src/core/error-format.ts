/*
Purpose: turn unknown errors into ordered display lines for the CLI and logs.
Assumptions: UserFacingError carries title/hint; everything else falls back to name + message.
Usage: formatErrorLines(err, { mode: "short" }).map(...)
*/

import { EnvironmentError, MigrationError, UserFacingError } from "./errors.js";
import { sanitize } from "./sanitize.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "detail"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "green" | "dim" | "bold";
export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return sanitize(error.message);
  return sanitize(String(error));
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: sanitize(error.message) });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
      const cause = describeCause(error.cause);
      if (cause) lines.push({ kind: "cause", text: cause });
    }
  } else if (error instanceof Error) {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
    for (const detail of errorDetails(error)) {
      lines.push({ kind: "detail", text: sanitize(detail) });
    }
    if (options.mode === "debug") {
      lines.push({ kind: "name", text: error.name });
      if (error instanceof MigrationError) {
        const cause = describeCause(error.cause);
        if (cause) lines.push({ kind: "cause", text: cause });
      }
    }
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
  }

  if (options.mode === "debug" && error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: sanitize(error.stack) });
  }

  return lines;
}

function errorDetails(error: Error): readonly string[] {
  if (error instanceof EnvironmentError) return error.problems;
  return [];
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return `${cause.name}: ${sanitize(cause.message)}`;
  if (typeof cause === "string") return sanitize(cause);
  return undefined;
}

// =============================================================================
// ANSI
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  green: [32, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor !== undefined) return options.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return options.stream?.isTTY === true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

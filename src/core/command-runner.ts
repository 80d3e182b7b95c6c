/**
 * Subprocess execution for every external collaborator (git, gh, aws, bash).
 * Purpose: one place that enforces argv-only spawning, timeouts, dry-run and output sanitization.
 * Assumptions: POSIX process groups; a child started `detached` leads its own group.
 * Usage: const res = await runner.run(["git", "status"], { cwd, timeoutSeconds: 300 });
 */

import { execa } from "execa";

import { CommandFailedError, CommandTimeoutError, type FailedCommand } from "./errors.js";
import type { EventLog } from "./logger.js";
import { NOOP_EVENT_LOG } from "./logger.js";
import { sanitize, sanitizeArgv } from "./sanitize.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  cwd?: string;
  timeoutSeconds: number;
  dryRun?: boolean;
  env?: Record<string, string>;
  log?: EventLog;
};

export type CommandResult = {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  dryRun: boolean;
  durationMs: number;
};

export interface CommandRunner {
  run(argv: readonly string[], options: RunOptions): Promise<CommandResult>;
}

export const EXIT_COMMAND_NOT_FOUND = 127;
export const EXIT_TIMED_OUT = -1;

// =============================================================================
// EXECA RUNNER
// =============================================================================

export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly log: EventLog = NOOP_EVENT_LOG) {}

  async run(argv: readonly string[], options: RunOptions): Promise<CommandResult> {
    const [file, ...args] = argv;
    if (!file) {
      throw new Error("Command runner received an empty argv");
    }

    const command = sanitizeArgv(argv);
    const log = options.log ?? this.log;

    if (options.dryRun) {
      log.log({ type: "command.dry_run", level: "debug", payload: { command } });
      return dryRunResult(command);
    }

    log.log({
      type: "command.start",
      level: "debug",
      payload: { command, cwd: options.cwd ?? null, timeout_seconds: options.timeoutSeconds },
    });

    const startedAt = Date.now();
    const child = execa(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdin: "ignore",
      reject: false,
      detached: true,
    });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      killProcessGroup(child.pid, () => child.kill("SIGKILL"));
    }, options.timeoutSeconds * 1000);

    const res = await child.finally(() => clearTimeout(timer));
    const durationMs = Date.now() - startedAt;

    const stdout = sanitize(toText(res.stdout));
    let stderr = sanitize(toText(res.stderr));
    let exitCode: number;

    if (timedOut) {
      exitCode = EXIT_TIMED_OUT;
      stderr = appendLine(stderr, `timed out after ${options.timeoutSeconds}s`);
    } else if (typeof res.exitCode === "number") {
      exitCode = res.exitCode;
    } else if (res.signal) {
      exitCode = EXIT_TIMED_OUT;
      stderr = appendLine(stderr, `terminated by ${res.signal}`);
    } else {
      // The process never started: treat it like a shell would treat an unknown command.
      exitCode = EXIT_COMMAND_NOT_FOUND;
      stderr = appendLine(stderr, sanitize(`${file}: command not found`));
    }

    const result: CommandResult = {
      command,
      exitCode,
      stdout,
      stderr,
      timedOut,
      dryRun: false,
      durationMs,
    };

    log.log({
      type: "command.complete",
      level: exitCode === 0 ? "debug" : "warn",
      payload: {
        command,
        exit_code: exitCode,
        timed_out: timedOut,
        duration_ms: durationMs,
        ...(exitCode === 0 ? {} : { stderr: tail(stderr) }),
      },
    });

    return result;
  }
}

// =============================================================================
// SCOPES
// =============================================================================

// Everything an adapter needs to run commands on behalf of one repository.
export type CommandScope = {
  runner: CommandRunner;
  cwd?: string;
  timeoutSeconds: number;
  dryRun: boolean;
  log?: EventLog;
  env?: Record<string, string>;
};

export async function runInScope(
  scope: CommandScope,
  argv: readonly string[],
  overrides: Partial<Omit<CommandScope, "runner">> = {},
): Promise<CommandResult> {
  const merged = { ...scope, ...overrides };
  return scope.runner.run(argv, {
    cwd: merged.cwd,
    timeoutSeconds: merged.timeoutSeconds,
    dryRun: merged.dryRun,
    env: merged.env,
    log: merged.log,
  });
}

type FailureFactory = (message: string, result: FailedCommand) => Error;

// Throws CommandTimeoutError on timeout, otherwise the factory's error on a non-zero exit.
export function requireSuccess(
  result: CommandResult,
  timeoutSeconds: number,
  failure: FailureFactory = (message, failed) => new CommandFailedError(message, failed),
): CommandResult {
  if (result.timedOut) {
    throw new CommandTimeoutError(result.command, timeoutSeconds);
  }
  if (result.exitCode !== 0) {
    throw failure(describeCommandFailure(result), result);
  }
  return result;
}

// =============================================================================
// RESULT HELPERS
// =============================================================================

export function commandSucceeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut;
}

export function describeCommandFailure(result: CommandResult): string {
  if (result.timedOut) {
    return `${result.command} timed out`;
  }
  const detail = tail(result.stderr) || tail(result.stdout);
  const suffix = detail ? `: ${detail}` : "";
  return `${result.command} exited with ${result.exitCode}${suffix}`;
}

export function dryRunResult(command: string): CommandResult {
  return {
    command,
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    dryRun: true,
    durationMs: 0,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function killProcessGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined) {
    fallback();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    // ESRCH: the group is already gone. Anything else: fall back to the direct child.
    if (!(err instanceof Error && "code" in err && err.code === "ESRCH")) {
      fallback();
    }
  }
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

function appendLine(text: string, line: string): string {
  return text.length > 0 ? `${text}\n${line}` : line;
}

function tail(text: string, maxLines = 5): string {
  return text.trim().split(/\r?\n/).slice(-maxLines).join("\n").trim();
}

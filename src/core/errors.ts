export class MigrationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MigrationError";
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type FailedCommand = {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export class CommandFailedError extends MigrationError {
  constructor(
    message: string,
    public readonly result: FailedCommand,
  ) {
    super(message);
    this.name = "CommandFailedError";
  }
}

export class GitError extends CommandFailedError {
  constructor(message: string, result: FailedCommand) {
    super(message, result);
    this.name = "GitError";
  }
}

export class CommandTimeoutError extends MigrationError {
  constructor(
    public readonly command: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Command timed out after ${timeoutSeconds}s: ${command}`);
    this.name = "CommandTimeoutError";
  }
}

export class EnvironmentError extends MigrationError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(message);
    this.name = "EnvironmentError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  validation: "VALIDATION_ERROR",
  environment: "ENVIRONMENT_ERROR",
  io: "IO_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends MigrationError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.exitCode = input.exitCode ?? 2;
  }
}

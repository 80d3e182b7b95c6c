import { describe, expect, it } from "vitest";

import {
  ConfigError,
  EnvironmentError,
  GitError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { renderCliError, resolveExitCode } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Migration config invalid.",
    message: "Migration config at statelift.yaml is invalid.",
    hint: "Fix the config file and rerun.",
    next: "statelift preflight",
    cause: new ConfigError("bucket: Required"),
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without debug details", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Migration config invalid.",
        "Migration config at statelift.yaml is invalid.",
        "Hint: Fix the config file and rerun.",
        "Next: statelift preflight",
      ].join("\n"),
    );
  });

  it("adds code, cause and stack in debug mode", () => {
    const error = buildUserFacingError();
    error.stack = "UserFacingError: invalid\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Migration config invalid.",
        "Migration config at statelift.yaml is invalid.",
        "Hint: Fix the config file and rerun.",
        "Next: statelift preflight",
        "Code: CONFIG_ERROR",
        "Cause: ConfigError: bucket: Required",
        "Stack:",
        "  UserFacingError: invalid",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("lists environment problems as details", () => {
    const error = new EnvironmentError("Environment pre-flight failed with 2 problem(s)", [
      "gh is not installed or not on PATH",
      "copy_state.sh not found in /opt/scripts",
    ]);

    expect(renderCliError(error, { stream: nonTtyStream })).toBe(
      [
        "Error: Environment pre-flight failed with 2 problem(s)",
        "  - gh is not installed or not on PATH",
        "  - copy_state.sh not found in /opt/scripts",
      ].join("\n"),
    );
  });

  it("redacts secrets in messages", () => {
    expect(renderCliError(new Error("token=placeholder-value"), { stream: nonTtyStream })).toBe(
      "Error: token=[REDACTED]",
    );
  });

  it("colours output when asked to", () => {
    const output = renderCliError(new Error("boom"), { useColor: true });

    expect(output).toBe("\u001b[1m\u001b[31mError:\u001b[39m\u001b[22m \u001b[1mboom\u001b[22m");
  });
});

describe("resolveExitCode", () => {
  it("maps usage problems to 2 and everything else to 1", () => {
    expect(resolveExitCode(buildUserFacingError())).toBe(2);
    expect(resolveExitCode(new ConfigError("bad"))).toBe(2);
    expect(resolveExitCode(new EnvironmentError("missing"))).toBe(2);
    const failed = { command: "git push", exitCode: 1, stdout: "", stderr: "" };
    expect(resolveExitCode(new GitError("git push failed", failed))).toBe(1);
    expect(resolveExitCode("weird")).toBe(1);
  });

  it("keeps an explicit exit code", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.io,
      title: "Write failed.",
      message: "disk full",
      exitCode: 1,
    });
    expect(resolveExitCode(error)).toBe(1);
  });
});

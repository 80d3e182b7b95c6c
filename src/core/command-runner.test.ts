import path from "node:path";

import fse from "fs-extra";
import { describe, expect, it } from "vitest";

import { MemoryLog, makeTempDir } from "../__tests__/helpers/fakes.js";

import {
  EXIT_COMMAND_NOT_FOUND,
  EXIT_TIMED_OUT,
  ExecaCommandRunner,
  describeCommandFailure,
  requireSuccess,
  type CommandResult,
} from "./command-runner.js";
import { CommandFailedError, CommandTimeoutError } from "./errors.js";

const NODE = process.execPath;

function result(overrides: Partial<CommandResult>): CommandResult {
  return {
    command: "git push",
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    dryRun: false,
    durationMs: 0,
    ...overrides,
  };
}

describe("ExecaCommandRunner", () => {
  it("captures output and exit code", async () => {
    const log = new MemoryLog();
    const runner = new ExecaCommandRunner(log);

    const res = await runner.run(
      [NODE, "-e", "process.stdout.write('hi'); process.stderr.write('warn'); process.exit(3)"],
      { timeoutSeconds: 30 },
    );

    expect(res.exitCode).toBe(3);
    expect(res.stdout).toBe("hi");
    expect(res.stderr).toBe("warn");
    expect(res.timedOut).toBe(false);
    expect(log.types()).toEqual(["command.start", "command.complete"]);
    expect(log.events[1]?.level).toBe("warn");
  });

  it("passes extra environment variables to the child", async () => {
    const runner = new ExecaCommandRunner();

    const res = await runner.run([NODE, "-e", "process.stdout.write(process.env.STATELIFT_X)"], {
      timeoutSeconds: 30,
      env: { STATELIFT_X: "value" },
    });

    expect(res.stdout).toBe("value");
  });

  it("does not spawn anything in a dry run", async () => {
    const log = new MemoryLog();
    const runner = new ExecaCommandRunner(log);

    const res = await runner.run(["rm", "-rf", "/definitely/not/here"], {
      timeoutSeconds: 30,
      dryRun: true,
    });

    expect(res).toEqual({
      command: "rm -rf /definitely/not/here",
      exitCode: 0,
      stdout: "",
      stderr: "",
      timedOut: false,
      dryRun: true,
      durationMs: 0,
    });
    expect(log.types()).toEqual(["command.dry_run"]);
  });

  it("kills commands that outlive their timeout", async () => {
    const runner = new ExecaCommandRunner();

    const res = await runner.run([NODE, "-e", "setTimeout(() => {}, 10000)"], {
      timeoutSeconds: 0.2,
    });

    expect(res.timedOut).toBe(true);
    expect(res.exitCode).toBe(EXIT_TIMED_OUT);
    expect(res.stderr).toBe("timed out after 0.2s");
  });

  it("takes the whole process group down on timeout", async () => {
    const dir = makeTempDir();
    const spawned = path.join(dir, "spawned");
    const marker = path.join(dir, "marker");
    const grandchild =
      "setTimeout(() => " +
      "require('node:fs').writeFileSync(process.env.STATELIFT_MARKER, 'alive'), 1500)";
    const parent = [
      "const { spawn } = require('node:child_process');",
      `spawn(process.execPath, ['-e', ${JSON.stringify(grandchild)}], { stdio: 'ignore' });`,
      "require('node:fs').writeFileSync(process.env.STATELIFT_SPAWNED, 'yes');",
      "setTimeout(() => {}, 10000);",
    ].join("\n");

    const res = await new ExecaCommandRunner().run([NODE, "-e", parent], {
      timeoutSeconds: 0.5,
      env: { STATELIFT_MARKER: marker, STATELIFT_SPAWNED: spawned },
    });
    await new Promise((resolve) => setTimeout(resolve, 2000));

    expect(res.timedOut).toBe(true);
    expect(res.exitCode).toBe(EXIT_TIMED_OUT);
    expect(await fse.pathExists(spawned)).toBe(true);
    expect(await fse.pathExists(marker)).toBe(false);
  }, 10_000);

  it("reports a missing binary like a shell would", async () => {
    const runner = new ExecaCommandRunner();

    const res = await runner.run(["statelift-missing-binary"], { timeoutSeconds: 30 });

    expect(res.exitCode).toBe(EXIT_COMMAND_NOT_FOUND);
    expect(res.stderr).toContain("statelift-missing-binary: command not found");
  });

  it("rejects an empty argv", async () => {
    await expect(new ExecaCommandRunner().run([], { timeoutSeconds: 1 })).rejects.toThrow(
      "Command runner received an empty argv",
    );
  });
});

describe("requireSuccess", () => {
  it("returns successful results unchanged", () => {
    const ok = result({});
    expect(requireSuccess(ok, 30)).toBe(ok);
  });

  it("describes a failure with the tail of stderr", () => {
    const failed = result({ exitCode: 1, stderr: "one\ntwo\nthree\nfour\nfive\nsix\n" });

    expect(() => requireSuccess(failed, 30)).toThrow(CommandFailedError);
    expect(describeCommandFailure(failed)).toBe(
      "git push exited with 1: two\nthree\nfour\nfive\nsix",
    );
  });

  it("falls back to stdout when stderr is empty", () => {
    expect(describeCommandFailure(result({ exitCode: 2, stdout: "rejected\n" }))).toBe(
      "git push exited with 2: rejected",
    );
  });

  it("raises a timeout error for timed out results", () => {
    const timedOut = result({ exitCode: EXIT_TIMED_OUT, timedOut: true });

    expect(() => requireSuccess(timedOut, 5)).toThrow(CommandTimeoutError);
    expect(() => requireSuccess(timedOut, 5)).toThrow("Command timed out after 5s: git push");
  });
});

import path from "node:path";

import fse from "fs-extra";
import { describe, expect, it } from "vitest";

import { FakeRunner, makeConfig, makeTempDir } from "../__tests__/helpers/fakes.js";

import { EnvironmentError } from "./errors.js";
import { assertPreflight, runPreflight } from "./preflight.js";

async function scriptsDir(): Promise<string> {
  const dir = makeTempDir();
  await fse.outputFile(path.join(dir, "copy_state.sh"), "#!/bin/bash\n");
  return dir;
}

describe("runPreflight", () => {
  it("reports tool versions for a ready environment", async () => {
    const runner = new FakeRunner()
      .on(["git", "--version"], { stdout: "git version 2.44.0\n" })
      .on(["gh", "--version"], { stdout: "gh version 2.49.0 (2024-05-01)\nhttps://x\n" });
    const config = makeConfig({ scriptsPath: await scriptsDir() });

    const report = await runPreflight(config, runner);

    expect(report.problems).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.tools).toEqual([
      { name: "git", available: true, version: "git version 2.44.0" },
      { name: "gh", available: true, version: "gh version 2.49.0 (2024-05-01)" },
      { name: "aws", available: true, version: null },
      { name: "bash", available: true, version: null },
    ]);
    expect(runner.commands().slice(4)).toEqual([
      "aws sts get-caller-identity --profile default",
      "gh auth status",
    ]);
  });

  it("collects problems and warnings", async () => {
    const runner = new FakeRunner()
      .on(["aws", "--version"], { exitCode: 127, stderr: "aws: command not found" })
      .on(["gh", "auth"], { exitCode: 1 });
    const config = makeConfig({ scriptsPath: makeTempDir(), concurrency: 12 });

    const report = await runPreflight(config, runner);

    expect(report.problems).toEqual([
      "aws is not installed or not on PATH (aws --version exited with 127: aws: command not found)",
      `copy_state.sh not found in ${config.scriptsPath ?? ""}`,
    ]);
    expect(report.warnings).toEqual([
      "GitHub CLI is not authenticated; run `gh auth login`",
      "concurrency 12 is above the recommended maximum of 10",
    ]);
    expect(runner.commands()).not.toContain("aws sts get-caller-identity --profile default");
  });

  it("asks for a scripts path when none is known", async () => {
    const report = await runPreflight(makeConfig({ scriptsPath: null }), new FakeRunner());

    expect(report.problems).toEqual([
      "copy_state.sh not found; pass --scripts-path or set PLATFORM_SCRIPTS_PATH",
    ]);
  });
});

describe("assertPreflight", () => {
  const failing = { tools: [], problems: ["gh is missing"], warnings: [] };

  it("throws an environment error listing the problems", () => {
    expect(() => assertPreflight(failing, makeConfig())).toThrow(EnvironmentError);
    expect(() => assertPreflight(failing, makeConfig())).toThrow(
      "Environment pre-flight failed with 1 problem(s)",
    );
  });

  it("lets the operator skip validation", () => {
    expect(() => assertPreflight(failing, makeConfig({ skipValidation: true }))).not.toThrow();
  });
});

/**
 * Environment pre-flight: verifies collaborators before any repository is touched.
 * Purpose: fail fast (EnvironmentError) on missing tools or scripts, before any repository fails.
 * Assumptions: every probe is read-only; credential probes only warn.
 * Usage: const report = await runPreflight(config, runner); assertPreflight(report, config);
 */

import path from "node:path";

import fse from "fs-extra";

import type { CommandRunner } from "./command-runner.js";
import { commandSucceeded, describeCommandFailure } from "./command-runner.js";
import type { PipelineConfig } from "./config.js";
import { EnvironmentError } from "./errors.js";
import { STATE_COPY_SCRIPT } from "./paths.js";
import { RECOMMENDED_MAX_CONCURRENCY, exceedsRecommendedConcurrency } from "./validation.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolProbe = {
  name: string;
  available: boolean;
  version: string | null;
};

export type PreflightReport = {
  tools: ToolProbe[];
  problems: string[];
  warnings: string[];
};

export const REQUIRED_TOOLS = ["git", "gh", "aws", "bash"] as const;

const PROBE_TIMEOUT_SECONDS = 30;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPreflight(
  config: PipelineConfig,
  runner: CommandRunner,
): Promise<PreflightReport> {
  const problems: string[] = [];
  const warnings: string[] = [];
  const tools: ToolProbe[] = [];

  for (const name of REQUIRED_TOOLS) {
    const res = await runner.run([name, "--version"], { timeoutSeconds: PROBE_TIMEOUT_SECONDS });
    const available = commandSucceeded(res);
    const version = available ? firstLine(res.stdout) : null;
    tools.push({ name, available, version });
    if (!available) {
      problems.push(`${name} is not installed or not on PATH (${describeCommandFailure(res)})`);
    }
  }

  if (config.scriptsPath === null) {
    problems.push(
      `${STATE_COPY_SCRIPT} not found; pass --scripts-path or set PLATFORM_SCRIPTS_PATH`,
    );
  } else if (!(await fse.pathExists(path.join(config.scriptsPath, STATE_COPY_SCRIPT)))) {
    problems.push(`${STATE_COPY_SCRIPT} not found in ${config.scriptsPath}`);
  }

  if (isAvailable(tools, "aws")) {
    const identity = await runner.run(
      ["aws", "sts", "get-caller-identity", "--profile", config.profile],
      { timeoutSeconds: PROBE_TIMEOUT_SECONDS },
    );
    if (!commandSucceeded(identity)) {
      warnings.push(`AWS credentials for profile "${config.profile}" could not be verified`);
    }
  }

  if (isAvailable(tools, "gh")) {
    const auth = await runner.run(["gh", "auth", "status"], {
      timeoutSeconds: PROBE_TIMEOUT_SECONDS,
    });
    if (!commandSucceeded(auth)) {
      warnings.push("GitHub CLI is not authenticated; run `gh auth login`");
    }
  }

  if (exceedsRecommendedConcurrency(config.concurrency)) {
    warnings.push(
      `concurrency ${config.concurrency} is above the recommended maximum of ` +
        `${RECOMMENDED_MAX_CONCURRENCY}`,
    );
  }

  return { tools, problems, warnings };
}

// Throws unless the report is clean or the operator opted out of validation.
export function assertPreflight(report: PreflightReport, config: PipelineConfig): void {
  if (report.problems.length === 0 || config.skipValidation) return;
  throw new EnvironmentError(
    `Environment pre-flight failed with ${report.problems.length} problem(s)`,
    report.problems,
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

function isAvailable(tools: ToolProbe[], name: string): boolean {
  return tools.some((tool) => tool.name === name && tool.available);
}

function firstLine(text: string): string | null {
  const line = text.split(/\r?\n/, 1)[0]?.trim();
  return line ? line : null;
}

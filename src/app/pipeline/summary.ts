import path from "node:path";

import { DEFAULTS, type PipelineConfig } from "../../core/config.js";
import { sanitizeJson } from "../../core/sanitize.js";
import { deepFreeze, formatDuration, writeJsonFile } from "../../core/utils.js";

import {
  targetLabel,
  type BatchFailure,
  type BatchSummary,
  type RepositoryOutcome,
  type RepositoryStatus,
} from "./types.js";

// =============================================================================
// BUILD
// =============================================================================

export function buildBatchSummary(
  runId: string,
  outcomes: readonly RepositoryOutcome[],
  durationMs: number,
): BatchSummary {
  const repositories: Record<RepositoryStatus, string[]> = {
    succeeded: [],
    failed: [],
    skipped: [],
  };
  const failures: BatchFailure[] = [];

  for (const outcome of outcomes) {
    const label = targetLabel(outcome.target);
    repositories[outcome.status].push(label);
    if (outcome.status === "failed") {
      failures.push({
        repo: label,
        stage: outcome.firstFailure?.stage ?? "unknown",
        message: outcome.firstFailure?.message ?? "unknown failure",
      });
    }
  }

  return deepFreeze({
    runId,
    total: outcomes.length,
    counts: {
      succeeded: repositories.succeeded.length,
      failed: repositories.failed.length,
      skipped: repositories.skipped.length,
    },
    durationMs,
    repositories,
    failures,
    outcomes: [...outcomes],
  });
}

// =============================================================================
// RETRY
// =============================================================================

export type RetryCommandOptions = {
  configPath?: string | null;
  // Directory the default work and log directories were resolved against.
  cwd?: string;
};

// A ready-to-run command that migrates only the failed repositories with the same settings.
export function buildRetryCommand(
  summary: BatchSummary,
  config: PipelineConfig,
  options: RetryCommandOptions = {},
): string | null {
  if (summary.repositories.failed.length === 0) return null;

  const { configPath = null, cwd = process.cwd() } = options;

  const args = ["statelift", "migrate", "--repos", summary.repositories.failed.join(",")];
  if (configPath) args.push("--config", configPath);

  const flags: Array<[string, string, string]> = [
    ["--org", config.org, DEFAULTS.org],
    ["--bucket", config.bucket, DEFAULTS.bucket],
    ["--region", config.region, DEFAULTS.region],
    ["--profile", config.profile, DEFAULTS.profile],
    ["--lock-table", config.lockTable, DEFAULTS.lockTable],
    ["--branch", config.branch, DEFAULTS.branch],
    ["--work-dir", config.workDir, path.resolve(cwd, DEFAULTS.workDir)],
    ["--log-dir", config.logDir, path.resolve(cwd, DEFAULTS.logDir)],
  ];
  for (const [flag, value, fallback] of flags) {
    if (value !== fallback) args.push(flag, value);
  }
  if (config.concurrency !== DEFAULTS.concurrency) {
    args.push("--concurrency", String(config.concurrency));
  }
  if (config.timeoutSeconds !== DEFAULTS.timeoutSeconds) {
    args.push("--timeout", String(config.timeoutSeconds));
  }
  if (config.scriptsPath) args.push("--scripts-path", config.scriptsPath);
  if (config.autoPublish) args.push("--auto-publish");
  if (config.skipVersionCheck) args.push("--skip-version-check");
  if (config.backend.onMissing === "skip") args.push("--allow-migrated");

  return args.map(shellQuote).join(" ");
}

function shellQuote(arg: string): string {
  return /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

// =============================================================================
// RENDER
// =============================================================================

export function renderSummaryLines(
  summary: BatchSummary,
  config: PipelineConfig,
  retryCommand: string | null,
): string[] {
  const lines: string[] = [];
  const mode = config.dryRun ? " (dry run)" : "";

  lines.push(`Migration summary${mode}: run ${summary.runId}`);
  lines.push(
    `  ${summary.total} repositories in ${formatDuration(summary.durationMs)}: ` +
      `${summary.counts.succeeded} succeeded, ${summary.counts.failed} failed, ` +
      `${summary.counts.skipped} skipped`,
  );

  for (const outcome of summary.outcomes) {
    const label = targetLabel(outcome.target);
    if (outcome.status === "succeeded") {
      const pr = outcome.proposalUrl ? ` ${outcome.proposalUrl}` : "";
      lines.push(`  ok      ${label}${pr}`);
    } else if (outcome.status === "failed") {
      const failure = outcome.firstFailure;
      lines.push(`  failed  ${label} [${failure?.stage ?? "unknown"}] ${failure?.message ?? ""}`);
    } else {
      lines.push(`  skipped ${label}: ${(outcome.skipReasons ?? []).join("; ")}`);
    }
  }

  if (summary.counts.failed > 0 && !config.dryRun) {
    lines.push("");
    lines.push("Rollback for failed repositories:");
    lines.push("  1. Close any pull request opened for the migration branch");
    lines.push(`  2. Delete the migration branch: git push origin --delete ${config.branch}`);
    lines.push(`  3. Review the logs in ${config.logDir}`);
    lines.push("  4. Re-run the migration after fixing the issues");
  }

  if (retryCommand) {
    lines.push("");
    lines.push("Retry the failed repositories with:");
    lines.push(`  ${retryCommand}`);
  }

  return lines;
}

// =============================================================================
// PERSIST
// =============================================================================

export type SummaryFile = {
  run_id: string;
  dry_run: boolean;
  total: number;
  counts: Record<RepositoryStatus, number>;
  duration_ms: number;
  repositories: Record<RepositoryStatus, string[]>;
  failures: Array<{ repo: string; stage: string; message: string }>;
  outcomes: Array<{
    repo: string;
    status: RepositoryStatus;
    stages: Array<{ stage: string; outcome: string; message: string; duration_ms: number }>;
    proposal_url: string | null;
    state_location: string | null;
  }>;
  retry_command: string | null;
};

// Stage detail is left out; the JSONL log carries it.
export function toSummaryFile(
  summary: BatchSummary,
  dryRun: boolean,
  retryCommand: string | null,
): SummaryFile {
  return {
    run_id: summary.runId,
    dry_run: dryRun,
    total: summary.total,
    counts: { ...summary.counts },
    duration_ms: summary.durationMs,
    repositories: {
      succeeded: [...summary.repositories.succeeded],
      failed: [...summary.repositories.failed],
      skipped: [...summary.repositories.skipped],
    },
    failures: summary.failures.map((failure) => ({ ...failure })),
    outcomes: summary.outcomes.map((outcome) => ({
      repo: targetLabel(outcome.target),
      status: outcome.status,
      stages: outcome.stages.map((stage) => ({
        stage: stage.stage,
        outcome: stage.outcome,
        message: stage.message,
        duration_ms: stage.durationMs,
      })),
      proposal_url: outcome.proposalUrl ?? null,
      state_location: outcome.stateLocation ?? null,
    })),
    retry_command: retryCommand,
  };
}

export async function writeSummaryFile(filePath: string, file: SummaryFile): Promise<void> {
  await writeJsonFile(filePath, sanitizeJson(file));
}

import path from "node:path";

import { runBatch } from "../app/pipeline/batch-scheduler.js";
import { SYSTEM_CLOCK, type Clock } from "../app/pipeline/ports.js";
import type { StageExecutor } from "../app/pipeline/stages/index.js";
import {
  buildRetryCommand,
  renderSummaryLines,
  toSummaryFile,
  writeSummaryFile,
} from "../app/pipeline/summary.js";
import { targetLabel, type BatchSummary, type RepositoryTarget } from "../app/pipeline/types.js";
import { ExecaCommandRunner, type CommandRunner } from "../core/command-runner.js";
import {
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineOverrides,
} from "../core/config.js";
import { discoverMigrationConfig } from "../core/config-loader.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { JsonlLogger, teeEventLog, type JsonObject } from "../core/logger.js";
import {
  discoverScriptsPath,
  migrationLogPath,
  scriptsPathCandidates,
  summaryPath,
} from "../core/paths.js";
import { assertPreflight, runPreflight } from "../core/preflight.js";
import { sanitize } from "../core/sanitize.js";
import {
  defaultRunId,
  parseListArgument,
  parseListFile,
  pathExists,
  readTextFile,
} from "../core/utils.js";

import { createPrompter, type ClosablePrompter } from "./confirm.js";
import { EXIT_OK, EXIT_REPOSITORY_FAILED } from "./error-format.js";
import { ConsoleReporter } from "./reporter.js";

// =============================================================================
// TYPES
// =============================================================================

export type MigrateCliOptions = {
  repos?: string;
  reposFile?: string;
  config?: string;
  org?: string;
  bucket?: string;
  region?: string;
  profile?: string;
  lockTable?: string;
  branch?: string;
  workDir?: string;
  logDir?: string;
  scriptsPath?: string;
  concurrency?: number;
  timeout?: number;
  dryRun?: boolean;
  skipVersionCheck?: boolean;
  skipValidation?: boolean;
  autoPublish?: boolean;
  allowMigrated?: boolean;
  verbose?: boolean;
  debug?: boolean;
};

// Seams for tests; the CLI uses the defaults.
export type MigrateDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  prompter?: ClosablePrompter;
  clock?: Clock;
  runId?: string;
  stages?: readonly StageExecutor[];
  write?: (line: string) => void;
};

export type MigrateResult = {
  exitCode: number;
  summary: BatchSummary;
  logPath: string;
  summaryPath: string;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function migrateCommand(
  opts: MigrateCliOptions,
  deps: MigrateDeps = {},
): Promise<MigrateResult> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const clock = deps.clock ?? SYSTEM_CLOCK;
  const sink = deps.write ?? ((line: string) => console.log(line));
  const write = (line: string): void => sink(sanitize(line));

  const entries = await readRepositoryEntries(opts, cwd);
  const { config: file, configPath } = discoverMigrationConfig(opts.config, cwd, env);
  const config = resolvePipelineConfig({
    file,
    overrides: toOverrides(opts, file.scripts_path, env),
    cwd,
  });

  const runId = deps.runId ?? defaultRunId(clock.now());
  const logPath = migrationLogPath(config.logDir, runId);
  const logger = new JsonlLogger(logPath, { runId }, Boolean(opts.debug));
  const reporter = new ConsoleReporter({ verbose: config.verbose, write });
  const log = teeEventLog(logger, reporter);
  const runner = deps.runner ?? new ExecaCommandRunner(log);
  const prompter = deps.prompter ?? createPrompter();

  try {
    log.log({ type: "run.start", payload: runStartPayload(config, configPath) });

    const report = await runPreflight(config, runner);
    log.log({
      type: "preflight.complete",
      level: report.problems.length > 0 ? "error" : "info",
      payload: { problems: report.problems, warnings: report.warnings },
    });
    for (const warning of report.warnings) write(`warning: ${warning}`);
    assertPreflight(report, config);
    if (report.problems.length > 0) {
      const count = report.problems.length;
      write(`continuing despite ${count} pre-flight problem(s) (--skip-validation)`);
    }

    const targets = buildTargets(entries, config);
    const summary = await runBatch(targets, config, { runner, prompter, clock, log }, {
      runId,
      observer: reporter,
      stages: deps.stages,
    });

    const retryCommand = buildRetryCommand(summary, config, { configPath, cwd });
    const summaryFile = summaryPath(config.logDir, runId);
    await writeSummaryFile(summaryFile, toSummaryFile(summary, config.dryRun, retryCommand));

    write("");
    for (const line of renderSummaryLines(summary, config, retryCommand)) write(line);
    write("");
    write(`Log: ${logPath}`);
    write(`Summary: ${summaryFile}`);

    log.log({ type: "run.complete", payload: { ...summary.counts } });

    return {
      exitCode: summary.counts.failed > 0 ? EXIT_REPOSITORY_FAILED : EXIT_OK,
      summary,
      logPath,
      summaryPath: summaryFile,
    };
  } finally {
    prompter.close();
    logger.close();
  }
}

// =============================================================================
// TARGETS
// =============================================================================

// Accepts `repo` (org from settings) or `org/repo`; duplicates collapse to the first entry.
export function buildTargets(
  entries: readonly string[],
  config: Pick<PipelineConfig, "org" | "branch">,
): RepositoryTarget[] {
  const seen = new Set<string>();
  const targets: RepositoryTarget[] = [];

  for (const entry of entries) {
    const target = parseRepositoryEntry(entry, config.org, config.branch);
    const label = targetLabel(target);
    if (seen.has(label)) continue;
    seen.add(label);
    targets.push(target);
  }

  return targets;
}

export function parseRepositoryEntry(
  entry: string,
  defaultOrg: string,
  branch: string,
): RepositoryTarget {
  const separator = entry.indexOf("/");
  if (separator > 0) {
    return { org: entry.slice(0, separator), repo: entry.slice(separator + 1), branch };
  }
  return { org: defaultOrg, repo: entry, branch };
}

export async function readRepositoryEntries(
  opts: Pick<MigrateCliOptions, "repos" | "reposFile">,
  cwd: string,
): Promise<string[]> {
  if (opts.repos && opts.reposFile) {
    throw usageError("Use either --repos or --repos-file, not both.");
  }

  let entries: string[];
  if (opts.reposFile) {
    const filePath = path.resolve(cwd, opts.reposFile);
    if (!(await pathExists(filePath))) {
      throw usageError(`Repository list not found: ${filePath}`);
    }
    entries = parseListFile(await readTextFile(filePath));
  } else {
    entries = parseListArgument(opts.repos);
  }

  if (entries.length === 0) {
    throw usageError("No repositories given.");
  }
  return entries;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toOverrides(
  opts: MigrateCliOptions,
  fileScriptsPath: string | undefined,
  env: NodeJS.ProcessEnv,
): PipelineOverrides {
  const scriptsPath =
    opts.scriptsPath ?? fileScriptsPath ?? discoverScriptsPath(scriptsPathCandidates(env));

  return {
    org: opts.org,
    bucket: opts.bucket,
    region: opts.region,
    profile: opts.profile,
    lockTable: opts.lockTable,
    branch: opts.branch,
    workDir: opts.workDir,
    logDir: opts.logDir,
    scriptsPath,
    concurrency: opts.concurrency,
    timeoutSeconds: opts.timeout,
    dryRun: opts.dryRun,
    skipVersionCheck: opts.skipVersionCheck,
    skipValidation: opts.skipValidation,
    autoPublish: opts.autoPublish,
    allowMigrated: opts.allowMigrated,
    verbose: opts.verbose,
  };
}

function runStartPayload(config: PipelineConfig, configPath: string | null): JsonObject {
  return {
    config_path: configPath,
    org: config.org,
    bucket: config.bucket,
    region: config.region,
    profile: config.profile,
    lock_table: config.lockTable,
    branch: config.branch,
    concurrency: config.concurrency,
    dry_run: config.dryRun,
    work_dir: config.workDir,
  };
}

function usageError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.validation,
    title: "Invalid repository list.",
    message,
    hint: "Pass --repos repo-a,org/repo-b or --repos-file <path> with one repository per line.",
  });
}

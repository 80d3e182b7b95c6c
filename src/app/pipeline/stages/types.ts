import type { CommandScope } from "../../../core/command-runner.js";
import type { PipelineConfig } from "../../../core/config.js";
import type { EventLog, JsonObject } from "../../../core/logger.js";
import type { PipelinePorts } from "../ports.js";
import type { RepositoryTarget, StageOutcome, StageResult } from "../types.js";

// =============================================================================
// STAGE IDS
// =============================================================================

export const STAGE_IDS = [
  "fetch",
  "branch",
  "version-check",
  "state-copy",
  "backend-update",
  "module-update",
  "workflow-update",
  "commit",
  "push",
  "publish-proposal",
  "verify",
] as const;

export type StageId = (typeof STAGE_IDS)[number];

// =============================================================================
// EXECUTOR CONTRACT
// =============================================================================

export type StageContext = {
  target: RepositoryTarget;
  repoPath: string;
  config: PipelineConfig;
  ports: PipelinePorts;
  // Repository-scoped; every event already carries the repo name.
  log: EventLog;
  // Results of the stages that already ran for this repository, in order.
  previous: readonly StageResult[];
};

export type StageArtifacts = {
  proposalUrl?: string;
  stateLocation?: string;
};

export type StageExecution = {
  outcome: StageOutcome;
  message: string;
  detail?: JsonObject;
  artifacts?: StageArtifacts;
};

export interface StageExecutor {
  readonly id: StageId;
  readonly title: string;
  // A failed fatal stage stops the repository; a failed non-fatal one is recorded and skipped past.
  fatal(config: PipelineConfig): boolean;
  execute(ctx: StageContext): Promise<StageExecution>;
}

// =============================================================================
// HELPERS
// =============================================================================

type ExecutionExtras = Omit<StageExecution, "outcome" | "message">;

export function succeeded(message: string, extra: ExecutionExtras = {}): StageExecution {
  return { outcome: "succeeded", message, ...extra };
}

export function failed(message: string, extra: ExecutionExtras = {}): StageExecution {
  return { outcome: "failed", message, ...extra };
}

export function skipped(message: string, extra: ExecutionExtras = {}): StageExecution {
  return { outcome: "skipped", message, ...extra };
}

export function alwaysFatal(): boolean {
  return true;
}

export function neverFatal(): boolean {
  return false;
}

export function commandScope(
  ctx: StageContext,
  overrides: Partial<CommandScope> = {},
): CommandScope {
  return {
    runner: ctx.ports.runner,
    cwd: ctx.repoPath,
    timeoutSeconds: ctx.config.timeoutSeconds,
    dryRun: ctx.config.dryRun,
    log: ctx.log,
    ...overrides,
  };
}

export function previousDetail(ctx: StageContext, stage: StageId): JsonObject | undefined {
  return ctx.previous.find((result) => result.stage === stage)?.detail;
}

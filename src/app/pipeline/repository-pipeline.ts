/**
 * Runs the fixed stage sequence for one repository and produces its frozen RepositoryOutcome.
 * Purpose: isolate every stage failure inside this repository's result.
 * Assumptions: stage executors may throw or return failures; both become failed StageResults.
 * Usage: const outcome = await runRepositoryPipeline(target, config, ports);
 */

import type { PipelineConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { createRepositoryLog, type JsonObject } from "../../core/logger.js";
import { repositoryWorkDir } from "../../core/paths.js";
import { sanitize } from "../../core/sanitize.js";
import { deepFreeze } from "../../core/utils.js";
import { validateTarget } from "../../core/validation.js";

import type { PipelinePorts } from "./ports.js";
import { DEFAULT_STAGES } from "./stages/index.js";
import type {
  StageArtifacts,
  StageContext,
  StageExecution,
  StageExecutor,
} from "./stages/types.js";
import { PipelineStateMachine } from "./state-machine.js";
import {
  targetLabel,
  type RepositoryOutcome,
  type RepositoryStatus,
  type RepositoryTarget,
  type StageResult,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type RepositoryPipelineOptions = {
  stages?: readonly StageExecutor[];
  onStageComplete?: (target: RepositoryTarget, result: StageResult) => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runRepositoryPipeline(
  input: RepositoryTarget,
  config: PipelineConfig,
  ports: PipelinePorts,
  options: RepositoryPipelineOptions = {},
): Promise<RepositoryOutcome> {
  const target: RepositoryTarget = Object.freeze({ ...input });
  const stages = options.stages ?? DEFAULT_STAGES;
  const log = createRepositoryLog(ports.log, targetLabel(target));
  const machine = new PipelineStateMachine();
  const startedAt = ports.clock.now();

  log.log({ type: "repo.start", payload: { branch: target.branch, dry_run: config.dryRun } });

  // A rejected target never leaves pending.
  const validation = validateTarget(target);
  if (!validation.ok) {
    machine.finish("skipped");
    const reasons = validation.reasons.map((reason) => sanitize(reason));
    log.log({
      type: "repo.skipped",
      level: "warn",
      payload: { reasons, phases: [...machine.phases] },
    });
    return buildOutcome({
      target,
      status: "skipped",
      stages: [],
      skipReasons: reasons,
      firstFailure: { stage: "validation", message: reasons.join("; ") },
      artifacts: {},
      dryRun: config.dryRun,
      startedAt,
      completedAt: ports.clock.now(),
    });
  }

  machine.startValidation();
  const repoPath = repositoryWorkDir(config.workDir, target.org, target.repo);
  const results: StageResult[] = [];
  const artifacts: StageArtifacts = {};
  let firstFailure: RepositoryOutcome["firstFailure"];

  for (const [index, stage] of stages.entries()) {
    machine.startStage(index, stage.id);
    log.log({ type: "stage.start", stage: stage.id });

    const ctx: StageContext = { target, repoPath, config, ports, log, previous: [...results] };
    const stageStarted = ports.clock.now();
    const { execution, fatal } = await executeStage(stage, ctx);
    const result: StageResult = Object.freeze({
      stage: stage.id,
      outcome: execution.outcome,
      message: sanitize(execution.message),
      durationMs: ports.clock.now().getTime() - stageStarted.getTime(),
      fatal,
      ...(execution.detail ? { detail: execution.detail } : {}),
    });
    results.push(result);
    Object.assign(artifacts, execution.artifacts ?? {});

    log.log({
      type: "stage.complete",
      stage: stage.id,
      level: result.outcome === "failed" ? (fatal ? "error" : "warn") : "info",
      payload: stagePayload(result),
    });
    options.onStageComplete?.(target, result);

    if (result.outcome === "failed" && fatal) {
      firstFailure = { stage: stage.id, message: result.message };
      break;
    }
  }

  const status: RepositoryStatus = firstFailure ? "failed" : "succeeded";
  machine.finish(status);

  const outcome = buildOutcome({
    target,
    status,
    stages: results,
    firstFailure,
    artifacts,
    dryRun: config.dryRun,
    startedAt,
    completedAt: ports.clock.now(),
  });

  log.log({
    type: "repo.complete",
    level: status === "failed" ? "error" : "info",
    payload: {
      status,
      duration_ms: outcome.durationMs,
      phases: [...machine.phases],
      ...(firstFailure ? { failed_stage: firstFailure.stage, error: firstFailure.message } : {}),
    },
  });

  return outcome;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function executeStage(
  stage: StageExecutor,
  ctx: StageContext,
): Promise<{ execution: StageExecution; fatal: boolean }> {
  const fatal = stage.fatal(ctx.config);
  try {
    return { execution: await stage.execute(ctx), fatal };
  } catch (err) {
    return { execution: { outcome: "failed", message: formatErrorMessage(err) }, fatal };
  }
}

function stagePayload(result: StageResult): JsonObject {
  return {
    outcome: result.outcome,
    message: result.message,
    duration_ms: result.durationMs,
    fatal: result.fatal,
    ...(result.detail ? { detail: result.detail } : {}),
  };
}

function buildOutcome(input: {
  target: RepositoryTarget;
  status: RepositoryStatus;
  stages: StageResult[];
  firstFailure: RepositoryOutcome["firstFailure"];
  skipReasons?: string[];
  artifacts: StageArtifacts;
  dryRun: boolean;
  startedAt: Date;
  completedAt: Date;
}): RepositoryOutcome {
  const outcome: RepositoryOutcome = {
    target: input.target,
    status: input.status,
    stages: input.stages,
    ...(input.firstFailure ? { firstFailure: input.firstFailure } : {}),
    ...(input.skipReasons ? { skipReasons: input.skipReasons } : {}),
    ...(input.artifacts.proposalUrl ? { proposalUrl: input.artifacts.proposalUrl } : {}),
    ...(input.artifacts.stateLocation ? { stateLocation: input.artifacts.stateLocation } : {}),
    dryRun: input.dryRun,
    startedAt: input.startedAt.toISOString(),
    completedAt: input.completedAt.toISOString(),
    durationMs: input.completedAt.getTime() - input.startedAt.getTime(),
  };
  return deepFreeze(outcome);
}

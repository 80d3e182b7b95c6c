/**
 * Runs repository pipelines across a bounded worker pool and aggregates their outcomes.
 * Purpose: one repository's failure never stops or corrupts another's.
 * Assumptions: outcomes are reported in input order regardless of completion order.
 */

import pLimit from "p-limit";

import type { PipelineConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { createRepositoryLog } from "../../core/logger.js";
import { deepFreeze } from "../../core/utils.js";

import type { PipelinePorts } from "./ports.js";
import { runRepositoryPipeline } from "./repository-pipeline.js";
import type { StageExecutor } from "./stages/types.js";
import { buildBatchSummary } from "./summary.js";
import {
  targetLabel,
  type BatchSummary,
  type RepositoryOutcome,
  type RepositoryTarget,
  type StageResult,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface BatchObserver {
  onStart?(target: RepositoryTarget): void;
  onStageComplete?(target: RepositoryTarget, result: StageResult): void;
  onComplete?(outcome: RepositoryOutcome): void;
}

export type BatchOptions = {
  runId: string;
  observer?: BatchObserver;
  stages?: readonly StageExecutor[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runBatch(
  targets: readonly RepositoryTarget[],
  config: PipelineConfig,
  ports: PipelinePorts,
  options: BatchOptions,
): Promise<BatchSummary> {
  const limit = pLimit(Math.max(1, config.concurrency));
  const startedAt = ports.clock.now();
  const { observer } = options;

  ports.log.log({
    type: "batch.start",
    payload: {
      total: targets.length,
      concurrency: config.concurrency,
      dry_run: config.dryRun,
      repos: targets.map(targetLabel),
    },
  });

  const outcomes = await Promise.all(
    targets.map((target) =>
      limit(async () => {
        observer?.onStart?.(target);
        const outcome = await runIsolated(target, config, ports, options);
        observer?.onComplete?.(outcome);
        return outcome;
      }),
    ),
  );

  const summary = buildBatchSummary(
    options.runId,
    outcomes,
    ports.clock.now().getTime() - startedAt.getTime(),
  );

  ports.log.log({
    type: "batch.complete",
    level: summary.counts.failed > 0 ? "warn" : "info",
    payload: {
      total: summary.total,
      succeeded: summary.counts.succeeded,
      failed: summary.counts.failed,
      skipped: summary.counts.skipped,
      duration_ms: summary.durationMs,
    },
  });

  return summary;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runIsolated(
  target: RepositoryTarget,
  config: PipelineConfig,
  ports: PipelinePorts,
  options: BatchOptions,
): Promise<RepositoryOutcome> {
  const startedAt = ports.clock.now();
  try {
    return await runRepositoryPipeline(target, config, ports, {
      stages: options.stages,
      onStageComplete: options.observer?.onStageComplete,
    });
  } catch (err) {
    const message = formatErrorMessage(err);
    createRepositoryLog(ports.log, targetLabel(target)).log({
      type: "repo.crash",
      level: "error",
      payload: { error: message },
    });
    const completedAt = ports.clock.now();
    return deepFreeze({
      target: Object.freeze({ ...target }),
      status: "failed",
      stages: [],
      firstFailure: { stage: "pipeline", message },
      dryRun: config.dryRun,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    } satisfies RepositoryOutcome);
  }
}

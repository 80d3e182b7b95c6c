/**
 * Pipeline data model: targets, per-stage results, per-repository outcomes and the batch summary.
 * Purpose: one shared vocabulary between the scheduler, the repository pipeline and the CLI.
 * Assumptions: every value here is frozen once published; consumers never mutate it.
 */

import type { JsonObject } from "../../core/logger.js";

import type { StageId } from "./stages/types.js";

// =============================================================================
// TARGETS
// =============================================================================

export type RepositoryTarget = Readonly<{
  org: string;
  repo: string;
  branch: string;
}>;

export function targetLabel(target: RepositoryTarget): string {
  return `${target.org}/${target.repo}`;
}

// =============================================================================
// RESULTS
// =============================================================================

export type StageOutcome = "succeeded" | "failed" | "skipped";

export type StageResult = Readonly<{
  stage: StageId;
  outcome: StageOutcome;
  message: string;
  durationMs: number;
  fatal: boolean;
  detail?: JsonObject;
}>;

export type RepositoryStatus = "succeeded" | "failed" | "skipped";

export type RepositoryOutcome = Readonly<{
  target: RepositoryTarget;
  status: RepositoryStatus;
  stages: readonly StageResult[];
  firstFailure?: Readonly<{ stage: StageId | "validation" | "pipeline"; message: string }>;
  skipReasons?: readonly string[];
  proposalUrl?: string;
  stateLocation?: string;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}>;

// =============================================================================
// SUMMARY
// =============================================================================

export type StatusCounts = Readonly<Record<RepositoryStatus, number>>;

export type BatchFailure = Readonly<{
  repo: string;
  stage: string;
  message: string;
}>;

export type BatchSummary = Readonly<{
  runId: string;
  total: number;
  counts: StatusCounts;
  durationMs: number;
  repositories: Readonly<Record<RepositoryStatus, readonly string[]>>;
  failures: readonly BatchFailure[];
  outcomes: readonly RepositoryOutcome[];
}>;

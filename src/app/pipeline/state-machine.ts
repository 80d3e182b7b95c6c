/**
 * Per-repository lifecycle:
 *   pending -> validating -> running(stage i) -> succeeded | failed | skipped.
 * Purpose: make illegal lifecycle moves impossible to perform silently.
 * Assumptions: one machine per repository, driven by a single pipeline.
 */

import type { StageId } from "./stages/types.js";
import type { RepositoryStatus } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineState =
  | { phase: "pending" }
  | { phase: "validating" }
  | { phase: "running"; stageIndex: number; stage: StageId }
  | { phase: RepositoryStatus };

export type PipelinePhase = PipelineState["phase"];

const ALLOWED: Record<PipelinePhase, readonly PipelinePhase[]> = {
  pending: ["validating", "skipped"],
  validating: ["running", "skipped"],
  running: ["running", "succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: PipelinePhase,
    public readonly to: PipelinePhase,
  ) {
    super(`Illegal pipeline transition: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

// =============================================================================
// MACHINE
// =============================================================================

export class PipelineStateMachine {
  private current: PipelineState = { phase: "pending" };
  private readonly history: PipelinePhase[] = ["pending"];

  get state(): PipelineState {
    return this.current;
  }

  get phases(): readonly PipelinePhase[] {
    return this.history;
  }

  startValidation(): void {
    this.transition({ phase: "validating" });
  }

  startStage(stageIndex: number, stage: StageId): void {
    if (this.current.phase === "running" && stageIndex <= this.current.stageIndex) {
      throw new Error(
        `Stage order violated: ${stage} (#${stageIndex}) after #${this.current.stageIndex}`,
      );
    }
    this.transition({ phase: "running", stageIndex, stage });
  }

  finish(status: RepositoryStatus): void {
    this.transition({ phase: status });
  }

  private transition(next: PipelineState): void {
    if (!canTransition(this.current.phase, next.phase)) {
      throw new IllegalTransitionError(this.current.phase, next.phase);
    }
    this.current = next;
    this.history.push(next.phase);
  }
}

export function canTransition(from: PipelinePhase, to: PipelinePhase): boolean {
  return ALLOWED[from].includes(to);
}

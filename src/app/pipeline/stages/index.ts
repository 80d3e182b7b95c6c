import { backendUpdateStage } from "./backend-update.js";
import { branchStage } from "./branch.js";
import { commitStage } from "./commit.js";
import { fetchStage } from "./fetch.js";
import { moduleUpdateStage } from "./module-update.js";
import { publishProposalStage } from "./publish-proposal.js";
import { pushStage } from "./push.js";
import { stateCopyStage } from "./state-copy.js";
import type { StageExecutor } from "./types.js";
import { verifyStage } from "./verify.js";
import { versionCheckStage } from "./version-check.js";
import { workflowUpdateStage } from "./workflow-update.js";

export * from "./types.js";

// Order matters: this is the fixed per-repository sequence.
export const DEFAULT_STAGES: readonly StageExecutor[] = [
  fetchStage,
  branchStage,
  versionCheckStage,
  stateCopyStage,
  backendUpdateStage,
  moduleUpdateStage,
  workflowUpdateStage,
  commitStage,
  pushStage,
  publishProposalStage,
  verifyStage,
];

import { injectWorkflowSecret } from "../../../transform/workflows.js";

import { sweepFiles } from "./files.js";
import {
  neverFatal,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

const WORKFLOW_FILES = [".github/workflows/*.yml", ".github/workflows/*.yaml"];

export const workflowUpdateStage: StageExecutor = {
  id: "workflow-update",
  title: "Inject workflow secret",
  fatal: neverFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const { envVar, secretName } = ctx.config.workflows;
    const sweep = await sweepFiles(ctx, WORKFLOW_FILES, (text) =>
      injectWorkflowSecret(text, { envVar, secretName }),
    );
    if (!sweep.inspected) {
      return succeeded(`would add ${envVar} from secret ${secretName} to Terraform workflows`);
    }

    const updated = sweep.files.filter((entry) => entry.changed).map((entry) => entry.file);
    const untouched = sweep.files
      .filter((entry) => entry.result.reason !== undefined)
      .map((entry) => `${entry.file}: ${entry.result.reason ?? ""}`);

    const verb = ctx.config.dryRun ? "would update" : "updated";
    return succeeded(`${verb} ${updated.length} workflow file(s)`, {
      detail: { updated: updated.length, files: updated, untouched },
    });
  },
};

import { checkoutNewBranch } from "../../../git/git.js";

import {
  alwaysFatal,
  commandScope,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

export const branchStage: StageExecutor = {
  id: "branch",
  title: "Create migration branch",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    await checkoutNewBranch(commandScope(ctx), ctx.target.branch);
    return succeeded(
      ctx.config.dryRun
        ? `would create branch ${ctx.target.branch}`
        : `created branch ${ctx.target.branch}`,
    );
  },
};

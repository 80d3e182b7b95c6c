import { pushBranch } from "../../../git/git.js";

import {
  alwaysFatal,
  commandScope,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

export const pushStage: StageExecutor = {
  id: "push",
  title: "Push branch",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    await pushBranch(commandScope(ctx), ctx.target.branch);
    return succeeded(
      ctx.config.dryRun
        ? `would push ${ctx.target.branch} to origin`
        : `pushed ${ctx.target.branch} to origin`,
    );
  },
};

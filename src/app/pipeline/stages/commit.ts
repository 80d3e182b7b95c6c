import { changedPaths, commit, stageAll } from "../../../git/git.js";

import {
  alwaysFatal,
  commandScope,
  failed,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

export const commitStage: StageExecutor = {
  id: "commit",
  title: "Commit changes",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const scope = commandScope(ctx);
    const message = ctx.config.proposal.commitMessage;

    await stageAll(scope);
    if (ctx.config.dryRun) {
      await commit(scope, message);
      return succeeded(`would commit staged changes as "${message}"`);
    }

    const paths = await changedPaths(scope);
    if (paths.length === 0) {
      return failed("no changes to commit");
    }

    await commit(scope, message);
    return succeeded(`committed ${paths.length} file(s)`, { detail: { files: paths } });
  },
};

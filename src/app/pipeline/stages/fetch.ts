import path from "node:path";

import fse from "fs-extra";

import { isPathInside } from "../../../core/validation.js";
import { cloneRepository } from "../../../github/gh.js";
import { targetLabel } from "../types.js";

import {
  alwaysFatal,
  commandScope,
  failed,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

// Clones into <workDir>/<org>/<repo>, replacing any checkout left by an earlier run.
export const fetchStage: StageExecutor = {
  id: "fetch",
  title: "Fetch repository",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const label = targetLabel(ctx.target);
    if (!isPathInside(ctx.config.workDir, ctx.repoPath)) {
      return failed(`checkout path ${ctx.repoPath} escapes the work directory`);
    }

    const scope = commandScope(ctx, { cwd: path.dirname(ctx.repoPath) });
    if (!ctx.config.dryRun) {
      await fse.remove(ctx.repoPath);
      await fse.ensureDir(scope.cwd ?? ctx.config.workDir);
    }

    await cloneRepository(scope, ctx.target.org, ctx.target.repo, ctx.repoPath);
    return succeeded(
      ctx.config.dryRun
        ? `would clone ${label} into ${ctx.repoPath}`
        : `cloned ${label} into ${ctx.repoPath}`,
    );
  },
};

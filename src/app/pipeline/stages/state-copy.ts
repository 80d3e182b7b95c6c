import { STATE_COPY_SCRIPT } from "../../../core/paths.js";
import { copyState, stateLocation, stateTargetFor } from "../../../state/state-ops.js";

import {
  alwaysFatal,
  commandScope,
  failed,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

export const stateCopyStage: StageExecutor = {
  id: "state-copy",
  title: "Copy state to S3",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const target = stateTargetFor(ctx.config, ctx.target.org, ctx.target.repo);
    const location = stateLocation(target);

    if (ctx.config.scriptsPath === null) {
      return failed(`${STATE_COPY_SCRIPT} location is unknown; pass --scripts-path`);
    }

    await copyState(
      commandScope(ctx, { timeoutSeconds: ctx.config.stateCopyTimeoutSeconds }),
      ctx.config.scriptsPath,
      target,
    );

    return succeeded(
      ctx.config.dryRun ? `would copy state to ${location}` : `copied state to ${location}`,
      { artifacts: { stateLocation: location }, detail: { location } },
    );
  },
};

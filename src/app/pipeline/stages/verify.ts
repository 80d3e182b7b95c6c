import { stateLocation, stateTargetFor, verifyState } from "../../../state/state-ops.js";

import {
  alwaysFatal,
  commandScope,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

// Confirms the relocated state object exists; runs outside the checkout.
export const verifyStage: StageExecutor = {
  id: "verify",
  title: "Verify state in S3",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const target = stateTargetFor(ctx.config, ctx.target.org, ctx.target.repo);
    const location = stateLocation(target);

    await verifyState(commandScope(ctx, { cwd: undefined }), target);
    return succeeded(
      ctx.config.dryRun ? `would verify ${location}` : `verified ${location}`,
      { artifacts: { stateLocation: location } },
    );
  },
};

import { renderTemplate } from "../../../core/templates.js";
import { createPullRequest, findOpenPullRequest } from "../../../github/gh.js";
import { stateKeyFor } from "../../../transform/backend.js";
import { targetLabel } from "../types.js";

import {
  alwaysFatal,
  commandScope,
  failed,
  previousDetail,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

/**
 * Opens the migration pull request, or reuses one already open for the branch.
 * Without auto-publish the operator is asked first; a declined prompt fails the stage.
 */
export const publishProposalStage: StageExecutor = {
  id: "publish-proposal",
  title: "Open pull request",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const scope = commandScope(ctx);
    const label = targetLabel(ctx.target);
    const { title, baseBranch } = ctx.config.proposal;
    const head = ctx.target.branch;

    const existing = await findOpenPullRequest(scope, head);
    if (existing) {
      return succeeded(`pull request already open: ${existing}`, {
        artifacts: { proposalUrl: existing },
        detail: { url: existing, reused: true },
      });
    }

    if (ctx.config.dryRun) {
      await createPullRequest(scope, { title, body: "", head, base: baseBranch });
      return succeeded(`would open pull request "${title}" for ${label}`);
    }

    if (!ctx.config.autoPublish) {
      const question = `Open pull request "${title}" for ${label}?`;
      const approved = await ctx.ports.prompter.confirm(question);
      if (!approved) {
        return failed("operator declined to open the pull request");
      }
    }

    const body = await renderProposalBody(ctx);
    const url = await createPullRequest(scope, { title, body, head, base: baseBranch });
    if (!url) {
      return succeeded("opened pull request (URL not reported by gh)");
    }
    return succeeded(`opened pull request ${url}`, {
      artifacts: { proposalUrl: url },
      detail: { url, reused: false },
    });
  },
};

async function renderProposalBody(ctx: StageContext): Promise<string> {
  const modules = previousDetail(ctx, "module-update")?.converted;
  const workflows = previousDetail(ctx, "workflow-update")?.updated;

  return renderTemplate("pull-request", {
    org: ctx.target.org,
    repo: ctx.target.repo,
    bucket: ctx.config.bucket,
    region: ctx.config.region,
    lockTable: ctx.config.lockTable,
    stateKey: stateKeyFor(ctx.target, ctx.config.org),
    modulesChanged: typeof modules === "number" ? modules : 0,
    workflowsChanged: typeof workflows === "number" ? workflows : 0,
    workflowEnvVar: ctx.config.workflows.envVar,
    workflowSecret: ctx.config.workflows.secretName,
  });
}

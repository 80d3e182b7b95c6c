import { hasS3Backend, rewriteBackend, stateKeyFor } from "../../../transform/backend.js";

import { sweepFiles } from "./files.js";
import {
  alwaysFatal,
  failed,
  skipped,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

export const backendUpdateStage: StageExecutor = {
  id: "backend-update",
  title: "Switch backend to S3",
  fatal: alwaysFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const settings = {
      bucket: ctx.config.bucket,
      key: stateKeyFor(ctx.target, ctx.config.org),
      region: ctx.config.region,
      lockTable: ctx.config.lockTable,
    };

    const sweep = await sweepFiles(ctx, ctx.config.backend.files, (text) =>
      rewriteBackend(text, settings),
    );
    if (!sweep.inspected) {
      return succeeded(`would replace the Terraform Cloud backend with backend "s3"`);
    }

    const changedFiles = sweep.files.filter((entry) => entry.changed).map((entry) => entry.file);
    if (changedFiles.length === 0) {
      const patterns = ctx.config.backend.files.join(", ");
      const s3Files = sweep.files
        .filter((entry) => hasS3Backend(entry.result.text))
        .map((entry) => entry.file);
      const present = s3Files.length > 0 ? `backend "s3" already in ${s3Files.join(", ")}` : "";
      if (ctx.config.backend.onMissing === "skip") {
        return skipped(
          present
            ? `${present}; treating as migrated`
            : `no Terraform Cloud backend block in ${patterns}; treating as migrated`,
        );
      }
      const missing = `no Terraform Cloud backend block found in ${patterns}`;
      return failed(present ? `${missing}; ${present}` : missing);
    }

    const verb = ctx.config.dryRun ? "would update" : "updated";
    return succeeded(`${verb} backend in ${changedFiles.join(", ")}`, {
      detail: { files: changedFiles },
    });
  },
};

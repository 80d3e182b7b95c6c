import type { JsonObject } from "../../../core/logger.js";
import { rewriteModuleSources } from "../../../transform/module-sources.js";

import { sweepFiles } from "./files.js";
import {
  neverFatal,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

const MODULE_FILES = ["**/*.tf"];

export const moduleUpdateStage: StageExecutor = {
  id: "module-update",
  title: "Convert module sources",
  fatal: neverFatal,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const sweep = await sweepFiles(ctx, MODULE_FILES, (text) =>
      rewriteModuleSources(text, ctx.target.org, ctx.config.modules),
    );
    if (!sweep.inspected) {
      return succeeded("would convert registry module sources to git references");
    }

    const converted = sweep.files.flatMap((entry) =>
      entry.result.converted.map((module) => `${entry.file}: ${module.module}`),
    );
    const unconverted = sweep.files.flatMap((entry) =>
      entry.result.unconverted.map(
        (module) => `${entry.file}: ${module.module} (${module.reason})`,
      ),
    );

    const detail: JsonObject = { converted: converted.length, unconverted };
    const verb = ctx.config.dryRun ? "would convert" : "converted";
    const review = unconverted.length > 0 ? `; ${unconverted.length} left for review` : "";
    return succeeded(`${verb} ${converted.length} module source(s)${review}`, { detail });
  },
};

import type { PipelineConfig } from "../../../core/config.js";
import {
  checkModuleVersions,
  scanModuleVersions,
  type ModulePin,
} from "../../../transform/versions.js";

import { readRepoFiles } from "./files.js";
import {
  failed,
  succeeded,
  type StageContext,
  type StageExecution,
  type StageExecutor,
} from "./types.js";

const MODULE_FILES = ["**/*.tf"];

// With --skip-version-check the check still runs and reports, but no longer stops the repository.
export const versionCheckStage: StageExecutor = {
  id: "version-check",
  title: "Check module versions",
  fatal: (config: PipelineConfig) => !config.skipVersionCheck,

  async execute(ctx: StageContext): Promise<StageExecution> {
    const requirements = ctx.config.versions.required;
    const required = Object.keys(requirements).length;

    const files = await readRepoFiles(ctx, MODULE_FILES);
    if (files === null) {
      return succeeded(`would check module versions against ${required} requirement(s)`);
    }

    const pins: ModulePin[] = files.flatMap(({ text }) =>
      scanModuleVersions(text, ctx.config.modules.registryHost),
    );
    const violations = checkModuleVersions(pins, requirements, undefined, {
      allowPrerelease: ctx.config.versions.allowPrerelease,
    });

    const detail = {
      modules: pins.length,
      requirements: required,
      violations: violations.map((violation) => violation.message),
    };

    if (violations.length > 0) {
      return failed(`${violations.length} module version violation(s): ${violations[0]?.message}`, {
        detail,
      });
    }
    return succeeded(`${pins.length} module(s) checked against ${required} requirement(s)`, {
      detail,
    });
  },
};

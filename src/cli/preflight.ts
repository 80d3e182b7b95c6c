import { ExecaCommandRunner, type CommandRunner } from "../core/command-runner.js";
import { resolvePipelineConfig } from "../core/config.js";
import { discoverMigrationConfig } from "../core/config-loader.js";
import { discoverScriptsPath, scriptsPathCandidates } from "../core/paths.js";
import { runPreflight, type PreflightReport } from "../core/preflight.js";

import { EXIT_OK, EXIT_USAGE } from "./error-format.js";

// =============================================================================
// PREFLIGHT
// =============================================================================

export type PreflightCliOptions = {
  config?: string;
  profile?: string;
  scriptsPath?: string;
  concurrency?: number;
};

export async function preflightCommand(
  opts: PreflightCliOptions,
  deps: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    runner?: CommandRunner;
    write?: (line: string) => void;
  } = {},
): Promise<{ exitCode: number; report: PreflightReport }> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((line: string) => console.log(line));

  const { config: file } = discoverMigrationConfig(opts.config, cwd, env);
  const config = resolvePipelineConfig({
    file,
    overrides: {
      profile: opts.profile,
      concurrency: opts.concurrency,
      scriptsPath:
        opts.scriptsPath ?? file.scripts_path ?? discoverScriptsPath(scriptsPathCandidates(env)),
    },
    cwd,
  });

  const report = await runPreflight(config, deps.runner ?? new ExecaCommandRunner());
  for (const line of renderPreflightReport(report)) write(line);

  return { exitCode: report.problems.length > 0 ? EXIT_USAGE : EXIT_OK, report };
}

export function renderPreflightReport(report: PreflightReport): string[] {
  const lines = report.tools.map((tool) =>
    tool.available
      ? `ok       ${tool.name}${tool.version ? ` (${tool.version})` : ""}`
      : `missing  ${tool.name}`,
  );
  for (const problem of report.problems) lines.push(`problem  ${problem}`);
  for (const warning of report.warnings) lines.push(`warning  ${warning}`);
  lines.push(
    report.problems.length === 0
      ? "Environment ready."
      : `Environment not ready: ${report.problems.length} problem(s).`,
  );
  return lines;
}

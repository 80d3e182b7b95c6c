import path from "node:path";

import { resolvePipelineConfig, type PipelineConfig } from "../core/config.js";
import {
  DEFAULT_CONFIG_FILENAME,
  discoverScriptsPath,
  scriptsPathCandidates,
} from "../core/paths.js";
import { renderTemplate } from "../core/templates.js";
import { pathExists, writeTextFile } from "../core/utils.js";

// =============================================================================
// INIT (starter settings file)
// =============================================================================

export type InitCliOptions = {
  force?: boolean;
  org?: string;
  bucket?: string;
  region?: string;
  profile?: string;
  lockTable?: string;
  branch?: string;
  scriptsPath?: string;
};

export type InitStatus = "created" | "overwritten" | "exists";

// Used when no copy_state.sh was found; expanded from the environment when the file loads.
export const FALLBACK_SCRIPTS_PATH = "${HOME}/repos/platform-scripts";

export async function initCommand(
  opts: InitCliOptions,
  deps: { cwd?: string; env?: NodeJS.ProcessEnv; write?: (line: string) => void } = {},
): Promise<{ status: InitStatus; configPath: string }> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((line: string) => console.log(line));
  const configPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);

  const existed = await pathExists(configPath);
  if (existed && !opts.force) {
    write(`Settings already exist at ${configPath} (use --force to overwrite)`);
    return { status: "exists", configPath };
  }

  // Validates the values before anything is written.
  const config = resolvePipelineConfig({
    overrides: {
      org: opts.org,
      bucket: opts.bucket,
      region: opts.region,
      profile: opts.profile,
      lockTable: opts.lockTable,
      branch: opts.branch,
    },
    cwd,
  });
  const scriptsPath =
    opts.scriptsPath ?? discoverScriptsPath(scriptsPathCandidates(env)) ?? FALLBACK_SCRIPTS_PATH;

  await writeTextFile(configPath, await renderStarterConfig(config, scriptsPath));

  const status: InitStatus = existed ? "overwritten" : "created";
  write(`${status === "created" ? "Created" : "Overwrote"} settings at ${configPath}`);
  write(`Edit ${DEFAULT_CONFIG_FILENAME} to set version requirements.`);
  write("Then run: statelift preflight");
  return { status, configPath };
}

export function renderStarterConfig(config: PipelineConfig, scriptsPath: string): Promise<string> {
  return renderTemplate("statelift-config", {
    org: config.org,
    bucket: config.bucket,
    region: config.region,
    profile: config.profile,
    lockTable: config.lockTable,
    branch: config.branch,
    scriptsPath,
    concurrency: config.concurrency,
    autoPublish: config.autoPublish,
  });
}

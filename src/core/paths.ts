import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// RUN ARTIFACTS
// =============================================================================

export function repositoryWorkDir(workDir: string, org: string, repo: string): string {
  return path.join(workDir, org, repo);
}

export function migrationLogPath(logDir: string, runId: string): string {
  return path.join(logDir, `migration-${runId}.jsonl`);
}

export function summaryPath(logDir: string, runId: string): string {
  return path.join(logDir, `summary-${runId}.json`);
}

export const DEFAULT_CONFIG_FILENAME = "statelift.yaml";

// =============================================================================
// STATE COPY SCRIPTS
// =============================================================================

export const STATE_COPY_SCRIPT = "copy_state.sh";
export const SCRIPTS_PATH_ENV = "PLATFORM_SCRIPTS_PATH";

export function scriptsPathCandidates(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string[] {
  const candidates: string[] = [];
  const fromEnv = env[SCRIPTS_PATH_ENV];
  if (fromEnv) candidates.push(path.resolve(fromEnv));

  candidates.push(
    path.join(home, "repos", "platform-scripts"),
    path.join(home, "source", "repos", "platform-scripts"),
    "/opt/platform-scripts",
    "/usr/local/platform-scripts",
  );
  return candidates;
}

// First candidate directory that contains the state copy script, or null.
export function discoverScriptsPath(candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    if (fs.existsSync(path.join(candidate, STATE_COPY_SCRIPT))) {
      return candidate;
    }
  }
  return null;
}

// =============================================================================
// PACKAGE ROOT
// =============================================================================

export function templatesDir(): string {
  return path.join(findPackageRoot(fileURLToPath(new URL(".", import.meta.url))), "templates");
}

// Walk upward until we find the package root so compiled builds resolve templates correctly.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving templates directory");
}

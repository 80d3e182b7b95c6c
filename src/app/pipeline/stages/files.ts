import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { StageContext } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileChange<T> = {
  file: string;
  changed: boolean;
  result: T;
};

export type FileSweep<T> = {
  // False when there is no checkout to inspect (dry-run before anything was cloned).
  inspected: boolean;
  files: Array<FileChange<T>>;
};

const IGNORED = ["**/.git/**", "**/.terraform/**", "**/node_modules/**"];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function listRepoFiles(
  repoPath: string,
  patterns: readonly string[],
): Promise<string[]> {
  const files = await fg([...patterns], {
    cwd: repoPath,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: IGNORED,
  });
  return files.sort();
}

/**
 * Runs a pure text transform over every matching file in the checkout.
 * Changed files are written back unless the run is a dry-run.
 */
export async function sweepFiles<T extends { text: string; changed: boolean }>(
  ctx: StageContext,
  patterns: readonly string[],
  transform: (text: string, file: string) => T,
): Promise<FileSweep<T>> {
  if (!(await fse.pathExists(ctx.repoPath))) {
    return { inspected: false, files: [] };
  }

  const files: Array<FileChange<T>> = [];
  for (const file of await listRepoFiles(ctx.repoPath, patterns)) {
    const absolute = path.join(ctx.repoPath, file);
    const original = await fse.readFile(absolute, "utf8");
    const result = transform(original, file);
    const changed = result.changed && result.text !== original;

    if (changed && !ctx.config.dryRun) {
      await fse.writeFile(absolute, result.text, "utf8");
    }
    files.push({ file, changed, result });
  }

  return { inspected: true, files };
}

export async function readRepoFiles(
  ctx: StageContext,
  patterns: readonly string[],
): Promise<Array<{ file: string; text: string }> | null> {
  if (!(await fse.pathExists(ctx.repoPath))) return null;

  const contents: Array<{ file: string; text: string }> = [];
  for (const file of await listRepoFiles(ctx.repoPath, patterns)) {
    contents.push({ file, text: await fse.readFile(path.join(ctx.repoPath, file), "utf8") });
  }
  return contents;
}

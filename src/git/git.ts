import {
  requireSuccess,
  runInScope,
  type CommandResult,
  type CommandScope,
} from "../core/command-runner.js";
import { GitError } from "../core/errors.js";

// =============================================================================
// CORE
// =============================================================================

export async function git(scope: CommandScope, args: string[]): Promise<CommandResult> {
  const res = await runInScope(scope, ["git", ...args]);
  return requireSuccess(res, scope.timeoutSeconds, (message, failed) => {
    const where = scope.cwd ?? ".";
    return new GitError(`git ${args[0] ?? ""} failed (cwd=${where}): ${message}`, failed);
  });
}

// =============================================================================
// OPERATIONS
// =============================================================================

export async function checkoutNewBranch(scope: CommandScope, branch: string): Promise<void> {
  await git(scope, ["checkout", "-b", branch]);
}

export async function stageAll(scope: CommandScope): Promise<void> {
  await git(scope, ["add", "-A"]);
}

// Paths with staged or unstaged changes; empty when the working tree is clean.
export async function changedPaths(scope: CommandScope): Promise<string[]> {
  const res = await git(scope, ["status", "--porcelain"]);
  return parsePorcelain(res.stdout);
}

export async function commit(scope: CommandScope, message: string): Promise<void> {
  await git(scope, ["commit", "-m", message]);
}

export async function pushBranch(scope: CommandScope, branch: string): Promise<void> {
  await git(scope, ["push", "-u", "origin", branch]);
}

// =============================================================================
// PARSING
// =============================================================================

export function parsePorcelain(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const entry = line.slice(3);
      // Renames are reported as "old -> new".
      const arrow = entry.indexOf(" -> ");
      return arrow === -1 ? entry : entry.slice(arrow + 4);
    });
}

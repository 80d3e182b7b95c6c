/**
 * GitHub CLI adapter for cloning repositories and managing migration pull requests.
 * Purpose: keep `gh` argv construction and JSON parsing in one place.
 * Assumptions: `gh` is authenticated out of band; this module never handles tokens.
 */

import { z } from "zod";

import { requireSuccess, runInScope, type CommandScope } from "../core/command-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type PullRequestInput = {
  title: string;
  body: string;
  head: string;
  base?: string;
};

const PullRequestListSchema = z.array(
  z.object({
    url: z.string().min(1),
    number: z.number().int().optional(),
  }),
);

// =============================================================================
// OPERATIONS
// =============================================================================

export async function cloneRepository(
  scope: CommandScope,
  org: string,
  repo: string,
  destination: string,
): Promise<void> {
  const res = await runInScope(scope, ["gh", "repo", "clone", `${org}/${repo}`, destination]);
  requireSuccess(res, scope.timeoutSeconds);
}

// URL of an open pull request for `branch`, or null when none exists.
export async function findOpenPullRequest(
  scope: CommandScope,
  branch: string,
): Promise<string | null> {
  const res = await runInScope(scope, [
    "gh",
    "pr",
    "list",
    "--head",
    branch,
    "--state",
    "open",
    "--json",
    "url,number",
  ]);
  requireSuccess(res, scope.timeoutSeconds);
  if (res.dryRun) return null;

  return parsePullRequestList(res.stdout)[0] ?? null;
}

export async function createPullRequest(
  scope: CommandScope,
  input: PullRequestInput,
): Promise<string | null> {
  const args = [
    "gh",
    "pr",
    "create",
    "--title",
    input.title,
    "--body",
    input.body,
    "--head",
    input.head,
  ];
  if (input.base) {
    args.push("--base", input.base);
  }

  const res = await runInScope(scope, args);
  requireSuccess(res, scope.timeoutSeconds);
  if (res.dryRun) return null;

  return extractPullRequestUrl(res.stdout);
}

// =============================================================================
// PARSING
// =============================================================================

export function parsePullRequestList(stdout: string): string[] {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`Unexpected gh pr list output: ${detail}`);
  }

  const parsed = PullRequestListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0]?.message ?? "invalid";
    throw new Error(`Unexpected gh pr list output: ${issue}`);
  }
  return parsed.data.map((pr) => pr.url);
}

// `gh pr create` prints the new pull request URL as its last line.
export function extractPullRequestUrl(stdout: string): string | null {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^https?:\/\/\S+$/.test(line));
  return lines[lines.length - 1] ?? null;
}

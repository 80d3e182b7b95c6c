/**
 * Input validation for anything that ends up in a subprocess argv or a filesystem path.
 * Purpose: reject malformed repository, org, branch and path inputs before any side effect.
 * Assumptions: names follow the hosting platform's grammar (GitHub-style org/repo names).
 * Usage: const check = validateTarget(target); if (!check.ok) skip(check.reasons).
 */

import path from "node:path";

import type { RepositoryTarget } from "../app/pipeline/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidationResult = { ok: true } | { ok: false; reasons: string[] };

export const RECOMMENDED_MAX_CONCURRENCY = 10;

// =============================================================================
// PATTERNS
// =============================================================================

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const SHELL_METACHARS = /[;&|`$<>()'"\\*?!{}\s]/;
const REPO_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,100}$/;
const ORG_NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,38})$/;
const REGION_PATTERN = /^[a-z]{2}(?:-gov)?-[a-z]+-\d+$/;
const BUCKET_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const LOCK_TABLE_PATTERN = /^[A-Za-z0-9_.-]{3,255}$/;
const PROFILE_PATTERN = /^[A-Za-z0-9_.+=@-]{1,128}$/;

// =============================================================================
// NAME CHECKS
// =============================================================================

export function describeRepoNameProblems(name: string): string[] {
  const problems: string[] = [];
  if (name.length === 0) return ["repository name is empty"];
  if (name.includes("..")) problems.push("contains a parent-directory segment (..)");
  if (CONTROL_CHARS.test(name)) problems.push("contains control characters");
  if (SHELL_METACHARS.test(name)) problems.push("contains shell metacharacters or whitespace");
  if (problems.length === 0 && (name === "." || !REPO_NAME_PATTERN.test(name))) {
    problems.push("does not match the allowed repository name grammar [A-Za-z0-9_.-]{1,100}");
  }
  return problems;
}

export function validateRepoName(name: string): boolean {
  return describeRepoNameProblems(name).length === 0;
}

export function validateOrgName(name: string): boolean {
  return ORG_NAME_PATTERN.test(name) && !name.endsWith("-") && !name.includes("--");
}

export function validateBranchName(name: string): boolean {
  if (name.length === 0 || name.length > 255) return false;
  if (CONTROL_CHARS.test(name)) return false;
  if (/[\s~^:?*[\\]/.test(name)) return false;
  if (name.includes("..") || name.includes("@{") || name.includes("//")) return false;
  if (name.startsWith("-") || name.startsWith("/") || name.endsWith("/")) return false;
  if (name.endsWith(".") || name.endsWith(".lock") || name === "@") return false;
  return name.split("/").every((segment) => !segment.startsWith("."));
}

export function validatePath(value: string): boolean {
  if (value.length === 0) return false;
  if (CONTROL_CHARS.test(value)) return false;
  return !value.split(/[\\/]+/).includes("..");
}

export function isPathInside(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative);
}

// =============================================================================
// PARAMETER CHECKS
// =============================================================================

export function validateBatchSize(size: number): boolean {
  return Number.isInteger(size) && size >= 1;
}

export function exceedsRecommendedConcurrency(size: number): boolean {
  return size > RECOMMENDED_MAX_CONCURRENCY;
}

export function validateTimeoutSeconds(seconds: number): boolean {
  return Number.isFinite(seconds) && seconds > 0 && seconds <= 24 * 60 * 60;
}

export function validateRegion(region: string): boolean {
  return REGION_PATTERN.test(region);
}

export function validateBucketName(bucket: string): boolean {
  if (!BUCKET_PATTERN.test(bucket)) return false;
  if (bucket.includes("..") || /^\d+\.\d+\.\d+\.\d+$/.test(bucket)) return false;
  return !bucket.startsWith("xn--");
}

export function validateLockTableName(name: string): boolean {
  return LOCK_TABLE_PATTERN.test(name);
}

export function validateProfileName(name: string): boolean {
  return PROFILE_PATTERN.test(name);
}

// =============================================================================
// TARGETS
// =============================================================================

export function validateTarget(target: RepositoryTarget): ValidationResult {
  const reasons: string[] = [];

  for (const problem of describeRepoNameProblems(target.repo)) {
    reasons.push(`repository "${target.repo}" ${problem}`);
  }
  if (!validateOrgName(target.org)) {
    reasons.push(`organization "${target.org}" is not a valid organization name`);
  }
  if (!validateBranchName(target.branch)) {
    reasons.push(`branch "${target.branch}" is not a valid branch name`);
  }

  return reasons.length === 0 ? { ok: true } : { ok: false, reasons };
}

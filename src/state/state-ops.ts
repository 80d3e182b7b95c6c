import path from "node:path";

import { requireSuccess, runInScope, type CommandScope } from "../core/command-runner.js";
import type { PipelineConfig } from "../core/config.js";
import { STATE_COPY_SCRIPT } from "../core/paths.js";
import { stateKeyFor } from "../transform/backend.js";

// =============================================================================
// TYPES
// =============================================================================

export type StateTarget = {
  org: string;
  repo: string;
  bucket: string;
  region: string;
  profile: string;
  lockTable: string;
  key: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function stateTargetFor(config: PipelineConfig, org: string, repo: string): StateTarget {
  return {
    org,
    repo,
    bucket: config.bucket,
    region: config.region,
    profile: config.profile,
    lockTable: config.lockTable,
    key: stateKeyFor({ org, repo }, config.org),
  };
}

export function stateLocation(target: Pick<StateTarget, "bucket" | "key">): string {
  return `s3://${target.bucket}/${target.key}`;
}

// Inputs for the copy script; it runs from inside the repository checkout.
export function stateCopyEnv(target: StateTarget): Record<string, string> {
  return {
    AWS_PROFILE: target.profile,
    AWS_REGION: target.region,
    STATELIFT_ORG: target.org,
    STATELIFT_REPO: target.repo,
    STATELIFT_BUCKET: target.bucket,
    STATELIFT_REGION: target.region,
    STATELIFT_STATE_KEY: target.key,
    STATELIFT_LOCK_TABLE: target.lockTable,
  };
}

export async function copyState(
  scope: CommandScope,
  scriptsPath: string,
  target: StateTarget,
): Promise<void> {
  const script = path.join(scriptsPath, STATE_COPY_SCRIPT);
  const res = await runInScope(scope, ["bash", script], { env: stateCopyEnv(target) });
  requireSuccess(res, scope.timeoutSeconds);
}

export async function verifyState(scope: CommandScope, target: StateTarget): Promise<void> {
  const res = await runInScope(scope, [
    "aws",
    "s3api",
    "head-object",
    "--bucket",
    target.bucket,
    "--key",
    target.key,
    "--profile",
    target.profile,
    "--region",
    target.region,
  ]);
  requireSuccess(res, scope.timeoutSeconds);
}

import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { deepFreeze } from "./utils.js";
import {
  validateBatchSize,
  validateBranchName,
  validateBucketName,
  validateLockTableName,
  validateOrgName,
  validatePath,
  validateProfileName,
  validateRegion,
  validateTimeoutSeconds,
} from "./validation.js";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULTS = {
  org: "your-org",
  bucket: "your-org-tfstate-bucket",
  region: "us-east-1",
  profile: "default",
  lockTable: "terraform-state-lock",
  branch: "migrate-to-s3-backend",
  workDir: "migration_work",
  logDir: "migration_logs",
  concurrency: 1,
  timeoutSeconds: 300,
  stateCopyTimeoutSeconds: 600,
} as const;

export const DEFAULT_PROPOSAL_TITLE = "Migrate Terraform backend from Cloud to S3";

// =============================================================================
// FILE SCHEMA
// =============================================================================

const VersionRequirementSchema = z
  .object({
    min: z.string().min(1).optional(),
    max: z.string().min(1).optional(),
  })
  .strict();

export type VersionRequirement = z.infer<typeof VersionRequirementSchema>;

const BackendSchema = z
  .object({
    // "fail": a repository with no hosted-backend block is treated as malformed.
    // "skip": the stage becomes a no-op so already-migrated repositories pass through.
    on_missing: z.enum(["fail", "skip"]).default("fail"),
    files: z.array(z.string().min(1)).min(1).default(["*.tf"]),
  })
  .strict();

const ModulesSchema = z
  .object({
    registry_host: z.string().min(1).default("app.terraform.io"),
    vcs_host: z.string().min(1).default("github.com"),
    repo_name_template: z.string().min(1).default("terraform-{{provider}}-{{name}}"),
    default_ref: z.string().min(1).default("main"),
  })
  .strict();

const VersionsSchema = z
  .object({
    required: z.record(VersionRequirementSchema).default({}),
    allow_prerelease: z.boolean().default(true),
  })
  .strict();

const WorkflowsSchema = z
  .object({
    env_var: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
      .default("GITHUB_TOKEN"),
    secret_name: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
      .default("GH_READACCESS_PAT"),
  })
  .strict();

const ProposalSchema = z
  .object({
    title: z.string().min(1).default(DEFAULT_PROPOSAL_TITLE),
    commit_message: z.string().min(1).default(DEFAULT_PROPOSAL_TITLE),
    base_branch: z.string().min(1).optional(),
  })
  .strict();

export const MigrationFileConfigSchema = z
  .object({
    org: z.string().min(1).optional(),
    bucket: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    lock_table: z.string().min(1).optional(),
    branch: z.string().min(1).optional(),
    work_dir: z.string().min(1).optional(),
    log_dir: z.string().min(1).optional(),
    scripts_path: z.string().min(1).optional(),
    concurrency: z.number().int().positive().optional(),
    timeout_seconds: z.number().positive().optional(),
    state_copy_timeout_seconds: z.number().positive().optional(),
    auto_publish: z.boolean().optional(),

    backend: BackendSchema.default({}),
    modules: ModulesSchema.default({}),
    versions: VersionsSchema.default({}),
    workflows: WorkflowsSchema.default({}),
    proposal: ProposalSchema.default({}),
  })
  .strict();

export type MigrationFileConfig = z.infer<typeof MigrationFileConfigSchema>;

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

export type BackendMissingPolicy = "fail" | "skip";

export type PipelineConfig = Readonly<{
  org: string;
  bucket: string;
  region: string;
  profile: string;
  lockTable: string;
  branch: string;
  workDir: string;
  logDir: string;
  scriptsPath: string | null;
  dryRun: boolean;
  skipVersionCheck: boolean;
  skipValidation: boolean;
  autoPublish: boolean;
  verbose: boolean;
  timeoutSeconds: number;
  stateCopyTimeoutSeconds: number;
  concurrency: number;
  backend: Readonly<{ onMissing: BackendMissingPolicy; files: readonly string[] }>;
  modules: Readonly<{
    registryHost: string;
    vcsHost: string;
    repoNameTemplate: string;
    defaultRef: string;
  }>;
  versions: Readonly<{
    required: Readonly<Record<string, Readonly<VersionRequirement>>>;
    allowPrerelease: boolean;
  }>;
  workflows: Readonly<{ envVar: string; secretName: string }>;
  proposal: Readonly<{ title: string; commitMessage: string; baseBranch?: string }>;
}>;

export type PipelineOverrides = {
  org?: string;
  bucket?: string;
  region?: string;
  profile?: string;
  lockTable?: string;
  branch?: string;
  workDir?: string;
  logDir?: string;
  scriptsPath?: string | null;
  concurrency?: number;
  timeoutSeconds?: number;
  dryRun?: boolean;
  skipVersionCheck?: boolean;
  skipValidation?: boolean;
  autoPublish?: boolean;
  allowMigrated?: boolean;
  verbose?: boolean;
};

export function resolvePipelineConfig(input: {
  file?: MigrationFileConfig;
  overrides?: PipelineOverrides;
  cwd?: string;
}): PipelineConfig {
  const file = input.file ?? MigrationFileConfigSchema.parse({});
  const overrides = input.overrides ?? {};
  const cwd = input.cwd ?? process.cwd();

  const workDir = overrides.workDir ?? file.work_dir ?? DEFAULTS.workDir;
  const logDir = overrides.logDir ?? file.log_dir ?? DEFAULTS.logDir;
  const scriptsPath = overrides.scriptsPath ?? file.scripts_path ?? null;

  const config: PipelineConfig = {
    org: overrides.org ?? file.org ?? DEFAULTS.org,
    bucket: overrides.bucket ?? file.bucket ?? DEFAULTS.bucket,
    region: overrides.region ?? file.region ?? DEFAULTS.region,
    profile: overrides.profile ?? file.profile ?? DEFAULTS.profile,
    lockTable: overrides.lockTable ?? file.lock_table ?? DEFAULTS.lockTable,
    branch: overrides.branch ?? file.branch ?? DEFAULTS.branch,
    workDir: path.resolve(cwd, workDir),
    logDir: path.resolve(cwd, logDir),
    scriptsPath: scriptsPath === null ? null : path.resolve(cwd, scriptsPath),
    dryRun: overrides.dryRun ?? false,
    skipVersionCheck: overrides.skipVersionCheck ?? false,
    skipValidation: overrides.skipValidation ?? false,
    autoPublish: overrides.autoPublish ?? file.auto_publish ?? false,
    verbose: overrides.verbose ?? false,
    timeoutSeconds: overrides.timeoutSeconds ?? file.timeout_seconds ?? DEFAULTS.timeoutSeconds,
    stateCopyTimeoutSeconds: file.state_copy_timeout_seconds ?? DEFAULTS.stateCopyTimeoutSeconds,
    concurrency: overrides.concurrency ?? file.concurrency ?? DEFAULTS.concurrency,
    backend: {
      onMissing: overrides.allowMigrated ? "skip" : file.backend.on_missing,
      files: [...file.backend.files],
    },
    modules: {
      registryHost: file.modules.registry_host,
      vcsHost: file.modules.vcs_host,
      repoNameTemplate: file.modules.repo_name_template,
      defaultRef: file.modules.default_ref,
    },
    versions: {
      required: { ...file.versions.required },
      allowPrerelease: file.versions.allow_prerelease,
    },
    workflows: {
      envVar: file.workflows.env_var,
      secretName: file.workflows.secret_name,
    },
    proposal: {
      title: file.proposal.title,
      commitMessage: file.proposal.commit_message,
      ...(file.proposal.base_branch ? { baseBranch: file.proposal.base_branch } : {}),
    },
  };

  const problems = describeConfigProblems(config);
  if (problems.length > 0) {
    const details = problems.map((problem) => `- ${problem}`).join("\n");
    throw new ConfigError(`Invalid migration settings:\n${details}`);
  }

  return deepFreeze(config);
}

export function describeConfigProblems(config: PipelineConfig): string[] {
  const problems: string[] = [];

  if (!validateOrgName(config.org)) problems.push(`org "${config.org}" is not a valid name`);
  if (!validateBucketName(config.bucket)) {
    problems.push(`bucket "${config.bucket}" is not a valid S3 bucket name`);
  }
  if (!validateRegion(config.region)) problems.push(`region "${config.region}" is not valid`);
  if (!validateProfileName(config.profile)) {
    problems.push(`profile "${config.profile}" is not a valid profile name`);
  }
  if (!validateLockTableName(config.lockTable)) {
    problems.push(`lock table "${config.lockTable}" is not a valid table name`);
  }
  if (!validateBranchName(config.branch)) {
    problems.push(`branch "${config.branch}" is not a valid branch name`);
  }
  if (!validateBatchSize(config.concurrency)) {
    problems.push(`concurrency must be an integer >= 1 (got ${config.concurrency})`);
  }
  if (!validateTimeoutSeconds(config.timeoutSeconds)) {
    problems.push(`timeout must be a positive number of seconds (got ${config.timeoutSeconds})`);
  }
  if (!validateTimeoutSeconds(config.stateCopyTimeoutSeconds)) {
    problems.push(`state copy timeout must be positive (got ${config.stateCopyTimeoutSeconds})`);
  }
  for (const [label, value] of [
    ["work dir", config.workDir],
    ["log dir", config.logDir],
    ["scripts path", config.scriptsPath ?? "."],
  ] as const) {
    if (!validatePath(value)) problems.push(`${label} "${value}" is not a safe path`);
  }

  return problems;
}

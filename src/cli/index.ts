import { Command, InvalidArgumentError } from "commander";

import { DEFAULTS } from "../core/config.js";

import { initCommand, type InitCliOptions } from "./init.js";
import { migrateCommand, type MigrateCliOptions } from "./migrate.js";
import { preflightCommand, type PreflightCliOptions } from "./preflight.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("statelift")
    .description("Migrate Terraform repositories from Terraform Cloud to an S3 state backend")
    .version("0.1.0");

  program
    .command("migrate")
    .description("Migrate a batch of repositories and open a pull request for each")
    .option("--repos <list>", "Comma-separated repositories (repo or org/repo)")
    .option("--repos-file <path>", "File with one repository per line (# starts a comment)")
    .option("--config <path>", "Settings file (default: ./statelift.yaml when present)")
    .option("--org <name>", `Organization for bare repository names (default: ${DEFAULTS.org})`)
    .option("--bucket <name>", `S3 bucket for state (default: ${DEFAULTS.bucket})`)
    .option("--region <name>", `AWS region (default: ${DEFAULTS.region})`)
    .option("--profile <name>", `AWS profile (default: ${DEFAULTS.profile})`)
    .option("--lock-table <name>", `DynamoDB lock table (default: ${DEFAULTS.lockTable})`)
    .option("--branch <name>", `Migration branch (default: ${DEFAULTS.branch})`)
    .option("--concurrency <n>", "Repositories migrated at once (default: 1)", parsePositiveInt)
    .option("--work-dir <path>", `Checkout directory (default: ./${DEFAULTS.workDir})`)
    .option("--log-dir <path>", `Log directory (default: ./${DEFAULTS.logDir})`)
    .option("--scripts-path <path>", "Directory containing copy_state.sh")
    .option("--timeout <seconds>", "Per-command timeout (default: 300)", parsePositiveInt)
    .option("--dry-run", "Report what would change without touching anything", false)
    .option("--skip-version-check", "Do not enforce module version requirements", false)
    .option("--skip-validation", "Continue even when environment pre-flight fails", false)
    .option("--auto-publish", "Open pull requests without asking", false)
    .option("--allow-migrated", "Skip the backend rewrite when no Cloud block is present", false)
    .option("-v, --verbose", "Print stage results and commands", false)
    .option("--debug", "Print stack traces for errors", false)
    .action(async (opts: MigrateCliOptions) => {
      const result = await migrateCommand(opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("preflight")
    .description("Check that git, gh, aws, bash and copy_state.sh are available")
    .option("--config <path>", "Settings file (default: ./statelift.yaml when present)")
    .option("--profile <name>", "AWS profile to verify")
    .option("--scripts-path <path>", "Directory containing copy_state.sh")
    .option("--concurrency <n>", "Planned concurrency", parsePositiveInt)
    .option("--debug", "Print stack traces for errors", false)
    .action(async (opts: PreflightCliOptions) => {
      const result = await preflightCommand(opts);
      process.exitCode = result.exitCode;
    });

  program
    .command("init")
    .description("Write a starter statelift.yaml in the current directory")
    .option("--force", "Overwrite an existing statelift.yaml", false)
    .option("--org <name>", "Organization")
    .option("--bucket <name>", "S3 bucket for state")
    .option("--region <name>", "AWS region")
    .option("--profile <name>", "AWS profile")
    .option("--lock-table <name>", "DynamoDB lock table")
    .option("--branch <name>", "Migration branch")
    .option("--scripts-path <path>", "Directory containing copy_state.sh")
    .option("--debug", "Print stack traces for errors", false)
    .action(async (opts: InitCliOptions) => {
      await initCommand(opts);
    });

  return program;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

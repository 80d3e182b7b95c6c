import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  DEFAULTS,
  DEFAULT_PROPOSAL_TITLE,
  MigrationFileConfigSchema,
  resolvePipelineConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

const CWD = "/srv/migrations";

describe("resolvePipelineConfig", () => {
  it("falls back to defaults", () => {
    const config = resolvePipelineConfig({ cwd: CWD });

    expect(config.org).toBe(DEFAULTS.org);
    expect(config.bucket).toBe(DEFAULTS.bucket);
    expect(config.branch).toBe("migrate-to-s3-backend");
    expect(config.workDir).toBe(path.join(CWD, "migration_work"));
    expect(config.logDir).toBe(path.join(CWD, "migration_logs"));
    expect(config.scriptsPath).toBeNull();
    expect(config.concurrency).toBe(1);
    expect(config.timeoutSeconds).toBe(300);
    expect(config.stateCopyTimeoutSeconds).toBe(600);
    expect(config.backend).toEqual({ onMissing: "fail", files: ["*.tf"] });
    expect(config.modules).toEqual({
      registryHost: "app.terraform.io",
      vcsHost: "github.com",
      repoNameTemplate: "terraform-{{provider}}-{{name}}",
      defaultRef: "main",
    });
    expect(config.workflows).toEqual({ envVar: "GITHUB_TOKEN", secretName: "GH_READACCESS_PAT" });
    expect(config.proposal).toEqual({
      title: DEFAULT_PROPOSAL_TITLE,
      commitMessage: DEFAULT_PROPOSAL_TITLE,
    });
    expect(Object.isFrozen(config.backend)).toBe(true);
  });

  it("lets flags win over the file and the file win over defaults", () => {
    const file = MigrationFileConfigSchema.parse({
      org: "file-org",
      bucket: "file-bucket",
      region: "eu-west-1",
      concurrency: 4,
      auto_publish: true,
      backend: { on_missing: "fail" },
      proposal: { base_branch: "develop" },
    });

    const config = resolvePipelineConfig({
      file,
      overrides: { org: "flag-org", concurrency: 2, allowMigrated: true },
      cwd: CWD,
    });

    expect(config.org).toBe("flag-org");
    expect(config.bucket).toBe("file-bucket");
    expect(config.region).toBe("eu-west-1");
    expect(config.concurrency).toBe(2);
    expect(config.autoPublish).toBe(true);
    expect(config.backend.onMissing).toBe("skip");
    expect(config.proposal.baseBranch).toBe("develop");
  });

  it("resolves relative paths against the working directory", () => {
    const config = resolvePipelineConfig({
      overrides: { workDir: "work", scriptsPath: "../scripts" },
      cwd: CWD,
    });

    expect(config.workDir).toBe("/srv/migrations/work");
    expect(config.scriptsPath).toBe("/srv/scripts");
  });

  it("lists every invalid setting", () => {
    let caught: unknown;
    try {
      resolvePipelineConfig({
        overrides: { bucket: "Bad_Bucket", region: "nowhere", concurrency: 0 },
        cwd: CWD,
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof Error ? caught.message : "").toBe(
      [
        "Invalid migration settings:",
        '- bucket "Bad_Bucket" is not a valid S3 bucket name',
        '- region "nowhere" is not valid',
        "- concurrency must be an integer >= 1 (got 0)",
      ].join("\n"),
    );
  });
});

describe("MigrationFileConfigSchema", () => {
  it("rejects unknown keys", () => {
    expect(MigrationFileConfigSchema.safeParse({ orgs: "acme" }).success).toBe(false);
  });

  it("rejects workflow names that are not identifiers", () => {
    const parsed = MigrationFileConfigSchema.safeParse({ workflows: { env_var: "1TOKEN" } });
    expect(parsed.success).toBe(false);
  });
});

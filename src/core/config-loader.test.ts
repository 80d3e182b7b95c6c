import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTempDir } from "../__tests__/helpers/fakes.js";

import { discoverMigrationConfig, loadMigrationConfig } from "./config-loader.js";
import { ConfigError, UserFacingError } from "./errors.js";

function writeConfig(contents: string, name = "statelift.yaml"): string {
  const dir = makeTempDir();
  const configPath = path.join(dir, name);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function loadError(configPath: string, env: NodeJS.ProcessEnv = {}): unknown {
  try {
    loadMigrationConfig(configPath, env);
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("loadMigrationConfig", () => {
  it("expands environment variables and resolves paths beside the file", () => {
    const configPath = writeConfig(
      [
        "org: ${ORG_NAME}",
        "scripts_path: ./scripts",
        "versions:",
        "  required:",
        "    vpc:",
        '      min: "2.0.0"',
      ].join("\n"),
    );

    const config = loadMigrationConfig(configPath, { ORG_NAME: "acme" });

    expect(config.org).toBe("acme");
    expect(config.scripts_path).toBe(path.join(path.dirname(configPath), "scripts"));
    expect(config.versions.required).toEqual({ vpc: { min: "2.0.0" } });
  });

  it("treats an empty file as all defaults", () => {
    const config = loadMigrationConfig(writeConfig(""), {});

    expect(config.backend).toEqual({ on_missing: "fail", files: ["*.tf"] });
    expect(config.org).toBeUndefined();
  });

  it("reports a missing file with a hint", () => {
    const missing = path.join(makeTempDir(), "statelift.yaml");
    const err = loadError(missing);

    expect(err).toBeInstanceOf(UserFacingError);
    expect(err).toMatchObject({
      title: "Migration config missing.",
      message: `Migration config not found at ${missing}.`,
    });
  });

  it("wraps schema problems in a user-facing error", () => {
    const configPath = writeConfig("concurrency: many\nbackend:\n  on_missing: ignore\n");
    const err = loadError(configPath);

    expect(err).toBeInstanceOf(UserFacingError);
    const cause = err instanceof UserFacingError ? err.cause : undefined;
    expect(cause).toBeInstanceOf(ConfigError);
    expect(cause instanceof Error ? cause.message : "").toBe(
      [
        `Invalid migration config at ${configPath}:`,
        "concurrency: Expected number, received string",
        'backend.on_missing: Expected one of "fail", "skip", received "ignore"',
      ].join("\n"),
    );
  });

  it("names unset environment variables", () => {
    const configPath = writeConfig("bucket: ${BUCKET_NAME}\n");
    const err = loadError(configPath);
    const cause = err instanceof UserFacingError ? err.cause : undefined;

    expect(cause instanceof Error ? cause.message : "").toBe(
      `Environment variable BUCKET_NAME is not set but is referenced in ${configPath} (bucket).`,
    );
  });

  it("points at the line of a YAML syntax error", () => {
    const configPath = writeConfig("org: acme\nbucket: [unclosed\n");
    const err = loadError(configPath);
    const cause = err instanceof UserFacingError ? err.cause : undefined;

    expect(cause instanceof Error ? cause.message : "").toMatch(
      /^Failed to parse YAML config at .*statelift\.yaml \(line \d+, column \d+\): /,
    );
  });
});

describe("discoverMigrationConfig", () => {
  it("uses statelift.yaml in the working directory when present", () => {
    const configPath = writeConfig("org: acme\n");
    const cwd = path.dirname(configPath);

    expect(discoverMigrationConfig(undefined, cwd, {})).toMatchObject({
      configPath,
      config: { org: "acme" },
    });
  });

  it("falls back to defaults without a file", () => {
    const loaded = discoverMigrationConfig(undefined, makeTempDir(), {});

    expect(loaded.configPath).toBeNull();
    expect(loaded.config.org).toBeUndefined();
  });

  it("resolves an explicit path against the working directory", () => {
    const configPath = writeConfig("org: acme\n", "custom.yaml");

    expect(
      discoverMigrationConfig("custom.yaml", path.dirname(configPath), {}).configPath,
    ).toBe(configPath);
  });
});

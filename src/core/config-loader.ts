import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { MigrationFileConfigSchema, type MigrationFileConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { DEFAULT_CONFIG_FILENAME } from "./paths.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

const ENV_REFERENCE = /\$\{([A-Z0-9_]+)\}/gi;

// Replaces ${NAME} in every string leaf; `at` is the dotted key path used in errors.
function expandEnvReferences(
  node: unknown,
  env: NodeJS.ProcessEnv,
  file: string,
  at: readonly string[] = [],
): unknown {
  if (typeof node === "string") {
    return node.replace(ENV_REFERENCE, (_reference, name: string) => {
      const resolved = env[name];
      if (resolved !== undefined) return resolved;
      const where = at.length > 0 ? at.join(".") : "<root>";
      throw new ConfigError(
        `Environment variable ${name} is not set but is referenced in ${file} (${where}).`,
      );
    });
  }

  if (Array.isArray(node)) {
    return node.map((item: unknown, index) =>
      expandEnvReferences(item, env, file, [...at, String(index)]),
    );
  }

  if (node !== null && typeof node === "object") {
    const expanded: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(node)) {
      expanded[key] = expandEnvReferences(child, env, file, [...at, key]);
    }
    return expanded;
  }

  return node;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Run `statelift init` to create one, or drop --config to use defaults.";
const INVALID_CONFIG_HINT =
  "Fix the config file and rerun. For a fresh config, run `statelift init --force`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issuePath(issue)}: ${describeIssue(issue)}`).join("\n");
}

function issuePath(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join(".") : "<root>";
}

function describeIssue(issue: ZodIssue): string {
  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}`;
    case "invalid_enum_value": {
      const allowed = issue.options.map((option) => JSON.stringify(option)).join(", ");
      return `Expected one of ${allowed}, received ${JSON.stringify(issue.received)}`;
    }
    case "unrecognized_keys":
      return `Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return issue.message;
  }
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Migration config missing.",
    message: `Migration config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Migration config invalid.",
    message: `Migration config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadedConfig = {
  config: MigrationFileConfig;
  configPath: string | null;
};

export function loadMigrationConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): MigrationFileConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read migration config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    // An empty file is a valid config that keeps every default.
    const expanded = expandEnvReferences(doc ?? {}, env, absolutePath);

    const parsed = MigrationFileConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(
        `Invalid migration config at ${absolutePath}:\n${details}`,
        parsed.error,
      );
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    // Relative paths are resolved against the config directory, not the shell's cwd.
    return {
      ...cfg,
      ...(cfg.work_dir ? { work_dir: path.resolve(configDir, cfg.work_dir) } : {}),
      ...(cfg.log_dir ? { log_dir: path.resolve(configDir, cfg.log_dir) } : {}),
      ...(cfg.scripts_path ? { scripts_path: path.resolve(configDir, cfg.scripts_path) } : {}),
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

// Explicit path wins; otherwise ./statelift.yaml when present; otherwise defaults only.
export function discoverMigrationConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
  if (explicitPath) {
    const configPath = path.resolve(cwd, explicitPath);
    return { config: loadMigrationConfig(configPath, env), configPath };
  }

  const implicitPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(implicitPath)) {
    return { config: loadMigrationConfig(implicitPath, env), configPath: implicitPath };
  }

  return { config: MigrationFileConfigSchema.parse({}), configPath: null };
}

import yaml from "js-yaml";

// =============================================================================
// TYPES
// =============================================================================

export type WorkflowSecretSettings = {
  envVar: string;
  secretName: string;
};

export type WorkflowRewrite = {
  text: string;
  changed: boolean;
  // Why an applicable file was left alone.
  reason?: string;
};

const TOP_LEVEL_ENV = /^env:[ \t]*(?:#.*)?\r?$/m;
const TOP_LEVEL_ENV_ANY = /^env:/m;
const TOP_LEVEL_JOBS = /^jobs:/m;

// =============================================================================
// PUBLIC API
// =============================================================================

export function secretExpression(secretName: string): string {
  return `\${{ secrets.${secretName} }}`;
}

export function isTerraformWorkflow(text: string): boolean {
  return /terraform/i.test(text);
}

// Adds `<envVar>: ${{ secrets.<secretName> }}` to the workflow's top-level env map.
export function injectWorkflowSecret(
  text: string,
  settings: WorkflowSecretSettings,
): WorkflowRewrite {
  if (!isTerraformWorkflow(text)) {
    return { text, changed: false };
  }
  if (text.includes(`secrets.${settings.secretName}`)) {
    return { text, changed: false };
  }

  const doc = parseWorkflow(text);
  if (doc === null) {
    return { text, changed: false, reason: "workflow is not a valid YAML mapping" };
  }

  const existingEnv = doc.env;
  if (isRecord(existingEnv) && settings.envVar in existingEnv) {
    return {
      text,
      changed: false,
      reason: `top-level env already defines ${settings.envVar}`,
    };
  }

  const entry = `${settings.envVar}: ${secretExpression(settings.secretName)}`;
  const candidate = insertEnvEntry(text, entry);
  if (candidate === null) {
    return { text, changed: false, reason: "top-level env is not a block mapping" };
  }

  const verified = parseWorkflow(candidate);
  const env = verified?.env;
  if (!isRecord(env) || env[settings.envVar] !== secretExpression(settings.secretName)) {
    return { text, changed: false, reason: "edited workflow did not parse as expected" };
  }

  return { text: candidate, changed: true };
}

// =============================================================================
// INTERNALS
// =============================================================================

function insertEnvEntry(text: string, entry: string): string | null {
  const newline = text.includes("\r\n") ? "\r\n" : "\n";

  const envMatch = TOP_LEVEL_ENV.exec(text);
  if (envMatch) {
    const lineEnd = envMatch.index + envMatch[0].length;
    const indent = firstChildIndent(text, lineEnd) ?? "  ";
    return `${text.slice(0, lineEnd)}${newline}${indent}${entry}${text.slice(lineEnd)}`;
  }

  // `env: {...}` or `env: ~` style; leave those to a human.
  if (TOP_LEVEL_ENV_ANY.test(text)) {
    return null;
  }

  const block = `env:${newline}  ${entry}${newline}${newline}`;
  const jobsMatch = TOP_LEVEL_JOBS.exec(text);
  if (jobsMatch) {
    return `${text.slice(0, jobsMatch.index)}${block}${text.slice(jobsMatch.index)}`;
  }

  const separator = text.length === 0 || text.endsWith("\n") ? "" : newline;
  return `${text}${separator}${block.trimEnd()}${newline}`;
}

// Indentation of the first non-blank, non-comment line after `from`, if it is indented.
function firstChildIndent(text: string, from: number): string | null {
  for (const line of text.slice(from).split(/\r?\n/)) {
    if (line.trim().length === 0 || line.trim().startsWith("#")) continue;
    const indent = /^[ \t]+/.exec(line)?.[0];
    return indent ?? null;
  }
  return null;
}

function parseWorkflow(text: string): Record<string, unknown> | null {
  try {
    const doc: unknown = yaml.load(text);
    return isRecord(doc) ? doc : null;
  } catch (err) {
    if (err instanceof yaml.YAMLException) return null;
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

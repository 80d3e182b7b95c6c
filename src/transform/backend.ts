import { applyEdits, buildCodeMask, findBlocks, hclString, type TextEdit } from "./hcl-scanner.js";

// =============================================================================
// TYPES
// =============================================================================

export type S3BackendSettings = {
  bucket: string;
  key: string;
  region: string;
  lockTable: string;
};

export type BackendRewrite = {
  text: string;
  changed: boolean;
  // Number of hosted-backend blocks replaced.
  replaced: number;
};

// `cloud {` or `backend "remote" {` at the start of a line.
const HOSTED_BACKEND_HEADER = /^([ \t]*)(cloud|backend[ \t]+"remote")[ \t]*\{/gm;
const S3_BACKEND_HEADER = /^([ \t]*)backend[ \t]+"s3"[ \t]*\{/gm;

const KEY_WIDTH = "dynamodb_table".length;

// =============================================================================
// PUBLIC API
// =============================================================================

export function rewriteBackend(text: string, settings: S3BackendSettings): BackendRewrite {
  const mask = buildCodeMask(text);
  const blocks = findBlocks(text, HOSTED_BACKEND_HEADER, mask);
  if (blocks.length === 0) {
    return { text, changed: false, replaced: 0 };
  }

  const edits: TextEdit[] = blocks.map((block) => ({
    start: block.lineStart,
    end: block.end,
    replacement: renderS3Backend(block.indent, settings),
  }));

  const rewritten = applyEdits(text, edits);
  return { text: rewritten, changed: rewritten !== text, replaced: blocks.length };
}

export function hasS3Backend(text: string): boolean {
  return findBlocks(text, S3_BACKEND_HEADER).length > 0;
}

// Repositories outside the default organization get the organization as a key prefix,
// so `a/infra` and `b/infra` never share a state object.
export function stateKeyFor(
  target: { org: string; repo: string },
  defaultOrg: string,
): string {
  const prefix = target.org === defaultOrg ? "" : `${target.org}/`;
  return `${prefix}${target.repo}/terraform.tfstate`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderS3Backend(indent: string, settings: S3BackendSettings): string {
  const inner = `${indent}  `;
  const attributes: Array<[string, string]> = [
    ["bucket", hclString(settings.bucket)],
    ["key", hclString(settings.key)],
    ["region", hclString(settings.region)],
    ["dynamodb_table", hclString(settings.lockTable)],
    ["encrypt", "true"],
  ];

  return [
    `${indent}backend "s3" {`,
    ...attributes.map(([name, value]) => `${inner}${name.padEnd(KEY_WIDTH)} = ${value}`),
    `${indent}}`,
  ].join("\n");
}

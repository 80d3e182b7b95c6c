/**
 * Module source conversion from a private registry to direct VCS references.
 * Purpose: rewrite `<registry>/<ns>/<name>/<provider>` sources to pinned `git::https://` URLs.
 * Assumptions: one `source`/`version` attribute per line at the top level of a `module` block;
 * anything nested deeper (maps, dynamic blocks) is never touched.
 * Usage: const res = rewriteModuleSources(text, "acme", options);
 */

import { renderInline } from "../core/templates.js";

import {
  applyEdits,
  bodyLines,
  buildCodeMask,
  findBlocks,
  hclString,
  type TextEdit,
} from "./hcl-scanner.js";

// =============================================================================
// TYPES
// =============================================================================

export type ModuleAttribute = {
  value: string;
  // Span of the whole line, including its trailing newline.
  lineStart: number;
  lineEnd: number;
  // Span of the quoted value, including quotes.
  valueStart: number;
  valueEnd: number;
};

export type ModuleBlock = {
  label: string;
  source: ModuleAttribute | null;
  version: ModuleAttribute | null;
};

export type RegistrySource = {
  namespace: string;
  name: string;
  provider: string;
  subdir: string;
};

export type ModuleSourceOptions = {
  registryHost: string;
  vcsHost: string;
  repoNameTemplate: string;
  defaultRef: string;
};

export type ConvertedModule = {
  module: string;
  from: string;
  to: string;
};

export type UnconvertedModule = {
  module: string;
  source: string;
  version: string;
  reason: string;
};

export type ModuleSourceRewrite = {
  text: string;
  changedCount: number;
  converted: ConvertedModule[];
  unconverted: UnconvertedModule[];
};

export const DEFAULT_MODULE_SOURCE_OPTIONS: ModuleSourceOptions = {
  registryHost: "app.terraform.io",
  vcsHost: "github.com",
  repoNameTemplate: "terraform-{{provider}}-{{name}}",
  defaultRef: "main",
};

const MODULE_HEADER = /^([ \t]*)module[ \t]+"([^"]+)"[ \t]*\{/gm;
const ATTRIBUTE_LINE =
  /^[ \t]*(source|version)[ \t]*=[ \t]*("(?:[^"\\]|\\.)*")[ \t]*(?:(?:#|\/\/).*)?\r?$/;

// =============================================================================
// SCANNING
// =============================================================================

export function findModuleBlocks(text: string): ModuleBlock[] {
  const mask = buildCodeMask(text);
  return findBlocks(text, MODULE_HEADER, mask).map((block) => {
    const result: ModuleBlock = { label: block.groups[0] ?? "", source: null, version: null };

    for (const line of bodyLines(text, mask, block)) {
      if (line.depth !== 0) continue;
      const match = ATTRIBUTE_LINE.exec(line.text);
      if (!match) continue;

      const [, name, quoted] = match;
      if (!name || !quoted) continue;
      const offset = line.text.indexOf(quoted, line.text.indexOf("="));
      const attribute: ModuleAttribute = {
        value: unquote(quoted),
        lineStart: line.start,
        lineEnd: text[line.end] === "\n" ? line.end + 1 : line.end,
        valueStart: line.start + offset,
        valueEnd: line.start + offset + quoted.length,
      };
      if (name === "source" && !result.source) result.source = attribute;
      if (name === "version" && !result.version) result.version = attribute;
    }

    return result;
  });
}

export function parseRegistrySource(source: string, registryHost: string): RegistrySource | null {
  const pattern = new RegExp(
    `^${escapeRegExp(registryHost)}/([A-Za-z0-9_-]+)/([A-Za-z0-9_-]+)/([A-Za-z0-9_-]+)(//[^?]*)?$`,
  );
  const match = pattern.exec(source);
  if (!match) return null;
  const [, namespace = "", name = "", provider = "", subdir = ""] = match;
  return { namespace, name, provider, subdir };
}

export type ParsedConstraint =
  | { kind: "pinned"; version: string }
  | { kind: "range"; reason: string };

// Single-version constraints pin a ref; anything describing a range cannot.
export function parseVersionConstraint(constraint: string): ParsedConstraint {
  const trimmed = constraint.trim();
  if (trimmed.includes(",")) {
    return { kind: "range", reason: `"${trimmed}" combines several constraints` };
  }
  const match = /^(=|~>|>=)?[ \t]*v?(\d+(?:\.\d+)*(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)$/.exec(
    trimmed,
  );
  if (!match?.[2]) {
    return { kind: "range", reason: `"${trimmed}" is not a single-version constraint` };
  }
  return { kind: "pinned", version: match[2] };
}

// =============================================================================
// REWRITE
// =============================================================================

export function rewriteModuleSources(
  text: string,
  org: string,
  options: ModuleSourceOptions = DEFAULT_MODULE_SOURCE_OPTIONS,
): ModuleSourceRewrite {
  const edits: TextEdit[] = [];
  const converted: ConvertedModule[] = [];
  const unconverted: UnconvertedModule[] = [];

  for (const block of findModuleBlocks(text)) {
    if (!block.source) continue;
    const registry = parseRegistrySource(block.source.value, options.registryHost);
    if (!registry) continue;

    let ref = options.defaultRef;
    if (block.version) {
      const constraint = parseVersionConstraint(block.version.value);
      if (constraint.kind === "range") {
        unconverted.push({
          module: block.label,
          source: block.source.value,
          version: block.version.value,
          reason: constraint.reason,
        });
        continue;
      }
      ref = `v${constraint.version}`;
    }

    const repoName = renderInline(options.repoNameTemplate, {
      provider: registry.provider,
      name: registry.name,
      namespace: registry.namespace,
    });
    const repoUrl = `https://${options.vcsHost}/${org}/${repoName}`;
    const target = `git::${repoUrl}${registry.subdir}?ref=${ref}`;

    edits.push({
      start: block.source.valueStart,
      end: block.source.valueEnd,
      replacement: hclString(target),
    });
    if (block.version) {
      edits.push({ start: block.version.lineStart, end: block.version.lineEnd, replacement: "" });
    }
    converted.push({ module: block.label, from: block.source.value, to: target });
  }

  return {
    text: edits.length > 0 ? applyEdits(text, edits) : text,
    changedCount: converted.length,
    converted,
    unconverted,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function unquote(quoted: string): string {
  return quoted.slice(1, -1).replace(/\\(["\\])/g, "$1");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

import path from "node:path";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { templatesDir } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type TemplateName = "pull-request" | "statelift-config";

type TemplateSpec = {
  file: string;
  // The rendered output legitimately contains `{{...}}` (escaped placeholders).
  literalBraces: boolean;
};

const TEMPLATES: Record<TemplateName, TemplateSpec> = {
  "pull-request": { file: "pull-request.md", literalBraces: false },
  "statelift-config": { file: "statelift.yaml.hbs", literalBraces: true },
};

export type TemplateValues = Record<string, unknown>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderTemplate(name: TemplateName, values: TemplateValues): Promise<string> {
  const template = await loadTemplate(name);
  const output = template(values).trim();

  if (!TEMPLATES[name].literalBraces && /\{\{[^}]+\}\}/.test(output)) {
    throw new Error(`Unresolved placeholder(s) remain in ${name} template output`);
  }

  return `${output}\n`;
}

// Inline templates (e.g. the module repository name pattern); compiled once per source string.
export function renderInline(source: string, values: TemplateValues): string {
  let compiled = INLINE_CACHE.get(source);
  if (!compiled) {
    compiled = Handlebars.compile(source, { noEscape: true, strict: true });
    INLINE_CACHE.set(source, compiled);
  }
  return compiled(values);
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<TemplateName, Handlebars.TemplateDelegate>();
const INLINE_CACHE = new Map<string, Handlebars.TemplateDelegate>();

async function loadTemplate(name: TemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(templatesDir(), TEMPLATES[name].file);
  if (!(await fse.pathExists(templatePath))) {
    throw new Error(`Template not found: ${templatePath}`);
  }

  const raw = await fse.readFile(templatePath, "utf8");
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true });

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

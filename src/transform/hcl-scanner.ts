/**
 * Structural scanner for HCL-like configuration text.
 * Purpose: tell structural braces apart from braces inside strings, interpolations, heredocs and
 * comments, so block edits can be made by exact byte span without a full parser.
 * Assumptions: input is mostly well-formed; a block with no closing brace is left alone.
 * Usage: const blocks = findBlocks(text, /^([ \t]*)module[ \t]+"([^"]+)"[ \t]*\{/gm);
 */

// =============================================================================
// TYPES
// =============================================================================

export type CodeMask = Uint8Array;

export type BlockMatch = {
  // Offset of the first character of the header line (including indentation).
  lineStart: number;
  indent: string;
  openBrace: number;
  closeBrace: number;
  // Offset just past the closing brace.
  end: number;
  groups: string[];
};

export type BodyLine = {
  start: number;
  // Offset of the line terminator (or end of body).
  end: number;
  text: string;
  // Brace depth relative to the block body at the start of this line.
  depth: number;
};

type Frame = { kind: "string" } | { kind: "interp"; depth: number };

// =============================================================================
// LEXING
// =============================================================================

// 1 for characters that are structural code, 0 for comments, strings, interpolations and heredocs.
export function buildCodeMask(text: string): CodeMask {
  const mask = new Uint8Array(text.length);
  const stack: Frame[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];
    const top = stack[stack.length - 1];

    if (top?.kind === "string") {
      if (ch === "\\") {
        i += 2;
      } else if ((ch === "$" || ch === "%") && next === ch && text[i + 2] === "{") {
        // $${ and %%{ are literal escapes.
        i += 3;
      } else if ((ch === "$" || ch === "%") && next === "{") {
        stack.push({ kind: "interp", depth: 0 });
        i += 2;
      } else if (ch === '"' || ch === "\n") {
        stack.pop();
        i += 1;
      } else {
        i += 1;
      }
      continue;
    }

    if (ch === "#" || (ch === "/" && next === "/")) {
      i = lineEnd(text, i);
      continue;
    }
    if (ch === "/" && next === "*") {
      const close = text.indexOf("*/", i + 2);
      i = close === -1 ? text.length : close + 2;
      continue;
    }
    if (ch === '"') {
      stack.push({ kind: "string" });
      i += 1;
      continue;
    }
    if (ch === "<" && next === "<") {
      const heredocEnd = skipHeredoc(text, i);
      if (heredocEnd !== null) {
        i = heredocEnd;
        continue;
      }
    }

    if (top?.kind === "interp") {
      if (ch === "{") {
        top.depth += 1;
      } else if (ch === "}") {
        if (top.depth === 0) stack.pop();
        else top.depth -= 1;
      }
      i += 1;
      continue;
    }

    mask[i] = 1;
    i += 1;
  }

  return mask;
}

function lineEnd(text: string, from: number): number {
  const newline = text.indexOf("\n", from);
  return newline === -1 ? text.length : newline;
}

// Returns the offset just past the heredoc terminator line, or null when `<<` does not open one.
function skipHeredoc(text: string, from: number): number | null {
  const header = /^<<(-?)([A-Za-z_][A-Za-z0-9_]*)[ \t]*\r?\n/.exec(text.slice(from, from + 256));
  if (!header) return null;

  const marker = header[2];
  let cursor = from + header[0].length;
  while (cursor < text.length) {
    const end = lineEnd(text, cursor);
    if (text.slice(cursor, end).trim() === marker) {
      return end;
    }
    cursor = end + 1;
  }
  return text.length;
}

// =============================================================================
// BLOCKS
// =============================================================================

export function findMatchingBrace(text: string, mask: CodeMask, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < text.length; i += 1) {
    if (mask[i] !== 1) continue;
    if (text[i] === "{") depth += 1;
    else if (text[i] === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Finds blocks whose header matches `header`. The pattern must be global and multiline, start with
 * `^([ \t]*)` and end with `\{`. Headers inside strings, comments or heredocs are ignored, as are
 * blocks whose closing brace is missing.
 */
export function findBlocks(
  text: string,
  header: RegExp,
  mask: CodeMask = buildCodeMask(text),
): BlockMatch[] {
  if (!header.global || !header.multiline) {
    throw new Error(`Block header pattern must use the g and m flags: ${header}`);
  }

  const blocks: BlockMatch[] = [];
  header.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = header.exec(text)) !== null) {
    const indent = match[1] ?? "";
    const keywordIndex = match.index + indent.length;
    const openBrace = match.index + match[0].length - 1;
    if (mask[keywordIndex] !== 1 || mask[openBrace] !== 1 || text[openBrace] !== "{") continue;

    const closeBrace = findMatchingBrace(text, mask, openBrace);
    if (closeBrace === -1) continue;

    blocks.push({
      lineStart: match.index,
      indent,
      openBrace,
      closeBrace,
      end: closeBrace + 1,
      groups: match.slice(2).map((group) => group ?? ""),
    });
  }
  header.lastIndex = 0;
  return blocks;
}

// Lines of a block body (between its braces) with their relative brace depth.
export function bodyLines(text: string, mask: CodeMask, block: BlockMatch): BodyLine[] {
  const lines: BodyLine[] = [];
  const bodyStart = block.openBrace + 1;
  const bodyEnd = block.closeBrace;

  let depth = 0;
  let cursor = bodyStart;
  while (cursor < bodyEnd) {
    const end = Math.min(lineEnd(text, cursor), bodyEnd);
    lines.push({ start: cursor, end, text: text.slice(cursor, end), depth });

    for (let i = cursor; i < end; i += 1) {
      if (mask[i] !== 1) continue;
      if (text[i] === "{") depth += 1;
      else if (text[i] === "}") depth -= 1;
    }
    cursor = end + 1;
  }
  return lines;
}

// =============================================================================
// EDITS
// =============================================================================

export type TextEdit = {
  start: number;
  end: number;
  replacement: string;
};

// Applies non-overlapping edits; every byte outside the edited spans is preserved.
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start);
  let result = text;
  let lastStart = Number.POSITIVE_INFINITY;
  for (const edit of ordered) {
    if (edit.end > lastStart) {
      throw new Error(`Overlapping edits at offset ${edit.start}`);
    }
    result = result.slice(0, edit.start) + edit.replacement + result.slice(edit.end);
    lastStart = edit.start;
  }
  return result;
}

export function hclString(value: string): string {
  return JSON.stringify(value);
}

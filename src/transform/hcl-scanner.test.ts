import { describe, expect, it } from "vitest";

import {
  applyEdits,
  bodyLines,
  buildCodeMask,
  findBlocks,
  findMatchingBrace,
  hclString,
} from "./hcl-scanner.js";

const MODULE_HEADER = /^([ \t]*)module[ \t]+"([^"]+)"[ \t]*\{/gm;

describe("buildCodeMask", () => {
  it("marks braces inside strings and comments as non-code", () => {
    const text = 'a = "{" # {\nb {}';
    const mask = buildCodeMask(text);

    expect(mask[text.indexOf('"{"') + 1]).toBe(0);
    expect(mask[text.indexOf("# {") + 2]).toBe(0);
    expect(mask[text.indexOf("b {") + 2]).toBe(1);
    expect(mask[text.length - 1]).toBe(1);
  });

  it("skips heredoc bodies", () => {
    const text = "x = <<EOT\n{ not code }\nEOT\ny {}";
    const mask = buildCodeMask(text);

    expect(mask[text.indexOf("{ not")]).toBe(0);
    expect(mask[text.indexOf("y {") + 2]).toBe(1);
  });
});

describe("findMatchingBrace", () => {
  it("ignores closing braces inside strings and interpolations", () => {
    const text = 'block {\n  s = "}"\n  t = "${ {a = 1} }"\n}';
    const mask = buildCodeMask(text);

    expect(findMatchingBrace(text, mask, text.indexOf("{"))).toBe(text.length - 1);
  });

  it("returns -1 for an unterminated block", () => {
    const text = "block {\n  a = 1\n";
    expect(findMatchingBrace(text, buildCodeMask(text), 6)).toBe(-1);
  });
});

describe("findBlocks", () => {
  it("finds module blocks with exact spans and captured labels", () => {
    const text = 'module "vpc" {\n  name = "a}b"\n  tags = { k = "${var.x}" }\n}\nafter\n';
    const closeBrace = text.indexOf("\n}\nafter") + 1;

    expect(findBlocks(text, MODULE_HEADER)).toEqual([
      {
        lineStart: 0,
        indent: "",
        openBrace: 13,
        closeBrace,
        end: closeBrace + 1,
        groups: ["vpc"],
      },
    ]);
  });

  it("ignores headers inside heredocs and blocks without a closing brace", () => {
    const heredoc = 'locals {\n  doc = <<EOT\nmodule "fake" {\n}\nEOT\n}\n';
    const unterminated = 'module "open" {\n  source = "x"\n';

    expect(findBlocks(heredoc, MODULE_HEADER)).toEqual([]);
    expect(findBlocks(unterminated, MODULE_HEADER)).toEqual([]);
  });

  it("rejects patterns without the global and multiline flags", () => {
    expect(() => findBlocks("x {}", /^([ \t]*)x[ \t]*\{/)).toThrow(/g and m flags/);
  });
});

describe("bodyLines", () => {
  it("reports each body line with its relative depth", () => {
    const text = 'module "m" {\n  a = 1\n  inner {\n    b = 2\n  }\n}\n';
    const mask = buildCodeMask(text);
    const [block] = findBlocks(text, MODULE_HEADER, mask);

    expect(bodyLines(text, mask, block).map((line) => [line.text, line.depth])).toEqual([
      ["", 0],
      ["  a = 1", 0],
      ["  inner {", 0],
      ["    b = 2", 1],
      ["  }", 1],
    ]);
  });
});

describe("applyEdits", () => {
  it("applies edits in any order and keeps untouched bytes", () => {
    const text = "0123456789";
    const result = applyEdits(text, [
      { start: 1, end: 3, replacement: "ab" },
      { start: 6, end: 7, replacement: "XYZ" },
    ]);

    expect(result).toBe("0ab345XYZ789");
  });

  it("rejects overlapping edits", () => {
    expect(() =>
      applyEdits("0123456789", [
        { start: 1, end: 5, replacement: "" },
        { start: 4, end: 6, replacement: "" },
      ]),
    ).toThrow("Overlapping edits at offset 1");
  });
});

describe("hclString", () => {
  it("quotes and escapes values", () => {
    expect(hclString('a "b"')).toBe('"a \\"b\\""');
  });
});

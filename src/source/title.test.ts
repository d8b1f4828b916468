import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractTitle, normalizeTitle, resolveTitle } from "./title.js";

describe("extractTitle", () => {
  it("returns the exact declared title", () => {
    const tex = [
      "\\documentclass{article}",
      "\\title{Attention Is All You Need}",
      "\\begin{document}",
      "\\maketitle",
      "\\end{document}",
    ].join("\n");
    expect(extractTitle(tex)).toBe("Attention Is All You Need");
  });

  it("returns undefined when there is no title", () => {
    expect(extractTitle("\\documentclass{article}\n\\begin{document}\\end{document}")).toBeUndefined();
  });

  it("returns undefined for an empty title", () => {
    expect(extractTitle("\\title{}")).toBeUndefined();
  });

  it("returns undefined for an unterminated title", () => {
    expect(extractTitle("\\title{Broken")).toBeUndefined();
  });

  it("does not treat \\maketitle as a title declaration", () => {
    expect(extractTitle("\\maketitle")).toBeUndefined();
  });

  it("skips an optional short title", () => {
    expect(extractTitle("\\title[Short]{A Long Title\\\\ Across Lines}")).toBe(
      "A Long Title Across Lines"
    );
  });

  it("ignores commented-out titles", () => {
    expect(extractTitle("% \\title{Old Draft}\n\\title{Final Version}")).toBe("Final Version");
  });

  it("keeps nested braces balanced", () => {
    expect(extractTitle("\\title{Learning {GANs} at Scale}\n\\author{A}")).toBe(
      "Learning GANs at Scale"
    );
  });

  it("drops \\thanks footnotes", () => {
    expect(extractTitle("\\title{Deep Nets\\thanks{Supported by grant 42.}}")).toBe("Deep Nets");
  });

  it("falls back to class-specific title commands", () => {
    expect(extractTitle("\\icmltitle{Prefixed Title}")).toBe("Prefixed Title");
  });

  it("prefers \\title over class-specific variants", () => {
    expect(extractTitle("\\icmltitlerunning{Running}\n\\title{Real Title}")).toBe("Real Title");
  });

  it("spans multiple lines", () => {
    expect(extractTitle("\\title{A Study of\n  Line Breaks}")).toBe("A Study of Line Breaks");
  });
});

describe("normalizeTitle", () => {
  it("unwraps formatting commands", () => {
    expect(normalizeTitle("On \\textbf{Bold} Claims \\& Results")).toBe("On Bold Claims & Results");
  });

  it("keeps inline math verbatim", () => {
    expect(normalizeTitle("Scaling $O(n^2)$ Attention")).toBe("Scaling $O(n^2)$ Attention");
  });

  it("strips accent commands", () => {
    expect(normalizeTitle("Caf\\'e Society")).toBe("Cafe Society");
  });

  it("unescapes percent signs", () => {
    expect(normalizeTitle("100\\% Sure")).toBe("100% Sure");
  });

  it("turns ties and line breaks into spaces", () => {
    expect(normalizeTitle("Part~One\\newline Part Two")).toBe("Part One Part Two");
  });
});

describe("resolveTitle", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "title-test-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("resolves a declared title", async () => {
    const path = join(tmpDir, "main.tex");
    await writeFile(path, "\\title{Graph Kernels}\n", "utf-8");
    await expect(resolveTitle(path)).resolves.toEqual({ kind: "declared", title: "Graph Kernels" });
  });

  it("resolves unknown when no title is declared", async () => {
    const path = join(tmpDir, "main.tex");
    await writeFile(path, "\\section{Intro}\n", "utf-8");
    await expect(resolveTitle(path)).resolves.toEqual({ kind: "unknown" });
  });

  it("resolves unknown when the file cannot be read", async () => {
    await expect(resolveTitle(join(tmpDir, "missing.tex"))).resolves.toEqual({ kind: "unknown" });
  });
});

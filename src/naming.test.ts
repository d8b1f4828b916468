import { describe, expect, it } from "vitest";
import { outputStem, resolveOutputPath, sanitizeFileName } from "./naming.js";

describe("Output Naming", () => {
  describe("sanitizeFileName", () => {
    it("keeps ordinary titles unchanged", () => {
      expect(sanitizeFileName("Attention Is All You Need")).toBe("Attention Is All You Need");
    });

    it("should transliterate non-ASCII characters", () => {
      expect(sanitizeFileName("Über Gödel")).toBe("Uber Godel");
    });

    it("replaces reserved characters with spaces", () => {
      expect(sanitizeFileName('What/Why: A "Study" <of> Tools?')).toBe("What Why A Study of Tools");
    });

    it("strips leading and trailing dots", () => {
      expect(sanitizeFileName("...Hidden Title.")).toBe("Hidden Title");
    });

    it("truncates long titles to 120 characters", () => {
      const long = "word ".repeat(40);
      const result = sanitizeFileName(long);
      expect(result?.length).toBeLessThanOrEqual(120);
      expect(result?.endsWith(" ")).toBe(false);
    });

    it("returns undefined when nothing is left", () => {
      expect(sanitizeFileName("///")).toBeUndefined();
      expect(sanitizeFileName("")).toBeUndefined();
    });
  });

  describe("outputStem", () => {
    it("uses the sanitized title when declared", () => {
      expect(outputStem({ kind: "declared", title: "Graph: Kernels" }, "1234.56789")).toBe(
        "Graph Kernels"
      );
    });

    it("falls back to the paper identifier when the title is unknown", () => {
      expect(outputStem({ kind: "unknown" }, "1234.56789")).toBe("1234.56789");
    });

    it("falls back when the title sanitizes to nothing", () => {
      expect(outputStem({ kind: "declared", title: "???" }, "hep-th/9901001")).toBe(
        "hep-th_9901001"
      );
    });
  });

  describe("resolveOutputPath", () => {
    it("substitutes $1 in the default template", () => {
      expect(
        resolveOutputPath("out/$1.epub", { kind: "declared", title: "Deep Nets" }, "1234.56789")
      ).toBe("out/Deep Nets.epub");
    });

    it("uses the fallback name for unknown titles", () => {
      expect(resolveOutputPath("out/$1.epub", { kind: "unknown" }, "1234.56789")).toBe(
        "out/1234.56789.epub"
      );
    });

    it("uses explicit paths verbatim", () => {
      expect(
        resolveOutputPath("books/paper.epub", { kind: "declared", title: "Ignored" }, "1234.56789")
      ).toBe("books/paper.epub");
    });
  });
});

import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  getArchivePath,
  getBuildDir,
  getPaperDirName,
  getSourceDir,
  getWorkspaceDir,
} from "./paths.js";

describe("Path Resolution Utilities", () => {
  const workRoot = "/data/work";

  describe("getPaperDirName", () => {
    it("should keep new-style identifiers unchanged", () => {
      expect(getPaperDirName("2301.13867v2")).toBe("2301.13867v2");
    });

    it("should replace slashes in old-style identifiers", () => {
      expect(getPaperDirName("hep-th/9901001")).toBe("hep-th_9901001");
    });
  });

  describe("getWorkspaceDir", () => {
    it("should return paper directory under the work root", () => {
      expect(getWorkspaceDir(workRoot, "hep-th/9901001")).toBe(join(workRoot, "hep-th_9901001"));
    });
  });

  describe("getArchivePath", () => {
    it("should return tar.gz path under downloads", () => {
      const ws = getWorkspaceDir(workRoot, "1234.56789");
      expect(getArchivePath(ws, "1234.56789")).toBe(
        join(workRoot, "1234.56789", "downloads", "1234.56789.tar.gz")
      );
    });
  });

  describe("getSourceDir / getBuildDir", () => {
    it("should return source and build directories in the workspace", () => {
      const ws = join(workRoot, "1234.56789");
      expect(getSourceDir(ws)).toBe(join(ws, "source"));
      expect(getBuildDir(ws)).toBe(join(ws, "build"));
    });
  });
});

/**
 * Tests for source archive extraction.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExtractionError, ProcessError } from "../errors.js";
import type { ProcessRunner, ProcessSpec } from "../process.js";
import { detectArchiveFormat, extractSourceArchive } from "./extractor.js";

/** A 1 KiB buffer with the POSIX tar magic in the first header block. */
function fakeTar(): Buffer {
  const block = Buffer.alloc(1024);
  block.write("main.tex", 0, "latin1");
  block.write("ustar", 257, "latin1");
  return block;
}

describe("detectArchiveFormat", () => {
  it("detects gzip'd tarballs", async () => {
    await expect(detectArchiveFormat(gzipSync(fakeTar()))).resolves.toEqual({ format: "tar.gz" });
  });

  it("reads only the tar header of a gzip'd tarball", async () => {
    const body = Buffer.concat([fakeTar(), randomBytes(256 * 1024)]);
    const compressed = gzipSync(body);
    const truncated = compressed.subarray(0, Math.floor(compressed.length / 2));

    await expect(detectArchiveFormat(truncated)).resolves.toEqual({ format: "tar.gz" });
  });

  it("detects plain tarballs", async () => {
    await expect(detectArchiveFormat(fakeTar())).resolves.toEqual({ format: "tar" });
  });

  it("returns the inflated payload for single gzip'd files", async () => {
    const tex = "\\documentclass{article}\n";
    const result = await detectArchiveFormat(gzipSync(Buffer.from(tex)));
    expect(result.format).toBe("gzip");
    expect(result.inflated?.toString("utf-8")).toBe(tex);
  });

  it("rejects PDF-only submissions", async () => {
    await expect(detectArchiveFormat(Buffer.from("%PDF-1.5\n..."))).rejects.toThrow(
      "No LaTeX source available: the submission is PDF-only"
    );
  });

  it("rejects gzip'd PDFs", async () => {
    await expect(detectArchiveFormat(gzipSync(Buffer.from("%PDF-1.4")))).rejects.toThrow(
      "Archive contains a PDF, not LaTeX source"
    );
  });

  it("rejects truncated gzip data", async () => {
    const truncated = gzipSync(fakeTar()).subarray(0, 12);
    await expect(detectArchiveFormat(truncated)).rejects.toBeInstanceOf(ExtractionError);
  });

  it("rejects unknown data", async () => {
    await expect(detectArchiveFormat(Buffer.from("<html>"))).rejects.toThrow(
      "Unrecognized archive format"
    );
  });
});

describe("extractSourceArchive", () => {
  let tmpDir: string;
  let archivePath: string;
  let destDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "extractor-test-"));
    archivePath = join(tmpDir, "downloads", "1234.56789.tar.gz");
    destDir = join(tmpDir, "source");
    await mkdir(join(tmpDir, "downloads"), { recursive: true });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("runs tar -xzf into the destination directory", async () => {
    await writeFile(archivePath, gzipSync(fakeTar()));
    const calls: ProcessSpec[] = [];
    const runner: ProcessRunner = async (spec) => {
      calls.push(spec);
      await mkdir(join(destDir, "sections"), { recursive: true });
      await writeFile(join(destDir, "main.tex"), "x");
      await writeFile(join(destDir, "sections", "intro.tex"), "y");
    };

    const result = await extractSourceArchive(archivePath, destDir, { runner, tar: "gtar" });

    expect(calls).toEqual([{ command: "gtar", args: ["-xzf", archivePath, "-C", destDir] }]);
    expect(result).toEqual({
      dir: destDir,
      format: "tar.gz",
      files: ["main.tex", "sections/intro.tex"],
    });
  });

  it("clears files left over from an earlier extraction", async () => {
    await writeFile(archivePath, gzipSync(Buffer.from("\\title{Fresh}\n")));
    await mkdir(join(destDir, "old"), { recursive: true });
    await writeFile(join(destDir, "old", "stale.tex"), "stale");

    const result = await extractSourceArchive(archivePath, destDir, { runner: vi.fn<ProcessRunner>() });

    expect(result.files).toEqual(["main.tex"]);
  });

  it("runs tar -xf for uncompressed tarballs", async () => {
    await writeFile(archivePath, fakeTar());
    const runner = vi.fn<ProcessRunner>().mockResolvedValue(undefined);

    const result = await extractSourceArchive(archivePath, destDir, { runner });

    expect(runner).toHaveBeenCalledWith({
      command: "tar",
      args: ["-xf", archivePath, "-C", destDir],
    });
    expect(result.format).toBe("tar");
    expect(result.files).toEqual([]);
  });

  it("writes single-file submissions as main.tex without running tar", async () => {
    const tex = "\\title{Single}\n";
    await writeFile(archivePath, gzipSync(Buffer.from(tex)));
    const runner = vi.fn<ProcessRunner>();

    const result = await extractSourceArchive(archivePath, destDir, { runner });

    expect(runner).not.toHaveBeenCalled();
    expect(result.format).toBe("gzip");
    expect(result.files).toEqual(["main.tex"]);
    expect(await readFile(join(destDir, "main.tex"), "utf-8")).toBe(tex);
  });

  it("reports a missing tar executable", async () => {
    await writeFile(archivePath, gzipSync(fakeTar()));
    const enoent = Object.assign(new Error("spawn tar ENOENT"), { code: "ENOENT" });
    const runner: ProcessRunner = () =>
      Promise.reject(new ProcessError("tar", { exitCode: null, signal: null }, { cause: enoent }));

    await expect(extractSourceArchive(archivePath, destDir, { runner })).rejects.toThrow(
      "Archive tool not found: tar"
    );
  });

  it("reports a failing tar run", async () => {
    await writeFile(archivePath, gzipSync(fakeTar()));
    const runner: ProcessRunner = () =>
      Promise.reject(new ProcessError("tar", { exitCode: 2, signal: null }));

    const promise = extractSourceArchive(archivePath, destDir, { runner });

    await expect(promise).rejects.toBeInstanceOf(ExtractionError);
    await expect(promise).rejects.toThrow(
      `Failed to extract ${archivePath}: tar exited with code 2`
    );
  });

  it("reports an unreadable archive", async () => {
    await expect(
      extractSourceArchive(join(tmpDir, "missing.tar.gz"), destDir)
    ).rejects.toMatchObject({ name: "ExtractionError", stage: "extract" });
  });
});

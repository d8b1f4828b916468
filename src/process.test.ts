import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProcessError } from "./errors.js";
import { formatCommand, isCommandNotFound, runProcess } from "./process.js";

describe("formatCommand", () => {
  it("quotes arguments that need it", () => {
    expect(
      formatCommand({ command: "ebook-convert", args: ["in.html", "out/My Paper.epub", "--authors", "O'Neil"] })
    ).toBe("ebook-convert in.html 'out/My Paper.epub' --authors 'O'\\''Neil'");
  });
});

describe("runProcess", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "process-test-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("resolves on exit code 0 and runs in the given directory", async () => {
    await runProcess({
      command: process.execPath,
      args: ["-e", "require('fs').writeFileSync('ran.txt', 'ok')"],
      cwd: tmpDir,
    });

    expect(await readFile(join(tmpDir, "ran.txt"), "utf-8")).toBe("ok");
  });

  it("rejects with the exit code", async () => {
    const promise = runProcess({ command: process.execPath, args: ["-e", "process.exit(3)"] });

    await expect(promise).rejects.toBeInstanceOf(ProcessError);
    await expect(promise).rejects.toMatchObject({ exitCode: 3, signal: null });
  });

  it("flags a missing executable", async () => {
    const err: unknown = await runProcess({
      command: join(tmpDir, "no-such-tool"),
      args: [],
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProcessError);
    expect(isCommandNotFound(err)).toBe(true);
  });

  it("does not flag ordinary failures as missing executables", () => {
    expect(isCommandNotFound(new ProcessError("tar", { exitCode: 2, signal: null }))).toBe(false);
    expect(isCommandNotFound(new Error("spawn tar ENOENT"))).toBe(false);
  });
});

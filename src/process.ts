/**
 * External process invocation.
 *
 * Every tool the pipeline shells out to (tar, latexml, latexmlpost,
 * ebook-convert) goes through a {@link ProcessRunner}, so tests can replace
 * the real spawn with a fake. Processes inherit stdio and run without timeout.
 */

import { spawn } from "node:child_process";
import { ProcessError } from "./errors.js";

export interface ProcessSpec {
  command: string;
  args: string[];
  /** Working directory (default: current directory) */
  cwd?: string;
}

/** Runs a process to completion; rejects with ProcessError unless it exits 0. */
export type ProcessRunner = (spec: ProcessSpec) => Promise<void>;

/** Render a spec as a shell-like command line, for logs. */
export function formatCommand(spec: ProcessSpec): string {
  return [spec.command, ...spec.args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

export const runProcess: ProcessRunner = (spec) =>
  new Promise((resolve, reject) => {
    const proc = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      stdio: "inherit",
    });
    proc.on("error", (err) => {
      reject(new ProcessError(spec.command, { exitCode: null, signal: null }, { cause: err }));
    });
    proc.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new ProcessError(spec.command, { exitCode: code, signal }));
    });
  });

/** Whether a ProcessError means the executable was not found. */
export function isCommandNotFound(err: unknown): boolean {
  if (!(err instanceof ProcessError)) return false;
  const cause: unknown = err.cause;
  return (
    typeof cause === "object" &&
    cause !== null &&
    "code" in cause &&
    cause.code === "ENOENT"
  );
}

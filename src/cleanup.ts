/**
 * Working directory cleanup.
 *
 * Removes every entry of a paper's working directory except the output
 * artifact. Failures are collected as CleanupWarning values and logged;
 * nothing here throws.
 */

import { readdir, rm } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { CleanupWarning, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export interface CleanupResult {
  /** Removed entries, relative to the working directory */
  removed: string[];
  warnings: CleanupWarning[];
}

/**
 * Delete everything under `workspaceDir` except `artifactPath`.
 * Directories containing the artifact are kept and cleaned around it.
 */
export async function cleanWorkspace(
  workspaceDir: string,
  artifactPath: string,
  logger: Logger = silentLogger
): Promise<CleanupResult> {
  const root = resolve(workspaceDir);
  const artifact = resolve(artifactPath);
  const result: CleanupResult = { removed: [], warnings: [] };

  function warn(path: string, message: string, cause?: unknown): void {
    const warning = new CleanupWarning(path, message, { cause });
    logger.warn(warning.message);
    result.warnings.push(warning);
  }

  async function clean(dir: string): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (err) {
      warn(dir, `Cannot list ${dir}: ${errorMessage(err)}`, err);
      return;
    }

    for (const name of entries) {
      const full = join(dir, name);
      if (full === artifact) continue;
      if (artifact.startsWith(full + sep)) {
        await clean(full);
        continue;
      }
      try {
        await rm(full, { recursive: true, force: true });
        result.removed.push(relative(root, full));
        logger.debug(`Deleted: ${full}`);
      } catch (err) {
        warn(full, `Failed to delete '${full}': ${errorMessage(err)}`, err);
      }
    }
  }

  logger.info(`Cleaning up intermediate files in: ${root}`);
  await clean(root);
  logger.info(`Removed ${result.removed.length} entries`);
  return result;
}

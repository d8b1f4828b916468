/**
 * Primary source file selection.
 *
 * The conventional entry point (main.tex by default) is taken when present.
 * Otherwise every .tex file in the tree is offered to a {@link CandidateChooser},
 * which must pick exactly one of them.
 */

import { lstat } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { NoCandidateError, SelectionError } from "../errors.js";
import { walkFiles } from "../files.js";
import { silentLogger, type Logger } from "../logger.js";

export const DEFAULT_PRIMARY_FILE = "main.tex";

/**
 * Strategy for picking the primary file among candidates.
 * Receives the candidate paths (relative to the source tree) and resolves to one of them.
 */
export type CandidateChooser = (candidates: readonly string[]) => Promise<string>;

export interface SelectOptions {
  /** Expected primary file, relative to the source tree (default: "main.tex") */
  fileName?: string;
  /** Called when the expected file is missing */
  choose: CandidateChooser;
  logger?: Logger;
}

export interface PrimarySource {
  /** Path relative to the source tree */
  relativePath: string;
  /** How the file was selected */
  selectedBy: "default" | "chooser";
  /** Candidates offered to the chooser (empty when selected by default) */
  candidates: string[];
}

/** List all .tex files under `dir`, relative and sorted. */
export async function listTexFiles(dir: string): Promise<string[]> {
  const files = await walkFiles(dir);
  return files.filter((f) => f.toLowerCase().endsWith(".tex"));
}

/** Normalize a user-supplied relative path for comparison with tree entries. */
function normalizeRelative(fileName: string): string {
  return fileName.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

/** Whether `fileName` names a regular file inside the tree (links are not followed). */
async function isFileInTree(sourceDir: string, fileName: string): Promise<boolean> {
  if (fileName === "" || isAbsolute(fileName) || fileName.split("/").includes("..")) return false;
  try {
    return (await lstat(join(sourceDir, fileName))).isFile();
  } catch {
    return false;
  }
}

/**
 * Select the primary source file of a source tree.
 *
 * @throws NoCandidateError when the tree has no .tex files and the expected file is absent
 * @throws SelectionError when the chooser resolves to something that is not a candidate
 */
export async function selectPrimarySource(
  sourceDir: string,
  options: SelectOptions
): Promise<PrimarySource> {
  const logger = options.logger ?? silentLogger;
  const fileName = normalizeRelative(options.fileName ?? DEFAULT_PRIMARY_FILE);

  if (await isFileInTree(sourceDir, fileName)) {
    logger.info(`Using primary source file ${fileName}`);
    return { relativePath: fileName, selectedBy: "default", candidates: [] };
  }

  const candidates = await listTexFiles(sourceDir);
  logger.info(`Found ${candidates.length} .tex files in ${sourceDir}`);
  if (candidates.length === 0) {
    throw new NoCandidateError(sourceDir);
  }

  logger.warn(`${fileName} not found; choosing among ${candidates.length} candidates`);
  const chosen = normalizeRelative(await options.choose(candidates));
  if (!candidates.includes(chosen)) {
    throw new SelectionError(`Selected file is not a candidate: ${chosen}`);
  }

  logger.info(`Selected primary source file ${chosen}`);
  return { relativePath: chosen, selectedBy: "chooser", candidates };
}

/**
 * Output artifact naming.
 *
 * The output template may contain `$1`, replaced by the file-name form of the
 * paper title. Titles are transliterated to ASCII so the EPUB can be copied to
 * e-reader file systems; characters reserved on Windows, macOS or FAT are replaced.
 */

import anyAscii from "any-ascii";
import { getPaperDirName } from "./paths.js";
import type { TitleResolution } from "./source/title.js";

export const DEFAULT_OUTPUT_TEMPLATE = "out/$1.epub";

export const TITLE_PLACEHOLDER = "$1";

const MAX_NAME_LENGTH = 120;

/** Characters reserved in file names, plus ASCII control characters. */
const RESERVED_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]+/g;

/**
 * Turn a title into a portable file name stem.
 * Returns undefined if nothing usable is left.
 */
export function sanitizeFileName(title: string): string | undefined {
  const cleaned = anyAscii(title)
    .replace(RESERVED_CHARS, " ")
    .replace(/\s+/g, " ")
    .replace(/^[\s.]+|[\s.]+$/g, "");

  const truncated = cleaned.slice(0, MAX_NAME_LENGTH).replace(/[\s.]+$/, "");
  return truncated || undefined;
}

/** Name used in place of `$1`: the sanitized title, else the paper identifier. */
export function outputStem(title: TitleResolution, paperId: string): string {
  if (title.kind === "declared") {
    const stem = sanitizeFileName(title.title);
    if (stem) return stem;
  }
  return getPaperDirName(paperId);
}

/**
 * Resolve the output artifact path from a template.
 * Templates without `$1` are used as given.
 */
export function resolveOutputPath(
  template: string,
  title: TitleResolution,
  paperId: string
): string {
  if (!template.includes(TITLE_PLACEHOLDER)) return template;
  return template.split(TITLE_PLACEHOLDER).join(outputStem(title, paperId));
}

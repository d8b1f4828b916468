/**
 * Best-effort paper title extraction from LaTeX source.
 *
 * Only the \title command is inspected; this is a pattern scan, not a LaTeX parser.
 */

import { readFile } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export type TitleResolution = { kind: "declared"; title: string } | { kind: "unknown" };

export const UNKNOWN_TITLE: TitleResolution = { kind: "unknown" };

/** \title, optionally with a [short title], followed by the opening brace. */
const TITLE_COMMAND = /\\title\s*(?:\[[^\]]*\]\s*)?\{/;

/** Class-specific variants such as \icmltitle{...} or \acmtitle{...}. */
const PREFIXED_TITLE_COMMAND = /\\(?!make)[A-Za-z]+title\s*(?:\[[^\]]*\]\s*)?\{/;

/** Commands whose argument never belongs in the title. */
const DROPPED_COMMANDS = ["thanks", "footnote", "footnotemark", "label"];

/** Remove `%` comments, keeping escaped `\%`. */
function stripComments(source: string): string {
  return source.replace(/(^|[^\\])%.*$/gm, "$1");
}

/**
 * Read a brace-balanced group starting right after an opening brace.
 * Returns the inner text and the index after the closing brace.
 */
function readGroup(text: string, start: number): { inner: string; end: number } | undefined {
  let depth = 1;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return { inner: text.slice(start, i), end: i + 1 };
    }
  }
  return undefined;
}

function removeCommands(text: string, names: string[]): string {
  const pattern = new RegExp(`\\\\(?:${names.join("|")})\\s*(?:\\[[^\\]]*\\]\\s*)?\\{`, "g");
  let result = "";
  let cursor = 0;
  for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
    const group = readGroup(text, match.index + match[0].length);
    if (!group) break;
    result += text.slice(cursor, match.index);
    cursor = group.end;
    pattern.lastIndex = group.end;
  }
  return result + text.slice(cursor);
}

function simplifyText(text: string): string {
  return text
    .replace(/\\[`'^"~=.]\{?([A-Za-z])\}?/g, "$1")
    .replace(/~/g, " ")
    .replace(/\\([&%$#_])/g, "$1")
    .replace(/\\[A-Za-z]+\*?\s*/g, "")
    .replace(/[{}]/g, "");
}

/** Turn the raw argument of \title into plain text. Math segments are kept verbatim. */
export function normalizeTitle(raw: string): string {
  const withoutNotes = removeCommands(raw, DROPPED_COMMANDS)
    .replace(/\\\\\*?(?:\[[^\]]*\])?/g, " ")
    .replace(/\\(?:newline|linebreak)(?![A-Za-z])/g, " ");

  const parts = withoutNotes.split(/((?<!\\)\$[^$]*(?<!\\)\$)/);
  return parts
    .map((part, i) => (i % 2 === 1 ? part : simplifyText(part)))
    .join("")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Extract the declared title from LaTeX source text.
 * Returns undefined when no title command is found or its argument is empty.
 */
export function extractTitle(source: string): string | undefined {
  const text = stripComments(source);
  const match = TITLE_COMMAND.exec(text) ?? PREFIXED_TITLE_COMMAND.exec(text);
  if (!match) return undefined;

  const group = readGroup(text, match.index + match[0].length);
  if (!group) return undefined;

  const title = normalizeTitle(group.inner);
  return title || undefined;
}

/** Resolve the title of a LaTeX file. Never throws; failures resolve to unknown. */
export async function resolveTitle(
  latexPath: string,
  logger: Logger = silentLogger
): Promise<TitleResolution> {
  logger.info(`Extracting title from LaTeX file: ${latexPath}`);
  let source: string;
  try {
    source = await readFile(latexPath, "utf-8");
  } catch (err) {
    logger.warn(`Cannot read ${latexPath}: ${errorMessage(err)}`);
    return UNKNOWN_TITLE;
  }

  const title = extractTitle(source);
  if (title === undefined) {
    logger.warn("No title found in the LaTeX file.");
    return UNKNOWN_TITLE;
  }
  logger.info(`Title found: ${title}`);
  return { kind: "declared", title };
}

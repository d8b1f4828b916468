/**
 * arXiv paper reference parsing.
 *
 * Accepts bare identifiers ("2301.13867", "2301.13867v2", "hep-th/9901001"),
 * "arXiv:"-prefixed identifiers, and arxiv.org URLs of the form
 * /abs/{id}, /pdf/{id}[.pdf], /e-print/{id}, /src/{id}, /html/{id}.
 *
 * The source archive lives at a fixed location: {base}/e-print/{id}.
 */

import { FetchError } from "../errors.js";

export const ARXIV_BASE_URL = "https://arxiv.org";

/** Identifier schemes: YYMM.NNNN[N] since 2007, archive[.SC]/YYMMNNN before. */
const NEW_STYLE_ID = /^(\d{4}\.\d{4,5})(v\d+)?$/;
const OLD_STYLE_ID = /^([a-z]+(?:-[a-z]+)*(?:\.[A-Z]{2})?\/\d{7})(v\d+)?$/;

const URL_PATH = /^\/(?:abs|pdf|e-print|src|html)\/(.+?)(?:\.pdf)?\/?$/;

const ARXIV_HOSTS = new Set(["arxiv.org", "www.arxiv.org", "export.arxiv.org"]);

export interface PaperRef {
  /** Identifier as requested, including the version suffix if one was given */
  id: string;
  /** Identifier without version */
  baseId: string;
  /** Version suffix ("v2"), if one was given */
  version?: string;
  /** Abstract page URL */
  absUrl: string;
  /** Source archive URL */
  sourceUrl: string;
}

/** Strip common prefixes from arXiv IDs */
function normalizeArxivId(id: string): string {
  return id.trim().replace(/^arXiv:/i, "");
}

function extractIdFromUrl(input: string): string | undefined {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return undefined;
  }
  if (!ARXIV_HOSTS.has(url.hostname.toLowerCase())) return undefined;
  const match = URL_PATH.exec(decodeURIComponent(url.pathname));
  return match?.[1];
}

/** Check whether a string is a well-formed arXiv identifier (no prefix, no URL). */
export function isArxivId(id: string): boolean {
  return NEW_STYLE_ID.test(id) || OLD_STYLE_ID.test(id);
}

/**
 * Parse a paper identifier or arxiv.org URL.
 *
 * @param input - identifier or URL as typed by the operator
 * @param baseUrl - arXiv origin used to build the archive URL
 * @throws FetchError when the input is not a recognizable arXiv reference
 */
export function parseArxivRef(input: string, baseUrl: string = ARXIV_BASE_URL): PaperRef {
  const trimmed = input.trim();
  const candidate = /^https?:\/\//i.test(trimmed)
    ? extractIdFromUrl(trimmed)
    : normalizeArxivId(trimmed);

  if (candidate === undefined) {
    throw new FetchError(`Not an arXiv URL: ${input}`);
  }

  const match = NEW_STYLE_ID.exec(candidate) ?? OLD_STYLE_ID.exec(candidate);
  const baseId = match?.[1];
  if (!match || !baseId) {
    throw new FetchError(`Not an arXiv identifier: ${input}`);
  }

  const origin = baseUrl.replace(/\/+$/, "");
  const ref: PaperRef = {
    id: candidate,
    baseId,
    absUrl: `${origin}/abs/${candidate}`,
    sourceUrl: `${origin}/e-print/${candidate}`,
  };
  const version = match[2];
  if (version !== undefined) ref.version = version;
  return ref;
}

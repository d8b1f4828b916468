/**
 * arXiv source archive downloader.
 *
 * Downloads the e-print bundle ({base}/e-print/{id}) in a single request.
 * arXiv answers with a gzip'd tarball, a gzip'd single .tex file, or a PDF
 * for PDF-only submissions; telling them apart is the extractor's job.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { FetchError, errorMessage } from "../errors.js";
import type { PaperRef } from "./arxiv-id.js";

export const USER_AGENT = "arxiv-epub/0.1.0";

export interface SourceArchiveOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export interface SourceArchiveResult {
  path: string;
  size: number;
  contentType?: string;
}

/**
 * Download a paper's source archive to `destPath`.
 *
 * @throws FetchError on network failure, non-2xx status, or an empty body
 */
export async function downloadSourceArchive(
  ref: PaperRef,
  destPath: string,
  options?: SourceArchiveOptions
): Promise<SourceArchiveResult> {
  const doFetch = options?.fetch ?? fetch;

  let response: Response;
  try {
    response = await doFetch(ref.sourceUrl, {
      headers: { "User-Agent": USER_AGENT },
    });
  } catch (err) {
    throw new FetchError(`Request to ${ref.sourceUrl} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!response.ok) {
    const reason =
      response.status === 404
        ? `No source archive for ${ref.id}`
        : `Failed to download source for ${ref.id}`;
    throw new FetchError(`${reason}: HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  const buffer = await response.arrayBuffer();
  if (buffer.byteLength === 0) {
    throw new FetchError(`Empty source archive for ${ref.id}`, { status: response.status });
  }

  await mkdir(dirname(destPath), { recursive: true });
  await writeFile(destPath, Buffer.from(buffer));

  const result: SourceArchiveResult = { path: destPath, size: buffer.byteLength };
  const contentType = response.headers.get("content-type");
  if (contentType) result.contentType = contentType;
  return result;
}

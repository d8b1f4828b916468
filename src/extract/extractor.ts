/**
 * Source archive extraction.
 *
 * arXiv e-prints come in three shapes:
 * - gzip'd tarball (most submissions) → `tar -xzf`
 * - gzip'd single .tex file → inflated and written as main.tex
 * - plain tarball → `tar -xf`
 * PDF-only submissions carry no LaTeX source and are rejected.
 */

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { createGunzip, gunzip } from "node:zlib";
import { ExtractionError, errorMessage } from "../errors.js";
import { walkFiles } from "../files.js";
import { silentLogger, type Logger } from "../logger.js";
import { formatCommand, isCommandNotFound, runProcess, type ProcessRunner } from "../process.js";

const gunzipAsync = promisify(gunzip);

/** File name given to a single-file submission. */
export const SINGLE_FILE_NAME = "main.tex";

export type ArchiveFormat = "tar.gz" | "tar" | "gzip";

export interface ExtractOptions {
  /** tar executable (default: "tar") */
  tar?: string;
  runner?: ProcessRunner;
  logger?: Logger;
}

export interface ExtractResult {
  dir: string;
  format: ArchiveFormat;
  /** Extracted files, relative to `dir` */
  files: string[];
}

const GZIP_MAGIC = [0x1f, 0x8b];
const PDF_MAGIC = "%PDF";
const TAR_HEADER_SIZE = 512;
const USTAR_OFFSET = 257;
const USTAR_MAGIC = "ustar";

function startsWithBytes(data: Uint8Array, magic: number[]): boolean {
  return magic.every((byte, i) => data[i] === byte);
}

function isTar(data: Buffer): boolean {
  return data.toString("latin1", USTAR_OFFSET, USTAR_OFFSET + USTAR_MAGIC.length) === USTAR_MAGIC;
}

function isPdf(data: Buffer): boolean {
  return data.toString("latin1", 0, PDF_MAGIC.length) === PDF_MAGIC;
}

/** Inflate only the first `size` bytes of a gzip stream. */
async function inflateHead(data: Buffer, size: number): Promise<Buffer> {
  const stream = createGunzip();
  stream.end(data);
  const chunks: Buffer[] = [];
  let length = 0;
  for await (const chunk of stream) {
    if (!Buffer.isBuffer(chunk)) continue;
    chunks.push(chunk);
    length += chunk.length;
    if (length >= size) break;
  }
  return Buffer.concat(chunks).subarray(0, size);
}

async function inflateOrThrow(inflate: () => Promise<Buffer>): Promise<Buffer> {
  try {
    return await inflate();
  } catch (err) {
    throw new ExtractionError(`Corrupt gzip archive: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Decide how an archive must be unpacked.
 * Only the tar header is inflated for tarballs; single gzip'd files come back
 * inflated so they are not inflated twice.
 */
export async function detectArchiveFormat(
  data: Buffer
): Promise<{ format: ArchiveFormat; inflated?: Buffer }> {
  if (startsWithBytes(data, GZIP_MAGIC)) {
    const head = await inflateOrThrow(() => inflateHead(data, TAR_HEADER_SIZE));
    if (isTar(head)) return { format: "tar.gz" };
    if (isPdf(head)) {
      throw new ExtractionError("Archive contains a PDF, not LaTeX source");
    }
    const inflated = await inflateOrThrow(() => gunzipAsync(data));
    return { format: "gzip", inflated };
  }
  if (isTar(data)) return { format: "tar" };
  if (isPdf(data)) {
    throw new ExtractionError("No LaTeX source available: the submission is PDF-only");
  }
  throw new ExtractionError("Unrecognized archive format");
}

/**
 * Extract a downloaded source archive into `destDir`.
 * Anything already in `destDir` is removed first.
 *
 * @throws ExtractionError when the archive is unreadable or corrupt, or the tar tool fails
 */
export async function extractSourceArchive(
  archivePath: string,
  destDir: string,
  options?: ExtractOptions
): Promise<ExtractResult> {
  const logger = options?.logger ?? silentLogger;
  const runner = options?.runner ?? runProcess;
  const tar = options?.tar ?? "tar";

  let data: Buffer;
  try {
    data = await readFile(archivePath);
  } catch (err) {
    throw new ExtractionError(`Cannot read archive ${archivePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const { format, inflated } = await detectArchiveFormat(data);
  try {
    await rm(destDir, { recursive: true, force: true });
    await mkdir(destDir, { recursive: true });
  } catch (err) {
    throw new ExtractionError(`Cannot prepare ${destDir}: ${errorMessage(err)}`, { cause: err });
  }
  logger.info(`Extracting ${archivePath} (${format}) into ${destDir}`);

  if (inflated) {
    await writeFile(join(destDir, SINGLE_FILE_NAME), inflated);
  } else {
    const spec = {
      command: tar,
      args: [format === "tar.gz" ? "-xzf" : "-xf", archivePath, "-C", destDir],
    };
    logger.debug(`Running: ${formatCommand(spec)}`);
    try {
      await runner(spec);
    } catch (err) {
      const message = isCommandNotFound(err)
        ? `Archive tool not found: ${tar}`
        : `Failed to extract ${archivePath}: ${errorMessage(err)}`;
      throw new ExtractionError(message, { cause: err });
    }
  }

  const files = await walkFiles(destDir);
  logger.info(`Extraction completed: ${files.length} files in ${destDir}`);
  return { dir: destDir, format, files };
}

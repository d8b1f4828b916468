/**
 * End-to-end conversion pipeline.
 *
 * fetch → extract → select → resolve title → convert → (cleanup)
 *
 * Stages run strictly in sequence; every stage except cleanup is fatal.
 */

import { resolve } from "node:path";
import { cleanWorkspace, type CleanupResult } from "./cleanup.js";
import type { AppConfig } from "./config.js";
import { runConverterChain, type DocumentMetadata } from "./convert/index.js";
import { extractSourceArchive } from "./extract/extractor.js";
import { parseArxivRef, type PaperRef } from "./fetch/arxiv-id.js";
import { downloadSourceArchive } from "./fetch/source-archive.js";
import { silentLogger, type Logger } from "./logger.js";
import { DEFAULT_OUTPUT_TEMPLATE, resolveOutputPath } from "./naming.js";
import { getArchivePath, getBuildDir, getSourceDir, getWorkspaceDir } from "./paths.js";
import { runProcess, type ProcessRunner } from "./process.js";
import {
  DEFAULT_PRIMARY_FILE,
  selectPrimarySource,
  type CandidateChooser,
  type PrimarySource,
} from "./source/selector.js";
import { resolveTitle, type TitleResolution } from "./source/title.js";

export interface ConvertPaperOptions {
  /** arXiv identifier or URL */
  paper: string;
  /** Expected primary file (default: "main.tex") */
  latexFile?: string;
  /** Output path or template containing $1 (default: "out/$1.epub") */
  output?: string;
  /** Delete intermediates after a successful conversion */
  clear?: boolean;
  /** Pass --verbose to latexml */
  verbose?: boolean;
}

export interface PipelineDeps {
  config: AppConfig;
  /** Picks the primary file when the expected one is missing */
  choose: CandidateChooser;
  fetch?: typeof fetch;
  runner?: ProcessRunner;
  logger?: Logger;
}

export interface Workspace {
  root: string;
  archivePath: string;
  sourceDir: string;
  buildDir: string;
}

export interface ConvertPaperResult {
  ref: PaperRef;
  workspace: Workspace;
  primarySource: PrimarySource;
  title: TitleResolution;
  metadata: DocumentMetadata;
  outputPath: string;
  /** Present when cleanup was requested */
  cleanup?: CleanupResult;
}

/** Lay out the working directory for a paper. */
export function createWorkspace(workRoot: string, paperId: string): Workspace {
  const root = getWorkspaceDir(workRoot, paperId);
  return {
    root,
    archivePath: getArchivePath(root, paperId),
    sourceDir: getSourceDir(root),
    buildDir: getBuildDir(root),
  };
}

/**
 * Convert one arXiv paper into an EPUB.
 *
 * @throws FetchError, ExtractionError, NoCandidateError, SelectionError or ConversionError
 */
export async function convertPaper(
  options: ConvertPaperOptions,
  deps: PipelineDeps
): Promise<ConvertPaperResult> {
  const logger = deps.logger ?? silentLogger;
  const runner = deps.runner ?? runProcess;
  const { config } = deps;

  const ref = parseArxivRef(options.paper, config.baseUrl);
  logger.info(`Starting conversion for arXiv paper ${ref.id} (${ref.absUrl})`);

  const workspace = createWorkspace(config.workRoot, ref.id);

  logger.info(`Downloading source archive from ${ref.sourceUrl}`);
  const archive = await downloadSourceArchive(
    ref,
    workspace.archivePath,
    deps.fetch ? { fetch: deps.fetch } : undefined
  );
  logger.info(`Download completed. File saved at: ${archive.path} (${archive.size} bytes)`);

  await extractSourceArchive(workspace.archivePath, workspace.sourceDir, {
    tar: config.tools.tar,
    runner,
    logger,
  });

  const primarySource = await selectPrimarySource(workspace.sourceDir, {
    fileName: options.latexFile ?? DEFAULT_PRIMARY_FILE,
    choose: deps.choose,
    logger,
  });

  const title = await resolveTitle(
    resolve(workspace.sourceDir, primarySource.relativePath),
    logger
  );
  const outputPath = resolveOutputPath(
    options.output ?? DEFAULT_OUTPUT_TEMPLATE,
    title,
    ref.id
  );
  logger.info(`Output file: ${outputPath}`);

  const conversion = await runConverterChain(
    {
      sourceDir: workspace.sourceDir,
      primarySource: primarySource.relativePath,
      buildDir: workspace.buildDir,
      outputPath,
    },
    {
      tools: config.tools,
      language: config.language,
      verbose: options.verbose ?? false,
      title,
      runner,
      logger,
    }
  );

  const result: ConvertPaperResult = {
    ref,
    workspace,
    primarySource,
    title,
    metadata: conversion.metadata,
    outputPath: conversion.outputPath,
  };

  if (options.clear) {
    result.cleanup = await cleanWorkspace(workspace.root, conversion.outputPath, logger);
    if (result.cleanup.warnings.length > 0) {
      logger.warn(`Cleanup finished with ${result.cleanup.warnings.length} warnings`);
    }
  }

  logger.info(`Final EPUB file created: ${conversion.outputPath}`);
  return result;
}

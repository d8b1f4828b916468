/**
 * Converter chain orchestrator.
 *
 * Runs the stages from {@link buildStages} strictly in order. The first
 * failing stage aborts the chain with a ConversionError naming that stage;
 * nothing is retried and later stages never start.
 */

import { mkdir, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import type { ToolPaths } from "../config.js";
import { ConversionError, ProcessError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { formatCommand, isCommandNotFound, runProcess, type ProcessRunner } from "../process.js";
import type { TitleResolution } from "../source/title.js";
import { readDocumentMetadata, type DocumentMetadata } from "./metadata.js";
import { buildStages, type ConversionInput, type ConversionStage } from "./stages.js";

export const DEFAULT_TOOLS: ToolPaths = {
  latexml: "latexml",
  latexmlpost: "latexmlpost",
  ebookConvert: "ebook-convert",
  tar: "tar",
};

export interface ConverterChainOptions {
  tools?: ToolPaths;
  /** EPUB language (default: "en") */
  language?: string;
  /** Pass --verbose to latexml */
  verbose?: boolean;
  /** Title resolved from the LaTeX source; used when the XML carries none */
  title?: TitleResolution;
  runner?: ProcessRunner;
  logger?: Logger;
}

export interface ConversionResult {
  outputPath: string;
  metadata: DocumentMetadata;
  /** Stages that ran, in order */
  stages: ConversionStage["name"][];
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function runStage(
  stage: ConversionStage,
  metadata: DocumentMetadata,
  runner: ProcessRunner,
  logger: Logger
): Promise<void> {
  const spec = stage.toProcess(metadata);
  logger.info(`Running ${stage.name}: ${stage.inputPath} -> ${stage.outputPath}`);
  logger.debug(`Command: ${formatCommand(spec)}`);

  try {
    await rm(stage.outputPath, { force: true });
    await runner(spec);
  } catch (err) {
    if (isCommandNotFound(err)) {
      throw new ConversionError(stage.name, `command not found: ${spec.command}`, { cause: err });
    }
    const exitCode = err instanceof ProcessError ? err.exitCode : null;
    throw new ConversionError(stage.name, errorMessage(err), { exitCode, cause: err });
  }

  if (!(await fileExists(stage.outputPath))) {
    throw new ConversionError(stage.name, `expected output not produced: ${stage.outputPath}`, {
      exitCode: 0,
    });
  }
  logger.info(`${stage.name} completed`);
}

/** Metadata from the LaTeXML XML, falling back to the title resolved from source. */
async function loadMetadata(
  xmlPath: string,
  title: TitleResolution | undefined,
  logger: Logger
): Promise<DocumentMetadata> {
  let metadata: DocumentMetadata = { authors: [] };
  try {
    metadata = await readDocumentMetadata(xmlPath);
  } catch (err) {
    logger.warn(`Could not read document metadata from ${xmlPath}: ${errorMessage(err)}`);
  }
  if (!metadata.title && title?.kind === "declared") {
    metadata = { ...metadata, title: title.title };
  }
  return metadata;
}

/**
 * Convert a primary LaTeX file into an EPUB through latexml, latexmlpost and ebook-convert.
 *
 * @throws ConversionError tagged with the failing stage
 */
export async function runConverterChain(
  input: ConversionInput,
  options?: ConverterChainOptions
): Promise<ConversionResult> {
  const logger = options?.logger ?? silentLogger;
  const runner = options?.runner ?? runProcess;
  const stages = buildStages(input, {
    tools: options?.tools ?? DEFAULT_TOOLS,
    language: options?.language ?? "en",
    verbose: options?.verbose ?? false,
  });

  await mkdir(input.buildDir, { recursive: true });
  await mkdir(dirname(input.outputPath), { recursive: true });

  let metadata: DocumentMetadata = { authors: [] };
  const completed: ConversionStage["name"][] = [];

  for (const stage of stages) {
    await runStage(stage, metadata, runner, logger);
    completed.push(stage.name);
    if (stage.name === "latexml") {
      metadata = await loadMetadata(stage.outputPath, options?.title, logger);
    }
  }

  const last = stages[stages.length - 1];
  const outputPath = last ? last.outputPath : input.outputPath;
  logger.info(`EPUB file generated at: ${outputPath}`);
  return { outputPath, metadata, stages: completed };
}

export { buildStages, intermediatePaths } from "./stages.js";
export type { ConversionInput, ConversionStage, StageSettings } from "./stages.js";
export { parseLatexmlMetadata, readDocumentMetadata } from "./metadata.js";
export type { DocumentMetadata } from "./metadata.js";

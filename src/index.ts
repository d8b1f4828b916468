/**
 * # arxiv-epub
 *
 * Convert an arXiv paper's LaTeX source into an EPUB.
 *
 * ## Workflow
 *
 * 1. **Fetch** — Download the source archive from `{base}/e-print/{id}`.
 * 2. **Extract** — Unpack it into the paper's working directory.
 * 3. **Select** — Pick the primary `.tex` file (`main.tex`, else ask a chooser).
 * 4. **Convert** — Run latexml, latexmlpost and ebook-convert in order.
 * 5. **Clean up** (optional) — Delete everything but the EPUB.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { convertPaper, createConsoleChooser, createLogger, loadConfig } from "arxiv-epub";
 *
 * const config = loadConfig();
 * const result = await convertPaper(
 *   { paper: "2301.13867", output: "out/$1.epub", clear: true },
 *   { config, choose: createConsoleChooser(), logger: createLogger({ level: config.logLevel }) },
 * );
 * console.log(result.outputPath);
 * ```
 *
 * ## Configuration
 *
 * Environment variables (a `.env` file is read when present):
 *
 * - **ARXIV_EPUB_LATEXML**, **ARXIV_EPUB_LATEXMLPOST**, **ARXIV_EPUB_EBOOK_CONVERT**, **ARXIV_EPUB_TAR**: tool executables.
 * - **ARXIV_EPUB_WORK_DIR**: root of the per-paper working directories. Default: `work`.
 * - **ARXIV_EPUB_LANGUAGE**: EPUB language. Default: `en`.
 * - **ARXIV_EPUB_LOG_LEVEL**: `debug`, `info`, `warn`, `error` or `silent`. Default: `info`.
 * - **ARXIV_EPUB_BASE_URL**: arXiv origin. Default: `https://arxiv.org`.
 *
 * @module arxiv-epub
 */

// === Pipeline ===
export { convertPaper, createWorkspace } from "./pipeline.js";
export type {
  ConvertPaperOptions,
  ConvertPaperResult,
  PipelineDeps,
  Workspace,
} from "./pipeline.js";

// === Fetch & Extract ===
export { ARXIV_BASE_URL, isArxivId, parseArxivRef } from "./fetch/arxiv-id.js";
export type { PaperRef } from "./fetch/arxiv-id.js";
export { downloadSourceArchive } from "./fetch/source-archive.js";
export type { SourceArchiveOptions, SourceArchiveResult } from "./fetch/source-archive.js";
export { detectArchiveFormat, extractSourceArchive } from "./extract/extractor.js";
export type { ArchiveFormat, ExtractOptions, ExtractResult } from "./extract/extractor.js";

// === Source selection ===
export { DEFAULT_PRIMARY_FILE, listTexFiles, selectPrimarySource } from "./source/selector.js";
export type { CandidateChooser, PrimarySource, SelectOptions } from "./source/selector.js";
export { createConsoleChooser, parseSelection } from "./source/prompt.js";
export type { ConsoleChooserOptions } from "./source/prompt.js";
export { extractTitle, resolveTitle } from "./source/title.js";
export type { TitleResolution } from "./source/title.js";

// === Conversion ===
export {
  DEFAULT_TOOLS,
  buildStages,
  parseLatexmlMetadata,
  readDocumentMetadata,
  runConverterChain,
} from "./convert/index.js";
export type {
  ConversionInput,
  ConversionResult,
  ConversionStage,
  ConverterChainOptions,
  DocumentMetadata,
} from "./convert/index.js";

// === Output & Cleanup ===
export { DEFAULT_OUTPUT_TEMPLATE, resolveOutputPath, sanitizeFileName } from "./naming.js";
export { cleanWorkspace } from "./cleanup.js";
export type { CleanupResult } from "./cleanup.js";
export { getArchivePath, getBuildDir, getSourceDir, getWorkspaceDir } from "./paths.js";

// === Runtime ===
export { loadConfig, parseConfig } from "./config.js";
export type { AppConfig, LoadConfigOptions, ToolPaths } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { runProcess } from "./process.js";
export type { ProcessRunner, ProcessSpec } from "./process.js";
export {
  ArxivEpubError,
  CleanupWarning,
  ConfigError,
  ConversionError,
  ExtractionError,
  FetchError,
  NoCandidateError,
  ProcessError,
  SelectionError,
} from "./errors.js";
export type { ConverterName, PipelineStage } from "./errors.js";

/**
 * Error taxonomy for the conversion pipeline.
 *
 * Every fatal error carries the pipeline stage it came from so the CLI can
 * report `<stage> failed: <message>` without inspecting process output.
 * {@link CleanupWarning} is the one non-fatal member: it is returned, never thrown.
 */

export type PipelineStage = "config" | "fetch" | "extract" | "select" | "convert" | "cleanup";

/** Name of an external converter in the conversion chain. */
export type ConverterName = "latexml" | "latexmlpost" | "ebook-convert";

export class ArxivEpubError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArxivEpubError";
    this.stage = stage;
  }
}

/** Invalid configuration (environment or command-line values). */
export class ConfigError extends ArxivEpubError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** The paper reference is invalid, the request failed, or the archive does not exist. */
export class FetchError extends ArxivEpubError {
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("fetch", message, options);
    this.name = "FetchError";
    this.status = options?.status;
  }
}

/** The archive is corrupt, holds no LaTeX source, or the archive tool is unavailable. */
export class ExtractionError extends ArxivEpubError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extract", message, options);
    this.name = "ExtractionError";
  }
}

/** The source tree contains no `.tex` file at all. */
export class NoCandidateError extends ArxivEpubError {
  readonly sourceDir: string;

  constructor(sourceDir: string) {
    super("select", `No .tex files found in ${sourceDir}`);
    this.name = "NoCandidateError";
    this.sourceDir = sourceDir;
  }
}

/** The operator (or chooser) did not pick one of the offered candidates. */
export class SelectionError extends ArxivEpubError {
  constructor(message: string) {
    super("select", message);
    this.name = "SelectionError";
  }
}

/** An external process could not be started or did not exit cleanly. */
export class ProcessError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    command: string,
    result: { exitCode: number | null; signal: NodeJS.Signals | null },
    options?: { cause?: unknown },
  ) {
    const reason =
      result.signal !== null
        ? `was terminated by ${result.signal}`
        : result.exitCode !== null
          ? `exited with code ${result.exitCode}`
          : "could not be started";
    super(`${command} ${reason}`, options);
    this.name = "ProcessError";
    this.command = command;
    this.exitCode = result.exitCode;
    this.signal = result.signal;
  }
}

/** One converter in the chain failed. */
export class ConversionError extends ArxivEpubError {
  readonly converter: ConverterName;
  readonly exitCode: number | null;

  constructor(
    converter: ConverterName,
    message: string,
    options?: { exitCode?: number | null; cause?: unknown },
  ) {
    super("convert", `${converter}: ${message}`, options);
    this.name = "ConversionError";
    this.converter = converter;
    this.exitCode = options?.exitCode ?? null;
  }
}

/** A non-fatal cleanup problem. Reported, never thrown out of the pipeline. */
export class CleanupWarning extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CleanupWarning";
    this.path = path;
  }
}

/** Format an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

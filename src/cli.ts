#!/usr/bin/env node
/**
 * Command-line entry point: `arxiv-epub <paper>`.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { loadConfig, parseConfig, type AppConfig } from "./config.js";
import { ArxivEpubError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { DEFAULT_OUTPUT_TEMPLATE } from "./naming.js";
import { convertPaper } from "./pipeline.js";
import type { ProcessRunner } from "./process.js";
import { createConsoleChooser } from "./source/prompt.js";
import { DEFAULT_PRIMARY_FILE, type CandidateChooser } from "./source/selector.js";

export const VERSION = "0.1.0";

interface CliOptions {
  latexFile: string;
  output: string;
  workDir?: string;
  clear?: boolean;
  language?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliDeps {
  /** Environment to read configuration from; `.env` and process.env when omitted */
  env?: Record<string, string | undefined>;
  choose?: CandidateChooser;
  fetch?: typeof fetch;
  runner?: ProcessRunner;
  stdout?: { write(chunk: string): unknown };
  stderr?: { write(chunk: string): unknown };
}

/** Environment-style overrides for the flags that were given. */
function flagOverrides(opts: CliOptions): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (opts.workDir !== undefined) overrides["ARXIV_EPUB_WORK_DIR"] = opts.workDir;
  if (opts.language !== undefined) overrides["ARXIV_EPUB_LANGUAGE"] = opts.language;
  if (opts.verbose) overrides["ARXIV_EPUB_LOG_LEVEL"] = "debug";
  else if (opts.quiet) overrides["ARXIV_EPUB_LOG_LEVEL"] = "warn";
  return overrides;
}

function resolveConfig(opts: CliOptions, deps: CliDeps): AppConfig {
  const overrides = flagOverrides(opts);
  return deps.env ? parseConfig({ ...deps.env, ...overrides }) : loadConfig({ overrides });
}

function reportFailure(err: unknown, logger: Logger): void {
  if (err instanceof ArxivEpubError) {
    logger.error(`${err.stage} failed: ${err.message}`);
  } else {
    logger.error(`unexpected failure: ${errorMessage(err)}`);
  }
}

async function convertCommand(
  paper: string,
  opts: CliOptions,
  deps: CliDeps,
  stderr: NonNullable<CliDeps["stderr"]>
): Promise<number> {
  let logger = createLogger({ stream: stderr });
  try {
    const config = resolveConfig(opts, deps);
    logger = createLogger({ level: config.logLevel, stream: stderr });

    const result = await convertPaper(
      {
        paper,
        latexFile: opts.latexFile,
        output: opts.output,
        clear: opts.clear ?? false,
        verbose: opts.verbose ?? false,
      },
      {
        config,
        choose: deps.choose ?? createConsoleChooser(),
        logger,
        ...(deps.fetch ? { fetch: deps.fetch } : {}),
        ...(deps.runner ? { runner: deps.runner } : {}),
      }
    );

    (deps.stdout ?? process.stdout).write(`${result.outputPath}\n`);
    return 0;
  } catch (err) {
    reportFailure(err, logger);
    return 1;
  }
}

/**
 * Parse `argv` (arguments after the executable and script) and run the conversion.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  let exitCode = 0;

  const program = new Command()
    .name("arxiv-epub")
    .description("Convert an arXiv paper's LaTeX source into an EPUB")
    .version(VERSION)
    .argument("<paper>", "arXiv identifier or URL")
    .option("--latex-file <name>", "primary LaTeX file to look for", DEFAULT_PRIMARY_FILE)
    .option("-o, --output <path>", "output file; $1 is replaced by the paper title", DEFAULT_OUTPUT_TEMPLATE)
    .option("--work-dir <dir>", "root of the per-paper working directories")
    .option("--clear", "delete intermediate files after a successful conversion")
    .option("--language <code>", "language recorded in the EPUB")
    .option("-v, --verbose", "log debug output and run latexml verbosely")
    .option("-q, --quiet", "only log warnings and errors")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    })
    .action(async (paper: string, opts: CliOptions) => {
      exitCode = await convertCommand(paper, opts, deps, stderr);
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  );
}

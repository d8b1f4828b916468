/**
 * Runtime configuration from environment variables.
 *
 * A `.env` file in the working directory is loaded first (real environment
 * variables win). Values are validated with zod; every invalid key is reported.
 */

import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const nonEmpty = z.string().trim().min(1);

const EnvSchema = z.object({
  ARXIV_EPUB_LATEXML: nonEmpty.default("latexml"),
  ARXIV_EPUB_LATEXMLPOST: nonEmpty.default("latexmlpost"),
  ARXIV_EPUB_EBOOK_CONVERT: nonEmpty.default("ebook-convert"),
  ARXIV_EPUB_TAR: nonEmpty.default("tar"),
  ARXIV_EPUB_WORK_DIR: nonEmpty.default("work"),
  ARXIV_EPUB_LANGUAGE: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2,3}(-[A-Za-z0-9]+)*$/, "must be a language tag such as en or pt-BR")
    .default("en"),
  ARXIV_EPUB_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  ARXIV_EPUB_BASE_URL: z.string().trim().url().default("https://arxiv.org"),
});

/** External tool binaries. */
export interface ToolPaths {
  latexml: string;
  latexmlpost: string;
  ebookConvert: string;
  tar: string;
}

export interface AppConfig {
  tools: ToolPaths;
  /** Root under which per-paper working directories are created */
  workRoot: string;
  /** Language passed to the EPUB packager */
  language: string;
  logLevel: LogLevel;
  /** arXiv origin, without trailing slash */
  baseUrl: string;
}

/**
 * Build the configuration from an environment map.
 * Blank values are treated as unset.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  return {
    tools: {
      latexml: values.ARXIV_EPUB_LATEXML,
      latexmlpost: values.ARXIV_EPUB_LATEXMLPOST,
      ebookConvert: values.ARXIV_EPUB_EBOOK_CONVERT,
      tar: values.ARXIV_EPUB_TAR,
    },
    workRoot: values.ARXIV_EPUB_WORK_DIR,
    language: values.ARXIV_EPUB_LANGUAGE,
    logLevel: values.ARXIV_EPUB_LOG_LEVEL,
    baseUrl: values.ARXIV_EPUB_BASE_URL.replace(/\/+$/, ""),
  };
}

export interface LoadConfigOptions {
  /** Path of the dotenv file (default: ".env") */
  envFile?: string;
  /** Values that take precedence over the environment, e.g. from CLI flags */
  overrides?: Record<string, string>;
}

/** Load `.env` (if present) into process.env and parse the result. */
export function loadConfig(options?: LoadConfigOptions): AppConfig {
  dotenv.config({ path: options?.envFile ?? ".env", override: false });
  return parseConfig({ ...process.env, ...options?.overrides });
}

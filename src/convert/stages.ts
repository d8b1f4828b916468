/**
 * The three external converters, as an ordered list of stages.
 *
 *   latexml        primary .tex → build/<stem>.xml
 *   latexmlpost    build/<stem>.xml → build/<stem>.html
 *   ebook-convert  build/<stem>.html → output .epub
 *
 * Each stage declares its input and output paths up front, so a failure is
 * attributed to exactly one stage.
 */

import { basename, extname, join, resolve } from "node:path";
import type { ToolPaths } from "../config.js";
import type { ConverterName } from "../errors.js";
import type { ProcessSpec } from "../process.js";
import type { DocumentMetadata } from "./metadata.js";

export interface ConversionInput {
  /** Extracted source tree */
  sourceDir: string;
  /** Primary .tex file, relative to sourceDir */
  primarySource: string;
  /** Directory for intermediates */
  buildDir: string;
  /** Final EPUB path */
  outputPath: string;
}

export interface StageSettings {
  tools: ToolPaths;
  /** EPUB language code */
  language: string;
  verbose: boolean;
}

export interface ConversionStage {
  name: ConverterName;
  inputPath: string;
  outputPath: string;
  /** Build the command line. Metadata is whatever earlier stages made available. */
  toProcess(metadata: DocumentMetadata): ProcessSpec;
}

/** Paths of the intermediates produced for a primary source file. */
export function intermediatePaths(input: ConversionInput): { xml: string; html: string } {
  const stem = basename(input.primarySource, extname(input.primarySource));
  return {
    xml: resolve(join(input.buildDir, `${stem}.xml`)),
    html: resolve(join(input.buildDir, `${stem}.html`)),
  };
}

/** Build the ordered conversion stages. */
export function buildStages(input: ConversionInput, settings: StageSettings): ConversionStage[] {
  const sourceDir = resolve(input.sourceDir);
  const texPath = resolve(sourceDir, input.primarySource);
  const { xml, html } = intermediatePaths(input);
  const epub = resolve(input.outputPath);

  const latexml: ConversionStage = {
    name: "latexml",
    inputPath: texPath,
    outputPath: xml,
    toProcess: () => ({
      command: settings.tools.latexml,
      args: [
        `--dest=${xml}`,
        `--path=${sourceDir}`,
        ...(settings.verbose ? ["--verbose"] : []),
        texPath,
      ],
      cwd: sourceDir,
    }),
  };

  const latexmlpost: ConversionStage = {
    name: "latexmlpost",
    inputPath: xml,
    outputPath: html,
    toProcess: () => ({
      command: settings.tools.latexmlpost,
      args: [`--dest=${html}`, `--sourcedirectory=${sourceDir}`, xml],
      cwd: sourceDir,
    }),
  };

  const ebookConvert: ConversionStage = {
    name: "ebook-convert",
    inputPath: html,
    outputPath: epub,
    toProcess: (metadata) => {
      const args = [html, epub, "--language", settings.language, "--no-default-epub-cover"];
      if (metadata.title) args.push("--title", metadata.title);
      if (metadata.authors.length > 0) args.push("--authors", metadata.authors.join(" & "));
      return { command: settings.tools.ebookConvert, args };
    },
  };

  return [latexml, latexmlpost, ebookConvert];
}

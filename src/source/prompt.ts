/**
 * Interactive candidate chooser for the terminal.
 */

import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import { SelectionError } from "../errors.js";
import type { CandidateChooser } from "./selector.js";

export interface ConsoleChooserOptions {
  input?: Readable;
  output?: Writable;
  /** Invalid answers tolerated before giving up (default: 3) */
  maxAttempts?: number;
}

/** Parse an answer as a zero-based index into `count` candidates. */
export function parseSelection(answer: string, count: number): number | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const index = Number.parseInt(trimmed, 10);
  return index < count ? index : undefined;
}

/**
 * Create a chooser that lists candidates by index and reads the operator's pick.
 * Rejects with SelectionError after `maxAttempts` invalid answers or when input ends.
 */
export function createConsoleChooser(options?: ConsoleChooserOptions): CandidateChooser {
  const input = options?.input ?? process.stdin;
  const output = options?.output ?? process.stdout;
  const maxAttempts = options?.maxAttempts ?? 3;

  return async (candidates) => {
    const rl = createInterface({ input, terminal: false });
    // Buffers lines that arrive before they are asked for (piped input).
    const lines = rl[Symbol.asyncIterator]();

    try {
      output.write("Primary LaTeX file not found. Available .tex files:\n");
      candidates.forEach((file, i) => {
        output.write(`${i}: ${file}\n`);
      });

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        output.write("Select a file by index: ");
        const next = await lines.next();
        if (next.done) break;
        const answer = next.value;
        const index = parseSelection(answer, candidates.length);
        const chosen = index === undefined ? undefined : candidates[index];
        if (chosen !== undefined) return chosen;
        output.write(`Invalid index: ${answer.trim()}\n`);
      }
      throw new SelectionError("No source file selected");
    } finally {
      rl.close();
    }
  };
}

/**
 * File-tree helpers shared by the extractor, the source selector and cleanup.
 */

import { readdir } from "node:fs/promises";
import { join, posix } from "node:path";

/**
 * List every regular file under `dir`, as POSIX-style paths relative to `dir`,
 * sorted. Symbolic links are not followed.
 */
export async function walkFiles(dir: string): Promise<string[]> {
  const files: string[] = [];

  async function visit(relDir: string): Promise<void> {
    const entries = await readdir(join(dir, relDir), { withFileTypes: true });
    for (const entry of entries) {
      const rel = relDir ? posix.join(relDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        await visit(rel);
      } else if (entry.isFile()) {
        files.push(rel);
      }
    }
  }

  await visit("");
  return files.sort();
}

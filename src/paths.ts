/**
 * Path resolution for a paper's working directory.
 *
 * Layout under `<workRoot>/<paperDir>`:
 *   downloads/<paperDir>.tar.gz   source archive
 *   source/                       extracted source tree
 *   build/                        converter intermediates
 */

import { join } from "node:path";

/** Directory-safe form of a paper identifier ("hep-th/9901001" → "hep-th_9901001"). */
export function getPaperDirName(paperId: string): string {
  return paperId.replace(/[/\\]/g, "_");
}

/** Get the working directory for a paper. */
export function getWorkspaceDir(workRoot: string, paperId: string): string {
  return join(workRoot, getPaperDirName(paperId));
}

/** Get the downloaded source archive path. */
export function getArchivePath(workspaceDir: string, paperId: string): string {
  return join(workspaceDir, "downloads", `${getPaperDirName(paperId)}.tar.gz`);
}

/** Get the extracted source tree directory. */
export function getSourceDir(workspaceDir: string): string {
  return join(workspaceDir, "source");
}

/** Get the directory holding converter intermediates. */
export function getBuildDir(workspaceDir: string): string {
  return join(workspaceDir, "build");
}

/**
 * archive.ts - Packages a finished run directory
 *
 * The archive sits beside the run directory as <run-id>.tar.gz and its
 * entries are rooted at <run-id>/, so extracting it anywhere recreates the
 * tree as written.
 */

import { readdir, rm, stat } from "fs/promises";
import { basename, dirname, join } from "path";
import * as tar from "tar";
import { ArchiveError, errorMessage } from "./errors";
import type { CompressionMode } from "./types";

const ARCHIVE_PATTERN = /^collection-.*\.tar\.gz$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ArchiveOptions {
  /** Progress callback; warnings are prefixed with "Warning:". Defaults to stdout. */
  onProgress?: (message: string) => void;
}

/**
 * Writes <runDirectory>.tar.gz.
 *
 * @returns The archive path
 * @throws ArchiveError when the archive cannot be written; the tree is left as is
 */
export async function createArchive(runDirectory: string): Promise<string> {
  const archivePath = `${runDirectory}.tar.gz`;
  try {
    await tar.c(
      {
        gzip: true,
        file: archivePath,
        cwd: dirname(runDirectory),
        portable: true,
      },
      [basename(runDirectory)]
    );
  } catch (error) {
    throw new ArchiveError(`Cannot write archive ${archivePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return archivePath;
}

/**
 * Applies the compression mode to a finished run directory.
 *
 * - uncompressed: nothing to do
 * - both: write the archive, keep the tree
 * - compressed: write the archive, then remove the tree
 *
 * @returns The archive path, when one was written
 * @throws ArchiveError when a requested archive cannot be written
 */
export async function handleCompression(
  runDirectory: string,
  mode: CompressionMode,
  options: ArchiveOptions = {}
): Promise<string | undefined> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  if (mode === "uncompressed") return undefined;

  onProgress("Creating archive...");
  const archivePath = await createArchive(runDirectory);
  onProgress(`Archive written to ${archivePath}.`);

  if (mode === "compressed") {
    try {
      await rm(runDirectory, { recursive: true, force: true });
    } catch (error) {
      onProgress(`  Warning: could not remove ${runDirectory} (${errorMessage(error)})`);
    }
  }
  return archivePath;
}

/**
 * Deletes collection archives in outputDir older than retentionDays.
 *
 * Only files named collection-*.tar.gz are considered; anything else in the
 * directory is left alone. Failures are warnings.
 *
 * @returns Paths that were deleted
 */
export async function enforceRetention(
  outputDir: string,
  retentionDays: number,
  options: ArchiveOptions & { now?: Date; keep?: string } = {}
): Promise<string[]> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const cutoff = (options.now ?? new Date()).getTime() - retentionDays * DAY_MS;

  let entries: string[];
  try {
    entries = await readdir(outputDir);
  } catch (error) {
    onProgress(`  Warning: retention skipped, cannot read ${outputDir} (${errorMessage(error)})`);
    return [];
  }

  const deleted: string[] = [];
  for (const entry of entries.filter((e) => ARCHIVE_PATTERN.test(e)).sort()) {
    const path = join(outputDir, entry);
    if (path === options.keep) continue;
    try {
      const info = await stat(path);
      if (!info.isFile() || info.mtimeMs >= cutoff) continue;
      await rm(path);
      deleted.push(path);
    } catch (error) {
      onProgress(`  Warning: could not remove old archive ${path} (${errorMessage(error)})`);
    }
  }

  if (deleted.length > 0) {
    onProgress(`Removed ${deleted.length} archives older than ${retentionDays} days.`);
  }
  return deleted;
}

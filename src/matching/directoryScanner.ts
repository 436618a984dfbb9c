/**
 * Directory Scanner
 *
 * Lazily walks a search directory and yields every file below it.
 * Order is whatever the filesystem returns; callers must not rely on it.
 *
 * Walk semantics:
 * - symbolic links to files are yielded like files
 * - symbolic links to directories are not descended
 * - an unreadable nested directory is skipped with a warning
 * - a missing root (or a root that is not a directory) yields nothing
 * - a root that exists but cannot be read raises ScanError
 */

import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { ScanError, type CandidateFile } from './types';

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

async function isSymlinkToFile(entryPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(entryPath);
    return stats.isFile();
  } catch {
    // Dangling link
    return false;
  }
}

/**
 * Checks that `root` exists and is a directory. Logs a warning when it is not.
 */
export async function isSearchableDirectory(root: string): Promise<boolean> {
  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      logger.warn(`Search path is not a directory: ${root}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.warn(`Search directory unavailable (${errorCode(error) ?? 'unknown'}): ${root}`);
    return false;
  }
}

async function readEntries(directory: string): Promise<Dirent[]> {
  return fs.readdir(directory, { withFileTypes: true });
}

/**
 * Recursively yields the files under `root` as absolute paths.
 *
 * @throws ScanError when the root directory itself cannot be listed
 */
export async function* scanDirectory(root: string): AsyncGenerator<CandidateFile> {
  if (!(await isSearchableDirectory(root))) {
    return;
  }

  const absoluteRoot = path.resolve(root);
  let rootEntries: Dirent[];
  try {
    rootEntries = await readEntries(absoluteRoot);
  } catch (error) {
    throw new ScanError(
      absoluteRoot,
      `Failed to read search directory ${absoluteRoot}: ${errorMessage(error)}`,
      errorCode(error)
    );
  }

  // Depth-first, directories visited in the order they were listed
  const pending: Array<{ directory: string; entries: Dirent[] | null }> = [
    { directory: absoluteRoot, entries: rootEntries },
  ];

  while (pending.length > 0) {
    const next = pending.shift();
    if (!next) break;

    let entries = next.entries;
    if (entries === null) {
      try {
        entries = await readEntries(next.directory);
      } catch (error) {
        logger.warn(`Skipping unreadable directory ${next.directory}: ${errorMessage(error)}`);
        continue;
      }
    }

    const subdirectories: Array<{ directory: string; entries: null }> = [];
    for (const entry of entries) {
      const entryPath = path.join(next.directory, entry.name);

      if (entry.isDirectory()) {
        subdirectories.push({ directory: entryPath, entries: null });
      } else if (entry.isFile()) {
        yield { path: entryPath, name: entry.name };
      } else if (entry.isSymbolicLink() && (await isSymlinkToFile(entryPath))) {
        yield { path: entryPath, name: entry.name };
      }
    }

    // Files of a directory come before its subdirectories' files
    pending.unshift(...subdirectories);
  }
}

export default scanDirectory;

/**
 * Staging Service
 *
 * Builds the staging area that derivative generation and upload work from:
 *
 *   <STAGING_ROOT>/session_<YYYYMMDD_HHmmss>_<8 hex>/
 *     OBJS/   sanitized links (or copies) of the matched source files
 *     TN/     thumbnails, filled by the derivative step
 *     SMALL/  small renditions, filled by the derivative step
 *
 * Source files are never moved or modified.
 */

import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger';
import { formatFileTimestamp, resolveNameCollision, sanitizeStagedName } from '../utils/filename';

// ============================================
// Types
// ============================================

export type StagingMode = 'symlink' | 'copy';

export interface StagingArea {
  root: string;
  objectsDir: string;
  thumbnailsDir: string;
  smallsDir: string;
}

/**
 * A file to place in the staging area, with the target filename it answers
 */
export interface StagingRequest {
  target: string;
  sourcePath: string;
}

export interface StagedEntry {
  target: string;
  originalPath: string;
  originalName: string;
  stagedPath: string;
  stagedName: string;
}

export interface StagingReport {
  area: StagingArea;
  staged: StagedEntry[];
  skipped: Array<{ sourcePath: string; reason: string }>;
}

// ============================================
// Staging area
// ============================================

const SUBDIRECTORIES = {
  objectsDir: 'OBJS',
  thumbnailsDir: 'TN',
  smallsDir: 'SMALL',
} as const;

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Creates a fresh staging area under `stagingRoot`
 */
export async function createStagingArea(stagingRoot: string): Promise<StagingArea> {
  const sessionId = `${formatFileTimestamp()}_${randomUUID().slice(0, 8)}`;
  const root = path.resolve(stagingRoot, `session_${sessionId}`);

  const area: StagingArea = {
    root,
    objectsDir: path.join(root, SUBDIRECTORIES.objectsDir),
    thumbnailsDir: path.join(root, SUBDIRECTORIES.thumbnailsDir),
    smallsDir: path.join(root, SUBDIRECTORIES.smallsDir),
  };

  await ensureStagingArea(area);
  logger.info(`Created staging area: ${root}`);

  return area;
}

/**
 * Re-creates any missing subdirectory of an existing staging area
 */
export async function ensureStagingArea(area: StagingArea): Promise<void> {
  await fs.mkdir(area.objectsDir, { recursive: true });
  await fs.mkdir(area.thumbnailsDir, { recursive: true });
  await fs.mkdir(area.smallsDir, { recursive: true });
}

/**
 * Removes a staging area and everything in it (links only, never their targets)
 */
export async function removeStagingArea(area: StagingArea): Promise<void> {
  await fs.rm(area.root, { recursive: true, force: true });
  logger.info(`Removed staging area: ${area.root}`);
}

// ============================================
// Staging files
// ============================================

/**
 * Links or copies each source file into OBJS/ under a sanitized name.
 *
 * - missing sources are skipped with a warning
 * - name collisions get `_1`, `_2`, ... before the extension
 * - a failure on one file is logged and does not stop the others
 */
export async function stageFiles(
  area: StagingArea,
  requests: readonly StagingRequest[],
  mode: StagingMode = 'symlink'
): Promise<StagingReport> {
  await ensureStagingArea(area);

  const staged: StagedEntry[] = [];
  const skipped: StagingReport['skipped'] = [];

  for (const { target, sourcePath } of requests) {
    if (!sourcePath || !(await exists(sourcePath))) {
      logger.warn(`Skipping non-existent file: ${sourcePath}`);
      skipped.push({ sourcePath, reason: 'Source file does not exist' });
      continue;
    }

    const originalName = path.basename(sourcePath);

    try {
      const stagedName = await resolveNameCollision(sanitizeStagedName(originalName), (candidate) =>
        exists(path.join(area.objectsDir, candidate))
      );
      const stagedPath = path.join(area.objectsDir, stagedName);
      const absoluteSource = path.resolve(sourcePath);

      if (mode === 'copy') {
        await fs.copyFile(absoluteSource, stagedPath);
      } else {
        await fs.symlink(absoluteSource, stagedPath);
      }

      staged.push({ target, originalPath: sourcePath, originalName, stagedPath, stagedName });
      logger.info(`Staged '${stagedName}' -> '${sourcePath}' (${mode}) in OBJS/`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to stage ${sourcePath}: ${reason}`);
      skipped.push({ sourcePath, reason });
    }
  }

  logger.info(`Staged ${staged.length} file(s) in ${area.objectsDir}`);

  return { area, staged, skipped };
}

export const stagingService = {
  createStagingArea,
  ensureStagingArea,
  removeStagingArea,
  stageFiles,
};

export default stagingService;

/**
 * Single-Target Matcher
 *
 * Finds the file under one search directory whose name best matches a target
 * filename. Filesystem problems are returned as a `scan-failed` result; this
 * function never rejects.
 */

import { logger } from '../utils/logger';
import { calculateFilenameSimilarity } from './filenameSimilarity';
import { scanDirectory } from './directoryScanner';
import { PERFECT_SCORE } from './constants';
import { ScanError, type FileMatch, type TargetFilename } from './types';

const NO_CANDIDATE: FileMatch = { status: 'no-candidate', path: null, score: 0 };

/**
 * Scores every file under `root` against `target` (both case-folded) and
 * returns the best one.
 *
 * A later candidate replaces the best only with a strictly higher score, so
 * the first file seen wins ties. A perfect score stops the walk.
 *
 * @example
 * await matchFile('/archive/scans', 'photo1.jpg')
 * // { status: 'candidate', path: '/archive/scans/2019/Photo1.JPG', score: 100 }
 */
export async function matchFile(root: string, target: TargetFilename): Promise<FileMatch> {
  const normalizedTarget = target.toLowerCase();
  let bestPath: string | null = null;
  let bestScore = 0;

  try {
    for await (const candidate of scanDirectory(root)) {
      const score = calculateFilenameSimilarity(candidate.name.toLowerCase(), normalizedTarget);

      if (score > bestScore) {
        bestScore = score;
        bestPath = candidate.path;

        if (score === PERFECT_SCORE) {
          break;
        }
      }
    }
  } catch (error) {
    const scanError =
      error instanceof ScanError
        ? error
        : new ScanError(root, error instanceof Error ? error.message : 'Unknown error');
    logger.error(`Error in filename search under ${root}: ${scanError.message}`);
    return { status: 'scan-failed', path: null, score: 0, error: scanError };
  }

  if (bestPath === null) {
    return NO_CANDIDATE;
  }

  return { status: 'candidate', path: bestPath, score: bestScore };
}

export default matchFile;

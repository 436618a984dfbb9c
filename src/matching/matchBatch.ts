/**
 * Batch Matcher
 *
 * Runs the single-target matcher for each target, strictly one after another,
 * against one search directory. This is the cancellation boundary of a
 * reconciliation: the signal is polled before each target, and a cancelled
 * batch discards everything it computed.
 */

import { logger } from '../utils/logger';
import { matchFile } from './matchFile';
import { DEFAULT_MATCH_THRESHOLD } from './constants';
import type { BatchOptions, BatchResult, FileMatch, TargetFilename } from './types';

/**
 * Matches every target against `root`.
 *
 * Progress is reported after each target as `(i + 1) / total`. An empty
 * target list reports 0 then 1 and does nothing else.
 *
 * @returns Per-target best candidates, or `{ status: 'cancelled' }`
 */
export async function matchBatch(
  root: string,
  targets: readonly TargetFilename[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const { threshold = DEFAULT_MATCH_THRESHOLD, onProgress, signal } = options;
  const results = new Map<TargetFilename, FileMatch>();
  const total = targets.length;

  if (total === 0) {
    onProgress?.(0);
    onProgress?.(1);
    return { status: 'completed', results };
  }

  for (const [index, target] of targets.entries()) {
    if (signal?.aborted) {
      logger.info(`Filename search in ${root} cancelled before target ${index + 1}/${total}`);
      return { status: 'cancelled' };
    }

    logger.debug(`Searching for match to '${target}' (${index + 1}/${total}) in ${root}`);
    const match = await matchFile(root, target);
    results.set(target, match);

    if (match.status === 'candidate' && match.score >= threshold) {
      logger.debug(`Found match for '${target}': ${match.path} (${match.score}% match)`);
    } else {
      logger.debug(`No match for '${target}' meeting ${threshold}% threshold in ${root}`);
    }

    onProgress?.((index + 1) / total);
  }

  return { status: 'completed', results };
}

export default matchBatch;

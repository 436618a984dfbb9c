/**
 * Multi-Directory Reconciler
 *
 * Entry point of the matching engine.
 *
 * Flow:
 * 1. Short-circuit an empty scope (nothing scanned, everything unmatched)
 * 2. Run the batch matcher once per directory, in scope order
 * 3. Keep the best result per target across directories
 * 4. Partition targets into matched / unmatched by the threshold
 * 5. Summarize
 *
 * Every directory is scanned for every target, even after a perfect match
 * was found in an earlier directory.
 */

import { logger } from '../utils/logger';
import { matchBatch } from './matchBatch';
import { DEFAULT_MATCH_THRESHOLD, MAX_SCORE, MIN_SCORE } from './constants';
import type {
  FileMatch,
  MatchResult,
  ReconcileOptions,
  ReconcileResult,
  ReconciliationOutcome,
  SearchScope,
  TargetFilename,
} from './types';

interface BestResult {
  path: string | null;
  score: number;
}

/**
 * Validates a threshold supplied by a caller.
 *
 * @throws RangeError when not an integer from 0 to 100
 */
export function assertValidThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < MIN_SCORE || threshold > MAX_SCORE) {
    throw new RangeError(`Match threshold must be an integer from 0 to 100, got ${threshold}`);
  }
}

/**
 * Folds one directory's results into the running best-result map.
 * The first directory to report a target sets it; later ones must beat its score.
 */
export function mergeDirectoryResults(
  best: Map<TargetFilename, BestResult>,
  results: ReadonlyMap<TargetFilename, FileMatch>
): void {
  for (const [target, match] of results) {
    const current = best.get(target);
    if (current === undefined || match.score > current.score) {
      best.set(target, { path: match.path, score: match.score });
    }
  }
}

/**
 * Splits targets into matched and unmatched lists, one entry per input position.
 */
export function partitionResults(
  targets: readonly TargetFilename[],
  best: ReadonlyMap<TargetFilename, BestResult>,
  threshold: number
): Pick<ReconciliationOutcome, 'matched' | 'unmatched' | 'summary'> {
  const matched: MatchResult[] = [];
  const unmatched: MatchResult[] = [];

  for (const target of targets) {
    const result = best.get(target);
    const entry: MatchResult = {
      target,
      matchedPath: result?.path ?? null,
      score: result?.score ?? 0,
    };

    if (entry.matchedPath !== null && entry.score >= threshold) {
      matched.push(entry);
    } else {
      unmatched.push(entry);
    }
  }

  return {
    matched,
    unmatched,
    summary: { matchedCount: matched.length, totalCount: targets.length },
  };
}

/**
 * Reconciles target filenames against every directory in the search scope.
 *
 * Progress is reported over the whole run: directory `d` of `D` at batch
 * fraction `f` reports `(d + f) / D`.
 *
 * @returns The outcome, or `{ status: 'cancelled' }` when any directory's batch was cancelled
 *
 * @example
 * const result = await reconcile(['/archive/a', '/archive/b'], ['photo1.jpg'], { threshold: 90 });
 * if (result.status === 'completed') {
 *   console.log(`${result.summary.matchedCount} of ${result.summary.totalCount} matched`);
 * }
 */
export async function reconcile(
  scope: SearchScope,
  targets: readonly TargetFilename[],
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const { threshold = DEFAULT_MATCH_THRESHOLD, onProgress, signal } = options;
  assertValidThreshold(threshold);

  // ============================================
  // Empty scope: nothing to scan
  // ============================================
  if (scope.length === 0) {
    logger.warn(`Reconciliation requested with no search directories for ${targets.length} target(s)`);
    onProgress?.(0);
    onProgress?.(1);
    return {
      status: 'completed',
      threshold,
      ...partitionResults(targets, new Map(), threshold),
      failedDirectories: [],
      scopeWasEmpty: true,
    };
  }

  logger.info(
    `Starting filename search for ${targets.length} target(s) across ${scope.length} director${scope.length === 1 ? 'y' : 'ies'}`
  );

  const best = new Map<TargetFilename, BestResult>();
  const failedDirectories: string[] = [];
  let lastReported = 0;

  for (const [directoryIndex, directory] of scope.entries()) {
    logger.info(`Searching in directory: ${directory}`);

    const batch = await matchBatch(directory, targets, {
      threshold,
      signal,
      onProgress: (fraction) => {
        const overall = (directoryIndex + fraction) / scope.length;
        // Each batch restarts at 0; keep the overall stream non-decreasing
        if (overall >= lastReported) {
          lastReported = overall;
          onProgress?.(overall);
        }
      },
    });

    if (batch.status === 'cancelled') {
      logger.info('Filename search cancelled by user');
      return { status: 'cancelled' };
    }

    for (const match of batch.results.values()) {
      if (match.status === 'scan-failed' && !failedDirectories.includes(directory)) {
        failedDirectories.push(directory);
      }
    }

    mergeDirectoryResults(best, batch.results);
  }

  return {
    status: 'completed',
    threshold,
    ...partitionResults(targets, best, threshold),
    failedDirectories,
    scopeWasEmpty: false,
  };
}

export default reconcile;

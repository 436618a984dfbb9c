/**
 * Search Background Worker
 *
 * Runs a queued filename search in the background of the API process:
 * 1. SNAPSHOT - The search record carries its own copy of targets and scope.
 * 2. SEQUENTIAL - Directories and targets are matched one at a time, in order.
 * 3. CANCELLATION - The record's AbortController is checked before each target.
 *
 * The HTTP request that launched the search returns immediately; clients poll
 * the search status for progress.
 */

import { reconcile, logReconciliationOutcome } from '../matching';
import {
  getSearch,
  markSearchRunning,
  recordSearchProgress,
  markSearchCompleted,
  markSearchCancelled,
  markSearchFailed,
} from '../services/search.service';
import { logger } from '../utils';

// ============================================
// Main Job Handler
// ============================================

export async function processSearchJob(searchId: string): Promise<void> {
  const startTime = Date.now();
  const search = markSearchRunning(searchId);

  logger.info(`[${searchId}] Starting search for session ${search.sessionId}`);

  try {
    const result = await reconcile(search.scope, search.targets, {
      threshold: search.threshold,
      signal: search.controller.signal,
      onProgress: (fraction) => recordSearchProgress(searchId, fraction),
    });

    if (result.status === 'cancelled') {
      markSearchCancelled(searchId);
      logger.info(`[${searchId}] Search cancelled after ${Date.now() - startTime}ms`);
      return;
    }

    logReconciliationOutcome(result);
    markSearchCompleted(searchId, result);

    logger.info(
      `[${searchId}] ✅ Search complete: ${result.summary.matchedCount}/${result.summary.totalCount} matched in ${Date.now() - startTime}ms`
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    markSearchFailed(searchId, message);
    logger.error(`[${searchId}] ❌ Search failed: ${message}`);
  }
}

/**
 * Starts a queued search on the next turn of the event loop.
 * The returned promise settles when the search has finished (it never rejects).
 */
export function startBackgroundSearch(searchId: string): Promise<void> {
  // Fail fast on unknown ids, before the caller responds
  getSearch(searchId);

  return new Promise((resolve) => {
    setImmediate(() => {
      processSearchJob(searchId).then(resolve, (error: unknown) => {
        logger.error(
          `[${searchId}] ❌ Search worker crashed: ${error instanceof Error ? error.message : 'Unknown error'}`
        );
        resolve();
      });
    });
  });
}

export default {
  processSearchJob,
  startBackgroundSearch,
};

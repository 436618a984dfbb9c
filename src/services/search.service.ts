/**
 * Search Service
 *
 * Bookkeeping for filename searches launched from a session:
 * - creating a search record from a snapshot of the session's targets and scope
 * - status transitions (queued -> running -> completed | cancelled | failed)
 * - progress tracking
 * - cancellation through the search's AbortController
 *
 * The reconciliation itself runs in workers/searchWorker.ts.
 */

import { randomUUID } from 'crypto';
import { env } from '../config';
import { logger } from '../utils/logger';
import { AppError } from '../utils/AppError';
import { assertValidThreshold, type ReconciliationOutcome } from '../matching';
import {
  getCachedSearchProgress,
  initSearchProgress,
  updateSearchProgress,
  updateSearchStatusInCache,
} from '../redis';
import { getSession, markSearchFinished, markSearchStarted } from './session.service';

// ============================================
// Types
// ============================================

const SEARCH_STATES = ['queued', 'running', 'completed', 'cancelled', 'failed'] as const;

export type SearchState = (typeof SEARCH_STATES)[number];

const isSearchState = (value: string): value is SearchState =>
  SEARCH_STATES.some((state) => state === value);

export interface SearchRecord {
  id: string;
  sessionId: string;
  status: SearchState;
  threshold: number;
  /** Snapshot taken at launch; later session edits do not affect the run */
  targets: readonly string[];
  scope: readonly string[];
  progress: number;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  outcome: ReconciliationOutcome | null;
  error: string | null;
  controller: AbortController;
}

export interface SearchStatus {
  id: string;
  sessionId: string;
  status: SearchState;
  threshold: number;
  targetCount: number;
  directoryCount: number;
  /** Percentage 0-100 */
  progress: number;
  matchedCount: number | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  error: string | null;
  source: 'memory' | 'cache';
}

/** What the Redis mirror can tell about a search this process does not hold */
export type CachedSearchStatus = Pick<
  SearchStatus,
  'id' | 'status' | 'progress' | 'matchedCount' | 'targetCount' | 'source'
>;

export interface CreateSearchParams {
  threshold?: number;
}

// ============================================
// Store
// ============================================

const searches = new Map<string, SearchRecord>();

const isFinished = (search: SearchRecord): boolean =>
  search.status === 'completed' || search.status === 'cancelled' || search.status === 'failed';

/**
 * @throws AppError (404) for an unknown search id
 */
export function getSearch(searchId: string): SearchRecord {
  const search = searches.get(searchId);
  if (!search) {
    throw AppError.notFound(`Search not found: ${searchId}`);
  }
  return search;
}

/**
 * Aborts every unfinished search, e.g. on shutdown. Records are kept.
 *
 * @returns the number of searches aborted
 */
export function abortRunningSearches(): number {
  let aborted = 0;
  for (const search of searches.values()) {
    if (!isFinished(search)) {
      search.controller.abort();
      aborted++;
    }
  }
  return aborted;
}

/**
 * Forgets every search after aborting it. Used by tests.
 */
export function resetSearches(): void {
  for (const search of searches.values()) {
    search.controller.abort();
  }
  searches.clear();
}

// ============================================
// Lifecycle
// ============================================

/**
 * Creates a queued search from the session's current targets and scope.
 *
 * @throws AppError (400) when the session has no targets or the threshold is invalid,
 *         (409) when the session already has a search running
 */
export function createSearch(sessionId: string, params: CreateSearchParams = {}): SearchRecord {
  const session = getSession(sessionId);
  const threshold = params.threshold ?? env.MATCH_THRESHOLD;

  try {
    assertValidThreshold(threshold);
  } catch (error) {
    throw AppError.badRequest(error instanceof Error ? error.message : 'Invalid threshold');
  }

  if (session.targets.length === 0) {
    throw AppError.badRequest('No target filenames selected for this session');
  }

  const search: SearchRecord = {
    id: randomUUID(),
    sessionId,
    status: 'queued',
    threshold,
    targets: [...session.targets],
    scope: [...session.scope],
    progress: 0,
    createdAt: new Date(),
    startedAt: null,
    completedAt: null,
    outcome: null,
    error: null,
    controller: new AbortController(),
  };

  markSearchStarted(sessionId, search.id);
  searches.set(search.id, search);
  void initSearchProgress(search.id, search.targets.length);

  logger.info(
    `Search ${search.id} queued: ${search.targets.length} target(s), ${search.scope.length} director${search.scope.length === 1 ? 'y' : 'ies'}`
  );
  return search;
}

export function markSearchRunning(searchId: string): SearchRecord {
  const search = getSearch(searchId);
  search.status = 'running';
  search.startedAt = new Date();
  void updateSearchStatusInCache(searchId, 'running');
  return search;
}

export function recordSearchProgress(searchId: string, fraction: number): void {
  const search = getSearch(searchId);
  search.progress = fraction;
  void updateSearchProgress(searchId, fraction);
}

export function markSearchCompleted(searchId: string, outcome: ReconciliationOutcome): void {
  const search = getSearch(searchId);
  search.status = 'completed';
  search.progress = 1;
  search.outcome = outcome;
  search.completedAt = new Date();
  markSearchFinished(search.sessionId, searchId, outcome);
  void updateSearchStatusInCache(searchId, 'completed', outcome.summary.matchedCount);
}

export function markSearchCancelled(searchId: string): void {
  const search = getSearch(searchId);
  search.status = 'cancelled';
  search.completedAt = new Date();
  markSearchFinished(search.sessionId, searchId, null);
  void updateSearchStatusInCache(searchId, 'cancelled');
}

export function markSearchFailed(searchId: string, message: string): void {
  const search = getSearch(searchId);
  search.status = 'failed';
  search.error = message;
  search.completedAt = new Date();
  markSearchFinished(search.sessionId, searchId, null);
  void updateSearchStatusInCache(searchId, 'failed');
}

/**
 * Requests cancellation. The running reconciliation notices before its next target.
 *
 * @throws AppError (409) when the search has already finished
 */
export function cancelSearch(searchId: string): SearchRecord {
  const search = getSearch(searchId);
  if (isFinished(search)) {
    throw AppError.conflict(`Search ${searchId} has already ${search.status}`);
  }

  search.controller.abort();
  logger.info(`Cancellation requested for search ${searchId}`);
  return search;
}

// ============================================
// Reads
// ============================================

export function toSearchStatus(search: SearchRecord): SearchStatus {
  return {
    id: search.id,
    sessionId: search.sessionId,
    status: search.status,
    threshold: search.threshold,
    targetCount: search.targets.length,
    directoryCount: search.scope.length,
    progress: Math.round(search.progress * 100),
    matchedCount: search.outcome?.summary.matchedCount ?? null,
    createdAt: search.createdAt.toISOString(),
    startedAt: search.startedAt?.toISOString() ?? null,
    completedAt: search.completedAt?.toISOString() ?? null,
    error: search.error,
    source: 'memory',
  };
}

/**
 * Status of a search. Falls back to the Redis mirror for searches this
 * process no longer holds (e.g. after a restart).
 *
 * @returns null when neither this process nor the mirror knows the search
 */
export async function getSearchStatus(
  searchId: string
): Promise<SearchStatus | CachedSearchStatus | null> {
  const search = searches.get(searchId);
  if (search) {
    return toSearchStatus(search);
  }

  const cached = await getCachedSearchProgress(searchId);
  if (!cached) {
    return null;
  }

  return {
    id: searchId,
    status: isSearchState(cached.status) ? cached.status : 'queued',
    progress: Math.round(cached.progress * 100),
    matchedCount: cached.status === 'completed' ? cached.matchedCount : null,
    targetCount: cached.totalCount,
    source: 'cache',
  };
}

/**
 * @throws AppError (409) until the search has completed
 */
export function getSearchOutcome(searchId: string): ReconciliationOutcome {
  const search = getSearch(searchId);
  if (search.status !== 'completed' || !search.outcome) {
    throw AppError.conflict(`Search ${searchId} has no outcome (status: ${search.status})`);
  }
  return search.outcome;
}

export const searchService = {
  getSearch,
  abortRunningSearches,
  resetSearches,
  createSearch,
  markSearchRunning,
  recordSearchProgress,
  markSearchCompleted,
  markSearchCancelled,
  markSearchFailed,
  cancelSearch,
  toSearchStatus,
  getSearchStatus,
  getSearchOutcome,
};

export default searchService;

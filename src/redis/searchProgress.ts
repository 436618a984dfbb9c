/**
 * Search Progress Mirror
 *
 * Mirrors the progress of running searches into Redis so that dashboards
 * outside this process can follow them.
 *
 * - The in-memory search record is the SOURCE OF TRUTH
 * - Redis writes happen AFTER the record is updated
 * - Redis failures do not affect the search
 *
 * KEY FORMAT: search:{searchId}:progress
 */

import { safeRedisOperation, safeRedisWrite } from './client';

const CACHE_KEY_PREFIX = 'search:';
const CACHE_KEY_SUFFIX = ':progress';

/**
 * Searches should finish well within this time
 */
const CACHE_TTL_SECONDS = 60 * 60;

export function getSearchProgressKey(searchId: string): string {
  return `${CACHE_KEY_PREFIX}${searchId}${CACHE_KEY_SUFFIX}`;
}

/**
 * Search progress data stored in Redis
 */
export interface SearchProgress {
  /** 0..1 */
  progress: number;
  matchedCount: number;
  totalCount: number;
  status: string;
}

const toHash = (progress: SearchProgress): Record<string, string> => ({
  progress: progress.progress.toString(),
  matchedCount: progress.matchedCount.toString(),
  totalCount: progress.totalCount.toString(),
  status: progress.status,
});

/**
 * Reads mirrored progress back (null when absent or Redis is unavailable)
 */
export async function getCachedSearchProgress(searchId: string): Promise<SearchProgress | null> {
  return safeRedisOperation(
    async (client) => {
      const data = await client.hgetall(getSearchProgressKey(searchId));
      if (Object.keys(data).length === 0) {
        return null;
      }

      return {
        progress: parseFloat(data.progress ?? '0'),
        matchedCount: parseInt(data.matchedCount ?? '0', 10),
        totalCount: parseInt(data.totalCount ?? '0', 10),
        status: data.status ?? 'unknown',
      };
    },
    null,
    `Search progress GET (${searchId})`
  );
}

export async function setCachedSearchProgress(searchId: string, progress: SearchProgress): Promise<void> {
  const cacheKey = getSearchProgressKey(searchId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();
    multi.hset(cacheKey, toHash(progress));
    multi.expire(cacheKey, CACHE_TTL_SECONDS);
    await multi.exec();
  }, `Search progress SET (${searchId})`);
}

export async function initSearchProgress(searchId: string, totalCount: number): Promise<void> {
  await setCachedSearchProgress(searchId, {
    progress: 0,
    matchedCount: 0,
    totalCount,
    status: 'queued',
  });
}

export async function updateSearchProgress(searchId: string, progress: number): Promise<void> {
  await safeRedisWrite(async (client) => {
    await client.hset(getSearchProgressKey(searchId), 'progress', progress.toString());
  }, `Search progress UPDATE (${searchId})`);
}

export async function updateSearchStatusInCache(
  searchId: string,
  status: string,
  matchedCount?: number
): Promise<void> {
  await safeRedisWrite(async (client) => {
    const fields: Record<string, string> = { status };
    if (matchedCount !== undefined) {
      fields.matchedCount = matchedCount.toString();
    }
    await client.hset(getSearchProgressKey(searchId), fields);
  }, `Search status UPDATE (${searchId})`);
}

export default {
  getSearchProgressKey,
  getCachedSearchProgress,
  setCachedSearchProgress,
  initSearchProgress,
  updateSearchProgress,
  updateSearchStatusInCache,
};

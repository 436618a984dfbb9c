/**
 * Redis Module
 *
 * Redis is OPTIONAL. It mirrors search progress; the service works the same without it.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Search progress exports
export {
  getSearchProgressKey,
  getCachedSearchProgress,
  setCachedSearchProgress,
  initSearchProgress,
  updateSearchProgress,
  updateSearchStatusInCache,
  type SearchProgress,
} from './searchProgress';

/**
 * Tests for the search progress mirror
 *
 * The Redis client module is replaced by an in-memory hash store so the
 * key layout and field encoding can be checked without a server.
 */

import {
  getCachedSearchProgress,
  getSearchProgressKey,
  initSearchProgress,
  updateSearchProgress,
  updateSearchStatusInCache,
} from '../../src/redis/searchProgress';

const mockStore = new Map<string, Record<string, string>>();
const mockExpire = jest.fn();

const mockHset = (key: string, fields: Record<string, string> | string, value?: string): number => {
  const hash = mockStore.get(key) ?? {};
  if (typeof fields === 'string') {
    hash[fields] = value ?? '';
  } else {
    Object.assign(hash, fields);
  }
  mockStore.set(key, hash);
  return 1;
};

const mockClient = {
  hset: async (key: string, fields: Record<string, string> | string, value?: string) =>
    mockHset(key, fields, value),
  hgetall: async (key: string) => ({ ...(mockStore.get(key) ?? {}) }),
  multi: () => {
    const queued: Array<() => void> = [];
    return {
      hset: (key: string, fields: Record<string, string>) => {
        queued.push(() => mockHset(key, fields));
      },
      expire: (key: string, seconds: number) => {
        queued.push(() => mockExpire(key, seconds));
      },
      exec: async () => {
        queued.forEach((run) => run());
        return [];
      },
    };
  },
};

jest.mock('../../src/redis/client', () => ({
  safeRedisOperation: async (
    operation: (client: unknown) => Promise<unknown>,
    fallback: unknown
  ): Promise<unknown> => operation(mockClient).catch(() => fallback),
  safeRedisWrite: async (operation: (client: unknown) => Promise<unknown>): Promise<void> => {
    await operation(mockClient);
  },
}));

describe('Search Progress', () => {
  beforeEach(() => {
    mockStore.clear();
    mockExpire.mockClear();
  });

  describe('getSearchProgressKey', () => {
    it('should build the hash key', () => {
      expect(getSearchProgressKey('abc')).toBe('search:abc:progress');
    });
  });

  describe('initSearchProgress', () => {
    it('should write a queued entry with a one hour expiry', async () => {
      await initSearchProgress('abc', 12);

      expect(mockStore.get('search:abc:progress')).toEqual({
        progress: '0',
        matchedCount: '0',
        totalCount: '12',
        status: 'queued',
      });
      expect(mockExpire).toHaveBeenCalledWith('search:abc:progress', 3600);
    });
  });

  describe('updates', () => {
    it('should update progress and status fields in place', async () => {
      await initSearchProgress('abc', 4);
      await updateSearchProgress('abc', 0.75);
      await updateSearchStatusInCache('abc', 'completed', 3);

      expect(await getCachedSearchProgress('abc')).toEqual({
        progress: 0.75,
        matchedCount: 3,
        totalCount: 4,
        status: 'completed',
      });
    });

    it('should leave matchedCount alone when not given', async () => {
      await initSearchProgress('abc', 4);
      await updateSearchStatusInCache('abc', 'cancelled');

      expect(mockStore.get('search:abc:progress')).toMatchObject({ status: 'cancelled', matchedCount: '0' });
    });
  });

  describe('getCachedSearchProgress', () => {
    it('should return null for an unknown search', async () => {
      expect(await getCachedSearchProgress('unknown')).toBeNull();
    });
  });
});

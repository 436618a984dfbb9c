/**
 * Tests for search records: creation, lifecycle and cancellation
 */

import {
  abortRunningSearches,
  cancelSearch,
  createSearch,
  getSearch,
  getSearchOutcome,
  getSearchStatus,
  markSearchCancelled,
  markSearchCompleted,
  markSearchFailed,
  markSearchRunning,
  recordSearchProgress,
  resetSearches,
  toSearchStatus,
} from '../../src/services/search.service';
import { createSession, resetSessions, setTargets } from '../../src/services/session.service';
import type { ReconciliationOutcome } from '../../src/matching';
import { AppError } from '../../src/utils/AppError';

const completedOutcome: ReconciliationOutcome = {
  status: 'completed',
  threshold: 90,
  matched: [{ target: 'a.tif', matchedPath: '/scans/a.tif', score: 100 }],
  unmatched: [{ target: 'b.tif', matchedPath: null, score: 0 }],
  summary: { matchedCount: 1, totalCount: 2 },
  failedDirectories: [],
  scopeWasEmpty: false,
};

describe('Search Service', () => {
  afterEach(() => {
    resetSearches();
    resetSessions();
  });

  const sessionWithTargets = (targets: string[] = ['a.tif', 'b.tif']) => {
    const session = createSession();
    setTargets(session.id, targets);
    return session;
  };

  // ============================================
  // Creation
  // ============================================
  describe('createSearch', () => {
    it('should queue a search with the default threshold', () => {
      const session = sessionWithTargets();

      const search = createSearch(session.id);

      expect(search).toMatchObject({
        sessionId: session.id,
        status: 'queued',
        threshold: 90,
        targets: ['a.tif', 'b.tif'],
        scope: [],
        progress: 0,
        outcome: null,
      });
      expect(session.activeSearchId).toBe(search.id);
    });

    it('should snapshot targets and scope', () => {
      const session = sessionWithTargets();
      const search = createSearch(session.id, { threshold: 75 });

      setTargets(session.id, ['c.tif']);
      session.scope.push('/scans');

      expect(search.targets).toEqual(['a.tif', 'b.tif']);
      expect(search.scope).toEqual([]);
      expect(search.threshold).toBe(75);
    });

    it('should reject a session without targets', () => {
      const session = createSession();

      expect(() => createSearch(session.id)).toThrow('No target filenames selected for this session');
    });

    it('should reject an invalid threshold with 400', () => {
      const session = sessionWithTargets();

      const attempt = () => createSearch(session.id, { threshold: 101 });

      expect(attempt).toThrow(AppError);
      expect(attempt).toThrow('Match threshold must be an integer from 0 to 100, got 101');
    });

    it('should reject a second search while one is active', () => {
      const session = sessionWithTargets();
      createSearch(session.id);

      expect(() => createSearch(session.id)).toThrow(
        `A search is already running for this session: ${session.activeSearchId}`
      );
    });
  });

  // ============================================
  // Lifecycle
  // ============================================
  describe('lifecycle', () => {
    it('should track progress as a percentage', () => {
      const search = createSearch(sessionWithTargets().id);
      markSearchRunning(search.id);

      recordSearchProgress(search.id, 1 / 3);

      expect(toSearchStatus(search)).toMatchObject({ status: 'running', progress: 33 });
      expect(search.startedAt).toBeInstanceOf(Date);
    });

    it('should store the outcome on completion and release the session', () => {
      const session = sessionWithTargets();
      const search = createSearch(session.id);
      markSearchRunning(search.id);

      markSearchCompleted(search.id, completedOutcome);

      expect(toSearchStatus(search)).toMatchObject({ status: 'completed', progress: 100, matchedCount: 1 });
      expect(getSearchOutcome(search.id)).toBe(completedOutcome);
      expect(session.activeSearchId).toBeNull();
      expect(session.lastOutcome).toBe(completedOutcome);
      expect(session.lastSearchId).toBe(search.id);
    });

    it('should record a failure message', () => {
      const session = sessionWithTargets();
      const search = createSearch(session.id);

      markSearchFailed(search.id, 'disk unavailable');

      expect(toSearchStatus(search)).toMatchObject({ status: 'failed', error: 'disk unavailable' });
      expect(session.activeSearchId).toBeNull();
      expect(session.lastOutcome).toBeNull();
    });

    it('should refuse the outcome until the search completed', () => {
      const search = createSearch(sessionWithTargets().id);

      expect(() => getSearchOutcome(search.id)).toThrow(
        `Search ${search.id} has no outcome (status: queued)`
      );
    });
  });

  // ============================================
  // Cancellation
  // ============================================
  describe('cancelSearch', () => {
    it('should abort the search controller', () => {
      const search = createSearch(sessionWithTargets().id);

      cancelSearch(search.id);

      expect(search.controller.signal.aborted).toBe(true);
    });

    it('should refuse to cancel a finished search', () => {
      const search = createSearch(sessionWithTargets().id);
      markSearchCancelled(search.id);

      expect(() => cancelSearch(search.id)).toThrow(`Search ${search.id} has already cancelled`);
    });

    it('should abort every unfinished search', () => {
      const running = createSearch(sessionWithTargets().id);
      const finished = createSearch(sessionWithTargets().id);
      markSearchCompleted(finished.id, completedOutcome);

      expect(abortRunningSearches()).toBe(1);
      expect(running.controller.signal.aborted).toBe(true);
      expect(finished.controller.signal.aborted).toBe(false);
    });
  });

  // ============================================
  // Reads
  // ============================================
  describe('reads', () => {
    it('should throw 404 for an unknown search', () => {
      expect(() => getSearch('missing')).toThrow('Search not found: missing');
    });

    it('should return the in-memory status', async () => {
      const search = createSearch(sessionWithTargets().id);

      expect(await getSearchStatus(search.id)).toMatchObject({
        id: search.id,
        status: 'queued',
        targetCount: 2,
        directoryCount: 0,
        source: 'memory',
      });
    });

    it('should return null when neither memory nor cache know the search', async () => {
      expect(await getSearchStatus('missing')).toBeNull();
    });
  });
});

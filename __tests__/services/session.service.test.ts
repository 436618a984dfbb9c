/**
 * Tests for the operator session store
 */

import path from 'path';
import { readFile, stat, writeFile } from 'fs/promises';
import {
  addDirectory,
  attachCsv,
  clearCsv,
  clearDirectories,
  createSession,
  deleteSession,
  getSession,
  markSearchFinished,
  markSearchStarted,
  removeDirectory,
  resetSessions,
  rewriteSessionCsv,
  selectCsvColumn,
  setTargets,
  stageSession,
  toSessionView,
} from '../../src/services/session.service';
import type { ReconciliationOutcome } from '../../src/matching';
import { createTree, removeTree } from '../helpers/fsFixtures';

const outcomeFor = (root: string): ReconciliationOutcome => ({
  status: 'completed',
  threshold: 90,
  matched: [{ target: 'photo1.jpg', matchedPath: path.join(root, 'scans', 'Photo1.JPG'), score: 100 }],
  unmatched: [{ target: 'photo9.jpg', matchedPath: null, score: 0 }],
  summary: { matchedCount: 1, totalCount: 2 },
  failedDirectories: [],
  scopeWasEmpty: false,
});

describe('Session Service', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTree({
      'scans/Photo1.JPG': 'x',
      'more/photo 2.jpg': 'x',
      'metadata.csv': 'identifier,filename\n001,photo1.jpg\n002, photo 2.jpg \n003,\n',
      'empty.csv': '',
      'notes.txt': 'not a directory',
    });
  });

  afterEach(async () => {
    resetSessions();
    await removeTree(root);
  });

  const csvUpload = () => ({ originalName: 'metadata.csv', workingPath: path.join(root, 'metadata.csv') });

  // ============================================
  // Sessions
  // ============================================
  describe('sessions', () => {
    it('should create an empty session', () => {
      const session = createSession();

      expect(toSessionView(session)).toMatchObject({
        id: session.id,
        targets: [],
        targetSource: null,
        targetCount: 0,
        scope: [],
        csv: null,
        lastSearchId: null,
        activeSearchId: null,
        summary: null,
        staging: null,
      });
    });

    it('should throw 404 for an unknown session', () => {
      expect(() => getSession('missing')).toThrow('Session not found: missing');
    });

    it('should delete a session and its staging area', async () => {
      const session = createSession();
      const report = await stageSession(session.id, { paths: [path.join(root, 'scans', 'Photo1.JPG')] });

      await deleteSession(session.id);

      expect(() => getSession(session.id)).toThrow();
      await expect(stat(report.area.root)).rejects.toThrow();
    });
  });

  // ============================================
  // Targets
  // ============================================
  describe('setTargets', () => {
    it('should trim targets and drop empty ones', () => {
      const session = createSession();

      setTargets(session.id, [' photo1.jpg ', '', '   ', 'photo2.jpg', 'photo1.jpg']);

      expect(session.targets).toEqual(['photo1.jpg', 'photo2.jpg', 'photo1.jpg']);
      expect(session.targetSource).toBe('picker');
    });

    it('should clear the last outcome', () => {
      const session = createSession();
      markSearchStarted(session.id, 'search-1');
      markSearchFinished(session.id, 'search-1', outcomeFor(root));

      setTargets(session.id, ['photo1.jpg']);

      expect(session.lastOutcome).toBeNull();
      expect(session.lastSearchId).toBeNull();
    });
  });

  // ============================================
  // CSV selection
  // ============================================
  describe('CSV selection', () => {
    it('should read headings and wait for a column', async () => {
      const session = createSession();
      setTargets(session.id, ['stale.jpg']);

      await attachCsv(session.id, csvUpload());

      expect(session.csv).toEqual({ ...csvUpload(), headings: ['identifier', 'filename'], column: null });
      expect(session.targets).toEqual([]);
    });

    it('should extract targets from the chosen column', async () => {
      const session = createSession();
      await attachCsv(session.id, csvUpload());

      await selectCsvColumn(session.id, 'filename');

      expect(session.targets).toEqual(['photo1.jpg', 'photo 2.jpg']);
      expect(session.targetSource).toBe('csv');
      expect(session.csv?.column).toBe('filename');
    });

    it('should reject an unknown column and keep the previous one', async () => {
      const session = createSession();
      await attachCsv(session.id, csvUpload());
      await selectCsvColumn(session.id, 'filename');

      await expect(selectCsvColumn(session.id, 'title')).rejects.toMatchObject({ statusCode: 400 });
      expect(session.csv?.column).toBe('filename');
    });

    it('should require a CSV before choosing a column', async () => {
      const session = createSession();

      await expect(selectCsvColumn(session.id, 'filename')).rejects.toThrow('No CSV file selected');
    });

    it('should reject a CSV without a heading row', async () => {
      const session = createSession();

      await expect(
        attachCsv(session.id, { originalName: 'empty.csv', workingPath: path.join(root, 'empty.csv') })
      ).rejects.toThrow('CSV file has no heading row');
    });

    it('should clear targets, scope and staging with the CSV', async () => {
      const session = createSession();
      await attachCsv(session.id, csvUpload());
      await selectCsvColumn(session.id, 'filename');
      await addDirectory(session.id, path.join(root, 'scans'));
      const report = await stageSession(session.id, { paths: [path.join(root, 'scans', 'Photo1.JPG')] });

      await clearCsv(session.id);

      expect(toSessionView(session)).toMatchObject({ csv: null, targets: [], scope: [], staging: null });
      await expect(stat(report.area.root)).rejects.toThrow();
    });
  });

  // ============================================
  // Search scope
  // ============================================
  describe('search scope', () => {
    it('should add directories in order as absolute paths', async () => {
      const session = createSession();
      const relative = path.relative(process.cwd(), path.join(root, 'more'));

      await addDirectory(session.id, path.join(root, 'scans'));
      await addDirectory(session.id, relative);

      expect(session.scope).toEqual([path.join(root, 'scans'), path.join(root, 'more')]);
    });

    it('should reject a duplicate directory with 409', async () => {
      const session = createSession();
      await addDirectory(session.id, path.join(root, 'scans'));

      await expect(addDirectory(session.id, path.join(root, 'scans', '..', 'scans'))).rejects.toMatchObject({
        statusCode: 409,
        message: `Directory already in search scope: ${path.join(root, 'scans')}`,
      });
    });

    it('should reject a file with 400', async () => {
      const session = createSession();

      await expect(addDirectory(session.id, path.join(root, 'notes.txt'))).rejects.toMatchObject({
        statusCode: 400,
        message: `Not a directory: ${path.join(root, 'notes.txt')}`,
      });
    });

    it('should reject a missing path with 400', async () => {
      const session = createSession();

      await expect(addDirectory(session.id, path.join(root, 'nowhere'))).rejects.toMatchObject({
        statusCode: 400,
        message: `Directory not found: ${path.join(root, 'nowhere')}`,
      });
    });

    it('should remove a directory by index', async () => {
      const session = createSession();
      await addDirectory(session.id, path.join(root, 'scans'));
      await addDirectory(session.id, path.join(root, 'more'));

      removeDirectory(session.id, 0);

      expect(session.scope).toEqual([path.join(root, 'more')]);
    });

    it('should throw 404 for an index outside the scope', () => {
      const session = createSession();

      expect(() => removeDirectory(session.id, 0)).toThrow('No search directory at index 0');
    });

    it('should clear the outcome when the scope becomes empty', async () => {
      const session = createSession();
      await addDirectory(session.id, path.join(root, 'scans'));
      markSearchStarted(session.id, 'search-1');
      markSearchFinished(session.id, 'search-1', outcomeFor(root));

      removeDirectory(session.id, 0);

      expect(session.lastOutcome).toBeNull();
    });

    it('should clear every directory', async () => {
      const session = createSession();
      await addDirectory(session.id, path.join(root, 'scans'));

      clearDirectories(session.id);

      expect(session.scope).toEqual([]);
    });
  });

  // ============================================
  // Search bookkeeping
  // ============================================
  describe('search bookkeeping', () => {
    it('should allow one active search at a time', () => {
      const session = createSession();
      markSearchStarted(session.id, 'search-1');

      expect(() => markSearchStarted(session.id, 'search-2')).toThrow(
        'A search is already running for this session: search-1'
      );
    });

    it('should keep the previous outcome when a search ends without one', () => {
      const session = createSession();
      const outcome = outcomeFor(root);
      markSearchStarted(session.id, 'search-1');
      markSearchFinished(session.id, 'search-1', outcome);
      markSearchStarted(session.id, 'search-2');

      markSearchFinished(session.id, 'search-2', null);

      expect(session.activeSearchId).toBeNull();
      expect(session.lastOutcome).toBe(outcome);
      expect(session.lastSearchId).toBe('search-1');
    });

    it('should ignore sessions deleted meanwhile', () => {
      expect(() => markSearchFinished('gone', 'search-1', null)).not.toThrow();
    });
  });

  // ============================================
  // Staging and CSV rewrite
  // ============================================
  describe('stageSession', () => {
    it('should stage the matched entries of the last outcome', async () => {
      const session = createSession();
      markSearchStarted(session.id, 'search-1');
      markSearchFinished(session.id, 'search-1', outcomeFor(root));

      const report = await stageSession(session.id);

      expect(report.staged.map((entry) => [entry.target, entry.stagedName])).toEqual([
        ['photo1.jpg', 'Photo1.JPG'],
      ]);
      expect(toSessionView(session).staging).toEqual({ root: report.area.root, stagedCount: 1 });
    });

    it('should stage explicit paths with their basename as target', async () => {
      const session = createSession();

      const report = await stageSession(session.id, { paths: [path.join(root, 'more', 'photo 2.jpg')] });

      expect(report.staged[0]).toMatchObject({ target: 'photo 2.jpg', stagedName: 'photo_2.jpg' });
    });

    it('should reuse the staging area across calls', async () => {
      const session = createSession();

      const first = await stageSession(session.id, { paths: [path.join(root, 'scans', 'Photo1.JPG')] });
      const second = await stageSession(session.id, { paths: [path.join(root, 'more', 'photo 2.jpg')] });

      expect(second.area.root).toBe(first.area.root);
      expect(toSessionView(session).staging?.stagedCount).toBe(2);
    });

    it('should need a search or explicit paths', async () => {
      const session = createSession();

      await expect(stageSession(session.id)).rejects.toThrow(
        'Nothing to stage: run a search or provide file paths'
      );
    });
  });

  describe('rewriteSessionCsv', () => {
    it('should write staged names into the working copy', async () => {
      const session = createSession();
      await attachCsv(session.id, csvUpload());
      await selectCsvColumn(session.id, 'filename');
      await stageSession(session.id, { paths: [path.join(root, 'more', 'photo 2.jpg')] });

      const report = await rewriteSessionCsv(session.id, { mode: 'filename' });

      // ' photo 2.jpg ' in the CSV was extracted trimmed and is matched trimmed
      expect(report.updatedRows).toBe(1);
      expect(await readFile(path.join(root, 'metadata.csv'), 'utf-8')).toBe(
        'identifier,filename\n001,photo1.jpg\n002,photo_2.jpg\n003,\n'
      );
    });

    it('should rewrite URLs from the latest staging of a target only', async () => {
      const csvPath = path.join(root, 'urls.csv');
      await writeFile(csvPath, 'filename,object_location,image_small,image_thumb\nphoto1.jpg,,,\n');
      const session = createSession();
      await attachCsv(session.id, { originalName: 'urls.csv', workingPath: csvPath });
      await selectCsvColumn(session.id, 'filename');
      markSearchStarted(session.id, 'search-1');
      markSearchFinished(session.id, 'search-1', outcomeFor(root));

      await stageSession(session.id);
      const second = await stageSession(session.id);

      expect(second.staged.map((entry) => entry.stagedName)).toEqual(['Photo1_1.JPG']);
      expect(session.staging?.entries.map((entry) => entry.stagedName)).toEqual(['Photo1_1.JPG']);

      const report = await rewriteSessionCsv(session.id, { mode: 'urls', baseUrl: 'https://store.example.org' });

      expect(report.updatedRows).toBe(1);
      expect(report.preservedCells).toBe(0);
      expect(await readFile(csvPath, 'utf-8')).toBe(
        [
          'filename,object_location,image_small,image_thumb',
          'photo1.jpg,https://store.example.org/objs/Photo1_1.JPG,https://store.example.org/smalls/Photo1_1_SMALL.jpg,https://store.example.org/thumbs/Photo1_1_TN.jpg',
          '',
        ].join('\n')
      );
    });

    it('should require a CSV, a column and staged files', async () => {
      const session = createSession();
      await expect(rewriteSessionCsv(session.id, { mode: 'filename' })).rejects.toThrow('No CSV file selected');

      await attachCsv(session.id, csvUpload());
      await expect(rewriteSessionCsv(session.id, { mode: 'filename' })).rejects.toThrow(
        'Filename column not selected'
      );

      await selectCsvColumn(session.id, 'filename');
      await expect(rewriteSessionCsv(session.id, { mode: 'filename' })).rejects.toThrow(
        'No staged files to write into the CSV'
      );
    });
  });
});

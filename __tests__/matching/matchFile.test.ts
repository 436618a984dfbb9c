/**
 * Tests for the single-target matcher
 */

import fsPromises from 'fs/promises';
import path from 'path';
import { matchFile } from '../../src/matching/matchFile';
import { ScanError } from '../../src/matching/types';
import { createTree, removeTree } from '../helpers/fsFixtures';

describe('matchFile', () => {
  let root: string;

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTree(root);
  });

  it('should match case-insensitively with a perfect score', async () => {
    root = await createTree({ 'scans/Photo1.JPG': 'x' });

    const match = await matchFile(root, 'photo1.jpg');

    expect(match).toEqual({
      status: 'candidate',
      path: path.join(root, 'scans', 'Photo1.JPG'),
      score: 100,
    });
  });

  it('should pick the highest scoring candidate', async () => {
    // 'photo2_final.jpg' scores 62, 'other.png' scores 60
    root = await createTree({ 'other.png': 'x', 'nested/photo2_final.jpg': 'x' });

    const match = await matchFile(root, 'photo2.jpg');

    expect(match).toEqual({
      status: 'candidate',
      path: path.join(root, 'nested', 'photo2_final.jpg'),
      score: 62,
    });
  });

  it('should keep the first candidate seen on a tie', async () => {
    // both score 85 against abc.txt; root files are visited before subdirectories
    root = await createTree({ 'abd.txt': 'x', 'sub/abe.txt': 'x' });

    const match = await matchFile(root, 'abc.txt');

    expect(match).toEqual({ status: 'candidate', path: path.join(root, 'abd.txt'), score: 85 });
  });

  it('should return a candidate below any threshold', async () => {
    root = await createTree({ 'letter.pdf': 'x' });

    const match = await matchFile(root, 'ledger.csv');

    expect(match.status).toBe('candidate');
    expect(match.score).toBeLessThan(90);
  });

  it('should return no-candidate when nothing scores above 0', async () => {
    root = await createTree({ 'abc.txt': 'x' });

    expect(await matchFile(root, 'zzz')).toEqual({ status: 'no-candidate', path: null, score: 0 });
  });

  it('should return no-candidate for an empty directory', async () => {
    root = await createTree();

    expect(await matchFile(root, 'photo1.jpg')).toEqual({
      status: 'no-candidate',
      path: null,
      score: 0,
    });
  });

  it('should return no-candidate for a missing directory', async () => {
    root = await createTree();

    const match = await matchFile(path.join(root, 'gone'), 'photo1.jpg');

    expect(match.status).toBe('no-candidate');
  });

  it('should stop walking after a perfect match', async () => {
    root = await createTree({ 'photo1.jpg': 'x', 'sub/photo1 copy.jpg': 'x' });
    const readdir = jest.spyOn(fsPromises, 'readdir');

    const match = await matchFile(root, 'photo1.jpg');

    expect(match.score).toBe(100);
    // the subdirectory is never listed
    expect(readdir).toHaveBeenCalledTimes(1);
  });

  it('should report a scan failure instead of throwing', async () => {
    root = await createTree({ 'photo1.jpg': 'x' });
    jest
      .spyOn(fsPromises, 'readdir')
      .mockRejectedValueOnce(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

    const match = await matchFile(root, 'photo1.jpg');

    expect(match.status).toBe('scan-failed');
    expect(match.path).toBeNull();
    expect(match.score).toBe(0);
    if (match.status === 'scan-failed') {
      expect(match.error).toBeInstanceOf(ScanError);
      expect(match.error.code).toBe('EACCES');
      expect(match.error.root).toBe(root);
    }
  });
});

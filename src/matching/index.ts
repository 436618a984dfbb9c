/**
 * Filename Reconciliation Engine
 *
 * Matches target filenames against the files found under a set of search
 * directories, with a 0-100 confidence score per target.
 *
 * Usage:
 * ```typescript
 * import { reconcile } from './matching';
 *
 * const controller = new AbortController();
 * const result = await reconcile(['/archive/scans'], ['photo1.jpg'], {
 *   threshold: 90,
 *   signal: controller.signal,
 *   onProgress: (fraction) => console.log(`${Math.round(fraction * 100)}%`),
 * });
 * ```
 */

// Main function
export { reconcile, mergeDirectoryResults, partitionResults, assertValidThreshold } from './reconcile';

// Building blocks
export { matchBatch } from './matchBatch';
export { matchFile } from './matchFile';
export { scanDirectory, isSearchableDirectory } from './directoryScanner';
export { calculateFilenameSimilarity, countSharedCharacters } from './filenameSimilarity';
export { logReconciliationOutcome, unmatchedLogLevel, describeUnmatched } from './outcomeLogger';

// Constants
export { DEFAULT_MATCH_THRESHOLD, PERFECT_SCORE, MIN_SCORE, MAX_SCORE, LOG_TIERS } from './constants';

// Types
export { ScanError } from './types';
export type {
  TargetFilename,
  CandidateFile,
  SearchScope,
  ProgressListener,
  BatchOptions,
  ReconcileOptions,
  FileMatch,
  BatchResult,
  MatchResult,
  ReconciliationSummary,
  ReconciliationOutcome,
  ReconcileResult,
} from './types';

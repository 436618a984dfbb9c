/**
 * Type Definitions for the Filename Reconciliation Engine
 *
 * The engine matches target filenames (from a CSV column or a file picker)
 * against files found under operator-chosen search directories.
 * Session state lives with the caller; every call receives explicit inputs.
 */

// ============================================
// INPUT TYPES
// ============================================

/** A filename value taken from a CSV cell or a picker selection. */
export type TargetFilename = string;

/** A file discovered while walking a search directory. */
export interface CandidateFile {
  /** Absolute path of the file */
  path: string;
  /** Base filename, as found on disk */
  name: string;
}

/** Ordered, duplicate-free list of root directories. */
export type SearchScope = readonly string[];

/** Sink for a 0..1 progress fraction. */
export type ProgressListener = (fraction: number) => void;

export interface BatchOptions {
  /** Used for the per-target log verdict only; results always carry the best score */
  threshold?: number;
  onProgress?: ProgressListener;
  /** Polled once before each target; a match already started always completes */
  signal?: AbortSignal;
}

/** `threshold` also decides the matched/unmatched partition here. */
export type ReconcileOptions = BatchOptions;

// ============================================
// ERRORS
// ============================================

/**
 * Filesystem failure while scanning a search directory.
 * Never thrown out of the matcher: it is carried inside a FileMatch.
 */
export class ScanError extends Error {
  public readonly root: string;
  public readonly code?: string;

  constructor(root: string, message: string, code?: string) {
    super(message);
    this.name = 'ScanError';
    this.root = root;
    this.code = code;
    Object.setPrototypeOf(this, ScanError.prototype);
  }
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Best candidate for one target within one directory tree.
 *
 * - candidate: a file scored above 0 (not necessarily above the threshold)
 * - no-candidate: the walk found nothing scoring above 0
 * - scan-failed: the directory could not be read
 */
export type FileMatch =
  | { status: 'candidate'; path: string; score: number }
  | { status: 'no-candidate'; path: null; score: 0 }
  | { status: 'scan-failed'; path: null; score: 0; error: ScanError };

export type BatchResult =
  | { status: 'completed'; results: Map<TargetFilename, FileMatch> }
  | { status: 'cancelled' };

/** Final (target, path, score) for one input position. */
export interface MatchResult {
  target: TargetFilename;
  matchedPath: string | null;
  score: number;
}

export interface ReconciliationSummary {
  matchedCount: number;
  totalCount: number;
}

export interface ReconciliationOutcome {
  status: 'completed';
  threshold: number;
  /** Score >= threshold, in input order */
  matched: MatchResult[];
  /** Score < threshold or no candidate, in input order, with the best-known path and score */
  unmatched: MatchResult[];
  summary: ReconciliationSummary;
  /** Directories that could not be read during the run */
  failedDirectories: string[];
  /** True when the scope held no directories and nothing was scanned */
  scopeWasEmpty: boolean;
}

export type ReconcileResult = ReconciliationOutcome | { status: 'cancelled' };

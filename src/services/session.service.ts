/**
 * Session Service
 *
 * Holds everything an operator builds up while preparing one ingest batch:
 * - the target filenames (from a file picker or a CSV column)
 * - the search scope (ordered directories, no duplicates)
 * - the working copy of the metadata CSV
 * - the last reconciliation outcome
 * - the staging area and what was staged into it
 *
 * The matching engine never reads this state; searches receive snapshots.
 * Sessions live in memory for the life of the process.
 */

import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { env } from '../config';
import { logger } from '../utils/logger';
import { AppError } from '../utils/AppError';
import { extractColumnValues, readCsvHeadings } from '../utils/csv';
import type { ReconciliationOutcome } from '../matching';
import {
  createStagingArea,
  removeStagingArea,
  stageFiles,
  type StagedEntry,
  type StagingArea,
  type StagingMode,
  type StagingReport,
  type StagingRequest,
} from './staging.service';
import { rewriteCsv, type RewriteOptions, type RewriteReport } from './csvRewrite.service';

// ============================================
// Types
// ============================================

export type TargetSource = 'picker' | 'csv';

export interface CsvSelection {
  originalName: string;
  workingPath: string;
  headings: string[];
  column: string | null;
}

export interface WorkspaceSession {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  targets: string[];
  targetSource: TargetSource | null;
  scope: string[];
  csv: CsvSelection | null;
  lastOutcome: ReconciliationOutcome | null;
  lastSearchId: string | null;
  activeSearchId: string | null;
  staging: { area: StagingArea; entries: StagedEntry[] } | null;
}

/**
 * JSON shape returned by the API
 */
export interface SessionView {
  id: string;
  createdAt: string;
  updatedAt: string;
  targets: string[];
  targetSource: TargetSource | null;
  targetCount: number;
  scope: string[];
  csv: { originalName: string; headings: string[]; column: string | null } | null;
  lastSearchId: string | null;
  activeSearchId: string | null;
  summary: ReconciliationOutcome['summary'] | null;
  staging: { root: string; stagedCount: number } | null;
}

// ============================================
// Store
// ============================================

const sessions = new Map<string, WorkspaceSession>();

const touch = (session: WorkspaceSession): void => {
  session.updatedAt = new Date();
};

const clearResults = (session: WorkspaceSession): void => {
  session.lastOutcome = null;
  session.lastSearchId = null;
};

export function createSession(): WorkspaceSession {
  const now = new Date();
  const session: WorkspaceSession = {
    id: randomUUID(),
    createdAt: now,
    updatedAt: now,
    targets: [],
    targetSource: null,
    scope: [],
    csv: null,
    lastOutcome: null,
    lastSearchId: null,
    activeSearchId: null,
    staging: null,
  };

  sessions.set(session.id, session);
  logger.info(`Session created: ${session.id}`);
  return session;
}

/**
 * @throws AppError (404) for an unknown session id
 */
export function getSession(sessionId: string): WorkspaceSession {
  const session = sessions.get(sessionId);
  if (!session) {
    throw AppError.notFound(`Session not found: ${sessionId}`);
  }
  return session;
}

export async function deleteSession(sessionId: string): Promise<void> {
  const session = getSession(sessionId);
  if (session.staging) {
    await removeStagingArea(session.staging.area);
  }
  sessions.delete(sessionId);
  logger.info(`Session deleted: ${sessionId}`);
}

/**
 * Forgets every session. Staging areas on disk are left alone.
 */
export function resetSessions(): void {
  sessions.clear();
}

export function toSessionView(session: WorkspaceSession): SessionView {
  return {
    id: session.id,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
    targets: [...session.targets],
    targetSource: session.targetSource,
    targetCount: session.targets.length,
    scope: [...session.scope],
    csv: session.csv
      ? { originalName: session.csv.originalName, headings: session.csv.headings, column: session.csv.column }
      : null,
    lastSearchId: session.lastSearchId,
    activeSearchId: session.activeSearchId,
    summary: session.lastOutcome?.summary ?? null,
    staging: session.staging
      ? { root: session.staging.area.root, stagedCount: session.staging.entries.length }
      : null,
  };
}

// ============================================
// Targets
// ============================================

/**
 * Replaces the target list with a picker selection. Clears the last outcome.
 */
export function setTargets(sessionId: string, targets: readonly string[]): WorkspaceSession {
  const session = getSession(sessionId);
  session.targets = targets.map((target) => target.trim()).filter((target) => target !== '');
  session.targetSource = 'picker';
  clearResults(session);
  touch(session);
  logger.info(`Session ${sessionId}: ${session.targets.length} target(s) selected`);
  return session;
}

// ============================================
// CSV selection
// ============================================

/**
 * Registers an uploaded CSV working copy and reads its headings.
 * Any previous selection, targets and results are discarded.
 */
export async function attachCsv(
  sessionId: string,
  upload: { originalName: string; workingPath: string }
): Promise<WorkspaceSession> {
  const session = getSession(sessionId);
  const headings = await readCsvHeadings(upload.workingPath);

  if (headings.length === 0) {
    throw AppError.badRequest('CSV file has no heading row');
  }

  session.csv = { ...upload, headings, column: null };
  session.targets = [];
  session.targetSource = null;
  clearResults(session);
  touch(session);

  logger.info(`Session ${sessionId}: CSV ${upload.originalName} loaded with ${headings.length} column(s)`);
  return session;
}

/**
 * Chooses the filename column and extracts its values as the new targets
 */
export async function selectCsvColumn(sessionId: string, column: string): Promise<WorkspaceSession> {
  const session = getSession(sessionId);
  if (!session.csv) {
    throw AppError.badRequest('No CSV file selected');
  }

  const values = await extractColumnValues(session.csv.workingPath, column);

  session.csv.column = column;
  session.targets = values;
  session.targetSource = 'csv';
  clearResults(session);
  touch(session);

  logger.info(`Session ${sessionId}: extracted ${values.length} potential filename(s) from '${column}'`);
  return session;
}

/**
 * Clears the CSV selection together with targets, scope, results and staging
 */
export async function clearCsv(sessionId: string): Promise<WorkspaceSession> {
  const session = getSession(sessionId);

  if (session.staging) {
    await removeStagingArea(session.staging.area);
  }

  session.csv = null;
  session.targets = [];
  session.targetSource = null;
  session.scope = [];
  session.staging = null;
  clearResults(session);
  touch(session);

  logger.info(`Session ${sessionId}: cleared CSV selection`);
  return session;
}

// ============================================
// Search scope
// ============================================

/**
 * Appends a directory to the search scope.
 *
 * @throws AppError (400) when the path is not a directory, (409) when already present
 */
export async function addDirectory(sessionId: string, directory: string): Promise<WorkspaceSession> {
  const session = getSession(sessionId);
  const resolved = path.resolve(directory);

  try {
    const stats = await fs.stat(resolved);
    if (!stats.isDirectory()) {
      throw AppError.badRequest(`Not a directory: ${resolved}`);
    }
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw AppError.badRequest(`Directory not found: ${resolved}`);
  }

  if (session.scope.includes(resolved)) {
    throw AppError.conflict(`Directory already in search scope: ${resolved}`);
  }

  session.scope.push(resolved);
  touch(session);
  logger.info(`Session ${sessionId}: added search directory ${resolved}`);
  return session;
}

/**
 * Removes the directory at `index`. Removing the last one clears the results.
 */
export function removeDirectory(sessionId: string, index: number): WorkspaceSession {
  const session = getSession(sessionId);
  if (!Number.isInteger(index) || index < 0 || index >= session.scope.length) {
    throw AppError.notFound(`No search directory at index ${index}`);
  }

  const [removed] = session.scope.splice(index, 1);
  if (session.scope.length === 0) {
    clearResults(session);
  }
  touch(session);

  logger.info(`Session ${sessionId}: removed search directory ${removed ?? ''}`);
  return session;
}

export function clearDirectories(sessionId: string): WorkspaceSession {
  const session = getSession(sessionId);
  session.scope = [];
  clearResults(session);
  touch(session);
  return session;
}

// ============================================
// Search bookkeeping
// ============================================

export function markSearchStarted(sessionId: string, searchId: string): void {
  const session = getSession(sessionId);
  if (session.activeSearchId) {
    throw AppError.conflict(`A search is already running for this session: ${session.activeSearchId}`);
  }
  session.activeSearchId = searchId;
  touch(session);
}

/**
 * Clears the active search. A completed outcome replaces the previous one.
 * No-op when the session has been deleted meanwhile.
 */
export function markSearchFinished(
  sessionId: string,
  searchId: string,
  outcome: ReconciliationOutcome | null
): void {
  const session = sessions.get(sessionId);
  if (!session) return;

  if (session.activeSearchId === searchId) {
    session.activeSearchId = null;
  }
  if (outcome) {
    session.lastOutcome = outcome;
    session.lastSearchId = searchId;
  }
  touch(session);
}

// ============================================
// Staging and CSV rewrite
// ============================================

/**
 * Stages the matched files of the last search, or explicit `paths` from a picker.
 * Entries for targets staged again replace the earlier ones.
 */
export async function stageSession(
  sessionId: string,
  options: { paths?: string[]; mode?: StagingMode } = {}
): Promise<StagingReport> {
  const session = getSession(sessionId);

  let requests: StagingRequest[];
  if (options.paths && options.paths.length > 0) {
    requests = options.paths.map((sourcePath) => ({ target: path.basename(sourcePath), sourcePath }));
  } else if (session.lastOutcome) {
    requests = session.lastOutcome.matched.flatMap((result) =>
      result.matchedPath ? [{ target: result.target, sourcePath: result.matchedPath }] : []
    );
  } else {
    throw AppError.badRequest('Nothing to stage: run a search or provide file paths');
  }

  if (!session.staging) {
    session.staging = { area: await createStagingArea(env.STAGING_ROOT), entries: [] };
  }

  const report = await stageFiles(session.staging.area, requests, options.mode);

  // Restaging a target supersedes its earlier entry
  const restaged = new Set(report.staged.map((entry) => entry.target));
  session.staging.entries = [
    ...session.staging.entries.filter((entry) => !restaged.has(entry.target)),
    ...report.staged,
  ];
  touch(session);

  return report;
}

/**
 * Rewrites the CSV working copy from the staged entries
 */
export async function rewriteSessionCsv(sessionId: string, options: RewriteOptions): Promise<RewriteReport> {
  const session = getSession(sessionId);

  if (!session.csv) {
    throw AppError.badRequest('No CSV file selected');
  }
  if (!session.csv.column) {
    throw AppError.badRequest('Filename column not selected');
  }
  if (!session.staging || session.staging.entries.length === 0) {
    throw AppError.badRequest('No staged files to write into the CSV');
  }

  const report = await rewriteCsv(session.csv.workingPath, session.csv.column, session.staging.entries, options);
  touch(session);
  return report;
}

export const sessionService = {
  createSession,
  getSession,
  deleteSession,
  resetSessions,
  toSessionView,
  setTargets,
  attachCsv,
  selectCsvColumn,
  clearCsv,
  addDirectory,
  removeDirectory,
  clearDirectories,
  markSearchStarted,
  markSearchFinished,
  stageSession,
  rewriteSessionCsv,
};

export default sessionService;

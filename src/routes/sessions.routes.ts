/**
 * Session API Routes
 *
 * Everything an operator does to prepare one ingest batch: choosing target
 * filenames, building the search scope, launching searches, staging the
 * matched files and writing the results back into the metadata CSV.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 */

import { Router, Request, Response } from 'express';
import multer from 'multer';
import { mkdir, unlink } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { env } from '../config';
import {
  asyncHandler,
  sendSuccess,
  AppError,
  logger,
  formatFileTimestamp,
  sanitizeFilename,
} from '../utils';
import { validateRequest, parseBody, commonSchemas } from '../middlewares';
import {
  createSession,
  getSession,
  deleteSession,
  toSessionView,
  setTargets,
  attachCsv,
  selectCsvColumn,
  clearCsv,
  addDirectory,
  removeDirectory,
  clearDirectories,
  stageSession,
  rewriteSessionCsv,
} from '../services/session.service';
import { createSearch, toSearchStatus } from '../services/search.service';
import { startBackgroundSearch } from '../workers';

const router = Router();

// ============================================
// Multer Configuration
// ============================================

/**
 * Uploaded CSVs are kept as a working copy: <sanitized stem>_<YYYYMMDD_HHmmss>.csv
 */
const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    const directory = path.resolve(env.UPLOADS_DIR);
    mkdir(directory, { recursive: true }).then(
      () => cb(null, directory),
      (error: Error) => cb(error, directory)
    );
  },
  filename: (_req, file, cb) => {
    const stem = path.parse(file.originalname).name;
    cb(null, `${sanitizeFilename(stem)}_${formatFileTimestamp()}.csv`);
  },
});

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain'];

  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only CSV files are allowed'));
  }
};

/**
 * Multer upload middleware
 * - Single file upload
 * - Max file size: 50MB
 * - CSV files only
 */
const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB max
  },
});

// ============================================
// Request Schemas
// ============================================

const targetsSchema = z.object({
  targets: z.array(z.string()),
});

const columnSchema = z.object({
  column: z.string().trim().min(1, 'Column name is required'),
});

const directorySchema = z.object({
  path: z.string().trim().min(1, 'Directory path is required'),
});

const searchSchema = z.object({
  threshold: z.number().int().min(0).max(100).optional(),
});

const stagingSchema = z.object({
  paths: z.array(z.string().min(1)).optional(),
  mode: z.enum(['symlink', 'copy']).optional(),
});

const rewriteSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('filename') }),
  z.object({
    mode: z.literal('urls'),
    baseUrl: z.string().url('baseUrl must be a URL'),
    collection: z.string().trim().min(1).optional(),
  }),
]);

const sessionParams = validateRequest({ params: commonSchemas.sessionId });

const directoryIndexParams = validateRequest({
  params: commonSchemas.sessionId.extend({
    index: z.string().regex(/^\d+$/, 'Index must be a non-negative integer'),
  }),
});

// ============================================
// Sessions
// ============================================

/**
 * @route   POST /api/v1/sessions
 * @desc    Start a new operator session
 * @access  Public
 *
 * Response:
 * - 201 Created: session snapshot
 */
router.post(
  '/',
  asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const session = createSession();
    sendSuccess(res, toSessionView(session), 'Session created', 201);
  })
);

/**
 * @route   GET /api/v1/sessions/:sessionId
 * @desc    Session snapshot: targets, scope, CSV selection, last summary, staging
 * @access  Public
 */
router.get(
  '/:sessionId',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const session = getSession(req.params.sessionId);
    sendSuccess(res, toSessionView(session));
  })
);

/**
 * @route   DELETE /api/v1/sessions/:sessionId
 * @desc    Drop a session and its staging area
 * @access  Public
 */
router.delete(
  '/:sessionId',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    await deleteSession(req.params.sessionId);
    sendSuccess(res, null, 'Session deleted');
  })
);

// ============================================
// Targets
// ============================================

/**
 * @route   PUT /api/v1/sessions/:sessionId/targets
 * @desc    Replace the target filenames with a file-picker selection
 * @access  Public
 *
 * Body: { targets: string[] }
 */
router.put(
  '/:sessionId/targets',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { targets } = parseBody(targetsSchema, req.body);
    const session = setTargets(req.params.sessionId, targets);
    sendSuccess(res, toSessionView(session), `${session.targets.length} target(s) selected`);
  })
);

// ============================================
// CSV
// ============================================

/**
 * @route   POST /api/v1/sessions/:sessionId/csv
 * @desc    Upload a metadata CSV (multipart field "file")
 * @access  Public
 *
 * Response:
 * - 201 Created: session snapshot with the CSV headings
 * - 400 Bad Request: no file, not a CSV, or no heading row
 */
router.post(
  '/:sessionId/csv',
  sessionParams,
  upload.single('file'),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    if (!req.file) {
      throw AppError.badRequest('No file uploaded. Please upload a CSV file.');
    }

    const workingPath = req.file.path;

    try {
      const session = await attachCsv(req.params.sessionId, {
        originalName: req.file.originalname,
        workingPath,
      });
      sendSuccess(res, toSessionView(session), 'CSV file loaded', 201);
    } catch (error) {
      await unlink(workingPath).catch((unlinkError: unknown) => {
        logger.warn(
          `Could not remove rejected upload ${workingPath}: ${unlinkError instanceof Error ? unlinkError.message : 'Unknown error'}`
        );
      });
      throw error;
    }
  })
);

/**
 * @route   PUT /api/v1/sessions/:sessionId/csv/column
 * @desc    Choose the filename column; its values become the targets
 * @access  Public
 *
 * Body: { column: string }
 */
router.put(
  '/:sessionId/csv/column',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { column } = parseBody(columnSchema, req.body);
    const session = await selectCsvColumn(req.params.sessionId, column);
    sendSuccess(
      res,
      toSessionView(session),
      `Extracted ${session.targets.length} potential filename(s) from '${column}'`
    );
  })
);

/**
 * @route   DELETE /api/v1/sessions/:sessionId/csv
 * @desc    Clear the CSV selection together with targets, scope, results and staging
 * @access  Public
 */
router.delete(
  '/:sessionId/csv',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const session = await clearCsv(req.params.sessionId);
    sendSuccess(res, toSessionView(session), 'CSV selection cleared');
  })
);

/**
 * @route   POST /api/v1/sessions/:sessionId/csv/rewrite
 * @desc    Write staged names (mode "filename") or storage URLs (mode "urls") into the CSV
 * @access  Public
 *
 * Body:
 * - { mode: 'filename' }
 * - { mode: 'urls', baseUrl: string, collection?: string }
 */
router.post(
  '/:sessionId/csv/rewrite',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const options = parseBody(rewriteSchema, req.body);
    const report = await rewriteSessionCsv(req.params.sessionId, options);
    sendSuccess(res, report, `Updated ${report.updatedRows} CSV row(s)`);
  })
);

// ============================================
// Search scope
// ============================================

/**
 * @route   POST /api/v1/sessions/:sessionId/directories
 * @desc    Append a directory to the search scope
 * @access  Public
 *
 * Body: { path: string }
 *
 * Response:
 * - 201 Created: session snapshot
 * - 400 Bad Request: not a directory
 * - 409 Conflict: already in scope
 */
router.post(
  '/:sessionId/directories',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { path: directory } = parseBody(directorySchema, req.body);
    const session = await addDirectory(req.params.sessionId, directory);
    sendSuccess(res, toSessionView(session), 'Directory added to search scope', 201);
  })
);

/**
 * @route   DELETE /api/v1/sessions/:sessionId/directories/:index
 * @desc    Remove one directory from the search scope
 * @access  Public
 */
router.delete(
  '/:sessionId/directories/:index',
  directoryIndexParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const session = removeDirectory(req.params.sessionId, Number(req.params.index));
    sendSuccess(res, toSessionView(session), 'Directory removed from search scope');
  })
);

/**
 * @route   DELETE /api/v1/sessions/:sessionId/directories
 * @desc    Clear the search scope
 * @access  Public
 */
router.delete(
  '/:sessionId/directories',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const session = clearDirectories(req.params.sessionId);
    sendSuccess(res, toSessionView(session), 'Search scope cleared');
  })
);

// ============================================
// Searches
// ============================================

/**
 * @route   POST /api/v1/sessions/:sessionId/searches
 * @desc    Launch a filename search over the session's targets and scope
 * @access  Public
 *
 * Body: { threshold?: number } (integer 0-100, default MATCH_THRESHOLD)
 *
 * Response:
 * - 202 Accepted: search status (poll GET /searches/:searchId)
 * - 400 Bad Request: no targets
 * - 409 Conflict: a search is already running for this session
 */
router.post(
  '/:sessionId/searches',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { threshold } = parseBody(searchSchema, req.body);
    const search = createSearch(req.params.sessionId, { threshold });

    // Runs after the response is sent; the worker records its own failures
    void startBackgroundSearch(search.id);

    sendSuccess(res, toSearchStatus(search), 'Search started', 202);
  })
);

// ============================================
// Staging
// ============================================

/**
 * @route   POST /api/v1/sessions/:sessionId/staging
 * @desc    Stage the last search's matches, or the given paths, into OBJS/
 * @access  Public
 *
 * Body: { paths?: string[], mode?: 'symlink' | 'copy' }
 */
router.post(
  '/:sessionId/staging',
  sessionParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const options = parseBody(stagingSchema, req.body);
    const report = await stageSession(req.params.sessionId, options);
    sendSuccess(res, report, `Staged ${report.staged.length} file(s)`);
  })
);

export default router;

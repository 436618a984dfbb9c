/**
 * Search API Routes
 *
 * Status polling, cancellation and outcome retrieval for searches launched
 * through POST /sessions/:sessionId/searches.
 */

import { Router, Request, Response } from 'express';
import { asyncHandler, sendSuccess, AppError } from '../utils';
import { validateRequest, commonSchemas } from '../middlewares';
import {
  cancelSearch,
  getSearchOutcome,
  getSearchStatus,
  toSearchStatus,
} from '../services/search.service';

const router = Router();

const searchParams = validateRequest({ params: commonSchemas.searchId });

/**
 * @route   GET /api/v1/searches/:searchId
 * @desc    Search status with progress percentage
 * @access  Public
 *
 * Response:
 * - 200 OK: { status, progress, matchedCount, ... }
 * - 404 Not Found: unknown search
 */
router.get(
  '/:searchId',
  searchParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const status = await getSearchStatus(req.params.searchId);

    if (!status) {
      throw AppError.notFound(`Search not found: ${req.params.searchId}`);
    }

    sendSuccess(res, status);
  })
);

/**
 * @route   POST /api/v1/searches/:searchId/cancel
 * @desc    Request cancellation; the search stops before its next target
 * @access  Public
 *
 * Response:
 * - 202 Accepted: cancellation requested
 * - 409 Conflict: the search already finished
 */
router.post(
  '/:searchId/cancel',
  searchParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const search = cancelSearch(req.params.searchId);
    sendSuccess(res, toSearchStatus(search), 'Cancellation requested', 202);
  })
);

/**
 * @route   GET /api/v1/searches/:searchId/outcome
 * @desc    Matched and unmatched lists of a completed search
 * @access  Public
 *
 * Response:
 * - 200 OK: ReconciliationOutcome
 * - 409 Conflict: the search has not completed
 */
router.get(
  '/:searchId/outcome',
  searchParams,
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const outcome = getSearchOutcome(req.params.searchId);
    sendSuccess(res, outcome);
  })
);

export default router;

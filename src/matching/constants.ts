/**
 * Constants for the filename reconciliation engine.
 */

/**
 * Score a candidate must reach for a target to count as matched.
 * Every current caller uses this value; `reconcile` accepts any 0-100 threshold.
 */
export const DEFAULT_MATCH_THRESHOLD = 90;

/** Score of an exact (case-folded) filename match. Ends a directory scan early. */
export const PERFECT_SCORE = 100;

/** Bounds of the similarity scale. */
export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Severity tiers for unmatched targets in the outcome log.
 *
 * - score 0 or below LOW_SCORE_CEILING: error (nothing plausible found)
 * - LOW_SCORE_CEILING..CLOSE_CALL_CEILING - 1: warn (close call)
 * - CLOSE_CALL_CEILING and above: info (only reachable with a threshold above 90)
 */
export const LOG_TIERS = {
  LOW_SCORE_CEILING: 50,
  CLOSE_CALL_CEILING: 90,
} as const;

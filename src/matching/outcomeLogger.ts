/**
 * Outcome logging for a finished reconciliation.
 *
 * One line per target, with the severity chosen from the score so that an
 * operator scanning the log sees hopeless targets first and close calls next.
 */

import { logger } from '../utils/logger';
import { LOG_TIERS } from './constants';
import type { MatchResult, ReconciliationOutcome } from './types';

export type OutcomeLogLevel = 'error' | 'warn' | 'info';

/**
 * Severity for a target that did not clear the threshold.
 */
export function unmatchedLogLevel(score: number): OutcomeLogLevel {
  if (score < LOG_TIERS.LOW_SCORE_CEILING) {
    return 'error';
  }
  if (score < LOG_TIERS.CLOSE_CALL_CEILING) {
    return 'warn';
  }
  return 'info';
}

export function describeUnmatched(result: MatchResult): string {
  if (result.matchedPath === null) {
    return `No match for '${result.target}': no candidate found`;
  }
  return `No match for '${result.target}': closest candidate was ${result.matchedPath} at ${result.score}%`;
}

export function logReconciliationOutcome(outcome: ReconciliationOutcome): void {
  for (const result of outcome.matched) {
    logger.info(`Found match for '${result.target}': ${result.matchedPath ?? ''} (${result.score}% match)`);
  }

  for (const result of outcome.unmatched) {
    logger.log(unmatchedLogLevel(result.score), describeUnmatched(result));
  }

  const { matchedCount, totalCount } = outcome.summary;
  logger.info(`Search complete: ${matchedCount} of ${totalCount} matched (threshold ${outcome.threshold}%)`);
}

export default logReconciliationOutcome;

/**
 * Workers Module
 *
 * Exports background workers for async processing tasks.
 */

export { processSearchJob, startBackgroundSearch } from './searchWorker';

import type { AggregateStatistics } from './types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
/** Configuration problems and unexpected errors. */
export const EXIT_ERROR = 2;

/**
 * Exit status for a completed suite. Failed requests, endpoint tasks that
 * died before sending anything, and a suite that sent no requests at all
 * all count as failures.
 */
export function exitCodeFor(stats: AggregateStatistics): number {
  if (stats.failedRequests > 0 || stats.taskErrors > 0 || stats.totalRequests === 0) {
    return EXIT_FAILURES;
  }
  return EXIT_OK;
}

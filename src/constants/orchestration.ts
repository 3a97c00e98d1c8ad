/**
 * Fetch orchestration constants
 */

/**
 * Endpoint calls in flight per date
 */
export const DEFAULT_ENDPOINT_CONCURRENCY = 8;

/**
 * Dates in flight per job (1 = strictly sequential)
 */
export const DEFAULT_DATE_CONCURRENCY = 1;

/**
 * Progress events buffered before the orchestrator blocks on a slow consumer
 */
export const DEFAULT_PROGRESS_STREAM_CAPACITY = 64;

/**
 * Longest accepted range request, in days (inclusive)
 */
export const MAX_RANGE_DAYS = 366;

/**
 * Dates listed by status()
 */
export const STATUS_RECENT_DATES_LIMIT = 10;

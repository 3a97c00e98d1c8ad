/**
 * Health API client constants: base URL, paths, timeouts and payload shapes
 */

/**
 * Default API root (overridable with API_BASE_URL)
 */
export const HEALTH_API_DEFAULT_BASE_URL =
  "https://bipard.bhavyabiharhealth.in/api/bhavya";

/**
 * Token endpoint path, relative to the base URL
 */
export const HEALTH_API_TOKEN_PATH = "generateToken";

/**
 * Per-attempt timeout for one endpoint call
 */
export const HEALTH_API_DEFAULT_TIMEOUT_MS = 8_000;

/**
 * Hard ceiling for one endpoint call, retries and backoff included
 */
export const HEALTH_API_DEFAULT_DEADLINE_MS = 30_000;

/**
 * Attempts per endpoint call (1 initial + 2 retries)
 */
export const HEALTH_API_MAX_ATTEMPTS = 3;

/**
 * Fixed pause between attempts
 */
export const HEALTH_API_RETRY_DELAY_MS = 1_000;

/**
 * Keys that may carry the bearer token in the token response
 */
export const HEALTH_API_TOKEN_KEYS = ["token", "access_token", "accessToken"] as const;

/**
 * Envelope keys whose first array element is the record
 */
export const HEALTH_API_PAYLOAD_LIST_KEYS = ["data", "result", "results", "records"] as const;

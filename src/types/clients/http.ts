/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * Backoff strategy between retry attempts
 *
 * - fixed: always wait baseDelayMs
 * - exponential: baseDelayMs * 2^(attempt-1), capped, with jitter
 */
export type HttpBackoffStrategy = "fixed" | "exponential";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms between retries. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
  /** Backoff strategy. Default: exponential */
  backoff?: HttpBackoffStrategy;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /**
   * Overall budget for the request including every retry and backoff sleep.
   * Attempts are shortened to fit and no retry starts past the deadline.
   */
  deadlineMs?: number;
  /**
   * Treat the request as safe to retry regardless of method.
   * Read-only POST endpoints set this.
   */
  idempotent?: boolean;
  retry?: HttpRetryConfig;
  /** Called before each attempt with its 1-based number */
  onAttempt?: (attempt: number) => void;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;

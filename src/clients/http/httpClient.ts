/**
 * HTTP client wrapper: general-purpose JSON client on axios
 * Supports timeouts, an overall deadline, query params, JSON bodies on any
 * method (GET included), retries with fixed or exponential backoff, and
 * structured error handling
 */

import axios, { type AxiosResponse } from "axios";
import type { HttpRequest, HttpBackoffStrategy } from "@/types";
import { HttpError, HttpDeadlineError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Cut an error response body down for debugging
 */
function toBodySnippet(text: string): string | undefined {
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Copy axios response headers into a fetch-style Headers object
 */
function toHeaders(raw: AxiosResponse["headers"]): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    const headerValue: unknown = value;
    if (typeof headerValue === "string") {
      headers.set(name, headerValue);
    } else if (typeof headerValue === "number" || typeof headerValue === "boolean") {
      headers.set(name, String(headerValue));
    } else if (Array.isArray(headerValue)) {
      headers.set(name, headerValue.join(", "));
    }
  }
  return headers;
}

/**
 * Check if a request is safe to retry
 */
function isRequestRetryable(req: HttpRequest): boolean {
  return req.idempotent === true || RETRYABLE_HTTP_METHODS.includes(req.method);
}

/**
 * Check if an HTTP status code warrants a retry
 */
export function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is transient
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  // Aborted by our timeout
  if (axios.isCancel(error)) {
    return true;
  }

  // No response at all: reset, refused, DNS
  if (axios.isAxiosError(error)) {
    return error.response === undefined;
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute backoff delay for an attempt
 * exponential: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  strategy: HttpBackoffStrategy,
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  if (strategy === "fixed") {
    return Math.min(baseDelayMs, maxDelayMs);
  }
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Compute retry delay considering Retry-After header and backoff strategy
 */
function computeRetryDelay(
  error: unknown,
  attempt: number,
  strategy: HttpBackoffStrategy,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
): number {
  if (error instanceof HttpError && error.headers) {
    if (error.status === 429 || error.status === 503) {
      const retryAfterMs = parseRetryAfter(error.headers.get("retry-after"));
      if (retryAfterMs !== null) {
        return Math.min(retryAfterMs, maxRetryAfterMs);
      }
    }
  }

  return computeBackoffDelay(strategy, attempt, baseDelayMs, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const response = await axios.request<string>({
      method: req.method,
      url,
      headers,
      data: req.json !== undefined ? JSON.stringify(req.json) : undefined,
      signal: controller.signal,
      // Raw text: status and content type decide how the body is read
      responseType: "text",
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    });

    const responseHeaders = toHeaders(response.headers);
    const text = typeof response.data === "string" ? response.data : "";

    if (response.status < 200 || response.status >= 300) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: toBodySnippet(text),
        headers: responseHeaders,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    const contentType = responseHeaders.get("content-type");
    const isJson =
      contentType !== null &&
      (contentType.includes("application/json") || contentType.includes("+json"));

    if (!isJson) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      // Return text content as fallback, let caller handle it
      return text;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return undefined;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent requests (GET, HEAD, or
 * `idempotent: true`) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408, 429 (respects Retry-After) and 5xx
 *
 * When `deadlineMs` is set, the whole call (attempts + sleeps) finishes
 * within it: attempts are shortened and a retry whose backoff would cross
 * the deadline is not started.
 *
 * Resolves with the parsed JSON body, the raw text of a non-JSON body, or
 * undefined for empty / unparseable bodies. Callers narrow the value.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {HttpDeadlineError} When the deadline elapsed before any attempt ran
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
  const backoff = req.retry?.backoff ?? "exponential";

  const startedAt = Date.now();
  const remainingMs = (): number =>
    req.deadlineMs === undefined
      ? Number.POSITIVE_INFINITY
      : req.deadlineMs - (Date.now() - startedAt);

  let lastError: unknown = undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const budgetMs = remainingMs();
    if (budgetMs <= 0) {
      throw lastError ?? new HttpDeadlineError(url, req.deadlineMs ?? 0);
    }

    req.onAttempt?.(attempt);

    try {
      return await performRequest(req, url, Math.min(timeoutMs, budgetMs));
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isRequestRetryable(req) || !isTransientHttpError(error)) {
        throw error;
      }

      const delayMs = computeRetryDelay(
        error,
        attempt,
        backoff,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
      );

      if (delayMs >= remainingMs()) {
        logger.debug("Retry skipped, deadline would be exceeded", {
          method: req.method,
          url: req.url,
          attempt,
          delayMs,
        });
        break;
      }

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : describeError(error),
      });

      await sleep(delayMs);
    }
  }

  // All retries exhausted, throw the last error
  throw lastError;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.name : String(error);
}

/**
 * HTTP client public API
 */

export { httpRequest, isTransientHttpError, isStatusRetryable } from "./httpClient";
export { HttpError, HttpDeadlineError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpBackoffStrategy,
} from "@/types";

/**
 * Record type definitions: dates, endpoint outcomes and merged rows
 */

/**
 * Canonical calendar date (YYYY-MM-DD), natural key of one stored row
 *
 * Always produced by normalizeDateKey(); never compare raw input strings.
 */
export type DateKey = string;

/**
 * One record extracted from an endpoint response
 * Scalar responses are wrapped as { value }
 */
export type EndpointPayload = Record<string, unknown>;

/**
 * Why an endpoint call produced no usable payload
 *
 * - transient: network error, timeout, 408/429/5xx after retries were exhausted
 * - rejected: non-retryable HTTP status (4xx)
 * - unauthorized: token could not be obtained, or was refused after a refresh
 * - malformed: response body is not a JSON object or array
 * - empty: JSON body carried no record
 * - unexpected: anything else
 */
export type EndpointFailureKind =
  | "transient"
  | "rejected"
  | "unauthorized"
  | "malformed"
  | "empty"
  | "unexpected";

export type EndpointFailure = {
  kind: EndpointFailureKind;
  message: string;
};

/**
 * Outcome of one API call for one date × endpoint
 */
export type EndpointResult =
  | {
      ok: true;
      endpointId: string;
      payload: EndpointPayload;
      attempts: number;
      durationMs: number;
    }
  | {
      ok: false;
      endpointId: string;
      failure: EndpointFailure;
      attempts: number;
      durationMs: number;
    };

/**
 * Merged output row for one date
 *
 * `columns` holds every catalog output column plus the derived columns.
 * Every value is a non-empty string: the real value or the sentinel.
 */
export type HealthRecord = {
  dateKey: DateKey;
  columns: Readonly<Record<string, string>>;
};

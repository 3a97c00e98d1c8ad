/**
 * Fetch pipeline error classes
 *
 * Endpoint errors never leave the API client: they are converted into
 * failed EndpointResults. Storage errors are reported per date in the
 * progress stream. Range/date errors reject a request before any job exists.
 */

import type { DateKey, EndpointFailureKind } from "@/types";

/**
 * Endpoint call failed for a reason that may clear on its own
 * (network, timeout, 408/429/5xx). Raised once the HTTP retries are spent.
 */
export class TransientEndpointError extends Error {
  public readonly endpointId: string;
  public readonly kind: EndpointFailureKind = "transient";

  constructor(endpointId: string, message: string, options?: { cause?: unknown }) {
    super(`Endpoint ${endpointId} failed after retries: ${message}`, options);
    this.name = "TransientEndpointError";
    this.endpointId = endpointId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransientEndpointError);
    }
  }
}

/**
 * Endpoint call failed in a way retrying will not fix
 */
export class PermanentEndpointError extends Error {
  public readonly endpointId: string;
  public readonly kind: Exclude<EndpointFailureKind, "transient">;

  constructor(
    endpointId: string,
    kind: Exclude<EndpointFailureKind, "transient">,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Endpoint ${endpointId} failed (${kind}): ${message}`, options);
    this.name = "PermanentEndpointError";
    this.endpointId = endpointId;
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermanentEndpointError);
    }
  }
}

/**
 * A merged row could not be written
 */
export class StoragePersistError extends Error {
  public readonly dateKey: DateKey;

  constructor(dateKey: DateKey, message: string, options?: { cause?: unknown }) {
    super(`Failed to persist record for ${dateKey}: ${message}`, options);
    this.name = "StoragePersistError";
    this.dateKey = dateKey;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoragePersistError);
    }
  }
}

/**
 * Requested range is reversed or too long
 */
export class InvalidRangeError extends Error {
  public readonly start: DateKey;
  public readonly end: DateKey;

  constructor(start: DateKey, end: DateKey, reason: string) {
    super(`Invalid date range ${start}..${end}: ${reason}`);
    this.name = "InvalidRangeError";
    this.start = start;
    this.end = end;
  }
}

/**
 * Input is not a real calendar date in YYYY-MM-DD form
 */
export class InvalidDateError extends Error {
  public readonly input: string;

  constructor(input: string) {
    super(`Invalid date "${input}": expected a calendar date as YYYY-MM-DD`);
    this.name = "InvalidDateError";
    this.input = input;
  }
}

/**
 * Health API mappers: narrow raw response bodies into tokens and payloads
 */

import type { EndpointFailure, EndpointPayload } from "@/types";
import {
  HEALTH_API_PAYLOAD_LIST_KEYS,
  HEALTH_API_TOKEN_KEYS,
} from "@/constants/clients/healthApi";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asPayload(item: unknown): EndpointPayload {
  return isRecord(item) ? item : { value: item };
}

/**
 * Pull the bearer token out of a generateToken response
 *
 * Accepts an object carrying one of HEALTH_API_TOKEN_KEYS or a bare string.
 * Returns null when no non-empty token is present.
 */
export function extractToken(body: unknown): string | null {
  if (typeof body === "string") {
    const trimmed = body.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (!isRecord(body)) {
    return null;
  }
  for (const key of HEALTH_API_TOKEN_KEYS) {
    const value = body[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

export type PayloadExtraction =
  | { ok: true; payload: EndpointPayload }
  | { ok: false; failure: EndpointFailure };

/**
 * Reduce an endpoint response body to the single record it describes
 *
 * - non-empty array: its first element (scalars wrapped as { value })
 * - object with a non-empty data/result/results/records array: that array's first element
 * - any other non-empty object: the object itself
 */
export function extractEndpointPayload(body: unknown): PayloadExtraction {
  if (Array.isArray(body)) {
    if (body.length === 0) {
      return { ok: false, failure: { kind: "empty", message: "response array is empty" } };
    }
    return { ok: true, payload: asPayload(body[0]) };
  }

  if (isRecord(body)) {
    for (const key of HEALTH_API_PAYLOAD_LIST_KEYS) {
      const list = body[key];
      if (Array.isArray(list) && list.length > 0) {
        return { ok: true, payload: asPayload(list[0]) };
      }
    }
    if (Object.keys(body).length === 0) {
      return { ok: false, failure: { kind: "empty", message: "response object is empty" } };
    }
    return { ok: true, payload: body };
  }

  if (body === undefined) {
    return {
      ok: false,
      failure: { kind: "malformed", message: "response body is empty or not valid JSON" },
    };
  }

  return {
    ok: false,
    failure: {
      kind: "malformed",
      message: `expected a JSON object or array, got ${typeof body}`,
    },
  };
}

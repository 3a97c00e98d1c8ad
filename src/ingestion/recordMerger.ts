/**
 * Record merger: fold the endpoint results of one date into one row
 *
 * Pure. Absence stays `undefined` until the output columns are built; only
 * then does it become the NOT_AVAILABLE sentinel.
 */

import type {
  DateKey,
  EndpointField,
  EndpointPayload,
  EndpointResult,
  EndpointSpec,
  HealthRecord,
} from "@/types";
import {
  ABSENT_VALUE_TOKENS,
  NOT_AVAILABLE,
  RECORD_FOCUS_AREA,
  RECORD_SOURCE,
  RECORD_STATE_NAME,
} from "@/constants";
import { dateKeyParts, monthNameOf } from "@/utils";

const ABSENT_TOKENS: ReadonlySet<string> = new Set(ABSENT_VALUE_TOKENS);

/**
 * Clean one raw payload value
 *
 * @returns The stored string form, or undefined when the value counts as absent
 */
export function cleanFieldValue(
  raw: unknown,
  ignoreValues: readonly string[] = [],
): string | undefined {
  let value: string;
  if (raw === null || raw === undefined) {
    return undefined;
  } else if (typeof raw === "string") {
    value = raw.trim();
  } else if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return undefined;
    value = String(raw);
  } else if (typeof raw === "boolean" || typeof raw === "bigint") {
    value = String(raw);
  } else if (typeof raw === "object") {
    value = JSON.stringify(raw);
  } else {
    return undefined;
  }

  if (value.length === 0 || ABSENT_TOKENS.has(value.toLowerCase())) {
    return undefined;
  }
  if (ignoreValues.includes(value)) {
    return undefined;
  }
  return value;
}

/**
 * First usable value among the field's keys
 */
function readField(payload: EndpointPayload, field: EndpointField): string | undefined {
  for (const key of field.keys) {
    const value = cleanFieldValue(payload[key], field.ignoreValues);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Result for `endpoint`, matched by position and confirmed by id
 * Missing or mismatched entries count as failures.
 */
function resultFor(
  results: readonly (EndpointResult | undefined)[],
  endpoint: EndpointSpec,
  index: number,
): EndpointResult | undefined {
  const atIndex = index < results.length ? results[index] : undefined;
  if (atIndex?.endpointId === endpoint.id) {
    return atIndex;
  }
  return results.find((result) => result?.endpointId === endpoint.id);
}

/**
 * Endpoints that succeeded / failed for one date, in catalog order
 */
export function partitionEndpointResults(
  results: readonly (EndpointResult | undefined)[],
  endpoints: readonly EndpointSpec[],
): { succeeded: string[]; failed: string[] } {
  const succeeded: string[] = [];
  const failed: string[] = [];
  endpoints.forEach((endpoint, index) => {
    if (resultFor(results, endpoint, index)?.ok === true) {
      succeeded.push(endpoint.id);
    } else {
      failed.push(endpoint.id);
    }
  });
  return { succeeded, failed };
}

function derivedColumns(date: DateKey, fetchedAt: Date): Record<string, string> {
  return {
    data_date: date,
    state_name: RECORD_STATE_NAME,
    focus_area: RECORD_FOCUS_AREA,
    year: String(dateKeyParts(date).year),
    month: monthNameOf(date),
    start_date: date,
    end_date: date,
    source: RECORD_SOURCE,
    fetched_at: fetchedAt.toISOString(),
  };
}

/**
 * Merge the endpoint results of one date into a HealthRecord
 *
 * Never throws on any combination of results: every failed, missing or
 * empty endpoint simply leaves its columns at NOT_AVAILABLE.
 *
 * @param results - One entry per catalog endpoint, holes allowed
 */
export function mergeHealthRecord(
  date: DateKey,
  results: readonly (EndpointResult | undefined)[],
  endpoints: readonly EndpointSpec[],
  fetchedAt: Date = new Date(),
): HealthRecord {
  const values = new Map<string, string | undefined>();

  endpoints.forEach((endpoint, index) => {
    const result = resultFor(results, endpoint, index);
    const payload = result?.ok === true ? result.payload : undefined;
    for (const field of endpoint.fields) {
      values.set(field.column, payload === undefined ? undefined : readField(payload, field));
    }
  });

  const columns: Record<string, string> = derivedColumns(date, fetchedAt);
  for (const [column, value] of values) {
    columns[column] = value ?? NOT_AVAILABLE;
  }

  return { dateKey: date, columns: Object.freeze(columns) };
}

/**
 * Endpoint catalog validation module
 *
 * Validates catalog JSON structure and enforces invariants:
 * - No duplicate endpoint IDs
 * - No column fed by two fields, none shadowing a derived column
 * - Column names usable as SQL identifiers
 * - Every endpoint feeds at least one column
 *
 * Validation is fail-fast: throws on the first error.
 */

import type {
  EndpointCatalogRaw,
  EndpointFieldRaw,
  EndpointMethod,
  EndpointSpecRaw,
} from "@/types";
import { DERIVED_COLUMNS } from "@/constants";

/**
 * Error thrown when catalog validation fails.
 */
export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(`Catalog validation failed: ${message}`);
    this.name = "CatalogValidationError";
  }
}

const COLUMN_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

const ENDPOINT_METHODS: readonly string[] = ["GET", "POST"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "endpoints[0].id")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new CatalogValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * Validates that a value is a non-empty array.
 */
function validateNonEmptyArray(
  value: unknown,
  fieldPath: string,
): asserts value is unknown[] {
  if (!Array.isArray(value)) {
    throw new CatalogValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new CatalogValidationError(`${fieldPath} cannot be empty`);
  }
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  validateNonEmptyArray(value, fieldPath);
  return value.map((item, i) => {
    validateNonEmptyString(item, `${fieldPath}[${i}]`);
    return item;
  });
}

function validateMethod(value: unknown, fieldPath: string): EndpointMethod {
  if (value === undefined) {
    return "GET";
  }
  if (value === "GET" || value === "POST") {
    return value;
  }
  throw new CatalogValidationError(
    `${fieldPath} must be one of ${ENDPOINT_METHODS.join(", ")}, got ${String(value)}`,
  );
}

function validateField(field: unknown, fieldPath: string): EndpointFieldRaw {
  if (!isRecord(field)) {
    throw new CatalogValidationError(`${fieldPath} must be an object`);
  }

  validateNonEmptyString(field.column, `${fieldPath}.column`);
  if (!COLUMN_NAME_PATTERN.test(field.column)) {
    throw new CatalogValidationError(
      `${fieldPath}.column "${field.column}" must match ${COLUMN_NAME_PATTERN}`,
    );
  }

  const keys = validateStringArray(field.keys, `${fieldPath}.keys`);

  let ignoreValues: string[] | undefined;
  if (field.ignoreValues !== undefined) {
    if (!Array.isArray(field.ignoreValues)) {
      throw new CatalogValidationError(
        `${fieldPath}.ignoreValues must be an array`,
      );
    }
    ignoreValues = field.ignoreValues.map((item, i) => {
      if (typeof item !== "string") {
        throw new CatalogValidationError(
          `${fieldPath}.ignoreValues[${i}] must be a string`,
        );
      }
      return item;
    });
  }

  return { column: field.column, keys, ...(ignoreValues && { ignoreValues }) };
}

function validateEndpoint(endpoint: unknown, index: number): EndpointSpecRaw {
  const path = `endpoints[${index}]`;
  if (!isRecord(endpoint)) {
    throw new CatalogValidationError(`${path} must be an object`);
  }

  validateNonEmptyString(endpoint.id, `${path}.id`);
  validateNonEmptyString(endpoint.path, `${path}.path`);
  validateNonEmptyString(endpoint.description, `${path}.description`);
  const method = validateMethod(endpoint.method, `${path}.method`);

  validateNonEmptyArray(endpoint.fields, `${path}.fields`);
  const fields = endpoint.fields.map((field, i) =>
    validateField(field, `${path}.fields[${i}]`),
  );

  return {
    id: endpoint.id,
    path: endpoint.path,
    description: endpoint.description,
    method,
    fields,
  };
}

/**
 * Validates raw catalog JSON and returns it typed.
 *
 * @throws {CatalogValidationError} On the first problem found
 */
export function validateEndpointCatalogRaw(raw: unknown): EndpointCatalogRaw {
  if (!isRecord(raw)) {
    throw new CatalogValidationError("catalog root must be an object");
  }

  validateNonEmptyString(raw.version, "version");
  validateNonEmptyArray(raw.endpoints, "endpoints");

  const endpoints = raw.endpoints.map((endpoint, i) => validateEndpoint(endpoint, i));

  const seenIds = new Set<string>();
  const reserved: ReadonlySet<string> = new Set(DERIVED_COLUMNS);
  const seenColumns = new Map<string, string>();

  for (const endpoint of endpoints) {
    if (seenIds.has(endpoint.id)) {
      throw new CatalogValidationError(`duplicate endpoint id "${endpoint.id}"`);
    }
    seenIds.add(endpoint.id);

    for (const field of endpoint.fields) {
      if (reserved.has(field.column)) {
        throw new CatalogValidationError(
          `endpoint "${endpoint.id}" feeds derived column "${field.column}"`,
        );
      }
      const owner = seenColumns.get(field.column);
      if (owner !== undefined) {
        throw new CatalogValidationError(
          `column "${field.column}" is fed by both "${owner}" and "${endpoint.id}"`,
        );
      }
      seenColumns.set(field.column, endpoint.id);
    }
  }

  return { version: raw.version, endpoints };
}

/**
 * Endpoint catalog loading and compilation
 *
 * Loads data/endpoints.json, validates it, and freezes it into the ordered
 * table the orchestrator iterates. Adding or removing an endpoint is a
 * catalog edit plus a migration for its columns.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  EndpointCatalog,
  EndpointCatalogRaw,
  EndpointDescriptor,
  EndpointSpec,
} from "@/types";
import { validateEndpointCatalogRaw } from "@/utils/catalogValidation";
import { ENDPOINT_CATALOG_PATH } from "@/constants";

/**
 * Compiles a validated raw catalog into its runtime form.
 */
export function compileEndpointCatalog(raw: EndpointCatalogRaw): EndpointCatalog {
  const endpoints: EndpointSpec[] = raw.endpoints.map((endpoint) =>
    Object.freeze({
      id: endpoint.id,
      path: endpoint.path.replace(/^\/+/, ""),
      description: endpoint.description,
      method: endpoint.method ?? "GET",
      fields: Object.freeze(
        endpoint.fields.map((field) =>
          Object.freeze({
            column: field.column,
            keys: Object.freeze([...field.keys]),
            ignoreValues: Object.freeze([...(field.ignoreValues ?? [])]),
          }),
        ),
      ),
    }),
  );

  return Object.freeze({
    version: raw.version,
    endpoints: Object.freeze(endpoints),
    columns: Object.freeze(
      endpoints.flatMap((endpoint) => endpoint.fields.map((field) => field.column)),
    ),
  });
}

/**
 * Loads and compiles the endpoint catalog.
 *
 * Fail-fast: any read, parse or validation error throws.
 *
 * @param catalogPath - Path relative to the working directory
 * @throws {SyntaxError} If JSON is malformed
 * @throws {CatalogValidationError} If validation fails
 */
export function loadEndpointCatalog(
  catalogPath: string = ENDPOINT_CATALOG_PATH,
): EndpointCatalog {
  const resolved = path.resolve(process.cwd(), catalogPath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return compileEndpointCatalog(validateEndpointCatalogRaw(raw));
}

/**
 * Introspection view: id, description, path and fed columns, in order
 */
export function describeEndpoints(catalog: EndpointCatalog): EndpointDescriptor[] {
  return catalog.endpoints.map((endpoint) => ({
    id: endpoint.id,
    description: endpoint.description,
    path: endpoint.path,
    columns: endpoint.fields.map((field) => field.column),
  }));
}

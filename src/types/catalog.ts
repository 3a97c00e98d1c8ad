/**
 * Endpoint catalog type definitions
 *
 * Raw types mirror data/endpoints.json before validation.
 * Runtime types are what the rest of the system reads.
 */

import type { HttpMethod } from "./clients/http";

/**
 * HTTP methods an endpoint may be called with
 * Either way the date range goes in a JSON body; GET is the default
 */
export type EndpointMethod = Extract<HttpMethod, "GET" | "POST">;

export type EndpointFieldRaw = {
  column: string;
  keys: string[];
  ignoreValues?: string[];
};

export type EndpointSpecRaw = {
  id: string;
  path: string;
  description: string;
  method?: EndpointMethod;
  fields: EndpointFieldRaw[];
};

export type EndpointCatalogRaw = {
  version: string;
  endpoints: EndpointSpecRaw[];
};

/**
 * One output column fed by an endpoint
 */
export type EndpointField = {
  /** Target column in the health_records table */
  readonly column: string;
  /** Payload keys tried in order; the first usable value wins */
  readonly keys: readonly string[];
  /** Extra values that count as absent for this column (e.g. "0") */
  readonly ignoreValues: readonly string[];
};

/**
 * Static description of one remote data point
 */
export type EndpointSpec = {
  readonly id: string;
  readonly path: string;
  readonly description: string;
  readonly method: EndpointMethod;
  readonly fields: readonly EndpointField[];
};

export type EndpointCatalog = {
  readonly version: string;
  readonly endpoints: readonly EndpointSpec[];
  /** Every endpoint-fed column, in catalog order */
  readonly columns: readonly string[];
};

/**
 * Introspection view of an endpoint (no call parameters beyond the path)
 */
export type EndpointDescriptor = {
  id: string;
  description: string;
  path: string;
  columns: string[];
};

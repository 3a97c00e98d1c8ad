/**
 * EndpointClient interface: one call to one data endpoint for one date
 *
 * The orchestrator depends on this contract only, so tests and other
 * deployments can swap the HTTP implementation.
 */

import type { DateKey, EndpointResult, EndpointSpec } from "@/types";

export interface EndpointClient {
  /**
   * Fetch one endpoint for one date
   *
   * Never rejects: every failure is reported as an EndpointResult with
   * ok: false. Retries are internal and only show up as latency and in
   * `attempts`.
   */
  fetch(date: DateKey, endpoint: EndpointSpec): Promise<EndpointResult>;
}

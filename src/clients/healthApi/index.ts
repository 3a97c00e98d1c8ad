export { HealthApiClient } from "./healthApiClient";
export type { HealthApiClientConfig } from "./healthApiClient";
export { extractEndpointPayload, extractToken } from "./mappers";
export type { PayloadExtraction } from "./mappers";

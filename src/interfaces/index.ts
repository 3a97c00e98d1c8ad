export type { EndpointClient } from "./clients/endpointClient";
export type { StorageGateway } from "./storage/storageGateway";

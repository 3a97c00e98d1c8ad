/**
 * Endpoint catalog barrel exports
 */

export { loadEndpointCatalog, compileEndpointCatalog, describeEndpoints } from "./loader";

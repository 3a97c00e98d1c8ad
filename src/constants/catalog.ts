/**
 * Endpoint catalog constants
 */

/**
 * Path to the endpoint catalog JSON file, relative to the project root.
 *
 * Single source of truth for the endpoints called per date and the
 * columns each one feeds.
 */
export const ENDPOINT_CATALOG_PATH = "data/endpoints.json";

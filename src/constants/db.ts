/**
 * Database constants
 */

export const HEALTH_RECORDS_TABLE = "health_records";

/**
 * SQL migrations directory, relative to the working directory
 */
export const MIGRATIONS_DIR = "migrations";

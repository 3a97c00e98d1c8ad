/**
 * Configuration defaults
 */

/**
 * SQLite file, relative to the working directory
 */
export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Zone that decides which calendar date "today" is
 */
export const DEFAULT_FETCH_TIMEZONE = "Asia/Kolkata";

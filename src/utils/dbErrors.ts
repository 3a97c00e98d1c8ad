/**
 * Database error utilities
 *
 * Helpers for identifying and classifying database errors.
 */

/**
 * SQLite result code carried by better-sqlite3 errors ("SQLITE_BUSY", ...)
 *
 * @returns The code, or undefined for non-SQLite errors
 */
export function sqliteErrorCode(err: unknown): string | undefined {
  if (!(err instanceof Error) || !("code" in err)) {
    return undefined;
  }
  return typeof err.code === "string" && err.code.startsWith("SQLITE_")
    ? err.code
    : undefined;
}

/**
 * One-line description of a database error for logs and progress events
 */
export function describeDbError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  const code = sqliteErrorCode(err);
  return code && !message.includes(code) ? `${code}: ${message}` : message;
}

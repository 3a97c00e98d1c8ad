/**
 * SQLite database connection
 *
 * Manages database connection lifecycle and configuration.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve database file path (explicit, DB_PATH, or default)
 */
function resolveDbPath(explicitPath?: string): string {
  const dbPath = explicitPath || process.env.DB_PATH || DEFAULT_DB_PATH;

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    const absolute = resolve(process.cwd(), dbPath);
    mkdirSync(dirname(absolute), { recursive: true });
    return absolute;
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));

  db.pragma("foreign_keys = ON");

  // WAL lets status reads proceed while a job is writing
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Set database connection for testing purposes only.
 * This allows injecting a test database into the singleton.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}

/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { MIGRATIONS_DIR } from "@/constants";
import * as logger from "@/logger";

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from migrations/ directory
 */
function getPendingMigrations(
  migrationsDir: string,
  appliedMigrations: Set<string>,
): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      migrationsDir,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(
  db: Database.Database,
  migrationsDir: string,
  filename: string,
): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Run all pending migrations on the given connection
 *
 * @returns File names applied by this call
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = join(process.cwd(), MIGRATIONS_DIR),
): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(migrationsDir, getAppliedMigrations(db));

  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pending.length });

  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  logger.info("Migrations complete", { applied: pending });
  return pending;
}

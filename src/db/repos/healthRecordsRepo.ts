/**
 * Health records repository
 *
 * Data access layer for health_records table.
 * One row per data_date; writes are upserts keyed by that date.
 */

import type { DateKey, HealthRecord, HealthRecordRow } from "@/types";
import { HEALTH_RECORDS_TABLE } from "@/constants";
import { getDb } from "../connection";

const SAFE_IDENTIFIER = /^[a-z][a-z0-9_]*$/;

function assertSafeIdentifier(column: string): void {
  if (!SAFE_IDENTIFIER.test(column)) {
    throw new Error(`Refusing to write column with unsafe name "${column}"`);
  }
}

/**
 * Insert or overwrite the row for record.dateKey
 *
 * Every column in record.columns is written; data_date always comes from
 * record.dateKey. Re-upserting a date replaces its values (latest wins).
 *
 * @throws On unknown columns or database errors
 */
export function upsertHealthRecord(record: HealthRecord): void {
  const db = getDb();

  const columns = Object.keys(record.columns).filter((c) => c !== "data_date");
  columns.forEach(assertSafeIdentifier);

  const insertColumns = ["data_date", ...columns];
  const placeholders = insertColumns.map(() => "?").join(", ");
  const updates = columns.map((c) => `${c} = excluded.${c}`).join(", ");

  const sql = `
    INSERT INTO ${HEALTH_RECORDS_TABLE} (${insertColumns.join(", ")})
    VALUES (${placeholders})
    ON CONFLICT(data_date) DO ${updates ? `UPDATE SET ${updates}` : "NOTHING"}
  `;

  db.prepare(sql).run(record.dateKey, ...columns.map((c) => record.columns[c]));
}

/**
 * Which of the given dates already have a row
 *
 * Single query regardless of how many dates are passed.
 *
 * @returns Stored dates, ascending
 */
export function findStoredDates(dates: readonly DateKey[]): DateKey[] {
  if (dates.length === 0) {
    return [];
  }

  const db = getDb();
  const rows = db
    .prepare(
      `
    SELECT data_date FROM ${HEALTH_RECORDS_TABLE}
    WHERE data_date IN (SELECT value FROM json_each(?))
    ORDER BY data_date
  `,
    )
    .all(JSON.stringify(dates)) as { data_date: string }[];

  return rows.map((r) => r.data_date);
}

/**
 * Total number of stored rows
 */
export function countHealthRecords(): number {
  const db = getDb();
  const row = db
    .prepare(`SELECT COUNT(*) AS count FROM ${HEALTH_RECORDS_TABLE}`)
    .get() as { count: number };
  return row.count;
}

/**
 * Stored dates, most recent first
 *
 * @param limit - Maximum number of dates (all when omitted)
 */
export function listRecordDates(limit?: number): DateKey[] {
  const db = getDb();

  const rows = (
    limit !== undefined
      ? db
          .prepare(
            `SELECT data_date FROM ${HEALTH_RECORDS_TABLE} ORDER BY data_date DESC LIMIT ?`,
          )
          .all(limit)
      : db
          .prepare(
            `SELECT data_date FROM ${HEALTH_RECORDS_TABLE} ORDER BY data_date DESC`,
          )
          .all()
  ) as { data_date: string }[];

  return rows.map((r) => r.data_date);
}

/**
 * Most recent fetched_at across all rows
 *
 * @returns ISO timestamp or null when the table is empty
 */
export function getLatestFetchedAt(): string | null {
  const db = getDb();
  const row = db
    .prepare(`SELECT MAX(fetched_at) AS latest FROM ${HEALTH_RECORDS_TABLE}`)
    .get() as { latest: string | null };
  return row.latest;
}

/**
 * Get the stored row for a date
 */
export function getHealthRecordByDate(date: DateKey): HealthRecordRow | null {
  const db = getDb();
  const row = db
    .prepare(`SELECT * FROM ${HEALTH_RECORDS_TABLE} WHERE data_date = ?`)
    .get(date) as HealthRecordRow | undefined;
  return row ?? null;
}

/**
 * Column names of the health_records table, in table order
 */
export function listHealthRecordColumns(): string[] {
  const db = getDb();
  const rows = db
    .prepare(`PRAGMA table_info(${HEALTH_RECORDS_TABLE})`)
    .all() as { name: string }[];
  return rows.map((r) => r.name);
}

/**
 * Storage type definitions
 */

import type { StoragePersistError } from "@/errors";

/**
 * Outcome of a health record upsert
 */
export type UpsertResult = { ok: true } | { ok: false; error: StoragePersistError };

/**
 * Raw health_records row (database entity)
 * data_date plus one TEXT column per output column
 */
export type HealthRecordRow = Record<string, string>;

export type StoreStatus = {
  recordCount: number;
  lastFetchedAt: string | null;
  recentDates: string[];
};

/**
 * StorageGateway interface: persistence contract consumed by the fetch core
 */

import type { DateKey, HealthRecord, UpsertResult } from "@/types";

export interface StorageGateway {
  /**
   * Subset of `dates` that already have a stored row
   * One round trip for the whole set.
   */
  exists(dates: readonly DateKey[]): Promise<Set<DateKey>>;

  /**
   * Insert or overwrite the row keyed by record.dateKey
   * Resolves with a failure result instead of rejecting.
   */
  upsert(record: HealthRecord): Promise<UpsertResult>;

  count(): Promise<number>;

  /**
   * Stored dates, most recent first
   */
  listKnownDates(limit?: number): Promise<DateKey[]>;

  /**
   * Latest fetched_at across stored rows, null when empty
   */
  lastFetchedAt(): Promise<string | null>;
}

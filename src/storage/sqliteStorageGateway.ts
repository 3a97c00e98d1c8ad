/**
 * SQLite implementation of the StorageGateway
 *
 * Thin async adapter over the health records repository. Upsert failures
 * are returned as StoragePersistError results so one bad write never
 * aborts a batch.
 */

import type { StorageGateway } from "@/interfaces";
import type { DateKey, HealthRecord, UpsertResult } from "@/types";
import { StoragePersistError } from "@/errors";
import {
  countHealthRecords,
  findStoredDates,
  getLatestFetchedAt,
  listRecordDates,
  upsertHealthRecord,
} from "@/db";
import { describeDbError } from "@/utils";
import * as logger from "@/logger";

export class SqliteStorageGateway implements StorageGateway {
  async exists(dates: readonly DateKey[]): Promise<Set<DateKey>> {
    return new Set(findStoredDates(dates));
  }

  async upsert(record: HealthRecord): Promise<UpsertResult> {
    try {
      upsertHealthRecord(record);
      return { ok: true };
    } catch (err) {
      const message = describeDbError(err);
      logger.warn("Health record upsert failed", {
        date: record.dateKey,
        error: message,
      });
      return {
        ok: false,
        error: new StoragePersistError(record.dateKey, message, { cause: err }),
      };
    }
  }

  async count(): Promise<number> {
    return countHealthRecords();
  }

  async listKnownDates(limit?: number): Promise<DateKey[]> {
    return listRecordDates(limit);
  }

  async lastFetchedAt(): Promise<string | null> {
    return getLatestFetchedAt();
  }
}

/**
 * Schema verification
 *
 * Checks that health_records can hold every column a merged record carries,
 * so a catalog edit without its migration fails at startup instead of on
 * every upsert.
 */

import type { EndpointCatalog } from "@/types";
import { DERIVED_COLUMNS, HEALTH_RECORDS_TABLE } from "@/constants";
import { listHealthRecordColumns } from "./repos/healthRecordsRepo";

export class SchemaMismatchError extends Error {
  public readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      `Table ${HEALTH_RECORDS_TABLE} is missing columns: ${missingColumns.join(", ")}. ` +
        `Add a migration for them.`,
    );
    this.name = "SchemaMismatchError";
    this.missingColumns = missingColumns;
  }
}

/**
 * @throws {SchemaMismatchError} When the table lacks a derived or catalog column
 */
export function verifyHealthRecordsSchema(catalog: EndpointCatalog): void {
  const present = new Set(listHealthRecordColumns());
  const missing = [...DERIVED_COLUMNS, ...catalog.columns].filter(
    (column) => !present.has(column),
  );

  if (missing.length > 0) {
    throw new SchemaMismatchError(missing);
  }
}

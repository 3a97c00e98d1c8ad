/**
 * Duplicate filter: split requested dates into pending and already stored
 */

import type { DateKey } from "@/types";

export type DateLookup = (dates: readonly DateKey[]) => Promise<ReadonlySet<DateKey>>;

export type FilteredDates = {
  /** Requested dates without a stored row, in requested order */
  pending: DateKey[];
  /** Requested dates that already have a row, in requested order */
  stored: DateKey[];
};

/**
 * Partition `requested` with a single lookup round trip
 *
 * Empty input resolves immediately without calling `lookup`. Lookup errors
 * propagate; the caller decides how to degrade.
 */
export async function filterPendingDates(
  requested: readonly DateKey[],
  lookup: DateLookup,
): Promise<FilteredDates> {
  if (requested.length === 0) {
    return { pending: [], stored: [] };
  }

  const existing = await lookup(requested);
  const pending: DateKey[] = [];
  const stored: DateKey[] = [];
  for (const date of requested) {
    (existing.has(date) ? stored : pending).push(date);
  }
  return { pending, stored };
}

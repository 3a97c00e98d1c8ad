/**
 * Ingestion module barrel exports
 */

export { filterPendingDates } from "./duplicateFilter";
export type { DateLookup, FilteredDates } from "./duplicateFilter";

export {
  mergeHealthRecord,
  partitionEndpointResults,
  cleanFieldValue,
} from "./recordMerger";

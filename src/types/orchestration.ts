/**
 * Orchestration type definitions
 */

import type { DateKey } from "./records";
import type { DateDoneStatus } from "./progress";

export type FetchOrchestratorOptions = {
  /** Endpoint calls in flight for one date */
  endpointConcurrency?: number;
  /** Dates in flight; events still come out in date order */
  dateConcurrency?: number;
  /** Progress stream buffer size before the producer blocks */
  streamCapacity?: number;
  /** Clock for fetched_at and durations (tests) */
  now?: () => Date;
};

/**
 * Outcome of one date inside a job, folded into the batch summary
 */
export type DateOutcome =
  | { date: DateKey; kind: "skipped" }
  | {
      date: DateKey;
      kind: "processed";
      status: DateDoneStatus;
      failedEndpoints: number;
    };

export type FetchJobState = "pending" | "running" | "finished";

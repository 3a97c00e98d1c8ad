/**
 * Progress event type definitions
 *
 * Events are emitted by the fetch orchestrator in date order and consumed by
 * an external transport (CLI, SSE, ...).
 */

import type { DateKey, EndpointFailureKind } from "./records";

export type DateDoneStatus = "saved" | "error";

export type DateSkipReason = "already_stored";

export type BatchSummary = {
  /** Dates in the job */
  requested: number;
  /** Dates that reached date_done (saved or errored) */
  processed: number;
  /** Dates persisted */
  saved: number;
  /** Dates already stored */
  skipped: number;
  /** Dates whose row could not be persisted */
  errored: number;
  /** Dates never reached because the job was cancelled */
  notAttempted: number;
  /** Cancellation was requested while the job ran, even after its last date was taken */
  cancelled: boolean;
  /** Failed endpoint count per processed date */
  endpointFailures: Record<DateKey, number>;
  /** Stored rows after the batch, null when the count query failed */
  totalRecords: number | null;
  durationMs: number;
};

export type StartedEvent = {
  type: "started";
  date: DateKey;
  /** 1-based position of the date in the job */
  index: number;
  total: number;
};

export type EndpointDoneEvent = {
  type: "endpoint_done";
  date: DateKey;
  endpoint: string;
  status: "ok" | "failed";
  failureKind?: EndpointFailureKind;
  attempts: number;
  durationMs: number;
};

export type DateDoneEvent = {
  type: "date_done";
  date: DateKey;
  status: DateDoneStatus;
  succeeded: number;
  failed: number;
  failedEndpoints: string[];
  error?: string;
};

export type DateSkippedEvent = {
  type: "date_skipped";
  date: DateKey;
  reason: DateSkipReason;
};

export type BatchDoneEvent = {
  type: "batch_done";
  summary: BatchSummary;
};

export type ProgressEvent =
  | StartedEvent
  | EndpointDoneEvent
  | DateDoneEvent
  | DateSkippedEvent
  | BatchDoneEvent;

/**
 * FetchJob: one requested batch of dates
 *
 * Created by the service, run once by the orchestrator, discarded after
 * batch_done. Cancellation is a flag checked between dates.
 */

import { randomUUID } from "crypto";
import type { DateKey, FetchJobState } from "@/types";
import { normalizeDateKey, uniqueDateKeys } from "@/utils";

export class FetchJobAlreadyStartedError extends Error {
  constructor(jobId: string) {
    super(`Fetch job ${jobId} has already been run`);
    this.name = "FetchJobAlreadyStartedError";
  }
}

export class FetchJob {
  readonly id: string;
  readonly dates: readonly DateKey[];
  private cancelled = false;
  private currentState: FetchJobState = "pending";

  /**
   * Dates are normalized and repeats dropped, keeping first-seen order
   *
   * @throws {InvalidDateError} If any date is not a calendar date
   */
  constructor(dates: readonly string[], id: string = randomUUID()) {
    this.id = id;
    this.dates = Object.freeze(uniqueDateKeys(dates.map(normalizeDateKey)));
  }

  get state(): FetchJobState {
    return this.currentState;
  }

  get cancelRequested(): boolean {
    return this.cancelled;
  }

  /**
   * Stop taking new dates; dates already in flight still finish
   */
  cancel(): void {
    this.cancelled = true;
  }

  /**
   * @throws {FetchJobAlreadyStartedError} When the job already ran
   */
  markRunning(): void {
    if (this.currentState !== "pending") {
      throw new FetchJobAlreadyStartedError(this.id);
    }
    this.currentState = "running";
  }

  markFinished(): void {
    this.currentState = "finished";
  }
}

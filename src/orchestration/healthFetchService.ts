/**
 * HealthFetchService: operations exposed to a transport (CLI, HTTP, ...)
 *
 * Validates requests synchronously, builds FetchJobs and hands back their
 * progress event streams. Tracks running jobs so a transport can cancel
 * one by id when its client disconnects.
 */

import type { StorageGateway } from "@/interfaces";
import type {
  DateKey,
  EndpointCatalog,
  EndpointDescriptor,
  ProgressEvent,
  StoreStatus,
} from "@/types";
import {
  DEFAULT_FETCH_TIMEZONE,
  MAX_RANGE_DAYS,
  STATUS_RECENT_DATES_LIMIT,
} from "@/constants";
import { InvalidRangeError } from "@/errors";
import { describeEndpoints } from "@/catalog";
import {
  countDaysInclusive,
  dateKeyInTimeZone,
  enumerateDateRange,
  normalizeDateKey,
} from "@/utils";
import { FetchJob } from "./fetchJob";
import type { FetchOrchestrator } from "./fetchOrchestrator";
import * as logger from "@/logger";

export type HealthFetchServiceOptions = {
  /** IANA zone deciding which date "today" is */
  timeZone?: string;
  maxRangeDays?: number;
  now?: () => Date;
};

/**
 * A started request: its job id, dates and progress events
 */
export type FetchRun = {
  jobId: string;
  dates: readonly DateKey[];
  events: AsyncGenerator<ProgressEvent, void, undefined>;
  cancel: () => void;
};

export class HealthFetchService {
  private readonly activeJobs = new Map<string, FetchJob>();
  private readonly timeZone: string;
  private readonly maxRangeDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly orchestrator: FetchOrchestrator,
    private readonly storage: StorageGateway,
    private readonly catalog: EndpointCatalog,
    options: HealthFetchServiceOptions = {},
  ) {
    this.timeZone = options.timeZone ?? DEFAULT_FETCH_TIMEZONE;
    this.maxRangeDays = options.maxRangeDays ?? MAX_RANGE_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch today's date in the configured time zone
   */
  runToday(): FetchRun {
    return this.start([dateKeyInTimeZone(this.now(), this.timeZone)]);
  }

  /**
   * Fetch every date from `start` to `end`, both included
   *
   * @throws {InvalidDateError} If either bound is not a calendar date
   * @throws {InvalidRangeError} If start is after end or the range is too long
   */
  runRange(start: string, end: string): FetchRun {
    const from = normalizeDateKey(start);
    const to = normalizeDateKey(end);

    if (from > to) {
      throw new InvalidRangeError(from, to, "start date is after end date");
    }
    const days = countDaysInclusive(from, to);
    if (days > this.maxRangeDays) {
      throw new InvalidRangeError(
        from,
        to,
        `${days} days requested, at most ${this.maxRangeDays} allowed`,
      );
    }

    return this.start(enumerateDateRange(from, to));
  }

  listEndpoints(): EndpointDescriptor[] {
    return describeEndpoints(this.catalog);
  }

  async status(): Promise<StoreStatus> {
    const [recordCount, lastFetchedAt, recentDates] = await Promise.all([
      this.storage.count(),
      this.storage.lastFetchedAt(),
      this.storage.listKnownDates(STATUS_RECENT_DATES_LIMIT),
    ]);
    return { recordCount, lastFetchedAt, recentDates };
  }

  /**
   * Request cancellation of a running job
   *
   * @returns false when no such job is running
   */
  cancel(jobId: string): boolean {
    const job = this.activeJobs.get(jobId);
    if (job === undefined) {
      return false;
    }
    logger.info("Fetch job cancellation requested", { jobId });
    job.cancel();
    return true;
  }

  /**
   * Ids of jobs whose event stream has not finished yet
   */
  activeJobIds(): string[] {
    return [...this.activeJobs.keys()];
  }

  private start(dates: readonly DateKey[]): FetchRun {
    const job = new FetchJob(dates);
    this.activeJobs.set(job.id, job);
    return {
      jobId: job.id,
      dates: job.dates,
      events: this.track(job),
      cancel: () => job.cancel(),
    };
  }

  private async *track(job: FetchJob): AsyncGenerator<ProgressEvent, void, undefined> {
    try {
      yield* this.orchestrator.run(job);
    } finally {
      this.activeJobs.delete(job.id);
    }
  }
}

/**
 * Fetch orchestrator: run a FetchJob and stream its progress
 *
 * Per job:
 * 1. Duplicate filter once over every requested date
 * 2. Dates taken in job order by `dateConcurrency` workers
 * 3. Per pending date: every endpoint through a bounded pool, merge, upsert
 * 4. batch_done with the summary, always last
 *
 * A failed endpoint never fails a date, and a failed upsert never fails
 * the batch. Events are emitted in date order whatever the concurrency.
 */

import type { EndpointClient, StorageGateway } from "@/interfaces";
import type {
  BatchSummary,
  DateKey,
  DateOutcome,
  EndpointCatalog,
  EndpointResult,
  EndpointSpec,
  FetchOrchestratorOptions,
  Logger,
  ProgressEvent,
  UpsertResult,
} from "@/types";
import {
  DEFAULT_DATE_CONCURRENCY,
  DEFAULT_ENDPOINT_CONCURRENCY,
  DEFAULT_PROGRESS_STREAM_CAPACITY,
} from "@/constants";
import { StoragePersistError } from "@/errors";
import { filterPendingDates, mergeHealthRecord, partitionEndpointResults } from "@/ingestion";
import { mapWithConcurrency } from "@/utils";
import { DateEventSequencer } from "./dateEventSequencer";
import { FetchJob } from "./fetchJob";
import { ProgressStream } from "./progressStream";
import * as logger from "@/logger";

export type FetchOrchestratorDeps = {
  client: EndpointClient;
  storage: StorageGateway;
  catalog: EndpointCatalog;
};

type JobContext = {
  job: FetchJob;
  stored: ReadonlySet<DateKey>;
  sequencer: DateEventSequencer<ProgressEvent>;
  log: Logger;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FetchOrchestrator {
  private readonly client: EndpointClient;
  private readonly storage: StorageGateway;
  private readonly endpoints: readonly EndpointSpec[];
  private readonly endpointConcurrency: number;
  private readonly dateConcurrency: number;
  private readonly streamCapacity: number;
  private readonly now: () => Date;

  constructor(deps: FetchOrchestratorDeps, options: FetchOrchestratorOptions = {}) {
    this.client = deps.client;
    this.storage = deps.storage;
    this.endpoints = deps.catalog.endpoints;
    this.endpointConcurrency = Math.max(
      1,
      options.endpointConcurrency ?? DEFAULT_ENDPOINT_CONCURRENCY,
    );
    this.dateConcurrency = Math.max(1, options.dateConcurrency ?? DEFAULT_DATE_CONCURRENCY);
    this.streamCapacity = options.streamCapacity ?? DEFAULT_PROGRESS_STREAM_CAPACITY;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run `job`, yielding its progress events
   *
   * Lazy: nothing is fetched before the first pull. Breaking out of the
   * loop cancels the job and waits for in-flight dates to finish.
   *
   * @throws {FetchJobAlreadyStartedError} When the job was already run
   */
  async *run(job: FetchJob): AsyncGenerator<ProgressEvent, void, undefined> {
    job.markRunning();

    const stream = new ProgressStream<ProgressEvent>(this.streamCapacity);
    const producer = this.produce(job, stream).then(
      () => stream.end(),
      (error: unknown) => stream.fail(error),
    );

    let completed = false;
    try {
      for await (const event of stream) {
        yield event;
      }
      completed = true;
    } finally {
      if (!completed) {
        job.cancel();
        stream.close();
      }
      await producer;
      job.markFinished();
    }
  }

  private async produce(job: FetchJob, stream: ProgressStream<ProgressEvent>): Promise<void> {
    const startedAt = this.now().getTime();
    const log = logger.withContext({ jobId: job.id });
    const dates = job.dates;

    log.info("Fetch job started", {
      dates: dates.length,
      endpoints: this.endpoints.length,
      dateConcurrency: this.dateConcurrency,
      endpointConcurrency: this.endpointConcurrency,
    });

    const stored = await this.lookupStoredDates(dates, log);
    const ctx: JobContext = {
      job,
      stored,
      sequencer: new DateEventSequencer((event) => stream.send(event)),
      log,
    };

    const outcomes: DateOutcome[] = [];
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (!job.cancelRequested && nextIndex < dates.length) {
        const index = nextIndex++;
        outcomes[index] = await this.processDate(ctx, index, dates[index]);
      }
    };

    const width = Math.max(1, Math.min(this.dateConcurrency, dates.length));
    await Promise.all(Array.from({ length: width }, () => worker()));
    await ctx.sequencer.drain();

    const summary = await this.buildSummary(
      job,
      dates.length,
      nextIndex,
      outcomes,
      startedAt,
    );
    log.info("Fetch job finished", {
      saved: summary.saved,
      skipped: summary.skipped,
      errored: summary.errored,
      notAttempted: summary.notAttempted,
      cancelled: summary.cancelled,
      durationMs: summary.durationMs,
    });
    await stream.send({ type: "batch_done", summary });
  }

  /**
   * Stored subset of the job's dates; all dates count as pending when the
   * lookup fails (the upsert keeps a repeat fetch harmless)
   */
  private async lookupStoredDates(
    dates: readonly DateKey[],
    log: Logger,
  ): Promise<ReadonlySet<DateKey>> {
    try {
      const { stored } = await filterPendingDates(dates, (requested) =>
        this.storage.exists(requested),
      );
      return new Set(stored);
    } catch (error) {
      log.warn("Stored date lookup failed, fetching every date", {
        error: errorMessage(error),
      });
      return new Set();
    }
  }

  private async processDate(
    ctx: JobContext,
    index: number,
    date: DateKey,
  ): Promise<DateOutcome> {
    const { sequencer } = ctx;

    if (ctx.stored.has(date)) {
      await sequencer.emit(index, { type: "date_skipped", date, reason: "already_stored" });
      await sequencer.finish(index);
      return { date, kind: "skipped" };
    }

    await sequencer.emit(index, {
      type: "started",
      date,
      index: index + 1,
      total: ctx.job.dates.length,
    });

    const results = await mapWithConcurrency(
      this.endpoints,
      this.endpointConcurrency,
      async (endpoint) => {
        const result = await this.callEndpoint(date, endpoint, ctx.log);
        await sequencer.emit(index, {
          type: "endpoint_done",
          date,
          endpoint: endpoint.id,
          status: result.ok ? "ok" : "failed",
          ...(!result.ok && { failureKind: result.failure.kind }),
          attempts: result.attempts,
          durationMs: result.durationMs,
        });
        return result;
      },
    );

    const record = mergeHealthRecord(date, results, this.endpoints, this.now());
    const { succeeded, failed } = partitionEndpointResults(results, this.endpoints);
    const upsert = await this.persist(record.dateKey, () => this.storage.upsert(record));

    if (upsert.ok) {
      ctx.log.info("Date saved", { date, succeeded: succeeded.length, failed: failed.length });
    } else {
      ctx.log.error("Date not saved", { date, error: upsert.error.message });
    }

    await sequencer.emit(index, {
      type: "date_done",
      date,
      status: upsert.ok ? "saved" : "error",
      succeeded: succeeded.length,
      failed: failed.length,
      failedEndpoints: failed,
      ...(!upsert.ok && { error: upsert.error.message }),
    });
    await sequencer.finish(index);

    return {
      date,
      kind: "processed",
      status: upsert.ok ? "saved" : "error",
      failedEndpoints: failed.length,
    };
  }

  /**
   * Client calls are contracted never to reject; a rejection still becomes
   * an `unexpected` failure instead of aborting the date
   */
  private async callEndpoint(
    date: DateKey,
    endpoint: EndpointSpec,
    log: Logger,
  ): Promise<EndpointResult> {
    const startedAt = this.now().getTime();
    try {
      return await this.client.fetch(date, endpoint);
    } catch (error) {
      log.warn("Endpoint client rejected", {
        date,
        endpoint: endpoint.id,
        error: errorMessage(error),
      });
      return {
        ok: false,
        endpointId: endpoint.id,
        failure: { kind: "unexpected", message: errorMessage(error) },
        attempts: 1,
        durationMs: this.now().getTime() - startedAt,
      };
    }
  }

  private async persist(
    date: DateKey,
    write: () => Promise<UpsertResult>,
  ): Promise<UpsertResult> {
    try {
      return await write();
    } catch (error) {
      return {
        ok: false,
        error: new StoragePersistError(date, errorMessage(error), { cause: error }),
      };
    }
  }

  private async buildSummary(
    job: FetchJob,
    requested: number,
    taken: number,
    outcomes: readonly DateOutcome[],
    startedAt: number,
  ): Promise<BatchSummary> {
    let saved = 0;
    let skipped = 0;
    let errored = 0;
    const endpointFailures: Record<DateKey, number> = {};

    for (const outcome of outcomes) {
      if (outcome === undefined) continue;
      if (outcome.kind === "skipped") {
        skipped++;
        continue;
      }
      if (outcome.status === "saved") saved++;
      else errored++;
      endpointFailures[outcome.date] = outcome.failedEndpoints;
    }

    let totalRecords: number | null;
    try {
      totalRecords = await this.storage.count();
    } catch (error) {
      logger.warn("Record count failed", { error: errorMessage(error) });
      totalRecords = null;
    }

    const notAttempted = requested - taken;
    return {
      requested,
      processed: saved + errored,
      saved,
      skipped,
      errored,
      notAttempted,
      cancelled: job.cancelRequested,
      endpointFailures,
      totalRecords,
      durationMs: this.now().getTime() - startedAt,
    };
  }
}

/**
 * E2E: fetch orchestrator with in-process fakes
 *
 * Covers event ordering, skipping, per-date failure isolation,
 * cancellation and consumer abandonment.
 */

import { describe, it, expect } from "vitest";
import type { DateKey, ProgressEvent } from "@/types";
import { FetchJob, FetchJobAlreadyStartedError, FetchOrchestrator } from "@/orchestration";
import { InvalidDateError } from "@/errors";
import {
  collectEvents,
  createTestCatalog,
  delay,
  FakeEndpointClient,
  InMemoryStorageGateway,
  type Responder,
} from "../helpers/fakes";

const NOW = new Date("2024-01-10T00:00:00.000Z");
const DATES: DateKey[] = ["2024-01-01", "2024-01-02", "2024-01-03"];

const allSucceed: Responder = (_date, endpoint) => ({
  ok: true,
  payload: Object.fromEntries(
    endpoint.fields.flatMap((field) => field.keys.map((key) => [key, 5])),
  ),
});

function setup(
  responder: Responder = allSucceed,
  options: { stored?: DateKey[]; dateConcurrency?: number; endpointConcurrency?: number } = {},
) {
  const client = new FakeEndpointClient(responder);
  const storage = new InMemoryStorageGateway(options.stored);
  const orchestrator = new FetchOrchestrator(
    { client, storage, catalog: createTestCatalog() },
    {
      dateConcurrency: options.dateConcurrency,
      endpointConcurrency: options.endpointConcurrency,
      now: () => NOW,
    },
  );
  return { client, storage, orchestrator };
}

function terminalDates(events: ProgressEvent[]): string[] {
  return events.flatMap((event) =>
    event.type === "date_done" || event.type === "date_skipped" ? [event.date] : [],
  );
}

describe("E2E: FetchOrchestrator", () => {
  it("emits started, endpoint_done, date_done per date and batch_done last", async () => {
    const { orchestrator, storage } = setup();

    const events = await collectEvents(orchestrator.run(new FetchJob(DATES)));

    expect(events.map((event) => event.type)).toEqual([
      ...["started", "endpoint_done", "endpoint_done", "endpoint_done", "date_done"],
      ...["started", "endpoint_done", "endpoint_done", "endpoint_done", "date_done"],
      ...["started", "endpoint_done", "endpoint_done", "endpoint_done", "date_done"],
      "batch_done",
    ]);
    expect(events[0]).toEqual({ type: "started", date: "2024-01-01", index: 1, total: 3 });
    expect(events[4]).toEqual({
      type: "date_done",
      date: "2024-01-01",
      status: "saved",
      succeeded: 3,
      failed: 0,
      failedEndpoints: [],
    });
    expect(events[events.length - 1]).toEqual({
      type: "batch_done",
      summary: {
        requested: 3,
        processed: 3,
        saved: 3,
        skipped: 0,
        errored: 0,
        notAttempted: 0,
        cancelled: false,
        endpointFailures: { "2024-01-01": 0, "2024-01-02": 0, "2024-01-03": 0 },
        totalRecords: 3,
        durationMs: 0,
      },
    });
    expect(storage.upserted).toEqual(DATES);
    expect(storage.rows.get("2024-01-02")?.columns.number_of_doctors).toBe("5");
  });

  it("skips stored dates without fetching or writing them", async () => {
    const { orchestrator, storage, client } = setup(allSucceed, { stored: ["2024-01-02"] });

    const events = await collectEvents(orchestrator.run(new FetchJob(DATES)));

    expect(events.filter((event) => event.type === "date_skipped")).toEqual([
      { type: "date_skipped", date: "2024-01-02", reason: "already_stored" },
    ]);
    expect(terminalDates(events)).toEqual(DATES);
    expect(storage.existsCalls).toBe(1);
    expect(storage.upserted).toEqual(["2024-01-01", "2024-01-03"]);
    expect(client.calls.some((call) => call.date === "2024-01-02")).toBe(false);
  });

  it("reports failed endpoints and still saves the date", async () => {
    const { orchestrator, storage } = setup((date, endpoint) =>
      endpoint.id === "beds" ? { ok: false, kind: "transient" } : allSucceed(date, endpoint),
    );

    const events = await collectEvents(orchestrator.run(new FetchJob(["2024-01-01"])));

    expect(events).toContainEqual({
      type: "endpoint_done",
      date: "2024-01-01",
      endpoint: "beds",
      status: "failed",
      failureKind: "transient",
      attempts: 1,
      durationMs: 0,
    });
    expect(events).toContainEqual({
      type: "date_done",
      date: "2024-01-01",
      status: "saved",
      succeeded: 2,
      failed: 1,
      failedEndpoints: ["beds"],
    });
    expect(storage.rows.get("2024-01-01")?.columns.number_of_beds).toBe("Not Available");
  });

  it("turns a failed write into an error date and continues the batch", async () => {
    const { orchestrator, storage } = setup();
    storage.failUpsertFor.add("2024-01-02");

    const events = await collectEvents(orchestrator.run(new FetchJob(DATES)));

    expect(events).toContainEqual({
      type: "date_done",
      date: "2024-01-02",
      status: "error",
      succeeded: 3,
      failed: 0,
      failedEndpoints: [],
      error: "Failed to persist record for 2024-01-02: disk I/O error",
    });
    const last = events[events.length - 1];
    expect(last.type === "batch_done" && last.summary).toMatchObject({
      saved: 2,
      errored: 1,
      processed: 3,
    });
    expect(storage.upserted).toEqual(["2024-01-01", "2024-01-03"]);
  });

  it("fetches every date when the stored-date lookup fails", async () => {
    const { orchestrator, storage } = setup(allSucceed, { stored: ["2024-01-01"] });
    storage.existsError = new Error("database is locked");

    const events = await collectEvents(orchestrator.run(new FetchJob(["2024-01-01"])));

    expect(events.some((event) => event.type === "date_skipped")).toBe(false);
    expect(storage.upserted).toEqual(["2024-01-01"]);
  });

  it("stops taking dates once cancelled, keeping completed ones", async () => {
    const dates = ["2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04", "2024-01-05"];
    const { orchestrator, storage } = setup();
    const job = new FetchJob(dates);
    storage.onUpsert = (record) => {
      if (record.dateKey === "2024-01-02") job.cancel();
    };

    const events = await collectEvents(orchestrator.run(job));

    expect(terminalDates(events)).toEqual(["2024-01-01", "2024-01-02"]);
    const last = events[events.length - 1];
    expect(last.type === "batch_done" && last.summary).toMatchObject({
      requested: 5,
      processed: 2,
      saved: 2,
      notAttempted: 3,
      cancelled: true,
    });
    expect([...storage.rows.keys()]).toEqual(["2024-01-01", "2024-01-02"]);
  });

  it("keeps date order with several dates in flight", async () => {
    const dates = ["2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04", "2024-01-05", "2024-01-06"];
    // Earlier dates answer slower so later dates finish first
    const waits: Record<string, number> = {
      "2024-01-01": 30,
      "2024-01-02": 20,
      "2024-01-03": 10,
    };
    const { orchestrator, client } = setup(
      async (date, endpoint) => {
        await delay(waits[date] ?? 1);
        return allSucceed(date, endpoint);
      },
      { dateConcurrency: 3 },
    );

    const events = await collectEvents(orchestrator.run(new FetchJob(dates)));

    expect(terminalDates(events)).toEqual(dates);
    // Every event of a date comes before any event of the next date
    const eventDates = events.flatMap((event) => (event.type === "batch_done" ? [] : [event.date]));
    expect(eventDates).toEqual([...eventDates].sort());
    expect(client.maxInFlight).toBeGreaterThan(3);
  });

  it("bounds endpoint calls per date", async () => {
    const { orchestrator, client } = setup(
      async (date, endpoint) => {
        await delay(5);
        return allSucceed(date, endpoint);
      },
      { endpointConcurrency: 2 },
    );

    await collectEvents(orchestrator.run(new FetchJob(["2024-01-01"])));

    expect(client.maxInFlight).toBe(2);
    expect(client.calls).toHaveLength(3);
  });

  it("cancels and drains when the consumer stops reading", async () => {
    const { orchestrator, storage } = setup(async (date, endpoint) => {
      await delay(2);
      return allSucceed(date, endpoint);
    });
    const job = new FetchJob(DATES);

    for await (const event of orchestrator.run(job)) {
      if (event.type === "started") break;
    }

    expect(job.cancelRequested).toBe(true);
    expect(job.state).toBe("finished");
    expect(storage.upserted).toEqual(["2024-01-01"]);
  });

  it("turns a rejecting client call into an unexpected failure", async () => {
    const { orchestrator } = setup(async (date, endpoint) => {
      if (endpoint.id === "anm") throw new Error("socket hang up");
      return allSucceed(date, endpoint);
    });

    const events = await collectEvents(orchestrator.run(new FetchJob(["2024-01-01"])));

    expect(events).toContainEqual(
      expect.objectContaining({ type: "endpoint_done", endpoint: "anm", failureKind: "unexpected" }),
    );
    expect(events).toContainEqual(
      expect.objectContaining({ type: "date_done", status: "saved", failedEndpoints: ["anm"] }),
    );
  });

  it("does nothing before the first pull", async () => {
    const { orchestrator, client, storage } = setup();
    const events = orchestrator.run(new FetchJob(DATES));

    await delay(5);

    expect(client.calls).toHaveLength(0);
    expect(storage.existsCalls).toBe(0);
    await events.return();
  });

  it("emits only batch_done for an empty job", async () => {
    const { orchestrator, storage } = setup();

    const events = await collectEvents(orchestrator.run(new FetchJob([])));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "batch_done",
      summary: { requested: 0, processed: 0, cancelled: false },
    });
    expect(storage.existsCalls).toBe(0);
  });

  it("refuses to run a job twice", async () => {
    const { orchestrator } = setup();
    const job = new FetchJob(["2024-01-01"]);

    await collectEvents(orchestrator.run(job));

    await expect(collectEvents(orchestrator.run(job))).rejects.toBeInstanceOf(
      FetchJobAlreadyStartedError,
    );
  });

  it("fetches a repeated date once", async () => {
    const { orchestrator, storage, client } = setup();
    const job = new FetchJob(["2024-01-01", "2024-01-02", "2024-01-01"]);

    const events = await collectEvents(orchestrator.run(job));

    expect(job.dates).toEqual(["2024-01-01", "2024-01-02"]);
    expect(terminalDates(events)).toEqual(["2024-01-01", "2024-01-02"]);
    expect(storage.upserted).toEqual(["2024-01-01", "2024-01-02"]);
    expect(client.calls).toHaveLength(6);
    const last = events[events.length - 1];
    expect(last.type === "batch_done" && last.summary.requested).toBe(2);
  });

  it("rejects a job with a malformed date", () => {
    expect(() => new FetchJob(["2024-13-01"])).toThrow(InvalidDateError);
  });

  it("marks the batch cancelled when cancellation arrives during the last date", async () => {
    const { orchestrator, storage } = setup();
    const job = new FetchJob(["2024-01-01"]);
    storage.onUpsert = () => job.cancel();

    const events = await collectEvents(orchestrator.run(job));

    expect(storage.upserted).toEqual(["2024-01-01"]);
    const last = events[events.length - 1];
    expect(last.type === "batch_done" && last.summary).toMatchObject({
      processed: 1,
      notAttempted: 0,
      cancelled: true,
    });
  });
});

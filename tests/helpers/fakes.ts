/**
 * In-process fakes for orchestrator and service tests
 *
 * FakeEndpointClient answers from a per-call responder; InMemoryStorageGateway
 * keeps rows in a Map and exposes hooks to inject failures.
 */

import type { EndpointClient, StorageGateway } from "@/interfaces";
import type {
  DateKey,
  EndpointCatalog,
  EndpointFailureKind,
  EndpointPayload,
  EndpointResult,
  EndpointSpec,
  HealthRecord,
  ProgressEvent,
  UpsertResult,
} from "@/types";
import { StoragePersistError } from "@/errors";
import { compileEndpointCatalog } from "@/catalog";

export type FakeResponse =
  | { ok: true; payload: EndpointPayload }
  | { ok: false; kind: EndpointFailureKind; message?: string };

export type Responder = (
  date: DateKey,
  endpoint: EndpointSpec,
) => FakeResponse | Promise<FakeResponse>;

export class FakeEndpointClient implements EndpointClient {
  readonly calls: Array<{ date: DateKey; endpointId: string }> = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responder: Responder) {}

  async fetch(date: DateKey, endpoint: EndpointSpec): Promise<EndpointResult> {
    this.calls.push({ date, endpointId: endpoint.id });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const response = await this.responder(date, endpoint);
      if (response.ok) {
        return {
          ok: true,
          endpointId: endpoint.id,
          payload: response.payload,
          attempts: 1,
          durationMs: 0,
        };
      }
      return {
        ok: false,
        endpointId: endpoint.id,
        failure: { kind: response.kind, message: response.message ?? response.kind },
        attempts: 1,
        durationMs: 0,
      };
    } finally {
      this.inFlight--;
    }
  }
}

export class InMemoryStorageGateway implements StorageGateway {
  readonly rows = new Map<DateKey, HealthRecord>();
  readonly upserted: DateKey[] = [];
  existsCalls = 0;
  existsError: Error | null = null;
  failUpsertFor = new Set<DateKey>();
  onUpsert: ((record: HealthRecord) => void) | null = null;

  constructor(storedDates: readonly DateKey[] = []) {
    for (const date of storedDates) {
      this.rows.set(date, {
        dateKey: date,
        columns: { data_date: date, fetched_at: "2023-12-31T00:00:00.000Z" },
      });
    }
  }

  async exists(dates: readonly DateKey[]): Promise<Set<DateKey>> {
    this.existsCalls++;
    if (this.existsError) {
      throw this.existsError;
    }
    return new Set(dates.filter((date) => this.rows.has(date)));
  }

  async upsert(record: HealthRecord): Promise<UpsertResult> {
    this.onUpsert?.(record);
    if (this.failUpsertFor.has(record.dateKey)) {
      return {
        ok: false,
        error: new StoragePersistError(record.dateKey, "disk I/O error"),
      };
    }
    this.rows.set(record.dateKey, record);
    this.upserted.push(record.dateKey);
    return { ok: true };
  }

  async count(): Promise<number> {
    return this.rows.size;
  }

  async listKnownDates(limit?: number): Promise<DateKey[]> {
    const dates = [...this.rows.keys()].sort().reverse();
    return limit === undefined ? dates : dates.slice(0, limit);
  }

  async lastFetchedAt(): Promise<string | null> {
    const values = [...this.rows.values()].map((row) => row.columns.fetched_at).sort();
    return values.length > 0 ? values[values.length - 1] : null;
  }
}

/**
 * Small catalog: three endpoints feeding four columns
 */
export function createTestCatalog(): EndpointCatalog {
  return compileEndpointCatalog({
    version: "test",
    endpoints: [
      {
        id: "staff",
        path: "staff_data",
        description: "Staff counts",
        fields: [
          { column: "number_of_doctors", keys: ["doctor"] },
          { column: "number_of_nurses", keys: ["nurse"] },
        ],
      },
      {
        id: "beds",
        path: "beds",
        description: "Bed count",
        fields: [{ column: "number_of_beds", keys: ["bed_count", "beds"] }],
      },
      {
        id: "anm",
        path: "anm",
        description: "ANM count",
        fields: [
          { column: "number_of_auxiliary_nurse_midwives", keys: ["anm"], ignoreValues: ["0"] },
        ],
      },
    ],
  });
}

/**
 * Drain an event stream into an array
 */
export async function collectEvents(
  events: AsyncIterable<ProgressEvent>,
): Promise<ProgressEvent[]> {
  const collected: ProgressEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

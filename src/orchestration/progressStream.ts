/**
 * ProgressStream: bounded single-consumer async channel
 *
 * The producer awaits `send`; once `capacity` items are buffered the send
 * waits until the consumer reads (back-pressure). Items are never dropped
 * while the consumer is reading. After the consumer calls `close()`, sends
 * resolve at once and their values are discarded.
 */

import { DEFAULT_PROGRESS_STREAM_CAPACITY } from "@/constants";

type StreamState = "open" | "ended" | "failed" | "closed";

type PendingSend<T> = {
  value: T;
  resolve: () => void;
};

type PendingRead<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
};

export class ProgressStreamClosedError extends Error {
  constructor() {
    super("Progress stream already finished by its producer");
    this.name = "ProgressStreamClosedError";
  }
}

export class ProgressStream<T> implements AsyncIterableIterator<T> {
  private readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private pendingRead: PendingRead<T> | null = null;
  private state: StreamState = "open";
  private failure: unknown = undefined;

  constructor(capacity: number = DEFAULT_PROGRESS_STREAM_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  /**
   * Items buffered and not yet read
   */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.state === "closed";
  }

  /**
   * Offer an item; resolves once it is buffered or handed to the reader
   *
   * @throws {ProgressStreamClosedError} After end() or fail()
   */
  send(value: T): Promise<void> {
    if (this.state === "closed") {
      return Promise.resolve();
    }
    if (this.state !== "open") {
      return Promise.reject(new ProgressStreamClosedError());
    }

    const reader = this.pendingRead;
    if (reader !== null) {
      this.pendingRead = null;
      reader.resolve({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  /**
   * Finish the stream; the reader sees done after the buffer drains
   */
  end(): void {
    if (this.state !== "open") {
      return;
    }
    this.state = "ended";
    this.settlePendingRead();
  }

  /**
   * Finish the stream with an error the reader throws after the buffer drains
   */
  fail(error: unknown): void {
    if (this.state !== "open") {
      return;
    }
    this.state = "failed";
    this.failure = error;
    this.settlePendingRead();
  }

  /**
   * Consumer stops reading: discard buffered items and release waiting senders
   */
  close(): void {
    if (this.state === "closed") {
      return;
    }
    this.state = "closed";
    this.buffer.length = 0;
    for (const pending of this.pendingSends.splice(0)) {
      pending.resolve();
    }
    const reader = this.pendingRead;
    this.pendingRead = null;
    reader?.resolve({ done: true, value: undefined });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitPendingSend();
      return Promise.resolve({ done: false, value });
    }

    if (this.state === "failed") {
      const failure = this.failure;
      this.state = "closed";
      this.failure = undefined;
      return Promise.reject(failure);
    }
    if (this.state !== "open") {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.pendingRead !== null) {
      return Promise.reject(new Error("ProgressStream supports a single pending read"));
    }

    return new Promise((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /**
   * Move one blocked send into the freed buffer slot
   */
  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (pending === undefined) {
      return;
    }
    this.buffer.push(pending.value);
    pending.resolve();
  }

  private settlePendingRead(): void {
    if (this.buffer.length > 0) {
      return;
    }
    const reader = this.pendingRead;
    if (reader === null) {
      return;
    }
    this.pendingRead = null;
    if (this.state === "failed") {
      const failure = this.failure;
      this.state = "closed";
      this.failure = undefined;
      reader.reject(failure);
      return;
    }
    reader.resolve({ done: true, value: undefined });
  }
}

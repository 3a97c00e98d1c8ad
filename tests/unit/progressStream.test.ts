/**
 * Unit tests for ProgressStream
 */

import { describe, it, expect } from "vitest";
import { ProgressStream, ProgressStreamClosedError } from "@/orchestration";
import { delay } from "../helpers/fakes";

describe("ProgressStream", () => {
  it("delivers items in order then ends", async () => {
    const stream = new ProgressStream<number>(4);
    await stream.send(1);
    await stream.send(2);
    stream.end();

    const received: number[] = [];
    for await (const item of stream) {
      received.push(item);
    }
    expect(received).toEqual([1, 2]);
  });

  it("blocks the producer past capacity until the consumer reads", async () => {
    const stream = new ProgressStream<number>(2);
    await stream.send(1);
    await stream.send(2);

    let thirdAccepted = false;
    const third = stream.send(3).then(() => {
      thirdAccepted = true;
    });

    await delay(5);
    expect(thirdAccepted).toBe(false);
    expect(stream.size).toBe(2);

    expect(await stream.next()).toEqual({ done: false, value: 1 });
    await third;
    expect(thirdAccepted).toBe(true);
    expect(stream.size).toBe(2);
  });

  it("never loses items under back-pressure", async () => {
    const stream = new ProgressStream<number>(1);
    const producer = (async () => {
      for (let i = 0; i < 50; i++) {
        await stream.send(i);
      }
      stream.end();
    })();

    const received: number[] = [];
    for await (const item of stream) {
      received.push(item);
      if (item % 7 === 0) await delay(1);
    }
    await producer;
    expect(received).toEqual(Array.from({ length: 50 }, (_, i) => i));
  });

  it("hands items straight to a waiting reader", async () => {
    const stream = new ProgressStream<string>(1);
    const pending = stream.next();
    await stream.send("a");
    expect(await pending).toEqual({ done: false, value: "a" });
  });

  it("throws the failure after buffered items drain", async () => {
    const stream = new ProgressStream<number>(4);
    await stream.send(1);
    stream.fail(new Error("producer crashed"));

    expect(await stream.next()).toEqual({ done: false, value: 1 });
    await expect(stream.next()).rejects.toThrow("producer crashed");
    expect(await stream.next()).toEqual({ done: true, value: undefined });
  });

  it("releases blocked senders and discards values once closed", async () => {
    const stream = new ProgressStream<number>(1);
    await stream.send(1);
    const blocked = stream.send(2);

    stream.close();
    await blocked;
    await stream.send(3);

    expect(stream.isClosed).toBe(true);
    expect(await stream.next()).toEqual({ done: true, value: undefined });
  });

  it("rejects sends after end", async () => {
    const stream = new ProgressStream<number>(1);
    stream.end();
    await expect(stream.send(1)).rejects.toThrow(ProgressStreamClosedError);
  });
});

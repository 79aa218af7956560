/**
 * Worker Pool Tests
 *
 * Covers:
 * - Bounded concurrency and FIFO queueing
 * - close(): refuses new work, drops the queue, lets running tasks finish
 * - drain(): resolves when idle, reports stragglers on timeout
 * - Task failures free their slot
 */

import { describe, it, expect } from "vitest";
import { WorkerPool } from "./worker-pool.js";
import { ValidationError } from "./errors.js";

function deferred() {
  let resolve: () => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<void>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

/** Let every pending promise callback run. */
const settle = () => new Promise<void>(resolve => setImmediate(resolve));

describe("WorkerPool", () => {
  it("rejects a non-positive size", () => {
    expect(() => new WorkerPool(0)).toThrow(ValidationError);
    expect(() => new WorkerPool(1.5)).toThrow("Invalid poolSize: 1.5 (expected integer >= 1)");
  });

  it("runs at most `size` tasks at once and queues the rest in order", async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, i) => {
      pool.submit(async () => {
        started.push(i);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.activeCount).toBe(2);
    expect(pool.queuedCount).toBe(2);

    gates[1].resolve();
    await settle();
    expect(started).toEqual([0, 1, 2]);

    gates[0].resolve();
    await settle();
    expect(started).toEqual([0, 1, 2, 3]);
    expect(pool.queuedCount).toBe(0);

    gates[2].resolve();
    gates[3].resolve();
    await settle();
    expect(pool.activeCount).toBe(0);
  });

  it("frees the slot of a task that rejects", async () => {
    const pool = new WorkerPool(1);
    const failing = deferred();
    let secondRan = false;

    pool.submit(() => failing.promise);
    pool.submit(async () => { secondRan = true; });

    failing.reject(new Error("boom"));
    await settle();

    expect(secondRan).toBe(true);
    expect(pool.activeCount).toBe(0);
  });

  it("close() drops queued work and refuses new submissions", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();
    let queuedRan = false;

    pool.submit(() => gate.promise);
    pool.submit(async () => { queuedRan = true; });

    expect(pool.close()).toBe(1);
    expect(pool.close()).toBe(0);
    expect(pool.submit(async () => {})).toBe(false);
    expect(pool.isClosed).toBe(true);

    gate.resolve();
    await settle();

    expect(queuedRan).toBe(false);
    expect(pool.activeCount).toBe(0);
  });

  it("drain() resolves with 0 once running tasks finish", async () => {
    const pool = new WorkerPool(2);
    const gate = deferred();
    pool.submit(() => gate.promise);
    pool.close();

    const drained = pool.drain(5_000);
    gate.resolve();

    await expect(drained).resolves.toBe(0);
  });

  it("drain() returns immediately when idle", async () => {
    const pool = new WorkerPool(1);
    await expect(pool.drain(5_000)).resolves.toBe(0);
  });

  it("drain() gives up after the timeout and reports what is still running", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();
    pool.submit(() => gate.promise);
    pool.close();

    await expect(pool.drain(20)).resolves.toBe(1);

    gate.resolve();
    await settle();
    expect(pool.activeCount).toBe(0);
  });
});

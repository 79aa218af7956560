/**
 * Recurring Schedule: Worker Pool
 *
 * A fixed number of execution slots shared by every scheduled entry. Work
 * submitted while all slots are busy waits in FIFO order. Once closed, the
 * pool refuses new work and discards whatever was still queued; tasks already
 * running are left to finish.
 */

import { createComponentLogger } from "../logging.js";
import { ValidationError } from "./errors.js";

const log = createComponentLogger("scheduler.pool");

export type PoolTask = () => Promise<void>;

export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly queue: PoolTask[] = [];
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ValidationError("poolSize", size, "integer >= 1");
    }
    this.size = size;
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run `task` as soon as a slot is free. Returns false if the pool is closed.
   */
  submit(task: PoolTask): boolean {
    if (this.closed) return false;

    if (this.active < this.size) {
      this.start(task);
    } else {
      this.queue.push(task);
      log.debug("All workers busy; firing queued", { queued: this.queue.length, size: this.size });
    }
    return true;
  }

  /**
   * Stop accepting work and drop queued tasks. Returns how many were dropped.
   */
  close(): number {
    if (this.closed) return 0;
    this.closed = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    if (this.active === 0) this.releaseIdleWaiters();
    return dropped;
  }

  /**
   * Wait until nothing is running, or `timeoutMs` passes. Resolves with the
   * number of tasks still running (0 when drained).
   */
  async drain(timeoutMs: number): Promise<number> {
    if (this.active === 0 && this.queue.length === 0) return 0;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const idle = new Promise<void>(resolve => this.idleWaiters.push(resolve));
    const timedOut = new Promise<void>(resolve => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([idle, timedOut]);
    clearTimeout(timer);

    if (this.active > 0) {
      log.warn("Drain timed out", { remaining: this.active, timeoutMs });
    }
    return this.active;
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private start(task: PoolTask): void {
    this.active++;
    void this.run(task);
  }

  private async run(task: PoolTask): Promise<void> {
    try {
      await task();
    } catch (error) {
      log.error("Pool task failed", error);
    } finally {
      this.active--;
      const next = this.queue.shift();
      if (next) {
        this.start(next);
      } else if (this.active === 0) {
        this.releaseIdleWaiters();
      }
    }
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

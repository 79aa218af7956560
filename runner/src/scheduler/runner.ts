/**
 * Recurring Task Runner
 *
 * Every scheduled entry is a chain of one-shot timers. When a timer fires the
 * firing is handed to the shared worker pool; once the job has run (or
 * failed) the entry is re-armed for one cadence interval from completion.
 * A single AbortController is the shutdown flag, read before each execution
 * and before each re-arm. Entries stay listed after shutdown as cancelled; an
 * execution still running at that point emits its job_cancelled once it ends,
 * after scheduler_shutdown.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@cadence/shared/logging";
import { createComponentLogger } from "../logging.js";
import { validateCadence, describeCadence } from "./cadence.js";
import { nextDelay, interval } from "./schedule-calc.js";
import { WorkerPool } from "./worker-pool.js";
import { JobExecutionError, SchedulerShutdownError, ValidationError } from "./errors.js";
import {
  DEFAULT_RUNNER_OPTIONS,
  type Cadence,
  type EntryState,
  type Job,
  type RunnerEvent,
  type RunnerEventCallback,
  type RunnerOptions,
  type RunnerStatus,
  type ScheduleOptions,
} from "./types.js";

const log = createComponentLogger("scheduler.runner");

interface ScheduledEntry {
  readonly id: string;
  readonly name: string;
  readonly job: Job;
  readonly cadence: Cadence;
  readonly log: ILogger;
  state: EntryState;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunAt: Date | null;
  firings: number;
  failures: number;
}

export class RecurringTaskRunner {
  private readonly options: RunnerOptions;
  private readonly pool: WorkerPool;
  private readonly shutdownController = new AbortController();
  private readonly entries = new Map<string, ScheduledEntry>();
  private readonly listeners = new Set<RunnerEventCallback>();
  private shutdownPromise: Promise<void> | null = null;

  constructor(overrides: Partial<RunnerOptions> = {}) {
    this.options = { ...DEFAULT_RUNNER_OPTIONS, ...overrides };

    const { utcOffsetMinutes, drainTimeoutMs } = this.options;
    if (!Number.isInteger(utcOffsetMinutes) || Math.abs(utcOffsetMinutes) > 14 * 60) {
      throw new ValidationError("utcOffsetMinutes", utcOffsetMinutes, "integer -840..840");
    }
    if (!Number.isFinite(drainTimeoutMs) || drainTimeoutMs < 0) {
      throw new ValidationError("drainTimeoutMs", drainTimeoutMs, "non-negative number");
    }

    this.pool = new WorkerPool(this.options.poolSize);
  }

  get isShutdown(): boolean {
    return this.shutdownController.signal.aborted;
  }

  /**
   * Register a job. The cadence is validated before anything is armed.
   * Returns the entry id used in logs, events and status.
   */
  schedule(job: Job, cadence: Cadence, options: ScheduleOptions = {}): string {
    if (this.isShutdown) {
      throw new SchedulerShutdownError();
    }
    const checked = validateCadence(cadence);

    const id = `job_${nanoid(12)}`;
    const name = options.name ?? job.name ?? id;
    const entry: ScheduledEntry = {
      id,
      name,
      job,
      cadence: checked,
      log: log.child({ entryId: id }),
      state: "armed",
      timer: null,
      nextRunAt: null,
      firings: 0,
      failures: 0,
    };
    this.entries.set(id, entry);

    const now = this.options.clock.now();
    this.arm(entry, nextDelay(checked, now, this.options.utcOffsetMinutes), now);

    entry.log.info("Job scheduled", {
      name,
      cadence: describeCadence(checked),
      nextRunAt: entry.nextRunAt?.toISOString(),
    });
    this.emit({
      type: "job_scheduled",
      entryId: id,
      jobName: name,
      timestamp: now,
      details: {
        cadence: describeCadence(checked),
        nextRunAt: entry.nextRunAt?.toISOString(),
      },
    });

    return id;
  }

  /**
   * Stop all scheduling. No firing starts after this is called: armed timers
   * are cleared, queued firings are dropped and the pool refuses new work.
   * Executions already under way are not waited for; see awaitTermination().
   * Repeated calls share the first call's promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = Promise.resolve();
      this.stopScheduling();
    }
    return this.shutdownPromise;
  }

  /**
   * Wait for executions still running after shutdown(). Resolves true once
   * none remain, false if `timeoutMs` passes first or shutdown() was never
   * called.
   */
  async awaitTermination(timeoutMs = this.options.drainTimeoutMs): Promise<boolean> {
    if (!this.isShutdown) return false;

    const remaining = await this.pool.drain(timeoutMs);
    if (remaining > 0) return false;

    log.info("Scheduler terminated");
    return true;
  }

  /**
   * Subscribe to lifecycle events. Returns an unsubscribe function.
   */
  onEvent(listener: RunnerEventCallback): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStatus(): RunnerStatus {
    return {
      running: !this.isShutdown,
      poolSize: this.pool.size,
      activeFirings: this.pool.activeCount,
      queuedFirings: this.pool.queuedCount,
      entries: [...this.entries.values()].map(entry => ({
        id: entry.id,
        name: entry.name,
        cadence: describeCadence(entry.cadence),
        state: entry.state,
        nextRunAt: entry.nextRunAt?.toISOString() ?? null,
        firings: entry.firings,
        failures: entry.failures,
      })),
    };
  }

  // ============================================
  // ARMING & FIRING
  // ============================================

  private arm(entry: ScheduledEntry, delayMs: number, now: Date): void {
    entry.state = "armed";
    entry.nextRunAt = new Date(now.getTime() + delayMs);
    entry.timer = setTimeout(() => this.dispatch(entry), delayMs);
  }

  /** Timer callback: hand the firing to the pool. */
  private dispatch(entry: ScheduledEntry): void {
    entry.timer = null;
    if (this.isShutdown) return;

    const accepted = this.pool.submit(() => this.fire(entry));
    if (!accepted) {
      entry.state = "cancelled";
      entry.nextRunAt = null;
    }
  }

  private async fire(entry: ScheduledEntry): Promise<void> {
    if (this.isShutdown) return;

    entry.state = "firing";
    entry.nextRunAt = null;
    entry.firings++;
    this.emit({ type: "job_executing", entryId: entry.id, jobName: entry.name, timestamp: this.options.clock.now() });

    try {
      await entry.job.execute();
      entry.log.debug("Job completed", { name: entry.name, firings: entry.firings });
      this.emit({ type: "job_completed", entryId: entry.id, jobName: entry.name, timestamp: this.options.clock.now() });
    } catch (cause) {
      entry.failures++;
      const error = new JobExecutionError(entry.name, cause);
      entry.log.error("Job execution failed", error, { name: entry.name, failures: entry.failures });
      this.emit({
        type: "job_failed",
        entryId: entry.id,
        jobName: entry.name,
        timestamp: this.options.clock.now(),
        details: { error: error.message, failures: entry.failures },
      });
    }

    if (this.isShutdown) {
      this.cancel(entry);
      return;
    }

    this.arm(entry, interval(entry.cadence), this.options.clock.now());
    entry.log.debug("Job re-armed", { name: entry.name, nextRunAt: entry.nextRunAt?.toISOString() });
  }

  // ============================================
  // SHUTDOWN
  // ============================================

  private stopScheduling(): void {
    this.shutdownController.abort();

    let cancelled = 0;
    for (const entry of this.entries.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
      if (entry.state === "armed") {
        this.cancel(entry);
        cancelled++;
      }
    }

    const dropped = this.pool.close();
    const inFlight = this.pool.activeCount;
    log.info("Scheduler shut down", { cancelled, droppedFirings: dropped, inFlight });
    this.emit({
      type: "scheduler_shutdown",
      timestamp: this.options.clock.now(),
      details: { cancelled, droppedFirings: dropped, inFlight },
    });
  }

  private cancel(entry: ScheduledEntry): void {
    entry.state = "cancelled";
    entry.nextRunAt = null;
    this.emit({ type: "job_cancelled", entryId: entry.id, jobName: entry.name, timestamp: this.options.clock.now() });
  }

  // ============================================
  // EVENT EMISSION
  // ============================================

  private emit(event: RunnerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error("Runner event listener error", error, { type: event.type });
      }
    }
  }
}

/**
 * Recurring Scheduler Types
 *
 * Cadences, jobs, runner options, lifecycle events and status snapshots for
 * the in-process recurring task runner.
 */

// ============================================
// CADENCE DEFINITION
// ============================================

export const DAYS_OF_WEEK = [
  "MONDAY",
  "TUESDAY",
  "WEDNESDAY",
  "THURSDAY",
  "FRIDAY",
  "SATURDAY",
  "SUNDAY",
] as const;

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export interface HourlyCadence {
  readonly kind: "hourly";
  /** 0..59 */
  readonly minuteOfHour: number;
}

export interface DailyCadence {
  readonly kind: "daily";
  /** 0..23 */
  readonly hour: number;
  /** 0..59 */
  readonly minute: number;
}

export interface WeeklyCadence {
  readonly kind: "weekly";
  readonly dayOfWeek: DayOfWeek;
  /** 0..23 */
  readonly hour: number;
  /** 0..59 */
  readonly minute: number;
}

export type Cadence = HourlyCadence | DailyCadence | WeeklyCadence;

export type CadenceKind = Cadence["kind"];

export const CADENCE_KINDS: readonly CadenceKind[] = ["hourly", "daily", "weekly"];

// ============================================
// JOB
// ============================================

/**
 * Arbitrary user work. A returned promise is awaited and counts as part of
 * the execution; throwing (or rejecting) marks this firing as failed.
 */
export interface Job {
  execute(): void | Promise<void>;
  /** Shown in logs, events and status (default: the entry id) */
  readonly name?: string;
}

export interface ScheduleOptions {
  /** Overrides `job.name` */
  name?: string;
}

// ============================================
// CLOCK
// ============================================

export interface Clock {
  now(): Date;
}

// ============================================
// RUNNER CONFIG
// ============================================

export interface RunnerOptions {
  /** Maximum concurrent firings across all jobs */
  poolSize: number;
  /** Civil calendar offset from UTC, in minutes (e.g. 120 for UTC+2) */
  utcOffsetMinutes: number;
  /** How long shutdown() waits for in-flight executions */
  drainTimeoutMs: number;
  clock: Clock;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const DEFAULT_RUNNER_OPTIONS: RunnerOptions = {
  poolSize: 3,
  utcOffsetMinutes: 0,
  drainTimeoutMs: 30_000,
  clock: systemClock,
};

// ============================================
// ENTRY STATE
// ============================================

/** armed → firing → (armed | cancelled); armed → cancelled on shutdown */
export type EntryState = "armed" | "firing" | "cancelled";

export interface EntryStatus {
  id: string;
  name: string;
  cadence: string;
  state: EntryState;
  /** ISO timestamp of the armed due time; null while firing or once cancelled */
  nextRunAt: string | null;
  firings: number;
  failures: number;
}

export interface RunnerStatus {
  running: boolean;
  poolSize: number;
  activeFirings: number;
  queuedFirings: number;
  entries: EntryStatus[];
}

// ============================================
// EVENTS
// ============================================

export type RunnerEventType =
  | "job_scheduled"
  | "job_executing"
  | "job_completed"
  | "job_failed"
  | "job_cancelled"
  | "scheduler_shutdown";

export interface RunnerEvent {
  type: RunnerEventType;
  /** Absent for scheduler_shutdown */
  entryId?: string;
  jobName?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export type RunnerEventCallback = (event: RunnerEvent) => void;

/**
 * Recurring Scheduler: Barrel Exports
 */

export { RecurringTaskRunner } from "./runner.js";
export { hourly, daily, weekly, validateCadence, describeCadence } from "./cadence.js";
export { nextRunAt, nextDelay, interval } from "./schedule-calc.js";
export { WorkerPool, type PoolTask } from "./worker-pool.js";
export {
  SchedulerError,
  ValidationError,
  JobExecutionError,
  SchedulerShutdownError,
  ConfigError,
} from "./errors.js";
export {
  CADENCE_KINDS,
  DAYS_OF_WEEK,
  DEFAULT_RUNNER_OPTIONS,
  systemClock,
  type Cadence,
  type CadenceKind,
  type HourlyCadence,
  type DailyCadence,
  type WeeklyCadence,
  type DayOfWeek,
  type Job,
  type ScheduleOptions,
  type Clock,
  type RunnerOptions,
  type EntryState,
  type EntryStatus,
  type RunnerStatus,
  type RunnerEvent,
  type RunnerEventType,
  type RunnerEventCallback,
} from "./types.js";

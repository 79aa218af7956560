/**
 * Scheduler Errors
 */

export class SchedulerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchedulerError";
  }
}

/** A cadence field or runner option outside its legal range. */
export class ValidationError extends SchedulerError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, expected: string) {
    super(`Invalid ${field}: ${String(value)} (expected ${expected})`);
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

/** Wraps whatever a job threw. Reported and swallowed by the runner. */
export class JobExecutionError extends SchedulerError {
  public readonly jobName: string;

  constructor(jobName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Job "${jobName}" failed: ${detail}`, { cause });
    this.name = "JobExecutionError";
    this.jobName = jobName;
  }
}

export class SchedulerShutdownError extends SchedulerError {
  constructor() {
    super("Scheduler has been shut down; no new jobs can be scheduled");
    this.name = "SchedulerShutdownError";
  }
}

/** An environment variable that does not parse. */
export class ConfigError extends SchedulerError {
  public readonly key: string;

  constructor(key: string, value: string, expected: string) {
    super(`Invalid ${key}="${value}" (expected ${expected})`);
    this.name = "ConfigError";
    this.key = key;
  }
}

/**
 * Demo Application
 *
 * Wires config, logging and the runner, registers the Hello World jobs, and
 * owns the lifetime: the caller (or RUN_FOR_MS) decides when to stop.
 */

import type { RunnerConfig } from "./config.js";
import { createComponentLogger, getRunnerLogger } from "./logging.js";
import { RecurringTaskRunner } from "./scheduler/runner.js";
import { hourly, daily, weekly } from "./scheduler/cadence.js";
import { HelloWorldJob } from "./jobs/hello-world.js";
import { systemClock, type Cadence, type Clock } from "./scheduler/types.js";

const log = createComponentLogger("app");

export const DEMO_SCHEDULES: ReadonlyArray<{ name: string; cadence: Cadence }> = [
  { name: "Hourly@15", cadence: hourly(15) },
  { name: "Daily@14:30", cadence: daily(14, 30) },
  { name: "Weekly@Sun10", cadence: weekly("SUNDAY", 10, 0) },
];

export interface AppHandle {
  runner: RecurringTaskRunner;
  /**
   * Shut the runner down, wait up to drainTimeoutMs for running jobs, then
   * close the logger. Later calls return the same promise.
   */
  stop(reason: string): Promise<void>;
  /** Settles once stop() has finished */
  stopped: Promise<void>;
}

export interface AppOptions {
  write?: (line: string) => void;
  clock?: Clock;
}

export function startApp(config: RunnerConfig, options: AppOptions = {}): AppHandle {
  const clock = options.clock ?? systemClock;
  const runner = new RecurringTaskRunner({
    poolSize: config.poolSize,
    utcOffsetMinutes: config.utcOffsetMinutes,
    drainTimeoutMs: config.drainTimeoutMs,
    clock,
  });

  for (const { name, cadence } of DEMO_SCHEDULES) {
    const job = new HelloWorldJob(name, {
      write: options.write,
      clock,
      utcOffsetMinutes: config.utcOffsetMinutes,
    });
    runner.schedule(job, cadence);
  }

  let lifetimeTimer: ReturnType<typeof setTimeout> | null = null;
  let stopping: Promise<void> | null = null;
  let markStopped: () => void = () => {};
  const stopped = new Promise<void>(resolve => { markStopped = resolve; });

  const stop = (reason: string): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        if (lifetimeTimer) clearTimeout(lifetimeTimer);
        log.info("Stopping scheduler", { reason });
        await runner.shutdown();
        const terminated = await runner.awaitTermination();
        if (!terminated) {
          log.warn("Stopped with executions still running", { drainTimeoutMs: config.drainTimeoutMs });
        }
        await getRunnerLogger().close();
        markStopped();
      })();
    }
    return stopping;
  };

  if (config.runForMs > 0) {
    lifetimeTimer = setTimeout(() => {
      stop("run duration elapsed").catch((error: unknown) => {
        log.error("Shutdown failed", error);
      });
    }, config.runForMs);
  }

  log.info("Scheduler started", {
    jobs: DEMO_SCHEDULES.length,
    poolSize: config.poolSize,
    utcOffsetMinutes: config.utcOffsetMinutes,
    runForMs: config.runForMs,
  });

  return { runner, stop, stopped };
}

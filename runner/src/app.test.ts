import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { startApp, DEMO_SCHEDULES, type AppHandle } from "./app.js";
import type { RunnerConfig } from "./config.js";
import { getRunnerLogger } from "./logging.js";

const MINUTE_MS = 60_000;

const baseConfig: RunnerConfig = {
  poolSize: 3,
  utcOffsetMinutes: 0,
  drainTimeoutMs: 1_000,
  runForMs: 0,
  logLevel: "silent",
  logDir: undefined,
};

let app: AppHandle | null = null;

beforeEach(() => {
  vi.useFakeTimers();
  // Sunday, after the weekly 10:00 slot and before the hourly :15 slot
  vi.setSystemTime(new Date("2024-01-07T10:05:00Z"));
});

afterEach(async () => {
  await app?.stop("test finished");
  app = null;
  vi.useRealTimers();
});

describe("startApp", () => {
  it("registers the three demo jobs", () => {
    app = startApp(baseConfig, { write: vi.fn() });

    const entries = app.runner.getStatus().entries;
    expect(entries.map(e => [e.name, e.cadence, e.nextRunAt])).toEqual([
      ["Hourly@15", "hourly@:15", "2024-01-07T10:15:00.000Z"],
      ["Daily@14:30", "daily@14:30", "2024-01-07T14:30:00.000Z"],
      ["Weekly@Sun10", "weekly@SUNDAY 10:00", "2024-01-14T10:00:00.000Z"],
    ]);
    expect(DEMO_SCHEDULES).toHaveLength(3);
  });

  it("prints greetings as jobs fire and stops after RUN_FOR_MS", async () => {
    const lines: string[] = [];
    app = startApp({ ...baseConfig, runForMs: 15 * MINUTE_MS }, { write: (line) => lines.push(line) });

    await vi.advanceTimersByTimeAsync(15 * MINUTE_MS);
    await app.stopped;

    expect(lines).toEqual(["[Hourly@15] Hello World - 2024-01-07T10:15:00"]);
    expect(app.runner.isShutdown).toBe(true);

    await vi.advanceTimersByTimeAsync(7 * 24 * 60 * MINUTE_MS);
    expect(lines).toHaveLength(1);
  });

  it("stop() can be called repeatedly", async () => {
    app = startApp(baseConfig, { write: vi.fn() });

    const first = app.stop("first");
    expect(app.stop("second")).toBe(first);
    await first;
    await app.stopped;

    expect(app.runner.getStatus().running).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("waits for a running greeting before closing the logger", async () => {
    const close = vi.spyOn(getRunnerLogger(), "close");
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => { release = resolve; });
    app = startApp(baseConfig, { write: vi.fn() });
    app.runner.schedule({ name: "Held", execute: () => gate }, { kind: "hourly", minuteOfHour: 6 });

    await vi.advanceTimersByTimeAsync(MINUTE_MS);
    expect(app.runner.getStatus().activeFirings).toBe(1);

    const stopping = app.stop("test");
    await vi.advanceTimersByTimeAsync(0);
    expect(close).not.toHaveBeenCalled();

    release();
    await stopping;

    expect(close).toHaveBeenCalledTimes(1);
    expect(app.runner.getStatus().activeFirings).toBe(0);
    close.mockRestore();
  });

  it("closes the logger after the drain timeout when a job never finishes", async () => {
    const close = vi.spyOn(getRunnerLogger(), "close");
    app = startApp(baseConfig, { write: vi.fn() });
    app.runner.schedule({ execute: () => new Promise<void>(() => {}) }, { kind: "hourly", minuteOfHour: 6 });
    await vi.advanceTimersByTimeAsync(MINUTE_MS);

    const stopping = app.stop("test");
    await vi.advanceTimersByTimeAsync(baseConfig.drainTimeoutMs);
    await stopping;

    expect(close).toHaveBeenCalledTimes(1);
    expect(app.runner.getStatus().activeFirings).toBe(1);
    close.mockRestore();
  });
});

import { describe, it, expect, vi, afterEach } from "vitest";
import { initRunnerLogging, getRunnerLogger, createComponentLogger } from "./logging.js";

afterEach(() => {
  vi.restoreAllMocks();
  initRunnerLogging({ minLevel: "silent" });
});

describe("runner logging", () => {
  it("tags component loggers under runner.*", () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = initRunnerLogging({ minLevel: "info", colors: false });

    createComponentLogger("scheduler.pool").info("Pool ready", { size: 3 });

    expect(getRunnerLogger()).toBe(logger);
    expect(logger.getRecentLogs(1)[0]).toMatchObject({
      level: "info",
      component: "runner.scheduler.pool",
      message: "Pool ready",
      data: { size: 3 },
    });
  });

  it("follows a logger re-initialized after the component logger was created", () => {
    const log = createComponentLogger("app");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const replacement = initRunnerLogging({ minLevel: "warn", colors: false });

    log.info("below threshold");
    log.warn("kept");

    expect(replacement.getRecentLogs().map(e => e.message)).toEqual(["kept"]);
  });

  it("binds an entry id through child()", () => {
    const logger = initRunnerLogging({ minLevel: "trace", colors: false });
    vi.spyOn(console, "debug").mockImplementation(() => {});

    createComponentLogger("scheduler.runner").child({ entryId: "job_test" }).debug("Job re-armed");

    expect(logger.getRecentLogs(1)[0]).toMatchObject({
      component: "runner.scheduler.runner",
      entryId: "job_test",
    });
  });
});

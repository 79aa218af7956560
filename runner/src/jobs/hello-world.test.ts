import { describe, it, expect, vi } from "vitest";
import { HelloWorldJob, formatCivil } from "./hello-world.js";

describe("HelloWorldJob", () => {
  it("writes one greeting line with the civil time", () => {
    const write = vi.fn();
    const clock = { now: () => new Date("2024-01-01T12:30:00.250Z") };
    const job = new HelloWorldJob("Daily@14:30", { write, clock, utcOffsetMinutes: 120 });

    job.execute();

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith("[Daily@14:30] Hello World - 2024-01-01T14:30:00");
  });

  it("exposes its name to the runner", () => {
    expect(new HelloWorldJob("Hourly@15").name).toBe("Hourly@15");
  });
});

describe("formatCivil", () => {
  it("shifts across a date boundary", () => {
    expect(formatCivil(new Date("2024-01-02T03:30:00Z"), -300)).toBe("2024-01-01T22:30:00");
  });
});

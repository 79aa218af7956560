import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConsoleTransport } from "./console.js";
import { FileTransport } from "./file.js";
import type { LogEntry } from "../types.js";

const entry: LogEntry = {
  timestamp: "2024-01-01T14:30:00.000Z",
  level: "warn",
  component: "runner.scheduler",
  message: "Job failed",
  data: { failures: 2 },
};

describe("ConsoleTransport", () => {
  it("formats a plain single line without colors", () => {
    const transport = new ConsoleTransport({ colors: false });

    expect(transport.format(entry)).toBe(
      '14:30:00 WRN [runner.scheduler] Job failed {"failures":2}'
    );
  });

  it("includes the entry id and error details", () => {
    const transport = new ConsoleTransport({ colors: false });

    const line = transport.format({
      ...entry,
      level: "error",
      data: undefined,
      entryId: "job_1",
      error: { name: "JobExecutionError", message: "boom", cause: "disk full" },
    });

    expect(line).toBe(
      "14:30:00 ERR [runner.scheduler] (job_1) Job failed\n" +
      "JobExecutionError: boom\n" +
      "  caused by: disk full"
    );
  });

  it("hands formatted lines to the configured writer", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ colors: false, write: (line) => lines.push(line) });

    transport.log({ ...entry, data: undefined });

    expect(lines).toEqual(["14:30:00 WRN [runner.scheduler] Job failed"]);
  });
});

describe("FileTransport", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("appends JSON lines", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "runner-logs-"));
    const transport = new FileTransport({ logDir: dir, filename: "test" });

    transport.log(entry);
    transport.log({ ...entry, message: "second" });
    await transport.close();

    const lines = fs.readFileSync(path.join(dir, "test.log"), "utf-8").trim().split("\n");
    expect(lines.map(l => JSON.parse(l).message)).toEqual(["Job failed", "second"]);
  });

  it("rotates once the file exceeds maxSize", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "runner-logs-"));
    const transport = new FileTransport({ logDir: dir, filename: "test", maxSize: 50 });

    transport.log(entry);
    transport.log({ ...entry, message: "after rotation" });
    await transport.close();

    const rotated = fs.readFileSync(path.join(dir, "test.log.1"), "utf-8");
    const current = fs.readFileSync(path.join(dir, "test.log"), "utf-8");
    expect(JSON.parse(rotated.trim()).message).toBe("Job failed");
    expect(JSON.parse(current.trim()).message).toBe("after rotation");
  });
});

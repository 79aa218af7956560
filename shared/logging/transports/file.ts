/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>.log`, rotating to `.1`, `.2`, …
 * once the file passes `maxSize`. Writes are serialized on a single promise
 * chain so rotation never races an in-flight append. Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename without extension (default: "runner") */
  filename?: string;
  /** Bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  readonly filePath: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private size: number;
  private chain: Promise<void> = Promise.resolve();

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.filePath = path.join(options.logDir, `${options.filename ?? "runner"}.log`);

    fs.mkdirSync(options.logDir, { recursive: true });
    this.size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    this.chain = this.chain
      .then(() => this.append(line))
      .catch((err: unknown) => {
        console.error("[FileTransport] Write error:", err);
      });
  }

  flush(): Promise<void> {
    return this.chain;
  }

  close(): Promise<void> {
    return this.flush();
  }

  private async append(line: string): Promise<void> {
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxSize) {
      await this.rotate();
    }
    await fs.promises.appendFile(this.filePath, line);
    this.size += bytes;
  }

  private async rotate(): Promise<void> {
    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) await fs.promises.unlink(oldest);

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.filePath}.${i}`;
      if (fs.existsSync(from)) await fs.promises.rename(from, `${this.filePath}.${i + 1}`);
    }
    if (fs.existsSync(this.filePath)) await fs.promises.rename(this.filePath, `${this.filePath}.1`);

    this.size = 0;
  }
}

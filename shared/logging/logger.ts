/**
 * Core Logger
 *
 * Fans structured entries out to transports and keeps a bounded history.
 * Child loggers share the parent's transports and history.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ILogger
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private items: T[] = [];
  private next = 0;

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return;
    }
    this.items[this.next] = item;
    this.next = (this.next + 1) % this.capacity;
  }

  /** Oldest first */
  toArray(): T[] {
    return [...this.items.slice(this.next), ...this.items.slice(0, this.next)];
  }

  last(n: number): T[] {
    return n <= 0 ? [] : this.toArray().slice(-n);
  }
}

// ============================================
// LOGGER
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly history: RingBuffer<LogEntry>;

  constructor(config: LoggerConfig, history?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.history = history ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 500);
  }

  get minLevel(): LogLevel {
    return this.config.minLevel;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  child(context: { component?: string; entryId?: string }): ILogger {
    return new Logger(
      {
        ...this.config,
        component: context.component ?? this.config.component,
        entryId: context.entryId ?? this.config.entryId,
      },
      this.history
    );
  }

  getRecentLogs(count = 100): LogEntry[] {
    return this.history.last(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (level === "silent" || LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    if (this.config.entryId) entry.entryId = this.config.entryId;
    if (data) entry.data = this.redact(data);
    if (error !== undefined) entry.error = serializeError(error);

    this.history.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Last resort: a broken transport must not take the caller down
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
  if (!(error instanceof Error)) {
    return { name: "Unknown", message: String(error) };
  }
  const serialized: NonNullable<LogEntry["error"]> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause !== undefined) {
    serialized.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
  }
  return serialized;
}

// ============================================
// GLOBAL LOGGER
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

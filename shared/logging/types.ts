/**
 * Logging Types
 *
 * Structured log entries, transports and the logger contract shared by every
 * workspace package.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Dotted component path, e.g. "runner.scheduler.pool" */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    cause?: string;
  };
  /** Set by child loggers bound to a scheduled entry */
  entryId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered output (called on shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced by "[REDACTED]" */
  redactPatterns?: RegExp[];
  /** Keep last N entries in memory (default: 500) */
  ringBufferSize?: number;
  entryId?: string;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a logger that shares transports and buffer, with a narrower context */
  child(context: { component?: string; entryId?: string }): ILogger;

  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api_?key/i,
  /authorization/i,
];

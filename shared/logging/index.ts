/**
 * Structured Logging
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@cadence/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "info",
 *   component: "runner",
 *   transports: [new ConsoleTransport()],
 * });
 *
 * const poolLog = logger.child({ component: "runner.scheduler.pool" });
 * poolLog.warn("Pool saturated", { queued: 4 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export { Logger, RingBuffer, initLogger, getLogger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";

/**
 * Logging Setup for the Runner
 *
 * Initializes the shared logger with console and optional file transports.
 */

import {
  initLogger,
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@cadence/shared/logging";

export interface LoggingOptions {
  /** Default: LOG_LEVEL, else "debug" in dev and "info" in production */
  minLevel?: LogLevel;
  /** Enables the file transport when set */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

let logger: Logger | null = null;

/**
 * Initialize the logging system for the runner. Replaces any earlier logger.
 */
export function initRunnerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const envLevel = process.env.LOG_LEVEL;
  const minLevel = options.minLevel
    ?? (envLevel && isLogLevel(envLevel) ? envLevel : isDev ? "debug" : "info");

  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel, colors: options.colors, prettyPrint: isDev }),
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "runner",
    }));
  }

  logger = initLogger({
    minLevel,
    component: "runner",
    transports,
    ringBufferSize: 1000,
  });

  return logger;
}

/**
 * Get the runner logger, initializing it with defaults on first use.
 */
export function getRunnerLogger(): Logger {
  return logger ?? initRunnerLogging();
}

/**
 * Namespaced logger for one component. Resolved on every call so modules that
 * create theirs at import time still follow a later initRunnerLogging().
 */
export function createComponentLogger(component: string): ILogger {
  const qualified = `runner.${component}`;
  const current = (): ILogger => getRunnerLogger().child({ component: qualified });
  return {
    trace: (message, data) => current().trace(message, data),
    debug: (message, data) => current().debug(message, data),
    info: (message, data) => current().info(message, data),
    warn: (message, data) => current().warn(message, data),
    error: (message, error, data) => current().error(message, error, data),
    fatal: (message, error, data) => current().fatal(message, error, data),
    child: (context) => current().child(context),
    getRecentLogs: (count) => current().getRecentLogs(count),
    flush: () => current().flush(),
  };
}

/**
 * Console Transport
 *
 * One line per entry: time, level label, component, message, then data and
 * error details. ANSI colors only when writing to a TTY.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRC", color: ANSI.gray },
  debug: { label: "DBG", color: ANSI.cyan },
  info: { label: "INF", color: ANSI.blue },
  warn: { label: "WRN", color: ANSI.yellow },
  error: { label: "ERR", color: ANSI.red },
  fatal: { label: "FTL", color: ANSI.bgRed },
  silent: { label: "   ", color: ANSI.reset },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
  /** Multi-line JSON for data payloads (default: false) */
  prettyPrint?: boolean;
  /** Where lines go (default: console methods by level) */
  write?: (line: string, level: LogLevel) => void;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly prettyPrint: boolean;
  private readonly write: (line: string, level: LogLevel) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? false;
    this.write = options.write ?? writeToConsole;
  }

  log(entry: LogEntry): void {
    this.write(this.format(entry), entry.level);
  }

  format(entry: LogEntry): string {
    const style = LEVEL_STYLE[entry.level];
    const time = entry.timestamp.slice(11, 19); // HH:MM:SS

    const head = [
      this.paint(time, ANSI.dim),
      this.paint(style.label, style.color),
      this.paint(`[${entry.component}]`, ANSI.magenta),
    ];
    if (entry.entryId) head.push(this.paint(`(${entry.entryId})`, ANSI.dim));
    head.push(entry.message);

    let output = head.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint
        ? "\n" + JSON.stringify(entry.data, null, 2)
        : " " + JSON.stringify(entry.data);
      output += this.paint(json, ANSI.dim);
    }

    if (entry.error) {
      output += "\n" + this.paint(`${entry.error.name}: ${entry.error.message}`, ANSI.red);
      if (entry.error.cause) {
        output += "\n" + this.paint(`  caused by: ${entry.error.cause}`, ANSI.red);
      }
      if (entry.error.stack && this.prettyPrint) {
        output += "\n" + this.paint(entry.error.stack, ANSI.dim);
      }
    }

    return output;
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${ANSI.reset}` : text;
  }
}

function writeToConsole(line: string, level: LogLevel): void {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
    case "fatal":
      console.error(line);
      break;
    case "silent":
      break;
  }
}

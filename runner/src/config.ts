/**
 * Runner Configuration
 *
 * Environment variables for the scheduler and the demo binary. Importable by
 * any module that needs config without starting anything.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@cadence/shared/logging";
import { ConfigError } from "./scheduler/errors.js";

// Load .env from the repository root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

export interface RunnerConfig {
  poolSize: number;
  utcOffsetMinutes: number;
  drainTimeoutMs: number;
  /** 0 = run until SIGINT/SIGTERM */
  runForMs: number;
  logLevel: LogLevel;
  /** File logging is off when unset */
  logDir: string | undefined;
}

type Env = Record<string, string | undefined>;

/**
 * Read runner settings from the environment. Throws ConfigError on a value
 * that does not parse.
 */
export function loadRunnerConfig(env: Env = process.env): RunnerConfig {
  const isProduction = env.NODE_ENV === "production";

  return {
    poolSize: readInt(env, "SCHEDULER_POOL_SIZE", 3, { min: 1 }),
    // Date#getTimezoneOffset() is minutes *behind* UTC, hence the sign flip
    utcOffsetMinutes: readInt(env, "SCHEDULER_UTC_OFFSET_MINUTES", -new Date().getTimezoneOffset(), {
      min: -14 * 60,
      max: 14 * 60,
    }),
    drainTimeoutMs: readInt(env, "SCHEDULER_DRAIN_TIMEOUT_MS", 30_000, { min: 0 }),
    runForMs: readInt(env, "RUN_FOR_MS", 0, { min: 0 }),
    logLevel: readLogLevel(env, isProduction ? "info" : "debug"),
    logDir: env.LOG_DIR || undefined,
  };
}

// ============================================
// HELPERS
// ============================================

function readInt(
  env: Env,
  key: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {}
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  const { min, max } = bounds;
  if (
    !Number.isInteger(value) ||
    (min !== undefined && value < min) ||
    (max !== undefined && value > max)
  ) {
    const expected = max === undefined ? `integer >= ${min ?? 0}` : `integer ${min ?? 0}..${max}`;
    throw new ConfigError(key, raw, expected);
  }
  return value;
}

function readLogLevel(env: Env, fallback: LogLevel): LogLevel {
  const raw = env.LOG_LEVEL;
  if (raw === undefined || raw === "") return fallback;
  if (!isLogLevel(raw)) {
    throw new ConfigError("LOG_LEVEL", raw, "trace|debug|info|warn|error|fatal|silent");
  }
  return raw;
}

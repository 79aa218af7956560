/**
 * Cadence construction and validation.
 *
 * The constructors are the only sanctioned way to build a cadence; they fail
 * fast on out-of-range fields so a bad schedule never reaches a timer.
 */

import { CADENCE_KINDS, DAYS_OF_WEEK, type Cadence, type DayOfWeek, type DailyCadence, type HourlyCadence, type WeeklyCadence } from "./types.js";
import { ValidationError } from "./errors.js";

export function hourly(minuteOfHour: number): HourlyCadence {
  checkRange("minuteOfHour", minuteOfHour, 0, 59);
  return { kind: "hourly", minuteOfHour };
}

export function daily(hour: number, minute: number): DailyCadence {
  checkRange("hour", hour, 0, 23);
  checkRange("minute", minute, 0, 59);
  return { kind: "daily", hour, minute };
}

export function weekly(dayOfWeek: DayOfWeek, hour: number, minute: number): WeeklyCadence {
  checkDay(dayOfWeek);
  checkRange("hour", hour, 0, 23);
  checkRange("minute", minute, 0, 59);
  return { kind: "weekly", dayOfWeek, hour, minute };
}

/**
 * Re-run the constructor checks on an already-built cadence, for values that
 * arrive as plain object literals.
 */
export function validateCadence(cadence: Cadence): Cadence {
  const kind: string = cadence.kind;
  switch (cadence.kind) {
    case "hourly":
      return hourly(cadence.minuteOfHour);
    case "daily":
      return daily(cadence.hour, cadence.minute);
    case "weekly":
      return weekly(cadence.dayOfWeek, cadence.hour, cadence.minute);
    default:
      throw new ValidationError("kind", kind, CADENCE_KINDS.join("|"));
  }
}

/** e.g. "hourly@:05", "daily@14:30", "weekly@SUNDAY 10:00" */
export function describeCadence(cadence: Cadence): string {
  switch (cadence.kind) {
    case "hourly":
      return `hourly@:${pad2(cadence.minuteOfHour)}`;
    case "daily":
      return `daily@${pad2(cadence.hour)}:${pad2(cadence.minute)}`;
    case "weekly":
      return `weekly@${cadence.dayOfWeek} ${pad2(cadence.hour)}:${pad2(cadence.minute)}`;
    default:
      return assertNever(cadence);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled cadence: ${JSON.stringify(value)}`);
}

// ============================================
// HELPERS
// ============================================

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(field, value, `integer ${min}..${max}`);
  }
}

function checkDay(value: string): void {
  if (!DAYS_OF_WEEK.some(day => day === value)) {
    throw new ValidationError("dayOfWeek", value, DAYS_OF_WEEK.join("|"));
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

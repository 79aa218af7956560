/**
 * Recurring Schedule: Cadence Calculator
 *
 * Computes the next fire time and the fixed repeat interval for each cadence
 * kind. Civil time is a fixed-offset calendar: the wall clock is `now`
 * shifted by `utcOffsetMinutes`, read through the UTC accessors, with no
 * daylight-saving adjustment.
 */

import type { Cadence, DayOfWeek } from "./types.js";
import { assertNever } from "./cadence.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

/** Date#getUTCDay() numbering, 0=Sun..6=Sat */
const DAY_INDEX: Record<DayOfWeek, number> = {
  SUNDAY: 0,
  MONDAY: 1,
  TUESDAY: 2,
  WEDNESDAY: 3,
  THURSDAY: 4,
  FRIDAY: 5,
  SATURDAY: 6,
};

// ============================================
// MAIN ENTRY
// ============================================

/**
 * The first instant strictly after `now` at which the cadence fires.
 * An exact match with `now` counts as already passed.
 */
export function nextRunAt(cadence: Cadence, now: Date, utcOffsetMinutes = 0): Date {
  const offsetMs = utcOffsetMinutes * MINUTE_MS;
  const wall = new Date(now.getTime() + offsetMs);

  const year = wall.getUTCFullYear();
  const month = wall.getUTCMonth();
  const day = wall.getUTCDate();

  let candidate: number;
  switch (cadence.kind) {
    case "hourly":
      candidate = Date.UTC(year, month, day, wall.getUTCHours(), cadence.minuteOfHour);
      break;
    case "daily":
      candidate = Date.UTC(year, month, day, cadence.hour, cadence.minute);
      break;
    case "weekly": {
      const daysUntil = (DAY_INDEX[cadence.dayOfWeek] - wall.getUTCDay() + 7) % 7;
      candidate = Date.UTC(year, month, day + daysUntil, cadence.hour, cadence.minute);
      break;
    }
    default:
      return assertNever(cadence);
  }

  if (candidate <= wall.getTime()) {
    candidate += interval(cadence);
  }

  return new Date(candidate - offsetMs);
}

/** Milliseconds from `now` until the next firing; always > 0. */
export function nextDelay(cadence: Cadence, now: Date, utcOffsetMinutes = 0): number {
  return nextRunAt(cadence, now, utcOffsetMinutes).getTime() - now.getTime();
}

/** Fixed repeat interval in milliseconds. */
export function interval(cadence: Cadence): number {
  switch (cadence.kind) {
    case "hourly":
      return HOUR_MS;
    case "daily":
      return DAY_MS;
    case "weekly":
      return WEEK_MS;
    default:
      return assertNever(cadence);
  }
}

/**
 * Demo job: prints "[<name>] Hello World - <local time>" each time it fires.
 */

import type { Clock, Job } from "../scheduler/types.js";
import { systemClock } from "../scheduler/types.js";

export class HelloWorldJob implements Job {
  readonly name: string;
  private readonly write: (line: string) => void;
  private readonly clock: Clock;
  private readonly utcOffsetMinutes: number;

  constructor(
    name: string,
    options: { write?: (line: string) => void; clock?: Clock; utcOffsetMinutes?: number } = {}
  ) {
    this.name = name;
    this.write = options.write ?? ((line) => console.log(line));
    this.clock = options.clock ?? systemClock;
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
  }

  execute(): void {
    this.write(`[${this.name}] Hello World - ${formatCivil(this.clock.now(), this.utcOffsetMinutes)}`);
  }
}

/** "2024-01-01T14:30:00" on the fixed-offset civil calendar. */
export function formatCivil(instant: Date, utcOffsetMinutes: number): string {
  const wall = new Date(instant.getTime() + utcOffsetMinutes * 60_000);
  return wall.toISOString().slice(0, 19);
}

import { IClock } from "./IClock";

/**
 * A clock that only moves when told to. Used for `--date` on the command line
 * and, paired with InstantSleeper, for start-up timestamps in tests.
 */
export class FixedClock implements IClock {
  private epochMs: number;

  constructor(start: Date) {
    this.epochMs = start.getTime();
  }

  now(): Date {
    return new Date(this.epochMs);
  }

  advance(ms: number): void {
    this.epochMs += ms;
  }
}

import { FixedClock } from "./FixedClock";
import { ISleeper } from "./ISleeper";

/**
 * Returns immediately and records each requested delay. When given a
 * FixedClock, the clock is advanced by the requested delay.
 */
export class InstantSleeper implements ISleeper {
  private sleeps: number[] = [];

  constructor(private readonly clock?: FixedClock) {}

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.clock?.advance(ms);
  }

  getSleeps(): number[] {
    return [...this.sleeps];
  }

  totalSleptMs(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}

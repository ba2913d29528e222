import { FixedClock } from "../../src/abstractions/FixedClock";
import { InstantSleeper } from "../../src/abstractions/InstantSleeper";
import { NodeSleeper } from "../../src/abstractions/NodeSleeper";

describe("FixedClock", () => {
  it("returns the start time until advanced", () => {
    const clock = new FixedClock(new Date("2025-06-15T10:00:00.000Z"));

    expect(clock.now().toISOString()).toBe("2025-06-15T10:00:00.000Z");
    clock.advance(90_000);
    expect(clock.now().toISOString()).toBe("2025-06-15T10:01:30.000Z");
  });

  it("is not moved by changes to a returned date", () => {
    const start = new Date("2025-06-15T10:00:00.000Z");
    const clock = new FixedClock(start);

    clock.now().setUTCFullYear(2030);
    start.setUTCFullYear(2031);

    expect(clock.now().toISOString()).toBe("2025-06-15T10:00:00.000Z");
  });
});

describe("InstantSleeper", () => {
  it("records sleeps and advances a fixed clock", async () => {
    const clock = new FixedClock(new Date("2025-06-15T10:00:00.000Z"));
    const sleeper = new InstantSleeper(clock);

    await sleeper.sleep(30_000);
    await sleeper.sleep(500);

    expect(sleeper.getSleeps()).toEqual([30_000, 500]);
    expect(sleeper.totalSleptMs()).toBe(30_500);
    expect(clock.now().toISOString()).toBe("2025-06-15T10:00:30.500Z");
  });
});

describe("NodeSleeper", () => {
  it("resolves after the delay", async () => {
    const start = Date.now();

    await new NodeSleeper().sleep(20);

    expect(Date.now() - start).toBeGreaterThanOrEqual(15);
  });
});

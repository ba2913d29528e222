import type { ISleeper } from "../abstractions/ISleeper";
import type { ILogger } from "../logging";

export type ReadinessStatus = "ready" | "timeout" | "exited";

export interface ReadinessOptions {
  initialDelayMs: number;
  intervalMs: number;
  maxAttempts: number;
  /** Polling stops as soon as this reports false. */
  isAlive?: () => boolean;
}

export interface ReadinessOutcome {
  status: ReadinessStatus;
  attempts: number;
}

export class ReadinessPoller {
  constructor(
    private readonly sleeper: ISleeper,
    private readonly logger?: ILogger
  ) {}

  async waitUntilReady(
    check: () => Promise<boolean>,
    options: ReadinessOptions
  ): Promise<ReadinessOutcome> {
    const { initialDelayMs, intervalMs, maxAttempts, isAlive } = options;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    await this.sleeper.sleep(initialDelayMs);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (isAlive && !isAlive()) {
        return { status: "exited", attempts: attempt - 1 };
      }
      if (await check()) {
        return { status: "ready", attempts: attempt };
      }
      this.logger?.debug(`Not ready after attempt ${attempt}/${maxAttempts}`);
      if (attempt < maxAttempts) {
        await this.sleeper.sleep(intervalMs);
      }
    }

    return { status: "timeout", attempts: maxAttempts };
  }
}

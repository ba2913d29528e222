import { IProcessKiller } from "./IProcessKiller";

export interface SentSignal {
  pid: number;
  signal: NodeJS.Signals;
}

export class InMemoryProcessKiller implements IProcessKiller {
  private alive = new Set<number>();
  private stubborn = new Set<number>();
  private signals: SentSignal[] = [];

  /** Register a running process. Stubborn processes ignore SIGTERM. */
  addProcess(pid: number, options?: { ignoresSigterm?: boolean }): void {
    this.alive.add(pid);
    if (options?.ignoresSigterm) {
      this.stubborn.add(pid);
    }
  }

  isProcessAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  killProcess(pid: number, signal: NodeJS.Signals): boolean {
    this.signals.push({ pid, signal });
    if (!this.alive.has(pid)) {
      return false;
    }
    if (signal !== "SIGTERM" || !this.stubborn.has(pid)) {
      this.alive.delete(pid);
    }
    return true;
  }

  getSignals(): SentSignal[] {
    return [...this.signals];
  }
}

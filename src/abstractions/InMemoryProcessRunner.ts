import { IProcessRunner, ProcessResult, ProcessRunOptions } from "./IProcessRunner";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: ProcessRunOptions;
}

/**
 * Plays back queued results in order. Output is replayed through onLine,
 * stdout before stderr, before run() resolves.
 */
export class InMemoryProcessRunner implements IProcessRunner {
  private readonly queue: Array<ProcessResult | Error> = [];
  private readonly calls: RecordedCall[] = [];

  enqueue(result: ProcessResult): void {
    this.queue.push(result);
  }

  /** Next run() rejects, as spawn does when the executable is missing. */
  enqueueFailure(error: Error): void {
    this.queue.push(error);
  }

  async run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult> {
    this.calls.push({ command, args, options });
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`InMemoryProcessRunner: nothing queued for ${command} ${args.join(" ")}`.trimEnd());
    }
    if (next instanceof Error) {
      throw next;
    }
    if (options?.onLine) {
      for (const line of `${next.stdout}\n${next.stderr}`.split(/\r?\n/)) {
        if (line.trim() !== "") options.onLine(line);
      }
    }
    return next;
  }

  getCalls(): RecordedCall[] {
    return [...this.calls];
  }
}

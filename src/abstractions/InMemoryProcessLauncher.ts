import { IFileSystem } from "./IFileSystem";
import { IProcessLauncher, LaunchOptions, LaunchedProcess } from "./IProcessLauncher";

export interface RecordedLaunch {
  command: string;
  args: string[];
  options: LaunchOptions;
}

/**
 * In-memory IProcessLauncher for tests. Launched processes stay alive unless
 * exitAfterChecks() says otherwise; mocked output is appended to the log file.
 */
export class InMemoryProcessLauncher implements IProcessLauncher {
  private launches: RecordedLaunch[] = [];
  private output = "";
  private aliveChecksBeforeExit: number | null = null;
  private failure: Error | null = null;
  private nextPid = 4242;

  constructor(private readonly fs?: IFileSystem) {}

  mockOutput(text: string): void {
    this.output = text;
  }

  /** The next launched process reports itself alive this many times, then dead. */
  exitAfterChecks(checks: number): void {
    this.aliveChecksBeforeExit = checks;
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  async launch(command: string, args: string[], options: LaunchOptions): Promise<LaunchedProcess> {
    this.launches.push({ command, args, options });
    if (this.failure) {
      throw this.failure;
    }
    if (this.fs) {
      const existing = (await this.fs.exists(options.logFile)) ? await this.fs.readFile(options.logFile) : "";
      await this.fs.writeFile(options.logFile, existing + this.output);
    }

    const pid = this.nextPid++;
    let remaining = this.aliveChecksBeforeExit;
    return {
      pid,
      isAlive: () => {
        if (remaining === null) return true;
        if (remaining <= 0) return false;
        remaining--;
        return true;
      },
    };
  }

  getLaunches(): RecordedLaunch[] {
    return [...this.launches];
  }
}

import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { ILogger } from "../logging";
import { browserCommand } from "./commands";
import { isSupported, Platform } from "./platform";

export class BrowserOpener {
  constructor(
    private readonly runner: IProcessRunner,
    private readonly platform: Platform,
    private readonly logger: ILogger
  ) {}

  /** Resolves false, after logging why, when no browser could be opened. */
  async open(url: string): Promise<boolean> {
    if (!isSupported(this.platform)) {
      this.logger.info(`Open ${url} in your browser`);
      return false;
    }

    const command = browserCommand(this.platform, url);
    this.logger.debug(command.display);
    try {
      const result = await this.runner.run(command.command, command.args, { timeoutMs: 10_000 });
      if (result.exitCode === 0) {
        return true;
      }
      this.logger.info(`Could not open a browser (exit ${result.exitCode}): ${result.stderr.trim()}`);
    } catch (err) {
      this.logger.info(`Could not open a browser: ${err instanceof Error ? err.message : String(err)}`);
    }
    return false;
  }
}

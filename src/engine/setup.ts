import { formatInTimeZone } from "date-fns-tz";
import type { IClock } from "../abstractions/IClock";
import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessLauncher } from "../abstractions/IProcessLauncher";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { ISleeper } from "../abstractions/ISleeper";
import { connect } from "../client/connection";
import { systemTimeZone } from "../client/dateTime";
import type { IHttpClient } from "../http/IHttpClient";
import type { ILogger } from "../logging";
import { expandTilde } from "../paths";
import { BrowserOpener } from "./BrowserOpener";
import { splitOutputLines } from "./buildGraph";
import { runSetupChecks } from "./checks";
import { serverCommand } from "./commands";
import { isSupported, Platform, UNSUPPORTED_OS_MESSAGE } from "./platform";
import { ReadinessPoller, ReadinessStatus } from "./ReadinessPoller";

export interface StartupTiming {
  /** Wait before reading the log for early start-up errors. */
  graceMs: number;
  initialDelayMs: number;
  pollIntervalMs: number;
  maxAttempts: number;
}

export const DEFAULT_STARTUP_TIMING: StartupTiming = {
  graceMs: 2_000,
  initialDelayMs: 30_000,
  pollIntervalMs: 30_000,
  maxAttempts: 10,
};

export interface SetupOptions {
  fs: IFileSystem;
  runner: IProcessRunner;
  launcher: IProcessLauncher;
  http: IHttpClient;
  sleeper: ISleeper;
  clock: IClock;
  logger: ILogger;
  platform: Platform;
  otp: string;
  dir: string;
  router?: string;
  port?: number;
  securePort?: number;
  memory?: number;
  analyst?: boolean;
  /** Poll until the router answers; when false, return right after launch. */
  wait?: boolean;
  openBrowser?: boolean;
  logFile?: string;
  pidFile?: string;
  /** Zone for the timestamps in progress messages. */
  timezone?: string;
  timing?: Partial<StartupTiming>;
}

export interface SetupResult {
  pid: number;
  command: string;
  logFile: string;
  pidFile: string;
  ready: boolean;
  /** "launched" when not waiting for readiness. */
  status: ReadinessStatus | "launched";
  attempts: number;
}

function baseDir(dir: string): string {
  return dir.replace(/[\\/]+$/, "");
}

export function defaultLogFile(dir: string): string {
  return `${baseDir(dir)}/otp.log`;
}

export function defaultPidFile(dir: string): string {
  return `${baseDir(dir)}/otp.pid`;
}

async function readLog(fs: IFileSystem, logFile: string): Promise<string> {
  return (await fs.exists(logFile)) ? fs.readFile(logFile) : "";
}

/** Lines the current run added; the launcher appends, so earlier runs stay in the file. */
async function readLogLinesFrom(fs: IFileSystem, logFile: string, offset: number): Promise<string[]> {
  return splitOutputLines((await readLog(fs, logFile)).slice(offset));
}

/**
 * Launch OTP as a detached server and, unless told not to wait, poll until
 * the router is served.
 */
export async function setupEngine(options: SetupOptions): Promise<SetupResult> {
  const { fs, runner, launcher, http, sleeper, clock, logger, platform } = options;
  const otp = expandTilde(options.otp);
  const dir = expandTilde(options.dir);
  const router = options.router ?? "default";
  const port = options.port ?? 8080;
  const timing = { ...DEFAULT_STARTUP_TIMING, ...options.timing };
  const timezone = options.timezone ?? systemTimeZone();
  const stamp = (): string => formatInTimeZone(clock.now(), timezone, "yyyy-MM-dd HH:mm:ss");

  await runSetupChecks({ fs, runner }, { otp, dir, router, graph: true });
  const command = serverCommand({
    otp,
    dir,
    router,
    memory: options.memory ?? 2,
    port,
    securePort: options.securePort ?? 8081,
    analyst: options.analyst,
  });
  if (!isSupported(platform)) {
    throw new Error(UNSUPPORTED_OS_MESSAGE);
  }

  const logFile = options.logFile ?? defaultLogFile(dir);
  const pidFile = options.pidFile ?? defaultPidFile(dir);

  const logOffset = (await readLog(fs, logFile)).length;
  logger.debug(command.display);
  const child = await launcher.launch(command.command, command.args, { logFile, cwd: dir });
  await fs.writeFile(pidFile, `${child.pid}\n`);
  logger.debug(`OTP started with PID ${child.pid}, output in ${logFile}`);

  await sleeper.sleep(timing.graceMs);
  const earlyLines = await readLogLinesFrom(fs, logFile, logOffset);
  const errorLine = earlyLines.find((line) => /ERROR/i.test(line));
  if (errorLine !== undefined) {
    throw new Error(`Failed to start OTP with message: ${errorLine}`);
  }
  if (!child.isAlive()) {
    await fs.unlink(pidFile);
    throw new Error(`OTP exited during start-up: ${earlyLines.slice(-20).join("\n") || "no output"}`);
  }

  logger.info(`${stamp()} OTP is loading and may take a while to be useable`);

  const result = { pid: child.pid, command: command.display, logFile, pidFile };
  if (!(options.wait ?? true)) {
    return { ...result, ready: false, status: "launched", attempts: 0 };
  }

  const poller = new ReadinessPoller(sleeper, logger);
  const outcome = await poller.waitUntilReady(
    async () => {
      try {
        await connect(http, { hostname: "localhost", port, router, check: true, timezone });
        return true;
      } catch (err) {
        logger.debug(`OTP not ready: ${err instanceof Error ? err.message : String(err)}`);
        return false;
      }
    },
    {
      initialDelayMs: timing.initialDelayMs,
      intervalMs: timing.pollIntervalMs,
      maxAttempts: timing.maxAttempts,
      isAlive: () => child.isAlive(),
    }
  );

  if (outcome.status === "exited") {
    await fs.unlink(pidFile);
    const tail = (await readLogLinesFrom(fs, logFile, logOffset)).slice(-20);
    throw new Error(`OTP exited while loading: ${tail.join("\n") || "no output"}`);
  }

  if (outcome.status === "timeout") {
    logger.info(`${stamp()} OTP is taking an unusually long time to load, releasing control`);
    return { ...result, ready: false, status: outcome.status, attempts: outcome.attempts };
  }

  logger.info(
    `${stamp()} OTP is ready to use Go to localhost:${port} in your browser to view the OTP`
  );
  if (options.openBrowser ?? true) {
    await new BrowserOpener(runner, platform, logger).open(`http://localhost:${port}`);
  }
  return { ...result, ready: true, status: outcome.status, attempts: outcome.attempts };
}

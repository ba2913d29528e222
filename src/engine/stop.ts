import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessKiller } from "../abstractions/IProcessKiller";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { IPrompter } from "../abstractions/IPrompter";
import type { ISleeper } from "../abstractions/ISleeper";
import type { ILogger } from "../logging";
import { splitOutputLines } from "./buildGraph";
import { EngineCommand, stopCommands } from "./commands";
import { isSupported, Platform, UNSUPPORTED_OS_MESSAGE } from "./platform";

export const STOP_WARNING =
  "This will force Java to close, Press [enter] to continue, [q] to abort";

export type StopMethod = "pid" | "kill-all" | "manual" | "none" | "aborted" | "unsupported";

export interface StopOptions {
  fs: IFileSystem;
  runner: IProcessRunner;
  killer: IProcessKiller;
  prompter: IPrompter;
  sleeper: ISleeper;
  logger: ILogger;
  platform: Platform;
  /** Ask before doing anything (interactive sessions only). */
  warn?: boolean;
  /** Kill every Java process without asking (default). When false, ask or print instructions. */
  killAll?: boolean;
  /** Written by setup; when present only that process is stopped. */
  pidFile?: string;
  /** How long to wait for SIGTERM before SIGKILL. */
  graceMs?: number;
}

export interface StopResult {
  success: boolean;
  method: StopMethod;
  error?: string;
}

const POLL_MS = 250;

async function stopByPid(options: StopOptions, pidFile: string): Promise<StopResult> {
  const { fs, killer, sleeper, logger } = options;
  const text = (await fs.readFile(pidFile)).trim();
  const pid = Number(text);
  if (!Number.isInteger(pid) || pid <= 0) {
    return { success: false, method: "pid", error: `PID file ${pidFile} does not hold a PID: "${text}"` };
  }

  if (!killer.isProcessAlive(pid)) {
    logger.info(`OTP process ${pid} is not running`);
    await fs.unlink(pidFile);
    return { success: true, method: "pid" };
  }

  killer.killProcess(pid, "SIGTERM");
  const graceMs = options.graceMs ?? 5_000;
  for (let waited = 0; waited < graceMs && killer.isProcessAlive(pid); waited += POLL_MS) {
    await sleeper.sleep(POLL_MS);
  }
  if (killer.isProcessAlive(pid)) {
    logger.debug(`OTP process ${pid} ignored SIGTERM, sending SIGKILL`);
    killer.killProcess(pid, "SIGKILL");
  }

  await fs.unlink(pidFile);
  logger.info(`Stopped OTP process ${pid}`);
  return { success: true, method: "pid" };
}

async function runKill(options: StopOptions, command: EngineCommand, okCodes: number[]): Promise<StopResult> {
  options.logger.debug(command.display);
  const result = await options.runner.run(command.command, command.args);
  const output = splitOutputLines(result.stdout, result.stderr);
  for (const line of output) options.logger.info(line);
  if (!okCodes.includes(result.exitCode)) {
    return {
      success: false,
      method: "kill-all",
      error: `${command.display} exited with code ${result.exitCode}`,
    };
  }
  return { success: true, method: "kill-all" };
}

/**
 * Stop OTP: the process recorded by setup when there is one, otherwise every
 * Java process on the machine.
 */
export async function stopEngine(options: StopOptions): Promise<StopResult> {
  const { fs, runner, prompter, logger, platform } = options;

  if ((options.warn ?? true) && prompter.isInteractive()) {
    if (!(await prompter.pause(STOP_WARNING))) {
      logger.info("Aborted");
      return { success: false, method: "aborted", error: "Aborted by user" };
    }
  }

  if (options.pidFile && (await fs.exists(options.pidFile))) {
    return stopByPid(options, options.pidFile);
  }

  if (!isSupported(platform)) {
    logger.info(UNSUPPORTED_OS_MESSAGE);
    return { success: false, method: "unsupported", error: UNSUPPORTED_OS_MESSAGE };
  }

  const commands = stopCommands(platform);
  if (commands.list === null) {
    return runKill(options, commands.killAll, [0]);
  }

  logger.debug(commands.list.display);
  const listing = await runner.run(commands.list.command, commands.list.args);
  if (listing.exitCode !== 0) {
    return {
      success: false,
      method: "kill-all",
      error: `${commands.list.display} exited with code ${listing.exitCode}: ${listing.stderr.trim()}`,
    };
  }
  const javaLines = splitOutputLines(listing.stdout).filter((line) => /java/i.test(line));
  if (javaLines.length === 0) {
    logger.info("No Java instances found");
    return { success: true, method: "none" };
  }

  logger.info("The following Java instances have been found:");
  for (const line of javaLines) logger.info(line);

  const killAll =
    (options.killAll ?? true) ||
    (prompter.isInteractive() && (await prompter.confirm("Kill all of them?")));
  if (killAll) {
    // pkill exits 1 when nothing matched, e.g. the processes already ended
    return runKill(options, commands.killAll, [0, 1]);
  }

  logger.info(
    "To kill an instance type kill -9 PID, where PID is the number at the start of its line above"
  );
  return { success: true, method: "manual" };
}

import { spawn } from "child_process";
import { closeSync, openSync } from "fs";
import { IProcessKiller } from "./IProcessKiller";
import { IProcessLauncher, LaunchOptions, LaunchedProcess } from "./IProcessLauncher";
import { NodeProcessKiller } from "./NodeProcessKiller";
import { expandTilde } from "../paths";

/**
 * Spawns a detached child whose output goes straight to a log file, so the
 * process keeps running after this one exits.
 */
export class NodeProcessLauncher implements IProcessLauncher {
  constructor(private readonly killer: IProcessKiller = new NodeProcessKiller()) {}

  async launch(command: string, args: string[], options: LaunchOptions): Promise<LaunchedProcess> {
    const fd = openSync(expandTilde(options.logFile), "a");
    try {
      const child = spawn(command, args, {
        detached: true,
        stdio: ["ignore", fd, fd],
        cwd: options.cwd,
      });

      let exited = false;
      child.once("exit", () => {
        exited = true;
      });

      const pid = await new Promise<number>((resolve, reject) => {
        child.once("error", reject);
        child.once("spawn", () => {
          if (child.pid === undefined) {
            reject(new Error(`No PID assigned to ${command}`));
          } else {
            resolve(child.pid);
          }
        });
      });
      child.unref();

      return {
        pid,
        isAlive: () => !exited && this.killer.isProcessAlive(pid),
      };
    } finally {
      closeSync(fd);
    }
  }
}

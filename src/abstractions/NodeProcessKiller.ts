import { IProcessKiller } from "./IProcessKiller";

function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

/**
 * IProcessKiller implementation using Node.js process.kill
 */
export class NodeProcessKiller implements IProcessKiller {
  isProcessAlive(pid: number): boolean {
    try {
      // Signal 0 doesn't kill, just checks if process exists
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: exists but belongs to another user
      return errorCode(err) === "EPERM";
    }
  }

  killProcess(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (err) {
      if (errorCode(err) === "ESRCH") {
        return false;
      }
      throw err;
    }
  }
}

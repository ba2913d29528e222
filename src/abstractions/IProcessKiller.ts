export interface IProcessKiller {
  /**
   * Check if a process is still running
   * @param pid Process ID
   * @returns true if process is running, false if not found/exited
   */
  isProcessAlive(pid: number): boolean;

  /**
   * Send a signal to a process
   * @returns false when the process no longer exists
   */
  killProcess(pid: number, signal: NodeJS.Signals): boolean;
}

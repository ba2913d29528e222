export interface LaunchOptions {
  /** stdout and stderr of the launched process are appended here. */
  logFile: string;
  cwd?: string;
}

export interface LaunchedProcess {
  pid: number;
  isAlive(): boolean;
}

/**
 * Starts a long-running process that outlives the caller.
 */
export interface IProcessLauncher {
  launch(command: string, args: string[], options: LaunchOptions): Promise<LaunchedProcess>;
}

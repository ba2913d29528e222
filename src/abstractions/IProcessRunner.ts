export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ProcessRunOptions {
  /** Hard ceiling; omitted means the process may run as long as it needs. */
  timeoutMs?: number;
  cwd?: string;
  /** Each non-blank line of stdout or stderr, as soon as it is complete. */
  onLine?: (line: string) => void;
}

/**
 * Runs a command to completion and collects its output.
 * Rejects when the command cannot be started at all (e.g. ENOENT).
 */
export interface IProcessRunner {
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

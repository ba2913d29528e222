import { spawn } from "child_process";
import type { Readable } from "stream";
import { IProcessRunner, ProcessResult, ProcessRunOptions } from "./IProcessRunner";

/** Collects a stream and hands complete lines to onLine as they arrive. */
function collect(stream: Readable, onLine?: (line: string) => void): { text: () => string; flush: () => void } {
  let text = "";
  let pending = "";
  const emit = (line: string): void => {
    if (onLine && line.trim() !== "") onLine(line.replace(/\r$/, ""));
  };
  stream.on("data", (data: Buffer) => {
    const chunk = data.toString();
    text += chunk;
    const parts = (pending + chunk).split("\n");
    pending = parts.pop() ?? "";
    parts.forEach(emit);
  });
  return {
    text: () => text,
    flush: () => {
      emit(pending);
      pending = "";
    },
  };
}

export class NodeProcessRunner implements IProcessRunner {
  async run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], cwd: options.cwd });
      const stdout = collect(child.stdout, options.onLine);
      const stderr = collect(child.stderr, options.onLine);

      const { timeoutMs } = options;
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              child.kill("SIGTERM");
              reject(new Error(`${command} did not finish within ${timeoutMs} ms`));
            }, timeoutMs);

      child.on("close", (code) => {
        clearTimeout(timer);
        stdout.flush();
        stderr.flush();
        // A process killed by a signal has no exit code.
        resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: code ?? 1 });
      });

      child.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });
    });
  }
}

import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { ILogger } from "../logging";
import { expandTilde } from "../paths";
import { runSetupChecks } from "./checks";
import { buildGraphCommand } from "./commands";

export interface BuildGraphOptions {
  fs: IFileSystem;
  runner: IProcessRunner;
  logger: ILogger;
  otp: string;
  dir: string;
  router?: string;
  /** Java heap in GB. */
  memory?: number;
  analyst?: boolean;
}

export interface BuildGraphResult {
  success: boolean;
  command: string;
  /** Everything the build printed, one entry per line. */
  lines: string[];
  error?: string;
}

/** A short log that mentions ERROR means the build gave up early. */
export function isFailedBuild(lines: readonly string[]): boolean {
  return lines.length < 10 && lines.some((line) => /ERROR/i.test(line));
}

export function splitOutputLines(...chunks: string[]): string[] {
  return chunks
    .join("\n")
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "");
}

export async function buildGraph(options: BuildGraphOptions): Promise<BuildGraphResult> {
  const { fs, runner, logger } = options;
  const otp = expandTilde(options.otp);
  const dir = expandTilde(options.dir);
  const router = options.router ?? "default";

  await runSetupChecks({ fs, runner }, { otp, dir, router, graph: false });
  const command = buildGraphCommand({
    otp,
    dir,
    router,
    memory: options.memory ?? 2,
    analyst: options.analyst,
  });

  logger.info("Basic checks completed, building graph, this may take a few minutes");
  logger.debug(command.display);

  const result = await runner.run(command.command, command.args, {
    onLine: (line) => logger.debug(line),
  });
  const lines = splitOutputLines(result.stdout, result.stderr);

  if (isFailedBuild(lines) || result.exitCode !== 0) {
    logger.info("Failed to build graph with message:");
    for (const line of lines) logger.info(line);
    const error =
      lines.length > 0 ? lines.join("\n") : `Graph build exited with code ${result.exitCode}`;
    return { success: false, command: command.display, lines, error };
  }

  logger.info("Graph built");
  return { success: true, command: command.display, lines };
}

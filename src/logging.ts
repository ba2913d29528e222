import { appendFileSync, existsSync, renameSync, statSync } from "fs";
import * as path from "path";
import type { IClock } from "./abstractions/IClock";
import { SystemClock } from "./abstractions/SystemClock";

/** Controls how much detail is written.
 *  "info": progress messages only (checks, launch, readiness).
 *  "debug": also full commands, request URLs and engine output. */
export type LogLevel = "info" | "debug";

export interface ILogger {
  /** Always written. Use for progress the user should see. */
  info(message: string): void;
  /** Only written when logLevel is "debug". Use for commands, URLs and raw output. */
  debug(message: string): void;
}

export class InMemoryLogger implements ILogger {
  private entries: string[] = [];
  private debugEntries: string[] = [];

  info(message: string): void {
    this.entries.push(message);
  }

  debug(message: string): void {
    this.debugEntries.push(message);
  }

  getEntries(): string[] {
    return [...this.entries];
  }

  getDebugEntries(): string[] {
    return [...this.debugEntries];
  }
}

/** Writes to stderr so that stdout stays free for command results. */
export class ConsoleLogger implements ILogger {
  constructor(
    private readonly logLevel: LogLevel = "info",
    private readonly write: (line: string) => void = (line) => console.error(line)
  ) {}

  info(message: string): void {
    this.write(message);
  }

  debug(message: string): void {
    if (this.logLevel !== "debug") {
      return;
    }
    this.write(message);
  }
}

export class CompositeLogger implements ILogger {
  private readonly loggers: ILogger[];

  constructor(...loggers: ILogger[]) {
    this.loggers = loggers;
  }

  info(message: string): void {
    for (const logger of this.loggers) logger.info(message);
  }

  debug(message: string): void {
    for (const logger of this.loggers) logger.debug(message);
  }
}

const MAX_LOG_SIZE_BYTES = 500 * 1024; // 500 KB

export interface FileLoggerOptions {
  logLevel?: LogLevel;
  /** A log at or over this size is renamed aside before the session starts. */
  maxSizeBytes?: number;
  /** Names the session in its header line, e.g. the CLI command. */
  session?: string;
  clock?: IClock;
}

/**
 * Appends `[<ISO time>] <LEVEL> <message>` lines to a file that survives
 * across runs, so a detached `setup` can be traced after the fact.
 */
export class FileLogger implements ILogger {
  private readonly logLevel: LogLevel;
  private readonly clock: IClock;

  constructor(
    private readonly filePath: string,
    options: FileLoggerOptions = {}
  ) {
    this.logLevel = options.logLevel ?? "info";
    this.clock = options.clock ?? new SystemClock();
    this.rotateIfNeeded(options.maxSizeBytes ?? MAX_LOG_SIZE_BYTES);
    this.writeSessionHeader(options.session ?? "session");
  }

  info(message: string): void {
    this.append("INFO", message);
  }

  debug(message: string): void {
    if (this.logLevel === "debug") {
      this.append("DEBUG", message);
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private append(level: string, message: string): void {
    appendFileSync(this.filePath, `[${this.clock.now().toISOString()}] ${level} ${message}\n`);
  }

  private rotateIfNeeded(maxSizeBytes: number): void {
    if (!existsSync(this.filePath) || statSync(this.filePath).size < maxSizeBytes) {
      return;
    }
    const dir = path.dirname(this.filePath);
    const base = path.basename(this.filePath, path.extname(this.filePath));
    const stamp = this.clock.now().toISOString().replace(/:/g, "-");
    renameSync(this.filePath, path.join(dir, `${base}.${stamp}.log`));
  }

  private writeSessionHeader(session: string): void {
    const separator = existsSync(this.filePath) ? "\n" : "";
    appendFileSync(
      this.filePath,
      `${separator}[${this.clock.now().toISOString()}] === ${session} started (level ${this.logLevel}) ===\n`
    );
  }
}

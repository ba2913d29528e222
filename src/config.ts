import * as path from "node:path";
import { z } from "zod";
import type { IFileSystem } from "./abstractions/IFileSystem";
import { describeIssues } from "./client/schemas";
import type { LogLevel } from "./logging";
import type { AppPaths } from "./paths";

/** Use posix path join when path looks like a posix path (e.g. test or Unix). */
function pathJoin(base: string, ...segments: string[]): string {
  if (base.startsWith("/") && !base.match(/^[a-zA-Z]:/)) {
    return path.posix.join(base, ...segments);
  }
  return path.join(base, ...segments);
}

export interface StartupConfig {
  /** Pause before the log is checked for start-up errors. */
  graceMs: number;
  initialDelayMs: number;
  pollIntervalMs: number;
  maxAttempts: number;
}

export interface AppConfig {
  /** Path to the OTP shaded jar. */
  otpJar?: string;
  /** Directory holding graphs/<router>/. */
  dataDir?: string;
  router: string;
  /** Java heap for build and server, in GB. */
  memoryGb: number;
  port: number;
  securePort: number;
  analyst: boolean;
  hostname: string;
  ssl: boolean;
  /** Zone for query dates and reported times (default: the system zone). */
  timezone?: string;
  openBrowser: boolean;
  startup: StartupConfig;
  requestTimeoutMs: number;
  /** Parallel requests when planning many trips. */
  concurrency: number;
  logLevel: LogLevel;
  logFile?: string;
}

const positiveInt = z.number().int().positive();
const port = z.number().int().min(1).max(65535);

const fileConfigSchema = z
  .object({
    otpJar: z.string().min(1),
    dataDir: z.string().min(1),
    router: z.string().min(1),
    memoryGb: z.number().min(1),
    port,
    securePort: port,
    analyst: z.boolean(),
    hostname: z.string().min(1),
    ssl: z.boolean(),
    timezone: z.string().min(1),
    openBrowser: z.boolean(),
    startup: z
      .object({
        graceMs: z.number().int().nonnegative(),
        initialDelayMs: z.number().int().nonnegative(),
        pollIntervalMs: z.number().int().nonnegative(),
        maxAttempts: positiveInt,
      })
      .partial()
      .strict(),
    requestTimeoutMs: positiveInt,
    concurrency: positiveInt,
    logLevel: z.enum(["info", "debug"]),
    logFile: z.string().min(1),
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ResolveConfigOptions {
  appPaths: AppPaths;
  configPath?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export const CONFIG_FILE_NAME = "otp-control.json";

export function defaultConfig(): AppConfig {
  return {
    router: "default",
    memoryGb: 2,
    port: 8080,
    securePort: 8081,
    analyst: false,
    hostname: "localhost",
    ssl: false,
    openBrowser: true,
    startup: {
      graceMs: 2_000,
      initialDelayMs: 30_000,
      pollIntervalMs: 30_000,
      maxAttempts: 10,
    },
    requestTimeoutMs: 60_000,
    concurrency: 1,
    logLevel: "info",
  };
}

async function readConfigFile(fs: IFileSystem, filePath: string): Promise<FileConfig> {
  const raw = await fs.readFile(filePath);
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file ${filePath} is not valid JSON`, { cause: err });
  }
  const result = fileConfigSchema.safeParse(json);
  if (!result.success) {
    throw new Error(`Invalid config file ${filePath}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

async function findConfigFile(fs: IFileSystem, options: ResolveConfigOptions): Promise<string | undefined> {
  if (options.configPath) {
    if (!(await fs.exists(options.configPath))) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    return options.configPath;
  }
  // Try CWD otp-control.json
  const cwdConfig = options.cwd ? pathJoin(options.cwd, CONFIG_FILE_NAME) : undefined;
  if (cwdConfig && (await fs.exists(cwdConfig))) {
    return cwdConfig;
  }
  // Try config-dir config.json
  const configDirFile = pathJoin(options.appPaths.config, "config.json");
  if (await fs.exists(configDirFile)) {
    return configDirFile;
  }
  return undefined;
}

function envNumber(env: Record<string, string | undefined>, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function isLogLevel(value: string): value is LogLevel {
  return value === "info" || value === "debug";
}

function envString(env: Record<string, string | undefined>, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? undefined : raw;
}

/** Defaults, then the config file, then OTP_* environment variables. */
export async function resolveConfig(
  fs: IFileSystem,
  options: ResolveConfigOptions
): Promise<AppConfig> {
  const defaults = defaultConfig();
  const filePath = await findConfigFile(fs, options);
  const fileConfig: FileConfig = filePath ? await readConfigFile(fs, filePath) : {};

  const merged: AppConfig = {
    ...defaults,
    ...fileConfig,
    startup: { ...defaults.startup, ...fileConfig.startup },
  };

  const env = options.env ?? process.env;
  const port = envNumber(env, "OTP_PORT");
  if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new Error(`OTP_PORT must be a port number, got "${env.OTP_PORT}"`);
  }
  const memoryGb = envNumber(env, "OTP_MEMORY_GB");
  if (memoryGb !== undefined && memoryGb < 1) {
    throw new Error(`OTP_MEMORY_GB must be at least 1, got "${env.OTP_MEMORY_GB}"`);
  }
  const rawLogLevel = envString(env, "OTP_LOG_LEVEL");
  if (rawLogLevel !== undefined && !isLogLevel(rawLogLevel)) {
    throw new Error(`OTP_LOG_LEVEL must be "info" or "debug", got "${rawLogLevel}"`);
  }
  const logLevel = rawLogLevel !== undefined && isLogLevel(rawLogLevel) ? rawLogLevel : undefined;

  return {
    ...merged,
    otpJar: envString(env, "OTP_JAR") ?? merged.otpJar,
    dataDir: envString(env, "OTP_DIR") ?? merged.dataDir,
    router: envString(env, "OTP_ROUTER") ?? merged.router,
    hostname: envString(env, "OTP_HOSTNAME") ?? merged.hostname,
    port: port ?? merged.port,
    memoryGb: memoryGb ?? merged.memoryGb,
    logLevel: logLevel ?? merged.logLevel,
  };
}

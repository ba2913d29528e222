#!/usr/bin/env node
import { FixedClock } from "./abstractions/FixedClock";
import type { IFileSystem } from "./abstractions/IFileSystem";
import { NodeFileSystem } from "./abstractions/NodeFileSystem";
import { NodeProcessKiller } from "./abstractions/NodeProcessKiller";
import { NodeProcessLauncher } from "./abstractions/NodeProcessLauncher";
import { NodeProcessRunner } from "./abstractions/NodeProcessRunner";
import { NodeSleeper } from "./abstractions/NodeSleeper";
import { ReadlinePrompter } from "./abstractions/ReadlinePrompter";
import { SystemClock } from "./abstractions/SystemClock";
import { connect, ConnectOptions } from "./client/connection";
import { parseLngLat } from "./client/coordinates";
import { Geocoder } from "./client/Geocoder";
import { IsochroneClient } from "./client/IsochroneClient";
import { RoutingOptions, validateRoutingOptions } from "./client/routingOptions";
import { PlaceInput, TripPlanner } from "./client/TripPlanner";
import { AppConfig, isLogLevel, resolveConfig } from "./config";
import { buildGraph } from "./engine/buildGraph";
import { defaultPidFile, setupEngine } from "./engine/setup";
import { ConfigType, isConfigType, makeConfig, writeConfig } from "./engine/engineConfig";
import { checkJava } from "./engine/java";
import { detectPlatform } from "./engine/platform";
import { stopEngine } from "./engine/stop";
import { FetchHttpClient } from "./http/FetchHttpClient";
import { CompositeLogger, ConsoleLogger, FileLogger, ILogger, LogLevel } from "./logging";
import { getAppPaths } from "./paths";

export const COMMANDS = [
  "check-java",
  "build-graph",
  "setup",
  "stop",
  "connect",
  "plan",
  "isochrone",
  "geocode",
  "write-config",
  "help",
] as const;

export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command;
  configPath?: string;
  otp?: string;
  dir?: string;
  router?: string;
  memory?: number;
  port?: number;
  securePort?: number;
  analyst?: boolean;
  hostname?: string;
  url?: string;
  ssl?: boolean;
  timezone?: string;
  /** setup: return once launched instead of polling. */
  noWait?: boolean;
  noBrowser?: boolean;
  /** stop: skip the warning prompt. */
  yes?: boolean;
  /** stop: unset kills every Java process; --no-kill-all asks or prints instructions instead. */
  killAll?: boolean;
  from: string[];
  to: string[];
  fromIds: string[];
  toIds: string[];
  mode?: string;
  date?: string;
  arriveBy?: boolean;
  maxWalkDistance?: number;
  numItineraries?: number;
  /** JSON file of routing options. */
  optionsPath?: string;
  noGeometry?: boolean;
  concurrency?: number;
  cutoffs?: number[];
  query?: string;
  autocomplete?: boolean;
  configType?: ConfigType;
  /** write-config: JSON file to write instead of the defaults. */
  inputPath?: string;
  logLevel?: LogLevel;
}

export const USAGE = `Usage: otp-control <command> [options]

Commands:
  check-java                         Check that Java 8 is installed
  build-graph --otp <jar> --dir <d>  Build Graph.obj for a router
  setup --otp <jar> --dir <d>        Start OTP and wait until it is ready
  stop                               Stop OTP
  connect                            Check that a router is being served
  plan --from <lng,lat> --to <lng,lat>
  isochrone --from <lng,lat> [--cutoff <sec>]...
  geocode --query <text>
  write-config --type <build|router|otp> --dir <d>

Options:
  --config <file>  --router <name>  --memory <GB>  --port <n>  --secure-port <n>
  --analyst  --hostname <host>  --url <base>  --ssl  --timezone <zone>
  --no-wait  --no-browser  --yes  --kill-all  --no-kill-all
  --from-id <id>  --to-id <id>  --mode <A,B>  --date <ISO time>  --arrive-by
  --max-walk-distance <m>  --num-itineraries <n>  --options <json file>
  --no-geometry  --concurrency <n>  --autocomplete  --input <json file>
  --log-level <info|debug>`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function toNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }
  return n;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const parsed: ParsedArgs = { command: "help", from: [], to: [], fromIds: [], toIds: [] };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string => {
      if (i + 1 >= args.length) {
        throw new Error(`${arg} expects a value`);
      }
      return args[++i];
    };

    switch (arg) {
      case "--config": parsed.configPath = value(); break;
      case "--otp": parsed.otp = value(); break;
      case "--dir": parsed.dir = value(); break;
      case "--router": parsed.router = value(); break;
      case "--memory": parsed.memory = toNumber(arg, value()); break;
      case "--port": parsed.port = toNumber(arg, value()); break;
      case "--secure-port": parsed.securePort = toNumber(arg, value()); break;
      case "--analyst": parsed.analyst = true; break;
      case "--hostname": parsed.hostname = value(); break;
      case "--url": parsed.url = value(); break;
      case "--ssl": parsed.ssl = true; break;
      case "--timezone": parsed.timezone = value(); break;
      case "--no-wait": parsed.noWait = true; break;
      case "--no-browser": parsed.noBrowser = true; break;
      case "--yes": parsed.yes = true; break;
      case "--kill-all": parsed.killAll = true; break;
      case "--no-kill-all": parsed.killAll = false; break;
      case "--from": parsed.from.push(value()); break;
      case "--to": parsed.to.push(value()); break;
      case "--from-id": parsed.fromIds.push(value()); break;
      case "--to-id": parsed.toIds.push(value()); break;
      case "--mode": parsed.mode = value(); break;
      case "--date": parsed.date = value(); break;
      case "--arrive-by": parsed.arriveBy = true; break;
      case "--max-walk-distance": parsed.maxWalkDistance = toNumber(arg, value()); break;
      case "--num-itineraries": parsed.numItineraries = toNumber(arg, value()); break;
      case "--options": parsed.optionsPath = value(); break;
      case "--no-geometry": parsed.noGeometry = true; break;
      case "--concurrency": parsed.concurrency = toNumber(arg, value()); break;
      case "--cutoff": parsed.cutoffs = [...(parsed.cutoffs ?? []), toNumber(arg, value())]; break;
      case "--query": parsed.query = value(); break;
      case "--autocomplete": parsed.autocomplete = true; break;
      case "--input": parsed.inputPath = value(); break;
      case "--type": {
        const type = value();
        if (!isConfigType(type)) {
          throw new Error(`--type must be build, router or otp, got "${type}"`);
        }
        parsed.configType = type;
        break;
      }
      case "--log-level": {
        const level = value();
        if (!isLogLevel(level)) {
          throw new Error(`--log-level must be info or debug, got "${level}"`);
        }
        parsed.logLevel = level;
        break;
      }
      case "-h":
      case "--help":
        parsed.command = "help";
        commandSeen = true;
        break;
      default:
        if (!commandSeen && isCommand(arg)) {
          parsed.command = arg;
          commandSeen = true;
        } else {
          throw new Error(`Unknown argument: ${arg}`);
        }
    }
  }

  return parsed;
}

/** Pair each "lng,lat" with the id given at the same position, if any. */
export function toPlaces(coordinates: string[], ids: string[], label: string): PlaceInput[] {
  if (ids.length > 0 && ids.length !== coordinates.length) {
    throw new Error(`Got ${ids.length} ${label} ids for ${coordinates.length} ${label} places`);
  }
  return coordinates.map((text, i) => ({
    id: ids[i],
    coordinates: parseLngLat(text, label),
  }));
}

function required(value: string | undefined, what: string): string {
  if (value === undefined) {
    throw new Error(`${what} is required`);
  }
  return value;
}

function parseDate(text: string | undefined): Date | undefined {
  if (text === undefined) return undefined;
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--date is not a valid date: "${text}"`);
  }
  return date;
}

async function readJsonFile(fs: IFileSystem, filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath);
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`${filePath} is not valid JSON`, { cause: err });
  }
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function connectOptions(args: ParsedArgs, config: AppConfig): ConnectOptions {
  return {
    hostname: config.hostname,
    router: config.router,
    port: config.port,
    ssl: args.ssl ?? config.ssl,
    url: args.url,
    timezone: config.timezone,
    timeoutMs: config.requestTimeoutMs,
  };
}

function applyArgs(config: AppConfig, args: ParsedArgs): AppConfig {
  return {
    ...config,
    otpJar: args.otp ?? config.otpJar,
    dataDir: args.dir ?? config.dataDir,
    router: args.router ?? config.router,
    memoryGb: args.memory ?? config.memoryGb,
    port: args.port ?? config.port,
    securePort: args.securePort ?? config.securePort,
    analyst: args.analyst ?? config.analyst,
    hostname: args.hostname ?? config.hostname,
    timezone: args.timezone ?? config.timezone,
    openBrowser: args.noBrowser ? false : config.openBrowser,
    concurrency: args.concurrency ?? config.concurrency,
    logLevel: args.logLevel ?? config.logLevel,
  };
}

function createLogger(config: AppConfig, command: Command): ILogger {
  const consoleLogger = new ConsoleLogger(config.logLevel);
  if (!config.logFile) {
    return consoleLogger;
  }
  return new CompositeLogger(
    consoleLogger,
    new FileLogger(config.logFile, { logLevel: config.logLevel, session: `otp-control ${command}` })
  );
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.command === "help") {
    console.log(USAGE);
    return;
  }

  const fs = new NodeFileSystem();
  const config = applyArgs(
    await resolveConfig(fs, { appPaths: getAppPaths(), configPath: args.configPath, cwd: process.cwd() }),
    args
  );
  const logger = createLogger(config, args.command);
  const runner = new NodeProcessRunner();
  const http = new FetchHttpClient(config.requestTimeoutMs);
  const platform = detectPlatform();
  const dateTime = parseDate(args.date);
  const clock = dateTime ? new FixedClock(dateTime) : new SystemClock();

  const loadRoutingOptions = async (): Promise<RoutingOptions | undefined> =>
    args.optionsPath ? validateRoutingOptions(await readJsonFile(fs, args.optionsPath)) : undefined;

  switch (args.command) {
    case "check-java": {
      const version = await checkJava(runner);
      console.log(`Java ${version} found`);
      break;
    }
    case "build-graph": {
      const result = await buildGraph({
        fs,
        runner,
        logger,
        otp: required(config.otpJar, "--otp"),
        dir: required(config.dataDir, "--dir"),
        router: config.router,
        memory: config.memoryGb,
        analyst: config.analyst,
      });
      if (!result.success) {
        process.exit(1);
      }
      break;
    }
    case "setup": {
      const dir = required(config.dataDir, "--dir");
      const result = await setupEngine({
        fs,
        runner,
        launcher: new NodeProcessLauncher(),
        http,
        sleeper: new NodeSleeper(),
        clock: new SystemClock(),
        logger,
        platform,
        otp: required(config.otpJar, "--otp"),
        dir,
        router: config.router,
        port: config.port,
        securePort: config.securePort,
        memory: config.memoryGb,
        analyst: config.analyst,
        wait: !args.noWait,
        openBrowser: config.openBrowser,
        timezone: config.timezone,
        timing: config.startup,
      });
      printJson(result);
      break;
    }
    case "stop": {
      const result = await stopEngine({
        fs,
        runner,
        killer: new NodeProcessKiller(),
        prompter: new ReadlinePrompter(),
        sleeper: new NodeSleeper(),
        logger,
        platform,
        warn: !args.yes,
        killAll: args.killAll,
        pidFile: config.dataDir ? defaultPidFile(config.dataDir) : undefined,
      });
      if (!result.success) {
        console.error(result.error);
        process.exit(1);
      }
      break;
    }
    case "connect": {
      const connection = await connect(http, connectOptions(args, config), logger);
      printJson(connection);
      break;
    }
    case "plan": {
      const connection = await connect(http, connectOptions(args, config), logger);
      const planner = new TripPlanner(http, connection, clock, logger);
      const result = await planner.planMany(
        {
          from: toPlaces(args.from, args.fromIds, "from"),
          to: toPlaces(args.to, args.toIds, "to"),
          mode: args.mode,
          arriveBy: args.arriveBy,
          maxWalkDistance: args.maxWalkDistance,
          numItineraries: args.numItineraries,
          routingOptions: await loadRoutingOptions(),
          getGeometry: !args.noGeometry,
        },
        { concurrency: config.concurrency }
      );
      for (const failure of result.failures) {
        logger.info(`${failure.fromId} -> ${failure.toId}: ${failure.error}`);
      }
      printJson(result.collection);
      if (result.failures.length === result.planned) {
        process.exit(1);
      }
      break;
    }
    case "isochrone": {
      const connection = await connect(http, connectOptions(args, config), logger);
      const [from] = toPlaces(args.from, args.fromIds, "from");
      if (!from || args.from.length > 1) {
        throw new Error("isochrone takes exactly one --from");
      }
      const collection = await new IsochroneClient(http, connection, clock).isochrone({
        fromPlace: from.coordinates,
        fromId: from.id,
        mode: args.mode,
        cutoffSec: args.cutoffs,
        maxWalkDistance: args.maxWalkDistance,
        routingOptions: await loadRoutingOptions(),
      });
      printJson(collection);
      break;
    }
    case "geocode": {
      const connection = await connect(http, connectOptions(args, config), logger);
      const collection = await new Geocoder(http, connection).geocode({
        query: required(args.query, "--query"),
        autocomplete: args.autocomplete,
      });
      printJson(collection);
      break;
    }
    case "write-config": {
      const type = args.configType ?? "router";
      const document = args.inputPath ? await readJsonFile(fs, args.inputPath) : makeConfig(type);
      const written = await writeConfig(fs, type, document, {
        dir: required(config.dataDir, "--dir"),
        router: config.router,
      });
      logger.info(`Wrote ${written}`);
      if (type === "otp") {
        logger.info("otp-config.json is read by OTP 2.x only; OTP 1.x ignores it");
      }
      break;
    }
  }
}

// Skip main() in test runners (Jest sets JEST_WORKER_ID)
if (!process.env.JEST_WORKER_ID) {
  main().catch((err: unknown) => {
    console.error("Fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}

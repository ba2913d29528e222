import { z } from "zod";
import type { IFileSystem } from "../abstractions/IFileSystem";
import { describeIssues } from "../client/schemas";
import { graphDir } from "./commands";
import buildTemplate from "./templates/build-config.json";
import otpTemplate from "./templates/otp-config.json";
import routerTemplate from "./templates/router-config.json";

export type ConfigType = "build" | "router" | "otp";

const nonNegative = z.number().nonnegative();

export const buildConfigSchema = z
  .object({
    htmlAnnotations: z.boolean(),
    maxHtmlAnnotationsPerFile: z.number().int().positive(),
    transit: z.boolean(),
    useTransfersTxt: z.boolean(),
    parentStopLinking: z.boolean(),
    stationTransfers: z.boolean(),
    subwayAccessTime: nonNegative,
    streets: z.boolean(),
    embedRouterConfig: z.boolean(),
    areaVisibility: z.boolean(),
    platformEntriesLinking: z.boolean(),
    matchBusRoutesToStreets: z.boolean(),
    fetchElevationUS: z.boolean(),
    osmWayPropertySet: z.enum(["default", "norway", "uk", "finland", "germany"]),
    staticBikeRental: z.boolean(),
    staticParkAndRide: z.boolean(),
    staticBikeParkAndRide: z.boolean(),
    maxInterlineDistance: nonNegative,
    islandWarningThreshold: z.number().int().nonnegative(),
    banDiscouragedWalking: z.boolean(),
    banDiscouragedBiking: z.boolean(),
    maxTransferDistance: nonNegative,
    extraEdgesStopPlatformLink: z.boolean(),
  })
  .partial()
  .passthrough();

export const routerConfigSchema = z
  .object({
    routingDefaults: z.record(z.union([z.number(), z.boolean(), z.string()])),
    timeouts: z.array(z.number().positive()).min(1),
    requestLogFile: z.string(),
    boardTimes: z.record(nonNegative),
    alightTimes: z.record(nonNegative),
    updaters: z.array(z.object({ type: z.string() }).passthrough()),
  })
  .partial()
  .passthrough();

/**
 * otp-config.json is only read by OTP 2.x, which takes its feature toggles
 * from it. OTP 1.x ignores the file, so writing it is harmless there.
 */
export const otpConfigSchema = z
  .object({
    otpFeatures: z.record(z.boolean()),
  })
  .partial()
  .passthrough();

export type BuildConfig = z.infer<typeof buildConfigSchema>;
export type RouterConfig = z.infer<typeof routerConfigSchema>;
export type OtpConfig = z.infer<typeof otpConfigSchema>;
export type EngineConfig = BuildConfig | RouterConfig | OtpConfig;

export const CONFIG_FILE_NAMES: Record<ConfigType, string> = {
  build: "build-config.json",
  router: "router-config.json",
  otp: "otp-config.json",
};

function parseWith<T extends z.ZodTypeAny>(schema: T, type: ConfigType, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid ${type} config: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function validateConfig(type: "build", value: unknown): BuildConfig;
export function validateConfig(type: "router", value: unknown): RouterConfig;
export function validateConfig(type: "otp", value: unknown): OtpConfig;
export function validateConfig(type: ConfigType, value: unknown): EngineConfig;
export function validateConfig(type: ConfigType, value: unknown): EngineConfig {
  switch (type) {
    case "build":
      return parseWith(buildConfigSchema, type, value);
    case "router":
      return parseWith(routerConfigSchema, type, value);
    case "otp":
      return parseWith(otpConfigSchema, type, value);
  }
}

/** A fresh copy of the default document for the given file. */
export function makeConfig(type: "build"): BuildConfig;
export function makeConfig(type: "router"): RouterConfig;
export function makeConfig(type: "otp"): OtpConfig;
export function makeConfig(type: ConfigType): EngineConfig;
export function makeConfig(type: ConfigType): EngineConfig {
  switch (type) {
    case "build":
      return validateConfig(type, buildTemplate);
    case "router":
      return validateConfig(type, routerTemplate);
    case "otp":
      return validateConfig(type, otpTemplate);
  }
}

export function isConfigType(value: string): value is ConfigType {
  return value === "build" || value === "router" || value === "otp";
}

/**
 * Validate and write a config file into the router's graph directory.
 * Returns the path written.
 */
export async function writeConfig(
  fs: IFileSystem,
  type: ConfigType,
  config: unknown,
  location: { dir: string; router: string }
): Promise<string> {
  const document = validateConfig(type, config);
  const target = graphDir(location.dir, location.router);
  await fs.mkdir(target, { recursive: true });
  const filePath = `${target}/${CONFIG_FILE_NAMES[type]}`;
  await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`);
  return filePath;
}

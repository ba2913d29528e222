export { connect, makeConnection, RouterClient } from "./client/connection";
export type { ConnectOptions, OtpConnection } from "./client/connection";
export { TripPlanner, pairPlaces, itinerariesToFeatures } from "./client/TripPlanner";
export type {
  PlanRequest,
  PlanResult,
  BatchPlanRequest,
  BatchPlanResult,
  PlaceInput,
  TripLegFeature,
  TripLegProperties,
} from "./client/TripPlanner";
export { IsochroneClient, DEFAULT_CUTOFFS_SEC } from "./client/IsochroneClient";
export type { IsochroneRequest, IsochroneCollection } from "./client/IsochroneClient";
export { Geocoder } from "./client/Geocoder";
export type { GeocodeRequest, GeocodeCollection } from "./client/Geocoder";
export { decodePolyline, encodePolyline } from "./client/polyline";
export { defaultRoutingOptions, validateRoutingOptions, routingOptionsToQuery } from "./client/routingOptions";
export type { RoutingOptions } from "./client/routingOptions";
export { normalizeModes } from "./client/modes";
export type { LngLat } from "./client/coordinates";

export { buildGraph } from "./engine/buildGraph";
export type { BuildGraphOptions, BuildGraphResult } from "./engine/buildGraph";
export { setupEngine, DEFAULT_STARTUP_TIMING } from "./engine/setup";
export type { SetupOptions, SetupResult, StartupTiming } from "./engine/setup";
export { stopEngine } from "./engine/stop";
export type { StopOptions, StopResult } from "./engine/stop";
export { ReadinessPoller } from "./engine/ReadinessPoller";
export { runSetupChecks } from "./engine/checks";
export { checkJava, parseJavaVersion } from "./engine/java";
export { buildGraphCommand, serverCommand, stopCommands, browserCommand } from "./engine/commands";
export type { EngineCommand } from "./engine/commands";
export { detectPlatform } from "./engine/platform";
export type { Platform } from "./engine/platform";
export { makeConfig, validateConfig, writeConfig } from "./engine/engineConfig";
export type { ConfigType, BuildConfig, RouterConfig, OtpConfig } from "./engine/engineConfig";

export { FetchHttpClient } from "./http/FetchHttpClient";
export type { IHttpClient, HttpResponse } from "./http/IHttpClient";
export { ConsoleLogger, FileLogger, CompositeLogger, InMemoryLogger } from "./logging";
export type { ILogger, LogLevel } from "./logging";
export { resolveConfig, defaultConfig } from "./config";
export type { AppConfig } from "./config";
export { getAppPaths } from "./paths";
export type { AppPaths } from "./paths";

export function getVersion(): string {
  return "0.1.0";
}

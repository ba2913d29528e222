import type { IHttpClient } from "../http/IHttpClient";
import type { ILogger } from "../logging";
import { assertTimeZone, systemTimeZone } from "./dateTime";
import { getJson } from "./request";
import { describeIssues, routerListSchema } from "./schemas";

export interface ConnectOptions {
  hostname?: string;
  router?: string;
  port?: number;
  ssl?: boolean;
  /** Full base URL of a remote OTP (e.g. behind a proxy); replaces hostname/port/ssl. */
  url?: string;
  /** Zone used to send query dates and to report result times. Defaults to the system zone. */
  timezone?: string;
  /** Verify that the router is served before returning. */
  check?: boolean;
  timeoutMs?: number;
}

/** Everything needed to address one router of a running OTP. */
export interface OtpConnection {
  hostname: string;
  router: string;
  port: number;
  ssl: boolean;
  baseUrl: string;
  routerUrl: string;
  timezone: string;
  timeoutMs: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;

export function makeConnection(options: ConnectOptions = {}): OtpConnection {
  const hostname = options.hostname ?? "localhost";
  const router = options.router ?? "default";
  const port = options.port ?? 8080;
  const ssl = options.ssl ?? false;
  const timezone = options.timezone ?? systemTimeZone();

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${port}`);
  }
  if (router.trim() === "") {
    throw new Error("Router name must not be empty");
  }
  assertTimeZone(timezone);

  const baseUrl = options.url
    ? options.url.replace(/\/+$/, "")
    : `${ssl ? "https" : "http"}://${hostname}:${port}`;

  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (err) {
    throw new Error(`Invalid OTP url: ${baseUrl}`, { cause: err });
  }

  return {
    hostname: options.url ? parsed.hostname : hostname,
    router,
    port,
    ssl: options.url ? parsed.protocol === "https:" : ssl,
    baseUrl,
    routerUrl: `${baseUrl}/otp/routers/${encodeURIComponent(router)}`,
    timezone,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
}

export class RouterClient {
  constructor(
    private readonly http: IHttpClient,
    private readonly connection: OtpConnection
  ) {}

  /** IDs of all routers the engine serves. */
  async listRouters(): Promise<string[]> {
    const { baseUrl, timeoutMs } = this.connection;
    const result = await getJson(this.http, `${baseUrl}/otp/routers`, timeoutMs);
    if (!result.ok) {
      throw new Error(`Unable to connect to OTP at ${baseUrl}. ${result.error}`);
    }
    const parsed = routerListSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new Error(`Unexpected router list from OTP: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.routerInfo.map((info) => info.routerId);
  }

  async checkRouter(): Promise<void> {
    const routers = await this.listRouters();
    if (!routers.includes(this.connection.router)) {
      throw new Error(
        `Router ${this.connection.routerUrl} does not exist. Valid routers are: ${routers.join(", ") || "none"}`
      );
    }
  }
}

/**
 * Describe a connection to OTP and, unless check is false, confirm that the
 * router is being served.
 */
export async function connect(
  http: IHttpClient,
  options: ConnectOptions = {},
  logger?: ILogger
): Promise<OtpConnection> {
  const connection = makeConnection(options);
  if (options.check ?? true) {
    await new RouterClient(http, connection).checkRouter();
    logger?.info(`Router ${connection.routerUrl} exists`);
  }
  return connection;
}

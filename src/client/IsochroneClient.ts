import type { Feature, FeatureCollection, MultiPolygon } from "geojson";
import type { IClock } from "../abstractions/IClock";
import { SystemClock } from "../abstractions/SystemClock";
import type { IHttpClient } from "../http/IHttpClient";
import type { OtpConnection } from "./connection";
import { assertLngLat, LngLat, toOtpPlace } from "./coordinates";
import { formatOtpDate, formatOtpTime } from "./dateTime";
import { normalizeModes } from "./modes";
import { getJson } from "./request";
import { RoutingOptions, routingOptionsToQuery, validateRoutingOptions } from "./routingOptions";
import { describeIssues, isochroneResponseSchema } from "./schemas";
import { buildUrl } from "./url";

export interface IsochroneRequest {
  fromPlace: LngLat;
  fromId?: string;
  mode?: string | readonly string[];
  dateTime?: Date;
  /** Travel-time bands in seconds; one polygon is returned per band. */
  cutoffSec?: readonly number[];
  maxWalkDistance?: number;
  routingOptions?: RoutingOptions;
}

export interface IsochroneProperties {
  fromId: string;
  /** Cutoff in seconds. */
  time: number;
}

export type IsochroneCollection = FeatureCollection<MultiPolygon, IsochroneProperties>;

export const DEFAULT_CUTOFFS_SEC: readonly number[] = [600, 1200, 1800, 2400, 3000, 3600];

export class IsochroneClient {
  constructor(
    private readonly http: IHttpClient,
    private readonly connection: OtpConnection,
    private readonly clock: IClock = new SystemClock()
  ) {}

  buildIsochroneUrl(request: IsochroneRequest): string {
    assertLngLat(request.fromPlace, "fromPlace");

    const cutoffs = request.cutoffSec ?? DEFAULT_CUTOFFS_SEC;
    if (cutoffs.length === 0) {
      throw new Error("At least one cutoff is required");
    }
    for (const cutoff of cutoffs) {
      if (!Number.isInteger(cutoff) || cutoff <= 0) {
        throw new Error(`Cutoffs must be positive whole seconds, got ${cutoff}`);
      }
    }
    if (request.maxWalkDistance !== undefined && !(request.maxWalkDistance > 0)) {
      throw new Error(`maxWalkDistance must be positive, got ${request.maxWalkDistance}`);
    }

    const routingOptions = validateRoutingOptions(request.routingOptions ?? {});
    const dateTime = request.dateTime ?? this.clock.now();
    const { timezone } = this.connection;

    return buildUrl(`${this.connection.routerUrl}/isochrone`, {
      fromPlace: toOtpPlace(request.fromPlace),
      mode: normalizeModes(request.mode),
      date: formatOtpDate(dateTime, timezone),
      time: formatOtpTime(dateTime, timezone),
      maxWalkDistance: request.maxWalkDistance,
      cutoffSec: cutoffs,
      ...routingOptionsToQuery(routingOptions),
    });
  }

  async isochrone(request: IsochroneRequest): Promise<IsochroneCollection> {
    const url = this.buildIsochroneUrl(request);
    const fromId = request.fromId ?? toOtpPlace(request.fromPlace);

    const result = await getJson(this.http, url, this.connection.timeoutMs);
    if (!result.ok) {
      throw new Error(`Isochrone from ${fromId} failed: ${result.error}`);
    }

    const parsed = isochroneResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new Error(`Unexpected isochrone response from OTP: ${describeIssues(parsed.error)}`);
    }

    return {
      type: "FeatureCollection",
      features: parsed.data.features.map(
        (feature): Feature<MultiPolygon, IsochroneProperties> => ({
          type: "Feature",
          geometry: { type: "MultiPolygon", coordinates: feature.geometry.coordinates },
          properties: { fromId, time: feature.properties.time },
        })
      ),
    };
  }
}

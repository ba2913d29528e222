import type { Feature, FeatureCollection, LineString } from "geojson";
import type { IClock } from "../abstractions/IClock";
import { SystemClock } from "../abstractions/SystemClock";
import type { IHttpClient } from "../http/IHttpClient";
import type { ILogger } from "../logging";
import { mapWithConcurrency } from "../utils/mapWithConcurrency";
import type { OtpConnection } from "./connection";
import { assertLngLat, LngLat, toOtpPlace } from "./coordinates";
import { formatEpochMs, formatOtpDate, formatOtpTime } from "./dateTime";
import { normalizeModes } from "./modes";
import { decodePolyline } from "./polyline";
import { getJson } from "./request";
import { RoutingOptions, routingOptionsToQuery, validateRoutingOptions } from "./routingOptions";
import { describeIssues, OtpItinerary, planResponseSchema } from "./schemas";
import { buildUrl } from "./url";

/** One row of a plan result: itinerary columns repeated on each of its legs. */
export interface TripLegProperties {
  fromId: string;
  toId: string;
  /** 1-based itinerary index within the plan. */
  routeOption: number;
  /** 1-based leg index within the itinerary. */
  legIndex: number;
  itineraryDuration: number;
  itineraryStartTime: string;
  itineraryEndTime: string;
  walkTime: number;
  transitTime: number;
  waitingTime: number;
  walkDistance: number;
  transfers: number;
  mode: string;
  route: string | null;
  routeShortName: string | null;
  agencyName: string | null;
  tripId: string | null;
  distance: number;
  duration: number;
  startTime: string;
  endTime: string;
  fromName: string | null;
  fromStopId: string | null;
  toName: string | null;
  toStopId: string | null;
  transitLeg: boolean;
}

export type TripLegFeature = Feature<LineString | null, TripLegProperties>;

export interface PlanRequest {
  fromPlace: LngLat;
  toPlace: LngLat;
  fromId?: string;
  toId?: string;
  mode?: string | readonly string[];
  /** Departure time, or arrival time when arriveBy is set. Defaults to now. */
  dateTime?: Date;
  arriveBy?: boolean;
  maxWalkDistance?: number;
  numItineraries?: number;
  routingOptions?: RoutingOptions;
  /** Decode leg geometries; when false every feature has a null geometry. */
  getGeometry?: boolean;
}

export interface PlanResult {
  success: boolean;
  fromId: string;
  toId: string;
  features: TripLegFeature[];
  error?: string;
}

export interface PlaceInput {
  id?: string;
  coordinates: LngLat;
}

export interface BatchPlanRequest
  extends Omit<PlanRequest, "fromPlace" | "toPlace" | "fromId" | "toId"> {
  from: readonly PlaceInput[];
  to: readonly PlaceInput[];
}

export interface PlanFailure {
  fromId: string;
  toId: string;
  error: string;
}

export interface BatchPlanResult {
  collection: FeatureCollection<LineString | null, TripLegProperties>;
  failures: PlanFailure[];
  planned: number;
}

const DEFAULT_MAX_WALK_DISTANCE = 1000;
const DEFAULT_NUM_ITINERARIES = 3;

/**
 * Pair origins with destinations: equal-length lists pair by position, and a
 * single place on either side is used for every pair.
 */
export function pairPlaces(
  from: readonly PlaceInput[],
  to: readonly PlaceInput[]
): Array<[PlaceInput, PlaceInput]> {
  if (from.length === 0 || to.length === 0) {
    throw new Error("Both origins and destinations are required");
  }
  if (from.length === to.length) {
    return from.map((origin, i): [PlaceInput, PlaceInput] => [origin, to[i]]);
  }
  if (from.length === 1) {
    return to.map((destination): [PlaceInput, PlaceInput] => [from[0], destination]);
  }
  if (to.length === 1) {
    return from.map((origin): [PlaceInput, PlaceInput] => [origin, to[0]]);
  }
  throw new Error(
    `Cannot pair ${from.length} origins with ${to.length} destinations; give equal numbers or a single place on one side`
  );
}

function orNull(value: string | undefined): string | null {
  return value === undefined || value === "" ? null : value;
}

export function itinerariesToFeatures(
  itineraries: readonly OtpItinerary[],
  ids: { fromId: string; toId: string },
  timezone: string,
  getGeometry: boolean
): TripLegFeature[] {
  return itineraries.flatMap((itinerary, i) =>
    itinerary.legs.map((leg, j): TripLegFeature => ({
      type: "Feature",
      geometry:
        getGeometry && leg.legGeometry
          ? { type: "LineString", coordinates: decodePolyline(leg.legGeometry.points) }
          : null,
      properties: {
        fromId: ids.fromId,
        toId: ids.toId,
        routeOption: i + 1,
        legIndex: j + 1,
        itineraryDuration: itinerary.duration,
        itineraryStartTime: formatEpochMs(itinerary.startTime, timezone),
        itineraryEndTime: formatEpochMs(itinerary.endTime, timezone),
        walkTime: itinerary.walkTime,
        transitTime: itinerary.transitTime,
        waitingTime: itinerary.waitingTime,
        walkDistance: itinerary.walkDistance,
        transfers: itinerary.transfers,
        mode: leg.mode,
        route: orNull(leg.route),
        routeShortName: orNull(leg.routeShortName),
        agencyName: orNull(leg.agencyName),
        tripId: orNull(leg.tripId),
        distance: leg.distance,
        duration: leg.duration,
        startTime: formatEpochMs(leg.startTime, timezone),
        endTime: formatEpochMs(leg.endTime, timezone),
        fromName: orNull(leg.from.name),
        fromStopId: orNull(leg.from.stopId),
        toName: orNull(leg.to.name),
        toStopId: orNull(leg.to.stopId),
        transitLeg: leg.transitLeg ?? false,
      },
    }))
  );
}

export class TripPlanner {
  constructor(
    private readonly http: IHttpClient,
    private readonly connection: OtpConnection,
    private readonly clock: IClock = new SystemClock(),
    private readonly logger?: ILogger
  ) {}

  /** Validates the request and returns the plan URL; throws on bad input. */
  buildPlanUrl(request: PlanRequest): string {
    assertLngLat(request.fromPlace, "fromPlace");
    assertLngLat(request.toPlace, "toPlace");

    const numItineraries = request.numItineraries ?? DEFAULT_NUM_ITINERARIES;
    if (!Number.isInteger(numItineraries) || numItineraries < 1) {
      throw new Error(`numItineraries must be a positive integer, got ${numItineraries}`);
    }
    const maxWalkDistance = request.maxWalkDistance ?? DEFAULT_MAX_WALK_DISTANCE;
    if (!(maxWalkDistance > 0)) {
      throw new Error(`maxWalkDistance must be positive, got ${maxWalkDistance}`);
    }

    const routingOptions = validateRoutingOptions(request.routingOptions ?? {});
    const dateTime = request.dateTime ?? this.clock.now();
    const { timezone } = this.connection;

    return buildUrl(`${this.connection.routerUrl}/plan`, {
      fromPlace: toOtpPlace(request.fromPlace),
      toPlace: toOtpPlace(request.toPlace),
      mode: normalizeModes(request.mode),
      date: formatOtpDate(dateTime, timezone),
      time: formatOtpTime(dateTime, timezone),
      arriveBy: request.arriveBy ?? false,
      maxWalkDistance,
      numItineraries,
      ...routingOptionsToQuery(routingOptions),
    });
  }

  async plan(request: PlanRequest): Promise<PlanResult> {
    const url = this.buildPlanUrl(request);
    return this.fetchPlan(url, {
      fromId: request.fromId ?? toOtpPlace(request.fromPlace),
      toId: request.toId ?? toOtpPlace(request.toPlace),
    }, request.getGeometry ?? true);
  }

  /**
   * Plan every origin/destination pair. Input is validated before any request
   * is sent; a pair that fails is reported in `failures` and the rest go on.
   */
  async planMany(
    request: BatchPlanRequest,
    options: { concurrency?: number } = {}
  ): Promise<BatchPlanResult> {
    const { from, to, ...shared } = request;
    const jobs = pairPlaces(from, to).map(([origin, destination]) => {
      const single: PlanRequest = {
        ...shared,
        fromPlace: origin.coordinates,
        toPlace: destination.coordinates,
      };
      return {
        url: this.buildPlanUrl(single),
        ids: {
          fromId: origin.id ?? toOtpPlace(origin.coordinates),
          toId: destination.id ?? toOtpPlace(destination.coordinates),
        },
      };
    });

    const getGeometry = request.getGeometry ?? true;
    const results = await mapWithConcurrency(jobs, options.concurrency ?? 1, async (job): Promise<PlanResult> => {
      try {
        return await this.fetchPlan(job.url, job.ids, getGeometry);
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        return { success: false, ...job.ids, features: [], error };
      }
    });

    const failures: PlanFailure[] = [];
    const features: TripLegFeature[] = [];
    for (const result of results) {
      if (result.success) {
        features.push(...result.features);
      } else {
        failures.push({ fromId: result.fromId, toId: result.toId, error: result.error ?? "Unknown error" });
      }
    }

    this.logger?.info(
      `Planned ${results.length} trips: ${results.length - failures.length} succeeded, ${failures.length} failed`
    );

    return {
      collection: { type: "FeatureCollection", features },
      failures,
      planned: results.length,
    };
  }

  private async fetchPlan(
    url: string,
    ids: { fromId: string; toId: string },
    getGeometry: boolean
  ): Promise<PlanResult> {
    const fail = (error: string): PlanResult => {
      this.logger?.debug(`Plan ${ids.fromId} -> ${ids.toId} failed: ${error}`);
      return { success: false, ...ids, features: [], error };
    };

    this.logger?.debug(`GET ${url}`);
    const result = await getJson(this.http, url, this.connection.timeoutMs);
    if (!result.ok) {
      return fail(result.error);
    }

    const parsed = planResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      return fail(`Unexpected plan response from OTP: ${describeIssues(parsed.error)}`);
    }

    const { plan, error } = parsed.data;
    if (error) {
      return fail(error.msg ?? error.message ?? `OTP error ${error.id ?? "without id"}`);
    }
    if (!plan || plan.itineraries.length === 0) {
      return fail("OTP returned no itineraries");
    }

    try {
      const features = itinerariesToFeatures(plan.itineraries, ids, this.connection.timezone, getGeometry);
      return { success: true, ...ids, features };
    } catch (err) {
      return fail(`Could not read leg geometry: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

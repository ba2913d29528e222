import type { Feature, FeatureCollection, Point } from "geojson";
import type { IHttpClient } from "../http/IHttpClient";
import type { OtpConnection } from "./connection";
import { getJson } from "./request";
import { describeIssues, geocodeResponseSchema } from "./schemas";
import { buildUrl } from "./url";

export interface GeocodeRequest {
  query: string;
  /** Match on prefixes, for search-as-you-type. */
  autocomplete?: boolean;
  stops?: boolean;
  clusters?: boolean;
  /** Street corners such as "Main St & 1st Ave". */
  corners?: boolean;
}

export interface GeocodeProperties {
  description: string;
  id: string;
}

export type GeocodeCollection = FeatureCollection<Point, GeocodeProperties>;

/** Looks up stops, stop clusters and street corners by name. */
export class Geocoder {
  constructor(
    private readonly http: IHttpClient,
    private readonly connection: OtpConnection
  ) {}

  buildGeocodeUrl(request: GeocodeRequest): string {
    const query = request.query.trim();
    if (query === "") {
      throw new Error("Geocode query must not be empty");
    }
    return buildUrl(`${this.connection.routerUrl}/geocode`, {
      query,
      autocomplete: request.autocomplete ?? false,
      stops: request.stops ?? true,
      clusters: request.clusters ?? false,
      corners: request.corners ?? true,
    });
  }

  async geocode(request: GeocodeRequest): Promise<GeocodeCollection> {
    const url = this.buildGeocodeUrl(request);
    const result = await getJson(this.http, url, this.connection.timeoutMs);
    if (!result.ok) {
      throw new Error(`Geocode "${request.query}" failed: ${result.error}`);
    }

    const parsed = geocodeResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new Error(`Unexpected geocode response from OTP: ${describeIssues(parsed.error)}`);
    }

    return {
      type: "FeatureCollection",
      features: parsed.data.map(
        (match): Feature<Point, GeocodeProperties> => ({
          type: "Feature",
          geometry: { type: "Point", coordinates: [match.lng, match.lat] },
          properties: { description: match.description, id: match.id },
        })
      ),
    };
  }
}

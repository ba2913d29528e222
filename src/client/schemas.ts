import { z } from "zod";

/**
 * Shapes of the OTP 1.x REST responses this package reads. Unknown fields are
 * kept (passthrough) so newer engine releases do not break parsing.
 */

export const routerListSchema = z
  .object({
    routerInfo: z.array(z.object({ routerId: z.string() }).passthrough()),
  })
  .passthrough();

const placeSchema = z
  .object({
    name: z.string().optional(),
    lon: z.number(),
    lat: z.number(),
    stopId: z.string().optional(),
    stopCode: z.string().optional(),
    vertexType: z.string().optional(),
  })
  .passthrough();

const legSchema = z
  .object({
    startTime: z.number(),
    endTime: z.number(),
    distance: z.number(),
    duration: z.number(),
    mode: z.string(),
    route: z.string().optional(),
    routeShortName: z.string().optional(),
    routeLongName: z.string().optional(),
    agencyName: z.string().optional(),
    tripId: z.string().optional(),
    transitLeg: z.boolean().optional(),
    realTime: z.boolean().optional(),
    from: placeSchema,
    to: placeSchema,
    legGeometry: z
      .object({ points: z.string(), length: z.number().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const itinerarySchema = z
  .object({
    duration: z.number(),
    startTime: z.number(),
    endTime: z.number(),
    walkTime: z.number(),
    transitTime: z.number(),
    waitingTime: z.number(),
    walkDistance: z.number(),
    transfers: z.number(),
    legs: z.array(legSchema),
  })
  .passthrough();

export const planResponseSchema = z
  .object({
    plan: z
      .object({
        date: z.number().optional(),
        itineraries: z.array(itinerarySchema),
      })
      .passthrough()
      .optional(),
    error: z
      .object({
        id: z.number().optional(),
        msg: z.string().optional(),
        message: z.string().optional(),
        noPath: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type PlanResponse = z.infer<typeof planResponseSchema>;
export type OtpItinerary = z.infer<typeof itinerarySchema>;
export type OtpLeg = z.infer<typeof legSchema>;

export const isochroneResponseSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(
    z
      .object({
        type: z.literal("Feature"),
        geometry: z.object({
          type: z.literal("MultiPolygon"),
          coordinates: z.array(z.array(z.array(z.array(z.number())))),
        }),
        properties: z.object({ time: z.coerce.number() }).passthrough(),
      })
      .passthrough()
  ),
});

export const geocodeResponseSchema = z.array(
  z
    .object({
      lat: z.number(),
      lng: z.number(),
      description: z.string(),
      id: z.string(),
    })
    .passthrough()
);

/** Render zod issues as "path: message; path: message". */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

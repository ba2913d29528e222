import { z } from "zod";
import { describeIssues } from "./schemas";
import type { QueryParams } from "./url";

const positive = z.number().positive();
const nonNegativeInt = z.number().int().nonnegative();
const fraction = z.number().min(0).max(1);

/**
 * Routing parameters of the OTP 1.x plan and isochrone resources. Every field
 * is optional; anything left out takes the router's own default.
 */
export const routingOptionsSchema = z
  .object({
    walkReluctance: positive,
    walkSpeed: positive,
    bikeSpeed: positive,
    carSpeed: positive,
    maxPreTransitTime: nonNegativeInt,
    walkBoardCost: nonNegativeInt,
    bikeBoardCost: nonNegativeInt,
    transferPenalty: nonNegativeInt,
    minTransferTime: nonNegativeInt,
    maxTransfers: nonNegativeInt,
    waitReluctance: positive,
    waitAtBeginningFactor: fraction,
    clampInitialWait: z.number().int(),
    stairsReluctance: positive,
    turnReluctance: z.number().nonnegative(),
    wheelchair: z.boolean(),
    optimize: z.enum(["QUICK", "SAFE", "FLAT", "GREENWAYS", "TRIANGLE", "TRANSFERS"]),
    triangleSafetyFactor: fraction,
    triangleSlopeFactor: fraction,
    triangleTimeFactor: fraction,
    softWalkLimiting: z.boolean(),
    reverseOptimizeOnTheFly: z.boolean(),
    allowBikeRental: z.boolean(),
    bikeSwitchTime: nonNegativeInt,
    bikeSwitchCost: nonNegativeInt,
    preferredRoutes: z.string(),
    unpreferredRoutes: z.string(),
    bannedRoutes: z.string(),
    otherThanPreferredRoutesPenalty: nonNegativeInt,
    showIntermediateStops: z.boolean(),
    ignoreRealtimeUpdates: z.boolean(),
    disableRemainingWeightHeuristic: z.boolean(),
    locale: z.string(),
  })
  .partial()
  .strict()
  .superRefine((options, ctx) => {
    const factors = [
      options.triangleSafetyFactor,
      options.triangleSlopeFactor,
      options.triangleTimeFactor,
    ];
    const given = factors.filter((f): f is number => f !== undefined);
    if (given.length > 0 && options.optimize !== "TRIANGLE") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["optimize"],
        message: "triangle factors require optimize TRIANGLE",
      });
    }
    if (options.optimize === "TRIANGLE") {
      const sum = given.reduce((a, b) => a + b, 0);
      if (given.length !== 3 || Math.abs(sum - 1) > 1e-6) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["optimize"],
          message: "optimize TRIANGLE needs safety, slope and time factors summing to 1",
        });
      }
    }
  });

export type RoutingOptions = z.infer<typeof routingOptionsSchema>;

export function defaultRoutingOptions(): RoutingOptions {
  return {};
}

/** Parse user-supplied options, throwing one message that lists every bad field. */
export function validateRoutingOptions(value: unknown): RoutingOptions {
  const result = routingOptionsSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid routing options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function routingOptionsToQuery(options: RoutingOptions = {}): QueryParams {
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) query[key] = value;
  }
  return query;
}

/** Small hand-made OTP 1.x response bodies for client tests. */

export const LEG_POINTS = "_p~iF~ps|U_ulLnnqC_mqNvxq`@";

// 2025-06-15T08:00:00Z
export const T0 = Date.UTC(2025, 5, 15, 8, 0, 0);

export function walkLeg(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    startTime: T0,
    endTime: T0 + 300_000,
    distance: 400.5,
    duration: 300,
    mode: "WALK",
    route: "",
    transitLeg: false,
    from: { name: "Origin", lon: -1.55, lat: 53.8 },
    to: { name: "Stop A", lon: -1.54, lat: 53.81, stopId: "1:A" },
    legGeometry: { points: LEG_POINTS, length: 3 },
    ...overrides,
  };
}

export function busLeg(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    startTime: T0 + 420_000,
    endTime: T0 + 1_200_000,
    distance: 5200,
    duration: 780,
    mode: "BUS",
    route: "Line 7",
    routeShortName: "7",
    agencyName: "Test Buses",
    tripId: "1:trip-7",
    transitLeg: true,
    from: { name: "Stop A", lon: -1.54, lat: 53.81, stopId: "1:A" },
    to: { name: "Stop B", lon: -1.5, lat: 53.9, stopId: "1:B" },
    legGeometry: { points: LEG_POINTS, length: 3 },
    ...overrides,
  };
}

export function itinerary(legs: unknown[], overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    duration: 1200,
    startTime: T0,
    endTime: T0 + 1_200_000,
    walkTime: 300,
    transitTime: 780,
    waitingTime: 120,
    walkDistance: 400.5,
    transfers: 0,
    legs,
    ...overrides,
  };
}

export function planBody(itineraries: unknown[]): Record<string, unknown> {
  return { requestParameters: {}, plan: { date: T0, itineraries } };
}

export function planError(msg: string, id = 404): Record<string, unknown> {
  return { requestParameters: {}, error: { id, msg, message: "PATH_NOT_FOUND", noPath: true } };
}

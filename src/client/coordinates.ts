/** A position as GeoJSON orders it: longitude first. */
export type LngLat = [number, number];

export function assertLngLat(value: LngLat, label: string): void {
  const [lng, lat] = value;
  if (!Number.isFinite(lng) || !Number.isFinite(lat)) {
    throw new Error(`${label} must be a pair of finite numbers, got ${JSON.stringify(value)}`);
  }
  if (lat < -90 || lat > 90) {
    throw new Error(`${label} latitude out of range: ${lat}`);
  }
  if (lng < -180 || lng > 180) {
    throw new Error(`${label} longitude out of range: ${lng}`);
  }
}

/** OTP takes places as "lat,lng". */
export function toOtpPlace(value: LngLat): string {
  const [lng, lat] = value;
  return `${lat},${lng}`;
}

/** Parse "lng,lat" as typed on the command line. */
export function parseLngLat(text: string, label = "coordinate"): LngLat {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 2 || parts.some((part) => part === "")) {
    throw new Error(`${label} must look like "lng,lat", got "${text}"`);
  }
  const value: LngLat = [Number(parts[0]), Number(parts[1])];
  assertLngLat(value, label);
  return value;
}

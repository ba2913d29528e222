const BASE_MODES = [
  "TRANSIT",
  "WALK",
  "BICYCLE",
  "CAR",
  "BUS",
  "RAIL",
  "SUBWAY",
  "TRAM",
  "FERRY",
  "CABLE_CAR",
  "GONDOLA",
  "FUNICULAR",
  "AIRPLANE",
] as const;

/** Qualified street modes OTP 1.x accepts, e.g. BICYCLE_RENT. */
const QUALIFIED_MODES = ["BICYCLE_RENT", "BICYCLE_PARK", "CAR_PARK", "CAR_RENT"] as const;

const ALLOWED = new Set<string>([...BASE_MODES, ...QUALIFIED_MODES]);

export const DEFAULT_MODES = ["TRANSIT", "WALK"];

/**
 * Normalise a mode list to OTP's comma-joined form. Accepts either an array
 * or a comma-separated string; case-insensitive; duplicates dropped.
 */
export function normalizeModes(mode: string | readonly string[] = DEFAULT_MODES): string {
  const raw = typeof mode === "string" ? mode.split(",") : mode;
  const modes: string[] = [];
  for (const entry of raw) {
    const upper = entry.trim().toUpperCase();
    if (upper === "") continue;
    if (!ALLOWED.has(upper)) {
      throw new Error(`Invalid mode "${entry}". Valid modes are: ${[...ALLOWED].join(", ")}`);
    }
    if (!modes.includes(upper)) modes.push(upper);
  }
  if (modes.length === 0) {
    throw new Error("At least one mode is required");
  }
  return modes.join(",");
}

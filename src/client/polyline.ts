import type { Position } from "geojson";

/**
 * Google encoded polyline format, as used by OTP for legGeometry.points.
 * Positions come out GeoJSON-ordered: [lng, lat].
 */
export function decodePolyline(encoded: string, precision = 5): Position[] {
  const factor = 10 ** precision;
  const positions: Position[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  const readValue = (): number => {
    const start = index;
    let result = 0;
    let shift = 0;
    let chunk: number;
    do {
      // Six 5-bit chunks hold any 32-bit value; a seventh would overflow the shift.
      if (shift > 25) {
        throw new Error(`Polyline value at offset ${start} is longer than 6 chunks`);
      }
      if (index >= encoded.length) {
        throw new Error(`Truncated polyline at offset ${index}`);
      }
      chunk = encoded.charCodeAt(index) - 63;
      if (chunk < 0 || chunk > 63) {
        throw new Error(`Invalid polyline character "${encoded[index]}" at offset ${index}`);
      }
      index++;
      result |= (chunk & 0x1f) << shift;
      shift += 5;
    } while (chunk >= 0x20);
    return result & 1 ? ~(result >> 1) : result >> 1;
  };

  while (index < encoded.length) {
    lat += readValue();
    lng += readValue();
    positions.push([lng / factor, lat / factor]);
  }

  return positions;
}

function encodeValue(value: number): string {
  let shifted = value < 0 ? ~(value << 1) : value << 1;
  let out = "";
  while (shifted >= 0x20) {
    out += String.fromCharCode((0x20 | (shifted & 0x1f)) + 63);
    shifted >>= 5;
  }
  return out + String.fromCharCode(shifted + 63);
}

export function encodePolyline(positions: readonly Position[], precision = 5): string {
  const factor = 10 ** precision;
  let prevLat = 0;
  let prevLng = 0;
  let out = "";

  for (const position of positions) {
    const [lng, lat] = position;
    if (lng === undefined || lat === undefined) {
      throw new Error(`Position needs two coordinates, got ${JSON.stringify(position)}`);
    }
    const scaledLat = Math.round(lat * factor);
    const scaledLng = Math.round(lng * factor);
    out += encodeValue(scaledLat - prevLat) + encodeValue(scaledLng - prevLng);
    prevLat = scaledLat;
    prevLng = scaledLng;
  }

  return out;
}

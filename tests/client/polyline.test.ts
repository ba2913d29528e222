import { decodePolyline, encodePolyline } from "../../src/client/polyline";

const ENCODED = "_p~iF~ps|U_ulLnnqC_mqNvxq`@";
const POSITIONS = [
  [-120.2, 38.5],
  [-120.95, 40.7],
  [-126.453, 43.252],
];

describe("decodePolyline", () => {
  it("decodes to [lng, lat] positions", () => {
    expect(decodePolyline(ENCODED)).toEqual(POSITIONS);
  });

  it("decodes an empty string to no positions", () => {
    expect(decodePolyline("")).toEqual([]);
  });

  it("honours the precision", () => {
    const [first] = decodePolyline(encodePolyline([[8.5, 47.25]], 6), 6);

    expect(first).toEqual([8.5, 47.25]);
  });

  it("rejects a truncated string", () => {
    expect(() => decodePolyline("_p~iF")).toThrow("Truncated polyline at offset 5");
  });

  it("rejects a value longer than six chunks", () => {
    expect(() => decodePolyline("~~~~~~~~~~??")).toThrow("Polyline value at offset 0 is longer than 6 chunks");
    expect(() => decodePolyline("_p~iF~~~~~~~?")).toThrow("Polyline value at offset 5 is longer than 6 chunks");
  });

  it("rejects characters outside the alphabet", () => {
    expect(() => decodePolyline(" p~iF")).toThrow('Invalid polyline character " " at offset 0');
  });
});

describe("encodePolyline", () => {
  it("encodes [lng, lat] positions", () => {
    expect(encodePolyline(POSITIONS)).toBe(ENCODED);
  });

  it("rejects a position without two coordinates", () => {
    expect(() => encodePolyline([[1]])).toThrow("Position needs two coordinates, got [1]");
  });
});

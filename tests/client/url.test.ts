import { buildUrl } from "../../src/client/url";

describe("buildUrl", () => {
  it("appends scalar parameters", () => {
    expect(buildUrl("http://localhost:8080/otp/routers/default/plan", { arriveBy: false, numItineraries: 3 })).toBe(
      "http://localhost:8080/otp/routers/default/plan?arriveBy=false&numItineraries=3"
    );
  });

  it("repeats the key for array values", () => {
    const url = new URL(buildUrl("http://localhost:8080/iso", { cutoffSec: [600, 1200] }));

    expect(url.searchParams.getAll("cutoffSec")).toEqual(["600", "1200"]);
  });

  it("leaves out undefined values", () => {
    expect(buildUrl("http://localhost:8080/x", { a: undefined, b: "1" })).toBe("http://localhost:8080/x?b=1");
  });

  it("encodes commas and spaces", () => {
    const url = buildUrl("http://localhost:8080/x", { fromPlace: "51.5,-0.1", query: "Main St" });

    expect(new URL(url).searchParams.get("fromPlace")).toBe("51.5,-0.1");
    expect(new URL(url).searchParams.get("query")).toBe("Main St");
  });
});

import {
  defaultRoutingOptions,
  routingOptionsToQuery,
  validateRoutingOptions,
} from "../../src/client/routingOptions";

describe("routing options", () => {
  it("defaults to an empty set", () => {
    expect(defaultRoutingOptions()).toEqual({});
  });

  it("accepts valid options", () => {
    expect(validateRoutingOptions({ walkSpeed: 1.2, wheelchair: true, optimize: "QUICK" })).toEqual({
      walkSpeed: 1.2,
      wheelchair: true,
      optimize: "QUICK",
    });
  });

  it("lists every invalid field", () => {
    expect(() => validateRoutingOptions({ walkSpeed: -1, maxTransfers: 1.5 })).toThrow(
      "Invalid routing options: walkSpeed: Number must be greater than 0; maxTransfers: Expected integer, received float"
    );
  });

  it("rejects unknown fields", () => {
    expect(() => validateRoutingOptions({ walkSpeeed: 1 })).toThrow("Invalid routing options: (root): Unrecognized key(s) in object: 'walkSpeeed'");
  });

  it("rejects triangle factors without optimize TRIANGLE", () => {
    expect(() => validateRoutingOptions({ triangleSafetyFactor: 0.5 })).toThrow(
      "optimize: triangle factors require optimize TRIANGLE"
    );
  });

  it("requires triangle factors to sum to 1", () => {
    expect(() =>
      validateRoutingOptions({
        optimize: "TRIANGLE",
        triangleSafetyFactor: 0.5,
        triangleSlopeFactor: 0.5,
        triangleTimeFactor: 0.5,
      })
    ).toThrow("optimize TRIANGLE needs safety, slope and time factors summing to 1");

    expect(
      validateRoutingOptions({
        optimize: "TRIANGLE",
        triangleSafetyFactor: 0.2,
        triangleSlopeFactor: 0.3,
        triangleTimeFactor: 0.5,
      }).optimize
    ).toBe("TRIANGLE");
  });

  it("turns options into query parameters", () => {
    expect(routingOptionsToQuery({ walkReluctance: 3, wheelchair: false })).toEqual({
      walkReluctance: 3,
      wheelchair: false,
    });
  });
});

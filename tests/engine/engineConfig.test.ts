import { InMemoryFileSystem } from "../../src/abstractions/InMemoryFileSystem";
import { isConfigType, makeConfig, validateConfig, writeConfig } from "../../src/engine/engineConfig";

describe("makeConfig", () => {
  it("returns the router defaults", () => {
    const config = makeConfig("router");

    expect(config.timeouts).toEqual([5, 4, 2]);
    expect(config.routingDefaults?.walkSpeed).toBe(1.34);
    expect(config.updaters).toEqual([]);
  });

  it("returns the build defaults", () => {
    const config = makeConfig("build");

    expect(config.transit).toBe(true);
    expect(config.osmWayPropertySet).toBe("default");
  });

  it("returns the otp defaults", () => {
    expect(makeConfig("otp").otpFeatures?.APIServerInfo).toBe(true);
  });

  it("holds only OTP 2.x feature toggles in the otp defaults", () => {
    expect(Object.keys(makeConfig("otp"))).toEqual(["otpFeatures"]);
  });

  it("hands out independent copies", () => {
    const first = makeConfig("router");
    first.timeouts?.push(1);

    expect(makeConfig("router").timeouts).toEqual([5, 4, 2]);
  });
});

describe("validateConfig", () => {
  it("names each invalid field", () => {
    expect(() => validateConfig("build", { transit: "yes", subwayAccessTime: -1 })).toThrow(
      "Invalid build config: transit: Expected boolean, received string; subwayAccessTime: Number must be greater than or equal to 0"
    );
  });

  it("keeps fields it does not know", () => {
    expect(validateConfig("router", { timeouts: [3], customField: "kept" })).toEqual({
      timeouts: [3],
      customField: "kept",
    });
  });

  it("rejects an empty timeout list", () => {
    expect(() => validateConfig("router", { timeouts: [] })).toThrow("Invalid router config: timeouts:");
  });
});

describe("isConfigType", () => {
  it("accepts the three file types", () => {
    expect(["build", "router", "otp", "graph"].map(isConfigType)).toEqual([true, true, true, false]);
  });
});

describe("writeConfig", () => {
  it("writes pretty JSON into the router directory", async () => {
    const fs = new InMemoryFileSystem();

    const written = await writeConfig(fs, "otp", { otpFeatures: { APIServerInfo: false } }, { dir: "/otp/", router: "default" });

    expect(written).toBe("/otp/graphs/default/otp-config.json");
    expect(await fs.readFile(written)).toBe('{\n  "otpFeatures": {\n    "APIServerInfo": false\n  }\n}\n');
  });

  it("writes the defaults under the file name for the type", async () => {
    const fs = new InMemoryFileSystem();

    const written = await writeConfig(fs, "router", makeConfig("router"), { dir: "/otp", router: "west" });

    expect(written).toBe("/otp/graphs/west/router-config.json");
    expect(JSON.parse(await fs.readFile(written))).toEqual(makeConfig("router"));
  });

  it("writes nothing when the config is invalid", async () => {
    const fs = new InMemoryFileSystem();

    await expect(writeConfig(fs, "build", { streets: 1 }, { dir: "/otp", router: "default" })).rejects.toThrow(
      "Invalid build config: streets: Expected boolean, received number"
    );
    expect(await fs.exists("/otp/graphs/default/build-config.json")).toBe(false);
  });
});

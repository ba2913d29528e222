import { parseArgs, toPlaces } from "../src/cli";

const argv = (...args: string[]): string[] => ["node", "otp-control", ...args];

describe("parseArgs", () => {
  it("defaults to help", () => {
    expect(parseArgs(argv())).toEqual({ command: "help", from: [], to: [], fromIds: [], toIds: [] });
  });

  it("parses a plan command with repeated places", () => {
    const parsed = parseArgs(
      argv(
        "plan",
        "--from", "-1.5,53.8",
        "--from", "-1.4,53.9",
        "--to", "-1.6,53.7",
        "--from-id", "home",
        "--from-id", "work",
        "--mode", "TRANSIT,WALK",
        "--num-itineraries", "2",
        "--no-geometry",
        "--concurrency", "4"
      )
    );

    expect(parsed).toEqual({
      command: "plan",
      from: ["-1.5,53.8", "-1.4,53.9"],
      to: ["-1.6,53.7"],
      fromIds: ["home", "work"],
      toIds: [],
      mode: "TRANSIT,WALK",
      numItineraries: 2,
      noGeometry: true,
      concurrency: 4,
    });
  });

  it("collects repeated cutoffs", () => {
    const parsed = parseArgs(argv("isochrone", "--from", "0.1,51.5", "--cutoff", "600", "--cutoff", "1200"));

    expect(parsed.cutoffs).toEqual([600, 1200]);
  });

  it("parses engine flags", () => {
    const parsed = parseArgs(
      argv("setup", "--otp", "/opt/otp.jar", "--dir", "/data", "--memory", "4", "--analyst", "--no-wait", "--no-browser")
    );

    expect(parsed).toMatchObject({
      command: "setup",
      otp: "/opt/otp.jar",
      dir: "/data",
      memory: 4,
      analyst: true,
      noWait: true,
      noBrowser: true,
    });
  });

  it("accepts a config type and a log level", () => {
    const parsed = parseArgs(argv("write-config", "--type", "router", "--log-level", "debug"));

    expect(parsed.configType).toBe("router");
    expect(parsed.logLevel).toBe("debug");
  });

  it("lets stop opt out of killing every Java process", () => {
    expect(parseArgs(argv("stop")).killAll).toBeUndefined();
    expect(parseArgs(argv("stop", "--kill-all")).killAll).toBe(true);
    expect(parseArgs(argv("stop", "--no-kill-all")).killAll).toBe(false);
  });

  it("treats --help as the help command", () => {
    expect(parseArgs(argv("--help")).command).toBe("help");
  });

  it("rejects unknown arguments and a second command", () => {
    expect(() => parseArgs(argv("plan", "--frm", "x"))).toThrow("Unknown argument: --frm");
    expect(() => parseArgs(argv("plan", "stop"))).toThrow("Unknown argument: stop");
  });

  it("rejects a flag without its value", () => {
    expect(() => parseArgs(argv("plan", "--from"))).toThrow("--from expects a value");
  });

  it("rejects non-numeric values for numeric flags", () => {
    expect(() => parseArgs(argv("setup", "--port", "eighty"))).toThrow('--port expects a number, got "eighty"');
    expect(() => parseArgs(argv("setup", "--memory", ""))).toThrow('--memory expects a number, got ""');
  });

  it("rejects an unknown config type and log level", () => {
    expect(() => parseArgs(argv("write-config", "--type", "graph"))).toThrow(
      '--type must be build, router or otp, got "graph"'
    );
    expect(() => parseArgs(argv("plan", "--log-level", "trace"))).toThrow(
      '--log-level must be info or debug, got "trace"'
    );
  });
});

describe("toPlaces", () => {
  it("pairs coordinates with ids by position", () => {
    expect(toPlaces(["-1.5,53.8", "-1.4,53.9"], ["a", "b"], "from")).toEqual([
      { id: "a", coordinates: [-1.5, 53.8] },
      { id: "b", coordinates: [-1.4, 53.9] },
    ]);
  });

  it("leaves ids undefined when none are given", () => {
    expect(toPlaces(["-1.5,53.8"], [], "to")).toEqual([{ id: undefined, coordinates: [-1.5, 53.8] }]);
  });

  it("rejects a mismatched number of ids", () => {
    expect(() => toPlaces(["-1.5,53.8", "-1.4,53.9"], ["a"], "from")).toThrow("Got 1 from ids for 2 from places");
  });

  it("rejects a malformed coordinate", () => {
    expect(() => toPlaces(["53.8"], [], "to")).toThrow('to must look like "lng,lat", got "53.8"');
  });
});

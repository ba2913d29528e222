import type { SupportedPlatform } from "./platform";

/** A command ready to spawn, plus the line a user would type for it. */
export interface EngineCommand {
  command: string;
  args: string[];
  display: string;
}

export interface GraphCommandOptions {
  otp: string;
  dir: string;
  router: string;
  memory: number;
  analyst?: boolean;
}

export interface ServerCommandOptions extends GraphCommandOptions {
  port: number;
  securePort: number;
}

function quote(value: string): string {
  return `"${value}"`;
}

function make(command: string, args: string[], display: string[]): EngineCommand {
  return { command, args, display: [command, ...display].join(" ") };
}

/** Java heap size in whole gigabytes. */
export function normalizeMemory(memory: number): number {
  const floored = Math.floor(memory);
  if (!Number.isFinite(floored) || floored < 1) {
    throw new Error(`memory must be at least 1 GB, got ${memory}`);
  }
  return floored;
}

export function graphsDir(dir: string): string {
  return `${dir.replace(/[\\/]+$/, "")}/graphs`;
}

export function graphDir(dir: string, router: string): string {
  return `${graphsDir(dir)}/${router}`;
}

export function buildGraphCommand(options: GraphCommandOptions): EngineCommand {
  const memory = `-Xmx${normalizeMemory(options.memory)}G`;
  const target = graphDir(options.dir, options.router);
  const analyst = options.analyst ? ["--analyst"] : [];
  return make(
    "java",
    [memory, "-jar", options.otp, "--build", target, ...analyst],
    [memory, "-jar", quote(options.otp), "--build", quote(target), ...analyst]
  );
}

export function serverCommand(options: ServerCommandOptions): EngineCommand {
  const memory = `-Xmx${normalizeMemory(options.memory)}G`;
  const graphs = graphsDir(options.dir);
  const tail = [
    "--server",
    "--port",
    String(options.port),
    "--securePort",
    String(options.securePort),
    ...(options.analyst ? ["--analyst"] : []),
  ];
  return make(
    "java",
    [memory, "-jar", options.otp, "--router", options.router, "--graphs", graphs, ...tail],
    [memory, "-jar", quote(options.otp), "--router", options.router, "--graphs", quote(graphs), ...tail]
  );
}

export interface StopCommands {
  /** Lists running processes; absent where the kill command needs no listing. */
  list: EngineCommand | null;
  killAll: EngineCommand;
}

export function stopCommands(platform: SupportedPlatform): StopCommands {
  if (platform === "windows") {
    const args = ["/IM", "java.exe", "/F"];
    return { list: null, killAll: make("Taskkill", args, args) };
  }
  return {
    list: make("ps", ["-A"], ["-A"]),
    killAll: make("pkill", ["-9", "java"], ["-9", "java"]),
  };
}

export function browserCommand(platform: SupportedPlatform, url: string): EngineCommand {
  switch (platform) {
    case "windows":
      return make("cmd", ["/c", "start", "", url], ["/c", "start", '""', url]);
    case "mac":
      return make("open", [url], [url]);
    case "linux":
      return make("xdg-open", [url], [url]);
  }
}

import * as os from "node:os";
import * as path from "node:path";

const APP_NAME = "otp-control";

/** Normalize to posix style so paths are consistent in tests and cross-platform. */
function toPosix(p: string): string {
  return p.replace(/\\/g, "/");
}

/** Paths such as `--otp ~/otp/otp.jar` arrive unexpanded when quoted. */
export function expandTilde(filepath: string, homedir: string = os.homedir()): string {
  if (filepath === "~") {
    return homedir;
  }
  if (filepath.startsWith("~/")) {
    return homedir + filepath.slice(1);
  }
  return filepath;
}

export interface AppPaths {
  /** Directory searched for config.json. */
  config: string;
}

export interface PathOptions {
  platform?: string;
  homedir?: string;
  env?: Record<string, string | undefined>;
}

export function getAppPaths(options: PathOptions = {}): AppPaths {
  const platform = options.platform ?? process.platform;
  const home = options.homedir ?? os.homedir();
  const env = (key: string): string | undefined =>
    options.env && key in options.env ? options.env[key] : process.env[key];

  if (platform === "darwin") {
    return {
      config: toPosix(path.join(home, "Library", "Preferences", APP_NAME)),
    };
  }

  if (platform === "win32") {
    const appData = env("APPDATA") ?? path.join(home, "AppData", "Roaming");
    return { config: toPosix(path.join(appData, APP_NAME)) };
  }

  // Linux / other Unix
  const xdgConfig = env("XDG_CONFIG_HOME") ?? path.join(home, ".config");
  return { config: toPosix(path.join(xdgConfig, APP_NAME)) };
}

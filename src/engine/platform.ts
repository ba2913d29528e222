export type Platform = "windows" | "mac" | "linux" | "unsupported";
export type SupportedPlatform = Exclude<Platform, "unsupported">;

export const UNSUPPORTED_OS_MESSAGE = "You're on an unknown OS, this function is not yet supported";

export function detectPlatform(nodePlatform: string = process.platform): Platform {
  switch (nodePlatform) {
    case "win32":
      return "windows";
    case "darwin":
      return "mac";
    case "linux":
      return "linux";
    default:
      return "unsupported";
  }
}

export function isSupported(platform: Platform): platform is SupportedPlatform {
  return platform !== "unsupported";
}

import type { IProcessRunner } from "../abstractions/IProcessRunner";

export const JAVA_NOT_FOUND_MESSAGE = "Unable to detect a version of Java";
export const JAVA_VERSION_MESSAGE = "OTP requires Java version 8";

/**
 * Read the version out of `java -version` output: the quoted text on the
 * first line, cut to its first two dot-separated parts.
 *
 *   java version "1.8.0_292"  ->  1.8
 */
export function parseJavaVersion(output: string): number | null {
  const firstLine = output.split(/\r?\n/, 1)[0] ?? "";
  const quoted = /"([^"]*)"/.exec(firstLine);
  if (!quoted) {
    return null;
  }
  const parts = quoted[1].split(".").slice(0, 2);
  if (parts.length === 0 || !parts.every((part) => /^\d+$/.test(part))) {
    return null;
  }
  return Number(parts.join("."));
}

export function isSupportedJavaVersion(version: number): boolean {
  return version >= 1.8 && version < 1.9;
}

/** Runs `java -version` and returns the version when it is Java 8. */
export async function checkJava(runner: IProcessRunner): Promise<number> {
  let output: string;
  try {
    const result = await runner.run("java", ["-version"], { timeoutMs: 30_000 });
    output = result.stderr.trim() !== "" ? result.stderr : result.stdout;
  } catch (err) {
    throw new Error(JAVA_NOT_FOUND_MESSAGE, { cause: err });
  }

  if (output.trim() === "") {
    throw new Error(JAVA_NOT_FOUND_MESSAGE);
  }

  const version = parseJavaVersion(output);
  if (version === null || !isSupportedJavaVersion(version)) {
    throw new Error(JAVA_VERSION_MESSAGE);
  }
  return version;
}

import { InMemoryProcessRunner } from "../../src/abstractions/InMemoryProcessRunner";
import { checkJava, parseJavaVersion } from "../../src/engine/java";

const JAVA_8 = [
  'openjdk version "1.8.0_292"',
  "OpenJDK Runtime Environment (build 1.8.0_292-b10)",
  "OpenJDK 64-Bit Server VM (build 25.292-b10, mixed mode)",
].join("\n");

describe("parseJavaVersion", () => {
  it("reads the first two parts of the quoted version", () => {
    expect(parseJavaVersion(JAVA_8)).toBe(1.8);
    expect(parseJavaVersion('java version "1.7.0_80"')).toBe(1.7);
  });

  it("reads newer single-number versions", () => {
    expect(parseJavaVersion('openjdk version "17" 2021-09-14')).toBe(17);
    expect(parseJavaVersion('openjdk version "11.0.2" 2019-01-15')).toBe(11);
  });

  it("only looks at the first line", () => {
    expect(parseJavaVersion('Picked up _JAVA_OPTIONS\nopenjdk version "1.8.0_292"')).toBeNull();
  });

  it("returns null when there is no readable version", () => {
    expect(parseJavaVersion("")).toBeNull();
    expect(parseJavaVersion('openjdk version "internal"')).toBeNull();
  });
});

describe("checkJava", () => {
  it("returns the version printed on stderr", async () => {
    const runner = new InMemoryProcessRunner();
    runner.enqueue({ stdout: "", stderr: JAVA_8, exitCode: 0 });

    expect(await checkJava(runner)).toBe(1.8);
    expect(runner.getCalls()[0]).toEqual({ command: "java", args: ["-version"], options: { timeoutMs: 30000 } });
  });

  it("falls back to stdout", async () => {
    const runner = new InMemoryProcessRunner();
    runner.enqueue({ stdout: JAVA_8, stderr: "", exitCode: 0 });

    expect(await checkJava(runner)).toBe(1.8);
  });

  it("rejects other Java versions", async () => {
    const runner = new InMemoryProcessRunner();
    runner.enqueue({ stdout: "", stderr: 'openjdk version "11.0.2" 2019-01-15', exitCode: 0 });

    await expect(checkJava(runner)).rejects.toThrow("OTP requires Java version 8");
  });

  it("fails when java cannot be run", async () => {
    const runner = new InMemoryProcessRunner();
    runner.enqueueFailure(new Error("spawn java ENOENT"));

    await expect(checkJava(runner)).rejects.toThrow("Unable to detect a version of Java");
  });

  it("fails when java prints nothing", async () => {
    const runner = new InMemoryProcessRunner();
    runner.enqueue({ stdout: "", stderr: "", exitCode: 127 });

    await expect(checkJava(runner)).rejects.toThrow("Unable to detect a version of Java");
  });
});

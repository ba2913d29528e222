import { NodeProcessRunner } from "../../src/abstractions/NodeProcessRunner";

const node = process.execPath;

describe("NodeProcessRunner", () => {
  const runner = new NodeProcessRunner();

  it("collects output and the exit code", async () => {
    const result = await runner.run(node, ["-e", "console.log('built'); console.error('warned'); process.exit(3)"]);

    expect(result).toEqual({ stdout: "built\n", stderr: "warned\n", exitCode: 3 });
  });

  it("streams lines, including a last line without a newline", async () => {
    const lines: string[] = [];

    await runner.run(node, ["-e", "process.stdout.write('one\\n\\ntwo')"], { onLine: (line) => lines.push(line) });

    expect(lines).toEqual(["one", "two"]);
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runner.run("otp-control-no-such-binary", [])).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("kills a command that runs past its timeout", async () => {
    await expect(runner.run(node, ["-e", "setTimeout(() => {}, 5000)"], { timeoutMs: 100 })).rejects.toThrow(
      `${node} did not finish within 100 ms`
    );
  });
});

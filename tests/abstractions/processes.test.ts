import { InMemoryProcessKiller } from "../../src/abstractions/InMemoryProcessKiller";
import { NodeProcessKiller } from "../../src/abstractions/NodeProcessKiller";

describe("InMemoryProcessKiller", () => {
  it("kills a registered process", () => {
    const killer = new InMemoryProcessKiller();
    killer.addProcess(100);

    expect(killer.killProcess(100, "SIGTERM")).toBe(true);
    expect(killer.isProcessAlive(100)).toBe(false);
  });

  it("keeps a stubborn process alive through SIGTERM", () => {
    const killer = new InMemoryProcessKiller();
    killer.addProcess(100, { ignoresSigterm: true });

    killer.killProcess(100, "SIGTERM");
    expect(killer.isProcessAlive(100)).toBe(true);

    killer.killProcess(100, "SIGKILL");
    expect(killer.isProcessAlive(100)).toBe(false);
    expect(killer.getSignals()).toEqual([
      { pid: 100, signal: "SIGTERM" },
      { pid: 100, signal: "SIGKILL" },
    ]);
  });

  it("returns false for an unknown process", () => {
    expect(new InMemoryProcessKiller().killProcess(7, "SIGTERM")).toBe(false);
  });
});

describe("NodeProcessKiller", () => {
  it("sees the current process as alive", () => {
    expect(new NodeProcessKiller().isProcessAlive(process.pid)).toBe(true);
  });
});

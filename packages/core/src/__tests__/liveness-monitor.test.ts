import { afterEach, describe, expect, test, vi } from "vitest";
import { LivenessMonitor } from "../liveness-monitor.js";
import { connectDevice, createRegistryFixture, silentLogger } from "./support/fixtures.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("LivenessMonitor", () => {
  test("tick demotes devices past the timeout", async () => {
    const fx = createRegistryFixture({ heartbeatTimeoutMs: 90_000 });
    await connectDevice(fx);
    const monitor = new LivenessMonitor({ registry: fx.registry, logger: silentLogger, intervalMs: 10_000 });

    fx.time.advance(95_000);
    expect(await monitor.tick()).toEqual(["dev-1"]);
    expect(await monitor.tick()).toEqual([]);
  });

  test("runs the sweep on its interval until stopped", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    const sweep = vi.fn(async () => []);
    const monitor = new LivenessMonitor({ registry: { sweep }, logger: silentLogger, intervalMs: 10_000 });

    monitor.start();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(sweep).toHaveBeenCalledTimes(3);

    monitor.stop();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(sweep).toHaveBeenCalledTimes(3);
  });

  test("a failing sweep is logged, not thrown", async () => {
    const monitor = new LivenessMonitor({
      registry: {
        sweep: async () => {
          throw new Error("store down");
        },
      },
      logger: silentLogger,
      intervalMs: 10_000,
    });

    await expect(monitor.tick()).resolves.toEqual([]);
  });
});

/**
 * Liveness monitor: periodically sweeps the registry and demotes devices
 * whose heartbeats stopped arriving.
 *
 * Ticks never overlap: if a sweep is still running when the next interval
 * fires, that tick is skipped. The interval is unref'd so it never keeps the
 * process alive on its own.
 */

import type { Logger } from "pino";
import type { DeviceRegistry } from "./device-registry.js";

export interface LivenessMonitorOptions {
  registry: Pick<DeviceRegistry, "sweep">;
  logger: Logger;
  /** Sweep period (ms) */
  intervalMs: number;
}

export class LivenessMonitor {
  private readonly registry: Pick<DeviceRegistry, "sweep">;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(options: LivenessMonitorOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: "liveness-monitor" });
    this.intervalMs = options.intervalMs;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ interval_ms: this.intervalMs }, "Liveness monitor started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("Liveness monitor stopped");
  }

  /** Run one sweep. Never rejects; returns the demoted device ids. */
  async tick(): Promise<string[]> {
    if (this.running) return [];
    this.running = true;
    try {
      const demoted = await this.registry.sweep();
      if (demoted.length > 0) {
        this.logger.info({ demoted }, `Liveness sweep demoted ${demoted.length} device(s)`);
      }
      return demoted;
    } catch (err) {
      this.logger.error({ err }, "Liveness sweep failed");
      return [];
    } finally {
      this.running = false;
    }
  }
}

/**
 * Health endpoint.
 *
 * GET /health reports:
 *   - "ok"        → device store reachable (HTTP 200)
 *   - "unhealthy" → device store unreachable (HTTP 503); devices can still
 *                   connect but state changes are not persisted
 * plus fleet counts and the number of open device and observer sockets.
 */

import { Router } from "express";
import type { DeviceRegistry, DeviceStore } from "@edge-fleet/core";

const VERSION = "0.1.0";

const startTime = Date.now();

export interface HealthRouterDeps {
  store: Pick<DeviceStore, "ping">;
  registry: Pick<DeviceRegistry, "fleetStats">;
  getDeviceConnectionCount?: () => number;
  getObserverCount?: () => number;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    const start = performance.now();
    const storeOk = await deps.store.ping();
    const latency_ms = Math.round(performance.now() - start);

    const status = storeOk ? "ok" : "unhealthy";
    res.status(storeOk ? 200 : 503).json({
      status,
      checks: {
        store: { ok: storeOk, latency_ms },
      },
      fleet: deps.registry.fleetStats(),
      ws_clients: {
        devices: deps.getDeviceConnectionCount?.() ?? 0,
        observers: deps.getObserverCount?.() ?? 0,
      },
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      version: VERSION,
    });
  });

  return router;
}

/**
 * Express application factory.
 *
 * Kept apart from index.ts so tests can build an app around in-memory
 * domain objects and listen on port 0.
 *
 * Middleware stack (order matters):
 *   1. express.json(): JSON bodies, 1MB limit
 *   2. helmet(): security headers
 *   3. cors(): closed, no browser client is served from here
 *   4. pino-http: request logging, health checks excluded
 *   5. Routes: /api/health, /api/devices/*
 *   6. Error handler: last
 */

import express from "express";
import cors from "cors";
import helmet from "helmet";
import { pinoHttp } from "pino-http";
import type { Logger } from "pino";
import type { CommandDispatcher, DeviceRegistry, DeviceStore, RecordingScheduler } from "@edge-fleet/core";

import { errorHandler } from "./middleware/error-handler.js";
import { createHealthRouter } from "./routes/health.js";
import { createDevicesRouter } from "./routes/devices.js";

export interface AppDeps {
  logger: Logger;
  store: DeviceStore;
  registry: DeviceRegistry;
  dispatcher: CommandDispatcher;
  scheduler: RecordingScheduler;
  /** Lazily bound: the socket servers are created after the app */
  getDeviceConnectionCount?: () => number;
  getObserverCount?: () => number;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(helmet());
  app.use(cors({ origin: false }));
  app.use(
    pinoHttp({
      logger: deps.logger,
      autoLogging: {
        ignore: (req) => req.url === "/api/health",
      },
    }),
  );

  app.use(
    "/api",
    createHealthRouter({
      store: deps.store,
      registry: deps.registry,
      getDeviceConnectionCount: deps.getDeviceConnectionCount,
      getObserverCount: deps.getObserverCount,
    }),
  );
  app.use(
    "/api",
    createDevicesRouter({
      dispatcher: deps.dispatcher,
      registry: deps.registry,
      scheduler: deps.scheduler,
      logger: deps.logger,
    }),
  );

  app.use(errorHandler);

  return app;
}

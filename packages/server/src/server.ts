/**
 * Wires the fleet domain to HTTP and WebSockets.
 *
 * startServer builds the registry, dispatcher and background loops around a
 * given DeviceStore, mounts the Express app and both socket servers on one
 * HTTP server, and returns a handle for shutdown. index.ts calls it with
 * real configuration; integration tests call it with an in-memory store
 * and port 0.
 */

import { createServer, type Server as HttpServer } from "node:http";
import type { Logger } from "pino";
import {
  BroadcastHub,
  CommandDispatcher,
  DeviceRegistry,
  LivenessMonitor,
  RecordingScheduler,
  RecordingTracker,
  type DeviceStore,
} from "@edge-fleet/core";

import type { ServerConfig } from "./config.js";
import { createApp } from "./app.js";
import {
  EDGE_WS_PATH,
  OBSERVER_WS_PATH,
  attachUpgradeRouting,
  createEdgeGateway,
  createObserverServer,
  type EdgeGatewayHandle,
  type ObserverServerHandle,
} from "./ws/index.js";

export type ServerTimings = Pick<
  ServerConfig,
  | "heartbeatTimeoutMs"
  | "livenessSweepIntervalMs"
  | "wsPingIntervalMs"
  | "wsPongTimeoutMs"
  | "commandAckTimeoutMs"
  | "queryTimeoutMs"
  | "schedulerTickMs"
>;

export interface StartServerOptions {
  port: number;
  /** Defaults to all interfaces */
  host?: string;
  store: DeviceStore;
  timings: ServerTimings;
  /** HTTP app, observer sockets */
  logger: Logger;
  /** Device gateway and fleet domain */
  edgeLogger?: Logger;
  /** Observer keepalive, tests shorten it */
  observerPingIntervalMs?: number;
  observerPongTimeoutMs?: number;
}

export interface ServerHandle {
  httpServer: HttpServer;
  port: number;
  hub: BroadcastHub;
  registry: DeviceRegistry;
  dispatcher: CommandDispatcher;
  scheduler: RecordingScheduler;
  liveness: LivenessMonitor;
  gateway: EdgeGatewayHandle;
  observers: ObserverServerHandle;
  /** Number of devices restored from the store on startup */
  restored: number;
  close(): Promise<void>;
}

export async function startServer(options: StartServerOptions): Promise<ServerHandle> {
  const { logger, store, timings } = options;
  const edgeLogger = options.edgeLogger ?? logger;

  // --- Domain ---
  const hub = new BroadcastHub({ logger });
  const recordings = new RecordingTracker();
  const registry = new DeviceRegistry({
    store,
    hub,
    recordings,
    logger: edgeLogger,
    heartbeatTimeoutMs: timings.heartbeatTimeoutMs,
  });
  const restored = await registry.hydrate();

  const dispatcher = new CommandDispatcher({
    registry,
    recordings,
    logger: edgeLogger,
    ackTimeoutMs: timings.commandAckTimeoutMs,
    queryTimeoutMs: timings.queryTimeoutMs,
  });
  const liveness = new LivenessMonitor({
    registry,
    logger: edgeLogger,
    intervalMs: timings.livenessSweepIntervalMs,
  });
  const scheduler = new RecordingScheduler({
    registry,
    dispatcher,
    logger: edgeLogger,
    tickMs: timings.schedulerTickMs,
  });

  // --- Transport ---
  // Socket servers are created after the app; the health route reads their
  // counts through these late-bound getters.
  let deviceCount: () => number = () => 0;
  let observerCount: () => number = () => 0;

  const app = createApp({
    logger,
    store,
    registry,
    dispatcher,
    scheduler,
    getDeviceConnectionCount: () => deviceCount(),
    getObserverCount: () => observerCount(),
  });
  const httpServer = createServer(app);

  const gateway = createEdgeGateway({
    logger: edgeLogger,
    registry,
    dispatcher,
    pingIntervalMs: timings.wsPingIntervalMs,
    pongTimeoutMs: timings.wsPongTimeoutMs,
  });
  const observers = createObserverServer({
    logger,
    hub,
    pingIntervalMs: options.observerPingIntervalMs,
    pongTimeoutMs: options.observerPongTimeoutMs,
  });
  deviceCount = () => gateway.getConnectionCount();
  observerCount = () => observers.getClientCount();

  const detachUpgrades = attachUpgradeRouting(
    httpServer,
    { [EDGE_WS_PATH]: gateway.wss, [OBSERVER_WS_PATH]: observers.wss },
    logger,
  );

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });
  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;

  liveness.start();
  scheduler.start();

  let closing: Promise<void> | null = null;

  async function shutdown(): Promise<void> {
    scheduler.stop();
    liveness.stop();
    dispatcher.shutdown();

    const httpClosed = new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });

    // Sockets first, so the HTTP server can finish closing
    await gateway.shutdown();
    await observers.shutdown();
    detachUpgrades();
    httpServer.closeAllConnections();
    await httpClosed;

    await hub.idle();
    logger.info("Server closed");
  }

  return {
    httpServer,
    port,
    hub,
    registry,
    dispatcher,
    scheduler,
    liveness,
    gateway,
    observers,
    restored,
    close(): Promise<void> {
      closing ??= shutdown();
      return closing;
    },
  };
}

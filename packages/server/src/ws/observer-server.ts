/**
 * Observer WebSocket server (`/api/ws`).
 *
 * Dashboards connect here to watch the fleet live. The server subscribes
 * to the broadcast hub once and forwards each event to the observers whose
 * subscriptions match.
 *
 * Connection lifecycle:
 *   1. Client connects, gets a ULID id and an empty subscription set
 *   2. Client sends subscribe / unsubscribe / pong messages
 *   3. Server sends event / subscribed / unsubscribed / ping / error
 *   4. JSON ping every pingIntervalMs; a client that has not answered
 *      within pongTimeoutMs is terminated
 *
 * Authentication is out of scope; put the endpoint behind a trusted network.
 */

import { WebSocketServer, WebSocket } from "ws";
import type { Logger } from "pino";
import type { BroadcastHub } from "@edge-fleet/core";
import { generateId, observerClientMessageSchema } from "@edge-fleet/shared";

import type { ObserverClient, ObserverClientMessage, ObserverServerMessage } from "./types.js";
import { createBroadcaster, type ObserverBroadcaster } from "./broadcaster.js";

const PING_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface ObserverServerOptions {
  logger: Logger;
  hub: Pick<BroadcastHub, "subscribe">;
  pingIntervalMs?: number;
  pongTimeoutMs?: number;
}

export interface ObserverServerHandle {
  /** noServer WebSocketServer; the upgrade router hands it `/api/ws` requests */
  wss: WebSocketServer;
  broadcaster: ObserverBroadcaster;
  getClientCount(): number;
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createObserverServer(options: ObserverServerOptions): ObserverServerHandle {
  const log = options.logger.child({ component: "observer-ws" });
  const pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
  const pongTimeoutMs = options.pongTimeoutMs ?? PONG_TIMEOUT_MS;

  const clients = new Map<string, ObserverClient>();
  const wss = new WebSocketServer({ noServer: true });
  const broadcaster = createBroadcaster(clients, log);
  const unsubscribeHub = options.hub.subscribe((event) => broadcaster.broadcast(event));

  wss.on("connection", (ws: WebSocket) => {
    const client: ObserverClient = {
      id: generateId(),
      ws,
      subscriptions: new Set(),
      isAlive: true,
    };

    clients.set(client.id, client);
    log.info({ clientId: client.id }, "Observer connected");

    ws.on("message", (data) => {
      let raw: unknown;
      try {
        raw = JSON.parse(data.toString());
      } catch {
        sendMessage(ws, { type: "error", message: "Invalid JSON" });
        return;
      }

      const parsed = observerClientMessageSchema.safeParse(raw);
      if (!parsed.success) {
        sendMessage(ws, { type: "error", message: "Invalid observer message" });
        return;
      }
      handleClientMessage(client, parsed.data);
    });

    ws.on("close", () => {
      clients.delete(client.id);
      log.info({ clientId: client.id }, "Observer disconnected");
    });

    ws.on("error", (err) => {
      log.error({ clientId: client.id, error: err.message }, "Observer socket error");
      ws.close();
    });
  });

  // -------------------------------------------------------------------------
  // Client messages
  // -------------------------------------------------------------------------

  function handleClientMessage(client: ObserverClient, msg: ObserverClientMessage): void {
    switch (msg.type) {
      case "subscribe": {
        const subscription = "scope" in msg ? "all" : `device:${msg.device_id}`;
        client.subscriptions.add(subscription);
        sendMessage(client.ws, { type: "subscribed", subscription });
        break;
      }
      case "unsubscribe": {
        if (msg.device_id !== undefined) {
          const subscription = `device:${msg.device_id}`;
          client.subscriptions.delete(subscription);
          sendMessage(client.ws, { type: "unsubscribed", subscription });
          break;
        }
        // No target: clear everything
        const subscriptions = [...client.subscriptions];
        client.subscriptions.clear();
        for (const subscription of subscriptions) {
          sendMessage(client.ws, { type: "unsubscribed", subscription });
        }
        break;
      }
      case "pong":
        client.isAlive = true;
        break;
    }
  }

  // -------------------------------------------------------------------------
  // Keepalive
  // -------------------------------------------------------------------------

  const pongTimers = new Set<NodeJS.Timeout>();

  const pingInterval = setInterval(() => {
    for (const client of clients.values()) {
      client.isAlive = false;
      sendMessage(client.ws, { type: "ping" });
    }

    const timer = setTimeout(() => {
      pongTimers.delete(timer);
      for (const [id, client] of clients.entries()) {
        if (!client.isAlive) {
          log.info({ clientId: id }, "Observer stale, terminating");
          client.ws.terminate();
          clients.delete(id);
        }
      }
    }, pongTimeoutMs);
    timer.unref();
    pongTimers.add(timer);
  }, pingIntervalMs);
  pingInterval.unref();

  function sendMessage(ws: WebSocket, msg: ObserverServerMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return;

    try {
      ws.send(JSON.stringify(msg), (err) => {
        if (err) log.warn({ error: err.message }, "Failed to send observer message");
      });
    } catch (err) {
      log.warn({ error: err instanceof Error ? err.message : String(err) }, "Observer send threw synchronously");
    }
  }

  return {
    wss,
    broadcaster,

    getClientCount(): number {
      return clients.size;
    },

    async shutdown(): Promise<void> {
      clearInterval(pingInterval);
      for (const timer of pongTimers) clearTimeout(timer);
      pongTimers.clear();
      unsubscribeHub();

      for (const client of clients.values()) {
        client.ws.close(1001, "Server shutting down");
      }
      clients.clear();

      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      log.info("Observer server shut down");
    },
  };
}

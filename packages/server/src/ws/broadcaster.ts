/**
 * Observer broadcaster: fans hub events out to subscribed observer sockets.
 *
 * Sends are fire-and-forget; a client whose send fails is dropped from the
 * map, so one dead observer never holds up the others.
 *
 * Subscription matching:
 *   - "all"            every event
 *   - "device:<id>"    events about that device
 * Fleet-wide events (fleet.stats_updated) reach "all" subscribers only.
 */

import { WebSocket } from "ws";
import type { Logger } from "pino";
import type { ObserverClient, ObserverEvent, ObserverServerMessage } from "./types.js";

export interface ObserverBroadcaster {
  broadcast(event: ObserverEvent): void;
}

/** Subscription key an event is routed by, null for fleet-wide events */
export function subscriptionFor(event: ObserverEvent): string | null {
  return "device_id" in event ? `device:${event.device_id}` : null;
}

/**
 * @param clients - live map owned by the observer server
 */
export function createBroadcaster(clients: Map<string, ObserverClient>, logger: Logger): ObserverBroadcaster {
  function matches(client: ObserverClient, key: string | null): boolean {
    if (client.subscriptions.has("all")) return true;
    return key !== null && client.subscriptions.has(key);
  }

  function broadcastToMatching(msg: ObserverServerMessage, key: string | null): void {
    const payload = JSON.stringify(msg);

    for (const client of clients.values()) {
      if (!matches(client, key)) continue;
      if (client.ws.readyState !== WebSocket.OPEN) continue;

      try {
        client.ws.send(payload, (err) => {
          if (err) {
            logger.warn({ clientId: client.id, error: err.message }, "Failed to send to observer, removing client");
            clients.delete(client.id);
          }
        });
      } catch (err) {
        logger.warn(
          { clientId: client.id, error: err instanceof Error ? err.message : String(err) },
          "Observer send threw, removing client",
        );
        clients.delete(client.id);
      }
    }
  }

  return {
    broadcast(event: ObserverEvent): void {
      broadcastToMatching({ type: "event", event }, subscriptionFor(event));
    },
  };
}

/**
 * WebSocket entry points sharing the HTTP server with Express.
 *
 * Both socket servers run in `noServer` mode; a single `upgrade` listener
 * routes each request by path:
 *   /edge     device agents (edge gateway)
 *   /api/ws   observers (dashboards)
 * Any other path gets a 404 and the socket is destroyed.
 */

import type { Server as HttpServer, IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type { WebSocketServer } from "ws";
import type { Logger } from "pino";

export const EDGE_WS_PATH = "/edge";
export const OBSERVER_WS_PATH = "/api/ws";

/**
 * Route HTTP upgrades to the WebSocketServer registered for their path.
 * Returns a function that detaches the listener.
 */
export function attachUpgradeRouting(
  httpServer: HttpServer,
  routes: Record<string, WebSocketServer>,
  logger: Logger,
): () => void {
  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    const wss = routes[pathname];

    if (!wss) {
      logger.debug({ path: pathname }, "Rejecting upgrade for unknown path");
      socket.once("finish", () => socket.destroy());
      socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  };

  httpServer.on("upgrade", onUpgrade);
  return () => {
    httpServer.off("upgrade", onUpgrade);
  };
}

export { createEdgeGateway, type EdgeGatewayHandle, type EdgeGatewayOptions } from "./edge-gateway.js";
export {
  createObserverServer,
  type ObserverServerHandle,
  type ObserverServerOptions,
} from "./observer-server.js";
export type { ObserverBroadcaster } from "./broadcaster.js";

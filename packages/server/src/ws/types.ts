/**
 * Server-internal WebSocket types.
 *
 * Two kinds of sockets share the HTTP server: device connections on `/edge`
 * (EdgeSocket) and observer connections on `/api/ws` (ObserverClient). Each
 * server module keeps a Map of its own kind, keyed by a ULID assigned on
 * connect.
 */

import type WebSocket from "ws";

export type {
  ObserverClientMessage,
  ObserverServerMessage,
  ObserverEvent,
} from "@edge-fleet/shared";

/**
 * A connected observer (dashboard, operator tool). Subscriptions are "all"
 * or "device:<device_id>".
 */
export interface ObserverClient {
  id: string;
  ws: WebSocket;
  subscriptions: Set<string>;
  /** Cleared on each ping, set again by the client's pong */
  isAlive: boolean;
}

/** A connected device socket, before and after it registers */
export interface EdgeSocket {
  id: string;
  ws: WebSocket;
  peerAddress: string | null;
  /** Set by a successful edge.register */
  deviceId: string | null;
  /** Registry connection id, used to ignore frames from superseded sockets */
  connectionId: string | null;
  /** Epoch ms of the last protocol-level pong (or of the connect) */
  lastPongAt: number;
  /** Malformed or out-of-order frames in a row */
  protocolErrors: number;
  /** Frames of one socket are handled strictly in order */
  queue: Promise<void>;
}

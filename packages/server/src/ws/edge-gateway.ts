/**
 * Device WebSocket gateway (`/edge`).
 *
 * Edge agents hold one socket each. The gateway turns frames into registry
 * and dispatcher calls and gives the domain a DeviceTransport to send
 * commands back through.
 *
 * Per socket:
 *   - Frames are handled strictly in arrival order (one promise chain per
 *     socket); different sockets proceed independently
 *   - The first frame must be edge.register; every later frame must carry
 *     the device_id the server answered with
 *   - Malformed or out-of-order frames are answered with edge.error and
 *     dropped; MAX_CONSECUTIVE_PROTOCOL_ERRORS in a row close the socket
 *   - A protocol-level ping goes out every pingIntervalMs; a socket with no
 *     pong for pongTimeoutMs is terminated, which the registry records as
 *     connection_lost
 */

import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { IncomingMessage } from "node:http";
import type { Logger } from "pino";
import type { CommandDispatcher, DeviceRegistry, DeviceTransport } from "@edge-fleet/core";
import {
  NetworkError,
  ProtocolError,
  errorMessage,
  generateId,
  parseEdgeClientFrame,
  type EdgeClientMessage,
  type EdgeServerMessage,
} from "@edge-fleet/shared";

import type { EdgeSocket } from "./types.js";

const PING_INTERVAL_MS = 2_000;
const PONG_TIMEOUT_MS = 6_000;
export const MAX_CONSECUTIVE_PROTOCOL_ERRORS = 5;

/** Close code for sockets dropped after repeated protocol errors */
export const CLOSE_PROTOCOL_ERRORS = 1008;

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface EdgeGatewayOptions {
  logger: Logger;
  registry: Pick<DeviceRegistry, "register" | "heartbeat" | "disconnect">;
  dispatcher: Pick<CommandDispatcher, "handleRecordingEvent" | "handleAudioDevicesResponse">;
  pingIntervalMs?: number;
  pongTimeoutMs?: number;
  maxConsecutiveProtocolErrors?: number;
  now?: () => number;
}

export interface EdgeGatewayHandle {
  /** noServer WebSocketServer; the upgrade router hands it `/edge` requests */
  wss: WebSocketServer;
  getConnectionCount(): number;
  /** Resolves once every frame received so far has been handled */
  idle(): Promise<void>;
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createEdgeGateway(options: EdgeGatewayOptions): EdgeGatewayHandle {
  const { registry, dispatcher } = options;
  const log = options.logger.child({ component: "edge-gateway" });
  const pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
  const pongTimeoutMs = options.pongTimeoutMs ?? PONG_TIMEOUT_MS;
  const maxProtocolErrors = options.maxConsecutiveProtocolErrors ?? MAX_CONSECUTIVE_PROTOCOL_ERRORS;
  const now = options.now ?? Date.now;

  const sockets = new Map<string, EdgeSocket>();
  const inflight = new Set<Promise<void>>();
  const wss = new WebSocketServer({ noServer: true });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const socket: EdgeSocket = {
      id: generateId(),
      ws,
      peerAddress: req.socket.remoteAddress ?? null,
      deviceId: null,
      connectionId: null,
      lastPongAt: now(),
      protocolErrors: 0,
      queue: Promise.resolve(),
    };
    sockets.set(socket.id, socket);
    log.debug({ socket_id: socket.id, peer: socket.peerAddress }, "Device socket opened");

    ws.on("pong", () => {
      socket.lastPongAt = now();
    });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      enqueue(socket, () => handleFrame(socket, data, isBinary));
    });

    ws.on("close", (code: number, reason: Buffer) => {
      sockets.delete(socket.id);
      log.info(
        { socket_id: socket.id, device_id: socket.deviceId, code, reason: reason.toString() },
        "Device socket closed",
      );
      // Queued behind any frames still being handled
      enqueue(socket, async () => {
        if (socket.deviceId !== null && socket.connectionId !== null) {
          await registry.disconnect(socket.deviceId, socket.connectionId);
        }
      });
    });

    ws.on("error", (err) => {
      log.warn({ socket_id: socket.id, device_id: socket.deviceId, error: err.message }, "Device socket error");
    });
  });

  function enqueue(socket: EdgeSocket, task: () => Promise<void>): void {
    const next = socket.queue.then(task).catch((err: unknown) => {
      log.error({ err, socket_id: socket.id, device_id: socket.deviceId }, "Device frame handling failed");
      send(socket, { type: "edge.error", error: "INTERNAL_ERROR", message: errorMessage(err) });
    });
    socket.queue = next;
    inflight.add(next);
    void next.finally(() => inflight.delete(next));
  }

  // -------------------------------------------------------------------------
  // Frames
  // -------------------------------------------------------------------------

  async function handleFrame(socket: EdgeSocket, data: RawData, isBinary: boolean): Promise<void> {
    if (isBinary) {
      protocolError(socket, new ProtocolError("Binary frames are not supported", "PROTOCOL_BINARY_FRAME"));
      return;
    }

    const parsed = parseEdgeClientFrame(data.toString());
    if (!parsed.success) {
      protocolError(socket, new ProtocolError(parsed.error, "PROTOCOL_INVALID_FRAME"));
      return;
    }

    const message = parsed.message;
    const violation = checkSequence(socket, message);
    if (violation) {
      protocolError(socket, violation);
      return;
    }
    socket.protocolErrors = 0;

    switch (message.type) {
      case "edge.register": {
        const result = await registry.register(message, transportFor(socket), socket.peerAddress);
        socket.deviceId = result.device_id;
        socket.connectionId = result.connection_id;
        send(socket, { type: "edge.registered", device_id: result.device_id, is_new: result.is_new });
        return;
      }

      case "edge.heartbeat": {
        if (socket.connectionId === null) return;
        const result = await registry.heartbeat(message, socket.connectionId);
        if (!result.applied) {
          log.debug({ device_id: message.device_id, reason: result.reason }, "Heartbeat ignored");
        }
        return;
      }

      case "edge.recording_started":
      case "edge.recording_progress":
      case "edge.recording_completed":
      case "edge.recording_failed": {
        const result = await dispatcher.handleRecordingEvent(message);
        if (!result.applied) {
          log.warn(
            { device_id: message.device_id, recording_uuid: message.recording_uuid, type: message.type, reason: result.reason },
            "Recording event dropped",
          );
        }
        return;
      }

      case "edge.audio_devices_response":
        await dispatcher.handleAudioDevicesResponse(message);
        return;
    }
  }

  /** Registration must come first, exactly once, and fix the device_id */
  function checkSequence(socket: EdgeSocket, message: EdgeClientMessage): ProtocolError | null {
    if (message.type === "edge.register") {
      return socket.deviceId === null
        ? null
        : new ProtocolError("Connection is already registered", "PROTOCOL_ALREADY_REGISTERED", {
            device_id: socket.deviceId,
          });
    }
    if (socket.deviceId === null) {
      return new ProtocolError(`${message.type} before edge.register`, "PROTOCOL_NOT_REGISTERED");
    }
    if (message.device_id !== socket.deviceId) {
      return new ProtocolError("device_id does not match this connection", "PROTOCOL_DEVICE_MISMATCH", {
        expected: socket.deviceId,
        received: message.device_id,
      });
    }
    return null;
  }

  function protocolError(socket: EdgeSocket, err: ProtocolError): void {
    socket.protocolErrors += 1;
    log.warn(
      { socket_id: socket.id, device_id: socket.deviceId, code: err.code, count: socket.protocolErrors, error: err.message },
      "Protocol error on device socket",
    );
    send(socket, { type: "edge.error", error: err.code, message: err.message });

    if (socket.protocolErrors >= maxProtocolErrors) {
      log.warn({ socket_id: socket.id, device_id: socket.deviceId }, "Too many protocol errors, closing socket");
      socket.ws.close(CLOSE_PROTOCOL_ERRORS, "too many protocol errors");
    }
  }

  // -------------------------------------------------------------------------
  // Outbound
  // -------------------------------------------------------------------------

  /** What the registry and dispatcher use to reach this device */
  function transportFor(socket: EdgeSocket): DeviceTransport {
    return {
      send(message: EdgeServerMessage): void {
        if (socket.ws.readyState !== WebSocket.OPEN) {
          throw new NetworkError("Device socket is not open", "NETWORK_SOCKET_CLOSED", {
            device_id: socket.deviceId,
          });
        }
        socket.ws.send(JSON.stringify(message), (err) => {
          if (err) log.warn({ device_id: socket.deviceId, type: message.type, error: err.message }, "Device send failed");
        });
      },
      close(code: number, reason: string): void {
        socket.ws.close(code, reason);
      },
    };
  }

  function send(socket: EdgeSocket, message: EdgeServerMessage): void {
    if (socket.ws.readyState !== WebSocket.OPEN) return;
    try {
      transportFor(socket).send(message);
    } catch (err) {
      log.warn({ device_id: socket.deviceId, error: errorMessage(err) }, "Device send threw synchronously");
    }
  }

  // -------------------------------------------------------------------------
  // Keepalive
  // -------------------------------------------------------------------------

  const pingInterval = setInterval(() => {
    const at = now();
    for (const socket of sockets.values()) {
      if (at - socket.lastPongAt > pongTimeoutMs) {
        log.warn(
          { socket_id: socket.id, device_id: socket.deviceId, silent_ms: at - socket.lastPongAt },
          "Device missed pong deadline, terminating",
        );
        socket.ws.terminate();
        continue;
      }
      if (socket.ws.readyState === WebSocket.OPEN) socket.ws.ping();
    }
  }, pingIntervalMs);
  pingInterval.unref();

  return {
    wss,

    getConnectionCount(): number {
      return sockets.size;
    },

    async idle(): Promise<void> {
      while (inflight.size > 0) {
        await Promise.all([...inflight]);
      }
    },

    async shutdown(): Promise<void> {
      clearInterval(pingInterval);
      for (const socket of sockets.values()) {
        socket.ws.close(1001, "Server shutting down");
      }
      while (inflight.size > 0) {
        await Promise.all([...inflight]);
      }

      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      log.info("Edge gateway shut down");
    },
  };
}

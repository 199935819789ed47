/**
 * Device socket to the fleet server (`/edge`).
 *
 * Owns only the transport: it opens the socket, validates inbound frames,
 * and reconnects with exponential backoff until stop() is called. It never
 * gives up, since an edge node has nobody to restart it. Registration,
 * heartbeats and commands are the agent's business.
 *
 * Protocol-level pings from the server are answered by `ws` itself on the
 * event loop, so a busy capture never delays a pong.
 *
 * Events:
 *   'open'          → () => void
 *   'message'       → (message: EdgeServerMessage) => void
 *   'close'         → (code: number, reason: string) => void
 *   'reconnecting'  → (attempt: number, delayMs: number) => void
 *   'invalid'       → (error: string) => void
 */

import WebSocket from "ws";
import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import { parseEdgeServerFrame, type EdgeClientMessage } from "@edge-fleet/shared";
import { Backoff, type BackoffOptions } from "./backoff.js";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting";

export interface EdgeConnectionOptions {
  /** HTTP(S) base URL of the fleet server */
  serverUrl: string;
  backoff: BackoffOptions;
  logger: Logger;
}

/** http → ws, https → wss, trailing slashes dropped, `/edge` appended */
export function buildEdgeUrl(serverUrl: string): string {
  const base = serverUrl.replace(/\/+$/, "").replace(/^https:/, "wss:").replace(/^http:/, "ws:");
  return `${base}/edge`;
}

export class EdgeConnection extends EventEmitter {
  private ws: WebSocket | null = null;
  private _state: ConnectionState = "disconnected";
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;
  private readonly backoff: Backoff;
  private readonly url: string;
  private readonly log: Logger;

  constructor(options: EdgeConnectionOptions) {
    super();
    this.url = buildEdgeUrl(options.serverUrl);
    this.backoff = new Backoff(options.backoff);
    this.log = options.logger.child({ component: "edge-connection" });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "connected";
  }

  /** Begin connecting; failures are retried until stop() */
  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.open();
  }

  /** Close the socket and cancel any pending reconnect */
  stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const ws = this.ws;
    this._state = "disconnected";
    if (!ws || ws.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise((resolve) => {
      ws.once("close", () => resolve());
      if (ws.readyState === WebSocket.CONNECTING) ws.terminate();
      else ws.close(1000, "agent stopping");
    });
  }

  /** Send a frame; returns false when the socket is not open */
  send(message: EdgeClientMessage): boolean {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;

    ws.send(JSON.stringify(message), (err) => {
      if (err) this.log.warn({ type: message.type, error: err.message }, "Send failed");
    });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private open(): void {
    this._state = "connecting";
    this.log.debug({ url: this.url }, "Connecting");

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("open", () => {
      this._state = "connected";
      this.backoff.reset();
      this.log.info({ url: this.url }, "Connected");
      this.emit("open");
    });

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.log.warn("Ignoring binary frame from server");
        return;
      }
      const parsed = parseEdgeServerFrame(data.toString());
      if (!parsed.success) {
        this.log.warn({ error: parsed.error }, "Invalid frame from server");
        this.emit("invalid", parsed.error);
        return;
      }
      this.emit("message", parsed.message);
    });

    // A failed handshake emits 'error' and then 'close'; reconnecting is
    // driven from 'close' alone.
    ws.on("error", (err: Error) => {
      this.log.warn({ error: err.message }, "Socket error");
    });

    ws.on("close", (code: number, reason: Buffer) => {
      if (this.ws === ws) this.ws = null;
      const wasConnected = this._state === "connected";
      this._state = "disconnected";
      if (wasConnected) {
        this.log.info({ code, reason: reason.toString() }, "Disconnected");
        this.emit("close", code, reason.toString());
      }
      if (!this.stopped) this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer !== null) return;
    const delay = this.backoff.next();
    this._state = "reconnecting";
    this.log.info({ attempt: this.backoff.attempts, delay_ms: delay }, "Reconnecting");
    this.emit("reconnecting", this.backoff.attempts, delay);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) this.open();
    }, delay);
  }
}

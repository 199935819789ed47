/**
 * In-process stand-in for the fleet server's `/edge` endpoint.
 *
 * Every inbound frame is validated with the real wire schema, so a test
 * also fails when the agent sends something the server would reject.
 */

import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { pino } from "pino";
import {
  parseEdgeClientFrame,
  type EdgeClientMessage,
  type EdgeServerMessage,
} from "@edge-fleet/shared";

export const silentLogger = pino({ level: "silent" });

export function isType<K extends EdgeClientMessage["type"]>(type: K) {
  return (msg: EdgeClientMessage): msg is Extract<EdgeClientMessage, { type: K }> => msg.type === type;
}

export class ServerConnection {
  /** Every valid frame received, in order */
  readonly all: EdgeClientMessage[] = [];
  /** Parse errors for frames that failed validation */
  readonly invalid: string[] = [];
  private readonly queue: EdgeClientMessage[] = [];
  private waiter: (() => void) | null = null;

  constructor(readonly ws: WebSocket) {
    ws.on("message", (data: WebSocket.RawData) => {
      const parsed = parseEdgeClientFrame(data.toString());
      if (!parsed.success) {
        this.invalid.push(parsed.error);
        return;
      }
      this.all.push(parsed.message);
      this.queue.push(parsed.message);
      this.waiter?.();
    });
  }

  /** Next frame, waiting up to `timeoutMs` */
  async next(timeoutMs = 3_000): Promise<EdgeClientMessage> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const message = this.queue.shift();
      if (message) return message;
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new Error("Timed out waiting for a frame from the agent");
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiter = () => {
          clearTimeout(timer);
          this.waiter = null;
          resolve();
        };
      });
    }
  }

  /** Next frame satisfying `predicate`; frames before it are skipped */
  async nextMatching<T extends EdgeClientMessage>(
    predicate: (msg: EdgeClientMessage) => msg is T,
    timeoutMs = 3_000,
  ): Promise<T> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const message = await this.next(Math.max(1, deadline - Date.now()));
      if (predicate(message)) return message;
    }
  }

  send(message: EdgeServerMessage): void {
    this.ws.send(JSON.stringify(message));
  }
}

export interface FakeFleetServer {
  port: number;
  url: string;
  connections: ServerConnection[];
  nextConnection(timeoutMs?: number): Promise<ServerConnection>;
  close(): Promise<void>;
}

export async function startFakeFleetServer(): Promise<FakeFleetServer> {
  const httpServer: HttpServer = createServer();
  const wss = new WebSocketServer({ server: httpServer, path: "/edge" });
  const connections: ServerConnection[] = [];
  let taken = 0;

  wss.on("connection", (ws) => {
    connections.push(new ServerConnection(ws));
  });

  await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
  const address = httpServer.address();
  const port = typeof address === "object" && address ? address.port : 0;

  return {
    port,
    url: `http://127.0.0.1:${port}`,
    connections,

    async nextConnection(timeoutMs = 3_000): Promise<ServerConnection> {
      await waitFor(() => connections.length > taken, timeoutMs);
      const connection = connections[taken];
      taken++;
      if (!connection) throw new Error("connection disappeared");
      return connection;
    },

    async close(): Promise<void> {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    },
  };
}

export async function waitFor(condition: () => boolean, timeoutMs = 3_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

/**
 * Tests for the observer socket server: subscription filtering, message
 * validation, the JSON ping/pong keepalive and upgrade routing.
 */

import { describe, test, expect, afterEach } from "vitest";
import WebSocket from "ws";
import { InMemoryDeviceStore } from "@edge-fleet/core";
import { startServer, type ServerHandle } from "../../server.js";
import {
  connectTestDevice,
  isObserverEvent,
  isObserverType,
  openObserverSocket,
  silentLogger,
  startTestServer,
  TEST_TIMINGS,
} from "../../__tests__/support/harness.js";

describe("observer server", () => {
  let server: ServerHandle;

  afterEach(async () => {
    await server.close();
  });

  test("a device subscription receives only that device's events", async () => {
    server = await startTestServer();
    const watched = await connectTestDevice(server, { name: "watched" });
    const other = await connectTestDevice(server, { name: "other" });

    const observer = await openObserverSocket(server.port);
    observer.send({ type: "subscribe", device_id: watched.deviceId });
    expect(await observer.next()).toEqual({ type: "subscribed", subscription: `device:${watched.deviceId}` });

    other.heartbeat();
    watched.heartbeat();

    const event = await observer.nextMatching(isObserverEvent("device.heartbeat"));
    expect(event.event).toMatchObject({ device_id: watched.deviceId, status: "IDLE" });
    // Nothing about the other device was queued ahead of it
    expect(observer.drain()).toEqual([]);

    await observer.close();
    await watched.socket.close();
    await other.socket.close();
  });

  test("a fleet subscription receives fleet-wide stats", async () => {
    server = await startTestServer();
    const observer = await openObserverSocket(server.port);
    observer.send({ type: "subscribe", scope: "all" });
    await observer.nextMatching(isObserverType("subscribed"));

    const device = await connectTestDevice(server);
    const stats = await observer.nextMatching(isObserverEvent("fleet.stats_updated"));
    expect(stats.event).toMatchObject({
      total_devices: 1,
      online_devices: 1,
      offline_devices: 0,
      recording_devices: 0,
    });

    await observer.close();
    await device.socket.close();
  });

  test("unsubscribe without a device_id clears every subscription", async () => {
    server = await startTestServer();
    const observer = await openObserverSocket(server.port);
    observer.send({ type: "subscribe", scope: "all" });
    observer.send({ type: "subscribe", device_id: "dev-1" });
    await observer.next();
    await observer.next();

    observer.send({ type: "unsubscribe" });
    expect(await observer.next()).toEqual({ type: "unsubscribed", subscription: "all" });
    expect(await observer.next()).toEqual({ type: "unsubscribed", subscription: "device:dev-1" });

    await observer.close();
  });

  test("malformed messages are answered with an error", async () => {
    server = await startTestServer();
    const observer = await openObserverSocket(server.port);

    observer.send("not json");
    expect(await observer.next()).toEqual({ type: "error", message: "Invalid JSON" });

    observer.send({ type: "subscribe" });
    expect(await observer.next()).toEqual({ type: "error", message: "Invalid observer message" });

    await observer.close();
  });

  test("observers get JSON pings and are dropped when they stop answering", async () => {
    server = await startServer({
      port: 0,
      host: "127.0.0.1",
      store: new InMemoryDeviceStore(),
      timings: TEST_TIMINGS,
      logger: silentLogger,
      observerPingIntervalMs: 100,
      observerPongTimeoutMs: 40,
    });

    const observer = await openObserverSocket(server.port);
    expect(await observer.next()).toEqual({ type: "ping" });
    observer.send({ type: "pong" });
    expect(await observer.next()).toEqual({ type: "ping" });

    // Second ping left unanswered
    expect(await observer.closed).toBe(1006);
    expect(server.observers.getClientCount()).toBe(0);
  });

  test("upgrades to an unknown path are refused with 404", async () => {
    server = await startTestServer();
    const ws = new WebSocket(`ws://127.0.0.1:${server.port}/nowhere`);

    const status = await new Promise<number | undefined>((resolve) => {
      ws.on("unexpected-response", (_req, res) => {
        res.resume();
        resolve(res.statusCode);
      });
      ws.on("error", () => resolve(undefined));
    });
    expect(status).toBe(404);
  });
});

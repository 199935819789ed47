/**
 * Tests for the device gateway: registration, frame validation and
 * sequencing, recording lifecycle over the socket, and disconnect / pong
 * timeout handling.
 *
 * Each test starts a full server on port 0 with an in-memory store and
 * drives it with real WebSocket clients.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type { ServerHandle } from "../../server.js";
import {
  connectTestDevice,
  isEdgeType,
  isObserverEvent,
  isObserverType,
  openEdgeSocket,
  openObserverSocket,
  startTestServer,
  waitFor,
  TEST_AUDIO_CONFIG,
} from "../../__tests__/support/harness.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function registerFrame(deviceId: string | null = null) {
  return {
    type: "edge.register",
    device_id: deviceId,
    device_name: "bench-unit",
    platform: "linux-arm64",
    audio_config: TEST_AUDIO_CONFIG,
  };
}

describe("edge gateway", () => {
  let server: ServerHandle;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  test("a device without an id is assigned one and becomes IDLE", async () => {
    const socket = await openEdgeSocket(server.port);
    socket.send(registerFrame());

    const registered = await socket.nextMatching(isEdgeType("edge.registered"));
    expect(registered.is_new).toBe(true);
    expect(registered.device_id).toMatch(UUID_PATTERN);
    expect(server.registry.get(registered.device_id)?.status).toBe("IDLE");

    await socket.close();
  });

  test("a device that reconnects with its id keeps it and is not new", async () => {
    const first = await connectTestDevice(server);
    await first.socket.close();
    await waitFor(() => server.registry.get(first.deviceId)?.status === "OFFLINE");

    const socket = await openEdgeSocket(server.port);
    socket.send(registerFrame(first.deviceId));
    const registered = await socket.nextMatching(isEdgeType("edge.registered"));

    expect(registered).toEqual({ type: "edge.registered", device_id: first.deviceId, is_new: false });
    expect(server.registry.get(first.deviceId)?.status).toBe("IDLE");
    await socket.close();
  });

  test("a second socket for the same device supersedes the first", async () => {
    const first = await connectTestDevice(server);

    const second = await openEdgeSocket(server.port);
    second.send(registerFrame(first.deviceId));
    await second.nextMatching(isEdgeType("edge.registered"));

    expect(await first.socket.closed).toBe(4000);
    // The old socket's close must not demote the device
    await server.gateway.idle();
    expect(server.registry.get(first.deviceId)?.status).toBe("IDLE");
    await second.close();
  });

  // -------------------------------------------------------------------------
  // Protocol errors
  // -------------------------------------------------------------------------

  test("frames before registration are rejected", async () => {
    const socket = await openEdgeSocket(server.port);
    socket.send({
      type: "edge.heartbeat",
      device_id: "dev-x",
      status: "idle",
      timestamp: "2026-01-14T12:00:00.000Z",
    });

    expect(await socket.next()).toEqual({
      type: "edge.error",
      error: "PROTOCOL_NOT_REGISTERED",
      message: "edge.heartbeat before edge.register",
    });
    await socket.close();
  });

  test("invalid JSON is answered with edge.error", async () => {
    const socket = await openEdgeSocket(server.port);
    socket.send("{not json");

    expect(await socket.next()).toEqual({
      type: "edge.error",
      error: "PROTOCOL_INVALID_FRAME",
      message: "frame is not valid JSON",
    });
    await socket.close();
  });

  test("a frame for another device_id is rejected", async () => {
    const device = await connectTestDevice(server);
    device.socket.send({
      type: "edge.heartbeat",
      device_id: "someone-else",
      status: "idle",
      timestamp: "2026-01-14T13:00:00.000Z",
    });

    expect(await device.socket.next()).toEqual({
      type: "edge.error",
      error: "PROTOCOL_DEVICE_MISMATCH",
      message: "device_id does not match this connection",
    });
    await device.socket.close();
  });

  test("registering twice on one socket is rejected", async () => {
    const device = await connectTestDevice(server);
    device.socket.send(registerFrame(device.deviceId));

    const error = await device.socket.nextMatching(isEdgeType("edge.error"));
    expect(error.error).toBe("PROTOCOL_ALREADY_REGISTERED");
    await device.socket.close();
  });

  test("five protocol errors in a row close the socket", async () => {
    const socket = await openEdgeSocket(server.port);
    for (let i = 0; i < 5; i++) socket.send("garbage");

    expect(await socket.closed).toBe(1008);
  });

  test("a valid frame resets the protocol error count", async () => {
    const device = await connectTestDevice(server);
    for (let i = 0; i < 4; i++) device.socket.send("garbage");
    device.heartbeat();
    for (let i = 0; i < 4; i++) device.socket.send("garbage");

    // Eight errors, never five in a row: nothing closes
    for (let i = 0; i < 8; i++) {
      expect((await device.socket.next()).type).toBe("edge.error");
    }
    expect(device.socket.ws.readyState).toBe(device.socket.ws.OPEN);
    await device.socket.close();
  });

  // -------------------------------------------------------------------------
  // Recording lifecycle
  // -------------------------------------------------------------------------

  test("a recording runs from command to completion and bumps success_count", async () => {
    const device = await connectTestDevice(server);
    const session = await server.dispatcher.record(device.deviceId, { duration: 60 });

    const record = await device.socket.nextMatching(isEdgeType("edge.record"));
    expect(record).toEqual({
      type: "edge.record",
      recording_uuid: session.recording_uuid,
      duration: 60,
      channels: 1,
      sample_rate: 16000,
      device_index: 0,
      bit_depth: 16,
    });

    const uuid = record.recording_uuid;
    device.emit("edge.recording_started", { recording_uuid: uuid });
    for (const percent of [10, 50, 100]) {
      device.emit("edge.recording_progress", { recording_uuid: uuid, progress_percent: percent });
    }
    device.emit("edge.recording_completed", {
      recording_uuid: uuid,
      filename: `${uuid}.wav`,
      file_size: 1_920_044,
      file_hash: "0f1e2d3c",
      actual_duration: 60,
    });

    await waitFor(() => server.registry.get(device.deviceId)?.statistics.success_count === 1);
    const snapshot = server.registry.get(device.deviceId);
    expect(snapshot?.status).toBe("IDLE");
    expect(snapshot?.current_recording).toBeNull();
    expect(snapshot?.statistics.total_recordings).toBe(1);
    await device.socket.close();
  });

  test("a reported capture failure returns the device to IDLE and counts an error", async () => {
    const device = await connectTestDevice(server);
    const session = await server.dispatcher.record(device.deviceId, { duration: 5 });
    await device.socket.nextMatching(isEdgeType("edge.record"));

    device.emit("edge.recording_started", { recording_uuid: session.recording_uuid });
    device.emit("edge.recording_failed", { recording_uuid: session.recording_uuid, error: "input overrun" });

    await waitFor(() => server.registry.get(device.deviceId)?.statistics.error_count === 1);
    expect(server.registry.get(device.deviceId)?.status).toBe("IDLE");
    await device.socket.close();
  });

  test("dropping the socket mid-recording reports connection_lost at once", async () => {
    const observer = await openObserverSocket(server.port);
    observer.send({ type: "subscribe", scope: "all" });
    await observer.nextMatching(isObserverType("subscribed"));

    const device = await connectTestDevice(server);
    const session = await server.dispatcher.record(device.deviceId, { duration: 60 });
    await device.socket.nextMatching(isEdgeType("edge.record"));
    device.emit("edge.recording_started", { recording_uuid: session.recording_uuid });
    await waitFor(() => server.registry.get(device.deviceId)?.status === "RECORDING");

    device.socket.ws.terminate();

    const offline = await observer.nextMatching(isObserverEvent("device.offline"));
    expect(offline.event).toMatchObject({
      type: "device.offline",
      device_id: device.deviceId,
      offline_reason: "connection_lost",
      current_recording: session.recording_uuid,
    });
    await observer.close();
  });

  test("a device that disconnects before its first heartbeat is never_connected", async () => {
    const socket = await openEdgeSocket(server.port);
    socket.send(registerFrame());
    const registered = await socket.nextMatching(isEdgeType("edge.registered"));
    await socket.close();

    await waitFor(() => server.registry.get(registered.device_id)?.status === "OFFLINE");
    expect(server.registry.get(registered.device_id)?.offline_reason).toBe("never_connected");
  });

  test("audio device replies resolve the pending query", async () => {
    const device = await connectTestDevice(server);
    const reply = server.dispatcher.queryAudioDevices(device.deviceId);

    const query = await device.socket.nextMatching(isEdgeType("edge.query_audio_devices"));
    const devices = [
      { index: 2, name: "USB Mic", max_input_channels: 2, max_output_channels: 0, default_sample_rate: 48000 },
    ];
    device.emit("edge.audio_devices_response", { request_id: query.request_id, devices });

    await expect(reply).resolves.toEqual(devices);
    expect(server.registry.get(device.deviceId)?.audio_config.available_devices).toEqual(devices);
    await device.socket.close();
  });
});

describe("edge gateway keepalive", () => {
  test("a socket that stops answering pings is terminated and marked connection_lost", async () => {
    const server = await startTestServer({ wsPingIntervalMs: 50, wsPongTimeoutMs: 200 });
    try {
      const device = await connectTestDevice(server);
      // Stop the client from answering protocol pings
      device.socket.ws.pong = () => {};

      expect(await device.socket.closed).toBe(1006);
      await waitFor(() => server.registry.get(device.deviceId)?.status === "OFFLINE");
      expect(server.registry.get(device.deviceId)?.offline_reason).toBe("connection_lost");
    } finally {
      await server.close();
    }
  });

  test("a socket that answers pings stays open", async () => {
    const server = await startTestServer({ wsPingIntervalMs: 50, wsPongTimeoutMs: 200 });
    try {
      const device = await connectTestDevice(server);
      await new Promise((resolve) => setTimeout(resolve, 500));

      expect(device.socket.ws.readyState).toBe(device.socket.ws.OPEN);
      expect(server.registry.get(device.deviceId)?.status).toBe("IDLE");
      await device.socket.close();
    } finally {
      await server.close();
    }
  });
});

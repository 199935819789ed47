/**
 * Tests for the command dispatcher: precondition checks, the record command
 * and its acknowledgement timeout, stop, audio device queries correlated by
 * request_id, and config pushes.
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { CommandRejectedError, type RecordCommand } from "@edge-fleet/shared";
import { CommandDispatcher, UNACKNOWLEDGED_RECORDING_ERROR } from "../command-dispatcher.js";
import {
  connectDevice,
  createRegistryFixture,
  silentLogger,
} from "./support/fixtures.js";

function createDispatcherFixture(options: { ackTimeoutMs?: number; queryTimeoutMs?: number } = {}) {
  const fx = createRegistryFixture();
  const dispatcher = new CommandDispatcher({
    registry: fx.registry,
    recordings: fx.recordings,
    logger: silentLogger,
    ackTimeoutMs: options.ackTimeoutMs ?? 15_000,
    queryTimeoutMs: options.queryTimeoutMs ?? 10_000,
    clock: fx.time.clock,
  });
  return { ...fx, dispatcher };
}

function isRecordCommand(message: { type: string }): message is RecordCommand {
  return message.type === "edge.record";
}

afterEach(() => {
  vi.useRealTimers();
});

describe("record", () => {
  test("sends edge.record with the requested parameters and tracks the session", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);

    const session = await fx.dispatcher.record("dev-1", {
      duration: 60,
      channels: 1,
      sample_rate: 16000,
      device_index: 0,
      bit_depth: 16,
    });

    expect(session.state).toEqual({ phase: "issued" });
    expect(transport.sent).toEqual([
      {
        type: "edge.record",
        recording_uuid: session.recording_uuid,
        duration: 60,
        channels: 1,
        sample_rate: 16000,
        device_index: 0,
        bit_depth: 16,
      },
    ]);
    fx.dispatcher.shutdown();
  });

  test("fills omitted parameters from the device's audio config", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);
    await fx.registry.update("dev-1", { audio_config: { sample_rate: 48000, channels: 2 } });

    await fx.dispatcher.record("dev-1", { duration: 5 });

    const sent = transport.sent.filter(isRecordCommand);
    expect(sent[0]).toMatchObject({ duration: 5, channels: 2, sample_rate: 48000, device_index: 0, bit_depth: 16 });
    fx.dispatcher.shutdown();
  });

  test("a second record to a recording device is rejected without contacting it", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);
    const first = await fx.dispatcher.record("dev-1", { duration: 60 });
    await fx.dispatcher.handleRecordingEvent({
      type: "edge.recording_started",
      device_id: "dev-1",
      recording_uuid: first.recording_uuid,
    });
    const sentBefore = transport.sent.length;

    await expect(fx.dispatcher.record("dev-1", { duration: 60 })).rejects.toMatchObject({
      name: "CommandRejectedError",
      code: "COMMAND_DEVICE_BUSY",
    });
    expect(transport.sent).toHaveLength(sentBefore);
    fx.dispatcher.shutdown();
  });

  test("a device with an unacknowledged command counts as busy", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);
    await fx.dispatcher.record("dev-1", { duration: 60 });

    await expect(fx.dispatcher.record("dev-1", { duration: 60 })).rejects.toBeInstanceOf(CommandRejectedError);
    fx.dispatcher.shutdown();
  });

  test("an offline device is rejected", async () => {
    const fx = createDispatcherFixture();
    const { connectionId } = await connectDevice(fx);
    await fx.registry.disconnect("dev-1", connectionId);

    await expect(fx.dispatcher.record("dev-1", { duration: 60 })).rejects.toMatchObject({
      code: "COMMAND_DEVICE_OFFLINE",
    });
  });

  test("an unknown device raises NOT_FOUND_DEVICE", async () => {
    const fx = createDispatcherFixture();
    await expect(fx.dispatcher.record("ghost", { duration: 60 })).rejects.toMatchObject({
      code: "NOT_FOUND_DEVICE",
    });
  });

  test("a send failure releases the device", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);
    transport.failSends = true;

    await expect(fx.dispatcher.record("dev-1", { duration: 60 })).rejects.toMatchObject({
      code: "COMMAND_SEND_FAILED",
    });
    expect(fx.recordings.activeFor("dev-1")).toBeUndefined();
  });
});

describe("acknowledgement timeout", () => {
  test("fails a session that never starts", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const fx = createDispatcherFixture({ ackTimeoutMs: 1_000 });
    await connectDevice(fx);
    const session = await fx.dispatcher.record("dev-1", { duration: 60 });

    await vi.advanceTimersByTimeAsync(1_000);
    // Queue behind the expiry on the device lock
    await fx.registry.withSession("dev-1", () => undefined);

    expect(fx.recordings.get(session.recording_uuid)?.state).toEqual({
      phase: "failed",
      error: UNACKNOWLEDGED_RECORDING_ERROR,
    });
    expect(fx.registry.get("dev-1")?.statistics.error_count).toBe(1);
  });

  test("does nothing once the device has started", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const fx = createDispatcherFixture({ ackTimeoutMs: 1_000 });
    await connectDevice(fx);
    const session = await fx.dispatcher.record("dev-1", { duration: 60 });
    await fx.dispatcher.handleRecordingEvent({
      type: "edge.recording_started",
      device_id: "dev-1",
      recording_uuid: session.recording_uuid,
    });

    await vi.advanceTimersByTimeAsync(5_000);
    await fx.registry.withSession("dev-1", () => undefined);

    expect(fx.recordings.get(session.recording_uuid)?.state).toEqual({ phase: "started" });
    expect(fx.registry.get("dev-1")?.status).toBe("RECORDING");
  });
});

describe("recording events", () => {
  test("the full lifecycle returns the device to IDLE with one success", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);
    const { recording_uuid } = await fx.dispatcher.record("dev-1", { duration: 60 });

    await fx.dispatcher.handleRecordingEvent({ type: "edge.recording_started", device_id: "dev-1", recording_uuid });
    for (const progress_percent of [10, 50, 100]) {
      await fx.dispatcher.handleRecordingEvent({
        type: "edge.recording_progress",
        device_id: "dev-1",
        recording_uuid,
        progress_percent,
      });
    }
    const result = await fx.dispatcher.handleRecordingEvent({
      type: "edge.recording_completed",
      device_id: "dev-1",
      recording_uuid,
      filename: `${recording_uuid}.wav`,
      file_size: 1920044,
      file_hash: "abc",
      actual_duration: 60,
    });

    expect(result.applied).toBe(true);
    expect(fx.registry.get("dev-1")).toMatchObject({
      status: "IDLE",
      statistics: { success_count: 1, total_recordings: 1 },
    });
    expect(fx.publisher.ofType("device.recording_completed")).toHaveLength(1);
  });

  test("progress that goes backwards is dropped", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);
    const { recording_uuid } = await fx.dispatcher.record("dev-1", { duration: 60 });
    await fx.dispatcher.handleRecordingEvent({ type: "edge.recording_started", device_id: "dev-1", recording_uuid });
    await fx.dispatcher.handleRecordingEvent({
      type: "edge.recording_progress",
      device_id: "dev-1",
      recording_uuid,
      progress_percent: 50,
    });

    const result = await fx.dispatcher.handleRecordingEvent({
      type: "edge.recording_progress",
      device_id: "dev-1",
      recording_uuid,
      progress_percent: 20,
    });

    expect(result).toEqual({ applied: false, reason: "progress_percent decreased: 50 -> 20" });
    fx.dispatcher.shutdown();
  });
});

describe("stop", () => {
  test("sends edge.stop for the active recording", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);
    const { recording_uuid } = await fx.dispatcher.record("dev-1", { duration: 60 });

    const result = await fx.dispatcher.stop("dev-1");

    expect(result).toEqual({ recording_uuid });
    expect(transport.sent.at(-1)).toEqual({ type: "edge.stop", recording_uuid });
    fx.dispatcher.shutdown();
  });

  test("rejects when the device is not recording", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);

    await expect(fx.dispatcher.stop("dev-1")).rejects.toMatchObject({ code: "COMMAND_NOT_RECORDING" });
  });

  test("rejects a recording id other than the active one", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);
    await fx.dispatcher.record("dev-1", { duration: 60 });

    await expect(fx.dispatcher.stop("dev-1", "another")).rejects.toMatchObject({
      code: "COMMAND_NOT_RECORDING",
    });
    fx.dispatcher.shutdown();
  });
});

describe("queryAudioDevices", () => {
  test("resolves with the device's reply and stores the list", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);

    const pending = fx.dispatcher.queryAudioDevices("dev-1");
    // Let the send happen under the device lock
    await fx.registry.withSession("dev-1", () => undefined);
    const query = transport.sent.at(-1);
    if (query?.type !== "edge.query_audio_devices") throw new Error("expected a query");

    const devices = [
      { index: 2, name: "USB Mic", max_input_channels: 2, max_output_channels: 0, default_sample_rate: 48000 },
    ];
    const matched = await fx.dispatcher.handleAudioDevicesResponse({
      type: "edge.audio_devices_response",
      device_id: "dev-1",
      request_id: query.request_id,
      devices,
    });

    expect(matched).toBe(true);
    await expect(pending).resolves.toEqual(devices);
    expect(fx.registry.get("dev-1")?.audio_config.available_devices).toEqual(devices);
    expect(fx.dispatcher.pendingQueryCount).toBe(0);
  });

  test("replies with an unknown request_id are dropped", async () => {
    const fx = createDispatcherFixture();
    await connectDevice(fx);

    const matched = await fx.dispatcher.handleAudioDevicesResponse({
      type: "edge.audio_devices_response",
      device_id: "dev-1",
      request_id: "01HZZZZZZZZZZZZZZZZZZZZZZZ",
      devices: [],
    });
    expect(matched).toBe(false);
  });

  test("times out with NETWORK_TIMEOUT", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const fx = createDispatcherFixture({ queryTimeoutMs: 500 });
    await connectDevice(fx);

    const pending = fx.dispatcher.queryAudioDevices("dev-1");
    const assertion = expect(pending).rejects.toMatchObject({ code: "NETWORK_TIMEOUT" });
    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    expect(fx.dispatcher.pendingQueryCount).toBe(0);
  });
});

describe("updateConfig", () => {
  test("pushes edge.update_config to a connected device", async () => {
    const fx = createDispatcherFixture();
    const { transport } = await connectDevice(fx);

    const result = await fx.dispatcher.updateConfig("dev-1", { device_name: "porch" });

    expect(result.delivered).toBe(true);
    expect(result.device.device_name).toBe("porch");
    expect(transport.sent.at(-1)).toEqual({ type: "edge.update_config", device_name: "porch" });
  });

  test("only stores the change while the device is offline", async () => {
    const fx = createDispatcherFixture();
    const { connectionId, transport } = await connectDevice(fx);
    await fx.registry.disconnect("dev-1", connectionId);

    const result = await fx.dispatcher.updateConfig("dev-1", { audio_config: { channels: 2 } });

    expect(result.delivered).toBe(false);
    expect(result.device.audio_config.channels).toBe(2);
    expect(transport.sent).toEqual([]);
  });
});

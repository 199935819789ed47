/**
 * Tests for the device wire protocol schemas and frame parsing.
 */

import { describe, expect, test } from "vitest";
import { DEFAULT_AUDIO_CONFIG, type RecordCommand, type RecordingParameters } from "../index.js";
import {
  audioConfigSchema,
  bitDepthSchema,
  edgeClientMessageSchema,
  heartbeatMessageSchema,
  parseEdgeClientFrame,
  parseEdgeServerFrame,
  recordCommandSchema,
  registerMessageSchema,
} from "../schemas/index.js";

/** Helper: a valid registration frame */
function makeRegister(overrides: Record<string, unknown> = {}) {
  return {
    type: "edge.register",
    device_name: "bench-01",
    platform: "linux",
    audio_config: {
      default_device_index: 0,
      channels: 1,
      sample_rate: 16000,
      bit_depth: 16,
    },
    ...overrides,
  };
}

describe("registerMessageSchema", () => {
  test("device_id may be absent on first registration", () => {
    const result = registerMessageSchema.safeParse(makeRegister());
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.device_id).toBeUndefined();
      expect(result.data.audio_config.available_devices).toEqual([]);
    }
  });

  test("device_id may be null", () => {
    const result = registerMessageSchema.safeParse(makeRegister({ device_id: null }));
    expect(result.success).toBe(true);
  });

  test("unsupported bit depth is rejected", () => {
    const result = registerMessageSchema.safeParse(
      makeRegister({
        audio_config: { default_device_index: 0, channels: 1, sample_rate: 16000, bit_depth: 12 },
      }),
    );
    expect(result.success).toBe(false);
  });
});

describe("heartbeatMessageSchema", () => {
  test("accepts an ISO timestamp with offset", () => {
    const result = heartbeatMessageSchema.safeParse({
      type: "edge.heartbeat",
      device_id: "dev-1",
      status: "recording",
      current_recording: "r1",
      timestamp: "2026-01-14T12:00:00+02:00",
    });
    expect(result.success).toBe(true);
  });

  test("rejects unknown status", () => {
    const result = heartbeatMessageSchema.safeParse({
      type: "edge.heartbeat",
      device_id: "dev-1",
      status: "offline",
      timestamp: "2026-01-14T12:00:00Z",
    });
    expect(result.success).toBe(false);
  });
});

describe("edgeClientMessageSchema", () => {
  test("discriminates on type", () => {
    const result = edgeClientMessageSchema.safeParse({
      type: "edge.recording_completed",
      device_id: "dev-1",
      recording_uuid: "r1",
      filename: "r1.wav",
      file_size: 1920044,
      file_hash: "abc",
      actual_duration: 60,
    });
    expect(result.success).toBe(true);
    if (result.success && result.data.type === "edge.recording_completed") {
      expect(result.data.file_size).toBe(1920044);
    }
  });

  test("rejects a server-only message type", () => {
    const result = edgeClientMessageSchema.safeParse({ type: "edge.stop", recording_uuid: "r1" });
    expect(result.success).toBe(false);
  });
});

describe("parseEdgeClientFrame", () => {
  test("reports invalid JSON", () => {
    expect(parseEdgeClientFrame("{nope")).toEqual({
      success: false,
      error: "frame is not valid JSON",
    });
  });

  test("reports the failing field path", () => {
    const result = parseEdgeClientFrame(
      JSON.stringify({ type: "edge.recording_failed", device_id: "dev-1", recording_uuid: "r1" }),
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe("error: Required");
    }
  });

  test("parses a valid frame", () => {
    const result = parseEdgeClientFrame(JSON.stringify(makeRegister({ device_id: "dev-1" })));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.message.type).toBe("edge.register");
    }
  });
});

describe("parseEdgeServerFrame", () => {
  test("parses edge.record with all capture parameters", () => {
    const result = parseEdgeServerFrame(
      JSON.stringify({
        type: "edge.record",
        recording_uuid: "r1",
        duration: 60,
        channels: 1,
        sample_rate: 16000,
        device_index: 0,
        bit_depth: 16,
      }),
    );
    expect(result).toEqual({
      success: true,
      message: {
        type: "edge.record",
        recording_uuid: "r1",
        duration: 60,
        channels: 1,
        sample_rate: 16000,
        device_index: 0,
        bit_depth: 16,
      },
    });
  });

  test("edge.update_config fields are optional", () => {
    const result = parseEdgeServerFrame(JSON.stringify({ type: "edge.update_config" }));
    expect(result.success).toBe(true);
  });
});

describe("bit depth", () => {
  test("only widths a capture backend can write are accepted", () => {
    expect([8, 16, 24, 32].map((d) => bitDepthSchema.safeParse(d).success)).toEqual([true, true, true, true]);
    expect(bitDepthSchema.safeParse(12).success).toBe(false);
  });

  test("the default audio config is a valid wire audio config", () => {
    expect(audioConfigSchema.parse(DEFAULT_AUDIO_CONFIG)).toEqual(DEFAULT_AUDIO_CONFIG);
  });

  test("recording parameters spread into a record command frame", () => {
    const parameters: RecordingParameters = {
      duration: 30,
      channels: 2,
      sample_rate: 48000,
      device_index: 1,
      bit_depth: 24,
    };
    const command: RecordCommand = { type: "edge.record", recording_uuid: "rec-1", ...parameters };

    expect(recordCommandSchema.parse(command)).toEqual(command);
  });
});

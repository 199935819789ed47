/**
 * Zod schemas for the device wire protocol.
 *
 * Every frame on the `/edge` socket is a single JSON object: `type` names the
 * message and the remaining keys are its payload fields, e.g.
 *
 *   {"type":"edge.heartbeat","device_id":"…","status":"idle","current_recording":null,"timestamp":"…"}
 *
 * Field names are part of the wire contract with deployed agents and must not
 * be renamed.
 *
 * Used by:
 *   - Server edge gateway to validate device frames
 *   - Agent to validate server commands before acting on them
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

export const audioDeviceInfoSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string(),
  max_input_channels: z.number().int().nonnegative(),
  max_output_channels: z.number().int().nonnegative().default(0),
  default_sample_rate: z.number().positive(),
});

/** Sample widths every capture backend can write */
export const bitDepthSchema = z.union([z.literal(8), z.literal(16), z.literal(24), z.literal(32)]);

export const audioConfigSchema = z.object({
  default_device_index: z.number().int().nonnegative(),
  channels: z.number().int().min(1).max(32),
  sample_rate: z.number().int().min(8000).max(384000),
  bit_depth: bitDepthSchema,
  available_devices: z.array(audioDeviceInfoSchema).default([]),
});

/** Partial audio config accepted by `edge.update_config` and the config API */
export const audioConfigPatchSchema = audioConfigSchema.partial();

/** Status as self-reported by the agent in heartbeats */
export const agentStatusSchema = z.enum(["idle", "recording"]);

export const recordingParametersSchema = z.object({
  duration: z.number().positive().max(86_400),
  channels: z.number().int().min(1).max(32),
  sample_rate: z.number().int().min(8000).max(384000),
  device_index: z.number().int().nonnegative(),
  bit_depth: bitDepthSchema,
});

const deviceIdSchema = z.string().min(1).max(128);
const recordingUuidSchema = z.string().min(1).max(128);

// ---------------------------------------------------------------------------
// Client -> Server
// ---------------------------------------------------------------------------

export const registerMessageSchema = z.object({
  type: z.literal("edge.register"),
  /** Absent (or null) on a device's first-ever connection */
  device_id: deviceIdSchema.nullish(),
  device_name: z.string().min(1).max(200),
  platform: z.string().min(1).max(100),
  audio_config: audioConfigSchema,
});

export const heartbeatMessageSchema = z.object({
  type: z.literal("edge.heartbeat"),
  device_id: deviceIdSchema,
  status: agentStatusSchema,
  current_recording: recordingUuidSchema.nullish(),
  /** ISO-8601 on the device clock; orders heartbeats of one device */
  timestamp: z.string().datetime({ offset: true }),
});

export const recordingStartedMessageSchema = z.object({
  type: z.literal("edge.recording_started"),
  device_id: deviceIdSchema,
  recording_uuid: recordingUuidSchema,
});

export const recordingProgressMessageSchema = z.object({
  type: z.literal("edge.recording_progress"),
  device_id: deviceIdSchema,
  recording_uuid: recordingUuidSchema,
  // Range is enforced by the recording lifecycle so the rejection is logged
  // against the session rather than as a malformed frame.
  progress_percent: z.number(),
});

export const recordingCompletedMessageSchema = z.object({
  type: z.literal("edge.recording_completed"),
  device_id: deviceIdSchema,
  recording_uuid: recordingUuidSchema,
  filename: z.string().min(1),
  file_size: z.number().int().nonnegative(),
  file_hash: z.string().min(1),
  actual_duration: z.number().nonnegative(),
});

export const recordingFailedMessageSchema = z.object({
  type: z.literal("edge.recording_failed"),
  device_id: deviceIdSchema,
  recording_uuid: recordingUuidSchema,
  error: z.string(),
});

export const audioDevicesResponseMessageSchema = z.object({
  type: z.literal("edge.audio_devices_response"),
  device_id: deviceIdSchema,
  request_id: z.string().min(1),
  devices: z.array(audioDeviceInfoSchema),
});

export const edgeClientMessageSchema = z.discriminatedUnion("type", [
  registerMessageSchema,
  heartbeatMessageSchema,
  recordingStartedMessageSchema,
  recordingProgressMessageSchema,
  recordingCompletedMessageSchema,
  recordingFailedMessageSchema,
  audioDevicesResponseMessageSchema,
]);

// ---------------------------------------------------------------------------
// Server -> Client
// ---------------------------------------------------------------------------

export const registeredMessageSchema = z.object({
  type: z.literal("edge.registered"),
  device_id: deviceIdSchema,
  is_new: z.boolean(),
});

export const recordCommandSchema = recordingParametersSchema.extend({
  type: z.literal("edge.record"),
  recording_uuid: recordingUuidSchema,
});

export const stopCommandSchema = z.object({
  type: z.literal("edge.stop"),
  recording_uuid: recordingUuidSchema,
});

export const queryAudioDevicesCommandSchema = z.object({
  type: z.literal("edge.query_audio_devices"),
  request_id: z.string().min(1),
});

export const updateConfigCommandSchema = z.object({
  type: z.literal("edge.update_config"),
  device_name: z.string().min(1).max(200).optional(),
  audio_config: audioConfigPatchSchema.optional(),
});

export const errorMessageSchema = z.object({
  type: z.literal("edge.error"),
  error: z.string(),
  message: z.string(),
});

export const edgeServerMessageSchema = z.discriminatedUnion("type", [
  registeredMessageSchema,
  recordCommandSchema,
  stopCommandSchema,
  queryAudioDevicesCommandSchema,
  updateConfigCommandSchema,
  errorMessageSchema,
]);

// ---------------------------------------------------------------------------
// Inferred types
// ---------------------------------------------------------------------------

export type BitDepth = z.infer<typeof bitDepthSchema>;
export type AgentStatus = z.infer<typeof agentStatusSchema>;
export type AudioConfigPatch = z.infer<typeof audioConfigPatchSchema>;

export type RegisterMessage = z.infer<typeof registerMessageSchema>;
export type HeartbeatMessage = z.infer<typeof heartbeatMessageSchema>;
export type RecordingStartedMessage = z.infer<typeof recordingStartedMessageSchema>;
export type RecordingProgressMessage = z.infer<typeof recordingProgressMessageSchema>;
export type RecordingCompletedMessage = z.infer<typeof recordingCompletedMessageSchema>;
export type RecordingFailedMessage = z.infer<typeof recordingFailedMessageSchema>;
export type AudioDevicesResponseMessage = z.infer<typeof audioDevicesResponseMessageSchema>;
export type EdgeClientMessage = z.infer<typeof edgeClientMessageSchema>;

/** Recording lifecycle events a device reports, in wire form */
export type RecordingEventMessage =
  | RecordingStartedMessage
  | RecordingProgressMessage
  | RecordingCompletedMessage
  | RecordingFailedMessage;

export type RegisteredMessage = z.infer<typeof registeredMessageSchema>;
export type RecordCommand = z.infer<typeof recordCommandSchema>;
export type StopCommand = z.infer<typeof stopCommandSchema>;
export type QueryAudioDevicesCommand = z.infer<typeof queryAudioDevicesCommandSchema>;
export type UpdateConfigCommand = z.infer<typeof updateConfigCommandSchema>;
export type EdgeErrorMessage = z.infer<typeof errorMessageSchema>;
export type EdgeServerMessage = z.infer<typeof edgeServerMessageSchema>;

// ---------------------------------------------------------------------------
// Frame parsing
// ---------------------------------------------------------------------------

export type FrameParseResult<T> =
  | { success: true; message: T }
  | { success: false; error: string };

function parseFrame<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): FrameParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { success: false, error: "frame is not valid JSON" };
  }

  const result = schema.safeParse(json);
  if (result.success) {
    return { success: true, message: result.data };
  }

  const issues = result.error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  return { success: false, error: issues };
}

/** Parse a raw text frame sent by a device */
export function parseEdgeClientFrame(raw: string): FrameParseResult<EdgeClientMessage> {
  return parseFrame(raw, edgeClientMessageSchema);
}

/** Parse a raw text frame sent by the server */
export function parseEdgeServerFrame(raw: string): FrameParseResult<EdgeServerMessage> {
  return parseFrame(raw, edgeServerMessageSchema);
}

/**
 * Device type definitions.
 *
 * A device is one edge node of the fleet: a small machine with one or more
 * audio inputs that connects to the server over a persistent WebSocket,
 * heartbeats, and executes recording commands. The server assigns its
 * identity on first registration; the agent stores it and reuses it forever.
 */

import type { BitDepth } from "../schemas/edge-messages.js";

/** Status reported to observers and stored with the device record */
export type DeviceStatus = "IDLE" | "RECORDING" | "OFFLINE";

/** Every device status, in display order */
export const DEVICE_STATUSES = ["IDLE", "RECORDING", "OFFLINE"] as const satisfies readonly DeviceStatus[];

/** Why a device is OFFLINE. Only meaningful while status is OFFLINE. */
export type OfflineReason = "never_connected" | "heartbeat_timeout" | "connection_lost";

export const OFFLINE_REASONS = [
  "never_connected",
  "heartbeat_timeout",
  "connection_lost",
] as const satisfies readonly OfflineReason[];

/** One capturable input as reported by the agent */
export interface AudioDeviceInfo {
  index: number;
  name: string;
  max_input_channels: number;
  max_output_channels: number;
  default_sample_rate: number;
}

/**
 * Capture parameters the server uses when a record command omits them,
 * plus the last-known list of inputs on the device.
 */
export interface AudioConfig {
  default_device_index: number;
  channels: number;
  sample_rate: number;
  bit_depth: BitDepth;
  available_devices: AudioDeviceInfo[];
}

/** Monotonic recording counters */
export interface DeviceStatistics {
  total_recordings: number;
  success_count: number;
  error_count: number;
  /** ISO-8601, null until the first recording finishes */
  last_recording_at: string | null;
}

/** Interval recording schedule attached to a device */
export interface ScheduleConfig {
  enabled: boolean;
  interval_seconds: number;
  duration_seconds: number;
  /** "HH:MM" local time, null for no lower bound */
  start_time: string | null;
  /** "HH:MM" local time, null for no upper bound */
  end_time: string | null;
  /** Disable the schedule once success_count reaches this value */
  max_success_count: number | null;
}

/**
 * Serializable view of a device, as broadcast to observers and returned
 * by the command API. Never contains the live transport handle.
 */
export interface DeviceSnapshot {
  device_id: string;
  device_name: string;
  platform: string;
  status: DeviceStatus;
  offline_reason: OfflineReason | null;
  current_recording: string | null;
  audio_config: AudioConfig;
  statistics: DeviceStatistics;
  schedule_config: ScheduleConfig | null;
  connection: {
    peer_address: string | null;
    connected_at: string;
    last_heartbeat: string | null;
  } | null;
  last_heartbeat: string | null;
  created_at: string;
  updated_at: string;
}

/** Default capture parameters for a device that never sent any */
export const DEFAULT_AUDIO_CONFIG: AudioConfig = {
  default_device_index: 0,
  channels: 1,
  sample_rate: 16000,
  bit_depth: 16,
  available_devices: [],
};

export function emptyStatistics(): DeviceStatistics {
  return {
    total_recordings: 0,
    success_count: 0,
    error_count: 0,
    last_recording_at: null,
  };
}

/**
 * Server-side device session model.
 *
 * Device status and the active recording are a single tagged union, so a
 * device cannot be IDLE while pointing at a recording, or RECORDING without
 * one. The persisted part (DeviceRecord) is separate from the live
 * connection, which never outlives the process.
 */

import type {
  AudioConfig,
  DeviceSnapshot,
  DeviceStatistics,
  DeviceStatus,
  EdgeServerMessage,
  OfflineReason,
  ScheduleConfig,
} from "@edge-fleet/shared";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export type DeviceState =
  | { kind: "idle" }
  | { kind: "recording"; recording_uuid: string }
  | {
      kind: "offline";
      reason: OfflineReason;
      /** Recording that was active when the device went offline, kept for history */
      current_recording: string | null;
    };

export function statusOf(state: DeviceState): DeviceStatus {
  switch (state.kind) {
    case "idle":
      return "IDLE";
    case "recording":
      return "RECORDING";
    case "offline":
      return "OFFLINE";
  }
}

/** The recording a state references, if any */
export function recordingOf(state: DeviceState): string | null {
  switch (state.kind) {
    case "idle":
      return null;
    case "recording":
      return state.recording_uuid;
    case "offline":
      return state.current_recording;
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** The durable part of a device, as written to the device store */
export interface DeviceRecord {
  device_id: string;
  device_name: string;
  platform: string;
  state: DeviceState;
  audio_config: AudioConfig;
  statistics: DeviceStatistics;
  schedule_config: ScheduleConfig | null;
  /** ISO-8601 server time of the last accepted heartbeat, null if never */
  last_heartbeat: string | null;
  created_at: string;
  updated_at: string;
}

/** Outbound half of a device socket, as seen by the domain */
export interface DeviceTransport {
  send(message: EdgeServerMessage): void;
  close(code: number, reason: string): void;
}

export interface DeviceConnection {
  connection_id: string;
  transport: DeviceTransport;
  peer_address: string | null;
  connected_at: string;
  /** Server time of the last heartbeat accepted on this connection */
  last_heartbeat: string | null;
  /** Device-clock timestamp (ms) of that heartbeat; orders later ones */
  last_client_timestamp: number | null;
}

export interface DeviceSession extends DeviceRecord {
  connection: DeviceConnection | null;
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

export function toRecord(session: DeviceSession): DeviceRecord {
  return {
    device_id: session.device_id,
    device_name: session.device_name,
    platform: session.platform,
    state: session.state,
    audio_config: session.audio_config,
    statistics: session.statistics,
    schedule_config: session.schedule_config,
    last_heartbeat: session.last_heartbeat,
    created_at: session.created_at,
    updated_at: session.updated_at,
  };
}

export function toSnapshot(session: DeviceSession): DeviceSnapshot {
  const { state, connection } = session;
  return {
    device_id: session.device_id,
    device_name: session.device_name,
    platform: session.platform,
    status: statusOf(state),
    offline_reason: state.kind === "offline" ? state.reason : null,
    current_recording: recordingOf(state),
    audio_config: structuredClone(session.audio_config),
    statistics: { ...session.statistics },
    schedule_config: session.schedule_config ? { ...session.schedule_config } : null,
    connection: connection
      ? {
          peer_address: connection.peer_address,
          connected_at: connection.connected_at,
          last_heartbeat: connection.last_heartbeat,
        }
      : null,
    last_heartbeat: session.last_heartbeat,
    created_at: session.created_at,
    updated_at: session.updated_at,
  };
}

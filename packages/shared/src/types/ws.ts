/**
 * Observer WebSocket protocol.
 *
 * Observers (dashboards, operator tools) connect to `/api/ws`, subscribe to
 * the whole fleet or to single devices, and receive every device-state and
 * recording-lifecycle transition as it happens.
 *
 * Message flow:
 *   Observer -> Server: subscribe, unsubscribe, pong
 *   Server -> Observer: event, ping, error, subscribed, unsubscribed
 */

import type {
  AudioDeviceInfo,
  DeviceSnapshot,
  DeviceStatus,
  OfflineReason,
} from "./device.js";

// ---------------------------------------------------------------------------
// Observer events (what the broadcast hub publishes)
// ---------------------------------------------------------------------------

/** Fields every observer event carries */
interface ObserverEventBase {
  /** ISO-8601 time the server produced the event */
  timestamp: string;
}

export interface DeviceRegisteredEvent extends ObserverEventBase {
  type: "device.registered";
  device_id: string;
  is_new: boolean;
  device: DeviceSnapshot;
}

export interface DeviceOnlineEvent extends ObserverEventBase {
  type: "device.online";
  device_id: string;
}

export interface DeviceOfflineEvent extends ObserverEventBase {
  type: "device.offline";
  device_id: string;
  offline_reason: OfflineReason;
  /** Recording that was active when the device dropped, kept for history */
  current_recording: string | null;
}

export interface DeviceStatusChangedEvent extends ObserverEventBase {
  type: "device.status_changed";
  device_id: string;
  previous_status: DeviceStatus;
  status: DeviceStatus;
  current_recording: string | null;
}

export interface DeviceHeartbeatEvent extends ObserverEventBase {
  type: "device.heartbeat";
  device_id: string;
  status: DeviceStatus;
  last_heartbeat: string;
}

export interface DeviceRecordingStartedEvent extends ObserverEventBase {
  type: "device.recording_started";
  device_id: string;
  recording_uuid: string;
}

export interface DeviceRecordingProgressEvent extends ObserverEventBase {
  type: "device.recording_progress";
  device_id: string;
  recording_uuid: string;
  progress_percent: number;
}

export interface DeviceRecordingCompletedEvent extends ObserverEventBase {
  type: "device.recording_completed";
  device_id: string;
  recording_uuid: string;
  filename: string;
  file_size: number;
  file_hash: string;
  actual_duration: number;
}

export interface DeviceRecordingFailedEvent extends ObserverEventBase {
  type: "device.recording_failed";
  device_id: string;
  recording_uuid: string;
  error: string;
}

export interface DeviceAudioDevicesUpdatedEvent extends ObserverEventBase {
  type: "device.audio_devices_updated";
  device_id: string;
  devices: AudioDeviceInfo[];
}

export interface DeviceConfigUpdatedEvent extends ObserverEventBase {
  type: "device.config_updated";
  device_id: string;
  device: DeviceSnapshot;
}

export interface FleetStats {
  total_devices: number;
  online_devices: number;
  offline_devices: number;
  recording_devices: number;
}

export interface FleetStatsUpdatedEvent extends ObserverEventBase, FleetStats {
  type: "fleet.stats_updated";
}

export type ObserverEvent =
  | DeviceRegisteredEvent
  | DeviceOnlineEvent
  | DeviceOfflineEvent
  | DeviceStatusChangedEvent
  | DeviceHeartbeatEvent
  | DeviceRecordingStartedEvent
  | DeviceRecordingProgressEvent
  | DeviceRecordingCompletedEvent
  | DeviceRecordingFailedEvent
  | DeviceAudioDevicesUpdatedEvent
  | DeviceConfigUpdatedEvent
  | FleetStatsUpdatedEvent;

export type ObserverEventType = ObserverEvent["type"];

/**
 * Distributive Omit, so building an event without its timestamp keeps the
 * union discriminated.
 */
export type ObserverEventInput = ObserverEvent extends infer E
  ? E extends ObserverEvent
    ? Omit<E, "timestamp">
    : never
  : never;

// ---------------------------------------------------------------------------
// Observer -> Server messages
// ---------------------------------------------------------------------------

/** Subscribe to the whole fleet or to one device */
export type ObserverSubscribeMessage =
  | { type: "subscribe"; scope: "all" }
  | { type: "subscribe"; device_id: string };

/** Unsubscribe from one device, or clear all subscriptions */
export interface ObserverUnsubscribeMessage {
  type: "unsubscribe";
  device_id?: string;
}

/** Reply to a server ping */
export interface ObserverPongMessage {
  type: "pong";
}

export type ObserverClientMessage =
  | ObserverSubscribeMessage
  | ObserverUnsubscribeMessage
  | ObserverPongMessage;

// ---------------------------------------------------------------------------
// Server -> Observer messages
// ---------------------------------------------------------------------------

export interface ObserverEventMessage {
  type: "event";
  event: ObserverEvent;
}

export interface ObserverPingMessage {
  type: "ping";
}

export interface ObserverErrorMessage {
  type: "error";
  message: string;
}

export interface ObserverSubscribedMessage {
  type: "subscribed";
  subscription: string;
}

export interface ObserverUnsubscribedMessage {
  type: "unsubscribed";
  subscription: string;
}

export type ObserverServerMessage =
  | ObserverEventMessage
  | ObserverPingMessage
  | ObserverErrorMessage
  | ObserverSubscribedMessage
  | ObserverUnsubscribedMessage;

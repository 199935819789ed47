/**
 * Command dispatcher: sends commands to exactly one live device and tracks
 * what comes back.
 *
 * Preconditions are checked under the device's lock and a failed check
 * throws CommandRejectedError straight away, so callers get an immediate
 * rejection and nothing is ever queued for a busy or offline device.
 *
 * Replies are correlated two ways:
 *   - recording events by `recording_uuid` (through the RecordingTracker)
 *   - audio device queries by `request_id` (pending map with timeout)
 *
 * A record command the device never acknowledges with `recording_started`
 * within the ack timeout fails the session so the device becomes usable
 * again.
 */

import type { Logger } from "pino";
import {
  CommandRejectedError,
  NetworkError,
  errorMessage,
  generateId,
  generateUuid,
  type AudioDeviceInfo,
  type AudioDevicesResponseMessage,
  type DeviceSnapshot,
  type EdgeServerMessage,
  type RecordingEventMessage,
  type RecordingParameters,
  type RecordingSession,
  type UpdateConfigCommand,
} from "@edge-fleet/shared";
import type { DevicePatch, DeviceRegistry, RecordingEventResult } from "./device-registry.js";
import type { DeviceSession } from "./device-state.js";
import type { RecordingEvent, RecordingTracker } from "./recording-lifecycle.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandDispatcherDeps {
  registry: DeviceRegistry;
  recordings: RecordingTracker;
  logger: Logger;
  /** How long an issued record command may wait for `recording_started` (ms) */
  ackTimeoutMs: number;
  /** How long an audio device query waits for its reply (ms) */
  queryTimeoutMs: number;
  clock?: () => Date;
}

/** Record request; omitted capture parameters come from the device's audio_config */
export type RecordRequest = Pick<RecordingParameters, "duration"> & Partial<RecordingParameters>;

export interface StopResult {
  recording_uuid: string;
}

export interface ConfigUpdateResult {
  device: DeviceSnapshot;
  /** False when the device was offline and only the stored record changed */
  delivered: boolean;
}

export const UNACKNOWLEDGED_RECORDING_ERROR = "device did not acknowledge record command";

interface PendingQuery {
  device_id: string;
  resolve: (devices: AudioDeviceInfo[]) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class CommandDispatcher {
  private readonly registry: DeviceRegistry;
  private readonly recordings: RecordingTracker;
  private readonly logger: Logger;
  private readonly ackTimeoutMs: number;
  private readonly queryTimeoutMs: number;
  private readonly clock: () => Date;

  private readonly ackTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly pendingQueries = new Map<string, PendingQuery>();

  constructor(deps: CommandDispatcherDeps) {
    this.registry = deps.registry;
    this.recordings = deps.recordings;
    this.logger = deps.logger.child({ component: "command-dispatcher" });
    this.ackTimeoutMs = deps.ackTimeoutMs;
    this.queryTimeoutMs = deps.queryTimeoutMs;
    this.clock = deps.clock ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /**
   * Issue `edge.record` to an IDLE, connected device. Rejects with
   * COMMAND_DEVICE_OFFLINE or COMMAND_DEVICE_BUSY without contacting the
   * device, and with COMMAND_SEND_FAILED if the socket refuses the frame.
   */
  record(deviceId: string, request: RecordRequest): Promise<RecordingSession> {
    return this.registry.withSession(deviceId, (session) => {
      this.requireOnline(session);

      const active = this.recordings.activeFor(deviceId);
      if (session.state.kind === "recording" || active) {
        throw new CommandRejectedError("Device is already recording", "COMMAND_DEVICE_BUSY", {
          device_id: deviceId,
          current_recording: active?.recording_uuid ?? null,
        });
      }

      const { audio_config } = session;
      const parameters: RecordingParameters = {
        duration: request.duration,
        channels: request.channels ?? audio_config.channels,
        sample_rate: request.sample_rate ?? audio_config.sample_rate,
        device_index: request.device_index ?? audio_config.default_device_index,
        bit_depth: request.bit_depth ?? audio_config.bit_depth,
      };

      const recordingUuid = generateUuid();
      const recording = this.recordings.create(recordingUuid, deviceId, parameters, this.clock());

      this.send(session, { type: "edge.record", recording_uuid: recordingUuid, ...parameters }, () =>
        this.recordings.discard(recordingUuid),
      );

      this.armAckTimer(deviceId, recordingUuid);
      this.logger.info(
        { device_id: deviceId, recording_uuid: recordingUuid, ...parameters },
        "Record command issued",
      );
      return recording;
    });
  }

  /**
   * Ask a recording device to stop early. Best-effort: the session stays
   * where it is until the device reports completion or failure.
   */
  stop(deviceId: string, recordingUuid?: string): Promise<StopResult> {
    return this.registry.withSession(deviceId, (session) => {
      this.requireOnline(session);

      const active = this.recordings.activeFor(deviceId);
      const target = recordingUuid ?? active?.recording_uuid;
      if (!active || target !== active.recording_uuid) {
        throw new CommandRejectedError("Device is not recording", "COMMAND_NOT_RECORDING", {
          device_id: deviceId,
          recording_uuid: target ?? null,
        });
      }

      this.send(session, { type: "edge.stop", recording_uuid: active.recording_uuid });
      this.logger.info({ device_id: deviceId, recording_uuid: active.recording_uuid }, "Stop command sent");
      return { recording_uuid: active.recording_uuid };
    });
  }

  /**
   * Ask the device for its current input list. Resolves with the reply, or
   * rejects with NETWORK_TIMEOUT when none arrives in time.
   */
  async queryAudioDevices(deviceId: string): Promise<AudioDeviceInfo[]> {
    // The lock only covers the send; waiting for the reply happens outside it
    const { reply } = await this.registry.withSession(deviceId, (session) => {
      this.requireOnline(session);

      const requestId = generateId();
      const reply = new Promise<AudioDeviceInfo[]>((resolve, reject) => {
        const timer = setTimeout(() => {
          this.pendingQueries.delete(requestId);
          reject(
            new NetworkError("Device did not answer audio device query", "NETWORK_TIMEOUT", {
              device_id: deviceId,
              request_id: requestId,
              timeout_ms: this.queryTimeoutMs,
            }),
          );
        }, this.queryTimeoutMs);
        timer.unref();
        this.pendingQueries.set(requestId, { device_id: deviceId, resolve, reject, timer });
      });

      this.send(session, { type: "edge.query_audio_devices", request_id: requestId }, () => {
        const pending = this.pendingQueries.get(requestId);
        if (pending) {
          clearTimeout(pending.timer);
          this.pendingQueries.delete(requestId);
        }
      });
      return { reply };
    });
    return reply;
  }

  /**
   * Update a device's name or capture defaults. The stored record changes
   * either way; the device is told only when it is connected.
   */
  async updateConfig(deviceId: string, patch: DevicePatch): Promise<ConfigUpdateResult> {
    const device = await this.registry.update(deviceId, patch);

    const delivered = await this.registry.withSession(deviceId, (session) => {
      if (!session.connection || session.state.kind === "offline") return false;
      const message: UpdateConfigCommand = { type: "edge.update_config" };
      if (patch.device_name !== undefined) message.device_name = patch.device_name;
      if (patch.audio_config !== undefined) message.audio_config = patch.audio_config;
      try {
        session.connection.transport.send(message);
        return true;
      } catch (err) {
        this.logger.warn({ err, device_id: deviceId }, "Failed to push config update");
        return false;
      }
    });

    return { device, delivered };
  }

  // -------------------------------------------------------------------------
  // Device replies
  // -------------------------------------------------------------------------

  /** Route a recording lifecycle event from a device */
  async handleRecordingEvent(message: RecordingEventMessage): Promise<RecordingEventResult> {
    const event = toRecordingEvent(message);
    const result = await this.registry.applyRecordingEvent(
      message.device_id,
      message.recording_uuid,
      event,
    );
    if (result.applied && event.kind !== "progress") {
      this.clearAckTimer(message.recording_uuid);
    }
    return result;
  }

  /** Resolve the pending query a device answered */
  async handleAudioDevicesResponse(message: AudioDevicesResponseMessage): Promise<boolean> {
    const pending = this.pendingQueries.get(message.request_id);
    if (!pending || pending.device_id !== message.device_id) {
      this.logger.warn(
        { device_id: message.device_id, request_id: message.request_id },
        "Dropping audio device reply with no matching query",
      );
      return false;
    }

    clearTimeout(pending.timer);
    this.pendingQueries.delete(message.request_id);
    await this.registry.setAudioDevices(message.device_id, message.devices);
    pending.resolve(message.devices);
    return true;
  }

  /** Cancel timers and fail outstanding queries (server shutdown) */
  shutdown(): void {
    for (const timer of this.ackTimers.values()) clearTimeout(timer);
    this.ackTimers.clear();
    for (const [requestId, pending] of this.pendingQueries) {
      clearTimeout(pending.timer);
      pending.reject(
        new NetworkError("Server shutting down", "NETWORK_SHUTDOWN", { request_id: requestId }),
      );
    }
    this.pendingQueries.clear();
  }

  get pendingQueryCount(): number {
    return this.pendingQueries.size;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requireOnline(session: DeviceSession): asserts session is DeviceSession & {
    connection: NonNullable<DeviceSession["connection"]>;
  } {
    if (!session.connection || session.state.kind === "offline") {
      throw new CommandRejectedError("Device is offline", "COMMAND_DEVICE_OFFLINE", {
        device_id: session.device_id,
        offline_reason: session.state.kind === "offline" ? session.state.reason : null,
      });
    }
  }

  private send(
    session: DeviceSession & { connection: NonNullable<DeviceSession["connection"]> },
    message: EdgeServerMessage,
    onFailure?: () => void,
  ): void {
    try {
      session.connection.transport.send(message);
    } catch (err) {
      onFailure?.();
      throw new CommandRejectedError("Failed to send command to device", "COMMAND_SEND_FAILED", {
        device_id: session.device_id,
        type: message.type,
        cause: errorMessage(err),
      });
    }
  }

  private armAckTimer(deviceId: string, recordingUuid: string): void {
    const timer = setTimeout(() => {
      this.ackTimers.delete(recordingUuid);
      void this.expireUnacknowledged(deviceId, recordingUuid);
    }, this.ackTimeoutMs);
    timer.unref();
    this.ackTimers.set(recordingUuid, timer);
  }

  private clearAckTimer(recordingUuid: string): void {
    const timer = this.ackTimers.get(recordingUuid);
    if (timer) {
      clearTimeout(timer);
      this.ackTimers.delete(recordingUuid);
    }
  }

  /** Fail a session that is still ISSUED. Never rejects. */
  private async expireUnacknowledged(deviceId: string, recordingUuid: string): Promise<void> {
    if (this.recordings.get(recordingUuid)?.state.phase !== "issued") return;

    this.logger.warn(
      { device_id: deviceId, recording_uuid: recordingUuid, timeout_ms: this.ackTimeoutMs },
      "Record command not acknowledged, failing recording",
    );
    try {
      await this.registry.applyRecordingEvent(deviceId, recordingUuid, {
        kind: "failed",
        error: UNACKNOWLEDGED_RECORDING_ERROR,
      });
    } catch (err) {
      this.logger.error({ err, device_id: deviceId, recording_uuid: recordingUuid }, "Failed to expire recording");
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toRecordingEvent(message: RecordingEventMessage): RecordingEvent {
  switch (message.type) {
    case "edge.recording_started":
      return { kind: "started" };
    case "edge.recording_progress":
      return { kind: "progress", percent: message.progress_percent };
    case "edge.recording_completed":
      return {
        kind: "completed",
        filename: message.filename,
        file_size: message.file_size,
        file_hash: message.file_hash,
        actual_duration: message.actual_duration,
      };
    case "edge.recording_failed":
      return { kind: "failed", error: message.error };
  }
}

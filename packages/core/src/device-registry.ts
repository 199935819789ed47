/**
 * Device registry: the single source of truth for "is this device online".
 *
 * Holds one DeviceSession per known device identity, writes every durable
 * change through to a DeviceStore, and publishes each transition to the
 * broadcast hub. All read-modify-write sequences for one device run under
 * that device's lock (KeyedMutex); unrelated devices never wait on each other.
 *
 * Entry points and who calls them:
 *   register / heartbeat / disconnect   edge gateway, per device frame
 *   applyRecordingEvent                 command dispatcher
 *   sweep                               liveness monitor
 *   update / setSchedule / setAudioDevices   command API
 *
 * Every demotion goes through markOfflineLocked, which is idempotent: an
 * already-OFFLINE device is left untouched and nothing is re-broadcast.
 */

import type { Logger } from "pino";
import {
  NotFoundError,
  StorageError,
  emptyStatistics,
  errorMessage,
  generateId,
  generateUuid,
  type AudioConfigPatch,
  type AudioDeviceInfo,
  type DeviceSnapshot,
  type FleetStats,
  type HeartbeatMessage,
  type OfflineReason,
  type RegisterMessage,
  type ScheduleConfig,
} from "@edge-fleet/shared";
import type { EventPublisher } from "./broadcast-hub.js";
import {
  recordingOf,
  statusOf,
  toRecord,
  toSnapshot,
  type DeviceConnection,
  type DeviceSession,
  type DeviceState,
  type DeviceTransport,
} from "./device-state.js";
import type { DeviceStore } from "./device-store.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { RecordingEvent, RecordingTracker } from "./recording-lifecycle.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DeviceRegistryDeps {
  store: DeviceStore;
  hub: EventPublisher;
  recordings: RecordingTracker;
  logger: Logger;
  /** Silence after which the sweep demotes a device (ms) */
  heartbeatTimeoutMs: number;
  clock?: () => Date;
}

export interface RegisterResult {
  device_id: string;
  is_new: boolean;
  /** Identifies this connection in later heartbeat/disconnect calls */
  connection_id: string;
  device: DeviceSnapshot;
}

export type HeartbeatResult =
  | { applied: true; device: DeviceSnapshot }
  | { applied: false; reason: "unknown_device" | "stale_connection" | "out_of_order" };

export type RecordingEventResult =
  | { applied: true; device: DeviceSnapshot }
  | { applied: false; reason: string };

export interface DevicePatch {
  device_name?: string;
  audio_config?: AudioConfigPatch;
}

/** Recording failure reason used when a device silently drops a recording */
export const ABANDONED_RECORDING_ERROR = "recording abandoned: device reported idle";

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class DeviceRegistry {
  private readonly sessions = new Map<string, DeviceSession>();
  private readonly mutex = new KeyedMutex();
  private readonly store: DeviceStore;
  private readonly hub: EventPublisher;
  private readonly recordings: RecordingTracker;
  private readonly logger: Logger;
  private readonly heartbeatTimeoutMs: number;
  private readonly clock: () => Date;

  constructor(deps: DeviceRegistryDeps) {
    this.store = deps.store;
    this.hub = deps.hub;
    this.recordings = deps.recordings;
    this.logger = deps.logger.child({ component: "device-registry" });
    this.heartbeatTimeoutMs = deps.heartbeatTimeoutMs;
    this.clock = deps.clock ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Startup
  // -------------------------------------------------------------------------

  /**
   * Load every stored device. Connections do not survive a restart, so each
   * one comes back OFFLINE: with its stored reason if it was already offline,
   * NEVER_CONNECTED if it never heartbeated, CONNECTION_LOST otherwise.
   */
  async hydrate(): Promise<number> {
    const records = await this.store.loadAll();
    for (const record of records) {
      const state: DeviceState =
        record.state.kind === "offline"
          ? record.state
          : {
              kind: "offline",
              reason: record.last_heartbeat === null ? "never_connected" : "connection_lost",
              current_recording: recordingOf(record.state),
            };
      this.sessions.set(record.device_id, { ...record, state, connection: null });
    }
    this.logger.info({ count: records.length }, "Device registry hydrated");
    return records.length;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Attach a freshly connected device. A missing `device_id` gets a new
   * identity; a known one reuses its session (replacing any older
   * connection); an unknown one is adopted as-is.
   *
   * A reconnecting device stays RECORDING only while the recording it
   * referenced is still live in the tracker and has been started; otherwise
   * it registers IDLE.
   */
  register(
    message: RegisterMessage,
    transport: DeviceTransport,
    peerAddress: string | null,
  ): Promise<RegisterResult> {
    const deviceId = message.device_id ?? generateUuid();
    return this.mutex.run(deviceId, async () => {
      const now = this.clock().toISOString();
      const existing = this.sessions.get(deviceId);
      const isNew = message.device_id === undefined || message.device_id === null;

      const connection: DeviceConnection = {
        connection_id: generateId(),
        transport,
        peer_address: peerAddress,
        connected_at: now,
        last_heartbeat: null,
        last_client_timestamp: null,
      };

      const audioConfig = { ...message.audio_config };
      let session: DeviceSession;
      let previousState: DeviceState | null = null;

      if (existing) {
        previousState = existing.state;
        if (existing.connection) {
          this.logger.warn(
            { device_id: deviceId, old_connection: existing.connection.connection_id },
            "Device re-registered while connected, closing previous connection",
          );
          closeQuietly(existing.connection.transport, this.logger);
        }
        existing.device_name = message.device_name;
        existing.platform = message.platform;
        existing.audio_config = audioConfig;
        existing.connection = connection;
        existing.state = this.resumeState(deviceId, existing.state);
        existing.updated_at = now;
        session = existing;
      } else {
        session = {
          device_id: deviceId,
          device_name: message.device_name,
          platform: message.platform,
          state: { kind: "idle" },
          audio_config: audioConfig,
          statistics: emptyStatistics(),
          schedule_config: null,
          last_heartbeat: null,
          created_at: now,
          updated_at: now,
          connection,
        };
        this.sessions.set(deviceId, session);
      }

      await this.persist(session);

      const device = toSnapshot(session);
      this.logger.info(
        { device_id: deviceId, is_new: isNew, status: device.status, peer: peerAddress },
        "Device registered",
      );

      this.hub.publish({ type: "device.registered", device_id: deviceId, is_new: isNew, device });
      if (previousState?.kind === "offline") {
        this.hub.publish({ type: "device.online", device_id: deviceId });
      }
      if (previousState) {
        this.publishStatusChange(deviceId, previousState, session.state);
      }
      this.publishFleetStats();

      return { device_id: deviceId, is_new: isNew, connection_id: connection.connection_id, device };
    });
  }

  /** Decide the state of a known device that just reconnected */
  private resumeState(deviceId: string, previous: DeviceState): DeviceState {
    const referenced = recordingOf(previous);
    if (referenced === null) return { kind: "idle" };

    const active = this.recordings.activeFor(deviceId);
    if (active && active.recording_uuid === referenced && active.state.phase !== "issued") {
      this.logger.info(
        { device_id: deviceId, recording_uuid: referenced },
        "Device reconnected mid-recording, keeping recording",
      );
      return { kind: "recording", recording_uuid: referenced };
    }

    this.logger.info(
      { device_id: deviceId, recording_uuid: referenced },
      "Dropping stale recording reference on reconnect",
    );
    return { kind: "idle" };
  }

  // -------------------------------------------------------------------------
  // Heartbeat
  // -------------------------------------------------------------------------

  /**
   * Apply a heartbeat received on `connectionId`. Heartbeats are ordered by
   * the device's own timestamp: one that is not newer than the last accepted
   * heartbeat of this connection is ignored. The device is authoritative for
   * what it is doing; a heartbeat also revives a device the sweep demoted
   * while its socket stayed open.
   */
  heartbeat(message: HeartbeatMessage, connectionId: string): Promise<HeartbeatResult> {
    return this.mutex.run(message.device_id, async (): Promise<HeartbeatResult> => {
      const session = this.sessions.get(message.device_id);
      if (!session) return { applied: false, reason: "unknown_device" };

      const connection = session.connection;
      if (!connection || connection.connection_id !== connectionId) {
        return { applied: false, reason: "stale_connection" };
      }

      const clientTs = Date.parse(message.timestamp);
      if (connection.last_client_timestamp !== null && clientTs <= connection.last_client_timestamp) {
        this.logger.debug(
          { device_id: session.device_id, timestamp: message.timestamp },
          "Ignoring out-of-order heartbeat",
        );
        return { applied: false, reason: "out_of_order" };
      }

      const now = this.clock();
      const nowIso = now.toISOString();
      connection.last_client_timestamp = clientTs;
      connection.last_heartbeat = nowIso;
      session.last_heartbeat = nowIso;
      session.updated_at = nowIso;

      const previousState = session.state;
      if (previousState.kind === "offline") {
        session.state = this.resumeState(session.device_id, previousState);
        this.logger.info({ device_id: session.device_id }, "Device back online after heartbeat");
        this.hub.publish({ type: "device.online", device_id: session.device_id });
      }

      this.reconcile(session, message, now);

      await this.persist(session);

      this.hub.publish({
        type: "device.heartbeat",
        device_id: session.device_id,
        status: statusOf(session.state),
        last_heartbeat: nowIso,
      });
      this.publishStatusChange(session.device_id, previousState, session.state);
      if (previousState.kind === "offline") this.publishFleetStats();

      return { applied: true, device: toSnapshot(session) };
    });
  }

  /** Align server state with what the device says it is doing */
  private reconcile(session: DeviceSession, message: HeartbeatMessage, now: Date): void {
    const { state } = session;
    const reported = message.current_recording ?? null;

    if (message.status === "idle" && state.kind === "recording") {
      const active = this.recordings.activeFor(session.device_id);
      if (active && active.recording_uuid === state.recording_uuid) {
        this.logger.warn(
          { device_id: session.device_id, recording_uuid: state.recording_uuid },
          "Device reports idle while recording is active, failing recording",
        );
        this.applyRecordingLocked(session, state.recording_uuid, {
          kind: "failed",
          error: ABANDONED_RECORDING_ERROR,
        }, now);
      } else {
        session.state = { kind: "idle" };
      }
      return;
    }

    if (message.status === "recording" && reported !== null) {
      if (state.kind === "recording" && state.recording_uuid === reported) return;
      const active = this.recordings.activeFor(session.device_id);
      if (active && active.recording_uuid === reported && active.state.phase !== "issued") {
        session.state = { kind: "recording", recording_uuid: reported };
        return;
      }
      this.logger.warn(
        { device_id: session.device_id, recording_uuid: reported },
        "Device reports a recording the server is not tracking",
      );
    }
  }

  // -------------------------------------------------------------------------
  // Disconnect and liveness
  // -------------------------------------------------------------------------

  /**
   * Transport closed. Demotes the device immediately unless a newer
   * connection has already replaced this one.
   */
  disconnect(deviceId: string, connectionId: string): Promise<boolean> {
    return this.mutex.run(deviceId, async () => {
      const session = this.sessions.get(deviceId);
      const connection = session?.connection;
      if (!session || !connection || connection.connection_id !== connectionId) {
        return false;
      }

      session.connection = null;
      // Device-level history: a known device losing a fresh socket is still connection_lost
      const reason: OfflineReason =
        session.last_heartbeat === null ? "never_connected" : "connection_lost";
      const demoted = this.markOfflineLocked(session, reason);
      if (!demoted) {
        // Already offline (e.g. heartbeat timeout); the connection is still gone
        session.updated_at = this.clock().toISOString();
      }
      await this.persist(session);
      return demoted;
    });
  }

  /**
   * Demote every device whose last sign of life is older than the timeout.
   * Each device is checked under its own lock, never the whole sweep.
   * Returns the ids that were demoted.
   */
  async sweep(): Promise<string[]> {
    const demoted: string[] = [];
    for (const deviceId of [...this.sessions.keys()]) {
      const changed = await this.mutex.run(deviceId, async () => {
        const session = this.sessions.get(deviceId);
        if (!session || session.state.kind === "offline") return false;

        const lastSeen =
          session.connection?.last_heartbeat ??
          session.connection?.connected_at ??
          session.last_heartbeat;
        if (lastSeen === null) return false;

        const silentFor = this.clock().getTime() - Date.parse(lastSeen);
        if (silentFor <= this.heartbeatTimeoutMs) return false;

        this.logger.warn(
          { device_id: deviceId, silent_ms: silentFor },
          "Heartbeat timeout, marking device offline",
        );
        const changedNow = this.markOfflineLocked(session, "heartbeat_timeout");
        if (changedNow) await this.persist(session);
        return changedNow;
      });
      if (changed) demoted.push(deviceId);
    }
    return demoted;
  }

  /**
   * The one place a device becomes OFFLINE. The referenced recording is kept
   * on the offline state for history; the session itself is left for a
   * client event or the acknowledgement timeout to resolve.
   */
  private markOfflineLocked(session: DeviceSession, reason: OfflineReason): boolean {
    const previous = session.state;
    if (previous.kind === "offline") return false;

    session.state = { kind: "offline", reason, current_recording: recordingOf(previous) };
    session.updated_at = this.clock().toISOString();

    this.logger.info({ device_id: session.device_id, offline_reason: reason }, "Device offline");
    this.hub.publish({
      type: "device.offline",
      device_id: session.device_id,
      offline_reason: reason,
      current_recording: recordingOf(previous),
    });
    this.publishStatusChange(session.device_id, previous, session.state);
    this.publishFleetStats();
    return true;
  }

  // -------------------------------------------------------------------------
  // Recording events
  // -------------------------------------------------------------------------

  /**
   * Apply a recording lifecycle event to the device that reported it.
   * Events for unknown, foreign or already-terminal recordings are dropped.
   */
  applyRecordingEvent(
    deviceId: string,
    recordingUuid: string,
    event: RecordingEvent,
  ): Promise<RecordingEventResult> {
    return this.mutex.run(deviceId, async (): Promise<RecordingEventResult> => {
      const session = this.sessions.get(deviceId);
      if (!session) return { applied: false, reason: "unknown device" };

      const previousState = session.state;
      const result = this.applyRecordingLocked(session, recordingUuid, event, this.clock());
      if (result.applied && event.kind !== "progress") {
        await this.persist(session);
        this.publishStatusChange(deviceId, previousState, session.state);
      }
      return result;
    });
  }

  /** Caller holds the device lock and publishes the resulting status change */
  private applyRecordingLocked(
    session: DeviceSession,
    recordingUuid: string,
    event: RecordingEvent,
    now: Date,
  ): RecordingEventResult {
    const deviceId = session.device_id;
    const tracked = this.recordings.get(recordingUuid);
    if (tracked && tracked.device_id !== deviceId) {
      this.logger.warn(
        { device_id: deviceId, recording_uuid: recordingUuid, owner: tracked.device_id },
        "Dropping recording event from a device that does not own the recording",
      );
      return { applied: false, reason: "recording belongs to another device" };
    }

    const transition = this.recordings.apply(recordingUuid, event, now);
    if (!transition.ok) {
      this.logger.warn(
        { device_id: deviceId, recording_uuid: recordingUuid, event: event.kind, reason: transition.reason },
        "Dropping recording event",
      );
      return { applied: false, reason: transition.reason };
    }

    const previousState = session.state;
    const nowIso = now.toISOString();

    switch (event.kind) {
      case "started":
        session.state =
          previousState.kind === "offline"
            ? { ...previousState, current_recording: recordingUuid }
            : { kind: "recording", recording_uuid: recordingUuid };
        this.hub.publish({ type: "device.recording_started", device_id: deviceId, recording_uuid: recordingUuid });
        break;

      case "progress":
        this.hub.publish({
          type: "device.recording_progress",
          device_id: deviceId,
          recording_uuid: recordingUuid,
          progress_percent: event.percent,
        });
        break;

      case "completed":
        session.statistics = {
          ...session.statistics,
          total_recordings: session.statistics.total_recordings + 1,
          success_count: session.statistics.success_count + 1,
          last_recording_at: nowIso,
        };
        session.state = releaseRecording(previousState, recordingUuid);
        this.hub.publish({
          type: "device.recording_completed",
          device_id: deviceId,
          recording_uuid: recordingUuid,
          filename: event.filename,
          file_size: event.file_size,
          file_hash: event.file_hash,
          actual_duration: event.actual_duration,
        });
        this.enforceScheduleLimit(session);
        break;

      case "failed":
        session.statistics = {
          ...session.statistics,
          total_recordings: session.statistics.total_recordings + 1,
          error_count: session.statistics.error_count + 1,
        };
        session.state = releaseRecording(previousState, recordingUuid);
        this.hub.publish({
          type: "device.recording_failed",
          device_id: deviceId,
          recording_uuid: recordingUuid,
          error: event.error,
        });
        break;
    }

    session.updated_at = nowIso;
    return { applied: true, device: toSnapshot(session) };
  }

  /** Disable the device's schedule once it has recorded enough successes */
  private enforceScheduleLimit(session: DeviceSession): void {
    const schedule = session.schedule_config;
    if (!schedule || !schedule.enabled) return;
    const limit = schedule.max_success_count;
    if (limit === null || limit <= 0 || session.statistics.success_count < limit) return;

    session.schedule_config = { ...schedule, enabled: false };
    this.logger.info(
      { device_id: session.device_id, success_count: session.statistics.success_count, limit },
      "Schedule recording limit reached, schedule disabled",
    );
    this.hub.publish({ type: "device.config_updated", device_id: session.device_id, device: toSnapshot(session) });
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  /** Rename a device or change its capture defaults */
  update(deviceId: string, patch: DevicePatch): Promise<DeviceSnapshot> {
    return this.mutate(deviceId, (session) => {
      if (patch.device_name !== undefined) session.device_name = patch.device_name;
      if (patch.audio_config !== undefined) {
        session.audio_config = { ...session.audio_config, ...patch.audio_config };
      }
    });
  }

  /** Attach, replace or (with null) remove the device's recording schedule */
  setSchedule(deviceId: string, schedule: ScheduleConfig | null): Promise<DeviceSnapshot> {
    return this.mutate(deviceId, (session) => {
      session.schedule_config = schedule ? { ...schedule } : null;
    });
  }

  /** Store the input list a device reported */
  setAudioDevices(deviceId: string, devices: AudioDeviceInfo[]): Promise<DeviceSnapshot> {
    return this.mutex.run(deviceId, async () => {
      const session = this.requireSession(deviceId);
      session.audio_config = { ...session.audio_config, available_devices: devices };
      session.updated_at = this.clock().toISOString();
      await this.persist(session);
      this.hub.publish({ type: "device.audio_devices_updated", device_id: deviceId, devices });
      return toSnapshot(session);
    });
  }

  private mutate(deviceId: string, apply: (session: DeviceSession) => void): Promise<DeviceSnapshot> {
    return this.mutex.run(deviceId, async () => {
      const session = this.requireSession(deviceId);
      apply(session);
      session.updated_at = this.clock().toISOString();
      await this.persist(session);
      const device = toSnapshot(session);
      this.hub.publish({ type: "device.config_updated", device_id: deviceId, device });
      return device;
    });
  }

  // -------------------------------------------------------------------------
  // Access
  // -------------------------------------------------------------------------

  /**
   * Run `fn` against the live session while holding the device's lock.
   * Used by the dispatcher so precondition checks and command sends are
   * atomic with respect to events from the device.
   */
  withSession<T>(deviceId: string, fn: (session: DeviceSession) => T | Promise<T>): Promise<T> {
    return this.mutex.run(deviceId, () => fn(this.requireSession(deviceId)));
  }

  get(deviceId: string): DeviceSnapshot | undefined {
    const session = this.sessions.get(deviceId);
    return session ? toSnapshot(session) : undefined;
  }

  list(): DeviceSnapshot[] {
    return [...this.sessions.values()].map(toSnapshot);
  }

  fleetStats(): FleetStats {
    let online = 0;
    let recording = 0;
    for (const session of this.sessions.values()) {
      if (session.state.kind !== "offline") online++;
      if (session.state.kind === "recording") recording++;
    }
    return {
      total_devices: this.sessions.size,
      online_devices: online,
      offline_devices: this.sessions.size - online,
      recording_devices: recording,
    };
  }

  /** Close every live device connection (server shutdown) */
  closeAll(code: number, reason: string): void {
    for (const session of this.sessions.values()) {
      if (session.connection) {
        closeQuietly(session.connection.transport, this.logger, code, reason);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requireSession(deviceId: string): DeviceSession {
    const session = this.sessions.get(deviceId);
    if (!session) {
      throw new NotFoundError(`Device not found: ${deviceId}`, "NOT_FOUND_DEVICE", {
        device_id: deviceId,
      });
    }
    return session;
  }

  /** Write through to the store. The in-memory state stays authoritative on failure. */
  private async persist(session: DeviceSession): Promise<void> {
    try {
      await this.store.save(toRecord(session));
    } catch (err) {
      const error = new StorageError("Failed to save device", "STORAGE_DEVICE_SAVE", {
        device_id: session.device_id,
        cause: errorMessage(err),
      });
      this.logger.error({ err: error }, error.message);
    }
  }

  private publishStatusChange(deviceId: string, previous: DeviceState, next: DeviceState): void {
    const previousStatus = statusOf(previous);
    const status = statusOf(next);
    if (previousStatus === status) return;
    this.hub.publish({
      type: "device.status_changed",
      device_id: deviceId,
      previous_status: previousStatus,
      status,
      current_recording: recordingOf(next),
    });
  }

  private publishFleetStats(): void {
    this.hub.publish({ type: "fleet.stats_updated", ...this.fleetStats() });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** State after `recordingUuid` reached a terminal outcome */
function releaseRecording(state: DeviceState, recordingUuid: string): DeviceState {
  switch (state.kind) {
    case "recording":
      return state.recording_uuid === recordingUuid ? { kind: "idle" } : state;
    case "offline":
      return state.current_recording === recordingUuid ? { ...state, current_recording: null } : state;
    case "idle":
      return state;
  }
}

function closeQuietly(
  transport: DeviceTransport,
  logger: Logger,
  code = 4000,
  reason = "superseded by a newer connection",
): void {
  try {
    transport.close(code, reason);
  } catch (err) {
    logger.warn({ err }, "Failed to close device transport");
  }
}

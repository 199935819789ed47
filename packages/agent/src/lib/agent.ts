/**
 * The edge agent: connection lifecycle, heartbeat and command handling.
 *
 *   DISCONNECTED → CONNECTING → REGISTERED(idle) ⇄ REGISTERED(recording)
 *        ↑______________________________|  (socket lost; backoff, retry)
 *
 * Heartbeats run on their own interval timer and only read `active`, so a
 * running capture never delays them. A recording survives a dropped
 * socket: its events are parked in the outbox and flushed right after the
 * next `edge.registered`, ahead of the first heartbeat of that connection.
 */

import type { Logger } from "pino";
import {
  errorMessage,
  type AgentStatus,
  type AudioDeviceInfo,
  type EdgeServerMessage,
  type HeartbeatMessage,
  type QueryAudioDevicesCommand,
  type RecordCommand,
  type RecordingEventMessage,
  type RegisteredMessage,
  type StopCommand,
  type UpdateConfigCommand,
} from "@edge-fleet/shared";
import type { AgentConfig } from "./config.js";
import type { CaptureBackend } from "./audio/capture.js";
import type { RecordingHandoff } from "./handoff.js";
import { EdgeConnection } from "./edge-connection.js";
import { Outbox } from "./outbox.js";
import { Recorder, type RecordingReporter } from "./recorder.js";

export const ALREADY_RECORDING_ERROR = "device is already recording";

/** How many recent recording_uuids are remembered for duplicate detection */
const RECENT_RECORDINGS_LIMIT = 64;

export interface EdgeAgentOptions {
  config: AgentConfig;
  /** Persists config changes (assigned id, pushed updates) */
  persistConfig(config: AgentConfig): void;
  capture: CaptureBackend;
  handoff: RecordingHandoff;
  logger: Logger;
  /** Reported at registration; defaults to `<os>-<arch>` */
  platform?: string;
  now?: () => Date;
}

interface ActiveRecording {
  uuid: string;
  abort: AbortController;
  /** WAV being written, known once capture starts */
  path: string | null;
}

export class EdgeAgent {
  readonly connection: EdgeConnection;
  private config: AgentConfig;
  private registered = false;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private active: ActiveRecording | null = null;
  private readonly running = new Set<Promise<void>>();
  private readonly recentIds = new Set<string>();
  private readonly recentOrder: string[] = [];
  private readonly outbox: Outbox<RecordingEventMessage>;
  private readonly recorder: Recorder;
  private readonly log: Logger;
  private readonly platform: string;
  private readonly now: () => Date;

  constructor(private readonly options: EdgeAgentOptions) {
    this.config = options.config;
    this.log = options.logger.child({ component: "agent" });
    this.platform = options.platform ?? `${process.platform}-${process.arch}`;
    this.now = options.now ?? (() => new Date());
    this.outbox = new Outbox(options.config.outbox_limit);

    this.recorder = new Recorder({
      capture: options.capture,
      handoff: options.handoff,
      recordingsDir: options.config.recordings_dir,
      progressStepPercent: options.config.progress_step_percent,
      logger: options.logger,
      now: this.now,
    });

    this.connection = new EdgeConnection({
      serverUrl: options.config.server.url,
      backoff: {
        initialDelayMs: options.config.reconnect.initial_delay_ms,
        maxDelayMs: options.config.reconnect.max_delay_ms,
      },
      logger: options.logger,
    });

    this.connection.on("open", () => {
      this.register().catch((err: unknown) => {
        this.log.error({ err }, "Registration failed");
      });
    });
    this.connection.on("message", (message: EdgeServerMessage) => this.handleMessage(message));
    this.connection.on("close", () => this.handleDisconnect());
  }

  // ---------------------------------------------------------------------------
  // Public surface
  // ---------------------------------------------------------------------------

  get deviceId(): string | null {
    return this.config.device.id;
  }

  get status(): AgentStatus {
    return this.active ? "recording" : "idle";
  }

  get currentRecording(): string | null {
    return this.active?.uuid ?? null;
  }

  get isRegistered(): boolean {
    return this.registered;
  }

  /** File the current capture is writing to; the storage cleaner leaves it alone */
  get activeRecordingPath(): string | null {
    return this.active?.path ?? null;
  }

  get pendingEvents(): number {
    return this.outbox.size;
  }

  get currentConfig(): AgentConfig {
    return this.config;
  }

  start(): void {
    this.log.info(
      { device_id: this.config.device.id, server: this.config.server.url, backend: this.options.capture.name },
      "Agent starting",
    );
    this.connection.start();
  }

  /** Stop any capture (reported as an early completion), then close the socket */
  async stop(): Promise<void> {
    this.active?.abort.abort();
    await Promise.all([...this.running]);
    this.stopHeartbeat();
    await this.connection.stop();
    this.registered = false;
    this.log.info("Agent stopped");
  }

  /** Resolves once every recording started so far has finished its hand-off */
  async idle(): Promise<void> {
    await Promise.all([...this.running]);
  }

  // ---------------------------------------------------------------------------
  // Connection lifecycle
  // ---------------------------------------------------------------------------

  private async register(): Promise<void> {
    const devices = await this.listDevicesOrEmpty();
    const sent = this.connection.send({
      type: "edge.register",
      device_id: this.config.device.id,
      device_name: this.config.device.name,
      platform: this.platform,
      audio_config: { ...this.config.audio, available_devices: devices },
    });
    if (sent) this.log.debug({ device_id: this.config.device.id }, "Registration sent");
  }

  private handleRegistered(message: RegisteredMessage): void {
    if (this.config.device.id !== message.device_id) {
      this.log.info({ device_id: message.device_id, previous: this.config.device.id }, "Device id assigned");
      this.updateConfig({ ...this.config, device: { ...this.config.device, id: message.device_id } });
    }
    this.registered = true;

    const parked = this.outbox.drain();
    for (const event of parked) {
      this.connection.send({ ...event, device_id: message.device_id });
    }
    if (parked.length > 0) {
      this.log.info({ count: parked.length }, "Flushed queued recording events");
    }

    this.sendHeartbeat();
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), this.config.heartbeat_interval_seconds * 1000);
  }

  private handleDisconnect(): void {
    this.registered = false;
    this.stopHeartbeat();
  }

  private sendHeartbeat(): void {
    const deviceId = this.config.device.id;
    if (!this.registered || deviceId === null) return;

    const heartbeat: HeartbeatMessage = {
      type: "edge.heartbeat",
      device_id: deviceId,
      status: this.status,
      current_recording: this.currentRecording,
      timestamp: this.now().toISOString(),
    };
    this.connection.send(heartbeat);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  private handleMessage(message: EdgeServerMessage): void {
    switch (message.type) {
      case "edge.registered":
        this.handleRegistered(message);
        return;
      case "edge.record":
        this.handleRecord(message);
        return;
      case "edge.stop":
        this.handleStop(message);
        return;
      case "edge.query_audio_devices":
        this.handleQuery(message).catch((err: unknown) => {
          this.log.error({ err, request_id: message.request_id }, "Audio device query failed");
        });
        return;
      case "edge.update_config":
        this.handleUpdateConfig(message);
        return;
      case "edge.error":
        this.log.warn({ code: message.error, error: message.message }, "Server reported a protocol error");
        return;
    }
  }

  private handleRecord(command: RecordCommand): void {
    const uuid = command.recording_uuid;
    const deviceId = this.config.device.id;
    if (deviceId === null) {
      this.log.warn({ recording_uuid: uuid }, "Record command before registration, ignoring");
      return;
    }
    if (this.recentIds.has(uuid)) {
      this.log.info({ recording_uuid: uuid }, "Duplicate record command ignored");
      return;
    }
    this.remember(uuid);

    if (this.active) {
      this.log.warn({ recording_uuid: uuid, active: this.active.uuid }, "Record command while recording, rejecting");
      this.emitEvent({ type: "edge.recording_failed", device_id: deviceId, recording_uuid: uuid, error: ALREADY_RECORDING_ERROR });
      return;
    }

    const abort = new AbortController();
    const active: ActiveRecording = { uuid, abort, path: null };
    this.active = active;

    const finish = () => {
      if (this.active?.uuid === uuid) this.active = null;
    };
    const reporter: RecordingReporter = {
      started: (filePath) => {
        active.path = filePath;
        this.emitEvent({ type: "edge.recording_started", device_id: deviceId, recording_uuid: uuid });
      },
      progress: (percent) => {
        this.emitEvent({ type: "edge.recording_progress", device_id: deviceId, recording_uuid: uuid, progress_percent: percent });
      },
      // Cleared before the event goes out so no heartbeat can still claim it
      completed: (result) => {
        finish();
        this.emitEvent({ type: "edge.recording_completed", device_id: deviceId, recording_uuid: uuid, ...result });
      },
      failed: (error) => {
        finish();
        this.emitEvent({ type: "edge.recording_failed", device_id: deviceId, recording_uuid: uuid, error });
      },
    };

    const run = this.recorder
      .run({ command, deviceId, deviceName: this.config.device.name, signal: abort.signal, reporter })
      .catch((err: unknown) => {
        this.log.error({ err, recording_uuid: uuid }, "Recorder crashed");
      })
      .finally(() => {
        finish();
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private handleStop(command: StopCommand): void {
    const active = this.active;
    if (!active || active.uuid !== command.recording_uuid) {
      this.log.warn(
        { recording_uuid: command.recording_uuid, active: active?.uuid ?? null },
        "Stop for a recording that is not running",
      );
      return;
    }
    this.log.info({ recording_uuid: command.recording_uuid }, "Stopping recording early");
    active.abort.abort();
  }

  private async handleQuery(command: QueryAudioDevicesCommand): Promise<void> {
    const deviceId = this.config.device.id;
    if (deviceId === null) return;
    const devices = await this.options.capture.listDevices();
    this.connection.send({
      type: "edge.audio_devices_response",
      device_id: deviceId,
      request_id: command.request_id,
      devices,
    });
  }

  private handleUpdateConfig(command: UpdateConfigCommand): void {
    const audio = command.audio_config ?? {};
    const current = this.config;
    this.updateConfig({
      ...current,
      device: { ...current.device, name: command.device_name ?? current.device.name },
      audio: {
        default_device_index: audio.default_device_index ?? current.audio.default_device_index,
        channels: audio.channels ?? current.audio.channels,
        sample_rate: audio.sample_rate ?? current.audio.sample_rate,
        bit_depth: audio.bit_depth ?? current.audio.bit_depth,
      },
    });
    this.log.info({ device_name: command.device_name, audio_config: command.audio_config }, "Config updated by server");
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private emitEvent(event: RecordingEventMessage): void {
    if (this.registered && this.connection.send(event)) return;

    const dropped = this.outbox.push(event);
    this.log.debug({ type: event.type, queued: this.outbox.size }, "Recording event queued");
    if (dropped) {
      this.log.warn({ type: dropped.type, recording_uuid: dropped.recording_uuid }, "Outbox full, dropped oldest event");
    }
  }

  private updateConfig(next: AgentConfig): void {
    this.config = next;
    try {
      this.options.persistConfig(next);
    } catch (err) {
      // Keep running on the in-memory config; the next change retries the write
      this.log.error({ error: errorMessage(err) }, "Failed to save config");
    }
  }

  private remember(uuid: string): void {
    this.recentIds.add(uuid);
    this.recentOrder.push(uuid);
    if (this.recentOrder.length > RECENT_RECORDINGS_LIMIT) {
      const evicted = this.recentOrder.shift();
      if (evicted !== undefined) this.recentIds.delete(evicted);
    }
  }

  private async listDevicesOrEmpty(): Promise<AudioDeviceInfo[]> {
    try {
      return await this.options.capture.listDevices();
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, "Could not list audio devices");
      return [];
    }
  }
}

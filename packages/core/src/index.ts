/**
 * @edge-fleet/core: fleet coordination domain logic.
 *
 * Everything here is transport- and storage-agnostic: the registry talks to
 * a DeviceStore port, commands leave through a DeviceTransport, and observer
 * events go to an EventPublisher. The server package wires real sockets and
 * Postgres behind those seams; tests use the in-memory versions.
 */

// Per-key locking for device read-modify-write sequences
export { KeyedMutex } from "./keyed-mutex.js";

// Device session model and conversions
export {
  statusOf,
  recordingOf,
  toRecord,
  toSnapshot,
  type DeviceState,
  type DeviceRecord,
  type DeviceSession,
  type DeviceConnection,
  type DeviceTransport,
} from "./device-state.js";

// Device persistence port
export { InMemoryDeviceStore, type DeviceStore } from "./device-store.js";

// Recording session state machine
export {
  TRANSITIONS,
  isValidTransition,
  isTerminal,
  applyRecordingEvent,
  RecordingTracker,
  type RecordingEvent,
  type TransitionResult,
} from "./recording-lifecycle.js";

// Observer fan-out
export {
  BroadcastHub,
  type BroadcastHubOptions,
  type EventPublisher,
  type ObserverListener,
} from "./broadcast-hub.js";

// Device registry: registration, heartbeat, liveness, recording outcomes
export {
  DeviceRegistry,
  ABANDONED_RECORDING_ERROR,
  type DeviceRegistryDeps,
  type DevicePatch,
  type RegisterResult,
  type HeartbeatResult,
  type RecordingEventResult,
} from "./device-registry.js";

// Background demotion of silent devices
export { LivenessMonitor, type LivenessMonitorOptions } from "./liveness-monitor.js";

// Commands to devices and reply correlation
export {
  CommandDispatcher,
  UNACKNOWLEDGED_RECORDING_ERROR,
  toRecordingEvent,
  type CommandDispatcherDeps,
  type RecordRequest,
  type StopResult,
  type ConfigUpdateResult,
} from "./command-dispatcher.js";

// Interval recording schedules
export {
  RecordingScheduler,
  isWithinTimeRange,
  parseTimeOfDay,
  type RecordingSchedulerOptions,
} from "./recording-scheduler.js";

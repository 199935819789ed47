/**
 * Shared test fixtures for the core package: a fake device transport, an
 * event publisher that records what it was given, a settable clock and a
 * wired-up registry.
 */

import { pino } from "pino";
import type {
  EdgeServerMessage,
  ObserverEventInput,
  ObserverEventType,
  RecordingParameters,
  RegisterMessage,
} from "@edge-fleet/shared";
import type { EventPublisher } from "../../broadcast-hub.js";
import { DeviceRegistry } from "../../device-registry.js";
import type { DeviceTransport } from "../../device-state.js";
import { InMemoryDeviceStore, type DeviceStore } from "../../device-store.js";
import { RecordingTracker } from "../../recording-lifecycle.js";

export const silentLogger = pino({ level: "silent" });

export class FakeTransport implements DeviceTransport {
  sent: EdgeServerMessage[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  send(message: EdgeServerMessage): void {
    if (this.failSends) throw new Error("socket is not open");
    this.sent.push(message);
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

export class CollectingPublisher implements EventPublisher {
  events: ObserverEventInput[] = [];

  publish(event: ObserverEventInput): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }

  ofType<T extends ObserverEventType>(type: T): Extract<ObserverEventInput, { type: T }>[] {
    return this.events.filter((e): e is Extract<ObserverEventInput, { type: T }> => e.type === type);
  }

  clear(): void {
    this.events = [];
  }
}

/** A clock that only moves when told to */
export function makeClock(startIso = "2026-01-14T12:00:00.000Z") {
  let now = Date.parse(startIso);
  return {
    clock: () => new Date(now),
    advance(ms: number): void {
      now += ms;
    },
    iso(): string {
      return new Date(now).toISOString();
    },
  };
}

export function makeRegister(overrides: Partial<RegisterMessage> = {}): RegisterMessage {
  return {
    type: "edge.register",
    device_name: "bench-01",
    platform: "linux",
    audio_config: {
      default_device_index: 0,
      channels: 1,
      sample_rate: 16000,
      bit_depth: 16,
      available_devices: [],
    },
    ...overrides,
  };
}

export function makeHeartbeat(
  deviceId: string,
  timestamp: string,
  status: "idle" | "recording" = "idle",
  currentRecording: string | null = null,
) {
  return {
    type: "edge.heartbeat" as const,
    device_id: deviceId,
    status,
    current_recording: currentRecording,
    timestamp,
  };
}

export const DEFAULT_PARAMETERS: RecordingParameters = {
  duration: 60,
  channels: 1,
  sample_rate: 16000,
  device_index: 0,
  bit_depth: 16,
};

export function createRegistryFixture(
  options: { store?: DeviceStore; heartbeatTimeoutMs?: number } = {},
) {
  const time = makeClock();
  const publisher = new CollectingPublisher();
  const recordings = new RecordingTracker();
  const store = options.store ?? new InMemoryDeviceStore();
  const registry = new DeviceRegistry({
    store,
    hub: publisher,
    recordings,
    logger: silentLogger,
    heartbeatTimeoutMs: options.heartbeatTimeoutMs ?? 90_000,
    clock: time.clock,
  });
  return { registry, publisher, recordings, store, time };
}

/** Register a device and send its first heartbeat; returns ids and transport */
export async function connectDevice(
  fixture: ReturnType<typeof createRegistryFixture>,
  deviceId = "dev-1",
) {
  const transport = new FakeTransport();
  const registered = await fixture.registry.register(
    makeRegister({ device_id: deviceId }),
    transport,
    "10.0.0.5",
  );
  await fixture.registry.heartbeat(
    makeHeartbeat(deviceId, fixture.time.iso()),
    registered.connection_id,
  );
  return { transport, connectionId: registered.connection_id, deviceId };
}

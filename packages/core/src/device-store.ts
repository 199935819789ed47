/**
 * Device store port.
 *
 * The registry keeps every device in memory and writes through to a store so
 * identities, counters and schedules survive a restart. Connections are never
 * stored.
 */

import type { DeviceRecord } from "./device-state.js";

export interface DeviceStore {
  /** Every known device, in no particular order */
  loadAll(): Promise<DeviceRecord[]>;
  /** Insert or replace one device */
  save(record: DeviceRecord): Promise<void>;
  /** True when the backing storage is reachable */
  ping(): Promise<boolean>;
}

/** Process-local store used in tests and when no database is configured */
export class InMemoryDeviceStore implements DeviceStore {
  private records = new Map<string, DeviceRecord>();

  constructor(initial: DeviceRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.device_id, structuredClone(record));
    }
  }

  async loadAll(): Promise<DeviceRecord[]> {
    return [...this.records.values()].map((r) => structuredClone(r));
  }

  async save(record: DeviceRecord): Promise<void> {
    this.records.set(record.device_id, structuredClone(record));
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Stored copy of one device, for assertions */
  get(deviceId: string): DeviceRecord | undefined {
    const record = this.records.get(deviceId);
    return record ? structuredClone(record) : undefined;
  }
}

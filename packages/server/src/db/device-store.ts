/**
 * Postgres-backed DeviceStore (table `edge_devices`, see migrations/).
 *
 * The device state union is flattened into status / offline_reason /
 * current_recording columns; audio and schedule config are JSONB. Rows are
 * validated on the way back in, so a hand-edited row cannot put the
 * registry into a state the domain types rule out.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { DeviceRecord, DeviceState, DeviceStore } from "@edge-fleet/core";
import {
  DEVICE_STATUSES,
  OFFLINE_REASONS,
  StorageError,
  audioConfigSchema,
  scheduleConfigSchema,
} from "@edge-fleet/shared";

// ---------------------------------------------------------------------------
// Query seam
// ---------------------------------------------------------------------------

export type SqlValue = string | number | boolean | null;

/**
 * The slice of postgres.js the store needs: the tagged-template query
 * function. index.ts adapts postgres.js to it; tests pass a recording fake.
 */
export type QueryFn = (strings: TemplateStringsArray, ...values: SqlValue[]) => PromiseLike<readonly unknown[]>;

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

const isoTimestamp = z.coerce.date().transform((d) => d.toISOString());

const deviceRowSchema = z.object({
  device_id: z.string(),
  device_name: z.string(),
  platform: z.string(),
  status: z.enum(DEVICE_STATUSES),
  offline_reason: z.enum(OFFLINE_REASONS).nullable(),
  current_recording: z.string().nullable(),
  audio_config: audioConfigSchema,
  schedule_config: scheduleConfigSchema.nullable(),
  total_recordings: z.number().int(),
  success_count: z.number().int(),
  error_count: z.number().int(),
  last_recording_at: isoTimestamp.nullable(),
  last_heartbeat: isoTimestamp.nullable(),
  created_at: isoTimestamp,
  updated_at: isoTimestamp,
});

export type DeviceRow = z.infer<typeof deviceRowSchema>;

function stateFromRow(row: DeviceRow): DeviceState {
  switch (row.status) {
    case "OFFLINE":
      return {
        kind: "offline",
        reason: row.offline_reason ?? "connection_lost",
        current_recording: row.current_recording,
      };
    case "RECORDING":
      return row.current_recording === null
        ? { kind: "idle" }
        : { kind: "recording", recording_uuid: row.current_recording };
    case "IDLE":
      return { kind: "idle" };
  }
}

export function recordFromRow(row: DeviceRow): DeviceRecord {
  return {
    device_id: row.device_id,
    device_name: row.device_name,
    platform: row.platform,
    state: stateFromRow(row),
    audio_config: row.audio_config,
    statistics: {
      total_recordings: row.total_recordings,
      success_count: row.success_count,
      error_count: row.error_count,
      last_recording_at: row.last_recording_at,
    },
    schedule_config: row.schedule_config,
    last_heartbeat: row.last_heartbeat,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PostgresDeviceStore implements DeviceStore {
  private readonly logger: Logger;

  constructor(
    private readonly sql: QueryFn,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "device-store" });
  }

  /**
   * Load every row. Rows that fail validation are skipped and logged rather
   * than failing startup for the whole fleet.
   */
  async loadAll(): Promise<DeviceRecord[]> {
    let rows: readonly unknown[];
    try {
      rows = await this.sql`SELECT * FROM edge_devices ORDER BY created_at`;
    } catch (err) {
      throw new StorageError("Failed to load devices", "STORAGE_DEVICE_LOAD", {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const records: DeviceRecord[] = [];
    for (const raw of rows) {
      const parsed = deviceRowSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(
          { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
          "Skipping malformed device row",
        );
        continue;
      }
      records.push(recordFromRow(parsed.data));
    }
    return records;
  }

  async save(record: DeviceRecord): Promise<void> {
    const { state, statistics } = record;
    const status = state.kind === "offline" ? "OFFLINE" : state.kind === "recording" ? "RECORDING" : "IDLE";
    const offlineReason = state.kind === "offline" ? state.reason : null;
    const currentRecording =
      state.kind === "recording" ? state.recording_uuid : state.kind === "offline" ? state.current_recording : null;
    const scheduleConfig = record.schedule_config ? JSON.stringify(record.schedule_config) : null;

    try {
      await this.sql`
        INSERT INTO edge_devices (
          device_id, device_name, platform, status, offline_reason, current_recording,
          audio_config, schedule_config,
          total_recordings, success_count, error_count, last_recording_at,
          last_heartbeat, created_at, updated_at
        ) VALUES (
          ${record.device_id}, ${record.device_name}, ${record.platform},
          ${status}, ${offlineReason}, ${currentRecording},
          ${JSON.stringify(record.audio_config)}::jsonb, ${scheduleConfig}::jsonb,
          ${statistics.total_recordings}, ${statistics.success_count}, ${statistics.error_count},
          ${statistics.last_recording_at}::timestamptz,
          ${record.last_heartbeat}::timestamptz, ${record.created_at}::timestamptz, ${record.updated_at}::timestamptz
        )
        ON CONFLICT (device_id) DO UPDATE SET
          device_name       = EXCLUDED.device_name,
          platform          = EXCLUDED.platform,
          status            = EXCLUDED.status,
          offline_reason    = EXCLUDED.offline_reason,
          current_recording = EXCLUDED.current_recording,
          audio_config      = EXCLUDED.audio_config,
          schedule_config   = EXCLUDED.schedule_config,
          total_recordings  = EXCLUDED.total_recordings,
          success_count     = EXCLUDED.success_count,
          error_count       = EXCLUDED.error_count,
          last_recording_at = EXCLUDED.last_recording_at,
          last_heartbeat    = EXCLUDED.last_heartbeat,
          updated_at        = EXCLUDED.updated_at
      `;
    } catch (err) {
      throw new StorageError(`Failed to save device ${record.device_id}`, "STORAGE_DEVICE_SAVE", {
        device_id: record.device_id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.sql`SELECT 1`;
      return true;
    } catch (err) {
      this.logger.warn({ error: err instanceof Error ? err.message : String(err) }, "Device store ping failed");
      return false;
    }
  }
}

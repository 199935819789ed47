/**
 * Interval recording schedules.
 *
 * Each device may carry a ScheduleConfig. On every tick the scheduler issues
 * a record command to each device whose interval has elapsed, provided the
 * local time is inside the schedule's daily window and the device is IDLE.
 * A skipped run is not queued; the next attempt happens on a later tick.
 */

import type { Logger } from "pino";
import { CommandRejectedError, type DeviceSnapshot, type ScheduleConfig } from "@edge-fleet/shared";
import type { CommandDispatcher } from "./command-dispatcher.js";
import type { DeviceRegistry } from "./device-registry.js";

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Minutes since midnight for "HH:MM", or null when malformed */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY.exec(value);
  if (!match) return null;
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Whether `now` (local time, minute resolution) falls inside the window.
 * Both ends are inclusive, a missing start means 00:00 and a missing end
 * 23:59. A start later than the end wraps midnight (22:00-06:00).
 */
export function isWithinTimeRange(now: Date, startTime: string | null, endTime: string | null): boolean {
  if (startTime === null && endTime === null) return true;

  const start = startTime === null ? 0 : parseTimeOfDay(startTime);
  const end = endTime === null ? 23 * 60 + 59 : parseTimeOfDay(endTime);
  if (start === null || end === null) return true;

  const minutes = now.getHours() * 60 + now.getMinutes();
  return start <= end ? minutes >= start && minutes <= end : minutes >= start || minutes <= end;
}

export interface RecordingSchedulerOptions {
  registry: Pick<DeviceRegistry, "list" | "setSchedule">;
  dispatcher: Pick<CommandDispatcher, "record">;
  logger: Logger;
  /** Tick period (ms), default 1000 */
  tickMs?: number;
  clock?: () => Date;
}

export class RecordingScheduler {
  private readonly registry: Pick<DeviceRegistry, "list" | "setSchedule">;
  private readonly dispatcher: Pick<CommandDispatcher, "record">;
  private readonly logger: Logger;
  private readonly tickMs: number;
  private readonly clock: () => Date;

  /** device_id -> epoch ms of the last issued scheduled recording */
  private readonly lastRun = new Map<string, number>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(options: RecordingSchedulerOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger.child({ component: "recording-scheduler" });
    this.tickMs = options.tickMs ?? 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.tickMs);
    this.timer.unref();
    const scheduled = this.registry.list().filter((d) => d.schedule_config?.enabled).length;
    this.logger.info({ scheduled }, "Recording scheduler started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Forget when a device last ran, so a replaced schedule starts fresh */
  reset(deviceId: string): void {
    this.lastRun.delete(deviceId);
  }

  /** Run one pass over all devices. Returns the ids a recording was issued to. */
  async tick(): Promise<string[]> {
    if (this.running) return [];
    this.running = true;
    const issued: string[] = [];
    try {
      const now = this.clock();
      for (const device of this.registry.list()) {
        const schedule = device.schedule_config;
        if (!schedule?.enabled) continue;
        if (await this.runOne(device, schedule, now)) issued.push(device.device_id);
      }
    } finally {
      this.running = false;
    }
    return issued;
  }

  private async runOne(device: DeviceSnapshot, schedule: ScheduleConfig, now: Date): Promise<boolean> {
    const deviceId = device.device_id;
    const log = this.logger.child({ device_id: deviceId });

    const limit = schedule.max_success_count;
    if (limit !== null && limit > 0 && device.statistics.success_count >= limit) {
      log.info({ limit }, "Schedule limit reached, disabling schedule");
      await this.registry.setSchedule(deviceId, { ...schedule, enabled: false });
      return false;
    }

    const last = this.lastRun.get(deviceId);
    if (last !== undefined && now.getTime() - last < schedule.interval_seconds * 1000) {
      return false;
    }

    if (!isWithinTimeRange(now, schedule.start_time, schedule.end_time)) {
      log.debug("Outside schedule window, skipping");
      return false;
    }

    if (device.status !== "IDLE") {
      log.debug({ status: device.status }, "Device not idle, skipping scheduled recording");
      return false;
    }

    try {
      const recording = await this.dispatcher.record(deviceId, { duration: schedule.duration_seconds });
      this.lastRun.set(deviceId, now.getTime());
      log.info({ recording_uuid: recording.recording_uuid }, "Scheduled recording issued");
      return true;
    } catch (err) {
      if (err instanceof CommandRejectedError) {
        log.debug({ code: err.code }, "Scheduled recording rejected");
        return false;
      }
      log.error({ err }, "Scheduled recording failed");
      return false;
    }
  }
}

/**
 * Runs one recording from command to hand-off.
 *
 * The recorder knows nothing about sockets: it reports lifecycle steps to a
 * RecordingReporter, and the agent turns those into wire frames (or outbox
 * entries while disconnected).
 *
 *   started -> progress* -> progress(100) -> completed -> hand-off
 *      \__________________________________-> failed
 *
 * An early stop skips the final progress(100) and goes straight to completed.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "pino";
import { errorMessage, type RecordCommand, type RecordingResult } from "@edge-fleet/shared";
import type { CaptureBackend } from "./audio/capture.js";
import { inspectRecording } from "./file-info.js";
import type { RecordingHandoff } from "./handoff.js";

export interface RecordingReporter {
  /** `filePath` is the WAV the capture is writing */
  started(filePath: string): void;
  progress(percent: number): void;
  completed(result: RecordingResult): void;
  failed(error: string): void;
}

export interface RecorderOptions {
  capture: CaptureBackend;
  handoff: RecordingHandoff;
  recordingsDir: string;
  progressStepPercent: number;
  logger: Logger;
  now?: () => Date;
}

export interface RecordingJob {
  command: RecordCommand;
  deviceId: string;
  deviceName: string;
  signal: AbortSignal;
  reporter: RecordingReporter;
}

/**
 * Forwards a progress value only once it has advanced by `step` since the
 * last forwarded one. 100 is always forwarded, exactly once.
 */
export class ProgressThrottle {
  private last = 0;
  private done = false;

  constructor(private readonly step: number) {}

  accept(percent: number): number | null {
    if (this.done) return null;
    const value = Math.min(100, Math.max(0, Math.floor(percent)));
    if (value >= 100) {
      this.done = true;
      return 100;
    }
    if (value - this.last < this.step) return null;
    this.last = value;
    return value;
  }
}

/** `<name>_<YYYYMMDD_HHMMSS>_<uuid prefix>.wav`, UTC, filesystem-safe */
export function recordingFilename(deviceName: string, at: Date, recordingUuid: string): string {
  const safeName = deviceName.replace(/[^A-Za-z0-9._-]+/g, "-");
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const suffix = recordingUuid.replace(/[^A-Za-z0-9]/g, "").slice(0, 8);
  return `${safeName}_${stamp}_${suffix}.wav`;
}

export class Recorder {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: RecorderOptions) {
    this.log = options.logger.child({ component: "recorder" });
    this.now = options.now ?? (() => new Date());
  }

  /** Never rejects: every failure is reported through `reporter.failed` */
  async run(job: RecordingJob): Promise<void> {
    const { command, reporter, signal } = job;
    const log = this.log.child({ recording_uuid: command.recording_uuid });
    const filename = recordingFilename(job.deviceName, this.now(), command.recording_uuid);
    const filePath = path.join(this.options.recordingsDir, filename);
    const throttle = new ProgressThrottle(this.options.progressStepPercent);

    let result: RecordingResult;
    try {
      await fs.mkdir(this.options.recordingsDir, { recursive: true });
      reporter.started(filePath);
      log.info(
        { file: filePath, duration: command.duration, backend: this.options.capture.name },
        "Recording started",
      );

      await this.options.capture.record({
        path: filePath,
        duration: command.duration,
        channels: command.channels,
        sample_rate: command.sample_rate,
        device_index: command.device_index,
        bit_depth: command.bit_depth,
        signal,
        onProgress: (percent) => {
          const forwarded = throttle.accept(percent);
          if (forwarded !== null) reporter.progress(forwarded);
        },
      });

      const info = await inspectRecording(filePath);
      // A stopped capture never reached the requested length
      if (!signal.aborted) {
        const final = throttle.accept(100);
        if (final !== null) reporter.progress(final);
      }

      result = { filename, ...info };
      reporter.completed(result);
      log.info({ ...info, stopped_early: signal.aborted }, "Recording completed");
    } catch (err) {
      const message = errorMessage(err);
      log.error({ err }, "Recording failed");
      reporter.failed(message);
      return;
    }

    try {
      await this.options.handoff.submit({
        ...result,
        recording_uuid: command.recording_uuid,
        device_id: job.deviceId,
        path: filePath,
        parameters: {
          duration: command.duration,
          channels: command.channels,
          sample_rate: command.sample_rate,
          device_index: command.device_index,
          bit_depth: command.bit_depth,
        },
        stopped_early: signal.aborted,
        completed_at: this.now().toISOString(),
      });
    } catch (err) {
      // Completion is already reported; the file stays on disk for a manual retry
      log.error({ err, file: filePath }, "Recording hand-off failed");
    }
  }
}

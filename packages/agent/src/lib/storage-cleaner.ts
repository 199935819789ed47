/**
 * Storage cleaner: keeps the recordings directory under a size budget.
 *
 * Once the WAVs and their hand-off sidecars together pass
 * `thresholdPercent` of `maxBytes`, whole recordings (WAV plus sidecar) are
 * deleted oldest first until usage is at or below `targetPercent`. The file
 * a capture is still writing is never touched. Other files in the directory
 * are neither counted nor deleted.
 *
 * Ticks never overlap, the first one runs on start, and the interval is
 * unref'd.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "pino";

export interface StorageCleanerOptions {
  dir: string;
  maxBytes: number;
  thresholdPercent: number;
  targetPercent: number;
  logger: Logger;
  /** Path of the WAV currently being written, if any */
  inUse?: () => string | null;
}

export interface CleanupResult {
  totalBytes: number;
  freedBytes: number;
  /** WAV file names whose recordings were deleted, oldest first */
  deleted: string[];
}

/** One recording on disk: the WAV and its sidecar, either possibly missing */
interface RecordingFiles {
  wav: string;
  files: string[];
  bytes: number;
  mtimeMs: number;
}

export const GIGABYTE = 1024 * 1024 * 1024;

function recordingKey(filename: string): string | null {
  if (filename.startsWith(".")) return null;
  if (filename.endsWith(".wav")) return filename;
  if (filename.endsWith(".wav.json")) return filename.slice(0, -".json".length);
  return null;
}

export class StorageCleaner {
  private readonly log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(private readonly options: StorageCleanerOptions) {
    this.log = options.logger.child({ component: "storage-cleaner" });
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.timer.unref();
    this.log.info(
      { dir: this.options.dir, max_bytes: this.options.maxBytes, interval_ms: intervalMs },
      "Storage cleaner started",
    );
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Run one cleanup. Never rejects; null when skipped or failed. */
  async tick(): Promise<CleanupResult | null> {
    if (this.running) return null;
    this.running = true;
    try {
      return await this.cleanup();
    } catch (err) {
      this.log.error({ err }, "Storage cleanup failed");
      return null;
    } finally {
      this.running = false;
    }
  }

  async cleanup(): Promise<CleanupResult> {
    const { dir, maxBytes, thresholdPercent, targetPercent } = this.options;
    const recordings = await this.scan();
    const totalBytes = recordings.reduce((sum, r) => sum + r.bytes, 0);

    if (totalBytes <= (maxBytes * thresholdPercent) / 100) {
      return { totalBytes, freedBytes: 0, deleted: [] };
    }

    const targetBytes = (maxBytes * targetPercent) / 100;
    const inUse = this.options.inUse?.() ?? null;
    const oldestFirst = [...recordings].sort((a, b) => a.mtimeMs - b.mtimeMs || a.wav.localeCompare(b.wav));

    let freedBytes = 0;
    const deleted: string[] = [];
    for (const recording of oldestFirst) {
      if (totalBytes - freedBytes <= targetBytes) break;
      if (inUse !== null && path.join(dir, recording.wav) === inUse) continue;
      try {
        for (const file of recording.files) {
          await fs.rm(path.join(dir, file), { force: true });
        }
      } catch (err) {
        this.log.warn({ err, file: recording.wav }, "Could not delete recording");
        continue;
      }
      freedBytes += recording.bytes;
      deleted.push(recording.wav);
    }

    this.log.info(
      { total_bytes: totalBytes, freed_bytes: freedBytes, deleted: deleted.length },
      "Recordings directory over budget, evicted oldest recordings",
    );
    return { totalBytes, freedBytes, deleted };
  }

  private async scan(): Promise<RecordingFiles[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.options.dir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const byKey = new Map<string, RecordingFiles>();
    for (const name of entries) {
      const key = recordingKey(name);
      if (key === null) continue;
      const stat = await fs.stat(path.join(this.options.dir, name)).catch((err: unknown) => {
        // Picked up by the uploader since the listing
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
        throw err;
      });
      if (!stat?.isFile()) continue;

      const recording: RecordingFiles = byKey.get(key) ?? { wav: key, files: [], bytes: 0, mtimeMs: stat.mtimeMs };
      recording.files.push(name);
      recording.bytes += stat.size;
      // The WAV's age decides; a lone sidecar falls back to its own
      if (name === key) recording.mtimeMs = stat.mtimeMs;
      byKey.set(key, recording);
    }
    return [...byKey.values()];
  }
}

/**
 * Hand-off of finished recordings to the uploader.
 *
 * Uploading is not the agent's job. Once a recording is reported complete
 * the agent passes it to a RecordingHandoff; the default spool hand-off
 * leaves a `<file>.json` sidecar next to the WAV for an external uploader
 * to pick up and delete.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "pino";
import type { RecordingParameters } from "@edge-fleet/shared";
import type { RecordingFileInfo } from "./file-info.js";

export interface CompletedRecording extends RecordingFileInfo {
  recording_uuid: string;
  device_id: string;
  filename: string;
  /** Absolute path of the WAV file */
  path: string;
  parameters: RecordingParameters;
  /** True when the capture ended early because of edge.stop */
  stopped_early: boolean;
  completed_at: string;
}

export interface RecordingHandoff {
  submit(recording: CompletedRecording): Promise<void>;
}

export function sidecarPath(wavPath: string): string {
  return `${wavPath}.json`;
}

export class SpoolHandoff implements RecordingHandoff {
  constructor(private readonly logger: Logger) {}

  async submit(recording: CompletedRecording): Promise<void> {
    const target = sidecarPath(recording.path);
    const tmp = path.join(path.dirname(target), `.${path.basename(target)}.tmp`);

    await fs.writeFile(tmp, JSON.stringify(recording, null, 2) + "\n");
    await fs.rename(tmp, target);
    this.logger.info(
      { recording_uuid: recording.recording_uuid, sidecar: target },
      "Recording spooled for upload",
    );
  }
}

/** Recordings in `dir` still waiting for the uploader */
export async function countSpooled(dir: string): Promise<number> {
  try {
    const entries = await fs.readdir(dir);
    return entries.filter((f) => f.endsWith(".wav.json")).length;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
}

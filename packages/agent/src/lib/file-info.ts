/**
 * Facts about a finished recording reported in `edge.recording_completed`.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { open, stat } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { parseWavHeader } from "./audio/wav.js";

export interface RecordingFileInfo {
  file_size: number;
  /** Hex SHA-256 of the whole file */
  file_hash: string;
  /** Seconds of audio according to the WAV data chunk */
  actual_duration: number;
}

const HEADER_READ_BYTES = 4_096;

export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256");
  await pipeline(createReadStream(path), hash);
  return hash.digest("hex");
}

export async function inspectRecording(path: string): Promise<RecordingFileInfo> {
  const { size } = await stat(path);

  const handle = await open(path, "r");
  let header: Buffer;
  try {
    const head = Buffer.alloc(Math.min(HEADER_READ_BYTES, size));
    const { bytesRead } = await handle.read(head, 0, head.length, 0);
    header = head.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }

  const wav = parseWavHeader(header, size);
  return {
    file_size: size,
    file_hash: await sha256File(path),
    actual_duration: wav.durationSeconds,
  };
}

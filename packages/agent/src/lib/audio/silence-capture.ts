/**
 * Capture backend that records silence in real time.
 *
 * Used on benches without a microphone and in tests: it takes as long as a
 * real capture, writes a well-formed PCM WAV of the requested format and
 * honours stop requests the same way the hardware backend does.
 */

import { open } from "node:fs/promises";
import type { AudioDeviceInfo } from "@edge-fleet/shared";
import { WAV_HEADER_SIZE, blockAlign, encodeWavHeader, type WavFormat } from "./wav.js";
import { sleep, type CaptureBackend, type CaptureRequest } from "./capture.js";

export interface SilenceCaptureOptions {
  /** Length of each written block in milliseconds (default 250) */
  chunkMs?: number;
}

export class SilenceCapture implements CaptureBackend {
  readonly name = "silence";
  private readonly chunkMs: number;

  constructor(options: SilenceCaptureOptions = {}) {
    this.chunkMs = options.chunkMs ?? 250;
  }

  async listDevices(): Promise<AudioDeviceInfo[]> {
    return [
      { index: 0, name: "silence", max_input_channels: 2, max_output_channels: 0, default_sample_rate: 48000 },
    ];
  }

  async record(request: CaptureRequest): Promise<void> {
    const format: WavFormat = {
      channels: request.channels,
      sampleRate: request.sample_rate,
      bitDepth: request.bit_depth,
    };
    const frameBytes = blockAlign(format);
    const totalFrames = Math.round(request.duration * request.sample_rate);
    const framesPerChunk = Math.max(1, Math.round((request.sample_rate * this.chunkMs) / 1000));
    // Unsigned 8-bit PCM is centred on 0x80
    const fill = request.bit_depth === 8 ? 0x80 : 0;

    const file = await open(request.path, "w");
    try {
      await file.write(encodeWavHeader(format, 0));

      let written = 0;
      const startedAt = Date.now();
      while (written < totalFrames && !request.signal.aborted) {
        const frames = Math.min(framesPerChunk, totalFrames - written);
        await file.write(Buffer.alloc(frames * frameBytes, fill));
        written += frames;
        request.onProgress(Math.min(100, (written / totalFrames) * 100));

        if (written < totalFrames) {
          // Pace against the wall clock so drift does not accumulate
          const due = startedAt + (written / request.sample_rate) * 1000;
          await sleep(Math.max(0, due - Date.now()), request.signal);
        }
      }

      await file.write(encodeWavHeader(format, written * frameBytes), 0, WAV_HEADER_SIZE, 0);
    } finally {
      await file.close();
    }
  }
}

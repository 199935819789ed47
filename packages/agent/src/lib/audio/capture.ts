/**
 * Capture backend contract.
 *
 * A backend writes one WAV file per request. It reports progress as a
 * percentage of the requested duration and must stop early, leaving a
 * valid (shorter) file, when `signal` aborts. Any other problem rejects.
 */

import type { AudioDeviceInfo } from "@edge-fleet/shared";

export interface CaptureRequest {
  /** Absolute path of the WAV file to create */
  path: string;
  /** Seconds */
  duration: number;
  channels: number;
  sample_rate: number;
  device_index: number;
  bit_depth: number;
  signal: AbortSignal;
  onProgress(percent: number): void;
}

export interface CaptureBackend {
  readonly name: string;
  record(request: CaptureRequest): Promise<void>;
  listDevices(): Promise<AudioDeviceInfo[]>;
}

/** Resolves after `ms`, or as soon as `signal` aborts */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

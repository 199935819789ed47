/**
 * ALSA capture through the `arecord` command-line tool.
 *
 * Devices are enumerated with `arecord -l` and numbered in listing order;
 * that number is the `device_index` the server sends. A recording is one
 * `arecord` child process writing the WAV directly. Stop requests send
 * SIGINT, on which arecord finalises the header and exits.
 */

import { execFile, spawn } from "node:child_process";
import type { AudioDeviceInfo } from "@edge-fleet/shared";
import type { CaptureBackend, CaptureRequest } from "./capture.js";

/** One capture device as listed by `arecord -l` */
export interface AlsaDevice {
  index: number;
  card: number;
  device: number;
  name: string;
}

// card 1: Device [USB Audio Device], device 0: USB Audio [USB Audio]
const CARD_LINE = /^card (\d+): [^\[]*\[([^\]]*)\], device (\d+): [^\[]*\[([^\]]*)\]/;

const SAMPLE_FORMATS: Record<number, string> = {
  8: "U8",
  16: "S16_LE",
  24: "S24_3LE",
  32: "S32_LE",
};

/** Parse the output of `arecord -l` */
export function parseArecordList(output: string): AlsaDevice[] {
  const devices: AlsaDevice[] = [];
  for (const line of output.split("\n")) {
    const match = CARD_LINE.exec(line.trim());
    if (!match) continue;
    const [, card, cardName, device, deviceName] = match;
    devices.push({
      index: devices.length,
      card: Number(card),
      device: Number(device),
      name: `${cardName}: ${deviceName} (hw:${card},${device})`,
    });
  }
  return devices;
}

/** `arecord` arguments for one capture into `request.path` on ALSA device `pcm` */
export function buildArecordArgs(request: Omit<CaptureRequest, "signal" | "onProgress">, pcm: string): string[] {
  const format = SAMPLE_FORMATS[request.bit_depth];
  if (!format) {
    throw new Error(`Unsupported bit depth: ${request.bit_depth}`);
  }
  return [
    "-D", pcm,
    "-f", format,
    "-c", String(request.channels),
    "-r", String(request.sample_rate),
    "-d", String(Math.max(1, Math.ceil(request.duration))),
    "-t", "wav",
    "-q",
    request.path,
  ];
}

export interface ArecordCaptureOptions {
  /** Executable name or path (default "arecord") */
  command?: string;
  progressIntervalMs?: number;
}

export class ArecordCapture implements CaptureBackend {
  readonly name = "arecord";
  private readonly command: string;
  private readonly progressIntervalMs: number;

  constructor(options: ArecordCaptureOptions = {}) {
    this.command = options.command ?? "arecord";
    this.progressIntervalMs = options.progressIntervalMs ?? 1_000;
  }

  async listDevices(): Promise<AudioDeviceInfo[]> {
    const devices = await this.listAlsaDevices();
    // `arecord -l` reports neither channel counts nor rates; plughw converts
    // to whatever is requested, so advertise stereo at 48 kHz.
    return devices.map((d) => ({
      index: d.index,
      name: d.name,
      max_input_channels: 2,
      max_output_channels: 0,
      default_sample_rate: 48000,
    }));
  }

  async record(request: CaptureRequest): Promise<void> {
    const pcm = await this.resolvePcm(request.device_index);
    const args = buildArecordArgs(request, pcm);

    await new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: ["ignore", "ignore", "pipe"] });
      let stderr = "";
      let stopped = false;
      const startedAt = Date.now();

      child.stderr.setEncoding("utf-8");
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      const progress = setInterval(() => {
        const elapsed = (Date.now() - startedAt) / 1000;
        request.onProgress(Math.min(99, (elapsed / request.duration) * 100));
      }, this.progressIntervalMs);

      const onAbort = () => {
        stopped = true;
        child.kill("SIGINT");
      };
      if (request.signal.aborted) onAbort();
      else request.signal.addEventListener("abort", onAbort, { once: true });

      child.on("error", (err) => {
        clearInterval(progress);
        request.signal.removeEventListener("abort", onAbort);
        reject(new Error(`Failed to start ${this.command}: ${err.message}`));
      });

      child.on("close", (code, signal) => {
        clearInterval(progress);
        request.signal.removeEventListener("abort", onAbort);
        if (code === 0 || (stopped && (signal === "SIGINT" || code === 1))) {
          request.onProgress(100);
          resolve();
          return;
        }
        const detail = stderr.trim() || (signal ? `killed by ${signal}` : `exit code ${code}`);
        reject(new Error(`${this.command} failed: ${detail}`));
      });
    });
  }

  private async listAlsaDevices(): Promise<AlsaDevice[]> {
    const output = await new Promise<string>((resolve, reject) => {
      execFile(this.command, ["-l"], { timeout: 5_000 }, (err, stdout) => {
        if (err) reject(new Error(`${this.command} -l failed: ${err.message}`));
        else resolve(stdout);
      });
    });
    return parseArecordList(output);
  }

  private async resolvePcm(deviceIndex: number): Promise<string> {
    const devices = await this.listAlsaDevices();
    const device = devices.find((d) => d.index === deviceIndex);
    if (device) return `plughw:${device.card},${device.device}`;
    // No enumerable hardware: index 0 still means the ALSA default
    if (deviceIndex === 0) return "default";
    throw new Error(`No capture device at index ${deviceIndex} (found ${devices.length})`);
  }
}

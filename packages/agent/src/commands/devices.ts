/**
 * `edge-agent devices`: list local capture inputs the way the server will
 * see them in `edge.audio_devices_response`.
 */

import { Command } from "commander";
import type { AudioDeviceInfo } from "@edge-fleet/shared";
import { createCaptureBackend } from "../lib/audio/index.js";
import { configExists, loadConfig, type CaptureBackendName } from "../lib/config.js";
import { formatError, outputResult, renderTable } from "../lib/formatters.js";

export function formatDevices(devices: AudioDeviceInfo[]): string {
  if (devices.length === 0) return "No capture devices found.";
  return renderTable(
    [
      { header: "INDEX", align: "right" },
      { header: "NAME" },
      { header: "INPUTS", align: "right" },
      { header: "RATE", align: "right" },
    ],
    devices.map((d) => [String(d.index), d.name, String(d.max_input_channels), String(d.default_sample_rate)]),
  );
}

function resolveBackend(requested: string | undefined): CaptureBackendName {
  if (requested === "arecord" || requested === "silence") return requested;
  if (requested !== undefined) {
    throw new Error(`Unknown capture backend "${requested}" (expected arecord or silence)`);
  }
  return configExists() ? loadConfig().capture.backend : "arecord";
}

export function createDevicesCommand(): Command {
  return new Command("devices")
    .description("List local audio capture devices")
    .option("--backend <backend>", "Capture backend (default: from config, else arecord)")
    .option("--json", "Output as JSON")
    .action(async (opts: { backend?: string; json?: boolean }) => {
      await runDevices(opts);
    });
}

export async function runDevices(opts: { backend?: string; json?: boolean }): Promise<void> {
  try {
    const backend = resolveBackend(opts.backend);
    const devices = await createCaptureBackend(backend).listDevices();
    outputResult(devices, { json: opts.json, format: formatDevices });
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

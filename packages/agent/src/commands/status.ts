/**
 * `edge-agent status`: local identity, server reachability and the upload
 * spool. Works without a running agent.
 */

import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, getConfigPath, type AgentConfig } from "../lib/config.js";
import { formatError, outputResult } from "../lib/formatters.js";
import { countSpooled } from "../lib/handoff.js";
import { checkHealth, type HealthCheck } from "../lib/health.js";

export interface StatusData {
  config_path: string;
  device: { id: string | null; name: string };
  server: { url: string } & HealthCheck;
  capture: { backend: string; channels: number; sample_rate: number; bit_depth: number; device_index: number };
  recordings: { dir: string; awaiting_upload: number };
}

export async function fetchStatus(config: AgentConfig, configPath: string): Promise<StatusData> {
  const [health, spooled] = await Promise.all([
    checkHealth(config.server.url, 3_000),
    countSpooled(config.recordings_dir),
  ]);
  return {
    config_path: configPath,
    device: { id: config.device.id, name: config.device.name },
    server: { url: config.server.url, ...health },
    capture: {
      backend: config.capture.backend,
      channels: config.audio.channels,
      sample_rate: config.audio.sample_rate,
      bit_depth: config.audio.bit_depth,
      device_index: config.audio.default_device_index,
    },
    recordings: { dir: config.recordings_dir, awaiting_upload: spooled },
  };
}

export function formatStatus(data: StatusData): string {
  const lines: string[] = [];
  lines.push("edge-agent status");
  lines.push("");
  lines.push(`  Device:     ${data.device.name} (${data.device.id ?? pc.dim("not yet registered")})`);

  const server = data.server;
  if (server.reachable) {
    const healthy = server.health?.status === "ok";
    const mark = healthy ? pc.green("✓") : pc.yellow("!");
    const state = server.health ? server.health.status : `HTTP ${server.httpStatus}`;
    lines.push(`  Server:     ${mark} ${server.url} · ${state} · ${server.latencyMs}ms`);
  } else {
    lines.push(`  Server:     ${pc.red("✗")} ${server.url} · unreachable (${server.error})`);
  }

  const c = data.capture;
  lines.push(
    `  Capture:    ${c.backend} · device ${c.device_index} · ${c.channels}ch · ${c.sample_rate} Hz · ${c.bit_depth}-bit`,
  );
  lines.push(`  Spool:      ${data.recordings.awaiting_upload} awaiting upload ${pc.dim(`(${data.recordings.dir})`)}`);
  return lines.join("\n");
}

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show node identity, server reachability and upload spool")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await runStatus(opts);
    });
}

export async function runStatus(opts: { json?: boolean }): Promise<void> {
  let config: AgentConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }
  const data = await fetchStatus(config, getConfigPath());
  outputResult(data, { json: opts.json, format: formatStatus });
}

/**
 * `edge-agent init` command.
 *
 * Writes ~/.edge-agent/config.yaml for a new node. The device id stays null
 * until the server assigns one on first registration; re-initialising with
 * --force keeps an id that was already assigned.
 */

import { Command } from "commander";
import * as os from "node:os";
import {
  buildConfig,
  configExists,
  ensureDirectories,
  getConfigPath,
  getRecordingsDir,
  loadConfig,
  saveConfig,
  type AgentConfig,
  type CaptureBackendName,
} from "../lib/config.js";
import { formatError } from "../lib/formatters.js";
import { checkHealth } from "../lib/health.js";

export function createInitCommand(): Command {
  return new Command("init")
    .description("Configure this node to join a fleet server")
    .requiredOption("--server <url>", "Fleet server base URL, e.g. http://fleet.local:3000")
    .option("--name <name>", "Device name (default: hostname)")
    .option("--backend <backend>", "Capture backend: arecord or silence", "arecord")
    .option("--force", "Overwrite an existing config", false)
    .option("--no-check", "Skip the server connectivity check")
    .action(async (opts: InitOptions) => {
      await runInit(opts);
    });
}

export interface InitOptions {
  server: string;
  name?: string;
  backend: string;
  force: boolean;
  check: boolean;
}

function isBackendName(value: string): value is CaptureBackendName {
  return value === "arecord" || value === "silence";
}

export async function runInit(opts: InitOptions): Promise<void> {
  if (configExists() && !opts.force) {
    console.log(`Already initialized (${getConfigPath()}). Use --force to re-initialize.`);
    return;
  }

  if (!isBackendName(opts.backend)) {
    console.error(formatError(new Error(`Unknown capture backend "${opts.backend}" (expected arecord or silence)`)));
    process.exitCode = 1;
    return;
  }

  // Keep a server-assigned identity across re-initialisation
  let deviceId: string | null = null;
  if (opts.force && configExists()) {
    try {
      deviceId = loadConfig().device.id;
    } catch (err) {
      console.error(`Existing config is unreadable, starting with a fresh identity: ${formatError(err)}`);
    }
  }

  let config: AgentConfig;
  try {
    config = buildConfig(
      {
        server: { url: opts.server },
        device: { id: deviceId, name: opts.name ?? os.hostname() },
        recordings_dir: getRecordingsDir(),
        capture: { backend: opts.backend },
      },
      "--server/--name",
    );
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
    return;
  }

  ensureDirectories(config);
  saveConfig(config);

  console.log("");
  console.log("edge-agent initialized");
  console.log("");
  console.log(`  Config:       ${getConfigPath()}`);
  console.log(`  Device name:  ${config.device.name}`);
  console.log(`  Device ID:    ${config.device.id ?? "(assigned on first connection)"}`);
  console.log(`  Server:       ${config.server.url}`);
  console.log(`  Backend:      ${config.capture.backend}`);
  console.log(`  Recordings:   ${config.recordings_dir}`);

  if (opts.check) {
    const check = await checkHealth(config.server.url);
    console.log("");
    console.log(
      check.reachable
        ? `  Server connectivity: OK (HTTP ${check.httpStatus})`
        : `  Server connectivity: FAILED (${check.error}); the agent will keep retrying once running`,
    );
  }
  console.log("");
}

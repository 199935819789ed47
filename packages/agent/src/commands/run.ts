/**
 * `edge-agent run`: the long-running node process.
 *
 * Connects, registers and then serves commands until SIGINT/SIGTERM. A
 * capture in progress when the signal arrives is stopped early and reported
 * as completed before the socket closes. The storage cleaner runs alongside
 * unless disabled in the config.
 */

import { Command } from "commander";
import { EdgeAgent } from "../lib/agent.js";
import { createCaptureBackend } from "../lib/audio/index.js";
import { ensureDirectories, loadConfig, saveConfig } from "../lib/config.js";
import { SpoolHandoff } from "../lib/handoff.js";
import { createAgentLogger } from "../lib/logger.js";
import { GIGABYTE, StorageCleaner } from "../lib/storage-cleaner.js";

export function createRunCommand(): Command {
  return new Command("run")
    .description("Connect to the fleet server and execute recording commands")
    .option("--log-level <level>", "Log level (default: LOG_LEVEL or info)")
    .action(async (opts: { logLevel?: string }) => {
      await runAgent(opts);
    });
}

export async function runAgent(opts: { logLevel?: string }): Promise<void> {
  const config = loadConfig();
  ensureDirectories(config);

  const logger = createAgentLogger({ level: opts.logLevel, logFile: config.log_file });
  const agent = new EdgeAgent({
    config,
    persistConfig: saveConfig,
    capture: createCaptureBackend(config.capture.backend),
    handoff: new SpoolHandoff(logger.child({ component: "handoff" })),
    logger,
  });

  const cleanupConfig = config.storage_cleanup;
  const cleaner = cleanupConfig.enabled
    ? new StorageCleaner({
        dir: config.recordings_dir,
        maxBytes: cleanupConfig.max_size_gb * GIGABYTE,
        thresholdPercent: cleanupConfig.threshold_percent,
        targetPercent: cleanupConfig.target_percent,
        logger,
        inUse: () => agent.activeRecordingPath,
      })
    : null;

  await new Promise<void>((resolve, reject) => {
    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      logger.info({ signal }, "Shutting down");
      cleaner?.stop();
      agent.stop().then(resolve, reject);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    agent.start();
    cleaner?.start(cleanupConfig.check_interval_minutes * 60_000);
  });
}

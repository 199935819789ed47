#!/usr/bin/env -S npx tsx

/**
 * edge-agent CLI entry point.
 *
 * Commands:
 *   init: write ~/.edge-agent/config.yaml for this node
 *   run: connect to the fleet server and serve recording commands
 *   status: identity, server reachability, upload spool
 *   devices: list local capture inputs
 */

import { Command } from "commander";
import { createInitCommand } from "./commands/init.js";
import { createRunCommand } from "./commands/run.js";
import { createStatusCommand } from "./commands/status.js";
import { createDevicesCommand } from "./commands/devices.js";
import { createAgentLogger } from "./lib/logger.js";
import { formatError } from "./lib/formatters.js";

/** Process-level logger for fatal errors; `run` builds its own from config */
const logger = createAgentLogger({ level: process.env.LOG_LEVEL ?? "warn" });

const program = new Command();

program
  .name("edge-agent")
  .description("Audio capture node for an edge fleet")
  .version("0.1.0");

program.addCommand(createInitCommand());
program.addCommand(createRunCommand());
program.addCommand(createStatusCommand());
program.addCommand(createDevicesCommand());

process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(formatError(err));
  logger.fatal({ err }, "edge-agent failed");
  process.exit(1);
});

/**
 * Pino logger for the edge agent.
 *
 * Logs go to stderr so `status --json` and `devices --json` keep stdout
 * clean, and additionally to `log_file` when the config names one.
 * Under NODE_ENV=test no transport is started.
 */

import { pino, type Logger } from "pino";

export interface AgentLoggerOptions {
  level?: string;
  logFile?: string | null;
}

export function createAgentLogger(options: AgentLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";

  if (process.env.NODE_ENV === "test") {
    return pino({ name: "edge-agent", level: process.env.LOG_LEVEL ?? "silent" });
  }

  const targets: pino.TransportTargetOptions[] = [{ target: "pino/file", options: { destination: 2 }, level }];
  if (options.logFile) {
    targets.push({ target: "pino/file", options: { destination: options.logFile, mkdir: true }, level });
  }

  return pino({ name: "edge-agent", level, transport: { targets } });
}

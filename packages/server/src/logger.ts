/**
 * Pino logger factory for the edge-fleet server.
 *
 * Every logger writes JSON to a file under LOG_DIR and to stdout: pretty
 * printed in development, raw JSON in production. Each long-running part of
 * the server gets its own file:
 *   - server.log: HTTP app, startup/shutdown, observer sockets
 *   - edge.log: device gateway, registry, dispatcher, liveness sweeps
 *
 * Configuration:
 *   - LOG_LEVEL  level (default "info")
 *   - NODE_ENV   "production" disables pretty printing, "test" disables
 *                transports entirely so tests never spawn worker threads
 *   - LOG_DIR    overrides the default {project_root}/logs
 */

import { pino, type Logger } from "pino";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

/** packages/server/src -> project root */
const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");
const LOG_DIR = process.env.LOG_DIR || join(PROJECT_ROOT, "logs");

/**
 * Create a named logger writing to stdout and to `LOG_DIR/<filename>`.
 * The file transport creates the directory on first write.
 */
export function createLogger(name: string, filename: string): Logger {
  if (isTest) {
    return pino({ name, level: process.env.LOG_LEVEL || "silent" });
  }

  return pino({
    name,
    level: LOG_LEVEL,
    transport: {
      targets: [
        isProduction
          ? { target: "pino/file", options: { destination: 1 }, level: LOG_LEVEL }
          : {
              target: "pino-pretty",
              options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
              level: LOG_LEVEL,
            },
        {
          target: "pino/file",
          options: { destination: join(LOG_DIR, filename), mkdir: true },
          level: LOG_LEVEL,
        },
      ],
    },
  });
}

/** Default server logger, writes to logs/server.log */
export const logger = createLogger("server", "server.log");

export const LOG_DIR_PATH = LOG_DIR;

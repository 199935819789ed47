/**
 * Server configuration, read from the environment.
 *
 * `dotenv/config` is imported by the entry point, so a local .env file is
 * already merged into process.env by the time loadServerConfig runs. All
 * values are validated up front; a bad value aborts startup with a
 * ConfigError naming every offending variable.
 */

import { z } from "zod";
import { ConfigError } from "@edge-fleet/shared";

const durationMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  /** Absent means devices are kept in memory only */
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== "" ? value : undefined)),
  HEARTBEAT_TIMEOUT_MS: durationMs(90_000),
  LIVENESS_SWEEP_INTERVAL_MS: durationMs(10_000),
  WS_PING_INTERVAL_MS: durationMs(2_000),
  WS_PONG_TIMEOUT_MS: durationMs(6_000),
  COMMAND_ACK_TIMEOUT_MS: durationMs(15_000),
  QUERY_TIMEOUT_MS: durationMs(10_000),
  SCHEDULER_TICK_MS: durationMs(1_000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_DIR: z.string().optional(),
});

export interface ServerConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  databaseUrl: string | undefined;
  heartbeatTimeoutMs: number;
  livenessSweepIntervalMs: number;
  wsPingIntervalMs: number;
  wsPongTimeoutMs: number;
  commandAckTimeoutMs: number;
  queryTimeoutMs: number;
  schedulerTickMs: number;
  logLevel: string;
  logDir: string | undefined;
}

/**
 * Validate and normalize the server environment.
 *
 * @throws {ConfigError} CONFIG_INVALID listing each bad variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid server configuration: ${problems.join("; ")}`, "CONFIG_INVALID", {
      problems,
    });
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    heartbeatTimeoutMs: e.HEARTBEAT_TIMEOUT_MS,
    livenessSweepIntervalMs: e.LIVENESS_SWEEP_INTERVAL_MS,
    wsPingIntervalMs: e.WS_PING_INTERVAL_MS,
    wsPongTimeoutMs: e.WS_PONG_TIMEOUT_MS,
    commandAckTimeoutMs: e.COMMAND_ACK_TIMEOUT_MS,
    queryTimeoutMs: e.QUERY_TIMEOUT_MS,
    schedulerTickMs: e.SCHEDULER_TICK_MS,
    logLevel: e.LOG_LEVEL,
    logDir: e.LOG_DIR,
  };
}

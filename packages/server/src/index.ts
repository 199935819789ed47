/**
 * Server entry point.
 *
 * Startup sequence:
 *   1. Load env vars (dotenv) and validate them
 *   2. With DATABASE_URL: connect, check, run migrations (abort on failure)
 *      and use the postgres device store; without it, keep devices in memory
 *   3. Restore devices, start HTTP + WebSockets, liveness sweep, scheduler
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop background loops and fail pending device queries
 *   2. Close device and observer sockets, then the HTTP server
 *   3. Close the Postgres pool
 *   4. Exit 0 (or force exit after SHUTDOWN_TIMEOUT_MS)
 */

import "dotenv/config";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type postgres from "postgres";
import { InMemoryDeviceStore, type DeviceStore } from "@edge-fleet/core";

import { loadServerConfig, type ServerConfig } from "./config.js";
import { createDb, checkDbHealth } from "./db/postgres.js";
import { runMigrations } from "./db/migrator.js";
import { PostgresDeviceStore } from "./db/device-store.js";
import { createLogger, logger } from "./logger.js";
import { startServer } from "./server.js";

const SHUTDOWN_TIMEOUT_MS = 30_000;

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), "db", "migrations");

/** Connect, migrate and build the postgres-backed store */
async function openPostgresStore(databaseUrl: string): Promise<{ sql: postgres.Sql; store: DeviceStore }> {
  const sql = createDb(databaseUrl, logger);

  const health = await checkDbHealth(sql);
  if (!health.ok) {
    logger.fatal({ error: health.error }, "Database unreachable, aborting startup");
    process.exit(1);
  }

  const migrations = await runMigrations(sql, MIGRATIONS_DIR, logger);
  logger.info(
    {
      applied: migrations.applied.length,
      skipped: migrations.skipped.length,
      errors: migrations.errors.length,
    },
    "Migrations complete",
  );
  if (migrations.errors.length > 0) {
    logger.fatal({ errors: migrations.errors }, "Migration errors detected, aborting startup");
    process.exit(1);
  }

  const store = new PostgresDeviceStore((strings, ...values) => sql(strings, ...values), logger);
  return { sql, store };
}

async function main(): Promise<void> {
  const startMs = performance.now();

  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (err) {
    logger.fatal({ err }, "Invalid configuration");
    process.exit(1);
  }

  let sql: postgres.Sql | null = null;
  let store: DeviceStore;
  if (config.databaseUrl) {
    ({ sql, store } = await openPostgresStore(config.databaseUrl));
  } else {
    logger.warn("DATABASE_URL not set, devices are kept in memory only");
    store = new InMemoryDeviceStore();
  }

  const server = await startServer({
    port: config.port,
    store,
    timings: config,
    logger,
    edgeLogger: createLogger("edge", "edge.log"),
  });

  const elapsedMs = Math.round(performance.now() - startMs);
  logger.info(
    { elapsed_ms: elapsedMs, port: server.port, restored_devices: server.restored, store: sql ? "postgres" : "memory" },
    `Server started in ${elapsedMs}ms on port ${server.port}`,
  );

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info({ signal }, "Shutting down...");

    const forceExitTimer = setTimeout(() => {
      logger.error("Graceful shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await server.close();
      if (sql) await sql.end({ timeout: 5 });
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Unhandled startup error");
  process.exit(1);
});

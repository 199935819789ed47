/**
 * PostgreSQL connection pool for the device store.
 *
 * Uses the `postgres` (postgres.js) driver. Connection strings are never
 * logged since they carry credentials; only host and port are.
 */

import postgres from "postgres";
import type { Logger } from "pino";
import { StorageError } from "@edge-fleet/shared";

const POOL_DEFAULTS = {
  max: 10,
  /** seconds */
  idle_timeout: 20,
  /** seconds */
  connect_timeout: 10,
} as const;

const HEALTH_CHECK_TIMEOUT_MS = 5_000;

export interface DbHealthResult {
  ok: boolean;
  latency_ms: number;
  error?: string;
}

/**
 * Create a postgres.js client with connection pooling.
 *
 * @throws {StorageError} STORAGE_DB_URL_MISSING if the URL is empty
 */
export function createDb(
  connectionString: string | undefined,
  logger: Logger,
  options?: { max?: number },
): postgres.Sql {
  if (!connectionString || connectionString.trim() === "") {
    throw new StorageError("DATABASE_URL is required for the postgres device store.", "STORAGE_DB_URL_MISSING");
  }

  let target = "invalid-url";
  try {
    const url = new URL(connectionString);
    target = `${url.hostname}:${url.port || 5432}`;
  } catch (err) {
    // postgres.js reports the malformed URL itself on first query
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, "DATABASE_URL is not a URL");
  }

  const max = options?.max ?? POOL_DEFAULTS.max;
  const sql = postgres(connectionString, {
    max,
    idle_timeout: POOL_DEFAULTS.idle_timeout,
    connect_timeout: POOL_DEFAULTS.connect_timeout,
    onnotice: (notice) => logger.debug({ notice: notice.message }, "Postgres notice"),
  });

  logger.info({ target, max }, "Postgres pool created");
  return sql;
}

/**
 * Run `SELECT 1` with a timeout. Used by the health route; never throws.
 */
export async function checkDbHealth(sql: postgres.Sql): Promise<DbHealthResult> {
  const start = performance.now();
  let timer: NodeJS.Timeout | undefined;

  try {
    await Promise.race([
      sql`SELECT 1`,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("DB health check timed out")), HEALTH_CHECK_TIMEOUT_MS);
      }),
    ]);
    return { ok: true, latency_ms: Math.round(performance.now() - start) };
  } catch (err) {
    return {
      ok: false,
      latency_ms: Math.round(performance.now() - start),
      error: err instanceof Error ? err.message : "Unknown health check failure",
    };
  } finally {
    clearTimeout(timer);
  }
}

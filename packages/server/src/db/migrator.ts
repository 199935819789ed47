/**
 * SQL migration runner.
 *
 * Reads `.sql` files from a directory, records applied ones in a
 * `_migrations` table and applies the rest in lexicographic order.
 *
 *   - A session-level advisory lock serializes concurrent runs across
 *     server instances
 *   - Each file runs in its own transaction; a failure is recorded and the
 *     remaining files are still attempted
 *   - A missing or empty directory is a no-op
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type postgres from "postgres";
import type { Logger } from "pino";

/** Must be the same on every instance */
const ADVISORY_LOCK_ID = 61_273_094;

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  errors: Array<{ name: string; error: string }>;
}

export interface MigrationFile {
  /** Filename, e.g. "001_edge_devices.sql" */
  name: string;
  content: string;
}

/**
 * Apply every pending migration in `migrationsDir`.
 */
export async function runMigrations(
  sql: postgres.Sql,
  migrationsDir: string,
  logger: Logger,
): Promise<MigrationResult> {
  const log = logger.child({ component: "migrator" });
  const result: MigrationResult = { applied: [], skipped: [], errors: [] };

  const migrationFiles = await readMigrationFiles(migrationsDir);
  if (migrationFiles.length === 0) {
    return result;
  }

  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;

  await sql`SELECT pg_advisory_lock(${ADVISORY_LOCK_ID})`;

  try {
    const applied = await sql<{ name: string }[]>`SELECT name FROM _migrations`;
    const appliedSet = new Set(applied.map((row) => row.name));

    for (const file of migrationFiles) {
      if (appliedSet.has(file.name)) {
        result.skipped.push(file.name);
        continue;
      }

      try {
        await sql.begin(async (tx) => {
          await tx.unsafe(file.content);
          await tx`INSERT INTO _migrations (name) VALUES (${file.name})`;
        });
        result.applied.push(file.name);
        log.info({ migration: file.name }, "Migration applied");
      } catch (err) {
        const error = err instanceof Error ? err.message : "Unknown migration error";
        result.errors.push({ name: file.name, error });
        log.error({ migration: file.name, error }, "Migration failed");
      }
    }
  } finally {
    await sql`SELECT pg_advisory_unlock(${ADVISORY_LOCK_ID})`;
  }

  return result;
}

/**
 * Read the `.sql` files of a directory, sorted by name. A directory that
 * does not exist yields an empty list.
 */
export async function readMigrationFiles(dir: string): Promise<MigrationFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const files: MigrationFile[] = [];
  for (const name of entries.filter((f) => f.endsWith(".sql")).sort()) {
    files.push({ name, content: await readFile(join(dir, name), "utf-8") });
  }
  return files;
}

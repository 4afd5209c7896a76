/**
 * Tradeflow — Migration Runner
 * Reads SQL files from infra/db/migrations/ in order and executes them
 * through the `exec_sql` RPC. Tracks applied migrations in a _migrations table.
 *
 * Runs on every coordinator startup and from `tradeflow migrate`.
 */
import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createLogger } from "../../services/shared/src/logger.js";
import { PersistenceError } from "../../services/shared/src/errors.js";
import { TABLES } from "../../services/shared/src/db.js";

const log = createLogger("migrate");

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations/", import.meta.url));

export interface MigrationReport {
  applied: string[];
  alreadyApplied: string[];
  /** false when exec_sql is missing and existing tables were verified instead */
  rpcAvailable: boolean;
}

export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

/** Every table must answer a zero-row select. */
async function verifyTables(db: SupabaseClient): Promise<void> {
  for (const table of TABLES) {
    const { error } = await db.from(table).select("*").limit(1);
    if (error) {
      throw new PersistenceError(
        `Table ${table} is missing and exec_sql is unavailable. ` +
          `Run infra/db/migrations/*.sql manually in the Supabase SQL editor.`,
        table,
        error
      );
    }
  }
}

export async function runMigrations(
  db: SupabaseClient,
  dir: string = MIGRATIONS_DIR
): Promise<MigrationReport> {
  const report: MigrationReport = { applied: [], alreadyApplied: [], rpcAvailable: true };

  // Ensure _migrations tracking table exists
  const { error: bootstrapError } = await db.rpc("exec_sql", {
    sql: `CREATE TABLE IF NOT EXISTS public._migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ DEFAULT now()
    );`,
  });

  if (bootstrapError) {
    log.warn("exec_sql RPC not available, verifying existing schema", {
      error: bootstrapError.message,
    });
    await verifyTables(db);
    report.rpcAvailable = false;
    return report;
  }

  const files = listMigrationFiles(dir);
  if (files.length === 0) {
    log.warn("No migration files found", { dir });
    return report;
  }

  const { data: applied, error: listError } = await db.from("_migrations").select("name");
  if (listError) throw PersistenceError.fromDb("select", "_migrations", listError);

  const appliedSet = new Set<string>();
  for (const row of applied ?? []) {
    if (typeof row?.name === "string") appliedSet.add(row.name);
  }

  for (const file of files) {
    if (appliedSet.has(file)) {
      report.alreadyApplied.push(file);
      continue;
    }

    const sql = readFileSync(join(dir, file), "utf-8");
    log.info("Applying migration", { file });

    const { error } = await db.rpc("exec_sql", { sql });
    if (error) throw new PersistenceError(`Migration ${file} failed: ${error.message}`, "_migrations", error);

    const { error: recordError } = await db.from("_migrations").insert({ name: file });
    if (recordError) throw PersistenceError.fromDb("insert", "_migrations", recordError);

    report.applied.push(file);
  }

  log.info("Migrations complete", {
    applied: report.applied.length,
    alreadyApplied: report.alreadyApplied.length,
  });
  return report;
}

/**
 * `tradeflow migrate` — apply the SQL migrations and exit.
 */
import type { Command } from "commander";
import { loadConfig, migrateConfigSchema } from "../../services/shared/src/config.js";
import { createDb } from "../../services/shared/src/db.js";
import { CoordinationStore } from "../../services/store/src/index.js";

export function registerMigrateCli(program: Command): void {
  program
    .command("migrate")
    .description("Create the coordinator tables if they do not exist")
    .action(async () => {
      const config = loadConfig(migrateConfigSchema);
      const store = new CoordinationStore(
        createDb(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY || config.SUPABASE_KEY)
      );

      const report = await store.ensureSchema();
      console.log(
        report.rpcAvailable
          ? `Applied ${report.applied.length} migration(s), ${report.alreadyApplied.length} already applied`
          : "exec_sql RPC unavailable; verified existing tables"
      );
    });
}

import ora from "ora";

import { fieldNamesFrom, loadConfig, type Config } from "../../config.js";
import { closeConnection, createDatabase } from "../../db/connection.js";
import { runMigration } from "../../db/migrate.js";
import { DirectoryClient } from "../../directory/client.js";
import { errorMessage } from "../../errors.js";
import { CacheSnapshotHolder } from "../../services/cache/holder.js";
import { ReconcileService, SyncCycle } from "../../services/sync/index.js";
import { displayReconcileSummary, printError } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Synchronize the local store with the membership directory");

  // sync run
  sync
    .command("run")
    .description("Fetch contacts once, reconcile the store and build the caches")
    .action(async () => {
      let config: Config;
      try {
        config = loadConfig();
      } catch (error) {
        printError(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Syncing contacts...").start();
      const store = createDatabase(config.dbPath);

      try {
        await runMigration(store);

        const cycle = new SyncCycle({
          db: store,
          holder: new CacheSnapshotHolder(),
          source: new DirectoryClient({
            accountId: config.accountId,
            apiKey: config.apiKey,
            timeoutMs: config.directoryTimeoutMs,
          }),
          reconciler: new ReconcileService(store, fieldNamesFrom(config)),
        });

        const outcome = await cycle.run();
        if (outcome.status === "failed") {
          spinner.fail(
            `Sync failed during ${outcome.stage}: ${outcome.error.message}`
          );
          process.exitCode = 1;
          return;
        }

        spinner.succeed(
          `Synced ${String(outcome.reconcile.upserted)} members in ${String(outcome.duration)}ms`
        );
        displayReconcileSummary(outcome.reconcile);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection(store);
      }
    });
}

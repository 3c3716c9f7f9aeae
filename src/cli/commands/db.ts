import ora from "ora";

import { resolveDbPath } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  createDatabase,
} from "../../db/connection.js";
import { runMigration, hasSchema, getTableStats } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the members, trainings and link tables")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();
      const store = createDatabase(resolveDbPath());

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables...";
        }

        await runMigration(store, { fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        console.log("\nTables:");
        displayTableStats(await getTableStats(store));
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection(store);
      }
    });

  // db status
  db.command("status")
    .description("Check the database and show row counts")
    .action(async () => {
      const spinner = ora("Checking database...").start();
      const dbPath = resolveDbPath();
      const store = createDatabase(dbPath);

      try {
        const connected = await checkConnection(store);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase: ${dbPath}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase: ${dbPath}`);

        if (!(await hasSchema(store))) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          console.log("\nTable statistics:");
          displayTableStats(await getTableStats(store));
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection(store);
      }
    });
}

import { resolveDbPath } from "../../config.js";
import { closeConnection, createDatabase } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import {
  buildCacheSnapshot,
  doorEntries,
  machineEntries,
} from "../../services/cache/builder.js";
import {
  displayDoorCacheTable,
  displayMachineCacheTable,
  printError,
} from "../utils/display.js";

import type { Command } from "commander";

type CacheView = "door" | "machine";

async function showCache(view: CacheView, asJson: boolean): Promise<void> {
  const store = createDatabase(resolveDbPath());

  try {
    const snapshot = await buildCacheSnapshot(store, {
      version: 1,
    });

    if (asJson) {
      const data =
        view === "door" ? doorEntries(snapshot) : machineEntries(snapshot);
      console.log(JSON.stringify(data, null, 2));
    } else if (view === "door") {
      displayDoorCacheTable(snapshot);
    } else {
      displayMachineCacheTable(snapshot);
    }
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await closeConnection(store);
  }
}

// ============================================================================
// Cache Commands
// ============================================================================

export function registerCacheCommand(program: Command): void {
  const cache = program
    .command("cache")
    .description("Build the reader caches from the local store and print them");

  cache
    .command("door")
    .description("Show tags with their membership level")
    .option("--json", "Print the reader payload as JSON")
    .action(async (options: { json?: boolean }) => {
      await showCache("door", options.json === true);
    });

  cache
    .command("machine")
    .description("Show tags with their completed trainings")
    .option("--json", "Print the reader payload as JSON")
    .action(async (options: { json?: boolean }) => {
      await showCache("machine", options.json === true);
    });
}

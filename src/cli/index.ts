#!/usr/bin/env node

/**
 * Tag Sync CLI
 *
 * Maintains the local RFID access store and inspects the reader caches.
 */

import { Command } from "commander";

import { registerCacheCommand } from "./commands/cache.js";
import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("tagsync")
  .description("RFID access cache synchronized from the membership directory")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerCacheCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();

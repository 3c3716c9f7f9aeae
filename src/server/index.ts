import { fieldNamesFrom, loadConfig, type Config } from "../config.js";
import { closeConnection, createDatabase } from "../db/connection.js";
import { runMigration } from "../db/migrate.js";
import { DirectoryClient } from "../directory/client.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { CacheSnapshotHolder } from "../services/cache/holder.js";
import { SyncScheduler } from "../services/scheduler.js";
import { ReconcileService, SyncCycle } from "../services/sync/index.js";
import { buildApp } from "./app.js";

import type { Database } from "../db/schema.js";
import type { Kysely } from "kysely";

// Missing configuration or an unusable store are the only fatal errors
function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (err) {
    serverLogger.fatal({ err }, "Failed to load configuration");
    process.exit(1);
  }
}

async function openStoreOrExit(path: string): Promise<Kysely<Database>> {
  try {
    const database = createDatabase(path);
    await runMigration(database);
    return database;
  } catch (err) {
    serverLogger.fatal({ err, dbPath: path }, "Failed to open store");
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const db = await openStoreOrExit(config.dbPath);

const holder = new CacheSnapshotHolder();
const cycle = new SyncCycle({
  db,
  holder,
  source: new DirectoryClient({
    accountId: config.accountId,
    apiKey: config.apiKey,
    timeoutMs: config.directoryTimeoutMs,
  }),
  reconciler: new ReconcileService(db, fieldNamesFrom(config)),
});
const scheduler = new SyncScheduler(cycle, {
  intervalMs: config.syncIntervalMs,
  runOnStart: config.syncOnStart,
});

const app = await buildApp(
  { holder, scheduler },
  { logger: fastifyLoggerConfig }
);

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, "Shutting down");
  await scheduler.stop();
  await app.close();
  await closeConnection(db);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      serverLogger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  });
}

// Start server
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ host: config.host, port: config.port }, "Server started");
  scheduler.start();
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

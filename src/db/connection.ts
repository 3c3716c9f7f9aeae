import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect, sql } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

export const IN_MEMORY = ":memory:";

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Open the SQLite store at `path` (or an in-memory one for ":memory:").
 */
export function createDatabase(path: string): Kysely<Database> {
  if (path !== IN_MEMORY) {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");

  dbLogger.debug({ path }, "Opened SQLite database");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";
import { TABLE_NAMES, type Database, type TableName } from "./schema.js";

const currentFilePath = fileURLToPath(import.meta.url);
const currentDirPath = dirname(currentFilePath);

// Link table first so the foreign key into trainings never blocks a drop
const DROP_ORDER: readonly TableName[] = [
  "members_trainings_link",
  "trainings",
  "members",
];

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Split schema.sql into single statements (better-sqlite3 prepares one at a time).
 */
export function splitStatements(schema: string): string[] {
  return schema
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement !== "");
}

/**
 * Apply schema.sql. Every statement is idempotent (IF NOT EXISTS).
 */
export async function runMigration(
  db: Kysely<Database>,
  options?: { fresh?: boolean }
): Promise<void> {
  const schemaPath = join(currentDirPath, "schema.sql");
  const statements = splitStatements(readFileSync(schemaPath, "utf8"));

  try {
    await db.transaction().execute(async (trx) => {
      if (options?.fresh === true) {
        dbLogger.info("Dropping existing tables (--fresh mode)...");
        for (const table of DROP_ORDER) {
          await sql`DROP TABLE IF EXISTS ${sql.table(table)}`.execute(trx);
        }
      }

      dbLogger.info("Running schema migration...");
      for (const statement of statements) {
        await sql.raw(statement).execute(trx);
      }
    });

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  }
}

/**
 * Check if the schema exists (has the members table)
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const result = await sql<{ count: number }>`
    SELECT COUNT(*) AS count
    FROM sqlite_master
    WHERE type = 'table' AND name = 'members'
  `.execute(db);
  const row = result.rows[0];
  return row !== undefined && row.count > 0;
}

export interface TableStat {
  table_name: TableName;
  row_count: number;
}

/**
 * Get table statistics
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of TABLE_NAMES) {
    const result = await sql<{ count: number }>`
      SELECT COUNT(*) AS count FROM ${sql.table(table)}
    `.execute(db);
    stats.push({ table_name: table, row_count: result.rows[0]?.count ?? 0 });
  }
  return stats;
}

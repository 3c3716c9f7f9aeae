/**
 * In-memory SQLite store for tests
 */

import { IN_MEMORY, createDatabase } from "../../src/db/connection.js";
import { runMigration } from "../../src/db/migrate.js";

import type {
  Database,
  Member,
  MembershipTrainingLink,
  Training,
} from "../../src/db/schema.js";
import type { Kysely } from "kysely";

export async function createTestStore(): Promise<Kysely<Database>> {
  const db = createDatabase(IN_MEMORY);
  await runMigration(db);
  return db;
}

export interface StoreDump {
  members: Member[];
  trainings: Training[];
  links: MembershipTrainingLink[];
}

/**
 * Every row of every table, in a stable order.
 */
export async function dumpStore(db: Kysely<Database>): Promise<StoreDump> {
  const members = await db
    .selectFrom("members")
    .selectAll()
    .orderBy("contact_id")
    .execute();
  const trainings = await db
    .selectFrom("trainings")
    .selectAll()
    .orderBy("training_name")
    .execute();
  const links = await db
    .selectFrom("members_trainings_link")
    .selectAll()
    .orderBy("tag_id")
    .orderBy("training_name")
    .execute();

  return { members, trainings, links };
}

/**
 * Training names linked to one tag, in name order.
 */
export async function linkedTrainings(
  db: Kysely<Database>,
  tagId: number
): Promise<string[]> {
  const rows = await db
    .selectFrom("members_trainings_link")
    .select("training_name")
    .where("tag_id", "=", tagId)
    .orderBy("training_name")
    .execute();
  return rows.map((row) => row.training_name);
}

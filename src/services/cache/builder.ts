/**
 * Cache Builder
 *
 * Reads the whole store in one transaction and produces a frozen snapshot
 * with the door view (tag -> membership level) and the machine view
 * (tag -> training names). Snapshots are never modified after this returns.
 */

import { BuildError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type {
  Database,
  Member,
  MembershipTrainingLink,
} from "../../db/schema.js";
import type {
  DoorCacheEntryDto,
  MachineCacheEntryDto,
  SnapshotMeta,
} from "../../types/api.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface CacheSnapshot {
  readonly version: number;
  readonly builtAt: string;
  readonly door: ReadonlyMap<number, number>;
  readonly machine: ReadonlyMap<number, readonly string[]>;
}

export interface BuildOptions {
  version: number;
  now?: Date;
}

// ============================================================================
// Building
// ============================================================================

/**
 * Assemble a snapshot from already-read rows.
 * Members must be ordered by tag id, then contact id; links by tag id, then name.
 * @throws BuildError when a link points at a tag no member holds
 */
export function assembleSnapshot(
  members: readonly Member[],
  links: readonly MembershipTrainingLink[],
  options: BuildOptions
): CacheSnapshot {
  const door = new Map<number, number>();
  const trainings = new Map<number, string[]>();

  for (const member of members) {
    if (member.tag_id === 0) {
      continue;
    }
    const existing = door.get(member.tag_id);
    if (existing !== undefined) {
      syncLogger.warn(
        { tagId: member.tag_id, contactId: member.contact_id },
        "Tag shared by several contacts; keeping the lowest contact id"
      );
      continue;
    }
    door.set(member.tag_id, member.membership_level);
    trainings.set(member.tag_id, []);
  }

  for (const link of links) {
    const names = trainings.get(link.tag_id);
    if (names === undefined) {
      throw new BuildError(
        `Training link "${link.training_name}" references tag ${String(link.tag_id)} with no member`
      );
    }
    names.push(link.training_name);
  }

  const machine = new Map<number, readonly string[]>();
  for (const [tagId, names] of trainings) {
    machine.set(tagId, Object.freeze(names));
  }

  return Object.freeze({
    version: options.version,
    builtAt: (options.now ?? new Date()).toISOString(),
    door,
    machine,
  });
}

/**
 * Read the store and build a complete snapshot.
 * @throws BuildError on a failed or inconsistent read
 */
export async function buildCacheSnapshot(
  db: Kysely<Database>,
  options: BuildOptions
): Promise<CacheSnapshot> {
  let rows: { members: Member[]; links: MembershipTrainingLink[] };
  try {
    rows = await db.transaction().execute(async (trx) => {
      const members = await trx
        .selectFrom("members")
        .selectAll()
        .where("tag_id", "!=", 0)
        .orderBy("tag_id")
        .orderBy("contact_id")
        .execute();

      const links = await trx
        .selectFrom("members_trainings_link")
        .selectAll()
        .orderBy("tag_id")
        .orderBy("training_name")
        .execute();

      return { members, links };
    });
  } catch (error) {
    throw new BuildError(`Failed to read store: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const snapshot = assembleSnapshot(rows.members, rows.links, options);

  syncLogger.debug(
    {
      version: snapshot.version,
      doorEntries: snapshot.door.size,
      machineEntries: snapshot.machine.size,
    },
    "Built cache snapshot"
  );

  return snapshot;
}

// ============================================================================
// Views
// ============================================================================

export function snapshotMeta(
  snapshot: CacheSnapshot,
  entryCount: number
): SnapshotMeta {
  return {
    version: snapshot.version,
    builtAt: snapshot.builtAt,
    entryCount,
  };
}

/**
 * Door view as reader payload, ordered by tag id.
 */
export function doorEntries(snapshot: CacheSnapshot): DoorCacheEntryDto[] {
  return [...snapshot.door]
    .sort(([a], [b]) => a - b)
    .map(([tagId, membershipLevel]) => ({ tagId, membershipLevel }));
}

/**
 * Machine view as reader payload, ordered by tag id.
 */
export function machineEntries(
  snapshot: CacheSnapshot
): MachineCacheEntryDto[] {
  return [...snapshot.machine]
    .sort(([a], [b]) => a - b)
    .map(([tagId, trainings]) => ({ tagId, trainings: [...trainings] }));
}

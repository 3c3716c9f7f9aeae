/**
 * Reconciliation Engine
 *
 * Brings the members / trainings / link tables in line with one upstream
 * contact list. The whole batch is applied in a single transaction, so a
 * store failure leaves the previous state untouched.
 */

import {
  ExtractionError,
  PersistenceError,
  errorMessage,
  type ExtractedField,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  extractContactData,
  parseContact,
  type ContactData,
} from "./extract.js";

import type { FieldNames } from "../../config.js";
import type { Database } from "../../db/schema.js";
import type { Kysely, Transaction } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SkippedContact {
  /** null when the record carries no usable id */
  contactId: number | null;
  /** contact, tagId: contact ignored. trainings: member kept, links unchanged. */
  scope: ExtractedField;
  reason: string;
}

export interface ReconcileResult {
  processed: number;
  upserted: number;
  unassigned: number;
  linksWritten: number;
  skipped: SkippedContact[];
  duration: number;
}

// ============================================================================
// Reconcile Service
// ============================================================================

export class ReconcileService {
  constructor(
    private db: Kysely<Database>,
    private fields: FieldNames
  ) {}

  /**
   * Reconcile the store against the full upstream contact list.
   * @throws PersistenceError when any write fails (nothing is committed)
   */
  async reconcile(contacts: readonly unknown[]): Promise<ReconcileResult> {
    const startTime = Date.now();
    const skipped: SkippedContact[] = [];
    const assigned: ContactData[] = [];
    let unassigned = 0;

    for (const raw of contacts) {
      let data: ContactData;
      try {
        data = extractContactData(parseContact(raw), this.fields);
      } catch (error) {
        if (!(error instanceof ExtractionError)) {
          throw error;
        }
        syncLogger.warn(
          {
            contactId: error.contactId,
            field: error.field,
            reason: error.message,
          },
          "Skipping malformed contact"
        );
        skipped.push({
          contactId: error.contactId,
          scope: error.field,
          reason: error.message,
        });
        continue;
      }

      if (data.tagId === 0) {
        unassigned++;
        continue;
      }

      if (data.trainingError !== null) {
        syncLogger.warn(
          { contactId: data.contactId, reason: data.trainingError.message },
          "Keeping previous trainings for contact with malformed training field"
        );
        skipped.push({
          contactId: data.contactId,
          scope: "trainings",
          reason: data.trainingError.message,
        });
      }

      assigned.push(data);
    }

    let linksWritten = 0;
    try {
      await this.db.transaction().execute(async (trx) => {
        for (const data of assigned) {
          await this.upsertMember(trx, data);
        }
        // Links are written once every tag holder is known
        for (const data of assigned) {
          linksWritten += await this.applyLinks(trx, data);
        }
      });
    } catch (error) {
      syncLogger.error(
        { error: errorMessage(error) },
        "Reconciliation rolled back"
      );
      throw new PersistenceError(
        `Failed to reconcile contacts: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const result: ReconcileResult = {
      processed: contacts.length,
      upserted: assigned.length,
      unassigned,
      linksWritten,
      skipped,
      duration: Date.now() - startTime,
    };

    syncLogger.info(
      {
        processed: result.processed,
        upserted: result.upserted,
        unassigned: result.unassigned,
        linksWritten: result.linksWritten,
        skipped: result.skipped.length,
        duration: result.duration,
      },
      "Reconciliation completed"
    );

    return result;
  }

  /**
   * Upsert one member, releasing its previous tag if it changed.
   */
  private async upsertMember(
    trx: Transaction<Database>,
    data: ContactData
  ): Promise<void> {
    const previous = await trx
      .selectFrom("members")
      .select("tag_id")
      .where("contact_id", "=", data.contactId)
      .executeTakeFirst();

    await trx
      .insertInto("members")
      .values({
        contact_id: data.contactId,
        tag_id: data.tagId,
        membership_level: data.membershipLevel,
      })
      .onConflict((oc) =>
        oc.column("contact_id").doUpdateSet({
          tag_id: data.tagId,
          membership_level: data.membershipLevel,
        })
      )
      .execute();

    if (
      previous !== undefined &&
      previous.tag_id !== 0 &&
      previous.tag_id !== data.tagId
    ) {
      await this.releaseTag(trx, previous.tag_id);
    }
  }

  /**
   * Replace the tag's training links. Only the tag's owner, the holder with
   * the lowest contact id, writes them, matching the door view.
   * Returns the number of link rows written.
   */
  private async applyLinks(
    trx: Transaction<Database>,
    data: ContactData
  ): Promise<number> {
    if (data.labels === null) {
      return 0;
    }

    const owner = await trx
      .selectFrom("members")
      .select("contact_id")
      .where("tag_id", "=", data.tagId)
      .orderBy("contact_id")
      .executeTakeFirst();

    if (owner?.contact_id !== data.contactId) {
      syncLogger.debug(
        {
          tagId: data.tagId,
          contactId: data.contactId,
          ownerId: owner?.contact_id,
        },
        "Tag owned by a lower contact id; leaving its links"
      );
      return 0;
    }

    return replaceTrainingLinks(trx, data.tagId, data.labels);
  }

  /**
   * Drop the links of a tag nobody holds any more.
   */
  private async releaseTag(
    trx: Transaction<Database>,
    tagId: number
  ): Promise<void> {
    const holder = await trx
      .selectFrom("members")
      .select("contact_id")
      .where("tag_id", "=", tagId)
      .executeTakeFirst();

    if (holder === undefined) {
      await trx
        .deleteFrom("members_trainings_link")
        .where("tag_id", "=", tagId)
        .execute();
      syncLogger.debug({ tagId }, "Released links of reassigned tag");
    }
  }
}

/**
 * Replace every link of `tagId` with one row per distinct label, creating
 * trainings on first reference.
 */
export async function replaceTrainingLinks(
  trx: Transaction<Database>,
  tagId: number,
  labels: string[]
): Promise<number> {
  const names = [...new Set(labels)];

  await trx
    .deleteFrom("members_trainings_link")
    .where("tag_id", "=", tagId)
    .execute();

  if (names.length === 0) {
    return 0;
  }

  await trx
    .insertInto("trainings")
    .values(names.map((name) => ({ training_name: name })))
    .onConflict((oc) => oc.column("training_name").doNothing())
    .execute();

  await trx
    .insertInto("members_trainings_link")
    .values(names.map((name) => ({ tag_id: tagId, training_name: name })))
    .execute();

  return names.length;
}

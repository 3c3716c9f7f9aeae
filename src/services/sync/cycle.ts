/**
 * One fetch -> reconcile -> build -> publish pass.
 */

import {
  BuildError,
  FetchError,
  PersistenceError,
  errorMessage,
  type SyncError,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { buildCacheSnapshot } from "../cache/builder.js";

import type { ReconcileResult, ReconcileService } from "./reconcile.js";
import type { Database } from "../../db/schema.js";
import type { ContactSource } from "../../directory/client.js";
import type { CacheSnapshotHolder } from "../cache/holder.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export type CycleStage = "fetch" | "reconcile" | "build";

interface CycleTiming {
  startedAt: Date;
  finishedAt: Date;
  duration: number;
}

export type CycleOutcome = CycleTiming &
  (
    | {
        status: "succeeded";
        reconcile: ReconcileResult;
        snapshotVersion: number;
      }
    | {
        status: "failed";
        stage: CycleStage;
        error: SyncError;
      }
  );

export interface CycleRunner {
  run(): Promise<CycleOutcome>;
}

export interface SyncCycleDeps {
  db: Kysely<Database>;
  source: ContactSource;
  reconciler: ReconcileService;
  holder: CacheSnapshotHolder;
  clock?: () => Date;
}

// ============================================================================
// Sync Cycle
// ============================================================================

export class SyncCycle implements CycleRunner {
  private clock: () => Date;

  constructor(private deps: SyncCycleDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run one cycle. Never throws: a failed stage ends the cycle and the
   * published snapshot stays as it was.
   */
  async run(): Promise<CycleOutcome> {
    const startedAt = this.clock();
    syncLogger.info("Fetching contacts and updating database...");

    const fail = (stage: CycleStage, error: SyncError): CycleOutcome => {
      const finishedAt = this.clock();
      syncLogger.error(
        { stage, code: error.code, error: error.message },
        "Sync cycle failed"
      );
      return {
        status: "failed",
        stage,
        error,
        startedAt,
        finishedAt,
        duration: finishedAt.getTime() - startedAt.getTime(),
      };
    };

    let contacts: unknown[];
    try {
      contacts = await this.deps.source.fetchContacts();
    } catch (error) {
      return fail(
        "fetch",
        error instanceof FetchError
          ? error
          : new FetchError(`Failed to fetch contacts: ${errorMessage(error)}`, {
              cause: error,
            })
      );
    }

    let reconcile: ReconcileResult;
    try {
      reconcile = await this.deps.reconciler.reconcile(contacts);
    } catch (error) {
      return fail(
        "reconcile",
        error instanceof PersistenceError
          ? error
          : new PersistenceError(errorMessage(error), { cause: error })
      );
    }

    const { holder } = this.deps;
    try {
      const snapshot = await buildCacheSnapshot(this.deps.db, {
        version: holder.nextVersion(),
        now: this.clock(),
      });
      holder.publish(snapshot);

      const finishedAt = this.clock();
      syncLogger.info(
        {
          version: snapshot.version,
          duration: finishedAt.getTime() - startedAt.getTime(),
        },
        "Cache successfully updated with latest contact data"
      );

      return {
        status: "succeeded",
        reconcile,
        snapshotVersion: snapshot.version,
        startedAt,
        finishedAt,
        duration: finishedAt.getTime() - startedAt.getTime(),
      };
    } catch (error) {
      return fail(
        "build",
        error instanceof BuildError
          ? error
          : new BuildError(errorMessage(error), { cause: error })
      );
    }
  }
}

/**
 * Sync API Routes
 *
 * Status of the background sync and an on-demand trigger. A manual trigger
 * obeys the same one-cycle-at-a-time rule as the scheduler.
 */

import { Type, type Static } from "@sinclair/typebox";

import { SyncInProgressError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  CycleStageSchema,
  NullableDateTimeSchema,
} from "../schemas/common.js";

import type { CacheSnapshotHolder } from "../../services/cache/holder.js";
import type { SyncScheduler } from "../../services/scheduler.js";
import type { CycleOutcome } from "../../services/sync/cycle.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SkippedContactSchema = Type.Object({
  contactId: Type.Union([Type.Integer(), Type.Null()]),
  scope: Type.Union([
    Type.Literal("contact"),
    Type.Literal("tagId"),
    Type.Literal("trainings"),
  ]),
  reason: Type.String(),
});

const CycleSummarySchema = Type.Object({
  status: Type.Union([Type.Literal("succeeded"), Type.Literal("failed")]),
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.String({ format: "date-time" }),
  duration: Type.Number(),
  snapshotVersion: Type.Optional(Type.Integer()),
  stage: Type.Optional(CycleStageSchema),
  error: Type.Optional(
    Type.Object({
      code: Type.String(),
      message: Type.String(),
    })
  ),
  processed: Type.Optional(Type.Integer()),
  upserted: Type.Optional(Type.Integer()),
  unassigned: Type.Optional(Type.Integer()),
  linksWritten: Type.Optional(Type.Integer()),
  skipped: Type.Optional(Type.Array(SkippedContactSchema)),
});

type CycleSummary = Static<typeof CycleSummarySchema>;

const SyncStatusResponseSchema = Type.Object({
  data: Type.Object({
    started: Type.Boolean(),
    running: Type.Boolean(),
    intervalMs: Type.Integer(),
    cyclesRun: Type.Integer(),
    droppedTicks: Type.Integer(),
    cacheVersion: Type.Union([Type.Integer(), Type.Null()]),
    lastSuccessAt: NullableDateTimeSchema,
    lastCycle: Type.Union([CycleSummarySchema, Type.Null()]),
  }),
});

const SyncTriggerResponseSchema = Type.Object({
  data: CycleSummarySchema,
});

// ============================================================================
// Helper Functions
// ============================================================================

export function formatCycle(outcome: CycleOutcome): CycleSummary {
  const timing = {
    startedAt: outcome.startedAt.toISOString(),
    finishedAt: outcome.finishedAt.toISOString(),
    duration: outcome.duration,
  };

  if (outcome.status === "failed") {
    return {
      status: "failed",
      ...timing,
      stage: outcome.stage,
      error: { code: outcome.error.code, message: outcome.error.message },
    };
  }

  const { reconcile } = outcome;
  return {
    status: "succeeded",
    ...timing,
    snapshotVersion: outcome.snapshotVersion,
    processed: reconcile.processed,
    upserted: reconcile.upserted,
    unassigned: reconcile.unassigned,
    linksWritten: reconcile.linksWritten,
    skipped: reconcile.skipped,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export interface SyncRouteDeps {
  scheduler: SyncScheduler;
  holder: CacheSnapshotHolder;
}

export function registerSyncRoutes(
  app: FastifyInstance,
  { scheduler, holder }: SyncRouteDeps
): void {
  // GET /sync/status - Scheduler state and the last cycle
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Get sync status",
        description:
          "Returns scheduler state, the published cache version and a summary of the last cycle, " +
          "including contacts skipped for malformed fields",
        tags: ["Sync"],
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    () => {
      const status = scheduler.status();
      return {
        data: {
          started: status.started,
          running: status.running,
          intervalMs: status.intervalMs,
          cyclesRun: status.cyclesRun,
          droppedTicks: status.droppedTicks,
          cacheVersion: holder.current()?.version ?? null,
          lastSuccessAt: status.lastSuccessAt?.toISOString() ?? null,
          lastCycle:
            status.lastOutcome !== null
              ? formatCycle(status.lastOutcome)
              : null,
        },
      };
    }
  );

  // POST /sync - Run a cycle now
  app.post(
    "/sync",
    {
      schema: {
        summary: "Trigger sync",
        description:
          "Runs one fetch/reconcile/rebuild cycle and returns its summary. Responds 409 when a " +
          "cycle is already running. A failed cycle is reported in the body; the previous cache " +
          "stays published.",
        tags: ["Sync"],
        response: {
          200: SyncTriggerResponseSchema,
          409: ApiErrorSchema,
        },
      },
    },
    async () => {
      const result = await scheduler.tick();
      if (result.status === "dropped") {
        throw new SyncInProgressError();
      }
      return { data: formatCycle(result.outcome) };
    }
  );
}

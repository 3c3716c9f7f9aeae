/**
 * Cache API Routes
 *
 * Serve the latest published snapshot to RFID readers. Handlers only read
 * the holder's current reference; they never wait for or start a rebuild.
 */

import { Type } from "@sinclair/typebox";

import {
  doorEntries,
  machineEntries,
  snapshotMeta,
  type CacheSnapshot,
} from "../../services/cache/builder.js";
import { CacheNotReadyError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  TagIdSchema,
  createSnapshotResponseSchema,
} from "../schemas/common.js";

import type { CacheSnapshotHolder } from "../../services/cache/holder.js";
import type {
  ApiResponse,
  DoorCacheEntryDto,
  MachineCacheEntryDto,
} from "../../types/api.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const DoorCacheEntrySchema = Type.Object({
  tagId: TagIdSchema,
  membershipLevel: Type.Integer({ minimum: 0 }),
});

const MachineCacheEntrySchema = Type.Object({
  tagId: TagIdSchema,
  trainings: Type.Array(Type.String()),
});

const DoorCacheResponseSchema =
  createSnapshotResponseSchema(DoorCacheEntrySchema);

const MachineCacheResponseSchema = createSnapshotResponseSchema(
  MachineCacheEntrySchema
);

// ============================================================================
// Route Registration
// ============================================================================

export interface CacheRouteDeps {
  holder: CacheSnapshotHolder;
}

function requireSnapshot(holder: CacheSnapshotHolder): CacheSnapshot {
  const snapshot = holder.current();
  if (snapshot === null) {
    throw new CacheNotReadyError();
  }
  return snapshot;
}

export function registerCacheRoutes(
  app: FastifyInstance,
  { holder }: CacheRouteDeps
): void {
  // GET /doorCache - Tags allowed through the doors, with membership level
  app.get(
    "/doorCache",
    {
      schema: {
        summary: "Get door cache",
        description:
          "Returns every issued tag with its membership level from the latest published snapshot. " +
          "Responds 503 CACHE_NOT_READY until the first sync cycle has completed.",
        tags: ["Cache"],
        response: {
          200: DoorCacheResponseSchema,
          503: ApiErrorSchema,
        },
      },
    },
    (): ApiResponse<DoorCacheEntryDto[]> => {
      const snapshot = requireSnapshot(holder);
      const data = doorEntries(snapshot);
      return { data, meta: snapshotMeta(snapshot, data.length) };
    }
  );

  // GET /machineCache - Completed trainings per tag
  app.get(
    "/machineCache",
    {
      schema: {
        summary: "Get machine cache",
        description:
          "Returns every issued tag with the trainings it qualifies for. Tags without trainings " +
          "are listed with an empty array. Responds 503 CACHE_NOT_READY until the first sync " +
          "cycle has completed.",
        tags: ["Cache"],
        response: {
          200: MachineCacheResponseSchema,
          503: ApiErrorSchema,
        },
      },
    },
    (): ApiResponse<MachineCacheEntryDto[]> => {
      const snapshot = requireSnapshot(holder);
      const data = machineEntries(snapshot);
      return { data, meta: snapshotMeta(snapshot, data.length) };
    }
  );
}

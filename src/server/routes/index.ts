/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerCacheRoutes } from "./cache.js";
import { registerSyncRoutes } from "./sync.js";

import type { CacheSnapshotHolder } from "../../services/cache/holder.js";
import type { SyncScheduler } from "../../services/scheduler.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
    cacheReady: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", cacheReady: true }],
  }
);

export interface ApiDeps {
  holder: CacheSnapshotHolder;
  scheduler: SyncScheduler;
}

/**
 * Register all API routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDeps
): Promise<void> {
  // Health check (no prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "Returns the health status of the API and whether a cache has been published",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({
      status: "ok" as const,
      cacheReady: deps.holder.current() !== null,
    })
  );

  // Reader-facing and operator routes
  await app.register(
    async (api) => {
      registerCacheRoutes(api, deps);
      registerSyncRoutes(api, deps);
    },
    { prefix: "/api" }
  );
}

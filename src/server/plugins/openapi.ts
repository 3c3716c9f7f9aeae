/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Tag Sync API",
        description:
          "Access-control caches for RFID door and machine readers, kept in sync with the " +
          "membership directory. Readers fetch the door cache (tag -> membership level) and " +
          "the machine cache (tag -> completed trainings) and authorize scans locally.",
        version: "1.0.0",
      },
      tags: [
        {
          name: "Cache",
          description: "Published door and machine access snapshots",
        },
        {
          name: "Sync",
          description: "Directory sync status and manual triggering",
        },
        {
          name: "Health",
          description: "Liveness",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });

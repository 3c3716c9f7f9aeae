/**
 * Fastify error handler plugin
 */

import fp from "fastify-plugin";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * No sync cycle has completed yet, so there is no cache to serve.
 * Readers must not mistake this for an empty cache.
 */
export class CacheNotReadyError extends Error {
  code = "CACHE_NOT_READY" as const;
  statusCode = 503;

  constructor(message = "Access cache has not been built yet") {
    super(message);
    this.name = "CacheNotReadyError";
  }
}

export class SyncInProgressError extends Error {
  code = "SYNC_IN_PROGRESS" as const;
  statusCode = 409;

  constructor(message = "A sync cycle is already running") {
    super(message);
    this.name = "SyncInProgressError";
  }
}

type HttpError = CacheNotReadyError | SyncInProgressError;

function isHttpError(error: unknown): error is HttpError {
  return (
    error instanceof CacheNotReadyError || error instanceof SyncInProgressError
  );
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Handle Fastify validation errors
      if (error.validation) {
        const response: ApiError = {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        };
        return reply.status(400).send(response);
      }

      if (isHttpError(error)) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          requestId,
        };
        if (error instanceof CacheNotReadyError) {
          return reply
            .status(error.statusCode)
            .header("Retry-After", "60")
            .send(response);
        }
        return reply.status(error.statusCode).send(response);
      }

      // Handle 404 errors
      if (error.statusCode === 404) {
        const response: ApiError = {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
          requestId,
        };
        return reply.status(404).send(response);
      }

      // Log unexpected errors
      request.log.error(error, "Unhandled error");

      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      };
      return reply.status(500).send(response);
    }
  );

  // Handle 404 for unknown routes
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});

import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  errorHandler,
  CacheNotReadyError,
  SyncInProgressError,
} from "../../../../src/server/plugins/error-handler.js";

describe("server/plugins/error-handler", () => {
  // ============================================================================
  // Custom Error Classes Tests
  // ============================================================================

  describe("CacheNotReadyError", () => {
    it("should create error with correct properties", () => {
      const error = new CacheNotReadyError();

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CacheNotReadyError);
      expect(error.name).toBe("CacheNotReadyError");
      expect(error.message).toBe("Access cache has not been built yet");
      expect(error.code).toBe("CACHE_NOT_READY");
      expect(error.statusCode).toBe(503);
    });

    it("should accept a custom message", () => {
      const error = new CacheNotReadyError("Still warming up");
      expect(error.message).toBe("Still warming up");
    });
  });

  describe("SyncInProgressError", () => {
    it("should create error with correct properties", () => {
      const error = new SyncInProgressError();

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(SyncInProgressError);
      expect(error.name).toBe("SyncInProgressError");
      expect(error.message).toBe("A sync cycle is already running");
      expect(error.code).toBe("SYNC_IN_PROGRESS");
      expect(error.statusCode).toBe(409);
    });
  });

  // ============================================================================
  // Error Handler Plugin Tests
  // ============================================================================

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      // Test routes that throw different errors
      app.get("/cache-not-ready", async () => {
        throw new CacheNotReadyError();
      });

      app.get("/sync-in-progress", async () => {
        throw new SyncInProgressError();
      });

      app.get("/generic-error", async () => {
        throw new Error("Something went wrong");
      });

      app.get("/fastify-404", async () => {
        throw Object.assign(new Error("Not found"), { statusCode: 404 });
      });

      app.get("/fastify-validation", async () => {
        throw Object.assign(new Error("Validation failed"), {
          validation: [{ keyword: "type", message: "must be string" }],
        });
      });

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("should handle CacheNotReadyError with a Retry-After header", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/cache-not-ready",
      });

      expect(response.statusCode).toBe(503);
      expect(response.headers["retry-after"]).toBe("60");
      const body = response.json();
      expect(body.error).toBe("CACHE_NOT_READY");
      expect(body.message).toBe("Access cache has not been built yet");
      expect(body.requestId).toBeDefined();
    });

    it("should handle SyncInProgressError", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/sync-in-progress",
      });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.error).toBe("SYNC_IN_PROGRESS");
      expect(body.message).toBe("A sync cycle is already running");
      expect(response.headers["retry-after"]).toBeUndefined();
    });

    it("should handle generic errors with 500 status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/generic-error",
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body.error).toBe("INTERNAL_ERROR");
      expect(body.message).toBe("An unexpected error occurred");
      expect(body.requestId).toBeDefined();
    });

    it("should handle Fastify 404 errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-404",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.requestId).toBeDefined();
    });

    it("should handle Fastify validation errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-validation",
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.message).toBe("Invalid request parameters");
      expect(body.details).toBeDefined();
      expect(body.details.validation).toBeDefined();
    });

    it("should handle unknown routes with 404", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toContain("Route GET /unknown-route not found");
      expect(body.requestId).toBeDefined();
    });

    it("should handle unknown POST routes with 404", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toContain("Route POST /unknown-route not found");
    });
  });
});

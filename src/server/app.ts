import cors from "@fastify/cors";
import Fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes, type ApiDeps } from "./routes/index.js";

/**
 * Build the Fastify app without listening, so tests can `inject` into it.
 */
export async function buildApp(
  deps: ApiDeps,
  options: { logger?: FastifyServerOptions["logger"] } = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, deps);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}

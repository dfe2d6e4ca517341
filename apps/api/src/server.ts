/**
 * Server
 *
 * Builds the Fastify instance without starting it, so tests can drive it
 * with inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import { registerRelationRoutes, type RecordCatalog } from "@keepsync/platform";

export async function buildServer(catalog: RecordCatalog): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own structured logging
    trustProxy: process.env.NODE_ENV === "production",
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerRelationRoutes(app, catalog);
  return app;
}

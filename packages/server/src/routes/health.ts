import type { FastifyPluginAsync } from "fastify";
import { getHealth, getReadiness, type HealthDependencies } from "../health.js";

export interface HealthRoutesOptions {
  dependencies: HealthDependencies;
  version: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
  /**
   * Health check endpoint (detailed).
   * GET /health
   */
  fastify.get("/health", async () => {
    return getHealth(options.dependencies, options.version);
  });

  /**
   * Liveness probe.
   * GET /live
   */
  fastify.get("/live", async () => {
    return { alive: true };
  });

  /**
   * Readiness probe. 503 until the database and Redis answer.
   * GET /ready
   */
  fastify.get("/ready", async (_request, reply) => {
    const readiness = await getReadiness(options.dependencies);
    if (!readiness.ready) reply.status(503);
    return readiness;
  });

  /**
   * Metrics endpoint (Prometheus format).
   * GET /metrics
   */
  fastify.get("/metrics", async (_request, reply) => {
    reply.type("text/plain; version=0.0.4");
    return fastify.keyturn.metrics.toPrometheus();
  });
};

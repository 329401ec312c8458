import type { FastifyInstance } from "fastify";
import type { RateLimitScope } from "./config.js";

/**
 * Count every request in the plugin's scope against `scope` and answer 429
 * once the client's window is used up.
 */
export function enforceRateLimit(fastify: FastifyInstance, scope: RateLimitScope): void {
  fastify.addHook("onRequest", async (request, reply) => {
    const { limiter, metrics } = fastify.keyturn;
    const decision = await limiter.consume(scope, request.ip);

    reply.header("X-RateLimit-Limit", decision.limit);
    reply.header("X-RateLimit-Remaining", decision.remaining);
    if (decision.allowed) return;

    metrics.rateLimited(scope);
    request.log.info({ scope, ip: request.ip }, "Rate limit exceeded");
    reply.header("Retry-After", decision.resetSeconds);
    return reply.status(429).send({ error: "Too many requests", retry_after: decision.resetSeconds });
  });
}

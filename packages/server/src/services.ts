import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { CheckoutService, EventProcessor, RateLimiter, ValidationService } from "@keyturn/engine";
import type { RateLimitScope } from "./config.js";
import type { KeyturnMetrics } from "./metrics.js";

/**
 * Engine services shared by every route, available as `fastify.keyturn`.
 */
export interface KeyturnServices {
  processor: EventProcessor;
  validation: ValidationService;
  checkout: CheckoutService;
  limiter: RateLimiter<RateLimitScope>;
  metrics: KeyturnMetrics;
  webhook: {
    secret: string;
    toleranceSeconds: number;
  };
  clock: () => Date;
}

declare module "fastify" {
  interface FastifyInstance {
    keyturn: KeyturnServices;
  }
}

const keyturnServicesPlugin: FastifyPluginAsync<KeyturnServices> = async (fastify, services) => {
  fastify.decorate("keyturn", {
    processor: services.processor,
    validation: services.validation,
    checkout: services.checkout,
    limiter: services.limiter,
    metrics: services.metrics,
    webhook: services.webhook,
    clock: services.clock,
  });
};

export const keyturnServices = fp(keyturnServicesPlugin, {
  fastify: "4.x",
  name: "keyturn-services",
});

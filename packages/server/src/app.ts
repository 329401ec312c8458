import Fastify, { type FastifyInstance } from "fastify";
import {
  CheckoutService,
  EventProcessor,
  RateLimiter,
  ValidationService,
  type CheckoutGateway,
  type LicenseStore,
  type MailQueue,
  type PluginDirectory,
  type ProcessorGateway,
  type RateLimitRule,
  type RateLimitStore,
  type UnitOfWork,
} from "@keyturn/engine";
import type { LogLevel, RateLimitScope } from "./config.js";
import { errorHandler } from "./errors.js";
import type { HealthDependencies } from "./health.js";
import { KeyturnMetrics } from "./metrics.js";
import { checkoutRoutes } from "./routes/checkout.js";
import { healthRoutes } from "./routes/health.js";
import { licenseRoutes } from "./routes/licenses.js";
import { webhookRoutes } from "./routes/webhooks.js";
import { keyturnServices } from "./services.js";

export const VERSION = "0.1.0";

/** Storage and collaborators the server runs on. */
export interface ServerDependencies {
  /** Event claims and license writes, committed together. */
  transactions: UnitOfWork;
  /** Read path for validation. */
  licenses: LicenseStore;
  plugins: PluginDirectory;
  gateway: ProcessorGateway & CheckoutGateway;
  mail: MailQueue;
  rateLimitStore: RateLimitStore;
  health?: HealthDependencies;
}

export interface ServerOptions {
  logLevel: LogLevel;
  trustProxy?: boolean;
  webhookSecret: string;
  /** Default: 300 */
  webhookToleranceSeconds?: number;
  rateLimits: Record<RateLimitScope, RateLimitRule>;
  /** Version reported by /health. */
  version?: string;
  /** Clock for signature tolerance, validity and rate-limit windows. */
  clock?: () => Date;
  /** License key source. Default: the engine's generator */
  generateKey?: () => string;
}

/**
 * Build the Keyturn HTTP server without listening.
 */
export async function createServer(deps: ServerDependencies, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
    trustProxy: options.trustProxy ?? false,
  });

  const clock = options.clock ?? (() => new Date());
  const metrics = new KeyturnMetrics();

  fastify.setErrorHandler(errorHandler);

  fastify.addHook("onResponse", async (request, reply) => {
    metrics.request(request.routeOptions.url ?? "unmatched", request.method, reply.statusCode, reply.elapsedTime);
  });

  await fastify.register(keyturnServices, {
    processor: new EventProcessor({
      transactions: deps.transactions,
      plugins: deps.plugins,
      gateway: deps.gateway,
      mail: deps.mail,
      logger: fastify.log,
      generateKey: options.generateKey,
    }),
    validation: new ValidationService({ plugins: deps.plugins, licenses: deps.licenses, now: clock }),
    checkout: new CheckoutService({ plugins: deps.plugins, gateway: deps.gateway }),
    limiter: new RateLimiter({
      store: deps.rateLimitStore,
      rules: options.rateLimits,
      logger: fastify.log,
      now: () => clock().getTime(),
    }),
    metrics,
    webhook: {
      secret: options.webhookSecret,
      toleranceSeconds: options.webhookToleranceSeconds ?? 300,
    },
    clock,
  });

  await fastify.register(healthRoutes, { dependencies: deps.health ?? {}, version: options.version ?? VERSION });
  await fastify.register(webhookRoutes);
  await fastify.register(licenseRoutes, { prefix: "/api/v1" });
  await fastify.register(checkoutRoutes, { prefix: "/api/v1" });

  metrics.up(true);
  fastify.addHook("onClose", async () => {
    metrics.up(false);
  });

  return fastify;
}

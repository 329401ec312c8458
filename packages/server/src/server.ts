import type { FastifyInstance } from "fastify";
import { createClient } from "redis";
import Stripe from "stripe";
import {
  CachedPluginDirectory,
  MemoryMailQueue,
  MemoryRateLimitStore,
  RedisMailQueue,
  RedisRateLimitStore,
  type MailQueue,
  type RateLimitStore,
} from "@keyturn/engine";
import {
  PostgresLicenseStore,
  PostgresPluginDirectory,
  PostgresUnitOfWork,
  createDatabase,
} from "@keyturn/store-postgres";
import { createServer } from "./app.js";
import type { ServerConfig } from "./config.js";
import { StripeGateway } from "./stripeGateway.js";

/**
 * Wire PostgreSQL, Redis and Stripe from the configuration, then listen.
 */
export async function startServer(config: ServerConfig): Promise<{
  server: FastifyInstance;
  close: () => Promise<void>;
}> {
  const database = createDatabase({ connectionString: config.databaseUrl });
  // Commands fail while disconnected instead of queueing, so the rate limiter fails open.
  const redis = config.redisUrl ? createClient({ url: config.redisUrl, disableOfflineQueue: true }) : null;

  let rateLimitStore: RateLimitStore = new MemoryRateLimitStore();
  let mail: MailQueue = new MemoryMailQueue();
  if (redis) {
    rateLimitStore = new RedisRateLimitStore({
      client: {
        incr: (key) => redis.incr(key),
        expire: (key, seconds) => redis.expire(key, seconds),
      },
    });
    mail = new RedisMailQueue({
      client: { lPush: (key, value) => redis.lPush(key, value) },
      key: config.mailQueueKey,
    });
  }

  const server = await createServer(
    {
      transactions: new PostgresUnitOfWork(database.db),
      licenses: new PostgresLicenseStore(database.db),
      plugins: new CachedPluginDirectory(new PostgresPluginDirectory(database.db), {
        ttlMs: config.pluginCacheTtlMs,
      }),
      gateway: new StripeGateway({
        stripe: new Stripe(config.stripe.secretKey),
        successUrl: config.checkout.successUrl,
        cancelUrl: config.checkout.cancelUrl,
      }),
      mail,
      rateLimitStore,
      health: {
        database,
        redis: redis ? { ping: () => redis.ping() } : undefined,
      },
    },
    {
      logLevel: config.logLevel,
      trustProxy: config.trustProxy,
      webhookSecret: config.stripe.webhookSecret,
      webhookToleranceSeconds: config.stripe.webhookToleranceSeconds,
      rateLimits: config.rateLimits,
    }
  );

  if (redis) {
    redis.on("error", (err: unknown) => {
      server.log.error({ err }, "Redis client error");
    });
    try {
      await redis.connect();
    } catch (error) {
      await server.close();
      await database.close();
      throw error;
    }
    server.log.info("Connected to Redis for rate limits and the mail queue");
  } else {
    server.log.warn("REDIS_URL not set: rate limits are per process and license emails stay in memory");
  }

  server.addHook("onClose", async () => {
    await database.close();
    if (redis) await redis.quit();
  });

  await server.listen({ port: config.port, host: config.host });
  return { server, close: () => server.close() };
}

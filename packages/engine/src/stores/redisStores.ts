import type { LicenseMailJob, MailQueue, RateLimitStore } from "../types.js";

/**
 * The Redis commands the Keyturn stores use.
 * Satisfied by a connected `redis` (node-redis v4) client.
 */
export interface RedisClient {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean | number>;
  lPush(key: string, value: string): Promise<number>;
}

export interface RedisRateLimitStoreOptions {
  client: Pick<RedisClient, "incr" | "expire">;
}

/**
 * Shared rate-limit counters. The first increment of a key sets its expiry,
 * so a window's counter disappears on its own.
 *
 * @example
 * ```typescript
 * import { createClient } from 'redis';
 *
 * const client = createClient({ url: process.env.REDIS_URL });
 * await client.connect();
 *
 * const store = new RedisRateLimitStore({ client });
 * ```
 */
export class RedisRateLimitStore implements RateLimitStore {
  private client: Pick<RedisClient, "incr" | "expire">;

  constructor(options: RedisRateLimitStoreOptions) {
    this.client = options.client;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.expire(key, ttlSeconds);
    }
    return count;
  }
}

export interface RedisMailQueueOptions {
  client: Pick<RedisClient, "lPush">;
  /** List the mail worker consumes. Default: 'keyturn:mail:license-created' */
  key?: string;
}

/**
 * Hands license emails to the mail worker by pushing JSON jobs onto a Redis list.
 */
export class RedisMailQueue implements MailQueue {
  private client: Pick<RedisClient, "lPush">;
  private key: string;

  constructor(options: RedisMailQueueOptions) {
    this.client = options.client;
    this.key = options.key ?? "keyturn:mail:license-created";
  }

  async enqueue(job: LicenseMailJob): Promise<void> {
    await this.client.lPush(this.key, JSON.stringify({ type: "license_created", ...job }));
  }
}

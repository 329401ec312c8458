import type { Logger, RateLimitStore } from "../types.js";

export interface RateLimitRule {
  /** Requests allowed per window. */
  limit: number;
  windowSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window ends. */
  resetSeconds: number;
}

export interface RateLimiterOptions<Scope extends string> {
  store: RateLimitStore;
  rules: Record<Scope, RateLimitRule>;
  logger: Logger;
  /** Key prefix. Default: 'keyturn:ratelimit:' */
  prefix?: string;
  /** Clock in milliseconds, replaceable in tests. */
  now?: () => number;
  /** A store call still pending after this long counts as failed. Default: 500 */
  storeTimeoutMs?: number;
}

/**
 * Fixed-window request counter per scope and client.
 *
 * Holds no counters itself; every instance sharing a store shares the limits.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({
 *   store: new RedisRateLimitStore({ client }),
 *   rules: { validate: { limit: 100, windowSeconds: 3600 } },
 *   logger,
 * });
 * const { allowed } = await limiter.consume("validate", request.ip);
 * ```
 */
export class RateLimiter<Scope extends string> {
  private store: RateLimitStore;
  private rules: Record<Scope, RateLimitRule>;
  private log: Logger;
  private prefix: string;
  private now: () => number;
  private storeTimeoutMs: number;

  constructor(options: RateLimiterOptions<Scope>) {
    this.store = options.store;
    this.rules = options.rules;
    this.log = options.logger;
    this.prefix = options.prefix ?? "keyturn:ratelimit:";
    this.now = options.now ?? Date.now;
    this.storeTimeoutMs = options.storeTimeoutMs ?? 500;
  }

  async consume(scope: Scope, clientId: string): Promise<RateLimitDecision> {
    const rule = this.rules[scope];
    const nowSeconds = Math.floor(this.now() / 1000);
    const window = Math.floor(nowSeconds / rule.windowSeconds);
    const resetSeconds = (window + 1) * rule.windowSeconds - nowSeconds;
    const key = `${this.prefix}${scope}:${sanitize(clientId)}:${window}`;

    let count: number;
    try {
      count = await withTimeout(this.store.increment(key, rule.windowSeconds), this.storeTimeoutMs);
    } catch (err) {
      // Fail open.
      this.log.warn({ err, scope }, "Rate limit store unavailable, allowing request");
      return { allowed: true, limit: rule.limit, remaining: rule.limit, resetSeconds };
    }

    return {
      allowed: count <= rule.limit,
      limit: rule.limit,
      remaining: Math.max(0, rule.limit - count),
      resetSeconds,
    };
  }
}

function sanitize(clientId: string): string {
  return clientId.replace(/[^a-zA-Z0-9_.:-]/g, "_") || "unknown";
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`Rate limit store did not answer within ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

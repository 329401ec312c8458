import type { RateLimitStore } from "../types.js";

/**
 * Per-process counters. Limits are not shared between processes; use the
 * Redis store when more than one instance serves traffic.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private counters = new Map<string, { count: number; expiresAt: number }>();

  constructor(private now: () => number = Date.now) {}

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const now = this.now();
    for (const [k, entry] of this.counters.entries()) {
      if (entry.expiresAt <= now) this.counters.delete(k);
    }

    const entry = this.counters.get(key);
    if (entry) {
      entry.count++;
      return entry.count;
    }
    this.counters.set(key, { count: 1, expiresAt: now + ttlSeconds * 1000 });
    return 1;
  }
}

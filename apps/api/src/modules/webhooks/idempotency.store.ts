import type { Clock } from "../../lib/clock.js";
import { claimKey, releaseKey, type RedisKeyValue } from "../../lib/redis.js";

/**
 * Compare-and-set claims for webhook deduplication. The first `claim` for a
 * key wins; later claims see false until the TTL elapses or the key is released.
 */
export interface IdempotencyStore {
  claim(key: string, ttlMs: number): Promise<boolean>;
  release(key: string): Promise<void>;
}

export class RedisIdempotencyStore implements IdempotencyStore {
  constructor(private readonly redis: RedisKeyValue) {}

  claim(key: string, ttlMs: number): Promise<boolean> {
    return claimKey(this.redis, key, ttlMs);
  }

  release(key: string): Promise<void> {
    return releaseKey(this.redis, key);
  }
}

/** Single-process stand-in used by tests and local runs without Redis. */
export class MemoryIdempotencyStore implements IdempotencyStore {
  private readonly claims = new Map<string, number>();

  constructor(private readonly clock: Clock) {}

  async claim(key: string, ttlMs: number): Promise<boolean> {
    const now = this.clock.now();
    const expiresAt = this.claims.get(key);
    if (expiresAt !== undefined && expiresAt > now) return false;
    this.claims.set(key, now + ttlMs);
    return true;
  }

  async release(key: string): Promise<void> {
    this.claims.delete(key);
  }
}

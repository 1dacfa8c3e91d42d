import { Redis } from "ioredis";
import { getEnv } from "./env.js";
import { moduleLogger } from "./logger.js";

const log = moduleLogger("redis");

let _redis: Redis | null = null;

export function getRedisClient(): Redis {
  if (!_redis) {
    _redis = new Redis(getEnv().REDIS_URL, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
    });

    _redis.on("error", (err: Error) => {
      log.error({ err }, "connection error");
    });
  }

  return _redis;
}

/**
 * BullMQ workers issue blocking commands and require
 * `maxRetriesPerRequest: null`, so they get their own connection.
 */
export function createQueueConnection(): Redis {
  const connection = new Redis(getEnv().REDIS_URL, {
    maxRetriesPerRequest: null,
  });
  connection.on("error", (err: Error) => {
    log.error({ err }, "queue connection error");
  });
  return connection;
}

/** Minimal surface used below; lets tests hand in a Map-backed fake. */
export type RedisKeyValue = Pick<Redis, "set" | "del">;

/**
 * Compare-and-set claim: `SET key value PX ttl NX`.
 * Returns true for the first caller only; concurrent or later callers
 * observe false until the key expires or is released.
 */
export async function claimKey(
  redis: RedisKeyValue,
  key: string,
  ttlMs: number,
): Promise<boolean> {
  const result = await redis.set(key, String(Date.now()), "PX", ttlMs, "NX");
  return result === "OK";
}

export async function releaseKey(
  redis: RedisKeyValue,
  key: string,
): Promise<void> {
  await redis.del(key);
}

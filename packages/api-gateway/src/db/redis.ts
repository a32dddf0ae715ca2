import { Redis } from "ioredis";
import type { Logger, RedisClientLike } from "@conduit/llm-orchestrator";

/**
 * Connects eagerly so a bad REDIS_URL is noticed at startup; the caller
 * falls back to in-memory state when this rejects.
 */
export async function connectRedis(url: string, log: Logger): Promise<Redis> {
  const redis = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
  });

  redis.on("error", (err: Error) => {
    log.error({ err }, "[redis] connection error");
  });

  redis.on("ready", () => {
    log.info("[redis] connected");
  });

  try {
    await redis.connect();
  } catch (err) {
    redis.disconnect();
    throw err;
  }
  return redis;
}

export async function closeRedis(redis: Redis | null): Promise<void> {
  if (redis && redis.status !== "end") {
    await redis.quit();
  }
}

// ─── Cache client ────────────────────────────────────────────────────────────

/** The subset of ioredis the response cache backend talks to */
export function cacheClient(redis: Redis): RedisClientLike {
  return {
    get: (key) => redis.get(key),
    psetex: (key, milliseconds, value) => redis.psetex(key, milliseconds, value),
    del: (key) => redis.del(key),
    keys: (pattern) => redis.keys(pattern),
  };
}

// src/routing/redis/client.ts — Redis connection for shared engine state
//
// Port interface over the subset of ioredis the engine uses, so stores can be
// exercised against an in-process fake.

import { Redis } from "ioredis"

export interface RedisConfig {
  url: string                    // redis://localhost:6379
  keyPrefix: string              // Default: "governor"
  connectTimeoutMs: number       // Default: 5000
  commandTimeoutMs: number       // Default: 3000
}

export const DEFAULT_REDIS_CONFIG: Omit<RedisConfig, "url"> = {
  keyPrefix: "governor",
  connectTimeoutMs: 5000,
  commandTimeoutMs: 3000,
}

/** Minimal Redis command interface (subset of the ioredis API) */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>
  incrby(key: string, increment: number): Promise<number>
  expire(key: string, seconds: number): Promise<number>
  quit(): Promise<string>
}

/**
 * Create an ioredis-backed command client. Commands fail fast instead of
 * queueing while disconnected so callers see outages immediately.
 */
export function createRedisClient(config: RedisConfig): RedisCommandClient {
  const redis = new Redis(config.url, {
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
  })

  redis.on("error", (err: Error) => {
    console.warn(`[redis] ${err.message}`)
  })
  redis.connect().catch((err: unknown) => {
    console.warn("[redis] Initial connection failed:", err)
  })

  return {
    get: key => redis.get(key),
    incrby: (key, increment) => redis.incrby(key, increment),
    expire: (key, seconds) => redis.expire(key, seconds),
    quit: () => redis.quit(),
  }
}

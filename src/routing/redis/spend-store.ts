// src/routing/redis/spend-store.ts — Redis-backed spend accumulator
//
// INCRBY on integer micro-USD gives an atomic add across every engine
// instance sharing the Redis. Keys expire after the retention window so
// monthly scopes do not accumulate forever.

import type { SpendStore } from "../budget.js"
import type { RedisCommandClient } from "./client.js"

/** Monthly scopes are kept ~40 days so the previous month stays readable */
const DEFAULT_TTL_SECONDS = 40 * 24 * 3600

export class RedisSpendStore implements SpendStore {
  private ttlSeconds: number

  constructor(
    private redis: RedisCommandClient,
    private keyPrefix: string,
    opts?: { ttlSeconds?: number },
  ) {
    this.ttlSeconds = opts?.ttlSeconds ?? DEFAULT_TTL_SECONDS
  }

  private key(scopeKey: string): string {
    return `${this.keyPrefix}:${scopeKey}:spent_micro`
  }

  async add(scopeKey: string, amountMicro: number): Promise<number> {
    if (!Number.isInteger(amountMicro)) {
      throw new Error(`Spend must be integer micro-USD (got ${amountMicro})`)
    }
    const key = this.key(scopeKey)
    const total = await this.redis.incrby(key, amountMicro)
    if (total === amountMicro) {
      // First write for this scope — start its retention clock
      await this.redis.expire(key, this.ttlSeconds)
    }
    return total
  }

  async get(scopeKey: string): Promise<number> {
    const raw = await this.redis.get(this.key(scopeKey))
    if (raw === null) return 0
    const value = parseInt(raw, 10)
    return Number.isNaN(value) ? 0 : value
  }
}

// tests/routing/redis-spend-store.test.ts — Redis-backed spend accumulator

import { describe, it, expect, vi } from "vitest"
import { BudgetLedger } from "../../src/routing/budget.js"
import type { RedisCommandClient } from "../../src/routing/redis/client.js"
import { RedisSpendStore } from "../../src/routing/redis/spend-store.js"
import { manualClock } from "../helpers/routing.js"

// --- Mock Redis ---

function mockRedis() {
  const store = new Map<string, string>()
  const client = {
    get: vi.fn(async (key: string) => store.get(key) ?? null),
    incrby: vi.fn(async (key: string, increment: number) => {
      const next = parseInt(store.get(key) ?? "0", 10) + increment
      store.set(key, String(next))
      return next
    }),
    expire: vi.fn(async (_key: string, _seconds: number) => 1),
    quit: vi.fn(async () => "OK"),
  } satisfies RedisCommandClient
  return { client, store }
}

// --- Tests ---

describe("RedisSpendStore", () => {
  it("increments the prefixed key and starts its TTL on first write", async () => {
    const { client } = mockRedis()
    const store = new RedisSpendStore(client, "governor")

    expect(await store.add("budget:t1:support:2026-03", 2000)).toBe(2000)
    expect(await store.add("budget:t1:support:2026-03", 500)).toBe(2500)

    expect(client.incrby).toHaveBeenCalledWith("governor:budget:t1:support:2026-03:spent_micro", 2000)
    expect(client.expire).toHaveBeenCalledTimes(1)
    expect(client.expire).toHaveBeenCalledWith("governor:budget:t1:support:2026-03:spent_micro", 3_456_000)
  })

  it("honors a custom TTL", async () => {
    const { client } = mockRedis()
    await new RedisSpendStore(client, "gov", { ttlSeconds: 60 }).add("k", 1)
    expect(client.expire).toHaveBeenCalledWith("gov:k:spent_micro", 60)
  })

  it("reads missing and malformed values as zero", async () => {
    const { client, store } = mockRedis()
    const spend = new RedisSpendStore(client, "governor")
    expect(await spend.get("k")).toBe(0)
    store.set("governor:k:spent_micro", "garbage")
    expect(await spend.get("k")).toBe(0)
    store.set("governor:k:spent_micro", "1234")
    expect(await spend.get("k")).toBe(1234)
  })

  it("rejects fractional amounts", async () => {
    const { client } = mockRedis()
    await expect(new RedisSpendStore(client, "governor").add("k", 1.5)).rejects.toThrow(
      "Spend must be integer micro-USD (got 1.5)",
    )
    expect(client.incrby).not.toHaveBeenCalled()
  })

  it("backs a budget ledger", async () => {
    const { client } = mockRedis()
    const ledger = new BudgetLedger(new RedisSpendStore(client, "governor"), { clock: manualClock().now })
    await ledger.record("t1", "support", 90_500)
    const snapshot = await ledger.snapshot("t1", "support", {
      monthlyLimitMicro: 100_000,
      lowWaterMarkMicro: 20_000,
      minimalCostMicroPerMillion: 500_000,
    })
    expect(snapshot.state).toBe("low")
    expect(snapshot.remainingMicro).toBe(9_500)
  })

  it("propagates Redis failures", async () => {
    const { client } = mockRedis()
    client.incrby.mockRejectedValueOnce(new Error("connection lost"))
    await expect(new RedisSpendStore(client, "governor").add("k", 5)).rejects.toThrow("connection lost")
  })
})

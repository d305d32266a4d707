// src/routing/budget.ts — Spend accumulator and budget gate
//
// Spend is tracked per (tenant, app, calendar month, UTC) behind a SpendStore
// port. Writes for the same scope are serialized through a keyed mutex; different
// scopes never contend.

import { KeyedMutex } from "../shared/async.js"
import { blendedPrice } from "./types.js"
import type { BudgetLimits, CandidateSet } from "./types.js"

// --- Spend Store Port ---

export interface SpendStore {
  /** Atomically add to a scope and return the new total (micro-USD) */
  add(scopeKey: string, amountMicro: number): Promise<number>
  get(scopeKey: string): Promise<number>
}

export class InMemorySpendStore implements SpendStore {
  private totals = new Map<string, number>()

  async add(scopeKey: string, amountMicro: number): Promise<number> {
    const next = (this.totals.get(scopeKey) ?? 0) + amountMicro
    this.totals.set(scopeKey, next)
    return next
  }

  async get(scopeKey: string): Promise<number> {
    return this.totals.get(scopeKey) ?? 0
  }
}

// --- Scope Key Derivation ---

/** Canonical budget scope key. All budget reads and writes use this. */
export function deriveBudgetKey(tenantId: string, appId: string, at: Date): string {
  const month = `${at.getUTCFullYear()}-${String(at.getUTCMonth() + 1).padStart(2, "0")}`
  return `budget:${tenantId}:${appId}:${month}`
}

// --- Snapshot ---

export type BudgetState = "normal" | "low" | "exhausted"

export interface BudgetSnapshot {
  scopeKey: string
  spentMicro: number
  limitMicro: number
  remainingMicro: number
  state: BudgetState
}

export function budgetState(spentMicro: number, limits: BudgetLimits): BudgetState {
  const remaining = limits.monthlyLimitMicro - spentMicro
  if (remaining <= 0) return "exhausted"
  if (remaining < limits.lowWaterMarkMicro) return "low"
  return "normal"
}

// --- Ledger ---

export class BudgetLedger {
  private mutex = new KeyedMutex()
  private clock: () => number

  constructor(private store: SpendStore, opts?: { clock?: () => number }) {
    this.clock = opts?.clock ?? Date.now
  }

  async snapshot(tenantId: string, appId: string, limits: BudgetLimits): Promise<BudgetSnapshot> {
    const scopeKey = deriveBudgetKey(tenantId, appId, new Date(this.clock()))
    const spentMicro = await this.store.get(scopeKey)
    return {
      scopeKey,
      spentMicro,
      limitMicro: limits.monthlyLimitMicro,
      remainingMicro: Math.max(0, limits.monthlyLimitMicro - spentMicro),
      state: budgetState(spentMicro, limits),
    }
  }

  /** Record spend after a completed request; returns the scope's new total */
  async record(tenantId: string, appId: string, costMicro: number): Promise<number> {
    const scopeKey = deriveBudgetKey(tenantId, appId, new Date(this.clock()))
    return this.mutex.run(scopeKey, () => this.store.add(scopeKey, costMicro))
  }
}

// --- Gate ---

/**
 * Low budget: stable reorder cheapest-first ("downgrade"); the set is marked
 * downgraded so the selector takes it in price order, fallback-origin
 * candidates included, instead of sampling.
 * Exhausted: drop every candidate priced above the minimal-cost threshold.
 */
export function applyBudgetGate(set: CandidateSet, snapshot: BudgetSnapshot, limits: BudgetLimits): CandidateSet {
  switch (snapshot.state) {
    case "normal":
      return set
    case "low": {
      const ranked = set.candidates
        .map((c, i) => ({ c, i }))
        .sort((a, b) => blendedPrice(a.c.model) - blendedPrice(b.c.model) || a.i - b.i)
        .map(({ c }) => c)
      return { ...set, directive: "ordered", candidates: ranked, downgraded: true }
    }
    case "exhausted":
      return {
        ...set,
        candidates: set.candidates.filter(c => blendedPrice(c.model) <= limits.minimalCostMicroPerMillion),
      }
  }
}

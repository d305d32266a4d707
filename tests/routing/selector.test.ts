// tests/routing/selector.test.ts — Seeded candidate selection

import { describe, it, expect } from "vitest"
import { applyBudgetGate } from "../../src/routing/budget.js"
import { evaluatePolicy } from "../../src/routing/evaluator.js"
import { mulberry32, seedFromAuditId, selectCandidate } from "../../src/routing/selector.js"
import type { CandidateSet } from "../../src/routing/types.js"
import { catchRoutingError, ctx, testCatalog, testPolicy } from "../helpers/routing.js"

const catalog = testCatalog()
const policy = testPolicy(catalog)
const weighted = evaluatePolicy(policy, ctx(), catalog)
const healthy = () => 1

function chainIds(selection: ReturnType<typeof selectCandidate>): string[] {
  return [selection.recommended, ...selection.fallbackChain].map(c => c.model.id)
}

describe("seedFromAuditId", () => {
  it("reads the first 32 bits of the SHA-256 digest", () => {
    expect(seedFromAuditId("audit-1")).toBe(0x5689fc41)
  })
})

describe("mulberry32", () => {
  it("is reproducible for a seed", () => {
    expect(mulberry32(1)()).toBe(0.6270739405881613)
    const a = mulberry32(42)
    const b = mulberry32(42)
    expect([a(), a(), a()]).toEqual([b(), b(), b()])
  })
})

describe("selectCandidate", () => {
  it("draws weighted directives from the seed", () => {
    // mulberry32(1) → 0.627 (< 0.7), mulberry32(2) → 0.734
    expect(chainIds(selectCandidate(weighted, 1, healthy))).toEqual([
      "acme:fast-1", "acme:pro-1", "inhouse:guard-1", "inhouse:mini-1",
    ])
    expect(chainIds(selectCandidate(weighted, 2, healthy))).toEqual([
      "acme:pro-1", "acme:fast-1", "inhouse:guard-1", "inhouse:mini-1",
    ])
  })

  it("returns the same selection for the same set and seed", () => {
    const seed = seedFromAuditId("audit-42")
    expect(selectCandidate(weighted, seed, healthy)).toEqual(selectCandidate(weighted, seed, healthy))
  })

  it("approaches configured weights over many requests", () => {
    let fast = 0
    for (let i = 0; i < 1000; i++) {
      const pick = selectCandidate(weighted, seedFromAuditId(`audit-${i}`), healthy)
      if (pick.recommended.model.id === "acme:fast-1") fast++
    }
    expect(fast / 1000).toBeGreaterThanOrEqual(0.65)
    expect(fast / 1000).toBeLessThanOrEqual(0.75)
  })

  it("ranks equal weights by health score", () => {
    const even: CandidateSet = {
      ...weighted,
      candidates: weighted.candidates.map(c => (c.origin === "directive" ? { ...c, weight: 0.5 } : c)),
    }
    const score = (id: string) => (id === "acme:pro-1" ? 1 : 0.5)
    // Ranked [pro-1, fast-1]; 0.0117 falls in pro-1's half, 0.627 in fast-1's
    expect(selectCandidate(even, 7, score).recommended.model.id).toBe("acme:pro-1")
    expect(selectCandidate(even, 1, score).recommended.model.id).toBe("acme:fast-1")
  })

  it("takes the head of ordered directives", () => {
    const ordered = evaluatePolicy(policy, ctx({ tokenEstimate: 9000 }), catalog)
    expect(chainIds(selectCandidate(ordered, 2, healthy))).toEqual([
      "acme:pro-1", "inhouse:guard-1", "acme:fast-1", "inhouse:mini-1",
    ])
  })

  it("falls back to the first fallback-origin candidate when no directive model survived", () => {
    const onlyFallbacks: CandidateSet = { ...weighted, candidates: weighted.candidates.filter(c => c.origin === "fallback") }
    expect(chainIds(selectCandidate(onlyFallbacks, 1, healthy))).toEqual(["inhouse:guard-1", "inhouse:mini-1"])
  })

  it("takes a budget-downgraded set in its cheapest-first order", () => {
    const low = applyBudgetGate(
      weighted,
      { scopeKey: "budget:t1:support:2026-03", spentMicro: 85_000, limitMicro: 100_000, remainingMicro: 15_000, state: "low" },
      policy.budget,
    )
    expect(chainIds(selectCandidate(low, 1, healthy))).toEqual([
      "inhouse:mini-1", "acme:fast-1", "inhouse:guard-1", "acme:pro-1",
    ])
  })

  it("denies an empty set", () => {
    const err = catchRoutingError(() => selectCandidate({ ...weighted, candidates: [] }, 1, healthy))
    expect(err.code).toBe("POLICY_DENY")
    expect(err.reason).toBe("no_eligible_model")
  })
})

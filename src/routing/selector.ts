// src/routing/selector.ts — Candidate selection
// Deterministic given (CandidateSet, seed). Weighted directives draw from a
// seeded PRNG; ordered and single directives take the head. The remainder
// becomes this request's fallback chain.

import { createHash } from "node:crypto"
import { policyDeny } from "./errors.js"
import type { Candidate, CandidateSet } from "./types.js"

export interface Selection {
  recommended: Candidate
  /** Ordered alternates tried after the recommended model fails */
  fallbackChain: Candidate[]
}

/** 32-bit seed from the first 8 hex chars of SHA-256(auditId) */
export function seedFromAuditId(auditId: string): number {
  return parseInt(createHash("sha256").update(auditId).digest("hex").slice(0, 8), 16)
}

/** mulberry32: small, fast, reproducible PRNG in [0, 1) */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Pick the recommended candidate. Directive candidates are preferred;
 * fallback-origin candidates follow them in the chain and lead it only when
 * no directive candidate survived filtering. A budget-downgraded set is
 * taken in its own (cheapest-first) order.
 */
export function selectCandidate(
  set: CandidateSet,
  seed: number,
  healthScore: (modelId: string) => number,
): Selection {
  if (set.downgraded) {
    const [head, ...rest] = set.candidates
    if (!head) throw policyDeny("no_eligible_model", "Candidate set is empty at selection")
    return { recommended: head, fallbackChain: rest }
  }

  const directive = set.candidates.filter(c => c.origin === "directive")
  const fallbacks = set.candidates.filter(c => c.origin === "fallback")

  if (directive.length === 0) {
    const [head, ...rest] = fallbacks
    if (!head) throw policyDeny("no_eligible_model", "Candidate set is empty at selection")
    return { recommended: head, fallbackChain: rest }
  }

  if (set.directive !== "weighted") {
    const [head, ...rest] = directive
    if (!head) throw policyDeny("no_eligible_model", "Candidate set is empty at selection")
    return { recommended: head, fallbackChain: [...rest, ...fallbacks] }
  }

  // Weight desc, then health desc, then id: the draw order is stable for a given snapshot
  const ranked = [...directive].sort((a, b) =>
    b.weight - a.weight ||
    healthScore(b.model.id) - healthScore(a.model.id) ||
    a.model.id.localeCompare(b.model.id),
  )
  const pick = drawWeighted(ranked, mulberry32(seed)())
  return {
    recommended: pick,
    fallbackChain: [...ranked.filter(c => c !== pick), ...fallbacks],
  }
}

/** Walk cumulative normalized weights; zero-weight entries are only reachable when all are zero */
function drawWeighted(ranked: readonly Candidate[], roll: number): Candidate {
  const first = ranked[0]
  if (!first) throw policyDeny("no_eligible_model", "Candidate set is empty at selection")
  const total = ranked.reduce((sum, c) => sum + Math.max(0, c.weight), 0)
  if (total <= 0) return first

  const target = roll * total
  let cumulative = 0
  for (const c of ranked) {
    cumulative += Math.max(0, c.weight)
    if (target < cumulative) return c
  }
  // Floating-point remainder lands on the last weighted entry
  return [...ranked].reverse().find(c => c.weight > 0) ?? first
}

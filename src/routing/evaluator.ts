// src/routing/evaluator.ts — Policy rule matching and candidate construction
//
// Rules are evaluated top to bottom; the first match decides the directive.
// Conditions fail closed: a comparison against an absent field never matches.

import { directiveModels } from "./policy.js"
import { sensitivityRank, SENSITIVITY_LEVELS } from "./types.js"
import type {
  Candidate,
  CandidateSet,
  Condition,
  ConditionField,
  ModelCatalog,
  Policy,
  PolicyRule,
  RequestContext,
  Sensitivity,
} from "./types.js"

function isSensitivity(value: unknown): value is Sensitivity {
  return typeof value === "string" && SENSITIVITY_LEVELS.some(level => level === value)
}

function fieldValue(ctx: RequestContext, field: ConditionField): string | number | readonly string[] | undefined {
  switch (field) {
    case "tenantId": return ctx.tenantId
    case "appId": return ctx.appId
    case "teamId": return ctx.teamId
    case "userRole": return ctx.userRole
    case "sensitivity": return ctx.sensitivity
    case "tokenEstimate": return ctx.tokenEstimate
    case "language": return ctx.language
    case "tags": return ctx.tags
  }
}

/** Ordinal used by lt/gte: sensitivity compares by rank, numbers as-is */
function ordinal(field: ConditionField, value: string | number): number | undefined {
  if (field === "sensitivity") {
    return isSensitivity(value) ? sensitivityRank(value) : undefined
  }
  return typeof value === "number" ? value : undefined
}

export function matchCondition(ctx: RequestContext, cond: Condition): boolean {
  const actual = fieldValue(ctx, cond.field)
  if (actual === undefined || actual === "") return false

  if (cond.op === "in") {
    if (typeof actual === "object") return actual.some(v => cond.value.includes(v))
    return typeof actual === "string" && cond.value.includes(actual)
  }

  if (typeof actual === "object") {
    // Tag lists only support membership and (in)equality on a single tag
    if (cond.op === "eq") return typeof cond.value === "string" && actual.includes(cond.value)
    if (cond.op === "neq") return typeof cond.value === "string" && !actual.includes(cond.value)
    return false
  }

  switch (cond.op) {
    case "eq":
      return actual === cond.value
    case "neq":
      return actual !== cond.value
    case "lt":
    case "gte": {
      const a = ordinal(cond.field, actual)
      const b = ordinal(cond.field, cond.value)
      if (a === undefined || b === undefined) return false
      return cond.op === "lt" ? a < b : a >= b
    }
  }
}

export function matchRule(ctx: RequestContext, rule: PolicyRule): boolean {
  return rule.when.every(cond => matchCondition(ctx, cond))
}

export function findMatchingRule(policy: Policy, ctx: RequestContext): PolicyRule | undefined {
  return policy.rules.find(rule => matchRule(ctx, rule))
}

function directiveWeights(rule: PolicyRule): Map<string, number> {
  const d = rule.directive
  const weights = new Map<string, number>()
  if (d.kind === "weighted") {
    for (const c of d.choices) weights.set(c.model, c.weight)
  } else {
    for (const id of directiveModels(rule)) weights.set(id, 1)
  }
  return weights
}

/**
 * Evaluate the policy against a request. Returns the matched rule's
 * candidates followed by their policy fallbacks (breadth-first, deduplicated),
 * or an empty set with ruleId "" when nothing matches.
 */
export function evaluatePolicy(policy: Policy, ctx: RequestContext, catalog: ModelCatalog): CandidateSet {
  const rule = findMatchingRule(policy, ctx)
  if (!rule) return { ruleId: "", directive: "single", candidates: [] }

  const candidates: Candidate[] = []
  const seen = new Set<string>()
  const weights = directiveWeights(rule)

  for (const id of directiveModels(rule)) {
    seen.add(id)
    const model = catalog.get(id)
    if (!model || !model.enabled) continue
    candidates.push({ model, weight: weights.get(id) ?? 0, ruleId: rule.id, origin: "directive", probe: false })
  }

  const queue = directiveModels(rule)
  while (queue.length > 0) {
    const from = queue.shift()
    if (from === undefined) break
    for (const id of policy.fallbacks[from] ?? []) {
      if (seen.has(id)) continue
      seen.add(id)
      queue.push(id)
      const model = catalog.get(id)
      if (!model || !model.enabled) continue
      candidates.push({ model, weight: 0, ruleId: rule.id, origin: "fallback", probe: false })
    }
  }

  return { ruleId: rule.id, directive: rule.directive.kind, candidates }
}

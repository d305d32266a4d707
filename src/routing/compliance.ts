// src/routing/compliance.ts — Data-handling compliance filter
// Runs regardless of experiment or subscription state; nothing downstream can
// reintroduce a model removed here.

import { sensitivityRank } from "./types.js"
import type { CandidateSet, ComplianceRules, RequestContext } from "./types.js"

/** Why external models are off-limits for this request, or null if they are allowed */
export function externalBlockReason(ctx: RequestContext, rules: ComplianceRules): string | null {
  if (sensitivityRank(ctx.sensitivity) > sensitivityRank(rules.externalMaxSensitivity)) {
    return `sensitivity ${ctx.sensitivity} above ${rules.externalMaxSensitivity}`
  }
  const blocked = ctx.tags.filter(t => rules.blockedTags.includes(t))
  if (blocked.length > 0) {
    return `blocked tags: ${blocked.join(", ")}`
  }
  return null
}

export function applyCompliance(set: CandidateSet, ctx: RequestContext, rules: ComplianceRules): CandidateSet {
  if (externalBlockReason(ctx, rules) === null) return set
  return { ...set, candidates: set.candidates.filter(c => c.model.compliance === "internal") }
}

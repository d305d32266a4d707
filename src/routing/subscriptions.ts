// src/routing/subscriptions.ts — Subscription store and allow-list resolution
//
// Deny-all by default: with no enabled subscription for any applicable scope,
// nothing is eligible. The first scope (in policy precedence order) holding at
// least one enabled subscription wins and its allow-list applies exclusively.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RoutingError } from "./errors.js"
import type {
  CandidateSet,
  RequestContext,
  Subscription,
  SubscriptionScope,
  SubscriptionSnapshot,
} from "./types.js"

export const SubscriptionSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  scope: Type.Union([Type.Literal("tenant"), Type.Literal("app"), Type.Literal("team")]),
  target: Type.String({ minLength: 1 }),
  models: Type.Array(Type.String()),
  enabled: Type.Boolean(),
})

const SubscriptionListSchema = Type.Array(SubscriptionSchema)

export interface SubscriptionResolution {
  set: CandidateSet
  scope?: SubscriptionScope
  allowList: string[]
}

function scopeTarget(ctx: RequestContext, scope: SubscriptionScope): string | undefined {
  switch (scope) {
    case "tenant": return ctx.tenantId
    case "app": return ctx.appId
    case "team": return ctx.teamId
  }
}

/** Subscriptions of the first scope with an enabled match, or undefined when none applies */
export function resolveAllowList(
  ctx: RequestContext,
  subscriptions: readonly Subscription[],
  precedence: readonly SubscriptionScope[],
): { scope: SubscriptionScope; models: Set<string> } | undefined {
  for (const scope of precedence) {
    const target = scopeTarget(ctx, scope)
    if (!target) continue
    const matching = subscriptions.filter(s => s.enabled && s.scope === scope && s.target === target)
    if (matching.length === 0) continue
    const models = new Set<string>()
    for (const sub of matching) {
      for (const m of sub.models) models.add(m)
    }
    return { scope, models }
  }
  return undefined
}

/** Intersect the candidate set with the winning scope's allow-list */
export function resolveSubscriptions(
  set: CandidateSet,
  ctx: RequestContext,
  subscriptions: readonly Subscription[],
  precedence: readonly SubscriptionScope[],
): SubscriptionResolution {
  const resolved = resolveAllowList(ctx, subscriptions, precedence)
  if (!resolved) {
    return { set: { ...set, candidates: [] }, allowList: [] }
  }
  return {
    set: { ...set, candidates: set.candidates.filter(c => resolved.models.has(c.model.id)) },
    scope: resolved.scope,
    allowList: [...resolved.models],
  }
}

// --- Store ---

export interface SubscriptionStore {
  snapshot(): SubscriptionSnapshot
}

/**
 * Versioned in-memory subscription store. Each publish replaces the whole
 * list; requests keep the snapshot they captured at start.
 */
export class InMemorySubscriptionStore implements SubscriptionStore {
  private current: SubscriptionSnapshot = Object.freeze({ version: 0, subscriptions: Object.freeze([]) })

  constructor(initial?: unknown) {
    if (initial !== undefined) this.publish(initial)
  }

  publish(raw: unknown): SubscriptionSnapshot {
    if (!Value.Check(SubscriptionListSchema, raw)) {
      const errors = [...Value.Errors(SubscriptionListSchema, raw)].map(e => `${e.path || "/"}: ${e.message}`)
      throw new RoutingError("CONFIG_INVALID", "config_invalid", "Subscriptions failed schema validation", { errors })
    }
    const subscriptions: Subscription[] = raw.map(s => Object.freeze({ ...s, models: Object.freeze([...s.models]) }))
    this.current = Object.freeze({
      version: this.current.version + 1,
      subscriptions: Object.freeze(subscriptions),
    })
    return this.current
  }

  snapshot(): SubscriptionSnapshot {
    return this.current
  }
}

// src/routing/policy.ts — Policy loading, static validation and versioned store
//
// A policy is validated once, deep-frozen and published under an immutable
// version. Requests read the version that was active when they started.

import { readFileSync } from "node:fs"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { deepFreeze } from "../shared/freeze.js"
import { RoutingError } from "./errors.js"
import { BUILTIN_DETECTOR_IDS } from "../safety/detectors.js"
import type { ModelCatalog, Policy, PolicyRule, SubscriptionScope } from "./types.js"

/** Tolerance for weighted-choice weights summing to 1 */
export const WEIGHT_TOLERANCE = 1e-6

const DEFAULT_PRECEDENCE: readonly SubscriptionScope[] = ["app", "team", "tenant"]

// --- Raw schema ---

const FieldSchema = Type.Union([
  Type.Literal("tenantId"),
  Type.Literal("appId"),
  Type.Literal("teamId"),
  Type.Literal("userRole"),
  Type.Literal("sensitivity"),
  Type.Literal("tokenEstimate"),
  Type.Literal("language"),
  Type.Literal("tags"),
])

const ConditionSchema = Type.Union([
  Type.Object({
    field: FieldSchema,
    op: Type.Union([Type.Literal("eq"), Type.Literal("neq"), Type.Literal("lt"), Type.Literal("gte")]),
    value: Type.Union([Type.String(), Type.Number()]),
  }),
  Type.Object({
    field: FieldSchema,
    op: Type.Literal("in"),
    value: Type.Array(Type.String(), { minItems: 1 }),
  }),
])

const DirectiveSchema = Type.Union([
  Type.Object({ kind: Type.Literal("single"), model: Type.String() }),
  Type.Object({
    kind: Type.Literal("weighted"),
    choices: Type.Array(Type.Object({ model: Type.String(), weight: Type.Number() }), { minItems: 1 }),
  }),
  Type.Object({ kind: Type.Literal("ordered"), models: Type.Array(Type.String(), { minItems: 1 }) }),
])

const ScopeSchema = Type.Union([Type.Literal("tenant"), Type.Literal("app"), Type.Literal("team")])

const SensitivitySchema = Type.Union([
  Type.Literal("public"),
  Type.Literal("internal"),
  Type.Literal("confidential"),
  Type.Literal("restricted"),
])

const ActionSchema = Type.Union([Type.Literal("flag"), Type.Literal("redraft")])

export const RawPolicySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  appId: Type.String({ minLength: 1 }),
  version: Type.Integer({ minimum: 1 }),
  rules: Type.Array(Type.Object({
    id: Type.String({ minLength: 1 }),
    description: Type.Optional(Type.String()),
    when: Type.Array(ConditionSchema),
    directive: DirectiveSchema,
  })),
  fallbacks: Type.Optional(Type.Record(Type.String(), Type.Array(Type.String()))),
  subscriptionPrecedence: Type.Optional(Type.Array(ScopeSchema, { minItems: 1 })),
  compliance: Type.Optional(Type.Object({
    externalMaxSensitivity: SensitivitySchema,
    blockedTags: Type.Optional(Type.Array(Type.String())),
  })),
  budget: Type.Optional(Type.Object({
    monthlyLimitMicro: Type.Integer({ minimum: 0 }),
    lowWaterMarkMicro: Type.Integer({ minimum: 0 }),
    minimalCostMicroPerMillion: Type.Integer({ minimum: 0 }),
  })),
  firewall: Type.Optional(Type.Object({
    defaultAction: ActionSchema,
    detectors: Type.Optional(Type.Array(Type.String())),
    customPatterns: Type.Optional(Type.Array(Type.Object({
      id: Type.String({ minLength: 1 }),
      category: Type.String({ minLength: 1 }),
      pattern: Type.String({ minLength: 1 }),
      flags: Type.Optional(Type.String()),
    }))),
    sanitizingModel: Type.Optional(Type.String()),
  })),
  degrade: Type.Optional(Type.Object({ minimalCompletion: Type.Boolean() })),
})

export type RawPolicy = Static<typeof RawPolicySchema>

// --- Validation ---

/** Models a rule's directive names, in directive order */
export function directiveModels(rule: PolicyRule): string[] {
  const d = rule.directive
  switch (d.kind) {
    case "single":
      return [d.model]
    case "weighted":
      return d.choices.map(c => c.model)
    case "ordered":
      return [...d.models]
  }
}

/** Returns the node where a cycle closes, or null when the graph is acyclic */
export function findFallbackCycle(chains: Readonly<Record<string, readonly string[]>>): string | null {
  const visiting = new Set<string>()
  const visited = new Set<string>()

  function dfs(node: string): string | null {
    if (visited.has(node)) return null
    if (visiting.has(node)) return node

    visiting.add(node)
    for (const neighbor of chains[node] ?? []) {
      const hit = dfs(neighbor)
      if (hit !== null) return hit
    }
    visiting.delete(node)
    visited.add(node)
    return null
  }

  for (const node of Object.keys(chains)) {
    const hit = dfs(node)
    if (hit !== null) return hit
  }
  return null
}

function checkModel(catalog: ModelCatalog, id: string, where: string, errors: string[]): void {
  const model = catalog.get(id)
  if (!model) {
    errors.push(`${where}: unknown model "${id}"`)
  } else if (!model.enabled) {
    errors.push(`${where}: model "${id}" is disabled`)
  }
}

function validateSemantics(raw: RawPolicy, catalog: ModelCatalog): string[] {
  const errors: string[] = []
  const ruleIds = new Set<string>()

  raw.rules.forEach((rule, i) => {
    const where = `rules[${i}] (${rule.id})`
    if (ruleIds.has(rule.id)) errors.push(`${where}: duplicate rule id`)
    ruleIds.add(rule.id)

    const models = directiveModels(rule)
    if (new Set(models).size !== models.length) {
      errors.push(`${where}: directive names a model more than once`)
    }
    for (const id of models) checkModel(catalog, id, where, errors)

    if (rule.directive.kind === "weighted") {
      let sum = 0
      for (const choice of rule.directive.choices) {
        if (!(choice.weight > 0)) errors.push(`${where}: weight for "${choice.model}" must be > 0`)
        sum += choice.weight
      }
      if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
        errors.push(`${where}: weights sum to ${sum}, expected 1`)
      }
    }
  })

  const fallbacks = raw.fallbacks ?? {}
  for (const [from, chain] of Object.entries(fallbacks)) {
    checkModel(catalog, from, `fallbacks.${from}`, errors)
    for (const to of chain) checkModel(catalog, to, `fallbacks.${from}`, errors)
    if (chain.includes(from)) errors.push(`fallbacks.${from}: model falls back to itself`)
  }
  const cycleAt = findFallbackCycle(fallbacks)
  if (cycleAt !== null) errors.push(`fallbacks: cycle detected at "${cycleAt}"`)

  const precedence = raw.subscriptionPrecedence ?? DEFAULT_PRECEDENCE
  if (new Set(precedence).size !== precedence.length) {
    errors.push("subscriptionPrecedence: scopes must be unique")
  }

  if (raw.budget && raw.budget.lowWaterMarkMicro > raw.budget.monthlyLimitMicro) {
    errors.push("budget: lowWaterMarkMicro exceeds monthlyLimitMicro")
  }

  const firewall = raw.firewall
  if (firewall) {
    for (const id of firewall.detectors ?? []) {
      if (!BUILTIN_DETECTOR_IDS.includes(id)) errors.push(`firewall.detectors: unknown detector "${id}"`)
    }
    for (const custom of firewall.customPatterns ?? []) {
      try {
        new RegExp(custom.pattern, custom.flags)
      } catch (err) {
        errors.push(`firewall.customPatterns.${custom.id}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
    if (firewall.sanitizingModel) {
      checkModel(catalog, firewall.sanitizingModel, "firewall.sanitizingModel", errors)
    } else if (firewall.defaultAction === "redraft") {
      errors.push("firewall: defaultAction \"redraft\" requires sanitizingModel")
    }
  }

  return errors
}

/**
 * Validate a raw policy against the catalog and return the frozen Policy.
 * Throws INVALID_POLICY listing every problem found.
 */
export function loadPolicy(raw: unknown, catalog: ModelCatalog): Policy {
  if (!Value.Check(RawPolicySchema, raw)) {
    const errors = [...Value.Errors(RawPolicySchema, raw)].map(e => `${e.path || "/"}: ${e.message}`)
    throw new RoutingError("INVALID_POLICY", "invalid_policy", "Policy failed schema validation", { errors })
  }

  const errors = validateSemantics(raw, catalog)
  if (errors.length > 0) {
    throw new RoutingError("INVALID_POLICY", "invalid_policy", `Policy ${raw.id}@${raw.version} rejected (${errors.length} errors)`, {
      policy: raw.id,
      version: raw.version,
      errors,
    })
  }

  const policy: Policy = {
    id: raw.id,
    appId: raw.appId,
    version: raw.version,
    rules: structuredClone(raw.rules),
    fallbacks: structuredClone(raw.fallbacks ?? {}),
    subscriptionPrecedence: [...(raw.subscriptionPrecedence ?? DEFAULT_PRECEDENCE)],
    compliance: {
      externalMaxSensitivity: raw.compliance?.externalMaxSensitivity ?? "internal",
      blockedTags: [...(raw.compliance?.blockedTags ?? [])],
    },
    budget: raw.budget ? { ...raw.budget } : {
      monthlyLimitMicro: Number.MAX_SAFE_INTEGER,
      lowWaterMarkMicro: 0,
      minimalCostMicroPerMillion: 0,
    },
    firewall: {
      defaultAction: raw.firewall?.defaultAction ?? "flag",
      detectors: [...(raw.firewall?.detectors ?? BUILTIN_DETECTOR_IDS)],
      customPatterns: structuredClone(raw.firewall?.customPatterns ?? []),
      sanitizingModel: raw.firewall?.sanitizingModel,
    },
    degrade: { minimalCompletion: raw.degrade?.minimalCompletion ?? false },
  }
  return deepFreeze(policy)
}

export function loadPolicyFile(path: string, catalog: ModelCatalog): Policy {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"))
  return loadPolicy(raw, catalog)
}

// --- Policy Store ---

export interface PolicyStore {
  getActive(appId: string): Policy | undefined
  get(appId: string, version: number): Policy | undefined
}

/**
 * Versioned in-memory policy store. Publishing never mutates an existing
 * version; the highest published version is the active one.
 */
export class InMemoryPolicyStore implements PolicyStore {
  private byApp = new Map<string, Map<number, Policy>>()
  private active = new Map<string, Policy>()

  publish(policy: Policy): void {
    let versions = this.byApp.get(policy.appId)
    if (!versions) {
      versions = new Map()
      this.byApp.set(policy.appId, versions)
    }
    if (versions.has(policy.version)) {
      throw new RoutingError("INVALID_POLICY", "invalid_policy", `Policy version ${policy.version} already published for app "${policy.appId}"`, {
        appId: policy.appId,
        version: policy.version,
      })
    }
    versions.set(policy.version, policy)

    const current = this.active.get(policy.appId)
    if (!current || policy.version > current.version) {
      this.active.set(policy.appId, policy)
      console.log(`[policy] Activated ${policy.id}@${policy.version} for app "${policy.appId}"`)
    }
  }

  getActive(appId: string): Policy | undefined {
    return this.active.get(appId)
  }

  get(appId: string, version: number): Policy | undefined {
    return this.byApp.get(appId)?.get(version)
  }

  versions(appId: string): number[] {
    return [...(this.byApp.get(appId)?.keys() ?? [])].sort((a, b) => a - b)
  }
}

// src/routing/experiments.ts — Experiment overlay with guardrail auto-rollback
//
// An experiment targets (tenant?, app) and sends `trafficPercent` of requests
// to a variant that substitutes or re-weights models already in the candidate
// set. Assignment hashes a stable request key, so the same key always lands
// in the same arm. Outcomes are windowed per arm; a variant regressing past a
// guardrail is rolled back to 0% traffic and re-armed after a cooldown.

import { createHash } from "node:crypto"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RoutingError } from "./errors.js"
import { p95 } from "./health.js"
import type { Candidate, CandidateSet, RequestContext } from "./types.js"

// --- Schema ---

const GuardrailsSchema = Type.Object({
  maxLatencyRegressionPercent: Type.Optional(Type.Number({ minimum: 0 })),
  maxSuccessRateDrop: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  minSamples: Type.Optional(Type.Integer({ minimum: 1 })),
  windowSize: Type.Optional(Type.Integer({ minimum: 1 })),
  cooldownMs: Type.Optional(Type.Integer({ minimum: 0 })),
  maxRollbacks: Type.Optional(Type.Integer({ minimum: 0 })),
})

const VariantSchema = Type.Union([
  Type.Object({ kind: Type.Literal("substitute"), model: Type.String({ minLength: 1 }) }),
  Type.Object({
    kind: Type.Literal("reweight"),
    weights: Type.Record(Type.String(), Type.Number({ minimum: 0 })),
  }),
])

export const ExperimentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  appId: Type.String({ minLength: 1 }),
  tenantId: Type.Optional(Type.String({ minLength: 1 })),
  trafficPercent: Type.Number({ minimum: 0, maximum: 100 }),
  variant: VariantSchema,
  guardrails: Type.Optional(GuardrailsSchema),
})

export type ExperimentDefinition = Static<typeof ExperimentSchema>
export type ExperimentVariant = Static<typeof VariantSchema>

export interface ExperimentGuardrails {
  maxLatencyRegressionPercent: number   // Default: 50 (variant p95 vs control p95)
  maxSuccessRateDrop: number            // Default: 0.1 (absolute, control minus variant)
  minSamples: number                    // Default: 20 per arm before evaluating
  windowSize: number                    // Default: 200 outcomes per arm
  cooldownMs: number                    // Default: 600000 before re-arming
  maxRollbacks: number                  // Default: 3, then stays rolled back
}

export const DEFAULT_GUARDRAILS: ExperimentGuardrails = {
  maxLatencyRegressionPercent: 50,
  maxSuccessRateDrop: 0.1,
  minSamples: 20,
  windowSize: 200,
  cooldownMs: 600_000,
  maxRollbacks: 3,
}

// --- Types ---

export type ExperimentArm = "control" | "variant"
export type ExperimentStatus = "active" | "rolled_back"

export interface ExperimentOutcome {
  latencyMs: number
  costMicro: number
  success: boolean
}

/** Handed to the request; outcomes from an older generation are ignored */
export interface ExperimentTicket {
  experimentId: string
  arm: ExperimentArm
  generation: number
}

interface ArmWindow {
  outcomes: ExperimentOutcome[]
}

interface ExperimentEntry {
  definition: ExperimentDefinition
  guardrails: ExperimentGuardrails
  status: ExperimentStatus
  generation: number
  rollbacks: number
  rolledBackAt?: number
  lastRollbackReason?: string
  arms: Record<ExperimentArm, ArmWindow>
}

export interface ArmStats {
  samples: number
  successRate: number
  latencyP95Ms: number
  avgCostMicro: number
}

export interface ExperimentSnapshot {
  id: string
  status: ExperimentStatus
  effectiveTrafficPercent: number
  generation: number
  rollbacks: number
  lastRollbackReason?: string
  control: ArmStats
  variant: ArmStats
}

export type RollbackListener = (experimentId: string, appId: string, reason: string) => void

// --- Bucketing ---

export const BUCKETS = 10_000

/** Deterministic bucket in [0, 10000) for (experiment, request key) */
export function bucketFor(experimentId: string, requestKey: string): number {
  const hex = createHash("sha256").update(`${experimentId}:${requestKey}`).digest("hex")
  return parseInt(hex.slice(0, 8), 16) % BUCKETS
}

export function defaultRequestKey(ctx: RequestContext): string {
  return ctx.requestKey ?? `${ctx.tenantId}:${ctx.appId}:${ctx.teamId ?? ""}`
}

// --- Registry ---

export class ExperimentRegistry {
  private entries = new Map<string, ExperimentEntry>()
  private clock: () => number
  private listeners: RollbackListener[] = []

  constructor(opts?: { clock?: () => number }) {
    this.clock = opts?.clock ?? Date.now
  }

  onRollback(listener: RollbackListener): void {
    this.listeners.push(listener)
  }

  /** Validate and register (or replace) an experiment; windows start empty */
  register(raw: unknown): ExperimentDefinition {
    if (!Value.Check(ExperimentSchema, raw)) {
      const errors = [...Value.Errors(ExperimentSchema, raw)].map(e => `${e.path}: ${e.message}`)
      throw new RoutingError("CONFIG_INVALID", "config_invalid", "Invalid experiment definition", { errors })
    }
    const definition = raw
    this.entries.set(definition.id, {
      definition,
      guardrails: { ...DEFAULT_GUARDRAILS, ...definition.guardrails },
      status: "active",
      generation: 1,
      rollbacks: 0,
      arms: { control: { outcomes: [] }, variant: { outcomes: [] } },
    })
    return definition
  }

  remove(experimentId: string): boolean {
    return this.entries.delete(experimentId)
  }

  /**
   * Arm assignment for a request, or undefined when no experiment targets it.
   * Tenant-scoped experiments take precedence over app-wide ones.
   */
  assign(ctx: RequestContext): ExperimentTicket | undefined {
    const entry = this.findFor(ctx)
    if (!entry) return undefined
    this.maybeRearm(entry)

    const traffic = entry.status === "active" ? entry.definition.trafficPercent : 0
    const bucket = bucketFor(entry.definition.id, defaultRequestKey(ctx))
    const arm: ExperimentArm = bucket < traffic * (BUCKETS / 100) ? "variant" : "control"
    return { experimentId: entry.definition.id, arm, generation: entry.generation }
  }

  variantOf(experimentId: string): ExperimentVariant | undefined {
    return this.entries.get(experimentId)?.definition.variant
  }

  /**
   * Record a completed request's outcome. Returns true when this outcome
   * triggered a rollback.
   */
  recordOutcome(ticket: ExperimentTicket, outcome: ExperimentOutcome): boolean {
    const entry = this.entries.get(ticket.experimentId)
    if (!entry || entry.generation !== ticket.generation || entry.status !== "active") return false

    const window = entry.arms[ticket.arm].outcomes
    window.push(outcome)
    if (window.length > entry.guardrails.windowSize) window.splice(0, window.length - entry.guardrails.windowSize)

    const reason = this.guardrailBreach(entry)
    if (!reason) return false
    this.rollback(entry, reason)
    return true
  }

  snapshot(experimentId: string): ExperimentSnapshot | undefined {
    const entry = this.entries.get(experimentId)
    if (!entry) return undefined
    this.maybeRearm(entry)
    return {
      id: entry.definition.id,
      status: entry.status,
      effectiveTrafficPercent: entry.status === "active" ? entry.definition.trafficPercent : 0,
      generation: entry.generation,
      rollbacks: entry.rollbacks,
      lastRollbackReason: entry.lastRollbackReason,
      control: armStats(entry.arms.control),
      variant: armStats(entry.arms.variant),
    }
  }

  // --- Private ---

  private findFor(ctx: RequestContext): ExperimentEntry | undefined {
    let appWide: ExperimentEntry | undefined
    for (const entry of this.entries.values()) {
      const def = entry.definition
      if (def.appId !== ctx.appId) continue
      if (def.tenantId === ctx.tenantId) return entry
      if (def.tenantId === undefined) appWide ??= entry
    }
    return appWide
  }

  private guardrailBreach(entry: ExperimentEntry): string | undefined {
    const { control, variant } = entry.arms
    const g = entry.guardrails
    if (control.outcomes.length < g.minSamples || variant.outcomes.length < g.minSamples) return undefined

    const c = armStats(control)
    const v = armStats(variant)
    if (c.successRate - v.successRate > g.maxSuccessRateDrop) {
      return `success rate ${v.successRate.toFixed(3)} vs control ${c.successRate.toFixed(3)}`
    }
    const latencyLimit = c.latencyP95Ms * (1 + g.maxLatencyRegressionPercent / 100)
    if (v.latencyP95Ms > latencyLimit) {
      return `p95 ${v.latencyP95Ms}ms vs control ${c.latencyP95Ms}ms`
    }
    return undefined
  }

  private rollback(entry: ExperimentEntry, reason: string): void {
    entry.status = "rolled_back"
    entry.rollbacks++
    entry.rolledBackAt = this.clock()
    entry.lastRollbackReason = reason
    console.warn(
      `[experiment] ${entry.definition.id} rolled back (${entry.rollbacks}/${entry.guardrails.maxRollbacks}): ${reason}`,
    )
    for (const listener of this.listeners) listener(entry.definition.id, entry.definition.appId, reason)
  }

  private maybeRearm(entry: ExperimentEntry): void {
    if (entry.status !== "rolled_back" || entry.rolledBackAt === undefined) return
    if (entry.rollbacks >= entry.guardrails.maxRollbacks) return
    if (this.clock() - entry.rolledBackAt < entry.guardrails.cooldownMs) return

    entry.status = "active"
    entry.generation++
    entry.rolledBackAt = undefined
    entry.arms = { control: { outcomes: [] }, variant: { outcomes: [] } }
    console.log(`[experiment] ${entry.definition.id} re-armed (generation ${entry.generation})`)
  }
}

function armStats(arm: ArmWindow): ArmStats {
  const n = arm.outcomes.length
  if (n === 0) return { samples: 0, successRate: 1, latencyP95Ms: 0, avgCostMicro: 0 }
  return {
    samples: n,
    successRate: arm.outcomes.filter(o => o.success).length / n,
    latencyP95Ms: p95(arm.outcomes.map(o => o.latencyMs)),
    avgCostMicro: Math.floor(arm.outcomes.reduce((sum, o) => sum + o.costMicro, 0) / n),
  }
}

// --- Overlay ---

/**
 * Apply a variant to a candidate set. Only models already present are
 * touched, so the overlay never widens the set; `applied` is false when the
 * variant had nothing to act on. A budget-downgraded set keeps its
 * cheapest-first order and is left untouched.
 */
export function applyExperimentOverlay(
  set: CandidateSet,
  variant: ExperimentVariant,
): { set: CandidateSet; applied: boolean } {
  if (set.downgraded) return { set, applied: false }
  switch (variant.kind) {
    case "substitute": {
      const target = set.candidates.find(c => c.model.id === variant.model)
      if (!target) return { set, applied: false }
      const promoted: Candidate = { ...target, origin: "directive", weight: 1 }
      return {
        set: {
          ...set,
          directive: "ordered",
          candidates: [promoted, ...set.candidates.filter(c => c !== target)],
        },
        applied: true,
      }
    }
    case "reweight": {
      const directive = set.candidates.filter(c => c.origin === "directive")
      const total = directive.reduce((sum, c) => sum + (variant.weights[c.model.id] ?? 0), 0)
      if (total <= 0) return { set, applied: false }
      return {
        set: {
          ...set,
          directive: "weighted",
          candidates: set.candidates.map(c =>
            c.origin === "directive" ? { ...c, weight: (variant.weights[c.model.id] ?? 0) / total } : c,
          ),
        },
        applied: true,
      }
    }
  }
}

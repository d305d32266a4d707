// src/routing/engine.ts — Routing & governance decision engine
//
// validate → evaluate → subscriptions → compliance → health gate → budget →
// experiment → select → invoke (retry/fallback) → spend → firewall → lineage.
// Each filter stage narrows the candidate set; an empty set ends the request
// with a PolicyDeny. Every request, whatever its outcome, persists exactly one
// decision trace under its audit id.

import { ulid } from "ulid"
import { CancelledError } from "../shared/async.js"
import { OutputFirewall } from "../safety/output-firewall.js"
import type { ContextualDetector, OutputFirewallConfig } from "../safety/output-firewall.js"
import { applyBudgetGate } from "./budget.js"
import type { BudgetLedger, BudgetSnapshot } from "./budget.js"
import { applyCompliance } from "./compliance.js"
import { RoutingError, policyDeny } from "./errors.js"
import type { DenyReason } from "./errors.js"
import { evaluatePolicy } from "./evaluator.js"
import { applyExperimentOverlay } from "./experiments.js"
import type { ExperimentRegistry, ExperimentTicket } from "./experiments.js"
import { ProbeSession, applyHealthGate } from "./health.js"
import type { HealthTracker } from "./health.js"
import { TraceBuilder } from "./lineage.js"
import type { LineageRecorder } from "./lineage.js"
import { noopMetrics } from "./metrics.js"
import type { MetricsSink } from "./metrics.js"
import { InvocationOrchestrator } from "./orchestrator.js"
import type { OrchestratorConfig } from "./orchestrator.js"
import type { PolicyStore } from "./policy.js"
import { calculateTotalCostMicro } from "./pricing.js"
import { toRequestContext, traceSubject } from "./request.js"
import { seedFromAuditId, selectCandidate } from "./selector.js"
import { resolveSubscriptions } from "./subscriptions.js"
import type { SubscriptionStore } from "./subscriptions.js"
import { blendedPrice } from "./types.js"
import type {
  Candidate,
  CandidateSet,
  FirewallOutcome,
  ModelCatalog,
  Policy,
  ProviderAdapter,
  RequestContext,
  RouteRequest,
  RouteResponse,
  SanitizingAdapter,
  TraceStatus,
} from "./types.js"

// --- Types ---

export interface RoutingEngineDeps {
  catalog: ModelCatalog
  policies: PolicyStore
  subscriptions: SubscriptionStore
  health: HealthTracker
  budget: BudgetLedger
  adapter: ProviderAdapter
  lineage: LineageRecorder
  experiments?: ExperimentRegistry
  sanitizer?: SanitizingAdapter
  contextual?: ContextualDetector
  metrics?: MetricsSink
}

export interface RoutingEngineConfig {
  orchestrator: Partial<OrchestratorConfig>
  firewall: Partial<OutputFirewallConfig>
}

export interface RoutingEngineOptions {
  clock?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
  /** Audit id generator. Default: ULID. */
  newId?: () => string
}

export interface RouteOptions {
  signal?: AbortSignal
}

/** Mutable per-request bookkeeping shared between the happy and error paths */
interface RequestState {
  ticket?: ExperimentTicket
}

const EMPTY_SET: CandidateSet = { ruleId: "", directive: "single", candidates: [] }

// --- Engine ---

export class RoutingEngine {
  private metrics: MetricsSink
  private orchestrator: InvocationOrchestrator
  private firewall: OutputFirewall
  private clock: () => number
  private newId: () => string

  constructor(
    private deps: RoutingEngineDeps,
    config?: Partial<RoutingEngineConfig>,
    opts?: RoutingEngineOptions,
  ) {
    this.metrics = deps.metrics ?? noopMetrics
    this.clock = opts?.clock ?? Date.now
    this.newId = opts?.newId ?? (() => ulid())
    this.orchestrator = new InvocationOrchestrator(deps.adapter, deps.health, config?.orchestrator, {
      metrics: this.metrics,
      sleep: opts?.sleep,
      random: opts?.random,
      clock: this.clock,
    })
    this.firewall = new OutputFirewall(
      { catalog: deps.catalog, sanitizer: deps.sanitizer, contextual: deps.contextual },
      config?.firewall,
      { clock: this.clock },
    )

    deps.health.onTransition((key, _from, to) => {
      this.metrics.increment("router.circuit.transition", { model: key, provider: key.split(":")[0], reason: to })
    })
    deps.experiments?.onRollback((experimentId, appId) => {
      this.metrics.increment("router.experiment.rollback", { app: appId, reason: experimentId })
    })
  }

  /**
   * Route one request end to end. Errors are RoutingError instances that
   * carry the request's audit id and a reason code.
   */
  async route(request: RouteRequest, opts: RouteOptions = {}): Promise<RouteResponse> {
    const started = this.clock()
    const auditId = this.newId()
    const subject = traceSubject(request)
    const trace = new TraceBuilder(auditId, subject, this.clock)
    const probes = new ProbeSession(this.deps.health, auditId)
    const state: RequestState = {}

    try {
      const ctx = toRequestContext(request)
      const response = await this.decide(request, ctx, trace, probes, state, opts.signal)
      this.persist(trace, "succeeded")
      this.metrics.increment("router.requests", { app: ctx.appId, model: response.finalModel, reason: "succeeded" })
      this.metrics.observe("router.latency_ms", this.clock() - started, { app: ctx.appId, model: response.finalModel })
      return response
    } catch (err) {
      const error = this.normalizeError(err, opts.signal)
      error.auditId = auditId
      const status = statusFor(error)
      this.persist(trace, status, error.reason)
      this.metrics.increment("router.requests", { app: subject.appId, reason: error.reason })
      if (error.isDeny) this.metrics.increment("router.deny", { app: subject.appId, reason: error.reason })
      if (state.ticket && error.code === "EXHAUSTED_FALLBACK") {
        this.deps.experiments?.recordOutcome(state.ticket, {
          latencyMs: this.clock() - started,
          costMicro: 0,
          success: false,
        })
      }
      const log = status === "failed" ? console.error : console.warn
      log(`[router] ${auditId} ${status}: ${error.message}`)
      throw error
    } finally {
      probes.release()
    }
  }

  private async decide(
    request: RouteRequest,
    ctx: RequestContext,
    trace: TraceBuilder,
    probes: ProbeSession,
    state: RequestState,
    signal: AbortSignal | undefined,
  ): Promise<RouteResponse> {
    const { catalog, health } = this.deps
    this.checkCancelled(signal)
    // Snapshots captured once; later publishes only affect later requests
    const policy = this.deps.policies.getActive(ctx.appId)
    if (!policy) {
      throw policyDeny("no_eligible_model", `No active policy for app "${ctx.appId}"`, { appId: ctx.appId })
    }
    trace.policy(policy)
    const subscriptions = this.deps.subscriptions.snapshot()

    // --- Filter stages ---

    const evaluated = this.stage(trace, "evaluate", EMPTY_SET, "no_eligible_model", () =>
      evaluatePolicy(policy, ctx, catalog),
    )

    const subscriptionsStarted = this.clock()
    const resolution = resolveSubscriptions(evaluated, ctx, subscriptions.subscriptions, policy.subscriptionPrecedence)
    trace.subscription(resolution.scope, subscriptions.version)
    if (resolution.scope === undefined) {
      console.warn(`[router] no subscription applies to tenant=${ctx.tenantId} app=${ctx.appId}`)
    }
    const subscribed = this.stage(
      trace, "subscriptions", evaluated, "no_eligible_model", () => resolution.set, subscriptionsStarted,
    )

    const compliant = this.stage(trace, "compliance", subscribed, "compliance_block", set =>
      applyCompliance(set, ctx, policy.compliance),
    )

    const healthy = this.stage(trace, "health", compliant, "no_eligible_model", set => {
      const gated = applyHealthGate(set, health)
      // Half-open candidates whose probe slot another request holds are bypassed
      return { ...gated, candidates: gated.candidates.filter(c => !c.probe || probes.available(c.model.id)) }
    })

    this.checkCancelled(signal)
    const budgetStarted = this.clock()
    const budget = await this.deps.budget.snapshot(ctx.tenantId, ctx.appId, policy.budget)
    const affordable = this.stage(
      trace, "budget", healthy, "budget_exceeded", set => applyBudgetGate(set, budget, policy.budget), budgetStarted,
    )
    if (budget.state !== "normal") {
      this.metrics.increment("router.budget", { app: ctx.appId, reason: budget.state })
    }

    const final = this.applyExperiment(trace, ctx, affordable, state)

    // --- Selection ---

    const selectStarted = this.clock()
    const selection = selectCandidate(final, seedFromAuditId(trace.auditId), id => health.score(id))
    trace.recommended(selection.recommended.model.id)
    trace.timing("select", this.clock() - selectStarted)

    // --- Invocation ---

    const invokeStarted = this.clock()
    const outcome = await this.orchestrator.run({
      appId: ctx.appId,
      chain: [selection.recommended, ...selection.fallbackChain],
      degradeCandidate: policy.degrade.minimalCompletion ? this.degradeCandidate(compliant, budget, policy) : undefined,
      input: request.input,
      options: { maxTokens: ctx.options.maxTokens, temperature: ctx.options.temperature },
      signal,
      admit: id => probes.admit(id),
      recorder: trace,
    })
    trace.timing("invoke", this.clock() - invokeStarted)
    trace.served(outcome.finalModel.id, outcome.fellBack, outcome.result.usage)

    // --- Cost & spend ---

    // Recorded before the firewall: a cancel during screening still owes the provider call
    let costMicro = calculateTotalCostMicro(outcome.result.usage, outcome.finalModel.pricing).total_cost_micro
    trace.cost(costMicro)
    await this.recordSpend(ctx, costMicro)

    // --- Firewall ---

    const firewallStarted = this.clock()
    const screened = await this.firewall.screen(outcome.result.text, policy.firewall, {
      override: ctx.options.firewallAction,
      signal,
    })
    trace.firewall(screened.outcome)
    trace.timing("firewall", this.clock() - firewallStarted)
    this.metrics.increment("router.firewall", {
      app: ctx.appId,
      model: outcome.finalModel.id,
      reason: screened.outcome.degraded ?? screened.outcome.state,
    })
    const redraftCost = this.sanitizerCost(screened.outcome)
    if (redraftCost > 0) {
      costMicro += redraftCost
      trace.cost(costMicro)
      await this.recordSpend(ctx, redraftCost)
    }
    this.metrics.observe("router.cost_micro", costMicro, { app: ctx.appId, model: outcome.finalModel.id })
    this.checkCancelled(signal)

    if (state.ticket) {
      this.deps.experiments?.recordOutcome(state.ticket, {
        latencyMs: outcome.result.latency_ms,
        costMicro,
        success: true,
      })
    }

    return {
      auditId: trace.auditId,
      output: screened.output,
      recommendedModel: selection.recommended.model.id,
      finalModel: outcome.finalModel.id,
      fellBack: outcome.fellBack,
      ruleId: final.ruleId,
      usage: outcome.result.usage,
      cost_micro: costMicro,
      firewall: screened.outcome,
    }
  }

  /** Run one synchronous filter stage, record it, and deny when it empties the set */
  private stage(
    trace: TraceBuilder,
    name: string,
    before: CandidateSet,
    reason: DenyReason,
    fn: (set: CandidateSet) => CandidateSet,
    startedAt = this.clock(),
  ): CandidateSet {
    const after = fn(before)
    const duration = this.clock() - startedAt
    trace.stage(name, before, after, duration)
    this.metrics.observe("router.stage.duration_ms", duration, { reason: name })
    if (after.candidates.length === 0) {
      throw policyDeny(reason, `No eligible model after ${name}`, { stage: name, ruleId: after.ruleId })
    }
    return after
  }

  private applyExperiment(
    trace: TraceBuilder,
    ctx: RequestContext,
    set: CandidateSet,
    state: RequestState,
  ): CandidateSet {
    const experiments = this.deps.experiments
    const ticket = experiments?.assign(ctx)
    if (!experiments || !ticket) return set
    state.ticket = ticket

    const startedAt = this.clock()
    const variant = ticket.arm === "variant" ? experiments.variantOf(ticket.experimentId) : undefined
    const overlaid = variant ? applyExperimentOverlay(set, variant) : { set, applied: false }
    trace.experiment({ experimentId: ticket.experimentId, arm: ticket.arm, applied: overlaid.applied })
    trace.stage("experiment", set, overlaid.set, this.clock() - startedAt)
    return overlaid.set
  }

  /** Cheapest compliant candidate whose circuit is not open (and affordable once exhausted) */
  private degradeCandidate(compliant: CandidateSet, budget: BudgetSnapshot, policy: Policy): Candidate | undefined {
    return [...compliant.candidates]
      .filter(c => this.deps.health.state(c.model.id) !== "open")
      .filter(c => budget.state !== "exhausted" || blendedPrice(c.model) <= policy.budget.minimalCostMicroPerMillion)
      .sort((a, b) => blendedPrice(a.model) - blendedPrice(b.model) || a.model.id.localeCompare(b.model.id))[0]
  }

  private sanitizerCost(outcome: FirewallOutcome): number {
    if (!outcome.sanitizerUsage || !outcome.sanitizingModel) return 0
    const model = this.deps.catalog.get(outcome.sanitizingModel)
    if (!model) return 0
    return calculateTotalCostMicro(outcome.sanitizerUsage, model.pricing).total_cost_micro
  }

  private async recordSpend(ctx: RequestContext, costMicro: number): Promise<void> {
    if (costMicro === 0) return
    try {
      await this.deps.budget.record(ctx.tenantId, ctx.appId, costMicro)
    } catch (err) {
      // The response is already paid for; a spend-store outage must not fail it
      console.error(`[router] failed to record ${costMicro} micro-USD for ${ctx.tenantId}/${ctx.appId}:`, err)
      this.metrics.increment("router.spend.record_failed", { app: ctx.appId })
    }
  }

  private persist(trace: TraceBuilder, status: TraceStatus, reason?: DenyReason): void {
    this.deps.lineage.record(trace.finish(status, reason))
  }

  private checkCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RoutingError("CLIENT_CANCELLED", "client_cancelled", "Request cancelled by caller")
    }
  }

  private normalizeError(err: unknown, signal: AbortSignal | undefined): RoutingError {
    if (err instanceof RoutingError) return err
    if (err instanceof CancelledError || signal?.aborted) {
      return new RoutingError("CLIENT_CANCELLED", "client_cancelled", "Request cancelled by caller")
    }
    const message = err instanceof Error ? err.message : String(err)
    return new RoutingError("INTERNAL_ERROR", "internal_error", message, { cause: message })
  }
}

function statusFor(error: RoutingError): TraceStatus {
  if (error.isDeny) return "denied"
  if (error.code === "CLIENT_CANCELLED") return "client_cancelled"
  return "failed"
}

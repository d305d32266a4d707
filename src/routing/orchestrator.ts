// src/routing/orchestrator.ts — Invocation with retry, fallback and degrade mode
//
// Per request: pending → invoking(candidate) → succeeded | retrying |
// falling_back | failed. Attempts are strictly sequential so the trace keeps
// the order the chain was tried in.

import { CancelledError, TimeoutError, sleep, withTimeout } from "../shared/async.js"
import { ProviderError, RoutingError, toProviderError } from "./errors.js"
import type { HealthTracker } from "./health.js"
import type { AttemptRecorder } from "./lineage.js"
import type { MetricsSink } from "./metrics.js"
import { noopMetrics } from "./metrics.js"
import type {
  Candidate,
  InvocationResult,
  InvokeOptions,
  ModelDescriptor,
  NormalizedInput,
  ProviderAdapter,
} from "./types.js"

// --- Config ---

export interface OrchestratorConfig {
  maxAttempts: number        // Attempts per candidate, first call included (default: 3)
  baseDelayMs: number        // Backoff base (default: 200)
  maxDelayMs: number         // Backoff cap (default: 5000)
  jitterPercent: number      // ± jitter on each delay (default: 20)
  invokeTimeoutMs: number    // Bound on every provider call (default: 30000)
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  jitterPercent: 20,
  invokeTimeoutMs: 30_000,
}

export interface InvocationPlan {
  appId: string
  /** Recommended candidate first, then the fallback chain */
  chain: readonly Candidate[]
  /** Tried once after the chain is exhausted when minimal-completion mode is on */
  degradeCandidate?: Candidate
  input: NormalizedInput
  options: Pick<InvokeOptions, "maxTokens" | "temperature">
  signal?: AbortSignal
  /** Circuit admission, re-checked before every candidate */
  admit(modelId: string): boolean
  recorder: AttemptRecorder
}

export interface InvocationOutcome {
  result: InvocationResult
  finalModel: ModelDescriptor
  fellBack: boolean
  degraded: boolean
}

// --- Backoff ---

/** base * 2^(attempt-1), capped, ± jitter percent */
export function calculateBackoff(attempt: number, config: OrchestratorConfig, random: () => number = Math.random): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)
  const jitterRange = cappedDelay * (config.jitterPercent / 100)
  const jitter = (random() * 2 - 1) * jitterRange
  return Math.max(0, cappedDelay + jitter)
}

// --- Orchestrator ---

export class InvocationOrchestrator {
  private config: OrchestratorConfig
  private metrics: MetricsSink
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private random: () => number
  private clock: () => number

  constructor(
    private adapter: ProviderAdapter,
    private health: HealthTracker,
    config?: Partial<OrchestratorConfig>,
    opts?: {
      metrics?: MetricsSink
      sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
      random?: () => number
      clock?: () => number
    },
  ) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config }
    this.metrics = opts?.metrics ?? noopMetrics
    this.sleep = opts?.sleep ?? sleep
    this.random = opts?.random ?? Math.random
    this.clock = opts?.clock ?? Date.now
  }

  /**
   * Walk the chain until a candidate succeeds. Throws CLIENT_CANCELLED when
   * the signal aborts, EXHAUSTED_FALLBACK when nothing served the request.
   */
  async run(plan: InvocationPlan): Promise<InvocationOutcome> {
    const head = plan.chain[0]
    const tried: string[] = []

    for (const candidate of plan.chain) {
      this.checkCancelled(plan)
      const id = candidate.model.id
      if (!plan.admit(id)) {
        console.warn(`[router] skipping ${id}: circuit not admitting traffic`)
        plan.recorder.skip(id)
        this.metrics.increment("router.skip", { app: plan.appId, model: id, provider: candidate.model.provider, reason: "circuit_open" })
        continue
      }
      if (candidate !== head) {
        this.metrics.increment("router.fallback", { app: plan.appId, model: id, provider: candidate.model.provider })
      }
      tried.push(id)
      const result = await this.tryCandidate(candidate.model, plan, this.config.maxAttempts, false)
      if (result) {
        return { result, finalModel: candidate.model, fellBack: candidate !== head, degraded: false }
      }
    }

    const degrade = plan.degradeCandidate
    if (degrade && plan.admit(degrade.model.id)) {
      this.checkCancelled(plan)
      console.warn(`[router] chain exhausted; minimal completion via ${degrade.model.id}`)
      this.metrics.increment("router.degrade", { app: plan.appId, model: degrade.model.id, provider: degrade.model.provider })
      tried.push(degrade.model.id)
      const result = await this.tryCandidate(degrade.model, plan, 1, true)
      if (result) {
        return { result, finalModel: degrade.model, fellBack: degrade.model.id !== head?.model.id, degraded: true }
      }
    }

    throw new RoutingError(
      "EXHAUSTED_FALLBACK",
      "exhausted_fallback",
      `All candidates failed (${tried.join(" → ") || "none admitted"})`,
      { tried },
      {
        remediation:
          "Every eligible model failed or had an open circuit. Retry later, add fallbacks to the policy, " +
          "or enable degrade.minimalCompletion.",
      },
    )
  }

  /** Retry one model on transient errors; null means move on to the next candidate */
  private async tryCandidate(
    model: ModelDescriptor,
    plan: InvocationPlan,
    maxAttempts: number,
    degradeMode: boolean,
  ): Promise<InvocationResult | null> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.checkCancelled(plan)
      const started = this.clock()
      try {
        const result = await withTimeout(
          `invoke ${model.id}`,
          this.config.invokeTimeoutMs,
          signal => this.adapter.invoke(model, plan.input, { ...plan.options, signal }),
          plan.signal,
        )
        this.health.recordSuccess(model.id, result.latency_ms)
        plan.recorder.attempt({
          model: model.id,
          attempt,
          outcome: "succeeded",
          latency_ms: result.latency_ms,
          ...(degradeMode ? { degradeMode } : {}),
        })
        this.metrics.increment("router.attempt", { app: plan.appId, model: model.id, provider: model.provider, reason: "succeeded" })
        return result
      } catch (err) {
        if (err instanceof CancelledError) throw this.cancelled(plan)
        const latency = this.clock() - started
        const error = err instanceof TimeoutError
          ? new ProviderError({ errorClass: "timeout", message: err.message })
          : toProviderError(err)
        this.health.recordFailure(model.id, error, latency)
        plan.recorder.attempt({
          model: model.id,
          attempt,
          outcome: error.retryable ? "retryable_error" : "terminal_error",
          errorClass: error.errorClass,
          latency_ms: latency,
          ...(degradeMode ? { degradeMode } : {}),
        })
        this.metrics.increment("router.attempt", { app: plan.appId, model: model.id, provider: model.provider, reason: error.errorClass })

        if (!error.retryable || attempt === maxAttempts) return null
        // A failure that opened the circuit ends retries on this model
        if (this.health.state(model.id) === "open") return null

        const delay = Math.max(calculateBackoff(attempt, this.config, this.random), error.retryAfterMs ?? 0)
        console.warn(
          `[router] retrying ${model.id} (attempt ${attempt + 1}/${maxAttempts}) in ${Math.round(delay)}ms: ${error.message}`,
        )
        await this.sleep(delay, plan.signal)
      }
    }
    return null
  }

  private checkCancelled(plan: InvocationPlan): void {
    if (plan.signal?.aborted) throw this.cancelled(plan)
  }

  private cancelled(plan: InvocationPlan): RoutingError {
    return new RoutingError("CLIENT_CANCELLED", "client_cancelled", "Request cancelled by caller", { appId: plan.appId })
  }
}

// src/safety/output-firewall.ts — Sensitive-output firewall
//
// State machine over the final model output: clean | flagged | redrafted.
// Deterministic detectors always run. A contextual (model-judged) detector is
// consulted only when every deterministic hit is low confidence. Sanitizer and
// contextual failures degrade locally and never fail the request.

import { CancelledError, TimeoutError, withTimeout } from "../shared/async.js"
import { buildDetectorChain, runDetectors } from "./detectors.js"
import type { Detector, DetectorHit } from "./detectors.js"
import { maskSample } from "./masking.js"
import type {
  ContextualStatus,
  FirewallAction,
  FirewallOutcome,
  FirewallPolicy,
  ModelCatalog,
  SanitizingAdapter,
  Violation,
} from "../routing/types.js"

// --- Types ---

export const REWRITE_INSTRUCTION =
  "Rewrite the following text so that it conveys the same meaning without any personal data, " +
  "payment card numbers, government identifiers, credentials or account numbers. " +
  "Replace each removed item with a neutral placeholder. Output only the rewritten text."

export interface ContextualVerdict {
  violation: boolean
}

/** Model-judged second opinion on inconclusive deterministic hits */
export interface ContextualDetector {
  judge(text: string, hits: readonly Violation[], opts: { signal: AbortSignal }): Promise<ContextualVerdict>
}

export interface OutputFirewallConfig {
  sanitizerTimeoutMs: number     // Default: 5000
  contextualTimeoutMs: number    // Default: 1500
}

export const DEFAULT_FIREWALL_CONFIG: OutputFirewallConfig = {
  sanitizerTimeoutMs: 5_000,
  contextualTimeoutMs: 1_500,
}

export interface ScreenOptions {
  override?: FirewallAction
  signal?: AbortSignal
}

export interface ScreenResult {
  output: string
  outcome: FirewallOutcome
}

// --- Firewall ---

export class OutputFirewall {
  private config: OutputFirewallConfig
  private clock: () => number
  // Detector chains are compiled once per (immutable) firewall policy
  private chains = new WeakMap<FirewallPolicy, Detector[]>()

  constructor(
    private deps: {
      catalog: ModelCatalog
      sanitizer?: SanitizingAdapter
      contextual?: ContextualDetector
    },
    config?: Partial<OutputFirewallConfig>,
    opts?: { clock?: () => number },
  ) {
    this.config = { ...DEFAULT_FIREWALL_CONFIG, ...config }
    this.clock = opts?.clock ?? Date.now
  }

  async screen(text: string, policy: FirewallPolicy, opts: ScreenOptions = {}): Promise<ScreenResult> {
    const started = this.clock()
    const action = opts.override ?? policy.defaultAction
    const hits = runDetectors(this.chainFor(policy), text)
    let violations = hits.map(toViolation)

    let contextual: ContextualStatus = "skipped"
    if (this.deps.contextual && isInconclusive(hits)) {
      contextual = await this.runContextual(text, violations, opts.signal)
      if (contextual === "clean") violations = []
    }

    const base = { action, violations, contextual }
    if (violations.length === 0) {
      return {
        output: text,
        outcome: { ...base, state: "clean", redrafted: false, latency_ms: this.clock() - started },
      }
    }

    if (action === "flag") {
      return {
        output: text,
        outcome: { ...base, state: "flagged", redrafted: false, latency_ms: this.clock() - started },
      }
    }

    // Redraft
    const sanitizingModel = policy.sanitizingModel
    const descriptor = sanitizingModel !== undefined ? this.deps.catalog.get(sanitizingModel) : undefined
    const sanitizer = this.deps.sanitizer
    if (!descriptor || !sanitizer) {
      console.warn(`[firewall] redraft requested but no sanitizer is available; returning flagged output`)
      return {
        output: text,
        outcome: {
          ...base,
          state: "flagged",
          redrafted: false,
          degraded: "sanitizer_unavailable",
          latency_ms: this.clock() - started,
        },
      }
    }

    try {
      const result = await withTimeout(
        "sanitizer",
        this.config.sanitizerTimeoutMs,
        signal => sanitizer.sanitize(descriptor, { instruction: REWRITE_INSTRUCTION, text }, { signal }),
        opts.signal,
      )
      return {
        output: result.text,
        outcome: {
          ...base,
          state: "redrafted",
          redrafted: true,
          sanitizingModel: descriptor.id,
          sanitizerUsage: result.usage,
          latency_ms: this.clock() - started,
        },
      }
    } catch (err) {
      if (err instanceof CancelledError) throw err
      const timedOut = err instanceof TimeoutError
      console.warn(`[firewall] sanitizer ${descriptor.id} ${timedOut ? "timed out" : "failed"}:`, err)
      return {
        output: text,
        outcome: {
          ...base,
          state: "flagged",
          redrafted: false,
          sanitizingModel: descriptor.id,
          degraded: timedOut ? "sanitizer_timeout" : "sanitizer_failed",
          latency_ms: this.clock() - started,
        },
      }
    }
  }

  private chainFor(policy: FirewallPolicy): Detector[] {
    let chain = this.chains.get(policy)
    if (!chain) {
      chain = buildDetectorChain(policy)
      this.chains.set(policy, chain)
    }
    return chain
  }

  private async runContextual(
    text: string,
    violations: readonly Violation[],
    outer: AbortSignal | undefined,
  ): Promise<ContextualStatus> {
    const contextual = this.deps.contextual
    if (!contextual) return "skipped"
    try {
      const verdict = await withTimeout(
        "contextual detector",
        this.config.contextualTimeoutMs,
        signal => contextual.judge(text, violations, { signal }),
        outer,
      )
      return verdict.violation ? "violation" : "clean"
    } catch (err) {
      if (err instanceof CancelledError) throw err
      // Deterministic results stand on their own
      if (err instanceof TimeoutError) {
        console.warn(`[firewall] contextual detector timed out after ${err.timeoutMs}ms`)
        return "timeout"
      }
      console.warn("[firewall] contextual detector failed:", err)
      return "error"
    }
  }
}

// --- Helpers ---

/** At least one hit, none of them high confidence */
export function isInconclusive(hits: readonly DetectorHit[]): boolean {
  return hits.length > 0 && hits.every(h => h.confidence === "low")
}

function toViolation(hit: DetectorHit): Violation {
  return {
    detector: hit.detector,
    category: hit.category,
    sample: maskSample(hit.match),
    start: hit.start,
    end: hit.end,
  }
}

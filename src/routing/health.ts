// src/routing/health.ts — Provider health tracking with circuit breaker
// Per provider:model rolling window, circuit state machine, error taxonomy and
// the single-probe admission check for half-open circuits.

import type { ProviderError } from "./errors.js"
import type { Candidate, CandidateSet } from "./types.js"

// --- Circuit Breaker Types ---

export type CircuitState = "closed" | "open" | "half_open"

interface Sample {
  at: number
  ok: boolean
  latencyMs: number
}

export interface HealthEntry {
  key: string
  state: CircuitState
  samples: Sample[]
  recoveryAt?: number            // open → half_open transition time
  latencyBreachSince?: number    // first sample where p95 exceeded the limit
  probeOwner?: string             // request holding the half-open trial slot
  lastError?: string
  totalSuccesses: number
  totalFailures: number
}

export interface HealthTrackerConfig {
  windowMs: number                // Trailing window for failures and latency (default: 60000)
  failureThreshold: number        // Failures in window that open the circuit (default: 5)
  latencyP95Ms: number            // p95 latency limit (default: 10000)
  latencySustainMs: number        // How long p95 must stay above the limit (default: 30000)
  minLatencySamples: number       // Samples required before p95 is trusted (default: 5)
  cooldownMs: number              // open → half_open delay (default: 30000)
  cooldownJitterPercent: number   // ± jitter on the cooldown (default: 0)
  maxSamples: number              // Hard cap on samples kept per key (default: 500)
}

export const DEFAULT_HEALTH_CONFIG: HealthTrackerConfig = {
  windowMs: 60_000,
  failureThreshold: 5,
  latencyP95Ms: 10_000,
  latencySustainMs: 30_000,
  minLatencySamples: 5,
  cooldownMs: 30_000,
  cooldownJitterPercent: 0,
  maxSamples: 500,
}

export type TransitionListener = (key: string, from: CircuitState, to: CircuitState, reason: string) => void

// --- Error Taxonomy ---
// rate_limited → NOT a health failure (quota, not an outage)
// auth_error / bad_request → NOT a health failure (caller problem)
// timeout / server_error / unknown → IS a health failure

const NON_HEALTH_CLASSES = new Set(["rate_limited", "auth_error", "bad_request"])

export function isHealthFailure(error: Pick<ProviderError, "errorClass">): boolean {
  return !NON_HEALTH_CLASSES.has(error.errorClass)
}

export function p95(values: readonly number[]): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  return sorted[Math.max(0, Math.ceil(sorted.length * 0.95) - 1)] ?? 0
}

// --- Read-only view used by the gate and selector ---

export interface HealthView {
  state(key: string): CircuitState
  score(key: string): number
}

// --- HealthTracker ---

/**
 * Shared health state for every provider:model key. All mutations are
 * synchronous per call so each key's transition is atomic with respect to
 * other requests on the event loop.
 */
export class HealthTracker implements HealthView {
  private entries = new Map<string, HealthEntry>()
  private config: HealthTrackerConfig
  private clock: () => number
  private random: () => number
  private listeners: TransitionListener[] = []

  constructor(
    config?: Partial<HealthTrackerConfig>,
    opts?: { clock?: () => number; random?: () => number },
  ) {
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config }
    this.clock = opts?.clock ?? Date.now
    this.random = opts?.random ?? Math.random
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener)
  }

  private getOrCreate(key: string): HealthEntry {
    let entry = this.entries.get(key)
    if (!entry) {
      entry = {
        key,
        state: "closed",
        samples: [],
        totalSuccesses: 0,
        totalFailures: 0,
      }
      this.entries.set(key, entry)
    }
    return entry
  }

  /** Current circuit state; moves open → half_open once the cooldown elapsed */
  state(key: string): CircuitState {
    const entry = this.entries.get(key)
    if (!entry) return "closed"
    this.refresh(entry)
    return entry.state
  }

  /** Derived health in [0,1]: success rate scaled down by excess p95 latency */
  score(key: string): number {
    const entry = this.entries.get(key)
    if (!entry) return 1
    if (this.state(key) === "open") return 0
    const samples = this.windowSamples(entry)
    if (samples.length === 0) return 1

    const successRate = samples.filter(s => s.ok).length / samples.length
    const latency = p95(samples.map(s => s.latencyMs))
    const latencyFactor = latency <= this.config.latencyP95Ms ? 1 : this.config.latencyP95Ms / latency
    return successRate * latencyFactor
  }

  /**
   * Compare-and-swap admission for the half-open trial call.
   * Returns true for exactly one owner until the probe resolves or is released.
   */
  tryAcquireProbe(key: string, owner: string): boolean {
    if (this.state(key) !== "half_open") return false
    const entry = this.getOrCreate(key)
    if (entry.probeOwner !== undefined) return entry.probeOwner === owner
    entry.probeOwner = owner
    return true
  }

  /** Half-open with no probe in flight */
  probeAvailable(key: string): boolean {
    return this.state(key) === "half_open" && this.entries.get(key)?.probeOwner === undefined
  }

  /** Release a probe slot; a stale owner cannot clear a newer probe */
  releaseProbe(key: string, owner: string): void {
    const entry = this.entries.get(key)
    if (entry && entry.probeOwner === owner) entry.probeOwner = undefined
  }

  recordSuccess(key: string, latencyMs: number): void {
    const entry = this.getOrCreate(key)
    this.refresh(entry)
    entry.totalSuccesses++

    if (entry.state === "half_open") {
      entry.probeOwner = undefined
      entry.samples = []
      entry.latencyBreachSince = undefined
      this.transition(entry, "closed", "probe succeeded")
      this.pushSample(entry, { at: this.clock(), ok: true, latencyMs })
      return
    }
    // Stragglers that complete while open do not count as trials
    if (entry.state === "open") return

    this.pushSample(entry, { at: this.clock(), ok: true, latencyMs })
    this.evaluateLatency(entry)
  }

  recordFailure(key: string, error: ProviderError, latencyMs: number): void {
    // Apply error taxonomy — only health failures affect the circuit
    if (!isHealthFailure(error)) {
      if (this.state(key) === "half_open") this.getOrCreate(key).probeOwner = undefined
      return
    }

    const entry = this.getOrCreate(key)
    this.refresh(entry)
    entry.totalFailures++
    entry.lastError = error.message

    if (entry.state === "half_open") {
      entry.probeOwner = undefined
      this.open(entry, "probe failed")
      return
    }
    if (entry.state === "open") return

    this.pushSample(entry, { at: this.clock(), ok: false, latencyMs })
    const failures = this.windowSamples(entry).filter(s => !s.ok).length
    if (failures >= this.config.failureThreshold) {
      this.open(entry, `${failures} failures in ${this.config.windowMs}ms`)
      return
    }
    this.evaluateLatency(entry)
  }

  /** Snapshot for dashboards */
  snapshot(): Record<string, {
    state: CircuitState
    score: number
    successes: number
    failures: number
    probeInFlight: boolean
    lastError?: string
    recoveryAt?: string
  }> {
    const out: ReturnType<HealthTracker["snapshot"]> = {}
    for (const [key, entry] of this.entries) {
      out[key] = {
        state: this.state(key),
        score: this.score(key),
        successes: entry.totalSuccesses,
        failures: entry.totalFailures,
        probeInFlight: entry.probeOwner !== undefined,
        lastError: entry.lastError,
        recoveryAt: entry.recoveryAt !== undefined ? new Date(entry.recoveryAt).toISOString() : undefined,
      }
    }
    return out
  }

  // --- Private helpers ---

  /** open → half_open once the cooldown has elapsed */
  private refresh(entry: HealthEntry): void {
    if (entry.state === "open" && entry.recoveryAt !== undefined && this.clock() >= entry.recoveryAt) {
      this.transition(entry, "half_open", "cooldown elapsed")
    }
  }

  private windowSamples(entry: HealthEntry): Sample[] {
    const cutoff = this.clock() - this.config.windowMs
    entry.samples = entry.samples.filter(s => s.at > cutoff)
    return entry.samples
  }

  private pushSample(entry: HealthEntry, sample: Sample): void {
    entry.samples.push(sample)
    if (entry.samples.length > this.config.maxSamples) {
      entry.samples.splice(0, entry.samples.length - this.config.maxSamples)
    }
  }

  private evaluateLatency(entry: HealthEntry): void {
    const samples = this.windowSamples(entry)
    if (samples.length < this.config.minLatencySamples) {
      entry.latencyBreachSince = undefined
      return
    }
    const latency = p95(samples.map(s => s.latencyMs))
    if (latency <= this.config.latencyP95Ms) {
      entry.latencyBreachSince = undefined
      return
    }
    const now = this.clock()
    entry.latencyBreachSince ??= now
    if (now - entry.latencyBreachSince >= this.config.latencySustainMs) {
      this.open(entry, `p95 ${latency}ms above ${this.config.latencyP95Ms}ms`)
    }
  }

  private open(entry: HealthEntry, reason: string): void {
    entry.recoveryAt = this.calculateRecoveryAt()
    entry.latencyBreachSince = undefined
    this.transition(entry, "open", reason)
  }

  private transition(entry: HealthEntry, to: CircuitState, reason: string): void {
    const from = entry.state
    if (from === to) return
    entry.state = to
    if (to === "closed") entry.recoveryAt = undefined

    const log = to === "open" ? console.warn : console.log
    log(`[health] ${entry.key}: ${from} → ${to} (${reason})`)
    for (const listener of this.listeners) listener(entry.key, from, to, reason)
  }

  private calculateRecoveryAt(): number {
    const base = this.config.cooldownMs
    const jitterRange = base * (this.config.cooldownJitterPercent / 100)
    const jitter = (this.random() * 2 - 1) * jitterRange
    return this.clock() + base + jitter
  }
}

// --- Gate ---

/**
 * Remove candidates whose circuit is open and flag half-open ones as probes.
 * Health score is not used here; it only breaks ties in weighted selection.
 */
export function applyHealthGate(set: CandidateSet, view: HealthView): CandidateSet {
  const candidates: Candidate[] = []
  for (const c of set.candidates) {
    const state = view.state(c.model.id)
    if (state === "open") continue
    candidates.push({ ...c, probe: state === "half_open" })
  }
  return { ...set, candidates }
}

// --- Per-request admission ---

/**
 * Tracks the probe slots one request holds. Closed circuits always admit,
 * open never, half-open only for the request that wins the slot.
 */
export class ProbeSession {
  private held = new Set<string>()

  constructor(private tracker: HealthTracker, private owner: string) {}

  admit(key: string): boolean {
    const state = this.tracker.state(key)
    if (state === "closed") return true
    if (state === "open") return false
    if (this.held.has(key)) return true
    if (!this.tracker.tryAcquireProbe(key, this.owner)) return false
    this.held.add(key)
    return true
  }

  /** Whether admit() could succeed for this request right now, without taking a slot */
  available(key: string): boolean {
    const state = this.tracker.state(key)
    if (state === "closed") return true
    if (state === "open") return false
    return this.held.has(key) || this.tracker.probeAvailable(key)
  }

  /** Give back any slot this request still holds (unused or unresolved probes) */
  release(): void {
    for (const key of this.held) this.tracker.releaseProbe(key, this.owner)
    this.held.clear()
  }
}

// src/routing/lineage.ts — Decision trace building and persistence
//
// TraceBuilder accumulates one request's decisions. LineageRecorder persists
// each finished trace exactly once per audit id: the write is fire-and-forget,
// bounded by a timeout, and failed writes land in a bounded local buffer that
// flush() replays.

import { appendFile, mkdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { KeyedMutex, withTimeout } from "../shared/async.js"
import { deepFreeze } from "../shared/freeze.js"
import type { DenyReason } from "./errors.js"
import type { MetricsSink } from "./metrics.js"
import { noopMetrics } from "./metrics.js"
import type {
  AttemptRecord,
  CandidateSet,
  DecisionTrace,
  ExperimentAssignment,
  FirewallOutcome,
  Policy,
  SubscriptionScope,
  TokenUsage,
  TraceStatus,
} from "./types.js"

// --- Trace Builder ---

/** Receives attempt-level events from the orchestrator */
export interface AttemptRecorder {
  attempt(record: AttemptRecord): void
  skip(modelId: string): void
}

export class TraceBuilder implements AttemptRecorder {
  private trace: DecisionTrace

  constructor(
    auditId: string,
    subject: { tenantId: string; appId: string; teamId?: string },
    private clock: () => number = Date.now,
  ) {
    this.trace = {
      auditId,
      status: "failed",
      tenantId: subject.tenantId,
      appId: subject.appId,
      teamId: subject.teamId,
      stages: [],
      fellBack: false,
      attempts: [],
      skipped: [],
      cost_micro: 0,
      timings: {},
      startedAt: new Date(this.clock()).toISOString(),
    }
  }

  get auditId(): string {
    return this.trace.auditId
  }

  policy(policy: Policy): void {
    this.trace.policyId = policy.id
    this.trace.policyVersion = policy.version
  }

  subscription(scope: SubscriptionScope | undefined, version: number): void {
    this.trace.subscriptionScope = scope
    this.trace.subscriptionVersion = version
  }

  /** Record a filter stage: sizes, removed ids and duration */
  stage(name: string, before: CandidateSet, after: CandidateSet, durationMs: number): void {
    const kept = new Set(after.candidates.map(c => c.model.id))
    this.trace.stages.push({
      stage: name,
      before: before.candidates.length,
      after: after.candidates.length,
      removed: before.candidates.map(c => c.model.id).filter(id => !kept.has(id)),
      duration_ms: durationMs,
    })
    this.trace.timings[name] = durationMs
    if (after.ruleId) this.trace.ruleId = after.ruleId
  }

  timing(label: string, durationMs: number): void {
    this.trace.timings[label] = durationMs
  }

  experiment(assignment: ExperimentAssignment): void {
    this.trace.experiment = assignment
  }

  recommended(modelId: string): void {
    this.trace.recommendedModel = modelId
  }

  attempt(record: AttemptRecord): void {
    this.trace.attempts.push(record)
  }

  skip(modelId: string): void {
    this.trace.skipped.push(modelId)
  }

  served(finalModel: string, fellBack: boolean, usage: TokenUsage): void {
    this.trace.finalModel = finalModel
    this.trace.fellBack = fellBack
    this.trace.usage = usage
  }

  firewall(outcome: FirewallOutcome): void {
    this.trace.firewall = outcome
  }

  cost(costMicro: number): void {
    this.trace.cost_micro = costMicro
  }

  /** Close the trace; the returned record is frozen */
  finish(status: TraceStatus, reason?: DenyReason): DecisionTrace {
    const finishedAt = this.clock()
    this.trace.status = status
    this.trace.reason = reason
    this.trace.completedAt = new Date(finishedAt).toISOString()
    this.trace.timings.total = finishedAt - Date.parse(this.trace.startedAt)
    return deepFreeze(structuredClone(this.trace))
  }
}

// --- Sinks ---

export interface LineageSink {
  /** Append one trace. Implementations should tolerate a replay of the same audit id. */
  write(trace: DecisionTrace): Promise<void>
}

export class InMemoryLineageSink implements LineageSink {
  private traces = new Map<string, DecisionTrace>()
  /** Total write calls, including replays */
  writes = 0

  async write(trace: DecisionTrace): Promise<void> {
    this.writes++
    this.traces.set(trace.auditId, trace)
  }

  get(auditId: string): DecisionTrace | undefined {
    return this.traces.get(auditId)
  }

  all(): DecisionTrace[] {
    return [...this.traces.values()]
  }
}

/**
 * One JSON line per trace, in daily files `lineage-YYYY-MM-DD.jsonl` (UTC day
 * of the request start). Appends to the same file are serialized.
 */
export class JsonlLineageSink implements LineageSink {
  private queue = new KeyedMutex()
  private ensured = false

  constructor(private baseDir: string) {}

  async write(trace: DecisionTrace): Promise<void> {
    const path = this.pathFor(trace.startedAt.slice(0, 10))
    await this.queue.run(path, async () => {
      if (!this.ensured) {
        await mkdir(this.baseDir, { recursive: true })
        this.ensured = true
      }
      await appendFile(path, JSON.stringify(trace) + "\n", "utf8")
    })
  }

  /** Parsed lines of one day's file; [] when the day has no file */
  async readDay(day: string): Promise<unknown[]> {
    let content: string
    try {
      content = await readFile(this.pathFor(day), "utf8")
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return []
      throw err
    }
    return content.split("\n").filter(line => line.length > 0).map((line): unknown => JSON.parse(line))
  }

  private pathFor(day: string): string {
    return join(this.baseDir, `lineage-${day}.jsonl`)
  }
}

// --- Recorder ---

export interface LineageRecorderConfig {
  writeTimeoutMs: number       // Default: 2000
  maxBuffered: number          // Default: 1000 failed writes kept for replay
  maxRemembered: number        // Default: 100000 audit ids kept for dedupe
}

export const DEFAULT_LINEAGE_CONFIG: LineageRecorderConfig = {
  writeTimeoutMs: 2_000,
  maxBuffered: 1_000,
  maxRemembered: 100_000,
}

export class LineageRecorder {
  private config: LineageRecorderConfig
  private metrics: MetricsSink
  private recorded = new Set<string>()
  private pending = new Set<Promise<boolean>>()
  private buffer: DecisionTrace[] = []
  /** Sink writes not yet settled, by audit id; a timed-out write may still land */
  private inFlight = new Map<string, Promise<void>>()

  constructor(
    private sink: LineageSink,
    config?: Partial<LineageRecorderConfig>,
    opts?: { metrics?: MetricsSink },
  ) {
    this.config = { ...DEFAULT_LINEAGE_CONFIG, ...config }
    this.metrics = opts?.metrics ?? noopMetrics
  }

  /**
   * Persist a finished trace without blocking the caller. Returns false when
   * this audit id was already recorded.
   */
  record(trace: DecisionTrace): boolean {
    if (this.recorded.has(trace.auditId)) {
      console.warn(`[lineage] duplicate record for ${trace.auditId} ignored`)
      return false
    }
    this.remember(trace.auditId)

    const write = this.attempt(trace)
    this.pending.add(write)
    void write.finally(() => this.pending.delete(write))
    return true
  }

  /**
   * Replay buffered traces; returns how many were written. Traces whose
   * earlier write is still in flight stay buffered until it settles.
   */
  async flush(): Promise<number> {
    const batch = this.buffer
    this.buffer = []
    let written = 0
    for (const trace of batch) {
      if (this.inFlight.has(trace.auditId)) {
        this.buffer.push(trace)
      } else if (await this.attempt(trace)) {
        written++
      }
    }
    if (written > 0) console.log(`[lineage] replayed ${written}/${batch.length} buffered traces`)
    return written
  }

  /** Wait for in-flight writes, then replay the buffer once */
  async drain(): Promise<number> {
    await Promise.all([...this.pending])
    return this.flush()
  }

  get bufferedCount(): number {
    return this.buffer.length
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** One bounded write; a failed or timed-out trace is buffered for replay */
  private async attempt(trace: DecisionTrace): Promise<boolean> {
    try {
      await withTimeout("lineage write", this.config.writeTimeoutMs, () => this.startWrite(trace))
      return true
    } catch (err) {
      console.warn(`[lineage] write failed for ${trace.auditId}:`, err)
      this.enqueue(trace)
      return false
    }
  }

  private startWrite(trace: DecisionTrace): Promise<void> {
    const auditId = trace.auditId
    const write = this.sink.write(trace)
    this.inFlight.set(auditId, write)
    void write.then(
      () => {
        this.inFlight.delete(auditId)
        this.unbuffer(auditId)
      },
      () => this.inFlight.delete(auditId),
    )
    return write
  }

  /** A write that outlived its timeout landed after all; it must not be replayed */
  private unbuffer(auditId: string): void {
    const before = this.buffer.length
    this.buffer = this.buffer.filter(t => t.auditId !== auditId)
    if (this.buffer.length < before) {
      console.log(`[lineage] late write landed for ${auditId}; removed from replay buffer`)
    }
  }

  private enqueue(trace: DecisionTrace): void {
    if (this.buffer.length >= this.config.maxBuffered) {
      const dropped = this.buffer.shift()
      console.error(`[lineage] buffer full (${this.config.maxBuffered}); dropped trace ${dropped?.auditId}`)
      this.metrics.increment("router.lineage.dropped", { app: dropped?.appId })
    }
    this.buffer.push(trace)
    this.metrics.increment("router.lineage.buffered", { app: trace.appId })
  }

  private remember(auditId: string): void {
    this.recorded.add(auditId)
    if (this.recorded.size > this.config.maxRemembered) {
      // Sets iterate in insertion order; evict the oldest id
      const oldest = this.recorded.values().next()
      if (!oldest.done) this.recorded.delete(oldest.value)
    }
  }
}

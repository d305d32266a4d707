// tests/routing/lineage.test.ts — Decision traces, exactly-once recording and JSONL sink

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { applyCompliance } from "../../src/routing/compliance.js"
import { evaluatePolicy } from "../../src/routing/evaluator.js"
import {
  InMemoryLineageSink,
  JsonlLineageSink,
  LineageRecorder,
  TraceBuilder,
} from "../../src/routing/lineage.js"
import type { LineageSink } from "../../src/routing/lineage.js"
import { InMemoryMetricsSink } from "../../src/routing/metrics.js"
import type { DecisionTrace } from "../../src/routing/types.js"
import { ctx, manualClock, testCatalog, testPolicy } from "../helpers/routing.js"

const clock = manualClock()

function trace(auditId: string): DecisionTrace {
  return new TraceBuilder(auditId, { tenantId: "t1", appId: "support" }, clock.now).finish("succeeded")
}

// --- Mock Sinks ---

/** Fails while `failing` is true, then stores like the in-memory sink */
class FlakySink implements LineageSink {
  failing = true
  readonly stored = new InMemoryLineageSink()

  async write(t: DecisionTrace): Promise<void> {
    if (this.failing) throw new Error("disk full")
    await this.stored.write(t)
  }
}

/** Stores each trace only after `delayMs`, outliving a shorter write timeout */
class SlowSink implements LineageSink {
  readonly stored: string[] = []

  constructor(private delayMs: number) {}

  async write(t: DecisionTrace): Promise<void> {
    await new Promise(resolve => setTimeout(resolve, this.delayMs))
    this.stored.push(t.auditId)
  }
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {})
  vi.spyOn(console, "warn").mockImplementation(() => {})
  vi.spyOn(console, "error").mockImplementation(() => {})
})

// --- Tests ---

describe("TraceBuilder", () => {
  it("records stages with the ids each one removed", () => {
    const catalog = testCatalog()
    const policy = testPolicy(catalog)
    const before = evaluatePolicy(policy, ctx(), catalog)
    const after = applyCompliance(before, ctx({ tags: ["pii"] }), policy.compliance)

    const builder = new TraceBuilder("audit-1", { tenantId: "t1", appId: "support", teamId: "billing" }, clock.now)
    builder.policy(policy)
    builder.subscription("app", 3)
    builder.stage("compliance", before, after, 2)
    const finished = builder.finish("succeeded")

    expect(finished.stages).toEqual([
      { stage: "compliance", before: 4, after: 2, removed: ["acme:fast-1", "acme:pro-1"], duration_ms: 2 },
    ])
    expect(finished.ruleId).toBe("default")
    expect(finished.policyId).toBe("support-policy")
    expect(finished.policyVersion).toBe(1)
    expect(finished.subscriptionScope).toBe("app")
    expect(finished.subscriptionVersion).toBe(3)
    expect(finished.teamId).toBe("billing")
  })

  it("closes with status, reason and total duration", () => {
    const local = manualClock()
    const builder = new TraceBuilder("audit-2", { tenantId: "t1", appId: "support" }, local.now)
    local.advance(250)
    const finished = builder.finish("denied", "compliance_block")

    expect(finished.status).toBe("denied")
    expect(finished.reason).toBe("compliance_block")
    expect(finished.startedAt).toBe("2026-03-15T12:00:00.000Z")
    expect(finished.completedAt).toBe("2026-03-15T12:00:00.250Z")
    expect(finished.timings.total).toBe(250)
    expect(Object.isFrozen(finished)).toBe(true)
    expect(Object.isFrozen(finished.attempts)).toBe(true)
  })

  it("collects attempts, skips and the served model", () => {
    const builder = new TraceBuilder("audit-3", { tenantId: "t1", appId: "support" }, clock.now)
    builder.recommended("acme:fast-1")
    builder.skip("acme:pro-1")
    builder.attempt({ model: "acme:fast-1", attempt: 1, outcome: "terminal_error", errorClass: "auth_error", latency_ms: 5 })
    builder.served("inhouse:guard-1", true, { prompt_tokens: 10, completion_tokens: 5 })
    builder.cost(40)
    const finished = builder.finish("succeeded")

    expect(finished.recommendedModel).toBe("acme:fast-1")
    expect(finished.finalModel).toBe("inhouse:guard-1")
    expect(finished.fellBack).toBe(true)
    expect(finished.skipped).toEqual(["acme:pro-1"])
    expect(finished.attempts).toHaveLength(1)
    expect(finished.cost_micro).toBe(40)
  })
})

describe("LineageRecorder", () => {
  it("persists each audit id exactly once", async () => {
    const sink = new InMemoryLineageSink()
    const recorder = new LineageRecorder(sink)

    expect(recorder.record(trace("audit-1"))).toBe(true)
    expect(recorder.record(trace("audit-1"))).toBe(false)
    await recorder.drain()

    expect(sink.writes).toBe(1)
    expect(sink.get("audit-1")?.status).toBe("succeeded")
  })

  it("does not block the caller on the write", () => {
    const sink: LineageSink = { write: () => new Promise(() => {}) }
    const recorder = new LineageRecorder(sink, { writeTimeoutMs: 10 })
    expect(recorder.record(trace("audit-1"))).toBe(true)
    expect(recorder.pendingCount).toBe(1)
  })

  it("buffers failed writes and replays them on flush", async () => {
    const sink = new FlakySink()
    const metrics = new InMemoryMetricsSink()
    const recorder = new LineageRecorder(sink, {}, { metrics })

    recorder.record(trace("audit-1"))
    await recorder.drain()
    expect(recorder.bufferedCount).toBe(1)
    expect(metrics.count("router.lineage.buffered", { app: "support" })).toBe(2)

    sink.failing = false
    expect(await recorder.flush()).toBe(1)
    expect(recorder.bufferedCount).toBe(0)
    expect(sink.stored.get("audit-1")?.auditId).toBe("audit-1")
  })

  it("buffers writes that exceed the timeout", async () => {
    const sink: LineageSink = { write: () => new Promise(() => {}) }
    const recorder = new LineageRecorder(sink, { writeTimeoutMs: 10 })
    recorder.record(trace("audit-1"))
    await vi.waitFor(() => expect(recorder.bufferedCount).toBe(1))
    expect(recorder.pendingCount).toBe(0)
  })

  it("does not replay a timed-out write that lands later", async () => {
    const sink = new SlowSink(50)
    const recorder = new LineageRecorder(sink, { writeTimeoutMs: 10 })
    recorder.record(trace("audit-1"))

    // The first write is still in flight, so the replay leaves it buffered
    expect(await recorder.drain()).toBe(0)
    expect(recorder.bufferedCount).toBe(1)

    await vi.waitFor(() => expect(recorder.bufferedCount).toBe(0))
    expect(await recorder.flush()).toBe(0)
    expect(sink.stored).toEqual(["audit-1"])
  })

  it("replays a timed-out write that later fails", async () => {
    let calls = 0
    const sink: LineageSink = {
      write: async () => {
        calls++
        if (calls === 1) {
          await new Promise(resolve => setTimeout(resolve, 30))
          throw new Error("disk full")
        }
      },
    }
    const recorder = new LineageRecorder(sink, { writeTimeoutMs: 10 })
    recorder.record(trace("audit-1"))
    await recorder.drain()

    await new Promise(resolve => setTimeout(resolve, 60))
    expect(recorder.bufferedCount).toBe(1)
    expect(await recorder.flush()).toBe(1)
    expect(calls).toBe(2)
  })

  it("drops the oldest buffered trace when the buffer is full", async () => {
    const sink = new FlakySink()
    const metrics = new InMemoryMetricsSink()
    const recorder = new LineageRecorder(sink, { maxBuffered: 2 }, { metrics })

    recorder.record(trace("audit-1"))
    recorder.record(trace("audit-2"))
    recorder.record(trace("audit-3"))
    await recorder.drain()
    expect(recorder.bufferedCount).toBe(2)
    expect(metrics.count("router.lineage.dropped")).toBe(1)

    sink.failing = false
    expect(await recorder.flush()).toBe(2)
    expect(sink.stored.all().map(t => t.auditId)).toEqual(["audit-2", "audit-3"])
  })

  it("forgets the oldest audit ids beyond the dedupe bound", async () => {
    const sink = new InMemoryLineageSink()
    const recorder = new LineageRecorder(sink, { maxRemembered: 2 })
    recorder.record(trace("audit-1"))
    recorder.record(trace("audit-2"))
    recorder.record(trace("audit-3"))
    expect(recorder.record(trace("audit-3"))).toBe(false)
    expect(recorder.record(trace("audit-1"))).toBe(true)
    await recorder.drain()
    expect(sink.writes).toBe(4)
  })
})

describe("JsonlLineageSink", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lineage-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("appends one line per trace to the request's UTC day file", async () => {
    const sink = new JsonlLineageSink(join(dir, "nested"))
    await Promise.all([sink.write(trace("audit-1")), sink.write(trace("audit-2"))])

    const lines = await sink.readDay("2026-03-15")
    expect(lines).toHaveLength(2)
    expect(lines).toContainEqual(expect.objectContaining({ auditId: "audit-1", status: "succeeded" }))
    expect(lines).toContainEqual(expect.objectContaining({ auditId: "audit-2", status: "succeeded" }))
  })

  it("returns no lines for a day without a file", async () => {
    expect(await new JsonlLineageSink(dir).readDay("2026-03-16")).toEqual([])
  })

  it("stores what the recorder persists", async () => {
    const sink = new JsonlLineageSink(dir)
    const recorder = new LineageRecorder(sink)
    recorder.record(trace("audit-9"))
    await recorder.drain()
    expect(await sink.readDay("2026-03-15")).toEqual([JSON.parse(JSON.stringify(trace("audit-9")))])
  })

  it("holds one line for a write that outlived the recorder's timeout", async () => {
    const jsonl = new JsonlLineageSink(dir)
    const slow: LineageSink = {
      write: async t => {
        await new Promise(resolve => setTimeout(resolve, 50))
        await jsonl.write(t)
      },
    }
    const recorder = new LineageRecorder(slow, { writeTimeoutMs: 10 })
    recorder.record(trace("audit-7"))
    await recorder.drain()
    await vi.waitFor(() => expect(recorder.bufferedCount).toBe(0))
    await recorder.drain()

    expect(await jsonl.readDay("2026-03-15")).toHaveLength(1)
  })
})

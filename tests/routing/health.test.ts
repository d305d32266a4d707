// tests/routing/health.test.ts — Circuit breaker, health score and probe admission

import { describe, it, expect, vi, beforeEach } from "vitest"
import { HealthTracker, ProbeSession, applyHealthGate, isHealthFailure, p95 } from "../../src/routing/health.js"
import { evaluatePolicy } from "../../src/routing/evaluator.js"
import { ctx, manualClock, testCatalog, testPolicy, transient, terminal } from "../helpers/routing.js"

const KEY = "acme:fast-1"

function tracker(config: ConstructorParameters<typeof HealthTracker>[0] = {}) {
  const clock = manualClock()
  const health = new HealthTracker({ failureThreshold: 3, ...config }, { clock: clock.now })
  return { health, clock }
}

function openCircuit(health: HealthTracker, key = KEY): void {
  for (let i = 0; i < 3; i++) health.recordFailure(key, transient("server_error"), 50)
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {})
  vi.spyOn(console, "warn").mockImplementation(() => {})
})

describe("error taxonomy", () => {
  it("counts only outages as health failures", () => {
    expect(isHealthFailure(transient("timeout"))).toBe(true)
    expect(isHealthFailure(transient("server_error"))).toBe(true)
    expect(isHealthFailure(transient("rate_limited"))).toBe(false)
    expect(isHealthFailure(terminal("auth_error"))).toBe(false)
    expect(isHealthFailure(terminal("bad_request"))).toBe(false)
  })
})

describe("p95", () => {
  it("uses the nearest-rank percentile", () => {
    expect(p95([])).toBe(0)
    expect(p95([5])).toBe(5)
    expect(p95(Array.from({ length: 20 }, (_, i) => 20 - i))).toBe(19)
  })
})

describe("HealthTracker", () => {
  describe("state transitions", () => {
    it("starts closed for unknown keys", () => {
      const { health } = tracker()
      expect(health.state(KEY)).toBe("closed")
      expect(health.score(KEY)).toBe(1)
    })

    it("opens after the failure threshold within the window", () => {
      const { health } = tracker()
      const transitions: string[] = []
      health.onTransition((key, from, to, reason) => transitions.push(`${key} ${from}→${to} ${reason}`))

      openCircuit(health)
      expect(health.state(KEY)).toBe("open")
      expect(health.score(KEY)).toBe(0)
      expect(transitions).toEqual(["acme:fast-1 closed→open 3 failures in 60000ms"])
    })

    it("forgets failures that fall out of the window", () => {
      const { health, clock } = tracker()
      health.recordFailure(KEY, transient(), 50)
      health.recordFailure(KEY, transient(), 50)
      clock.advance(60_001)
      health.recordFailure(KEY, transient(), 50)
      expect(health.state(KEY)).toBe("closed")
    })

    it("ignores rate limits and caller errors", () => {
      const { health } = tracker()
      for (let i = 0; i < 5; i++) {
        health.recordFailure(KEY, transient("rate_limited"), 50)
        health.recordFailure(KEY, terminal("bad_request"), 50)
      }
      expect(health.state(KEY)).toBe("closed")
      expect(health.snapshot()[KEY]).toBeUndefined()
    })

    it("moves to half-open once the cooldown elapses", () => {
      const { health, clock } = tracker()
      openCircuit(health)
      clock.advance(29_999)
      expect(health.state(KEY)).toBe("open")
      clock.advance(1)
      expect(health.state(KEY)).toBe("half_open")
    })

    it("closes on a successful probe and reopens on a failed one", () => {
      const { health, clock } = tracker()
      openCircuit(health)
      clock.advance(30_000)
      health.recordFailure(KEY, transient("timeout"), 50)
      expect(health.state(KEY)).toBe("open")

      clock.advance(30_000)
      expect(health.state(KEY)).toBe("half_open")
      health.recordSuccess(KEY, 120)
      expect(health.state(KEY)).toBe("closed")
      expect(health.score(KEY)).toBe(1)
    })

    it("opens on sustained p95 latency above the limit", () => {
      const { health, clock } = tracker({ latencyP95Ms: 1000, latencySustainMs: 5000, minLatencySamples: 3 })
      for (let i = 0; i < 3; i++) health.recordSuccess(KEY, 2000)
      expect(health.state(KEY)).toBe("closed")
      clock.advance(4_999)
      health.recordSuccess(KEY, 2000)
      expect(health.state(KEY)).toBe("closed")
      clock.advance(1)
      health.recordSuccess(KEY, 2000)
      expect(health.state(KEY)).toBe("open")
    })

    it("resets the latency breach when p95 recovers", () => {
      const { health, clock } = tracker({
        windowMs: 2000, latencyP95Ms: 1000, latencySustainMs: 5000, minLatencySamples: 1,
      })
      health.recordSuccess(KEY, 2000)
      clock.advance(3_000)
      health.recordSuccess(KEY, 100)
      clock.advance(3_000)
      // Breach restarts here rather than 6s ago
      health.recordSuccess(KEY, 2000)
      expect(health.state(KEY)).toBe("closed")
    })
  })

  describe("score", () => {
    it("is the success rate scaled by excess latency", () => {
      const { health } = tracker({ failureThreshold: 5 })
      for (let i = 0; i < 4; i++) health.recordSuccess(KEY, 100)
      health.recordFailure(KEY, transient(), 100)
      expect(health.score(KEY)).toBe(0.8)

      const slow = tracker({ latencyP95Ms: 1000 }).health
      slow.recordSuccess("inhouse:guard-1", 2000)
      expect(slow.score("inhouse:guard-1")).toBe(0.5)
    })
  })

  describe("probe slot", () => {
    it("admits exactly one owner while half-open", () => {
      const { health, clock } = tracker()
      expect(health.tryAcquireProbe(KEY, "a")).toBe(false)
      openCircuit(health)
      clock.advance(30_000)

      expect(health.probeAvailable(KEY)).toBe(true)
      expect(health.tryAcquireProbe(KEY, "a")).toBe(true)
      expect(health.tryAcquireProbe(KEY, "b")).toBe(false)
      expect(health.tryAcquireProbe(KEY, "a")).toBe(true)
      expect(health.snapshot()[KEY]?.probeInFlight).toBe(true)
    })

    it("ignores a release from a non-owner", () => {
      const { health, clock } = tracker()
      openCircuit(health)
      clock.advance(30_000)
      health.tryAcquireProbe(KEY, "a")
      health.releaseProbe(KEY, "b")
      expect(health.probeAvailable(KEY)).toBe(false)
      health.releaseProbe(KEY, "a")
      expect(health.probeAvailable(KEY)).toBe(true)
    })

    it("frees the slot when the probe hits a non-health error", () => {
      const { health, clock } = tracker()
      openCircuit(health)
      clock.advance(30_000)
      health.tryAcquireProbe(KEY, "a")
      health.recordFailure(KEY, transient("rate_limited"), 50)
      expect(health.state(KEY)).toBe("half_open")
      expect(health.probeAvailable(KEY)).toBe(true)
    })
  })
})

describe("applyHealthGate", () => {
  it("drops open circuits and marks half-open candidates as probes", () => {
    const catalog = testCatalog()
    const set = evaluatePolicy(testPolicy(catalog), ctx(), catalog)
    const { health, clock } = tracker()
    openCircuit(health, "acme:pro-1")
    clock.advance(30_000)
    openCircuit(health, "acme:fast-1")

    const gated = applyHealthGate(set, health)
    expect(gated.candidates.map(c => [c.model.id, c.probe])).toEqual([
      ["acme:pro-1", true],
      ["inhouse:guard-1", false],
      ["inhouse:mini-1", false],
    ])
  })
})

describe("ProbeSession", () => {
  function halfOpen() {
    const t = tracker()
    openCircuit(t.health)
    t.clock.advance(30_000)
    return t.health
  }

  it("always admits closed circuits and never open ones", () => {
    const { health } = tracker()
    openCircuit(health, "acme:pro-1")
    const session = new ProbeSession(health, "req-1")
    expect(session.admit(KEY)).toBe(true)
    expect(session.admit("acme:pro-1")).toBe(false)
    expect(session.available("acme:pro-1")).toBe(false)
  })

  it("lets one request hold a half-open slot until it releases", () => {
    const health = halfOpen()
    const first = new ProbeSession(health, "req-1")
    const second = new ProbeSession(health, "req-2")

    expect(first.available(KEY)).toBe(true)
    expect(second.available(KEY)).toBe(true)
    expect(first.admit(KEY)).toBe(true)
    expect(first.available(KEY)).toBe(true)
    expect(second.available(KEY)).toBe(false)
    expect(second.admit(KEY)).toBe(false)

    first.release()
    expect(second.admit(KEY)).toBe(true)
  })

  it("cannot release a slot another request acquired after it", () => {
    const health = halfOpen()
    const stale = new ProbeSession(health, "req-1")
    stale.admit(KEY)
    // Probe ends without resolving health; the slot frees up
    health.recordFailure(KEY, transient("rate_limited"), 50)

    const fresh = new ProbeSession(health, "req-2")
    expect(fresh.admit(KEY)).toBe(true)
    stale.release()
    expect(new ProbeSession(health, "req-3").admit(KEY)).toBe(false)
  })
})

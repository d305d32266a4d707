// tests/config.test.ts — Environment configuration loading

import { describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"
import { catchRoutingError } from "./helpers/routing.js"

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})
    expect(config.catalogPath).toBe("config/models.json")
    expect(config.policyDir).toBe("config/policies")
    expect(config.subscriptionsPath).toBe("config/subscriptions.json")
    expect(config.experimentsPath).toBeUndefined()
    expect(config.orchestrator).toEqual({
      maxAttempts: 3,
      baseDelayMs: 200,
      maxDelayMs: 5000,
      jitterPercent: 20,
      invokeTimeoutMs: 30000,
    })
    expect(config.health.failureThreshold).toBe(5)
    expect(config.health.cooldownMs).toBe(30000)
    expect(config.firewall).toEqual({ sanitizerTimeoutMs: 5000, contextualTimeoutMs: 1500 })
    expect(config.lineage).toEqual({
      dir: "data/lineage",
      writeTimeoutMs: 2000,
      maxBuffered: 1000,
      maxRemembered: 100000,
    })
    expect(config.redis).toBeUndefined()
    expect(config.metrics).toBe("console")
  })

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      ROUTER_MAX_ATTEMPTS: "5",
      CIRCUIT_COOLDOWN_MS: "0",
      LINEAGE_DIR: "/var/lib/governor/lineage",
      ROUTER_EXPERIMENTS_PATH: "config/experiments.json",
      ROUTER_METRICS: "none",
    })
    expect(config.orchestrator.maxAttempts).toBe(5)
    expect(config.health.cooldownMs).toBe(0)
    expect(config.lineage.dir).toBe("/var/lib/governor/lineage")
    expect(config.experimentsPath).toBe("config/experiments.json")
    expect(config.metrics).toBe("none")
  })

  it("configures the shared spend store when REDIS_URL is set", () => {
    const config = loadConfig({ REDIS_URL: "redis://localhost:6379", REDIS_COMMAND_TIMEOUT_MS: "1000" })
    expect(config.redis).toEqual({
      url: "redis://localhost:6379",
      keyPrefix: "governor",
      connectTimeoutMs: 5000,
      commandTimeoutMs: 1000,
    })
  })

  it("rejects malformed integers", () => {
    const err = catchRoutingError(() => loadConfig({ ROUTER_BACKOFF_BASE_MS: "200ms" }))
    expect(err.code).toBe("CONFIG_INVALID")
    expect(err.message).toBe('[router] CONFIG_INVALID(config_invalid): ROUTER_BACKOFF_BASE_MS must be a valid integer (got "200ms")')
  })

  it("rejects integers below the minimum", () => {
    const err = catchRoutingError(() => loadConfig({ ROUTER_MAX_ATTEMPTS: "0" }))
    expect(err.message).toBe("[router] CONFIG_INVALID(config_invalid): ROUTER_MAX_ATTEMPTS must be >= 1 (got 0)")
  })

  it("rejects an unknown metrics mode", () => {
    const err = catchRoutingError(() => loadConfig({ ROUTER_METRICS: "prometheus" }))
    expect(err.message).toBe('[router] CONFIG_INVALID(config_invalid): ROUTER_METRICS must be "console" or "none" (got "prometheus")')
  })
})

// src/index.ts — Public API and boot helper
//
// createGovernor() wires the engine from a GovernorConfig: catalog, policies,
// subscriptions and experiments are read from disk, spend goes to Redis when
// REDIS_URL is set and to process memory otherwise.

import { readdirSync, readFileSync } from "node:fs"
import { join } from "node:path"
import type { GovernorConfig } from "./config.js"
import { BudgetLedger, InMemorySpendStore } from "./routing/budget.js"
import type { SpendStore } from "./routing/budget.js"
import { RoutingEngine } from "./routing/engine.js"
import { ExperimentRegistry } from "./routing/experiments.js"
import { HealthTracker } from "./routing/health.js"
import { JsonlLineageSink, LineageRecorder } from "./routing/lineage.js"
import { ConsoleMetricsSink, noopMetrics } from "./routing/metrics.js"
import { InMemoryPolicyStore, loadPolicyFile } from "./routing/policy.js"
import { createRedisClient } from "./routing/redis/client.js"
import type { RedisCommandClient } from "./routing/redis/client.js"
import { RedisSpendStore } from "./routing/redis/spend-store.js"
import { ModelRegistry } from "./routing/registry.js"
import { InMemorySubscriptionStore } from "./routing/subscriptions.js"
import type { ContextualDetector } from "./safety/output-firewall.js"
import type { ProviderAdapter, SanitizingAdapter } from "./routing/types.js"

export { loadConfig } from "./config.js"
export type { GovernorConfig, MetricsMode } from "./config.js"
export * from "./routing/types.js"
export * from "./routing/errors.js"
export { ModelRegistry } from "./routing/registry.js"
export { loadPolicy, loadPolicyFile, InMemoryPolicyStore, WEIGHT_TOLERANCE } from "./routing/policy.js"
export type { PolicyStore } from "./routing/policy.js"
export { evaluatePolicy, matchCondition, matchRule } from "./routing/evaluator.js"
export { resolveSubscriptions, InMemorySubscriptionStore } from "./routing/subscriptions.js"
export type { SubscriptionStore } from "./routing/subscriptions.js"
export { applyCompliance, externalBlockReason } from "./routing/compliance.js"
export { RouteRequestSchema, toRequestContext, traceSubject } from "./routing/request.js"
export { HealthTracker, ProbeSession, applyHealthGate, isHealthFailure } from "./routing/health.js"
export type { CircuitState, HealthTrackerConfig, HealthView } from "./routing/health.js"
export { BudgetLedger, InMemorySpendStore, applyBudgetGate, deriveBudgetKey } from "./routing/budget.js"
export type { BudgetSnapshot, BudgetState, SpendStore } from "./routing/budget.js"
export { ExperimentRegistry, applyExperimentOverlay, bucketFor } from "./routing/experiments.js"
export type { ExperimentDefinition, ExperimentSnapshot, ExperimentTicket } from "./routing/experiments.js"
export { selectCandidate, seedFromAuditId, mulberry32 } from "./routing/selector.js"
export type { Selection } from "./routing/selector.js"
export { InvocationOrchestrator, calculateBackoff } from "./routing/orchestrator.js"
export type { OrchestratorConfig } from "./routing/orchestrator.js"
export { calculateCostMicro, calculateTotalCostMicro } from "./routing/pricing.js"
export {
  TraceBuilder,
  LineageRecorder,
  InMemoryLineageSink,
  JsonlLineageSink,
} from "./routing/lineage.js"
export type { LineageSink, LineageRecorderConfig } from "./routing/lineage.js"
export { ConsoleMetricsSink, InMemoryMetricsSink, noopMetrics } from "./routing/metrics.js"
export type { MetricsSink, MetricLabels } from "./routing/metrics.js"
export { RedisSpendStore } from "./routing/redis/spend-store.js"
export { createRedisClient } from "./routing/redis/client.js"
export type { RedisCommandClient, RedisConfig } from "./routing/redis/client.js"
export { RoutingEngine } from "./routing/engine.js"
export type { RoutingEngineDeps, RoutingEngineConfig, RouteOptions } from "./routing/engine.js"
export { OutputFirewall, REWRITE_INSTRUCTION } from "./safety/output-firewall.js"
export type { ContextualDetector, OutputFirewallConfig } from "./safety/output-firewall.js"
export { BUILTIN_DETECTOR_IDS, buildDetectorChain, luhnValid, ibanValid } from "./safety/detectors.js"
export { maskSample } from "./safety/masking.js"

// --- Boot ---

export interface GovernorAdapters {
  adapter: ProviderAdapter
  sanitizer?: SanitizingAdapter
  contextual?: ContextualDetector
}

export interface Governor {
  engine: RoutingEngine
  catalog: ModelRegistry
  policies: InMemoryPolicyStore
  subscriptions: InMemorySubscriptionStore
  experiments: ExperimentRegistry
  health: HealthTracker
  lineage: LineageRecorder
  /** Drain pending lineage writes and close the Redis connection */
  close(): Promise<void>
}

function readJson(path: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"))
  return parsed
}

export function createGovernor(config: GovernorConfig, adapters: GovernorAdapters): Governor {
  const metrics = config.metrics === "console" ? new ConsoleMetricsSink() : noopMetrics

  const catalog = ModelRegistry.fromFile(config.catalogPath)
  console.log(`[boot] Loaded ${catalog.list().length} models from ${config.catalogPath}`)

  const policies = new InMemoryPolicyStore()
  const policyFiles = readdirSync(config.policyDir).filter(f => f.endsWith(".json")).sort()
  for (const file of policyFiles) {
    policies.publish(loadPolicyFile(join(config.policyDir, file), catalog))
  }

  const subscriptions = new InMemorySubscriptionStore(readJson(config.subscriptionsPath))

  const experiments = new ExperimentRegistry()
  if (config.experimentsPath) {
    const raw = readJson(config.experimentsPath)
    const list: unknown[] = Array.isArray(raw) ? raw : [raw]
    for (const def of list) experiments.register(def)
  }

  let redis: RedisCommandClient | undefined
  let spendStore: SpendStore
  if (config.redis) {
    redis = createRedisClient(config.redis)
    spendStore = new RedisSpendStore(redis, config.redis.keyPrefix)
  } else {
    console.warn("[boot] REDIS_URL not set; spend is tracked in process memory only")
    spendStore = new InMemorySpendStore()
  }

  const health = new HealthTracker(config.health)
  const { dir, ...lineageConfig } = config.lineage
  const lineage = new LineageRecorder(new JsonlLineageSink(dir), lineageConfig, { metrics })

  const engine = new RoutingEngine(
    {
      catalog,
      policies,
      subscriptions,
      health,
      budget: new BudgetLedger(spendStore),
      adapter: adapters.adapter,
      sanitizer: adapters.sanitizer,
      contextual: adapters.contextual,
      lineage,
      experiments,
      metrics,
    },
    { orchestrator: config.orchestrator, firewall: config.firewall },
  )

  return {
    engine,
    catalog,
    policies,
    subscriptions,
    experiments,
    health,
    lineage,
    async close() {
      const flushed = await lineage.drain()
      if (lineage.bufferedCount > 0) {
        console.error(`[boot] ${lineage.bufferedCount} traces still buffered at shutdown (${flushed} replayed)`)
      }
      if (redis) await redis.quit()
    },
  }
}

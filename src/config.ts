// src/config.ts — Configuration loader from environment variables
//
// Every tunable has a default; integers fail fast when malformed.

import { RoutingError } from "./routing/errors.js"
import type { HealthTrackerConfig } from "./routing/health.js"
import type { LineageRecorderConfig } from "./routing/lineage.js"
import type { OrchestratorConfig } from "./routing/orchestrator.js"
import type { RedisConfig } from "./routing/redis/client.js"
import type { OutputFirewallConfig } from "./safety/output-firewall.js"

export type MetricsMode = "console" | "none"

export interface GovernorConfig {
  // Configuration files
  catalogPath: string
  policyDir: string
  subscriptionsPath: string
  experimentsPath?: string

  orchestrator: OrchestratorConfig
  health: HealthTrackerConfig
  firewall: OutputFirewallConfig
  lineage: LineageRecorderConfig & {
    /** Directory for daily JSONL trace files */
    dir: string
  }

  /** Shared spend store; in-process when unset */
  redis?: RedisConfig

  metrics: MetricsMode
}

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, envKey: string, fallback: string, min = 0): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value) || String(value) !== raw.trim()) {
    throw new RoutingError("CONFIG_INVALID", "config_invalid", `${envKey} must be a valid integer (got "${raw}")`)
  }
  if (value < min) {
    throw new RoutingError("CONFIG_INVALID", "config_invalid", `${envKey} must be >= ${min} (got ${value})`)
  }
  return value
}

function parseMetricsMode(value: string | undefined): MetricsMode {
  if (value === undefined || value === "console") return "console"
  if (value === "none") return "none"
  throw new RoutingError("CONFIG_INVALID", "config_invalid", `ROUTER_METRICS must be "console" or "none" (got "${value}")`)
}

export function loadConfig(env: Env = process.env): GovernorConfig {
  const redisUrl = env.REDIS_URL

  return {
    catalogPath: env.ROUTER_CATALOG_PATH ?? "config/models.json",
    policyDir: env.ROUTER_POLICY_DIR ?? "config/policies",
    subscriptionsPath: env.ROUTER_SUBSCRIPTIONS_PATH ?? "config/subscriptions.json",
    experimentsPath: env.ROUTER_EXPERIMENTS_PATH || undefined,

    orchestrator: {
      maxAttempts: parseIntEnv(env, "ROUTER_MAX_ATTEMPTS", "3", 1),
      baseDelayMs: parseIntEnv(env, "ROUTER_BACKOFF_BASE_MS", "200"),
      maxDelayMs: parseIntEnv(env, "ROUTER_BACKOFF_MAX_MS", "5000"),
      jitterPercent: parseIntEnv(env, "ROUTER_BACKOFF_JITTER_PERCENT", "20"),
      invokeTimeoutMs: parseIntEnv(env, "ROUTER_INVOKE_TIMEOUT_MS", "30000", 1),
    },

    health: {
      windowMs: parseIntEnv(env, "CIRCUIT_WINDOW_MS", "60000", 1),
      failureThreshold: parseIntEnv(env, "CIRCUIT_FAILURE_THRESHOLD", "5", 1),
      latencyP95Ms: parseIntEnv(env, "CIRCUIT_LATENCY_P95_MS", "10000", 1),
      latencySustainMs: parseIntEnv(env, "CIRCUIT_LATENCY_SUSTAIN_MS", "30000"),
      minLatencySamples: parseIntEnv(env, "CIRCUIT_MIN_LATENCY_SAMPLES", "5", 1),
      cooldownMs: parseIntEnv(env, "CIRCUIT_COOLDOWN_MS", "30000"),
      cooldownJitterPercent: parseIntEnv(env, "CIRCUIT_COOLDOWN_JITTER_PERCENT", "0"),
      maxSamples: parseIntEnv(env, "CIRCUIT_MAX_SAMPLES", "500", 1),
    },

    firewall: {
      sanitizerTimeoutMs: parseIntEnv(env, "FIREWALL_SANITIZER_TIMEOUT_MS", "5000", 1),
      contextualTimeoutMs: parseIntEnv(env, "FIREWALL_CONTEXTUAL_TIMEOUT_MS", "1500", 1),
    },

    lineage: {
      dir: env.LINEAGE_DIR ?? "data/lineage",
      writeTimeoutMs: parseIntEnv(env, "LINEAGE_WRITE_TIMEOUT_MS", "2000", 1),
      maxBuffered: parseIntEnv(env, "LINEAGE_MAX_BUFFERED", "1000", 1),
      maxRemembered: parseIntEnv(env, "LINEAGE_MAX_REMEMBERED", "100000", 1),
    },

    redis: redisUrl
      ? {
          url: redisUrl,
          keyPrefix: env.REDIS_KEY_PREFIX ?? "governor",
          connectTimeoutMs: parseIntEnv(env, "REDIS_CONNECT_TIMEOUT_MS", "5000", 1),
          commandTimeoutMs: parseIntEnv(env, "REDIS_COMMAND_TIMEOUT_MS", "3000", 1),
        }
      : undefined,

    metrics: parseMetricsMode(env.ROUTER_METRICS),
  }
}

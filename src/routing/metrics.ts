// src/routing/metrics.ts — Routing metrics sink
// Counters and histograms keyed by {app, model, provider, reason}.
// Default implementation logs to console; production can swap for OTLP/StatsD.

// --- Types ---

export interface MetricLabels {
  app?: string
  model?: string
  provider?: string
  reason?: string
}

/**
 * Signals emitted by the engine:
 *   router.requests               — Counter by app, reason (outcome)
 *   router.deny                   — Counter by app, reason
 *   router.stage.duration_ms      — Histogram by reason (stage name)
 *   router.budget                 — Counter by app, reason (low / exhausted)
 *   router.attempt                — Counter by model, provider, reason (outcome)
 *   router.fallback               — Counter by app, model
 *   router.skip                   — Counter by app, model (circuit not admitting)
 *   router.degrade                — Counter by app, model
 *   router.circuit.transition     — Counter by model, reason (new state)
 *   router.firewall               — Counter by app, reason (state / degrade)
 *   router.experiment.rollback    — Counter by app, reason (experiment id)
 *   router.spend.record_failed    — Counter by app
 *   router.lineage.buffered       — Counter by app
 *   router.lineage.dropped        — Counter by app
 *   router.cost_micro             — Histogram by app, model
 *   router.latency_ms             — Histogram by app, model
 */
export interface MetricsSink {
  increment(metric: string, labels?: MetricLabels, value?: number): void
  observe(metric: string, value: number, labels?: MetricLabels): void
}

// --- Noop Implementation ---

/** No-op metrics — used when no collector is configured. */
export const noopMetrics: MetricsSink = {
  increment() {},
  observe() {},
}

// --- Console Implementation ---

/** Emits JSON-structured log lines compatible with log aggregation pipelines. */
export class ConsoleMetricsSink implements MetricsSink {
  increment(metric: string, labels: MetricLabels = {}, value = 1): void {
    console.log(JSON.stringify({
      metric,
      type: "counter",
      ...labels,
      value,
      ts: new Date().toISOString(),
    }))
  }

  observe(metric: string, value: number, labels: MetricLabels = {}): void {
    console.log(JSON.stringify({
      metric,
      type: "histogram",
      ...labels,
      value,
      ts: new Date().toISOString(),
    }))
  }
}

// --- In-Memory Implementation ---

export interface RecordedMetric {
  metric: string
  type: "counter" | "histogram"
  labels: MetricLabels
  value: number
}

/** Captures every emission; used by tests and local diagnostics. */
export class InMemoryMetricsSink implements MetricsSink {
  readonly records: RecordedMetric[] = []

  increment(metric: string, labels: MetricLabels = {}, value = 1): void {
    this.records.push({ metric, type: "counter", labels, value })
  }

  observe(metric: string, value: number, labels: MetricLabels = {}): void {
    this.records.push({ metric, type: "histogram", labels, value })
  }

  /** Sum of counter values for a metric whose labels include `match` */
  count(metric: string, match: MetricLabels = {}): number {
    return this.records
      .filter(r => r.type === "counter" && r.metric === metric && labelsMatch(r.labels, match))
      .reduce((sum, r) => sum + r.value, 0)
  }
}

const LABEL_KEYS = ["app", "model", "provider", "reason"] as const

function labelsMatch(labels: MetricLabels, match: MetricLabels): boolean {
  return LABEL_KEYS.every(k => match[k] === undefined || labels[k] === match[k])
}

// src/routing/types.ts — Shared routing engine types
// Request context, policy model, candidates, traces and collaborator ports.

import type { DenyReason, ProviderErrorClass } from "./errors.js"

// --- Request Context ---

/** Declared data sensitivity, ordered from least to most sensitive */
export type Sensitivity = "public" | "internal" | "confidential" | "restricted"

export const SENSITIVITY_LEVELS: readonly Sensitivity[] = ["public", "internal", "confidential", "restricted"]

/** Rank of a sensitivity level; an unrecognized level ranks as the most sensitive */
export function sensitivityRank(level: string): number {
  const rank = SENSITIVITY_LEVELS.findIndex(known => known === level)
  return rank === -1 ? SENSITIVITY_LEVELS.length - 1 : rank
}

export type FirewallAction = "flag" | "redraft"

export interface RequestOptions {
  maxTokens?: number
  temperature?: number
  firewallAction?: FirewallAction
}

/** Immutable per-request snapshot created once at ingress */
export interface RequestContext {
  readonly tenantId: string
  readonly appId: string
  readonly teamId?: string
  readonly userRole: string
  readonly sensitivity: Sensitivity
  readonly tokenEstimate: number
  readonly language: string
  readonly tags: readonly string[]
  /** Stable key for experiment bucketing. Defaults to tenant:app:team. */
  readonly requestKey?: string
  readonly options: Readonly<RequestOptions>
}

// --- Model Registry ---

export type ComplianceTag = "internal" | "external"

export interface ModelPricing {
  input_micro_per_million: number       // micro-USD per 1M input tokens
  output_micro_per_million: number      // micro-USD per 1M output tokens
}

export interface ModelDescriptor {
  id: string                            // "provider:model"
  provider: string
  model: string
  version: string
  pricing: ModelPricing
  capabilities: readonly string[]
  compliance: ComplianceTag
  enabled: boolean
}

/** Blended per-million price used to rank candidates by cost */
export function blendedPrice(model: ModelDescriptor): number {
  return model.pricing.input_micro_per_million + model.pricing.output_micro_per_million
}

export interface ModelCatalog {
  get(id: string): ModelDescriptor | undefined
  list(): readonly ModelDescriptor[]
}

// --- Policy ---

export type ConditionField =
  | "tenantId"
  | "appId"
  | "teamId"
  | "userRole"
  | "sensitivity"
  | "tokenEstimate"
  | "language"
  | "tags"

export type Condition =
  | { field: ConditionField; op: "eq" | "neq" | "lt" | "gte"; value: string | number }
  | { field: ConditionField; op: "in"; value: readonly string[] }

export interface WeightedChoice {
  model: string
  weight: number
}

export type Directive =
  | { kind: "single"; model: string }
  | { kind: "weighted"; choices: readonly WeightedChoice[] }
  | { kind: "ordered"; models: readonly string[] }

export type DirectiveKind = Directive["kind"]

export interface PolicyRule {
  id: string
  description?: string
  /** Conjunction; an empty list matches every request */
  when: readonly Condition[]
  directive: Directive
}

export type SubscriptionScope = "tenant" | "app" | "team"

export interface ComplianceRules {
  /** External models are removed when sensitivity ranks above this level */
  externalMaxSensitivity: Sensitivity
  /** Requests carrying any of these tags may only use internal models */
  blockedTags: readonly string[]
}

export interface BudgetLimits {
  monthlyLimitMicro: number
  /** Below this remaining amount candidates are reordered cheapest-first */
  lowWaterMarkMicro: number
  /** When exhausted, only candidates at or under this blended price survive */
  minimalCostMicroPerMillion: number
}

export interface CustomPattern {
  id: string
  category: string
  pattern: string
  flags?: string
}

export interface FirewallPolicy {
  defaultAction: FirewallAction
  /** Built-in detector ids, evaluated in this order */
  detectors: readonly string[]
  customPatterns: readonly CustomPattern[]
  /** Registry id of the model used to redraft flagged output */
  sanitizingModel?: string
}

export interface Policy {
  id: string
  appId: string
  version: number
  rules: readonly PolicyRule[]
  fallbacks: Readonly<Record<string, readonly string[]>>
  subscriptionPrecedence: readonly SubscriptionScope[]
  compliance: ComplianceRules
  budget: BudgetLimits
  firewall: FirewallPolicy
  degrade: { minimalCompletion: boolean }
}

// --- Subscriptions ---

export interface Subscription {
  id: string
  scope: SubscriptionScope
  target: string
  models: readonly string[]
  enabled: boolean
}

export interface SubscriptionSnapshot {
  version: number
  subscriptions: readonly Subscription[]
}

// --- Candidates ---

export interface Candidate {
  model: ModelDescriptor
  weight: number
  ruleId: string
  origin: "directive" | "fallback"
  /** Half-open circuit: this request carries the trial call */
  probe: boolean
}

export interface CandidateSet {
  ruleId: string
  directive: DirectiveKind
  candidates: readonly Candidate[]
  /** Set by the budget gate at low budget: candidates are cheapest-first and selection keeps that order */
  downgraded?: boolean
}

// --- Provider Ports ---

export interface TokenUsage {
  prompt_tokens: number
  completion_tokens: number
}

export interface InvocationResult {
  text: string
  usage: TokenUsage
  latency_ms: number
}

export interface NormalizedInput {
  prompt: string
  system?: string
}

export interface InvokeOptions {
  maxTokens?: number
  temperature?: number
  signal?: AbortSignal
}

/** Calls a model; throws ProviderError on failure */
export interface ProviderAdapter {
  invoke(model: ModelDescriptor, input: NormalizedInput, options: InvokeOptions): Promise<InvocationResult>
}

export interface SanitizeInput {
  instruction: string
  text: string
}

/** Rewrites flagged output; reports its own latency for SLO accounting */
export interface SanitizingAdapter {
  sanitize(model: ModelDescriptor, input: SanitizeInput, options: InvokeOptions): Promise<InvocationResult>
}

// --- Firewall Outcome ---

export type FirewallState = "clean" | "flagged" | "redrafted"

export interface Violation {
  detector: string
  category: string
  /** Masked sample; never more than 4 trailing characters of the span */
  sample: string
  start: number
  end: number
}

export type ContextualStatus = "skipped" | "clean" | "violation" | "timeout" | "error"

export interface FirewallOutcome {
  state: FirewallState
  action: FirewallAction
  violations: Violation[]
  redrafted: boolean
  sanitizingModel?: string
  degraded?: "sanitizer_failed" | "sanitizer_timeout" | "sanitizer_unavailable"
  contextual: ContextualStatus
  sanitizerUsage?: TokenUsage
  latency_ms: number
}

// --- Decision Trace ---

export type TraceStatus = "succeeded" | "denied" | "failed" | "client_cancelled"

export type AttemptOutcome = "succeeded" | "retryable_error" | "terminal_error"

export interface AttemptRecord {
  model: string
  attempt: number
  outcome: AttemptOutcome
  errorClass?: ProviderErrorClass
  latency_ms: number
  degradeMode?: boolean
}

export interface StageRecord {
  stage: string
  before: number
  after: number
  removed: string[]
  duration_ms: number
}

export interface ExperimentAssignment {
  experimentId: string
  arm: "control" | "variant"
  applied: boolean
}

export interface DecisionTrace {
  auditId: string
  status: TraceStatus
  reason?: DenyReason
  tenantId: string
  appId: string
  teamId?: string
  policyId?: string
  policyVersion?: number
  ruleId?: string
  subscriptionScope?: SubscriptionScope
  subscriptionVersion?: number
  stages: StageRecord[]
  recommendedModel?: string
  finalModel?: string
  fellBack: boolean
  attempts: AttemptRecord[]
  /** Chain entries passed over because their circuit opened mid-request */
  skipped: string[]
  experiment?: ExperimentAssignment
  firewall?: FirewallOutcome
  usage?: TokenUsage
  cost_micro: number
  timings: Record<string, number>
  startedAt: string
  completedAt?: string
}

// --- Public Request / Response ---

export interface RouteRequest {
  appId: string
  input: NormalizedInput
  /** `sensitivity` outside SENSITIVITY_LEVELS is treated as "restricted" */
  context: Omit<RequestContext, "appId" | "options" | "sensitivity"> & { sensitivity: string }
  options?: RequestOptions
}

export interface RouteResponse {
  auditId: string
  output: string
  recommendedModel: string
  finalModel: string
  fellBack: boolean
  ruleId: string
  usage: TokenUsage
  cost_micro: number
  firewall: FirewallOutcome
}

// src/routing/errors.ts — Routing engine typed error classes

/** Error codes surfaced by the routing engine */
export type RoutingErrorCode =
  | "POLICY_DENY"
  | "EXHAUSTED_FALLBACK"
  | "INVALID_POLICY"
  | "CLIENT_CANCELLED"
  | "CONFIG_INVALID"
  | "INTERNAL_ERROR"

/** Reason codes attached to denies and failures (also used as metric labels) */
export type DenyReason =
  | "no_eligible_model"
  | "budget_exceeded"
  | "compliance_block"
  | "exhausted_fallback"
  | "client_cancelled"
  | "invalid_policy"
  | "config_invalid"
  | "internal_error"
  | "invalid_request"

/** Typed error for all routing operations */
export class RoutingError extends Error {
  readonly name = "RoutingError"
  readonly code: RoutingErrorCode
  readonly reason: DenyReason
  readonly context: Record<string, unknown>
  /** Audit id of the request this error belongs to ("" for load-time errors) */
  auditId: string
  remediation?: string

  constructor(
    code: RoutingErrorCode,
    reason: DenyReason,
    message: string,
    context: Record<string, unknown> = {},
    opts?: { auditId?: string; remediation?: string },
  ) {
    super(`[router] ${code}(${reason}): ${message}`)
    this.code = code
    this.reason = reason
    this.context = context
    this.auditId = opts?.auditId ?? ""
    this.remediation = opts?.remediation
  }

  /** PolicyDeny errors are reported to the caller and never retried */
  get isDeny(): boolean {
    return this.code === "POLICY_DENY"
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      reason: this.reason,
      audit_id: this.auditId,
      message: this.message,
      remediation: this.remediation,
      context: this.context,
    }
  }
}

export function policyDeny(reason: DenyReason, message: string, context: Record<string, unknown> = {}): RoutingError {
  return new RoutingError("POLICY_DENY", reason, message, context)
}

/** Provider error classes reported by a ProviderAdapter */
export type ProviderErrorClass =
  | "timeout"
  | "rate_limited"
  | "server_error"
  | "auth_error"
  | "bad_request"

const RETRYABLE_CLASSES: ReadonlySet<ProviderErrorClass> = new Set(["timeout", "rate_limited", "server_error"])

export function isRetryableClass(errorClass: ProviderErrorClass): boolean {
  return RETRYABLE_CLASSES.has(errorClass)
}

/**
 * Error thrown by provider and sanitizing adapters.
 * `retryable` defaults from the class: timeout, rate limit and 5xx are transient.
 */
export class ProviderError extends Error {
  readonly name = "ProviderError"
  readonly errorClass: ProviderErrorClass
  readonly retryable: boolean
  readonly retryAfterMs?: number
  readonly statusCode?: number

  constructor(opts: {
    errorClass: ProviderErrorClass
    message: string
    retryAfterMs?: number
    statusCode?: number
    retryable?: boolean
  }) {
    super(`[provider] ${opts.errorClass}: ${opts.message}`)
    this.errorClass = opts.errorClass
    this.retryable = opts.retryable ?? isRetryableClass(opts.errorClass)
    this.retryAfterMs = opts.retryAfterMs
    this.statusCode = opts.statusCode
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      error_class: this.errorClass,
      message: this.message,
      status_code: this.statusCode,
      retryable: this.retryable,
      retry_after_ms: this.retryAfterMs,
    }
  }
}

/** Normalize any thrown value into a ProviderError (unknown errors are server errors) */
export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new ProviderError({ errorClass: "server_error", message })
}

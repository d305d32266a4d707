// src/routing/request.ts — Route request validation and RequestContext construction

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { policyDeny } from "./errors.js"
import { SENSITIVITY_LEVELS } from "./types.js"
import type { RequestContext, RouteRequest, Sensitivity } from "./types.js"

export const RouteRequestSchema = Type.Object({
  appId: Type.String({ minLength: 1 }),
  input: Type.Object({
    prompt: Type.String(),
    system: Type.Optional(Type.String()),
  }),
  context: Type.Object({
    tenantId: Type.String({ minLength: 1 }),
    teamId: Type.Optional(Type.String()),
    userRole: Type.String(),
    sensitivity: Type.String({ minLength: 1 }),
    tokenEstimate: Type.Number({ minimum: 0 }),
    language: Type.String(),
    tags: Type.Array(Type.String()),
    requestKey: Type.Optional(Type.String()),
  }),
  options: Type.Optional(Type.Object({
    maxTokens: Type.Optional(Type.Integer({ minimum: 1 })),
    temperature: Type.Optional(Type.Number({ minimum: 0 })),
    firewallAction: Type.Optional(Type.Union([Type.Literal("flag"), Type.Literal("redraft")])),
  })),
})

export interface TraceSubject {
  tenantId: string
  appId: string
  teamId?: string
}

/** Identity fields for the decision trace, read without trusting the request's shape */
export function traceSubject(raw: unknown): TraceSubject {
  const request = isRecord(raw) ? raw : {}
  const context = isRecord(request.context) ? request.context : {}
  return {
    tenantId: typeof context.tenantId === "string" ? context.tenantId : "",
    appId: typeof request.appId === "string" ? request.appId : "",
    teamId: typeof context.teamId === "string" ? context.teamId : undefined,
  }
}

/**
 * Validate a route request and freeze it into the per-request context.
 * Malformed requests are denied with `invalid_request`.
 */
export function toRequestContext(request: RouteRequest): RequestContext {
  if (!Value.Check(RouteRequestSchema, request)) {
    const errors = [...Value.Errors(RouteRequestSchema, request)].map(e => `${e.path || "/"}: ${e.message}`)
    throw policyDeny("invalid_request", `Malformed route request: ${errors.join("; ")}`, { errors })
  }
  return Object.freeze({
    ...request.context,
    appId: request.appId,
    sensitivity: normalizeSensitivity(request.context.sensitivity),
    tags: Object.freeze([...request.context.tags]),
    options: Object.freeze({ ...request.options }),
  })
}

function normalizeSensitivity(level: string): Sensitivity {
  const known = SENSITIVITY_LEVELS.find(s => s === level)
  if (known) return known
  console.warn(`[router] unknown sensitivity "${level}", treating as restricted`)
  return "restricted"
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

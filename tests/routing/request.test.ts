// tests/routing/request.test.ts — Route request validation

import { describe, it, expect, vi, beforeEach } from "vitest"
import { toRequestContext, traceSubject } from "../../src/routing/request.js"
import type { RouteRequest } from "../../src/routing/types.js"
import { catchRoutingError } from "../helpers/routing.js"

function request(context: Partial<RouteRequest["context"]> = {}): RouteRequest {
  return {
    appId: "support",
    input: { prompt: "Where is my order?" },
    context: {
      tenantId: "t1",
      teamId: "billing",
      userRole: "agent",
      sensitivity: "internal",
      tokenEstimate: 500,
      language: "en",
      tags: ["vip"],
      ...context,
    },
    options: { maxTokens: 256 },
  }
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {})
})

describe("toRequestContext", () => {
  it("freezes a valid request into the request context", () => {
    const ctx = toRequestContext(request())
    expect(ctx).toEqual({
      tenantId: "t1",
      appId: "support",
      teamId: "billing",
      userRole: "agent",
      sensitivity: "internal",
      tokenEstimate: 500,
      language: "en",
      tags: ["vip"],
      options: { maxTokens: 256 },
    })
    expect(Object.isFrozen(ctx)).toBe(true)
    expect(Object.isFrozen(ctx.tags)).toBe(true)
  })

  it("does not share the caller's tags array", () => {
    const tags = ["vip"]
    const ctx = toRequestContext(request({ tags }))
    tags.push("pii")
    expect(ctx.tags).toEqual(["vip"])
  })

  it("maps an unknown sensitivity level to restricted", () => {
    expect(toRequestContext(request({ sensitivity: "high" })).sensitivity).toBe("restricted")
  })

  it("denies a request with a negative token estimate", () => {
    const err = catchRoutingError(() => toRequestContext(request({ tokenEstimate: -1 })))
    expect(err.code).toBe("POLICY_DENY")
    expect(err.reason).toBe("invalid_request")
    expect(err.message).toContain("/context/tokenEstimate")
  })

  it("denies an unknown firewall action", () => {
    const raw = request()
    Reflect.set(raw, "options", { firewallAction: "block" })
    const err = catchRoutingError(() => toRequestContext(raw))
    expect(err.reason).toBe("invalid_request")
    expect(err.message).toContain("/options/firewallAction")
  })
})

describe("traceSubject", () => {
  it("reads tenant, app and team from a well-formed request", () => {
    expect(traceSubject(request())).toEqual({ tenantId: "t1", appId: "support", teamId: "billing" })
  })

  it("falls back to empty ids when the shape is wrong", () => {
    expect(traceSubject({ appId: 7, context: "none" })).toEqual({ tenantId: "", appId: "", teamId: undefined })
    expect(traceSubject(null)).toEqual({ tenantId: "", appId: "", teamId: undefined })
  })
})

// tests/routing/registry.test.ts — Model catalog loading

import { describe, it, expect } from "vitest"
import { ModelRegistry } from "../../src/routing/registry.js"
import { catchRoutingError, testCatalog } from "../helpers/routing.js"

describe("ModelRegistry", () => {
  it("keys models by provider:model", () => {
    const catalog = testCatalog()
    expect(catalog.list().map(m => m.id)).toEqual([
      "acme:fast-1",
      "acme:pro-1",
      "inhouse:guard-1",
      "inhouse:mini-1",
      "sanitize:scrub-1",
      "legacy:old-1",
    ])
    expect(catalog.get("inhouse:guard-1")).toEqual({
      id: "inhouse:guard-1",
      provider: "inhouse",
      model: "guard-1",
      version: "1.2.0",
      pricing: { input_micro_per_million: 2_000_000, output_micro_per_million: 4_000_000 },
      capabilities: ["chat"],
      compliance: "internal",
      enabled: true,
    })
  })

  it("marks models of a disabled provider as disabled", () => {
    expect(testCatalog().get("legacy:old-1")?.enabled).toBe(false)
  })

  it("freezes descriptors", () => {
    const model = testCatalog().get("acme:fast-1")
    expect(Object.isFrozen(model)).toBe(true)
    expect(Object.isFrozen(model?.pricing)).toBe(true)
  })

  it("rejects catalogs that fail schema validation", () => {
    const err = catchRoutingError(() =>
      ModelRegistry.fromConfig({ providers: { acme: { models: { "fast-1": { version: "1" } } } } }),
    )
    expect(err.code).toBe("CONFIG_INVALID")
    expect(err.message).toBe("[router] CONFIG_INVALID(config_invalid): Model catalog failed schema validation")
  })
})

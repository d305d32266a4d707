// src/routing/registry.ts — Immutable model registry snapshot

import { readFileSync } from "node:fs"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RoutingError } from "./errors.js"
import type { ComplianceTag, ModelCatalog, ModelDescriptor } from "./types.js"

// --- Raw catalog schema ---

const RawModelSchema = Type.Object({
  version: Type.String({ minLength: 1 }),
  pricing: Type.Object({
    input_micro_per_million: Type.Integer({ minimum: 0 }),
    output_micro_per_million: Type.Integer({ minimum: 0 }),
  }),
  capabilities: Type.Optional(Type.Array(Type.String())),
  compliance: Type.Union([Type.Literal("internal"), Type.Literal("external")]),
  enabled: Type.Optional(Type.Boolean()),
})

const RawProviderSchema = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  models: Type.Record(Type.String(), RawModelSchema),
})

export const RawCatalogSchema = Type.Object({
  providers: Type.Record(Type.String(), RawProviderSchema),
})

export type RawCatalog = Static<typeof RawCatalogSchema>

// --- ModelRegistry ---

/**
 * Read-only snapshot of model descriptors keyed by "provider:model".
 * Models of a disabled provider are kept but marked disabled so policy
 * validation can name them.
 */
export class ModelRegistry implements ModelCatalog {
  private models: ReadonlyMap<string, ModelDescriptor>

  private constructor(models: Map<string, ModelDescriptor>) {
    this.models = models
  }

  /** Factory — validates the raw catalog and freezes every descriptor */
  static fromConfig(raw: unknown): ModelRegistry {
    if (!Value.Check(RawCatalogSchema, raw)) {
      const errors = [...Value.Errors(RawCatalogSchema, raw)].map(e => `${e.path || "/"}: ${e.message}`)
      throw new RoutingError("CONFIG_INVALID", "config_invalid", "Model catalog failed schema validation", { errors })
    }

    const models = new Map<string, ModelDescriptor>()
    for (const [provider, rawProvider] of Object.entries(raw.providers)) {
      const providerEnabled = rawProvider.enabled !== false
      for (const [model, rawModel] of Object.entries(rawProvider.models)) {
        const id = `${provider}:${model}`
        const compliance: ComplianceTag = rawModel.compliance
        models.set(id, Object.freeze({
          id,
          provider,
          model,
          version: rawModel.version,
          pricing: Object.freeze({ ...rawModel.pricing }),
          capabilities: Object.freeze([...(rawModel.capabilities ?? [])]),
          compliance,
          enabled: providerEnabled && rawModel.enabled !== false,
        }))
      }
    }
    return new ModelRegistry(models)
  }

  static fromFile(path: string): ModelRegistry {
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"))
    return ModelRegistry.fromConfig(raw)
  }

  get(id: string): ModelDescriptor | undefined {
    return this.models.get(id)
  }

  list(): readonly ModelDescriptor[] {
    return [...this.models.values()]
  }
}

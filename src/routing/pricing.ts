// src/routing/pricing.ts — Integer micro-USD cost calculation
// All prices are micro-USD per million tokens. 1 USD = 1,000,000 micro-USD.
// No floating point anywhere in the cost path.

import type { ModelPricing, TokenUsage } from "./types.js"

/**
 * cost_micro = floor((tokens * price_micro_per_million) / 1_000_000)
 * Throws when the product leaves the safe-integer range.
 */
export function calculateCostMicro(tokens: number, priceMicroPerMillion: number): number {
  const product = tokens * priceMicroPerMillion
  if (product > Number.MAX_SAFE_INTEGER) {
    throw new Error(`COST_OVERFLOW: tokens(${tokens}) * price(${priceMicroPerMillion}) = ${product} exceeds MAX_SAFE_INTEGER`)
  }
  return Math.floor(product / 1_000_000)
}

export interface CostBreakdownMicro {
  input_cost_micro: number
  output_cost_micro: number
  total_cost_micro: number
}

export function calculateTotalCostMicro(usage: TokenUsage, pricing: ModelPricing): CostBreakdownMicro {
  const input = calculateCostMicro(usage.prompt_tokens, pricing.input_micro_per_million)
  const output = calculateCostMicro(usage.completion_tokens, pricing.output_micro_per_million)
  return {
    input_cost_micro: input,
    output_cost_micro: output,
    total_cost_micro: input + output,
  }
}

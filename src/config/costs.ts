/**
 * Cost Configuration
 *
 * Token pricing for the completion models and the cost calculation applied
 * to each successful recommendation. All costs are in USD.
 *
 * @module config/costs
 */


/**
 * Per-model token prices (USD per million tokens)
 */
export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

/**
 * Token costs per model
 */
export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'gpt-4': {
    inputPerMillion: 3.0,
    outputPerMillion: 12.0,
  },
  'gpt-3.5-turbo': {
    inputPerMillion: 0.5,
    outputPerMillion: 1.5,
  },
};

/**
 * Token usage reported by a completion call
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

/**
 * The cheapest entry in a price table (lowest input price).
 */
export function lowestTierPricing(table: Readonly<Record<string, ModelPricing>> = MODEL_PRICING): ModelPricing {
  const entries = Object.values(table);
  if (entries.length === 0) {
    throw new Error('Price table is empty');
  }
  return entries.reduce((lowest, entry) =>
    entry.inputPerMillion < lowest.inputPerMillion ? entry : lowest
  );
}

/**
 * Look up pricing for a model, falling back to the lowest tier for unknown names.
 */
export function getModelPricing(
  model: string,
  table: Readonly<Record<string, ModelPricing>> = MODEL_PRICING
): ModelPricing {
  return table[model] ?? lowestTierPricing(table);
}

/**
 * Calculate cost for token usage
 *
 * @example
 * ```typescript
 * calculateTokenCost('gpt-4', { promptTokens: 1_000_000, completionTokens: 0 }); // 3.0
 * ```
 */
export function calculateTokenCost(
  model: string,
  usage: TokenUsage,
  table: Readonly<Record<string, ModelPricing>> = MODEL_PRICING
): number {
  const pricing = getModelPricing(model, table);
  const inputCost = (usage.promptTokens / 1_000_000) * pricing.inputPerMillion;
  const outputCost = (usage.completionTokens / 1_000_000) * pricing.outputPerMillion;
  return inputCost + outputCost;
}

/**
 * Format cost for display (e.g., "$0.0450")
 */
export function formatCost(cost: number): string {
  if (cost < 0.01) {
    return `$${cost.toFixed(6)}`;
  }
  return `$${cost.toFixed(2)}`;
}

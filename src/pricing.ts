// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model pricing constants - single source of truth.
 *
 * Pricing per 1K tokens (in USD).
 */

export interface ModelPricing {
  input: number;
  output: number;
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Anthropic Claude models
  'claude-sonnet-4-20250514': { input: 0.003, output: 0.015 },
  'claude-opus-4-20250514': { input: 0.015, output: 0.075 },

  // OpenAI models
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-4o': { input: 0.005, output: 0.015 },
  'text-embedding-3-small': { input: 0.00002, output: 0 },
};

/**
 * Get pricing for a model with prefix matching fallback.
 * Returns null if the model is not priced.
 */
export function getModelPricing(model: string): ModelPricing | null {
  // Try exact match first
  const exact = MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  // Try prefix match (e.g., "gpt-4o-2024-08-06" matches "gpt-4o"); longest key wins
  let best: { key: string; pricing: ModelPricing } | null = null;
  for (const [key, pricing] of Object.entries(MODEL_PRICING)) {
    if (model.startsWith(key) && (!best || key.length > best.key.length)) {
      best = { key, pricing };
    }
  }

  return best ? best.pricing : null;
}

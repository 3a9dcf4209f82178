// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Usage tracking and cost estimation for provider calls.
 */
import { logger } from './logger.js';
import { getModelPricing } from './pricing.js';
import type { TokenUsage } from './types.js';

/**
 * Aggregated usage statistics.
 */
export interface UsageStats {
  /** Number of successful requests */
  totalRequests: number;
  /** Total estimated cost in USD */
  totalCost: number;
  /** Average cost per request in USD */
  avgCostPerRequest: number;
  /** Usage by model */
  byModel: Record<string, {
    inputTokens: number;
    outputTokens: number;
    cost: number;
    requests: number;
  }>;
}

/** Models we already warned about, so the log is not flooded */
const warnedModels = new Set<string>();

/**
 * Calculate the cost for a given usage.
 * Unpriced models cost nothing and produce a one-time warning.
 */
export function calculateCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): number {
  const pricing = getModelPricing(model);
  if (!pricing) {
    if (!warnedModels.has(model)) {
      warnedModels.add(model);
      logger.warn(`Unknown model for cost calculation: ${model}`);
    }
    return 0;
  }
  const inputCost = (inputTokens / 1000) * pricing.input;
  const outputCost = (outputTokens / 1000) * pricing.output;
  return inputCost + outputCost;
}

/**
 * Process-wide running cost total.
 *
 * Owned by the provider gateway; everything else only reads it.
 * Increments happen synchronously after a call resolves, so concurrent
 * producers cannot lose updates.
 */
export class CostTracker {
  private totalCost = 0;
  private requests = 0;
  private byModel: UsageStats['byModel'] = {};

  /**
   * Record a successful call and return its cost.
   */
  record(model: string, usage: TokenUsage): number {
    const cost = calculateCost(model, usage.inputTokens, usage.outputTokens);

    this.totalCost += cost;
    this.requests++;

    const entry = this.byModel[model] ?? { inputTokens: 0, outputTokens: 0, cost: 0, requests: 0 };
    entry.inputTokens += usage.inputTokens;
    entry.outputTokens += usage.outputTokens;
    entry.cost += cost;
    entry.requests++;
    this.byModel[model] = entry;

    return cost;
  }

  /**
   * Running total in USD.
   */
  getTotal(): number {
    return this.totalCost;
  }

  getStats(): UsageStats {
    const byModel: UsageStats['byModel'] = {};
    for (const [model, entry] of Object.entries(this.byModel)) {
      byModel[model] = { ...entry };
    }
    return {
      totalRequests: this.requests,
      totalCost: Math.round(this.totalCost * 10000) / 10000,
      avgCostPerRequest: Math.round((this.totalCost / Math.max(this.requests, 1)) * 10000) / 10000,
      byModel,
    };
  }

  reset(): void {
    this.totalCost = 0;
    this.requests = 0;
    this.byModel = {};
  }
}

/**
 * Format cost as a dollar string.
 */
export function formatCost(cost: number): string {
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}

/**
 * Format token count with K/M suffix.
 */
export function formatTokens(tokens: number): string {
  if (tokens >= 1_000_000) {
    return `${(tokens / 1_000_000).toFixed(1)}M`;
  }
  if (tokens >= 1_000) {
    return `${(tokens / 1_000).toFixed(1)}K`;
  }
  return tokens.toString();
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Provider Gateway
 *
 * Single entry point for model calls made by producers. Routes each call
 * to the primary provider, fails over once to the fallback, and records
 * the cost of every successful call.
 */

import { logger } from '../logger.js';
import type { CostTracker } from '../usage.js';
import type { BaseProvider } from './base.js';
import { ProviderError, classifyProviderError, toError } from './errors.js';

/**
 * Result of a successful gateway call.
 */
export interface GatewayResponse {
  content: string;
  /** Cost of this call in USD */
  cost: number;
  tokenUsage: { input: number; output: number };
  elapsedMs: number;
  model: string;
  provider: string;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can answer a prompt pair. Producers depend on this
 * rather than on the concrete gateway so tests can substitute it.
 */
export interface PromptInvoker {
  invoke(systemPrompt: string, userPrompt: string, options?: InvokeOptions): Promise<GatewayResponse>;
}

export class ProviderGateway implements PromptInvoker {
  constructor(
    private readonly primary: BaseProvider,
    private readonly fallback: BaseProvider | null,
    private readonly costs: CostTracker
  ) {}

  async invoke(systemPrompt: string, userPrompt: string, options: InvokeOptions = {}): Promise<GatewayResponse> {
    const { signal } = options;
    if (signal?.aborted) {
      throw this.abortedError(this.primary, signal);
    }

    try {
      return await this.call(this.primary, systemPrompt, userPrompt, signal);
    } catch (primaryError) {
      const err = toError(primaryError);
      logger.warn(`${this.primary.getName()} (${this.primary.getModel()}) failed: ${err.message}`);

      // Cancelled by the caller; failing over would just be cancelled too
      if (signal?.aborted) {
        throw this.abortedError(this.primary, signal);
      }

      if (!this.fallback) {
        throw new ProviderError(
          `Primary provider failed: ${err.message}`,
          classifyProviderError(err),
          this.primary.getName(),
          this.primary.getModel(),
          err
        );
      }

      logger.verbose(`Falling back to ${this.fallback.getName()} (${this.fallback.getModel()})`);
      try {
        return await this.call(this.fallback, systemPrompt, userPrompt, signal);
      } catch (fallbackError) {
        const ferr = toError(fallbackError);
        logger.warn(`${this.fallback.getName()} (${this.fallback.getModel()}) failed: ${ferr.message}`);
        throw new ProviderError(
          `Both primary and fallback providers failed: ${ferr.message}`,
          classifyProviderError(ferr),
          this.fallback.getName(),
          this.fallback.getModel(),
          ferr
        );
      }
    }
  }

  private async call(
    provider: BaseProvider,
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<GatewayResponse> {
    const model = provider.getModel();
    const start = Date.now();

    logger.apiRequest(model, systemPrompt.length + userPrompt.length);
    logger.apiRequestFull(model, systemPrompt, userPrompt);

    const response = await provider.chat([{ role: 'user', content: userPrompt }], systemPrompt, { signal });

    if (!response.content.trim()) {
      throw new Error(`Malformed response from ${provider.getName()}: empty content`);
    }

    const usage = response.usage ?? {
      inputTokens: Math.ceil((systemPrompt.length + userPrompt.length) / 4),
      outputTokens: Math.ceil(response.content.length / 4),
    };
    const cost = this.costs.record(model, usage);
    const elapsedMs = Date.now() - start;

    logger.apiResponse(model, usage.inputTokens, usage.outputTokens, cost, elapsedMs / 1000);

    return {
      content: response.content,
      cost,
      tokenUsage: { input: usage.inputTokens, output: usage.outputTokens },
      elapsedMs,
      model,
      provider: provider.getName(),
    };
  }

  private abortedError(provider: BaseProvider, signal: AbortSignal): ProviderError {
    const reason = signal.reason instanceof Error ? signal.reason.message : 'Request aborted';
    return new ProviderError(reason, 'transient', provider.getName(), provider.getModel());
  }
}

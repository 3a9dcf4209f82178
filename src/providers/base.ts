// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { Message, ProviderResponse, ProviderConfig, ChatOptions } from '../types.js';

/** Defaults shared by all model-backed providers */
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.1;

/**
 * Abstract base class for AI model providers.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Send a chat completion request to the model.
   * @param messages - Conversation history
   * @param systemPrompt - Optional system prompt (uses native API support when available)
   * @param options - Cancellation signal for the request
   * @returns Provider response with content and token usage
   */
  abstract chat(
    messages: Message[],
    systemPrompt?: string,
    options?: ChatOptions
  ): Promise<ProviderResponse>;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Get the current model being used.
   */
  abstract getModel(): string;

  protected getMaxTokens(): number {
    return this.config.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  protected getTemperature(): number {
    return this.config.temperature ?? DEFAULT_TEMPERATURE;
  }
}

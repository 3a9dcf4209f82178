// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import OpenAI from 'openai';
import { BaseProvider } from './base.js';
import type { Message, ProviderResponse, ProviderConfig, ChatOptions } from '../types.js';

const DEFAULT_MODEL = 'gpt-4-turbo';

// Models that use max_completion_tokens instead of max_tokens
const COMPLETION_TOKEN_MODELS = ['gpt-5', 'o1', 'o3'];

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Azure OpenAI and other gateways exposing the same API (via baseUrl)
 * - vLLM, LocalAI and similar self-hosted servers
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI;
  private model: string;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
      baseURL: config.baseUrl,
    });
    this.model = config.model || DEFAULT_MODEL;
    this.providerName = config.providerName || 'OpenAI';
  }

  private getTokenParams(): { max_tokens?: number; max_completion_tokens?: number } {
    const usesCompletionTokens = COMPLETION_TOKEN_MODELS.some(m => this.model.startsWith(m));
    return usesCompletionTokens
      ? { max_completion_tokens: this.getMaxTokens() }
      : { max_tokens: this.getMaxTokens() };
  }

  async chat(messages: Message[], systemPrompt?: string, options: ChatOptions = {}): Promise<ProviderResponse> {
    const converted: OpenAI.ChatCompletionMessageParam[] = messages.map((m) =>
      m.role === 'user'
        ? { role: 'user', content: m.content }
        : { role: 'assistant', content: m.content }
    );
    const messagesWithSystem: OpenAI.ChatCompletionMessageParam[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...converted]
      : converted;

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        ...this.getTokenParams(),
        temperature: this.getTemperature(),
        messages: messagesWithSystem,
      },
      { signal: options.signal }
    );

    return this.parseResponse(response);
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.model;
  }

  private parseResponse(response: OpenAI.ChatCompletion): ProviderResponse {
    const choice = response.choices[0];
    const content = choice?.message?.content ?? '';
    const finish = choice?.finish_reason;

    return {
      content,
      stopReason: finish === 'length' ? 'max_tokens' : finish === 'stop' ? 'end_turn' : 'other',
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
          }
        : {
            inputTokens: 0,
            outputTokens: Math.ceil(content.length / 4),
          },
    };
  }
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type { Message, ProviderResponse, ProviderConfig, ChatOptions } from '../types.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
    });
    this.model = config.model || DEFAULT_MODEL;
  }

  async chat(messages: Message[], systemPrompt?: string, options: ChatOptions = {}): Promise<ProviderResponse> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.getMaxTokens(),
        temperature: this.getTemperature(),
        ...(systemPrompt && { system: systemPrompt }),
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
      },
      { signal: options.signal }
    );

    return this.parseResponse(response);
  }

  getName(): string {
    return 'Anthropic';
  }

  getModel(): string {
    return this.model;
  }

  private parseResponse(response: Anthropic.Message): ProviderResponse {
    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      content,
      stopReason: response.stop_reason === 'max_tokens'
        ? 'max_tokens'
        : response.stop_reason === 'end_turn' ? 'end_turn' : 'other',
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Provider for Testing
 *
 * A configurable mock provider that simulates AI model responses
 * for deterministic testing without real API calls.
 *
 * Responses are served from a queue, or chosen by a responder function
 * that sees the prompts (useful when producers run concurrently and
 * call order is not fixed).
 */

import { BaseProvider } from './base.js';
import type { Message, ProviderResponse, TokenUsage, ChatOptions } from '../types.js';

/**
 * A single mock response configuration.
 */
export interface MockResponse {
  /** Text content to return */
  content?: string;
  /** Simulate an error */
  error?: Error;
  /** Optional token usage to report */
  usage?: TokenUsage;
  /** Delay before resolving, in ms (honours abort signals) */
  delayMs?: number;
}

/**
 * Picks a response from the prompts of a call.
 */
export type MockResponder = (systemPrompt: string, userPrompt: string) => MockResponse;

/**
 * Configuration for MockProvider.
 */
export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Computes a response per call; used when the queue is empty */
  responder?: MockResponder;
  /** Default response when queue is empty and no responder is set */
  defaultResponse?: string;
  /** Model name to report (default: 'mock-model') */
  model?: string;
  /** Provider name to report (default: 'Mock') */
  name?: string;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  /** Messages sent to the provider */
  messages: Message[];
  /** System prompt if provided */
  systemPrompt?: string;
  /** Timestamp of the call */
  timestamp: Date;
}

/**
 * Mock provider for testing.
 * Simulates AI provider responses with configurable behavior.
 */
export class MockProvider extends BaseProvider {
  private responseQueue: MockResponse[];
  private responder?: MockResponder;
  private defaultResponse: string;
  private modelName: string;
  private providerName: string;
  private callHistory: MockCall[] = [];

  constructor(config: MockProviderConfig = {}) {
    super({});
    this.responseQueue = [...(config.responses || [])];
    this.responder = config.responder;
    this.defaultResponse = config.defaultResponse ?? 'Mock response';
    this.modelName = config.model || 'mock-model';
    this.providerName = config.name || 'Mock';
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  /**
   * Get the call history.
   */
  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  /**
   * Get call count.
   */
  getCallCount(): number {
    return this.callHistory.length;
  }

  /**
   * Reset the provider state.
   */
  reset(): void {
    this.callHistory = [];
    this.responseQueue = [];
  }

  /**
   * Get the next response from the queue, the responder, or the default.
   */
  private getNextResponse(messages: Message[], systemPrompt?: string): MockResponse {
    const queued = this.responseQueue.shift();
    if (queued) {
      return queued;
    }
    if (this.responder) {
      const userPrompt = messages.map((m) => m.content).join('\n');
      return this.responder(systemPrompt ?? '', userPrompt);
    }
    return { content: this.defaultResponse };
  }

  async chat(messages: Message[], systemPrompt?: string, options: ChatOptions = {}): Promise<ProviderResponse> {
    this.callHistory.push({
      messages: messages.map((m) => ({ ...m })),
      systemPrompt,
      timestamp: new Date(),
    });

    const response = this.getNextResponse(messages, systemPrompt);

    if (response.delayMs && response.delayMs > 0) {
      await delay(response.delayMs, options.signal);
    }
    options.signal?.throwIfAborted();

    if (response.error) {
      throw response.error;
    }

    return {
      content: response.content ?? '',
      stopReason: 'end_turn',
      usage: response.usage || {
        inputTokens: 100,
        outputTokens: 50,
      },
    };
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.modelName;
  }
}

/**
 * Sleep that rejects as soon as the signal aborts.
 */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

// Core message types
/**
 * Represents a message with role and content.
 */
export interface Message {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Token usage information from the API response.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Normalized response from any provider.
 */
export interface ProviderResponse {
  content: string;
  stopReason: 'end_turn' | 'max_tokens' | 'other';
  usage?: TokenUsage;
}

/**
 * Configuration for a provider instance.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Per-call options shared by providers.
 */
export interface ChatOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

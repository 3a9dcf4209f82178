// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseProvider } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { MockProvider } from './mock.js';
import type { ProviderConfig } from '../types.js';

export { BaseProvider } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAICompatibleProvider } from './openai-compatible.js';
export { MockProvider } from './mock.js';
export { ProviderGateway } from './gateway.js';
export { ProviderError, classifyProviderError } from './errors.js';

export interface CreateProviderOptions extends ProviderConfig {
  type: string;
}

/** Provider factory function type */
export type ProviderFactory = (options: CreateProviderOptions) => BaseProvider;

/** Registry of provider factories */
const providerFactories = new Map<string, ProviderFactory>();

// Register built-in providers
providerFactories.set('anthropic', (options) => new AnthropicProvider(options));
providerFactories.set('openai', (options) => new OpenAICompatibleProvider(options));
providerFactories.set('mock', (options) => new MockProvider({ model: options.model }));

/**
 * Register a new provider factory.
 */
export function registerProviderFactory(type: string, factory: ProviderFactory): void {
  if (providerFactories.has(type)) {
    throw new Error(`Provider type '${type}' is already registered`);
  }
  providerFactories.set(type, factory);
}

/**
 * Get list of registered provider types.
 */
export function getProviderTypes(): string[] {
  return Array.from(providerFactories.keys());
}

/**
 * Check if a provider type is registered.
 */
export function hasProviderType(type: string): boolean {
  return providerFactories.has(type);
}

/**
 * Factory function to create a provider based on type.
 */
export function createProvider(options: CreateProviderOptions): BaseProvider {
  const factory = providerFactories.get(options.type);

  if (!factory) {
    const available = getProviderTypes().join(', ');
    throw new Error(`Unknown provider type: ${options.type}. Available: ${available}`);
  }

  return factory(options);
}

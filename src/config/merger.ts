// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > global config > defaults
 */

import type { ProviderSelection, ResolvedConfig, RevueConfig } from './types.js';

/**
 * Default model per provider type, used when a spec names only the provider.
 */
export const DEFAULT_MODELS: Record<string, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4-turbo',
  mock: 'mock-model',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  primary: { type: 'anthropic', model: DEFAULT_MODELS.anthropic },
  fallback: { type: 'openai', model: DEFAULT_MODELS.openai },
  maxTokens: 4096,
  temperature: 0.1,
  cacheTtl: 3600,
  maxFileSize: 100_000,
  maxFiles: 50,
  reviewTimeout: 300,
  confidenceThreshold: 0.7,
  selfReflection: true,
  maxConcurrency: 4,
  strictDedup: true,
  embeddingModel: 'text-embedding-3-small',
  retention: 3600,
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  /** provider:model */
  primary?: string;
  /** provider:model, or "none" */
  fallback?: string;
}

/**
 * Parse "provider:model" (or just "provider") into a selection.
 * The model may itself contain colons, e.g. "openai:ft:gpt-4o:org".
 */
export function parseProviderSpec(spec: string): ProviderSelection {
  const trimmed = spec.trim();
  const colon = trimmed.indexOf(':');
  const type = (colon === -1 ? trimmed : trimmed.slice(0, colon)).toLowerCase();
  const model = colon === -1 ? '' : trimmed.slice(colon + 1);
  if (!type) {
    throw new Error(`Invalid provider "${spec}", expected provider:model`);
  }
  return { type, model: model || DEFAULT_MODELS[type] || '' };
}

/**
 * Convert CLI flags into a config layer.
 */
export function cliToConfig(options: CLIOptions): RevueConfig {
  const config: RevueConfig = {};
  if (options.primary) {
    config.primary = parseProviderSpec(options.primary);
  }
  if (options.fallback) {
    config.fallback = options.fallback === 'none' ? null : parseProviderSpec(options.fallback);
  }
  return config;
}

function mergeProvider(
  base: ProviderSelection | null,
  override: Partial<ProviderSelection> | null | undefined
): ProviderSelection | null {
  if (override === undefined) return base;
  if (override === null) return null;

  // A new provider type starts from its own default model
  const sameType = base !== null && (override.type === undefined || override.type === base.type);
  const type = override.type ?? base?.type ?? DEFAULT_CONFIG.primary.type;
  const inherited = sameType && base ? base : { type, model: DEFAULT_MODELS[type] ?? '' };

  const merged: ProviderSelection = { ...inherited, ...override, type };
  if (!merged.model) merged.model = DEFAULT_MODELS[type] ?? '';
  return merged;
}

function applyLayer(resolved: ResolvedConfig, layer: RevueConfig): ResolvedConfig {
  const { primary, fallback, ...rest } = layer;
  const next: ResolvedConfig = { ...resolved };

  for (const [key, value] of Object.entries(rest)) {
    if (value === undefined) continue;
    Object.assign(next, { [key]: value });
  }

  next.primary = mergeProvider(resolved.primary, primary) ?? resolved.primary;
  next.fallback = mergeProvider(resolved.fallback, fallback);
  return next;
}

/**
 * Merge layers, lowest priority first, over the defaults.
 */
export function mergeConfig(...layers: Array<RevueConfig | null | undefined>): ResolvedConfig {
  let resolved: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    primary: { ...DEFAULT_CONFIG.primary },
    fallback: DEFAULT_CONFIG.fallback ? { ...DEFAULT_CONFIG.fallback } : null,
  };
  for (const layer of layers) {
    if (layer) resolved = applyLayer(resolved, layer);
  }
  return resolved;
}

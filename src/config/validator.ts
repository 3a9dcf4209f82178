// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Turns parsed config files into typed layers and reports problems as
 * warnings. Invalid values are dropped so the next layer down applies.
 */

import { getProviderTypes } from '../providers/index.js';
import type {
  BooleanSetting,
  NumericSetting,
  ProviderSelection,
  RevueConfig,
  StringSetting,
} from './types.js';

interface NumberRule {
  min: number;
  max?: number;
  integer?: boolean;
}

/**
 * Accepted range of each numeric setting.
 */
export const NUMBER_RULES: Record<NumericSetting, NumberRule> = {
  maxTokens: { min: 1, integer: true },
  temperature: { min: 0, max: 2 },
  cacheTtl: { min: 1, integer: true },
  maxFileSize: { min: 1, integer: true },
  maxFiles: { min: 1, integer: true },
  reviewTimeout: { min: 1 },
  confidenceThreshold: { min: 0, max: 1 },
  maxConcurrency: { min: 1, integer: true },
  retention: { min: 0 },
};

const NUMERIC_SETTINGS = Object.keys(NUMBER_RULES).filter(
  (key): key is NumericSetting => Object.hasOwn(NUMBER_RULES, key)
);
const BOOLEAN_SETTINGS: BooleanSetting[] = ['selfReflection', 'strictDedup'];
const STRING_SETTINGS: StringSetting[] = ['cacheDir', 'knowledgeDir', 'embeddingModel'];
const PROVIDER_FIELDS = ['type', 'model', 'baseUrl', 'apiKey'] as const;

const KNOWN_KEYS = new Set<string>([
  'primary',
  'fallback',
  ...NUMERIC_SETTINGS,
  ...BOOLEAN_SETTINGS,
  ...STRING_SETTINGS,
]);

export interface ParsedLayer {
  config: RevueConfig;
  warnings: string[];
}

/**
 * Check a number against its rule; returns a warning or null.
 */
export function checkNumber(key: NumericSetting, value: number): string | null {
  const rule = NUMBER_RULES[key];
  if (!Number.isFinite(value)) return `${key} must be a finite number`;
  if (rule.integer && !Number.isInteger(value)) return `${key} must be an integer`;
  if (value < rule.min) return `${key} must be at least ${rule.min}`;
  if (rule.max !== undefined && value > rule.max) return `${key} must be at most ${rule.max}`;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseProvider(value: unknown, key: string, warnings: string[]): Partial<ProviderSelection> | undefined {
  if (!isRecord(value)) {
    warnings.push(`${key} must be an object with type and model`);
    return undefined;
  }
  const selection: Partial<ProviderSelection> = {};
  for (const field of PROVIDER_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined) continue;
    if (typeof fieldValue !== 'string' || fieldValue === '') {
      warnings.push(`${key}.${field} must be a non-empty string`);
      continue;
    }
    selection[field] = fieldValue;
  }
  return selection;
}

/**
 * Build a typed config layer from parsed file content.
 */
export function parseConfigObject(raw: unknown): ParsedLayer {
  const warnings: string[] = [];
  const config: RevueConfig = {};

  if (!isRecord(raw)) {
    return { config, warnings: ['Configuration must be an object'] };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Unknown configuration key "${key}"`);
    }
  }

  if (raw.primary !== undefined) {
    config.primary = parseProvider(raw.primary, 'primary', warnings);
  }
  if (raw.fallback === null || raw.fallback === false) {
    config.fallback = null;
  } else if (raw.fallback !== undefined) {
    config.fallback = parseProvider(raw.fallback, 'fallback', warnings);
  }

  for (const key of NUMERIC_SETTINGS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      warnings.push(`${key} must be a number`);
      continue;
    }
    const problem = checkNumber(key, value);
    if (problem) {
      warnings.push(problem);
      continue;
    }
    config[key] = value;
  }

  for (const key of BOOLEAN_SETTINGS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      warnings.push(`${key} must be true or false`);
      continue;
    }
    config[key] = value;
  }

  for (const key of STRING_SETTINGS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      warnings.push(`${key} must be a non-empty string`);
      continue;
    }
    config[key] = value;
  }

  return { config, warnings };
}

/**
 * Validate a config layer.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: RevueConfig): string[] {
  const warnings: string[] = [];
  const validProviders = getProviderTypes();

  for (const [key, selection] of [['primary', config.primary], ['fallback', config.fallback]] as const) {
    if (selection?.type && !validProviders.includes(selection.type)) {
      warnings.push(`Unknown ${key} provider "${selection.type}". Valid: ${validProviders.join(', ')}`);
    }
  }

  for (const key of NUMERIC_SETTINGS) {
    const value = config[key];
    if (value === undefined) continue;
    const problem = checkNumber(key, value);
    if (problem) warnings.push(problem);
  }

  return warnings;
}

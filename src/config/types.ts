// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration types.
 */

/**
 * Provider selection as written in a config file or flag.
 */
export interface ProviderSelection {
  /** Provider type (anthropic, openai, mock) */
  type: string;
  model: string;
  baseUrl?: string;
  apiKey?: string;
}

/**
 * One configuration layer (global file, workspace file, environment or
 * CLI). Every field is optional; missing fields fall through to the
 * next layer down.
 */
export interface RevueConfig {
  primary?: Partial<ProviderSelection>;
  /** null disables the fallback provider */
  fallback?: Partial<ProviderSelection> | null;
  maxTokens?: number;
  temperature?: number;
  /** Result cache TTL in seconds */
  cacheTtl?: number;
  /** Per-file limit in bytes */
  maxFileSize?: number;
  maxFiles?: number;
  /** Whole-review limit in seconds */
  reviewTimeout?: number;
  confidenceThreshold?: number;
  selfReflection?: boolean;
  maxConcurrency?: number;
  /** Share in-flight producer calls across reviews */
  strictDedup?: boolean;
  cacheDir?: string;
  knowledgeDir?: string;
  embeddingModel?: string;
  /** How long finished reviews stay queryable, in seconds */
  retention?: number;
}

/**
 * Fully resolved configuration after merging all layers.
 */
export interface ResolvedConfig {
  primary: ProviderSelection;
  fallback: ProviderSelection | null;
  maxTokens: number;
  temperature: number;
  cacheTtl: number;
  maxFileSize: number;
  maxFiles: number;
  reviewTimeout: number;
  confidenceThreshold: number;
  selfReflection: boolean;
  maxConcurrency: number;
  strictDedup: boolean;
  cacheDir?: string;
  knowledgeDir?: string;
  embeddingModel: string;
  retention: number;
}

export type NumericSetting =
  | 'maxTokens'
  | 'temperature'
  | 'cacheTtl'
  | 'maxFileSize'
  | 'maxFiles'
  | 'reviewTimeout'
  | 'confidenceThreshold'
  | 'maxConcurrency'
  | 'retention';

export type BooleanSetting = 'selfReflection' | 'strictDedup';

export type StringSetting = 'cacheDir' | 'knowledgeDir' | 'embeddingModel';

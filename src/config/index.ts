// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (RevueConfig, ResolvedConfig)
 * - loader.ts    - File and environment loading
 * - validator.ts - Typed parsing and validation
 * - merger.ts    - Layer merging with priority handling
 */

export type { ProviderSelection, RevueConfig, ResolvedConfig } from './types.js';

export {
  CONFIG_FILES,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  loadGlobalConfig,
  loadWorkspaceConfig,
  parseConfigFile,
} from './loader.js';
export type { LoadConfigOptions, LoadedFile } from './loader.js';

export { NUMBER_RULES, checkNumber, parseConfigObject, validateConfig } from './validator.js';

export { DEFAULT_CONFIG, DEFAULT_MODELS, cliToConfig, mergeConfig, parseProviderSpec } from './merger.js';
export type { CLIOptions } from './merger.js';

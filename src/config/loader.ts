// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads configuration files (JSON or YAML) and REVUE_* environment
 * variables, then merges every layer into a ResolvedConfig.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { logger } from '../logger.js';
import { RevuePaths } from '../paths.js';
import { cliToConfig, mergeConfig, parseProviderSpec, type CLIOptions } from './merger.js';
import type { BooleanSetting, NumericSetting, ResolvedConfig, RevueConfig, StringSetting } from './types.js';
import { checkNumber, parseConfigObject, validateConfig } from './validator.js';

/**
 * Workspace configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.revue.json', '.revue.yaml', '.revue.yml', 'revue.config.yaml'];

const ENV_NUMBERS: Record<string, NumericSetting> = {
  REVUE_CACHE_TTL: 'cacheTtl',
  REVUE_MAX_CONCURRENCY: 'maxConcurrency',
  REVUE_REVIEW_TIMEOUT: 'reviewTimeout',
  REVUE_CONFIDENCE_THRESHOLD: 'confidenceThreshold',
  REVUE_MAX_FILE_SIZE: 'maxFileSize',
  REVUE_MAX_FILES: 'maxFiles',
};

const ENV_BOOLEANS: Record<string, BooleanSetting> = {
  REVUE_SELF_REFLECTION: 'selfReflection',
  REVUE_STRICT_DEDUP: 'strictDedup',
};

const ENV_STRINGS: Record<string, StringSetting> = {
  REVUE_CACHE_DIR: 'cacheDir',
  REVUE_KNOWLEDGE_DIR: 'knowledgeDir',
  REVUE_EMBEDDING_MODEL: 'embeddingModel',
};

export interface LoadedFile {
  config: RevueConfig | null;
  configPath: string | null;
}

/**
 * Parse a config file by extension. Throws on malformed content.
 */
export function parseConfigFile(configPath: string, content: string): unknown {
  const ext = path.extname(configPath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return yaml.load(content);
  }
  return JSON.parse(content);
}

/**
 * Load one config file. Parse errors and invalid values are logged as
 * warnings; a file that fails to parse contributes nothing.
 */
export function loadConfigFile(configPath: string): RevueConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const { config, warnings } = parseConfigObject(parseConfigFile(configPath, content));
    for (const warning of warnings) {
      logger.warn(`${configPath}: ${warning}`);
    }
    return config;
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

function loadFirst(candidates: string[]): LoadedFile {
  for (const configPath of candidates) {
    if (fs.existsSync(configPath)) {
      return { config: loadConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Load global configuration from ~/.revue/config.{json,yaml,yml}.
 */
export function loadGlobalConfig(): LoadedFile {
  return loadFirst(RevuePaths.globalConfigFiles());
}

/**
 * Find and load workspace configuration from the given directory.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedFile {
  return loadFirst(CONFIG_FILES.map((name) => path.join(cwd, name)));
}

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Read REVUE_* environment variables into a config layer.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): RevueConfig {
  const config: RevueConfig = {};

  if (env.REVUE_PRIMARY) {
    config.primary = parseProviderSpec(env.REVUE_PRIMARY);
  }
  if (env.REVUE_FALLBACK) {
    config.fallback = env.REVUE_FALLBACK === 'none' ? null : parseProviderSpec(env.REVUE_FALLBACK);
  }

  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    const problem = checkNumber(key, value);
    if (problem) {
      logger.warn(`Ignoring ${name}: ${problem}`);
      continue;
    }
    config[key] = value;
  }

  for (const [name, key] of Object.entries(ENV_BOOLEANS)) {
    const raw = env[name];
    if (raw === undefined) continue;
    const value = parseBoolean(raw);
    if (value === undefined) {
      logger.warn(`Ignoring ${name}: expected true or false, got "${raw}"`);
      continue;
    }
    config[key] = value;
  }

  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const raw = env[name];
    if (raw) config[key] = raw;
  }

  return config;
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; replaces the workspace lookup */
  configFile?: string;
  cli?: CLIOptions;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge every configuration layer.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const global = loadGlobalConfig();
  let workspace: LoadedFile;
  if (options.configFile) {
    if (!fs.existsSync(options.configFile)) {
      throw new Error(`Config file not found: ${options.configFile}`);
    }
    workspace = { config: loadConfigFile(options.configFile), configPath: options.configFile };
  } else {
    workspace = loadWorkspaceConfig(options.cwd);
  }

  const layers: RevueConfig[] = [
    global.config ?? {},
    workspace.config ?? {},
    loadEnvConfig(options.env),
    cliToConfig(options.cli ?? {}),
  ];
  for (const layer of layers) {
    for (const warning of validateConfig(layer)) {
      logger.warn(warning);
    }
  }

  if (global.configPath) logger.debug(`Global config: ${global.configPath}`);
  if (workspace.configPath) logger.debug(`Workspace config: ${workspace.configPath}`);

  return mergeConfig(...layers);
}

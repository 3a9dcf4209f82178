// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  cliToConfig,
  loadConfig,
  loadEnvConfig,
  mergeConfig,
  parseConfigObject,
  parseProviderSpec,
  validateConfig,
} from '../src/config/index.js';

describe('parseProviderSpec', () => {
  it('splits provider and model', () => {
    expect(parseProviderSpec('OpenAI:gpt-4o')).toEqual({ type: 'openai', model: 'gpt-4o' });
  });

  it('keeps colons inside the model', () => {
    expect(parseProviderSpec('openai:ft:gpt-4o:org')).toEqual({ type: 'openai', model: 'ft:gpt-4o:org' });
  });

  it('fills in the default model', () => {
    expect(parseProviderSpec('anthropic')).toEqual({ type: 'anthropic', model: 'claude-sonnet-4-20250514' });
    expect(parseProviderSpec('custom')).toEqual({ type: 'custom', model: '' });
  });

  it('rejects an empty provider', () => {
    expect(() => parseProviderSpec(':model')).toThrow('Invalid provider ":model", expected provider:model');
  });
});

describe('mergeConfig', () => {
  it('returns the defaults without layers', () => {
    expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('lets later layers win', () => {
    const config = mergeConfig({ cacheTtl: 10, maxFiles: 3 }, { cacheTtl: 20 }, undefined);
    expect(config.cacheTtl).toBe(20);
    expect(config.maxFiles).toBe(3);
  });

  it('starts a new provider type from its default model', () => {
    expect(mergeConfig({ primary: { type: 'openai' } }).primary).toEqual({ type: 'openai', model: 'gpt-4-turbo' });
  });

  it('keeps the provider type when only the model changes', () => {
    expect(mergeConfig({ primary: { model: 'claude-custom' } }).primary).toEqual({
      type: 'anthropic',
      model: 'claude-custom',
    });
  });

  it('disables the fallback with null', () => {
    expect(mergeConfig(cliToConfig({ fallback: 'none' })).fallback).toBeNull();
  });

  it('does not share default objects between results', () => {
    const first = mergeConfig();
    first.primary.model = 'changed';
    expect(mergeConfig().primary.model).toBe('claude-sonnet-4-20250514');
  });
});

describe('parseConfigObject', () => {
  it('keeps valid values and reports the rest', () => {
    const { config, warnings } = parseConfigObject({
      primary: { type: 'mock', model: 'm1' },
      fallback: false,
      cacheTtl: 60,
      maxConcurrency: 2.5,
      temperature: 3,
      strictDedup: 'yes',
      cacheDir: '/var/cache/revue',
      colour: 'blue',
    });

    expect(config).toEqual({
      primary: { type: 'mock', model: 'm1' },
      fallback: null,
      cacheTtl: 60,
      cacheDir: '/var/cache/revue',
    });
    expect(warnings).toEqual([
      'Unknown configuration key "colour"',
      'temperature must be at most 2',
      'maxConcurrency must be an integer',
      'strictDedup must be true or false',
    ]);
  });

  it('rejects non-objects', () => {
    expect(parseConfigObject([1, 2])).toEqual({ config: {}, warnings: ['Configuration must be an object'] });
  });
});

describe('validateConfig', () => {
  it('warns about unknown provider types', () => {
    expect(validateConfig({ primary: { type: 'gemini' } })).toEqual([
      'Unknown primary provider "gemini". Valid: anthropic, openai, mock',
    ]);
  });
});

describe('loadEnvConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads REVUE_* variables and skips invalid ones', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = loadEnvConfig({
      REVUE_PRIMARY: 'mock:m1',
      REVUE_FALLBACK: 'none',
      REVUE_CACHE_TTL: '60',
      REVUE_MAX_CONCURRENCY: '0',
      REVUE_STRICT_DEDUP: 'off',
      REVUE_SELF_REFLECTION: 'maybe',
      REVUE_CACHE_DIR: '/tmp/revue-cache',
    });

    expect(config).toEqual({
      primary: { type: 'mock', model: 'm1' },
      fallback: null,
      cacheTtl: 60,
      strictDedup: false,
      cacheDir: '/tmp/revue-cache',
    });
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Ignoring REVUE_MAX_CONCURRENCY: maxConcurrency must be at least 1'));
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Ignoring REVUE_SELF_REFLECTION: expected true or false, got "maybe"'));
  });
});

describe('loadConfig', () => {
  let root: string;
  let home: string;
  let workspace: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'revue-config-test-'));
    home = path.join(root, 'home');
    workspace = path.join(root, 'workspace');
    fs.mkdirSync(home);
    fs.mkdirSync(workspace);
    vi.stubEnv('REVUE_HOME', home);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('merges global, workspace, environment and CLI layers in order', () => {
    fs.writeFileSync(path.join(home, 'config.json'), JSON.stringify({ cacheTtl: 100, maxFiles: 5 }));
    fs.writeFileSync(path.join(workspace, '.revue.yaml'), 'cacheTtl: 200\nprimary:\n  type: mock\n');

    const config = loadConfig({
      cwd: workspace,
      env: { REVUE_CACHE_TTL: '300' },
      cli: { fallback: 'none' },
    });

    expect(config.cacheTtl).toBe(300);
    expect(config.maxFiles).toBe(5);
    expect(config.primary).toEqual({ type: 'mock', model: 'mock-model' });
    expect(config.fallback).toBeNull();
  });

  it('uses an explicit file instead of the workspace lookup', () => {
    fs.writeFileSync(path.join(workspace, '.revue.json'), JSON.stringify({ maxFiles: 7 }));
    const explicit = path.join(root, 'custom.yml');
    fs.writeFileSync(explicit, 'maxFiles: 9\n');

    expect(loadConfig({ cwd: workspace, configFile: explicit, env: {} }).maxFiles).toBe(9);
  });

  it('fails for a missing explicit file', () => {
    expect(() => loadConfig({ configFile: path.join(root, 'missing.json'), env: {} })).toThrow(
      `Config file not found: ${path.join(root, 'missing.json')}`
    );
  });

  it('falls back to defaults when a file cannot be parsed', () => {
    const file = path.join(workspace, '.revue.json');
    fs.writeFileSync(file, '{ not json');

    const config = loadConfig({ cwd: workspace, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Failed to parse ${file}`));
  });
});

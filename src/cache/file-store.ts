// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * File-backed Result Cache
 *
 * Persists review results across runs so unchanged files are not
 * re-analyzed. One JSON envelope per key; the stored value is kept
 * as an opaque string so reads return exactly what was written.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile, readdir, stat, unlink, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { RevuePaths } from '../paths.js';
import type { CacheStats, CacheStore } from './types.js';

/**
 * On-disk envelope structure
 */
interface CacheEnvelope {
  /** Original key, checked on read */
  key: string;
  /** The cached value, verbatim */
  value: string;
  /** When this was cached (ms since epoch) */
  cachedAt: number;
  /** When this entry stops being served (ms since epoch) */
  expiresAt: number;
  /** Cache version for invalidation */
  version: number;
}

/**
 * Cache configuration
 */
export interface FileCacheOptions {
  /** Cache directory (default: ~/.revue/cache) */
  directory?: string;
  /** Maximum number of entries (default: 1000) */
  maxEntries?: number;
  /** Cache version for invalidation (default: 1) */
  version?: number;
  /** Clock, for tests */
  now?: () => number;
}

/** Current cache version - increment to invalidate all caches */
const CACHE_VERSION = 1;

/** Distinguishes temp files of writes started in the same millisecond */
let writeSequence = 0;

function isEnvelope(value: unknown): value is CacheEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  return 'key' in value && typeof value.key === 'string' &&
    'value' in value && typeof value.value === 'string' &&
    'cachedAt' in value && typeof value.cachedAt === 'number' &&
    'expiresAt' in value && typeof value.expiresAt === 'number' &&
    'version' in value && typeof value.version === 'number';
}

export class FileCacheStore implements CacheStore {
  private readonly directory: string;
  private readonly maxEntries: number;
  private readonly version: number;
  private readonly now: () => number;
  private ready: Promise<void> | null = null;

  constructor(options: FileCacheOptions = {}) {
    this.directory = options.directory || RevuePaths.cache();
    this.maxEntries = options.maxEntries ?? 1000;
    this.version = options.version ?? CACHE_VERSION;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const filePath = this.getCachePath(key);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(content);
    } catch {
      // Corrupted cache entry
      await this.delete(key);
      return null;
    }

    if (!isEnvelope(envelope) || envelope.key !== key || envelope.version !== this.version) {
      await this.delete(key);
      return null;
    }

    if (this.now() >= envelope.expiresAt) {
      await this.delete(key);
      return null;
    }

    return envelope.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.ensureDirectory();

    const cachedAt = this.now();
    const envelope: CacheEnvelope = {
      key,
      value,
      cachedAt,
      expiresAt: cachedAt + ttlSeconds * 1000,
      version: this.version,
    };

    // Write-then-rename so concurrent readers never see a partial file
    const filePath = this.getCachePath(key);
    const tmpPath = `${filePath}.${process.pid}.${++writeSequence}.tmp`;
    await writeFile(tmpPath, JSON.stringify(envelope));
    await rename(tmpPath, filePath);

    await this.pruneIfNeeded();
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.getCachePath(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async clear(): Promise<void> {
    for (const entry of await this.listEntries()) {
      await unlinkIfPresent(join(this.directory, entry));
    }
  }

  async stats(): Promise<CacheStats> {
    const entries = await this.listEntries();
    let sizeBytes = 0;

    for (const entry of entries) {
      try {
        const stats = await stat(join(this.directory, entry));
        sizeBytes += stats.size;
      } catch (error) {
        // Removed between listing and stat
        if (!isNotFound(error)) throw error;
      }
    }

    return { entries: entries.length, sizeBytes };
  }

  /**
   * Get the file path for a cache key.
   * Keys may contain characters that are not valid in file names.
   */
  private getCachePath(key: string): string {
    const hash = createHash('sha256').update(key).digest('hex').slice(0, 32);
    return join(this.directory, `${hash}.json`);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = null;
          throw error;
        }
      );
    }
    return this.ready;
  }

  private async listEntries(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((e) => e.endsWith('.json'));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  /**
   * Prune cache if it exceeds limits (oldest first)
   */
  private async pruneIfNeeded(): Promise<void> {
    const names = await this.listEntries();
    if (names.length <= this.maxEntries) {
      return;
    }

    const entries: Array<{ name: string; mtime: number }> = [];
    for (const name of names) {
      try {
        const stats = await stat(join(this.directory, name));
        entries.push({ name, mtime: stats.mtimeMs });
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    entries.sort((a, b) => a.mtime - b.mtime);

    const toRemove = entries.slice(0, entries.length - this.maxEntries);
    for (const entry of toRemove) {
      await unlinkIfPresent(join(this.directory, entry.name));
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

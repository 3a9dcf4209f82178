// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Cache Gate
 *
 * Content-addressed result cache in front of the producers. Keys are
 * derived from (path, fingerprint, producer); a reverse index from path
 * to keys lets a changed file drop every result computed for it.
 *
 * Every store failure is converted to a CacheFailure, logged, and
 * treated as a miss or a skipped write.
 */

import { createHash } from 'node:crypto';
import { logger } from '../logger.js';
import { CacheFailure, errorMessage } from '../review/errors.js';
import {
  FINDING_CATEGORIES,
  SEVERITIES,
  type CodeUnit,
  type Finding,
  type ProducerOutcome,
} from '../review/types.js';
import type { CacheStats, CacheStore } from './types.js';

/** Default TTL for cached results (1 hour) */
export const DEFAULT_CACHE_TTL = 3600;

/** Reverse index entries outlive the results they point at */
const INDEX_TTL_FACTOR = 24;

export interface CacheHit {
  /** Stored text, exactly as written */
  raw: string;
  outcome: ProducerOutcome;
}

function digest(...parts: string[]): string {
  return createHash('sha256').update(parts.join('\u0000')).digest('hex').slice(0, 32);
}

function isFinding(value: unknown): value is Finding {
  if (typeof value !== 'object' || value === null) return false;
  if (!('severity' in value) || !('category' in value) || !('sources' in value)) return false;
  const { severity, category, sources } = value;
  return SEVERITIES.some((s) => s === severity) &&
    FINDING_CATEGORIES.some((c) => c === category) &&
    Array.isArray(sources) && sources.every((s: unknown) => typeof s === 'string') &&
    'id' in value && typeof value.id === 'string' &&
    'lineStart' in value && typeof value.lineStart === 'number' &&
    'title' in value && typeof value.title === 'string' &&
    'description' in value && typeof value.description === 'string' &&
    'confidence' in value && typeof value.confidence === 'number';
}

function isProducerOutcome(value: unknown): value is ProducerOutcome {
  if (typeof value !== 'object' || value === null) return false;
  return 'producerName' in value && typeof value.producerName === 'string' &&
    'findings' in value && Array.isArray(value.findings) && value.findings.every(isFinding) &&
    'narrative' in value && typeof value.narrative === 'string' &&
    'elapsedMs' in value && typeof value.elapsedMs === 'number' &&
    'cost' in value && typeof value.cost === 'number' &&
    'succeeded' in value && value.succeeded === true;
}

export class CacheGate {
  /** path -> keys written for it (by this process or loaded from the store) */
  private index = new Map<string, Set<string>>();

  constructor(
    private readonly store: CacheStore,
    private readonly defaultTtl: number = DEFAULT_CACHE_TTL
  ) {}

  /**
   * Deterministic key for a (file, producer) pair.
   */
  keyFor(unit: CodeUnit, producerName: string): string {
    return `review:${producerName}:${digest(unit.path, unit.fingerprint, producerName)}`;
  }

  /**
   * Look up a cached outcome. Never throws; failures read as a miss.
   */
  async get(unit: CodeUnit, producerName: string): Promise<CacheHit | null> {
    const key = this.keyFor(unit, producerName);

    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.report(new CacheFailure(`Cache read failed: ${errorMessage(error)}`, 'get', key));
      return null;
    }

    if (raw === null) {
      logger.cache('miss', `${producerName} ${unit.path}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.report(new CacheFailure(`Corrupt cache entry: ${errorMessage(error)}`, 'get', key));
      return null;
    }
    if (!isProducerOutcome(parsed)) {
      this.report(new CacheFailure('Cache entry has an unexpected shape', 'get', key));
      return null;
    }

    logger.cache('hit', `${producerName} ${unit.path}`);
    // Served results cost nothing for this run
    return { raw, outcome: { ...parsed, cost: 0, cached: true } };
  }

  /**
   * Store a successful outcome. Returns false if the write failed.
   */
  async put(
    unit: CodeUnit,
    producerName: string,
    outcome: ProducerOutcome,
    ttlSeconds: number = this.defaultTtl
  ): Promise<boolean> {
    const key = this.keyFor(unit, producerName);
    const { cached: _cached, ...stored } = outcome;

    try {
      await this.store.set(key, JSON.stringify(stored), ttlSeconds);
      await this.addToIndex(unit.path, key, ttlSeconds);
    } catch (error) {
      this.report(new CacheFailure(`Cache write failed: ${errorMessage(error)}`, 'put', key));
      return false;
    }

    logger.cache('set', `${producerName} ${unit.path} (ttl ${ttlSeconds}s)`);
    return true;
  }

  /**
   * Drop every cached result derived from path, whatever its fingerprint.
   * Returns the number of entries removed.
   */
  async invalidate(path: string): Promise<number> {
    let removed = 0;
    try {
      const keys = await this.loadIndex(path);
      for (const key of keys) {
        if (await this.store.delete(key)) {
          removed++;
        }
      }
      this.index.delete(path);
      await this.store.delete(this.indexKey(path));
    } catch (error) {
      this.report(new CacheFailure(`Cache invalidation failed: ${errorMessage(error)}`, 'invalidate'));
    }

    logger.cache('invalidate', `${path} (${removed} entries)`);
    return removed;
  }

  /**
   * Remove everything, including the reverse index.
   */
  async clear(): Promise<void> {
    try {
      await this.store.clear();
    } catch (error) {
      this.report(new CacheFailure(`Cache clear failed: ${errorMessage(error)}`, 'clear'));
    }
    this.index.clear();
  }

  stats(): Promise<CacheStats> {
    return this.store.stats();
  }

  private indexKey(path: string): string {
    return `index:${digest(path)}`;
  }

  /**
   * Merge the persisted index for path into memory and return it.
   */
  private async loadIndex(path: string): Promise<Set<string>> {
    const raw = await this.store.get(this.indexKey(path));
    // Read the map after the await so concurrent loads share one set
    const keys = this.index.get(path) ?? new Set<string>();
    if (raw !== null) {
      const parsed: unknown = JSON.parse(raw);
      if (Array.isArray(parsed)) {
        for (const key of parsed) {
          if (typeof key === 'string') keys.add(key);
        }
      }
    }
    this.index.set(path, keys);
    return keys;
  }

  private async addToIndex(path: string, key: string, ttlSeconds: number): Promise<void> {
    const keys = this.index.get(path) ?? (await this.loadIndex(path));
    keys.add(key);
    await this.store.set(
      this.indexKey(path),
      JSON.stringify([...keys].sort()),
      ttlSeconds * INDEX_TTL_FACTOR
    );
  }

  private report(failure: CacheFailure): void {
    logger.warn(failure.message);
  }
}

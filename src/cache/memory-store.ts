// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CacheStats, CacheStore } from './types.js';

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process cache store with per-entry TTL and LRU eviction.
 */
export class MemoryCacheStore implements CacheStore {
  private cache = new Map<string, MemoryEntry>();

  constructor(
    private readonly maxSize: number = 1000,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);
    if (!entry) return null;

    // Check TTL
    if (this.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    // Move to end for LRU
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.cache.delete(key);

    // Evict oldest entries if at capacity
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    this.cache.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  async stats(): Promise<CacheStats> {
    let sizeBytes = 0;
    for (const entry of this.cache.values()) {
      sizeBytes += Buffer.byteLength(entry.value, 'utf-8');
    }
    return { entries: this.cache.size, sizeBytes };
  }
}

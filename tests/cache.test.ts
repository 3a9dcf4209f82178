// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileCacheStore } from '../src/cache/file-store.js';
import { CacheGate } from '../src/cache/gate.js';
import { InFlightRegistry } from '../src/cache/inflight.js';
import { MemoryCacheStore } from '../src/cache/memory-store.js';
import type { CacheStats, CacheStore } from '../src/cache/types.js';
import { makeFinding, makeOutcome, makeUnit } from './helpers/fixtures.js';

describe('MemoryCacheStore', () => {
  it('expires entries after their TTL', async () => {
    let now = 1_000;
    const store = new MemoryCacheStore(10, () => now);
    await store.set('k', 'v', 5);

    now = 5_999;
    expect(await store.get('k')).toBe('v');
    now = 6_000;
    expect(await store.get('k')).toBeNull();
  });

  it('evicts the least recently used entry at capacity', async () => {
    const store = new MemoryCacheStore(2);
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.get('a');
    await store.set('c', '3', 60);

    expect(await store.get('a')).toBe('1');
    expect(await store.get('b')).toBeNull();
    expect(await store.get('c')).toBe('3');
  });

  it('reports entry count and byte size', async () => {
    const store = new MemoryCacheStore();
    await store.set('a', 'héllo', 60);
    expect(await store.stats()).toEqual({ entries: 1, sizeBytes: 6 });
  });
});

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'revue-cache-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns exactly what was written', async () => {
    const store = new FileCacheStore({ directory: dir });
    const value = JSON.stringify({ text: 'line\nbreak', n: 1.5 });
    await store.set('review:analyzer:abc', value, 60);
    expect(await store.get('review:analyzer:abc')).toBe(value);
  });

  it('misses on unknown keys', async () => {
    const store = new FileCacheStore({ directory: dir });
    expect(await store.get('nothing')).toBeNull();
  });

  it('drops expired entries', async () => {
    let now = 10_000;
    const store = new FileCacheStore({ directory: dir, now: () => now });
    await store.set('k', 'v', 1);

    now = 11_000;
    expect(await store.get('k')).toBeNull();
    expect((await store.stats()).entries).toBe(0);
  });

  it('ignores entries written by another cache version', async () => {
    await new FileCacheStore({ directory: dir, version: 1 }).set('k', 'v', 60);
    expect(await new FileCacheStore({ directory: dir, version: 2 }).get('k')).toBeNull();
  });

  it('treats a corrupted file as a miss and removes it', async () => {
    const store = new FileCacheStore({ directory: dir });
    await store.set('k', 'v', 60);
    const [file] = fs.readdirSync(dir);
    fs.writeFileSync(path.join(dir, file), '{not json');

    expect(await store.get('k')).toBeNull();
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('prunes the oldest entries beyond maxEntries', async () => {
    const store = new FileCacheStore({ directory: dir, maxEntries: 2 });
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.set('c', '3', 60);
    expect((await store.stats()).entries).toBe(2);
  });

  it('clears every entry', async () => {
    const store = new FileCacheStore({ directory: dir });
    await store.set('a', '1', 60);
    await store.set('b', '2', 60);
    await store.clear();
    expect(await store.stats()).toEqual({ entries: 0, sizeBytes: 0 });
  });

  it('reports empty stats for a missing directory', async () => {
    const store = new FileCacheStore({ directory: path.join(dir, 'missing') });
    expect(await store.stats()).toEqual({ entries: 0, sizeBytes: 0 });
  });
});

class FailingStore implements CacheStore {
  async get(): Promise<string | null> {
    throw new Error('disk gone');
  }
  async set(): Promise<void> {
    throw new Error('disk gone');
  }
  async delete(): Promise<boolean> {
    throw new Error('disk gone');
  }
  async clear(): Promise<void> {
    throw new Error('disk gone');
  }
  async stats(): Promise<CacheStats> {
    return { entries: 0, sizeBytes: 0 };
  }
}

describe('CacheGate', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds keys from producer, path and fingerprint', () => {
    const gate = new CacheGate(new MemoryCacheStore());
    const unit = makeUnit('src/app.py', 'x = 1\n');

    const key = gate.keyFor(unit, 'analyzer');

    expect(key).toMatch(/^review:analyzer:[0-9a-f]{32}$/);
    expect(gate.keyFor(unit, 'analyzer')).toBe(key);
    expect(gate.keyFor(makeUnit('src/app.py', 'x = 2\n'), 'analyzer')).not.toBe(key);
    expect(gate.keyFor(unit, 'security')).not.toBe(key);
  });

  it('serves stored outcomes at zero cost', async () => {
    const gate = new CacheGate(new MemoryCacheStore());
    const unit = makeUnit();
    const outcome = makeOutcome({ cost: 0.02, findings: [makeFinding()] });

    expect(await gate.get(unit, 'analyzer')).toBeNull();
    expect(await gate.put(unit, 'analyzer', outcome, 60)).toBe(true);

    const hit = await gate.get(unit, 'analyzer');
    expect(hit?.outcome).toEqual({ ...outcome, cost: 0, cached: true });
    expect(hit?.raw).toBe(JSON.stringify(outcome));
  });

  it('reads a corrupt entry as a miss', async () => {
    const store = new MemoryCacheStore();
    const gate = new CacheGate(store);
    const unit = makeUnit();
    await store.set(gate.keyFor(unit, 'analyzer'), '{broken', 60);

    expect(await gate.get(unit, 'analyzer')).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Corrupt cache entry'));
  });

  it('reads a failed outcome as a miss', async () => {
    const store = new MemoryCacheStore();
    const gate = new CacheGate(store);
    const unit = makeUnit();
    await store.set(gate.keyFor(unit, 'analyzer'), JSON.stringify(makeOutcome({ succeeded: false })), 60);

    expect(await gate.get(unit, 'analyzer')).toBeNull();
  });

  it('invalidates every fingerprint of a path, including from a fresh gate', async () => {
    const store = new MemoryCacheStore();
    const writer = new CacheGate(store);
    await writer.put(makeUnit('a.py', 'v1'), 'analyzer', makeOutcome(), 60);
    await writer.put(makeUnit('a.py', 'v2'), 'security', makeOutcome({ producerName: 'security' }), 60);
    await writer.put(makeUnit('b.py', 'v1'), 'analyzer', makeOutcome(), 60);

    const reader = new CacheGate(store);
    expect(await reader.invalidate('a.py')).toBe(2);
    expect(await reader.get(makeUnit('a.py', 'v1'), 'analyzer')).toBeNull();
    expect(await reader.get(makeUnit('b.py', 'v1'), 'analyzer')).not.toBeNull();
  });

  it('returns zero when invalidating an unknown path', async () => {
    const gate = new CacheGate(new MemoryCacheStore());
    expect(await gate.invalidate('nothing.py')).toBe(0);
  });

  it('absorbs store failures', async () => {
    const gate = new CacheGate(new FailingStore());
    const unit = makeUnit();

    expect(await gate.get(unit, 'analyzer')).toBeNull();
    expect(await gate.put(unit, 'analyzer', makeOutcome())).toBe(false);
    expect(await gate.invalidate('app.py')).toBe(0);
    await expect(gate.clear()).resolves.toBeUndefined();
  });
});

describe('InFlightRegistry', () => {
  it('shares one computation between concurrent callers', async () => {
    const registry = new InFlightRegistry<number>();
    let calls = 0;
    let release: (value: number) => void = () => {};
    const compute = (): Promise<number> => {
      calls++;
      return new Promise((resolve) => {
        release = resolve;
      });
    };

    const first = registry.run('k', compute);
    const second = registry.run('k', compute);
    expect(registry.has('k')).toBe(true);
    release(42);

    expect(await Promise.all([first, second])).toEqual([42, 42]);
    expect(calls).toBe(1);
    expect(registry.size).toBe(0);
  });

  it('keeps the shared call alive while any caller still waits', async () => {
    const registry = new InFlightRegistry<number>();
    let shared: AbortSignal | undefined;
    let release: (value: number) => void = () => {};
    const compute = (signal: AbortSignal): Promise<number> => {
      shared = signal;
      return new Promise((resolve) => {
        release = resolve;
      });
    };
    const first = new AbortController();
    const second = new AbortController();

    const a = registry.run('k', compute, first.signal);
    const b = registry.run('k', compute, second.signal);
    first.abort(new Error('Review cancelled'));

    expect(shared?.aborted).toBe(false);
    release(7);
    expect(await Promise.all([a, b])).toEqual([7, 7]);
  });

  it('aborts the shared call once every caller has aborted', async () => {
    const registry = new InFlightRegistry<number>();
    let shared: AbortSignal | undefined;
    const compute = (signal: AbortSignal): Promise<number> => {
      shared = signal;
      return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    };
    const first = new AbortController();
    const second = new AbortController();

    const a = registry.run('k', compute, first.signal);
    const b = registry.run('k', compute, second.signal);
    first.abort(new Error('Review cancelled'));
    second.abort(new Error('Review timed out'));

    expect(shared?.aborted).toBe(true);
    await expect(a).rejects.toThrow('Review timed out');
    await expect(b).rejects.toThrow('Review timed out');
    expect(registry.has('k')).toBe(false);
  });

  it('starts a fresh call when the running one was abandoned', async () => {
    const registry = new InFlightRegistry<number>();
    let calls = 0;
    const compute = (signal: AbortSignal): Promise<number> => {
      calls++;
      if (calls === 1) {
        return new Promise((_, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        });
      }
      return Promise.resolve(5);
    };
    const first = new AbortController();

    const abandoned = registry.run('k', compute, first.signal);
    first.abort(new Error('Review cancelled'));
    const fresh = registry.run('k', compute, new AbortController().signal);

    await expect(abandoned).rejects.toThrow('Review cancelled');
    expect(await fresh).toBe(5);
    expect(calls).toBe(2);
    expect(registry.size).toBe(0);
  });

  it('releases the key after a failure', async () => {
    const registry = new InFlightRegistry<number>();
    await expect(registry.run('k', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    expect(registry.has('k')).toBe(false);
    expect(await registry.run('k', () => Promise.resolve(1))).toBe(1);
  });
});

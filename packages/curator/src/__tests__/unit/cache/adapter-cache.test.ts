/**
 * Adapter Cache Tests
 *
 * In-memory and SQLite (`:memory:`) backends with an injected clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import {
  InMemoryAdapterCache,
  SqliteAdapterCache,
  cacheKey,
  cachedCall,
  stableStringify,
  type JsonValue,
} from '../../../cache/adapter-cache.js';

describe('cache keys', () => {
  it('should serialize objects with sorted keys at every depth', () => {
    expect(stableStringify({ b: 1, a: [{ d: 2, c: 3 }] })).toBe('{"a":[{"c":3,"d":2}],"b":1}');
  });

  it('should key by namespace and parameters, not key order', () => {
    const key = cacheKey('wikidata', { title: 'Denver Art Museum', lang: 'en' });

    expect(cacheKey('wikidata', { lang: 'en', title: 'Denver Art Museum' })).toBe(key);
    expect(cacheKey('wikipedia', { title: 'Denver Art Museum', lang: 'en' })).not.toBe(key);
    expect(key).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('InMemoryAdapterCache', () => {
  let clock: number;
  let cache: InMemoryAdapterCache;

  beforeEach(() => {
    clock = 0;
    cache = new InMemoryAdapterCache(() => clock);
  });

  it('should expire entries at their TTL', () => {
    cache.set('k', { v: 1 }, 1000);

    clock = 999;
    expect(cache.get('k')).toEqual({ v: 1 });
    clock = 1000;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.purgeExpired()).toBe(1);
    expect(cache.size).toBe(0);
  });

  it('should return copies', () => {
    cache.set('k', { list: [1] }, 1000);
    const first = cache.get('k');
    if (first !== undefined && first !== null && typeof first === 'object' && !Array.isArray(first)) {
      first.list = [];
    }
    expect(cache.get('k')).toEqual({ list: [1] });
  });
});

describe('SqliteAdapterCache', () => {
  let db: Database.Database;
  let clock: number;
  let cache: SqliteAdapterCache;

  beforeEach(() => {
    db = new Database(':memory:');
    clock = 1_000;
    cache = new SqliteAdapterCache(db, () => clock);
  });

  afterEach(() => {
    db.close();
  });

  it('should store, overwrite and delete entries', () => {
    cache.set('k', { fields: { city: 'Denver' } }, 500, 'wikidata');
    expect(cache.get('k')).toEqual({ fields: { city: 'Denver' } });

    cache.set('k', [1, 2, 3], 500, 'wikidata');
    expect(cache.get('k')).toEqual([1, 2, 3]);

    expect(cache.delete('k')).toBe(true);
    expect(cache.delete('k')).toBe(false);
    expect(cache.get('k')).toBeUndefined();
  });

  it('should expire and purge by TTL', () => {
    cache.set('short', 'a', 100);
    cache.set('long', 'b', 10_000);

    clock = 1_100;
    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('long')).toBe('b');
    expect(cache.purgeExpired()).toBe(1);
    expect(cache.purgeExpired()).toBe(0);
  });

  it('should discard an unreadable entry', () => {
    cache.set('k', 'value', 500);
    db.prepare('UPDATE adapter_cache SET value_json = ? WHERE key = ?').run('{broken', 'k');

    expect(cache.get('k')).toBeUndefined();
    expect(cache.delete('k')).toBe(false);
  });
});

describe('cachedCall', () => {
  const parseObject = (value: JsonValue): JsonValue | undefined =>
    typeof value === 'object' && value !== null ? value : undefined;

  it('should compute once and serve hits afterwards', async () => {
    const cache = new InMemoryAdapterCache(() => 0);
    const fn = vi.fn(async (): Promise<JsonValue> => ({ answer: 42 }));

    const first = await cachedCall(cache, 'llm', { q: 'x' }, 1000, fn, parseObject);
    const second = await cachedCall(cache, 'llm', { q: 'x' }, 1000, fn, parseObject);

    expect(first).toEqual({ value: { answer: 42 }, hit: false });
    expect(second).toEqual({ value: { answer: 42 }, hit: true });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should recompute when the cached value fails to parse', async () => {
    const cache = new InMemoryAdapterCache(() => 0);
    cache.set(cacheKey('llm', { q: 'x' }), 'stale-shape', 1000);
    const fn = vi.fn(async (): Promise<JsonValue> => ({ answer: 42 }));

    const result = await cachedCall(cache, 'llm', { q: 'x' }, 1000, fn, parseObject);

    expect(result.hit).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not cache failures', async () => {
    const cache = new InMemoryAdapterCache(() => 0);
    const failing = async (): Promise<JsonValue> => {
      throw new Error('upstream 503');
    };

    await expect(cachedCall(cache, 'llm', { q: 'x' }, 1000, failing, parseObject)).rejects.toThrow(
      'upstream 503'
    );
    expect(cache.size).toBe(0);
  });
});

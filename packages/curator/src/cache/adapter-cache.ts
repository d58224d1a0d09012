/**
 * Adapter Cache
 *
 * Persistent key-value cache in front of external source adapters. Keys are
 * derived from a namespace plus the call parameters; values are JSON.
 *
 * DESIGN:
 * - One cache object per run, passed explicitly to adapters (no module state)
 * - Entries past their TTL read as misses and are overwritten by the next set
 * - `purgeExpired()` is optional maintenance, never required for correctness
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { createHash } from 'node:crypto';
import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'adapter-cache' });

// ============================================================================
// Types
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface AdapterCache {
  get(key: string): JsonValue | undefined;
  set(key: string, value: JsonValue, ttlMs: number, namespace?: string): void;
  delete(key: string): boolean;
  purgeExpired(): number;
}

// ============================================================================
// Keys
// ============================================================================

/**
 * JSON with object keys sorted at every depth
 */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
  return `{${entries.join(',')}}`;
}

export function cacheKey(namespace: string, params: JsonValue): string {
  return createHash('sha256')
    .update(namespace)
    .update('\u0000')
    .update(stableStringify(params))
    .digest('hex');
}

// ============================================================================
// In-memory
// ============================================================================

interface MemoryEntry {
  readonly value: JsonValue;
  readonly expiresAt: number;
}

export class InMemoryAdapterCache implements AdapterCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string): JsonValue | undefined {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.now()) return undefined;
    return structuredClone(entry.value);
  }

  set(key: string, value: JsonValue, ttlMs: number): void {
    this.entries.set(key, { value: structuredClone(value), expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  purgeExpired(): number {
    const cutoff = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= cutoff) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// SQLite
// ============================================================================

const CACHE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS adapter_cache (
    key TEXT PRIMARY KEY,
    namespace TEXT NOT NULL,
    value_json TEXT NOT NULL,
    stored_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_adapter_cache_expires ON adapter_cache(expires_at);
`;

const cacheRowSchema = z.object({
  value_json: z.string(),
  expires_at: z.number(),
});

/**
 * better-sqlite3 backed cache. The caller owns the Database handle.
 *
 * @example
 * ```typescript
 * const db = new Database('./data/cache/adapter-cache.db');
 * const cache = new SqliteAdapterCache(db);
 * ```
 */
export class SqliteAdapterCache implements AdapterCache {
  constructor(
    private readonly db: Database,
    private readonly now: () => number = Date.now
  ) {
    this.db.exec(CACHE_SCHEMA);
  }

  get(key: string): JsonValue | undefined {
    const raw: unknown = this.db
      .prepare('SELECT value_json, expires_at FROM adapter_cache WHERE key = ?')
      .get(key);
    if (raw === undefined) return undefined;

    const row = cacheRowSchema.safeParse(raw);
    if (!row.success || row.data.expires_at <= this.now()) return undefined;

    try {
      return parseJsonValue(row.data.value_json);
    } catch (error) {
      log.warn('Discarding unreadable cache entry', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      this.delete(key);
      return undefined;
    }
  }

  set(key: string, value: JsonValue, ttlMs: number, namespace = ''): void {
    const storedAt = this.now();
    this.db
      .prepare(
        `INSERT INTO adapter_cache (key, namespace, value_json, stored_at, expires_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           namespace = excluded.namespace,
           value_json = excluded.value_json,
           stored_at = excluded.stored_at,
           expires_at = excluded.expires_at`
      )
      .run(key, namespace, JSON.stringify(value), storedAt, storedAt + ttlMs);
  }

  delete(key: string): boolean {
    return this.db.prepare('DELETE FROM adapter_cache WHERE key = ?').run(key).changes > 0;
  }

  purgeExpired(): number {
    const removed = this.db
      .prepare('DELETE FROM adapter_cache WHERE expires_at <= ?')
      .run(this.now()).changes;
    if (removed > 0) {
      log.info('Purged expired cache entries', { removed });
    }
    return removed;
  }
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

function parseJsonValue(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  return jsonValueSchema.parse(parsed);
}

// ============================================================================
// Read-through helper
// ============================================================================

/**
 * Return the cached value for (namespace, params) or compute, store and
 * return it. Failures are not cached.
 */
export async function cachedCall<T extends JsonValue>(
  cache: AdapterCache,
  namespace: string,
  params: JsonValue,
  ttlMs: number,
  fn: () => Promise<T>,
  parse: (value: JsonValue) => T | undefined
): Promise<{ value: T; hit: boolean }> {
  const key = cacheKey(namespace, params);
  const cached = cache.get(key);
  if (cached !== undefined) {
    const value = parse(cached);
    if (value !== undefined) {
      return { value, hit: true };
    }
  }

  const value = await fn();
  cache.set(key, value, ttlMs, namespace);
  return { value, hit: false };
}

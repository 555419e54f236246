/**
 * Link caches: an in-memory map and a JSON file with per-entry TTLs.
 *
 * Both answer `isValid` synchronously and accept records from verifiers.
 * Node runs verifier callbacks on one thread, so neither needs locking.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { CacheEntry, RecordingCache } from './types.ts';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CacheTtl {
  healthyMs: number;
  brokenMs: number;
}

export const DEFAULT_CACHE_TTL: CacheTtl = {
  healthyMs: 14 * DAY_MS,
  brokenMs: 3 * DAY_MS,
};

export type LinkCacheData = Record<string, CacheEntry>;

/** Map-backed cache; nothing survives the process. */
export class MemoryCache implements RecordingCache {
  protected readonly entries = new Map<string, CacheEntry>();

  constructor(protected readonly now: () => number = Date.now) {}

  isValid(key: string): boolean | undefined {
    return this.entries.get(key)?.ok;
  }

  record(key: string, entry: Omit<CacheEntry, 'checkedAt'>): void {
    this.entries.set(key, { ...entry, checkedAt: this.now() });
  }

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'ok' in value && typeof value.ok === 'boolean'
    && 'checkedAt' in value && typeof value.checkedAt === 'number';
}

/**
 * Cache persisted as `{ [href]: CacheEntry }` JSON. Expired entries are
 * dropped on load; healthy links live longer than broken ones.
 */
export class FileCache extends MemoryCache {
  private constructor(readonly path: string, now: () => number) {
    super(now);
  }

  static load(
    path: string,
    options: { ttl?: CacheTtl; now?: () => number } = {},
  ): FileCache {
    const now = options.now ?? Date.now;
    const ttl = options.ttl ?? DEFAULT_CACHE_TTL;
    const cache = new FileCache(path, now);
    if (!existsSync(path)) return cache;

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch {
      // Unreadable cache file: start fresh, save() will overwrite it
      return cache;
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) return cache;

    const current = now();
    for (const [url, entry] of Object.entries(data)) {
      if (!isCacheEntry(entry)) continue;
      const maxAge = entry.ok ? ttl.healthyMs : ttl.brokenMs;
      if (current - entry.checkedAt < maxAge) {
        cache.entries.set(url, entry);
      }
    }
    return cache;
  }

  toJSON(): LinkCacheData {
    return Object.fromEntries(this.entries);
  }

  /** Write the cache file. Returns the error message instead of throwing. */
  save(): string | null {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(this.toJSON(), null, 2));
      return null;
    } catch (err: unknown) {
      return err instanceof Error ? err.message : String(err);
    }
  }
}

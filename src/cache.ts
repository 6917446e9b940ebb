import { SourceFetchError } from './errors';
import { getLogger, type Logger } from './logger';
import type { CacheLookup } from './types';

// Types
// ==============================

export type FetchFn<V> = () => V | Promise<V>;

export interface CacheLayerOptions {
  /** TTL used when a call passes none. Defaults to one hour. */
  defaultTtlMs?: number;
  /** Clock in epoch ms. Defaults to `Date.now`. */
  now?: () => number;
  logger?: Logger;
}

/**
 * Read-only view of one cache entry.
 */
export interface CacheEntryInfo<V> {
  key: string;
  value: V;
  insertedAt: number;
  ttlMs: number;
  expired: boolean;
  inFlight: boolean;
}

export interface CacheStats {
  /** Lookups answered from a fresh entry. */
  hits: number;
  /** Lookups that started a fetch. */
  misses: number;
  /** Expired values served while another fetch was in flight. */
  stale: number;
  /** Expired values served after a failed fetch. */
  fallbacks: number;
  fetches: number;
  failures: number;
  /** Entries holding a value. */
  size: number;
}

interface StoredValue<V> {
  value: V;
  insertedAt: number;
  ttlMs: number;
}

interface CacheEntry<V> {
  key: string;
  stored: StoredValue<V> | null;
  inFlight: Promise<CacheLookup<V>> | null;
}

export const DEFAULT_TTL_MS = 60 * 60 * 1000;

// Implementation
// ==============================

/**
 * Key-addressed TTL cache with one in-flight fetch per key and stale
 * fallback when a fetch fails.
 *
 * Expiry is checked on access; nothing runs in the background.
 *
 * @example
 * ```ts
 * const cache = new CacheLayer<Repo[]>({ defaultTtlMs: 5 * 60 * 1000 });
 * const { value, degraded } = await cache.getOrFetch('repos', fetchRepos);
 * ```
 */
export class CacheLayer<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private counters = {
    hits: 0,
    misses: 0,
    stale: 0,
    fallbacks: 0,
    fetches: 0,
    failures: 0,
  };

  constructor(options: CacheLayerOptions = {}) {
    this.defaultTtlMs = validateTtl(options.defaultTtlMs ?? DEFAULT_TTL_MS);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Return the cached value for `key` while it is fresh, otherwise fetch it.
   *
   * - Concurrent callers share one fetch; with an expired value at hand
   *   they get it immediately (`stale`) instead of waiting.
   * - A failed fetch falls back to the expired value (`fallback`,
   *   `degraded: true`) and rejects with `SourceFetchError` when there is
   *   none.
   */
  async getOrFetch(
    key: string,
    fetchFn: FetchFn<V>,
    ttlMs: number = this.defaultTtlMs,
  ): Promise<CacheLookup<V>> {
    validateKey(key);
    validateTtl(ttlMs);

    // Check and install happen before the first await
    const entry = this.entries.get(key);
    const stored = entry?.stored ?? null;

    if (stored && !this.isExpired(stored)) {
      this.counters.hits++;
      return { value: stored.value, status: 'fresh', degraded: false, storedAt: stored.insertedAt };
    }

    if (entry?.inFlight) {
      if (stored) {
        this.counters.stale++;
        return { value: stored.value, status: 'stale', degraded: false, storedAt: stored.insertedAt };
      }
      return entry.inFlight;
    }

    this.counters.misses++;
    return this.startFetch(entry ?? { key, stored: null, inFlight: null }, fetchFn, ttlMs, true);
  }

  /**
   * Remove the entry for `key`. A fetch already in flight still settles for
   * its callers but does not repopulate the cache.
   */
  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Fetch and overwrite regardless of freshness. Waits for a fetch already
   * in flight first. Failure rejects with `SourceFetchError` and keeps the
   * previous entry.
   */
  async refresh(key: string, fetchFn: FetchFn<V>, ttlMs: number = this.defaultTtlMs): Promise<V> {
    validateKey(key);
    validateTtl(ttlMs);

    let entry = this.entries.get(key);
    while (entry?.inFlight) {
      await Promise.allSettled([entry.inFlight]);
      entry = this.entries.get(key);
    }

    this.counters.misses++;
    const lookup = await this.startFetch(
      entry ?? { key, stored: null, inFlight: null },
      fetchFn,
      ttlMs,
      false,
    );
    return lookup.value;
  }

  peek(key: string): CacheEntryInfo<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry?.stored) return undefined;

    return {
      key,
      value: entry.stored.value,
      insertedAt: entry.stored.insertedAt,
      ttlMs: entry.stored.ttlMs,
      expired: this.isExpired(entry.stored),
      inFlight: entry.inFlight !== null,
    };
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    let size = 0;
    for (const entry of this.entries.values()) {
      if (entry.stored) size++;
    }
    return { ...this.counters, size };
  }

  // Private helpers
  // ==============================

  private isExpired(stored: StoredValue<V>): boolean {
    return this.now() - stored.insertedAt >= stored.ttlMs;
  }

  private startFetch(
    entry: CacheEntry<V>,
    fetchFn: FetchFn<V>,
    ttlMs: number,
    allowFallback: boolean,
  ): Promise<CacheLookup<V>> {
    const pending = this.runFetch(entry, fetchFn, ttlMs, allowFallback);
    entry.inFlight = pending;
    this.entries.set(entry.key, entry);
    return pending;
  }

  private async runFetch(
    entry: CacheEntry<V>,
    fetchFn: FetchFn<V>,
    ttlMs: number,
    allowFallback: boolean,
  ): Promise<CacheLookup<V>> {
    this.counters.fetches++;
    this.logger.debug(`Fetching "${entry.key}"`);

    try {
      // Defer the call so a synchronous throw settles after startFetch installs the promise
      const value = await Promise.resolve().then(fetchFn);
      const storedAt = this.now();
      if (this.isCurrent(entry)) {
        entry.stored = { value, insertedAt: storedAt, ttlMs };
      }
      return { value, status: 'fetched', degraded: false, storedAt };
    }
    catch (error) {
      this.counters.failures++;
      const stale = entry.stored;

      if (allowFallback && stale) {
        this.counters.fallbacks++;
        this.logger.warn(`Fetching "${entry.key}" failed, serving the previous value`, error);
        return { value: stale.value, status: 'fallback', degraded: true, storedAt: stale.insertedAt };
      }

      if (!stale && this.isCurrent(entry)) {
        this.entries.delete(entry.key);
      }
      throw error instanceof SourceFetchError ? error : new SourceFetchError(entry.key, error);
    }
    finally {
      entry.inFlight = null;
    }
  }

  private isCurrent(entry: CacheEntry<V>): boolean {
    return this.entries.get(entry.key) === entry;
  }
}

function validateKey(key: string): void {
  if (typeof key !== 'string' || key.length === 0) {
    throw new Error('Invalid cache key: must be a non-empty string');
  }
}

function validateTtl(ttlMs: number): number {
  if (typeof ttlMs !== 'number' || Number.isNaN(ttlMs) || ttlMs < 0) {
    throw new Error(`Invalid TTL "${String(ttlMs)}": must be a non-negative number of milliseconds`);
  }
  return ttlMs;
}

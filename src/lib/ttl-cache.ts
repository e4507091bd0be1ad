/**
 * In-memory TTL cache with pluggable storage and single-flight loading.
 * Backs the corroboration and metadata lookups.
 */

import type { TrackMetadata } from '../types';

export const DEFAULT_CACHE_TTL_MS = 10 * 60 * 1000; // 10 minutes

export type CacheEntry<T> = {
  readonly value: T;
  /** Epoch milliseconds after which the entry is absent */
  readonly expiresAt: number;
};

/** Storage behind a TtlCache. Implementations may be persistent. */
export interface CacheStore<T> {
  get(key: string): CacheEntry<T> | undefined;
  set(key: string, entry: CacheEntry<T>): void;
  delete(key: string): void;
  clear(): void;
}

export class MemoryCacheStore<T> implements CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  get(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  set(key: string, entry: CacheEntry<T>): void {
    this.entries.set(key, entry);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface TtlCacheOptions<T> {
  ttlMs?: number;
  store?: CacheStore<T>;
  now?: () => number;
}

export class TtlCache<T> {
  private readonly ttlMs: number;
  private readonly store: CacheStore<T>;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(options: TtlCacheOptions<T> = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.store = options.store ?? new MemoryCacheStore<T>();
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Read a live entry. Expired entries are removed; a failing store reads as a miss.
   */
  get(key: string): T | undefined {
    let entry: CacheEntry<T> | undefined;
    try {
      entry = this.store.get(key);
    } catch (error) {
      console.warn(`cache read failed for key "${key}":`, error instanceof Error ? error.message : error);
      return undefined;
    }
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Store a value for the TTL. A failing store is logged and otherwise ignored.
   */
  set(key: string, value: T): void {
    try {
      this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });
    } catch (error) {
      console.warn(`cache write failed for key "${key}":`, error instanceof Error ? error.message : error);
    }
  }

  delete(key: string): void {
    try {
      this.store.delete(key);
    } catch (error) {
      console.warn(`cache delete failed for key "${key}":`, error instanceof Error ? error.message : error);
    }
  }

  clear(): void {
    this.inFlight.clear();
    this.store.clear();
  }

  /**
   * Return the cached value, or run `compute` once for all concurrent callers
   * of the same key. The value is stored only when `shouldCache` accepts it;
   * a rejected computation is never stored.
   */
  async getOrCompute(
    key: string,
    compute: () => Promise<T>,
    shouldCache: (value: T) => boolean = () => true
  ): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = compute()
      .then((value) => {
        if (shouldCache(value)) {
          this.set(key, value);
        }
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }
}

// Process-wide caches, created on first use
let corroborationCache: TtlCache<number> | null = null;
let metadataCache: TtlCache<TrackMetadata> | null = null;

export function getCorroborationCache(options?: TtlCacheOptions<number>): TtlCache<number> {
  if (!corroborationCache) {
    corroborationCache = new TtlCache<number>(options);
  }
  return corroborationCache;
}

export function resetCorroborationCache(): void {
  corroborationCache = null;
}

export function getMetadataCache(options?: TtlCacheOptions<TrackMetadata>): TtlCache<TrackMetadata> {
  if (!metadataCache) {
    metadataCache = new TtlCache<TrackMetadata>(options);
  }
  return metadataCache;
}

export function resetMetadataCache(): void {
  metadataCache = null;
}

/**
 * In-memory cache with time-to-live expiry.
 *
 * Eviction is lazy: an expired entry is removed by the read that finds it.
 * There is no background sweep, so the cache holds no timers.
 */

import { createLogger } from '../utils/logger.js';

const log = createLogger('ttl-cache');

/** Default entry lifetime: one hour */
export const DEFAULT_CACHE_TTL_MS = 3600 * 1000;

interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

export interface TtlCacheOptions {
  /** Entry lifetime in ms. Default: 3600000 */
  ttlMs?: number;
  /** Clock, injectable for tests. Default: Date.now */
  now?: () => number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a fresh value, or undefined on miss or expiry.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.insertedAt < this.ttlMs) {
      log.debug('Cache hit', { key });
      return entry.value;
    }

    this.entries.delete(key);
    log.debug('Cache entry expired', { key });
    return undefined;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, insertedAt: this.now() });
  }

  /**
   * Whether an entry is stored, fresh or not. Does not evict.
   */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    log.info('Cache cleared');
  }

  /** Stored entries, including expired ones not yet read. */
  get size(): number {
    return this.entries.size;
  }
}

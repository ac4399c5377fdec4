import type { Logger } from 'pino';
import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import type { SearchCacheRepository } from './search-cache.repository.js';

interface CacheEntry {
  readonly results: ResultSet;
  readonly expiresAt: number;
}

export interface InMemorySearchCacheOptions {
  /** Eager removal of expired entries; 0 leaves expiry to lookups. */
  readonly sweepIntervalMs?: number;
  readonly logger?: Logger;
}

export interface InMemorySearchCacheRepository extends SearchCacheRepository {
  /** Removes expired entries and returns how many were dropped. */
  sweep(): number;
  size(): number;
}

function isExpired(entry: CacheEntry, now: number): boolean {
  return now >= entry.expiresAt;
}

export function createInMemorySearchCacheRepository(
  options: InMemorySearchCacheOptions = {},
): InMemorySearchCacheRepository {
  const log = options.logger ?? createChildLogger('cache:memory');
  const cache = new Map<string, CacheEntry>();

  function sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of cache) {
      if (isExpired(entry, now)) {
        cache.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug({ removed, remaining: cache.size }, 'Swept expired cache entries');
    }
    return removed;
  }

  const sweepInterval = options.sweepIntervalMs ?? 0;
  const timer = sweepInterval > 0 ? setInterval(sweep, sweepInterval) : undefined;
  timer?.unref();

  return {
    get(key: string): Promise<ResultSet | null> {
      const entry = cache.get(key);

      if (!entry) {
        return Promise.resolve(null);
      }

      if (isExpired(entry, Date.now())) {
        cache.delete(key);
        return Promise.resolve(null);
      }

      return Promise.resolve(entry.results);
    },

    put(key: string, results: ResultSet, ttlMs: number): Promise<void> {
      if (ttlMs <= 0) {
        cache.delete(key);
        return Promise.resolve();
      }

      // Entries are replaced whole, so a reader sees either the old or the new value.
      cache.set(key, {
        results: Object.freeze(results.map((r) => Object.freeze({ ...r }))),
        expiresAt: Date.now() + ttlMs,
      });
      return Promise.resolve();
    },

    close(): Promise<void> {
      if (timer) clearInterval(timer);
      cache.clear();
      return Promise.resolve();
    },

    sweep,

    size(): number {
      return cache.size;
    },
  };
}

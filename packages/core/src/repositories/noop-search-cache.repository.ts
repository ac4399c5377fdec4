import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import type { SearchCacheRepository } from './search-cache.repository.js';

/** Cache backend for a disabled cache: every lookup misses. */
export function createNoopSearchCacheRepository(): SearchCacheRepository {
  return {
    get(): Promise<ResultSet | null> {
      return Promise.resolve(null);
    },
    put(): Promise<void> {
      return Promise.resolve();
    },
    close(): Promise<void> {
      return Promise.resolve();
    },
  };
}

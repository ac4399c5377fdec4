import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';

/**
 * Key-value store from normalized query to a ranked result set. `get` resolves
 * to null for a miss, whether the entry is absent or expired.
 */
export interface SearchCacheRepository {
  get(key: string): Promise<ResultSet | null>;
  /** Overwrites any entry for `key` and restarts its time to live. */
  put(key: string, results: ResultSet, ttlMs: number): Promise<void>;
  close(): Promise<void>;
}

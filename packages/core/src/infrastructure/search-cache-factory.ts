import type { Firestore } from '@google-cloud/firestore';
import type { CacheConfig } from '@searchbridge/schemas/src/search-config.schema.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';
import { createInMemorySearchCacheRepository } from '../repositories/in-memory-search-cache.repository.js';
import { createNoopSearchCacheRepository } from '../repositories/noop-search-cache.repository.js';
import { createFirestoreClient } from './firestore-client.js';
import { createFirestoreSearchCacheRepository } from './firestore-search-cache.repository.js';

const log = createChildLogger('cache:factory');

export interface SearchCacheFactoryDeps {
  /** Shared client; when omitted the repository creates and terminates its own. */
  readonly firestore?: Firestore;
}

export function createSearchCacheRepository(
  config: CacheConfig,
  deps: SearchCacheFactoryDeps = {},
): SearchCacheRepository {
  log.info({ backend: config.backend, ttlMs: config.ttlMs }, 'Creating search cache');

  switch (config.backend) {
    case 'memory':
      return createInMemorySearchCacheRepository({ sweepIntervalMs: config.sweepIntervalMs });
    case 'none':
      return createNoopSearchCacheRepository();
    case 'firestore': {
      if (deps.firestore) {
        return createFirestoreSearchCacheRepository(deps.firestore, config.firestoreCollection);
      }
      const db = createFirestoreClient(config.firestoreProjectId);
      const repo = createFirestoreSearchCacheRepository(db, config.firestoreCollection);
      return {
        get: (key) => repo.get(key),
        put: (key, results, ttlMs) => repo.put(key, results, ttlMs),
        async close(): Promise<void> {
          await repo.close();
          await db.terminate();
        },
      };
    }
  }
}

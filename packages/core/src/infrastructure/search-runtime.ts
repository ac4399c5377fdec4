import type { AppConfig } from '@searchbridge/schemas/src/config-loader.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import { createQueryEnricher } from '../services/enrichment/query-enricher.js';
import { createSearchProviderClient } from '../services/web-search/search-provider-client.js';
import { createMockSearchProviderClient } from '../services/web-search/mock-search-provider-client.js';
import { createSearchBridge, type SearchBridge } from '../orchestration/search-bridge.js';
import { createSearchCacheRepository, type SearchCacheFactoryDeps } from './search-cache-factory.js';

const log = createChildLogger('runtime');

export interface SearchRuntime {
  readonly bridge: SearchBridge;
  /** Releases the cache backend. */
  close(): Promise<void>;
}

export interface SearchRuntimeOptions extends SearchCacheFactoryDeps {
  /** Answer from canned results instead of calling the provider. */
  readonly mockProvider?: boolean;
}

export function createSearchRuntime(
  config: AppConfig,
  options: SearchRuntimeOptions = {},
): SearchRuntime {
  const { search, vocabulary } = config;

  const enricher = createQueryEnricher(search.enrichment, vocabulary);
  const provider = options.mockProvider
    ? createMockSearchProviderClient()
    : createSearchProviderClient(search.provider);
  const cache = createSearchCacheRepository(search.cache, options);

  const bridge = createSearchBridge({ enricher, provider, cache }, search);

  return {
    bridge,
    async close(): Promise<void> {
      log.info('Closing search runtime');
      await cache.close();
    },
  };
}

import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import type { SearchProviderClient } from './search-provider-client.js';

const log = createChildLogger('web-search:mock');

export function createMockSearchProviderClient(
  responses?: ReadonlyMap<string, ResultSet>,
): SearchProviderClient {
  log.info('Using mock search provider client');

  return {
    fetch(normalizedQuery: string, maxResults: number): Promise<ResultSet> {
      log.debug({ query: normalizedQuery }, 'Mock provider search');

      const configured = responses?.get(normalizedQuery);
      if (configured) {
        return Promise.resolve(configured.slice(0, maxResults));
      }

      return Promise.resolve(
        [1, 2, 3].slice(0, maxResults).map((n) => ({
          title: `Mock result ${String(n)} for ${normalizedQuery}`,
          url: `https://example.com/mock/${String(n)}`,
          description: `Mock search result about ${normalizedQuery}.`,
        })),
      );
    },
  };
}

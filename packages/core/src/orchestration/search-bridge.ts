import { StateGraph, START, END } from '@langchain/langgraph';
import type { Logger } from 'pino';
import type { SearchBridgeConfig } from '@searchbridge/schemas/src/search-config.schema.js';
import { SearchQuerySchema } from '@searchbridge/schemas/src/search-query.schema.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import type { SearchResponse } from '@searchbridge/shared/src/types/search.types.js';
import {
  InvalidQueryError,
  ProviderUnavailableError,
  toError,
} from '@searchbridge/shared/src/utils/errors.js';
import type { QueryEnricher } from '../services/enrichment/query-enricher.js';
import { rerankResults } from '../services/ranking/reranker.js';
import {
  computeWorstCaseLatencyMs,
  type SearchProviderClient,
} from '../services/web-search/search-provider-client.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';
import {
  SearchGraphAnnotation,
  type SearchGraphState,
  type SearchStage,
} from './pipeline-state.js';

export interface SearchBridgeDeps {
  readonly enricher: QueryEnricher;
  readonly provider: SearchProviderClient;
  readonly cache: SearchCacheRepository;
  readonly logger?: Logger;
}

export interface SearchBridge {
  search(query: string): Promise<SearchResponse>;
}

function routeAfterCacheLookup(state: SearchGraphState): string {
  return state.cached ? 'respond' : 'providerFetch';
}

function routeAfterProviderFetch(state: SearchGraphState): string {
  return state.failure ? '__end__' : 'rerank';
}

export function createSearchBridge(deps: SearchBridgeDeps, config: SearchBridgeConfig): SearchBridge {
  const log = deps.logger ?? createChildLogger('orchestration:search-bridge');
  const { enricher, provider, cache } = deps;

  log.info(
    {
      enrichment: config.enrichment.enabled,
      rerank: config.rerank.enabled,
      cacheBackend: config.cache.backend,
      maxResults: config.maxResults,
      worstCaseLatencyMs: computeWorstCaseLatencyMs(config.provider),
    },
    'Initializing search bridge',
  );

  function logStage(state: SearchGraphState, stage: SearchStage, extra: Record<string, unknown> = {}): void {
    log.info(
      { query: state.query, stage, elapsedMs: Date.now() - state.startedAt, ...extra },
      'Search stage',
    );
  }

  async function enrichNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'enrich', { enabled: config.enrichment.enabled });

    const fallback = state.query.trim().toLowerCase();
    if (!config.enrichment.enabled) {
      return { normalizedQuery: fallback };
    }

    try {
      const normalizedQuery = enricher.enrich(state.query);
      return { normalizedQuery: normalizedQuery === '' ? fallback : normalizedQuery };
    } catch (error) {
      log.warn({ query: state.query, error: toError(error).message }, 'Enrichment failed, using trimmed query');
      return { normalizedQuery: fallback };
    }
  }

  async function cacheLookupNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'cacheLookup', { key: state.normalizedQuery });

    try {
      const hit = await cache.get(state.normalizedQuery);
      if (hit) {
        return { results: hit, cached: true };
      }
    } catch (error) {
      log.warn(
        { query: state.query, key: state.normalizedQuery, code: 'CACHE_ERROR', error: toError(error).message },
        'Cache lookup failed, treating as miss',
      );
    }

    return { cached: false };
  }

  async function providerFetchNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'providerFetch');

    try {
      const results = await provider.fetch(state.normalizedQuery, config.maxResults);
      return { results: results.slice(0, config.maxResults) };
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        return { failure: error };
      }
      const cause = toError(error);
      return {
        failure: new ProviderUnavailableError(`Search provider failed: ${cause.message}`, 1, cause),
      };
    }
  }

  async function rerankNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'rerank', { enabled: config.rerank.enabled, resultCount: state.results.length });

    if (!config.rerank.enabled) {
      return {};
    }

    try {
      return {
        results: rerankResults(state.results, state.normalizedQuery, {
          titleWeight: config.rerank.titleWeight,
        }),
      };
    } catch (error) {
      log.warn({ query: state.query, error: toError(error).message }, 'Reranking failed, keeping provider order');
      return {};
    }
  }

  async function cacheWriteNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'cacheWrite', { key: state.normalizedQuery });

    try {
      await cache.put(state.normalizedQuery, state.results, config.cache.ttlMs);
    } catch (error) {
      log.warn(
        { query: state.query, key: state.normalizedQuery, code: 'CACHE_ERROR', error: toError(error).message },
        'Cache write failed',
      );
    }

    return {};
  }

  async function respondNode(state: SearchGraphState): Promise<Partial<SearchGraphState>> {
    logStage(state, 'respond', { cached: state.cached, resultCount: state.results.length });
    return {};
  }

  const graph = new StateGraph(SearchGraphAnnotation)
    .addNode('enrich', enrichNode)
    .addNode('cacheLookup', cacheLookupNode)
    .addNode('providerFetch', providerFetchNode)
    .addNode('rerank', rerankNode)
    .addNode('cacheWrite', cacheWriteNode)
    .addNode('respond', respondNode)
    .addEdge(START, 'enrich')
    .addEdge('enrich', 'cacheLookup')
    .addConditionalEdges('cacheLookup', routeAfterCacheLookup, {
      respond: 'respond',
      providerFetch: 'providerFetch',
    })
    .addConditionalEdges('providerFetch', routeAfterProviderFetch, {
      rerank: 'rerank',
      __end__: END,
    })
    .addEdge('rerank', 'cacheWrite')
    .addEdge('cacheWrite', 'respond')
    .addEdge('respond', END)
    .compile();

  return {
    async search(query: string): Promise<SearchResponse> {
      const parsed = SearchQuerySchema.safeParse(query);
      if (!parsed.success) {
        const reason = parsed.error.errors.map((e) => e.message).join('; ');
        log.info({ reason }, 'Rejected invalid query');
        throw new InvalidQueryError(reason);
      }

      const result = await graph.invoke({
        query,
        startedAt: Date.now(),
        normalizedQuery: '',
        results: [],
        cached: false,
      });

      if (result.failure) {
        log.error(
          {
            query,
            normalizedQuery: result.normalizedQuery,
            code: result.failure.code,
            attempts: result.failure.attempts,
            error: result.failure.message,
          },
          'Search failed',
        );
        throw result.failure;
      }

      return {
        query,
        normalizedQuery: result.normalizedQuery,
        results: result.results,
        cached: result.cached,
      };
    },
  };
}

import { Annotation } from '@langchain/langgraph';
import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import type { ProviderUnavailableError } from '@searchbridge/shared/src/utils/errors.js';

export const SearchGraphAnnotation = Annotation.Root({
  query: Annotation<string>,
  startedAt: Annotation<number>,
  normalizedQuery: Annotation<string>,
  results: Annotation<ResultSet>,
  cached: Annotation<boolean>,
  failure: Annotation<ProviderUnavailableError | undefined>,
});

export type SearchGraphState = typeof SearchGraphAnnotation.State;

export type SearchStage =
  | 'enrich'
  | 'cacheLookup'
  | 'providerFetch'
  | 'rerank'
  | 'cacheWrite'
  | 'respond';

import type { SearchResponse } from '@searchbridge/shared/src/types/search.types.js';
import type { SearchBridge } from '@searchbridge/core/src/orchestration/search-bridge.js';

/**
 * Bridge answering every query with the given response, or failing with the given error.
 * For use in unit tests only.
 */
export function createStubBridge(outcome: SearchResponse | Error): SearchBridge & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    search(query: string): Promise<SearchResponse> {
      calls.push(query);
      if (outcome instanceof Error) {
        return Promise.reject(outcome);
      }
      return Promise.resolve(outcome);
    },
  };
}

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
}

/** Ordered by relevance rank; never longer than the configured maximum. */
export type ResultSet = readonly SearchResult[];

export interface SearchResponse {
  readonly query: string;
  readonly normalizedQuery: string;
  readonly results: ResultSet;
  readonly cached: boolean;
}

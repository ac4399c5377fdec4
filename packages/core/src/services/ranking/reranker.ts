import type { ResultSet, SearchResult } from '@searchbridge/shared/src/types/search.types.js';

export interface RerankOptions {
  /** How many times a title occurrence counts relative to a description occurrence. */
  readonly titleWeight?: number;
}

export interface ScoredResult {
  readonly result: SearchResult;
  readonly score: number;
  /** Position in the provider's ordering. */
  readonly index: number;
}

const DEFAULT_TITLE_WEIGHT = 2;

const TOKEN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

interface WeightedDocument {
  readonly counts: ReadonlyMap<string, number>;
  readonly length: number;
}

function weighDocument(result: SearchResult, titleWeight: number): WeightedDocument {
  const counts = new Map<string, number>();
  let length = 0;

  const add = (tokens: readonly string[], weight: number): void => {
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + weight);
      length += weight;
    }
  };

  add(tokenize(result.title), titleWeight);
  add(tokenize(result.description), 1);

  return { counts, length };
}

/**
 * TF-IDF relevance of each result to the query terms. Document frequency is
 * taken over this result set only.
 */
export function scoreResults(
  results: ResultSet,
  query: string,
  options: RerankOptions = {},
): ScoredResult[] {
  const titleWeight = options.titleWeight ?? DEFAULT_TITLE_WEIGHT;
  const terms = [...new Set(tokenize(query))];
  const documents = results.map((result) => weighDocument(result, titleWeight));

  const idf = new Map<string, number>();
  for (const term of terms) {
    const df = documents.filter((doc) => doc.counts.has(term)).length;
    idf.set(term, Math.log((documents.length + 1) / (df + 1)) + 1);
  }

  return results.map((result, index) => {
    const doc = documents[index];
    let score = 0;
    if (doc.length > 0) {
      for (const term of terms) {
        const tf = (doc.counts.get(term) ?? 0) / doc.length;
        score += tf * (idf.get(term) ?? 0);
      }
    }
    return { result, score, index };
  });
}

/**
 * Orders results by descending relevance. Equal scores keep the provider's
 * order, so a query without any overlap leaves the results untouched.
 */
export function rerankResults(
  results: ResultSet,
  query: string,
  options: RerankOptions = {},
): ResultSet {
  if (results.length === 0) return [];

  return scoreResults(results, query, options)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((scored) => scored.result);
}

import { distance } from 'fastest-levenshtein';
import type { Logger } from 'pino';
import type { EnrichmentConfig } from '@searchbridge/schemas/src/search-config.schema.js';
import type { Vocabulary } from '@searchbridge/schemas/src/vocabulary.schema.js';
import { MAX_QUERY_LENGTH } from '@searchbridge/schemas/src/search-query.schema.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';

// One edit per five characters, so short real words are never rewritten.
const CHARACTERS_PER_EDIT = 5;

const ALPHABETIC = /^\p{L}+$/u;

export interface VocabularyIndex {
  readonly terms: ReadonlySet<string>;
  readonly sortedTerms: readonly string[];
  readonly corrections: ReadonlyMap<string, string>;
  readonly synonymGroups: ReadonlyMap<string, readonly string[]>;
}

export interface QueryEnricher {
  enrich(query: string): string;
}

/**
 * Synonym groups sharing a term are merged, so every term maps to exactly one
 * group. Expansion stays idempotent that way.
 */
function mergeSynonymGroups(groups: readonly (readonly string[])[]): Map<string, readonly string[]> {
  const groupOf = new Map<string, string[]>();

  for (const group of groups) {
    const merged: string[] = [];
    const absorbed = new Set<string[]>();

    for (const term of group) {
      const existing = groupOf.get(term);
      if (existing && !absorbed.has(existing)) {
        absorbed.add(existing);
        for (const member of existing) {
          if (!merged.includes(member)) merged.push(member);
        }
      }
      if (!merged.includes(term)) merged.push(term);
    }

    for (const term of merged) {
      groupOf.set(term, merged);
    }
  }

  return groupOf;
}

export function buildVocabularyIndex(vocabulary: Vocabulary): VocabularyIndex {
  const corrections = new Map<string, string>();
  for (const [misspelling, term] of Object.entries(vocabulary.corrections)) {
    corrections.set(misspelling.toLowerCase(), term);
  }

  const synonymGroups = mergeSynonymGroups(vocabulary.synonyms);

  const terms = new Set<string>(vocabulary.terms);
  for (const term of corrections.values()) terms.add(term);
  for (const term of synonymGroups.keys()) terms.add(term);

  return {
    terms,
    sortedTerms: [...terms].sort(),
    corrections,
    synonymGroups,
  };
}

export function normalizeQuery(query: string): string {
  return query.normalize('NFKC').toLowerCase().trim().replace(/\s+/g, ' ');
}

function unique(tokens: readonly string[]): string[] {
  return [...new Set(tokens)];
}

function closestTerm(token: string, config: EnrichmentConfig, index: VocabularyIndex): string | undefined {
  const allowed = Math.min(
    config.maxEditDistance,
    Math.max(1, Math.floor(token.length / CHARACTERS_PER_EDIT)),
  );
  if (allowed === 0) return undefined;

  let best: string | undefined;
  let bestDistance = allowed + 1;

  for (const term of index.sortedTerms) {
    if (Math.abs(term.length - token.length) >= bestDistance) continue;
    const d = distance(token, term);
    if (d < bestDistance) {
      best = term;
      bestDistance = d;
    }
  }

  return best;
}

function correctToken(token: string, config: EnrichmentConfig, index: VocabularyIndex): string {
  if (index.terms.has(token)) return token;

  const corrected = index.corrections.get(token);
  if (corrected !== undefined) return corrected;

  if (token.length < config.minTokenLength || !ALPHABETIC.test(token)) return token;

  return closestTerm(token, config, index) ?? token;
}

/** Appends synonyms in order until the next one would push the query past the provider limit. */
function expandSynonyms(tokens: readonly string[], index: VocabularyIndex): string[] {
  const expanded = [...tokens];
  let length = tokens.join(' ').length;

  for (const token of tokens) {
    for (const synonym of index.synonymGroups.get(token) ?? []) {
      if (expanded.includes(synonym)) continue;
      if (length + 1 + synonym.length > MAX_QUERY_LENGTH) return expanded;
      expanded.push(synonym);
      length += 1 + synonym.length;
    }
  }
  return expanded;
}

/**
 * Derives the cache key and provider query from a raw query. Deterministic for
 * a given query, config and vocabulary, and idempotent.
 */
export function enrichQuery(query: string, config: EnrichmentConfig, index: VocabularyIndex): string {
  if (!config.enabled) {
    return query.trim().toLowerCase();
  }

  const normalized = normalizeQuery(query);
  if (normalized === '') return normalized;

  const tokens = unique(normalized.split(' '));
  const corrected = unique(tokens.map((token) => correctToken(token, config, index)));

  return expandSynonyms(corrected, index).join(' ');
}

export function createQueryEnricher(
  config: EnrichmentConfig,
  vocabulary: Vocabulary,
  logger: Logger = createChildLogger('enrichment:query'),
): QueryEnricher {
  const index = buildVocabularyIndex(vocabulary);

  logger.info(
    { enabled: config.enabled, terms: index.terms.size, corrections: index.corrections.size },
    'Query enricher ready',
  );

  return {
    enrich(query: string): string {
      try {
        const enriched = enrichQuery(query, config, index);
        if (enriched !== query) {
          logger.debug({ query, enriched }, 'Query enriched');
        }
        return enriched;
      } catch (error) {
        logger.warn(
          { query, error: error instanceof Error ? error.message : String(error) },
          'Query enrichment failed, using trimmed query',
        );
        return query.trim().toLowerCase();
      }
    },
  };
}

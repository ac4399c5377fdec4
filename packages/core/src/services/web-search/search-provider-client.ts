import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import {
  ParseError,
  ProviderUnavailableError,
  toError,
} from '@searchbridge/shared/src/utils/errors.js';
import type { ResultSet, SearchResult } from '@searchbridge/shared/src/types/search.types.js';
import {
  PROVIDER_MAX_COUNT,
  type ProviderConfig,
} from '@searchbridge/schemas/src/search-config.schema.js';
import { formatZodErrors } from '@searchbridge/schemas/src/validators.js';

export interface SearchProviderClient {
  fetch(normalizedQuery: string, maxResults: number): Promise<ResultSet>;
}

export type RetryPolicy = Pick<
  ProviderConfig,
  'timeoutMs' | 'maxAttempts' | 'backoffBaseMs' | 'jitterMaxMs'
>;

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export interface SearchProviderClientDeps {
  readonly fetch?: FetchLike;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  readonly logger?: Logger;
}

type FailureKind = 'transient' | 'fatal' | 'parse';

class AttemptFailure extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'AttemptFailure';
  }
}

const ProviderResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string(),
            url: z.string().min(1),
            description: z.string().optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

const ERROR_BODY_PREVIEW_LENGTH = 200;

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the attempt that follows `attempt` (attempts count from 1). */
export function computeBackoffMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.backoffBaseMs * Math.pow(2, attempt - 1);
  const jitter = random() * policy.jitterMaxMs;
  return exponential + jitter;
}

/**
 * Upper bound for one `fetch` call: every attempt running into its timeout,
 * plus the largest possible delay between consecutive attempts.
 */
export function computeWorstCaseLatencyMs(policy: RetryPolicy): number {
  let total = policy.timeoutMs * policy.maxAttempts;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += computeBackoffMs(attempt, policy, () => 1);
  }
  return total;
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

const ENTITIES: Readonly<Record<string, string>> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
  '&nbsp;': ' ',
  '&amp;': '&',
};

/** Removes the provider's highlight tags and decodes common entities. */
export function stripMarkup(text: string): string {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/&(?:lt|gt|quot|#39|#x27|nbsp|amp);/g, (entity) => ENTITIES[entity] ?? entity)
    .trim();
}

export function createSearchProviderClient(
  config: ProviderConfig,
  deps: SearchProviderClientDeps = {},
): SearchProviderClient {
  const log = deps.logger ?? createChildLogger('web-search:provider');
  const fetchFn: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));
  const wait = deps.sleep ?? sleep;
  const random = deps.random ?? Math.random;

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (config.apiKey) {
    headers['X-Subscription-Token'] = config.apiKey;
  } else {
    log.warn({ baseUrl: config.baseUrl }, 'No provider API key configured');
  }

  log.info(
    {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      maxAttempts: config.maxAttempts,
      worstCaseLatencyMs: computeWorstCaseLatencyMs(config),
    },
    'Creating search provider client',
  );

  async function readErrorBody(response: Response): Promise<string> {
    try {
      const body = await response.text();
      return body.slice(0, ERROR_BODY_PREVIEW_LENGTH);
    } catch (error) {
      log.debug({ error: toError(error).message }, 'Could not read error response body');
      return '';
    }
  }

  async function attemptOnce(url: URL, maxResults: number): Promise<SearchResult[]> {
    let response: Response;
    try {
      response = await fetchFn(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(config.timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      const reason =
        cause.name === 'TimeoutError' || cause.name === 'AbortError'
          ? `timed out after ${String(config.timeoutMs)}ms`
          : cause.message;
      throw new AttemptFailure(`Request failed: ${reason}`, 'transient');
    }

    if (!response.ok) {
      const body = await readErrorBody(response);
      const kind = isTransientStatus(response.status) ? 'transient' : 'fatal';
      throw new AttemptFailure(
        `HTTP ${String(response.status)} ${response.statusText}${body ? `: ${body}` : ''}`,
        kind,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      const cause = toError(error);
      if (cause instanceof SyntaxError) {
        throw new AttemptFailure(`Response is not valid JSON: ${cause.message}`, 'parse');
      }
      throw new AttemptFailure(`Reading response failed: ${cause.message}`, 'transient');
    }

    const parsed = ProviderResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AttemptFailure(
        `Unexpected response shape: ${formatZodErrors(parsed.error).join('; ')}`,
        'parse',
      );
    }

    return (parsed.data.web?.results ?? []).slice(0, maxResults).map((item) => ({
      title: stripMarkup(item.title),
      url: item.url,
      description: stripMarkup(item.description ?? ''),
    }));
  }

  return {
    async fetch(normalizedQuery: string, maxResults: number): Promise<ResultSet> {
      const url = new URL(config.baseUrl);
      url.searchParams.set('q', normalizedQuery);
      url.searchParams.set('count', String(Math.min(maxResults, PROVIDER_MAX_COUNT)));

      let lastFailure: AttemptFailure | undefined;

      for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
        const startedAt = Date.now();

        try {
          const results = await attemptOnce(url, maxResults);
          log.info(
            {
              query: normalizedQuery,
              attempt,
              maxAttempts: config.maxAttempts,
              latencyMs: Date.now() - startedAt,
              outcome: 'success',
              resultCount: results.length,
            },
            'Provider attempt succeeded',
          );
          return results;
        } catch (error) {
          const failure =
            error instanceof AttemptFailure ? error : new AttemptFailure(toError(error).message, 'fatal');
          const record = {
            query: normalizedQuery,
            attempt,
            maxAttempts: config.maxAttempts,
            latencyMs: Date.now() - startedAt,
            status: failure.status,
            error: failure.message,
          };

          if (failure.kind === 'parse') {
            log.error({ ...record, outcome: 'parse_error' }, 'Provider attempt failed');
            throw new ParseError(`Malformed search provider response: ${failure.message}`, attempt, failure);
          }

          if (failure.kind === 'fatal') {
            log.warn({ ...record, outcome: 'fatal_failure' }, 'Provider attempt failed');
            throw new ProviderUnavailableError(
              `Search provider rejected the request: ${failure.message}`,
              attempt,
              failure,
            );
          }

          lastFailure = failure;
          log.warn({ ...record, outcome: 'transient_failure' }, 'Provider attempt failed');

          if (attempt < config.maxAttempts) {
            const delayMs = computeBackoffMs(attempt, config, random);
            log.debug({ query: normalizedQuery, attempt, delayMs }, 'Backing off before retry');
            await wait(delayMs);
          }
        }
      }

      throw new ProviderUnavailableError(
        `Search provider unavailable after ${String(config.maxAttempts)} attempts: ${lastFailure?.message ?? 'unknown error'}`,
        config.maxAttempts,
        lastFailure,
      );
    },
  };
}

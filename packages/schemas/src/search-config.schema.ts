import { z } from 'zod';

export const DEFAULT_PROVIDER_BASE_URL = 'https://api.search.brave.com/res/v1/web/search';

/** Upper bound of the provider's `count` parameter. */
export const PROVIDER_MAX_COUNT = 20;

const ProviderSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_PROVIDER_BASE_URL),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(12_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.number().int().min(0).default(500),
  jitterMaxMs: z.number().int().min(0).default(250),
});

const EnrichmentSchema = z.object({
  enabled: z.boolean().default(true),
  maxEditDistance: z.number().int().min(0).max(3).default(2),
  minTokenLength: z.number().int().min(1).default(6),
});

const RerankSchema = z.object({
  enabled: z.boolean().default(true),
  titleWeight: z.number().positive().default(2),
});

export const CacheBackendSchema = z.enum(['memory', 'firestore', 'none']);

const CacheSchema = z.object({
  backend: CacheBackendSchema.default('memory'),
  ttlMs: z.number().int().min(0).default(300_000),
  sweepIntervalMs: z.number().int().min(0).default(0),
  firestoreProjectId: z.string().min(1).optional(),
  firestoreCollection: z.string().min(1).default('search-cache'),
});

export const SearchBridgeConfigSchema = z.object({
  provider: ProviderSchema.default({}),
  enrichment: EnrichmentSchema.default({}),
  rerank: RerankSchema.default({}),
  cache: CacheSchema.default({}),
  maxResults: z.number().int().min(1).max(PROVIDER_MAX_COUNT).default(10),
});

export type SearchBridgeConfig = z.infer<typeof SearchBridgeConfigSchema>;
export type SearchBridgeConfigInput = z.input<typeof SearchBridgeConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderSchema>;
export type EnrichmentConfig = z.infer<typeof EnrichmentSchema>;
export type RerankConfig = z.infer<typeof RerankSchema>;
export type CacheConfig = z.infer<typeof CacheSchema>;
export type CacheBackend = z.infer<typeof CacheBackendSchema>;

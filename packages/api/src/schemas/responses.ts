import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

export const SearchResultSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    description: z.string(),
  })
  .openapi('SearchResult');

export const WebSearchResponseSchema = z
  .object({
    query: z.string(),
    normalizedQuery: z.string(),
    cached: z.boolean(),
    results: z.array(SearchResultSchema),
  })
  .openapi('WebSearchResponse');

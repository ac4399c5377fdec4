import { z } from 'zod';

/** The provider rejects longer queries. */
export const MAX_QUERY_LENGTH = 400;

export const SearchQuerySchema = z
  .string()
  .trim()
  .min(1, 'Query must not be empty')
  .max(MAX_QUERY_LENGTH, `Query must be at most ${String(MAX_QUERY_LENGTH)} characters`);

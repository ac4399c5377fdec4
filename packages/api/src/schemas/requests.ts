import { z } from '@hono/zod-openapi';

// Length and blank checks live in the bridge so every caller gets the same errors.
export const WebSearchRequestSchema = z
  .object({
    query: z.string().openapi({ example: 'latest python release' }),
  })
  .openapi('WebSearchRequest');

export type WebSearchRequest = z.infer<typeof WebSearchRequestSchema>;

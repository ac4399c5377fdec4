import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { SearchBridge } from '@searchbridge/core/src/orchestration/search-bridge.js';
import { createRouter, type AppEnv } from '../types.js';
import { WebSearchRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, WebSearchResponseSchema } from '../schemas/responses.js';

const webSearchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Search'],
  summary: 'Run an enriched, cached and reranked web search',
  request: {
    body: {
      content: {
        'application/json': {
          schema: WebSearchRequestSchema,
        },
      },
      required: true,
    },
  },
  responses: {
    200: {
      description: 'Ranked search results',
      content: {
        'application/json': {
          schema: WebSearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid request or query',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    502: {
      description: 'Search provider unavailable',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createWebSearchRoutes(bridge: SearchBridge): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(webSearchRoute, async (c) => {
    const { query } = c.req.valid('json');
    const response = await bridge.search(query);

    return c.json(
      {
        query: response.query,
        normalizedQuery: response.normalizedQuery,
        cached: response.cached,
        results: response.results.map((r) => ({ ...r })),
      },
      200,
    );
  });

  return routes;
}

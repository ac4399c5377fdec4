import type { OpenAPIHono } from '@hono/zod-openapi';
import type { SearchBridge } from '@searchbridge/core/src/orchestration/search-bridge.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health, API_VERSION } from './routes/health.js';
import { createWebSearchRoutes } from './routes/web-search.js';

const log = createChildLogger('api:server');

export interface AppDeps {
  readonly bridge: SearchBridge;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);
  app.route('/tools/web-search', createWebSearchRoutes(deps.bridge));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'SearchBridge API',
        version: API_VERSION,
        description: 'Web search tool with query enrichment, caching and reranking',
      },
    });
    return c.json(spec);
  });

  return app;
}

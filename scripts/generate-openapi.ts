import { createApp } from '../packages/api/src/app.js';
import { API_VERSION } from '../packages/api/src/routes/health.js';

// Routes are only registered, never called.
const app = createApp({
  bridge: {
    search: () => Promise.reject(new Error('Not available while generating the OpenAPI document')),
  },
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'SearchBridge API',
    version: API_VERSION,
    description: 'Web search tool with query enrichment, caching and reranking',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');

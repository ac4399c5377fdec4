import { serve } from '@hono/node-server';
import { loadConfig } from '@searchbridge/schemas/src/config-loader.js';
import { createSearchRuntime } from '@searchbridge/core/src/infrastructure/search-runtime.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['SEARCHBRIDGE_CONFIG_DIR'] ?? 'config';

  const config = await loadConfig(configDir);
  const runtime = createSearchRuntime(config, {
    mockProvider: process.env['SEARCHBRIDGE_MOCK_PROVIDER'] === 'true',
  });

  const app = createApp({ bridge: runtime.bridge });

  log.info({ port }, 'Starting SearchBridge API server');

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'SearchBridge API server running');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    server.close();
    runtime.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Failed to close search runtime',
        );
        process.exit(1);
      },
    );
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});

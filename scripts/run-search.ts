import { resolve } from 'node:path';
import { createInterface } from 'node:readline';
import { loadConfig } from '@searchbridge/schemas/src/config-loader.js';
import { createSearchRuntime } from '@searchbridge/core/src/infrastructure/search-runtime.js';
import { publicErrorCode } from '@searchbridge/shared/src/utils/errors.js';

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolvePrompt) => {
    rl.question(question, (answer) => {
      rl.close();
      resolvePrompt(answer);
    });
  });
}

async function main(): Promise<number> {
  const configDir = process.env['SEARCHBRIDGE_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');
  const words = process.argv.slice(2);
  const query = words.length > 0 ? words.join(' ') : await prompt('Search query: ');

  const config = await loadConfig(configDir);
  const runtime = createSearchRuntime(config, {
    mockProvider: process.env['SEARCHBRIDGE_MOCK_PROVIDER'] === 'true',
  });

  try {
    const response = await runtime.bridge.search(query);
    console.log(JSON.stringify({ results: response.results }, null, 2));
    return 0;
  } catch (error) {
    const code = publicErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    console.log(JSON.stringify({ error: message, code }, null, 2));
    return 1;
  } finally {
    await runtime.close();
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Search failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  },
);

import { describe, it, expect } from 'vitest';
import { SearchBridgeConfigSchema } from '@searchbridge/schemas/src/search-config.schema.js';
import { createSearchRuntime } from './search-runtime.js';

describe('createSearchRuntime', () => {
  it('should answer from the mock provider and then from the cache', async () => {
    const runtime = createSearchRuntime(
      {
        search: SearchBridgeConfigSchema.parse({ rerank: { enabled: false } }),
        vocabulary: { corrections: { teh: 'the' }, synonyms: [], terms: ['the'] },
      },
      { mockProvider: true },
    );

    const first = await runtime.bridge.search('Teh Guide');
    const second = await runtime.bridge.search('teh guide');
    await runtime.close();

    expect(first.normalizedQuery).toBe('the guide');
    expect(first.cached).toBe(false);
    expect(first.results.map((r) => r.title)).toEqual([
      'Mock result 1 for the guide',
      'Mock result 2 for the guide',
      'Mock result 3 for the guide',
    ]);
    expect(second.cached).toBe(true);
    expect(second.results).toEqual(first.results);
  });
});

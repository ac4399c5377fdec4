import { describe, it, expect } from 'vitest';
import { createNoopSearchCacheRepository } from './noop-search-cache.repository.js';

describe('NoopSearchCacheRepository', () => {
  it('should miss even after a put', async () => {
    const repo = createNoopSearchCacheRepository();
    await repo.put('python', [{ title: 'Python', url: 'https://example.com', description: '' }], 60_000);

    expect(await repo.get('python')).toBeNull();
  });
});

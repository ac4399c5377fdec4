import { describe, it, expect, beforeEach } from 'vitest';
import { Firestore } from '@google-cloud/firestore';
import { createFirestoreSearchCacheRepository } from './firestore-search-cache.repository.js';

describe('FirestoreSearchCacheRepository (integration)', () => {
  const db = new Firestore({ projectId: 'searchbridge-test' });
  const repo = createFirestoreSearchCacheRepository(db);

  const results = [
    { title: 'Python', url: 'https://example.com/python', description: 'The language' },
  ];

  beforeEach(async () => {
    const docs = await db.collection('search-cache').listDocuments();
    for (const doc of docs) {
      await doc.delete();
    }
  });

  it('should return null for cache miss', async () => {
    expect(await repo.get('nonexistent query')).toBeNull();
  });

  it('should cache and retrieve a result set', async () => {
    await repo.put('python news', results, 60_000);

    expect(await repo.get('python news')).toEqual(results);
  });

  it('should overwrite existing entries', async () => {
    await repo.put('python news', results, 60_000);
    const replacement = [{ title: 'Other', url: 'https://example.com/other', description: '' }];
    await repo.put('python news', replacement, 60_000);

    expect(await repo.get('python news')).toEqual(replacement);
  });

  it('should miss for expired entries', async () => {
    await repo.put('python news', results, 1);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(await repo.get('python news')).toBeNull();
  });
});

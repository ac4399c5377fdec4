import { describe, it, expect, vi } from 'vitest';
import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import { CacheError } from '@searchbridge/shared/src/utils/errors.js';
import { createFirestoreSearchCacheRepository, hashKey } from './firestore-search-cache.repository.js';

interface FakeDoc {
  get: ReturnType<typeof vi.fn>;
  set: ReturnType<typeof vi.fn>;
}

function createFakeDb(doc: FakeDoc): { db: Firestore; docIds: string[]; collections: string[] } {
  const docIds: string[] = [];
  const collections: string[] = [];
  const db = {
    collection: (name: string) => {
      collections.push(name);
      return {
        doc: (id: string) => {
          docIds.push(id);
          return doc;
        },
      };
    },
  } as unknown as Firestore;
  return { db, docIds, collections };
}

const results = [{ title: 'Python', url: 'https://example.com/python', description: 'The language' }];

describe('FirestoreSearchCacheRepository', () => {
  it('should use the search-cache collection unless told otherwise', () => {
    const doc = { get: vi.fn(), set: vi.fn() };
    const { db, collections } = createFakeDb(doc);

    createFirestoreSearchCacheRepository(db);
    createFirestoreSearchCacheRepository(db, 'tenant-cache');

    expect(collections).toEqual(['search-cache', 'tenant-cache']);
  });

  it('should address documents by the hashed key', async () => {
    const doc = { get: vi.fn().mockResolvedValue({ exists: false }), set: vi.fn() };
    const { db, docIds } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    expect(await repo.get('python news')).toBeNull();
    expect(docIds).toEqual([hashKey('python news')]);
    expect(hashKey('python news')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should return results from a live document', async () => {
    const doc = {
      get: vi.fn().mockResolvedValue({
        exists: true,
        data: () => ({
          query: 'python news',
          results,
          cachedAt: Timestamp.now(),
          expiresAt: Timestamp.fromMillis(Date.now() + 60_000),
        }),
      }),
      set: vi.fn(),
    };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    expect(await repo.get('python news')).toEqual(results);
  });

  it('should miss for expired documents', async () => {
    const doc = {
      get: vi.fn().mockResolvedValue({
        exists: true,
        data: () => ({
          query: 'python news',
          results,
          cachedAt: Timestamp.fromMillis(Date.now() - 120_000),
          expiresAt: Timestamp.fromMillis(Date.now() - 60_000),
        }),
      }),
      set: vi.fn(),
    };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    expect(await repo.get('python news')).toBeNull();
  });

  it('should miss for malformed documents', async () => {
    const doc = {
      get: vi.fn().mockResolvedValue({ exists: true, data: () => ({ query: 'python news' }) }),
      set: vi.fn(),
    };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    expect(await repo.get('python news')).toBeNull();
  });

  it('should wrap read failures in CacheError', async () => {
    const doc = { get: vi.fn().mockRejectedValue(new Error('UNAVAILABLE')), set: vi.fn() };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    await expect(repo.get('python news')).rejects.toThrow(CacheError);
  });

  it('should write the results with an expiry timestamp', async () => {
    const doc = { get: vi.fn(), set: vi.fn().mockResolvedValue(undefined) };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    await repo.put('python news', results, 60_000);

    expect(doc.set).toHaveBeenCalledTimes(1);
    const [written] = doc.set.mock.calls[0] as [
      { query: string; results: unknown; cachedAt: Timestamp; expiresAt: Timestamp },
    ];
    expect(written.query).toBe('python news');
    expect(written.results).toEqual(results);
    expect(written.expiresAt.toMillis() - written.cachedAt.toMillis()).toBe(60_000);
  });

  it('should wrap write failures in CacheError', async () => {
    const doc = { get: vi.fn(), set: vi.fn().mockRejectedValue(new Error('PERMISSION_DENIED')) };
    const { db } = createFakeDb(doc);
    const repo = createFirestoreSearchCacheRepository(db);

    await expect(repo.put('python news', results, 60_000)).rejects.toThrow(CacheError);
  });
});

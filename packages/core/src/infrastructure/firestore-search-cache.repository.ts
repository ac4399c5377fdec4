import { createHash } from 'node:crypto';
import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import { z } from 'zod';
import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import { CacheError, toError } from '@searchbridge/shared/src/utils/errors.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';

const log = createChildLogger('firestore:search-cache');

const DEFAULT_COLLECTION = 'search-cache';

const CacheDocumentSchema = z.object({
  query: z.string(),
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      description: z.string(),
    }),
  ),
  cachedAt: z.instanceof(Timestamp),
  expiresAt: z.instanceof(Timestamp),
});

type CacheDocument = z.infer<typeof CacheDocumentSchema>;

export function hashKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

/**
 * Expired documents are ignored on read; a Firestore TTL policy on
 * `expiresAt` removes them physically.
 */
export function createFirestoreSearchCacheRepository(
  db: Firestore,
  collection: string = DEFAULT_COLLECTION,
): SearchCacheRepository {
  const collectionRef = db.collection(collection);

  return {
    async get(key: string): Promise<ResultSet | null> {
      let data: unknown;
      try {
        const doc = await collectionRef.doc(hashKey(key)).get();
        if (!doc.exists) {
          return null;
        }
        data = doc.data();
      } catch (error) {
        throw new CacheError(`Failed to read cache entry for "${key}"`, toError(error));
      }

      const parsed = CacheDocumentSchema.safeParse(data);
      if (!parsed.success) {
        log.warn({ query: key }, 'Ignoring malformed cache document');
        return null;
      }

      if (parsed.data.expiresAt.toMillis() <= Date.now()) {
        log.debug({ query: key }, 'Cache entry expired');
        return null;
      }

      return parsed.data.results;
    },

    async put(key: string, results: ResultSet, ttlMs: number): Promise<void> {
      if (ttlMs <= 0) {
        return;
      }

      const now = Timestamp.now();
      const docData: CacheDocument = {
        query: key,
        results: results.map((r) => ({ title: r.title, url: r.url, description: r.description })),
        cachedAt: now,
        expiresAt: Timestamp.fromMillis(now.toMillis() + ttlMs),
      };

      try {
        await collectionRef.doc(hashKey(key)).set(docData);
      } catch (error) {
        throw new CacheError(`Failed to write cache entry for "${key}"`, toError(error));
      }
    },

    close(): Promise<void> {
      return Promise.resolve();
    },
  };
}

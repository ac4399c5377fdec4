import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import type { ResultSet } from '@searchbridge/shared/src/types/search.types.js';
import { createInMemorySearchCacheRepository } from './in-memory-search-cache.repository.js';

const START = 1_700_000_000_000;
const TTL_MS = 60_000;

const first: ResultSet = [
  { title: 'Python', url: 'https://example.com/python', description: 'The language' },
];
const second: ResultSet = [
  { title: 'Python 3.13', url: 'https://example.com/313', description: 'Release notes' },
];

function createRepo(sweepIntervalMs = 0) {
  return createInMemorySearchCacheRepository({ sweepIntervalMs, logger: pino({ level: 'silent' }) });
}

describe('InMemorySearchCacheRepository', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('should return null for cache miss', async () => {
    const repo = createRepo();
    expect(await repo.get('python')).toBeNull();
  });

  it('should return a result set right after it was put', async () => {
    const repo = createRepo();
    await repo.put('python', first, TTL_MS);

    expect(await repo.get('python')).toEqual(first);
  });

  it('should keep entries until the ttl has elapsed', async () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(START);
    const repo = createRepo();
    await repo.put('python', first, TTL_MS);

    now.mockReturnValue(START + TTL_MS - 1);
    expect(await repo.get('python')).toEqual(first);
  });

  it('should miss once the ttl has elapsed', async () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(START);
    const repo = createRepo();
    await repo.put('python', first, TTL_MS);

    now.mockReturnValue(START + TTL_MS);
    expect(await repo.get('python')).toBeNull();
    expect(repo.size()).toBe(0);
  });

  it('should overwrite entries and restart their ttl', async () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(START);
    const repo = createRepo();
    await repo.put('python', first, TTL_MS);

    now.mockReturnValue(START + 50_000);
    await repo.put('python', second, TTL_MS);

    now.mockReturnValue(START + 90_000);
    expect(await repo.get('python')).toEqual(second);
  });

  it('should not store entries with a zero ttl', async () => {
    const repo = createRepo();
    await repo.put('python', first, 0);

    expect(await repo.get('python')).toBeNull();
    expect(repo.size()).toBe(0);
  });

  it('should store frozen copies', async () => {
    const repo = createRepo();
    const results = [{ title: 'Python', url: 'https://example.com/python', description: '' }];
    await repo.put('python', results, TTL_MS);
    results[0].title = 'changed';

    const cached = await repo.get('python');
    expect(cached?.[0].title).toBe('Python');
    expect(Object.isFrozen(cached)).toBe(true);
    expect(Object.isFrozen(cached?.[0])).toBe(true);
  });

  it('should sweep expired entries', async () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(START);
    const repo = createRepo();
    await repo.put('short', first, 1_000);
    await repo.put('long', second, TTL_MS);

    now.mockReturnValue(START + 5_000);
    expect(repo.sweep()).toBe(1);
    expect(repo.size()).toBe(1);
    expect(await repo.get('long')).toEqual(second);
  });

  it('should sweep in the background when an interval is configured', async () => {
    vi.useFakeTimers();
    const repo = createRepo(1_000);
    await repo.put('short', first, 500);
    await repo.put('long', second, TTL_MS);

    vi.advanceTimersByTime(1_000);

    expect(repo.size()).toBe(1);
    await repo.close();
  });

  it('should apply last-write-wins for concurrent writes', async () => {
    const repo = createRepo();
    await Promise.all([repo.put('python', first, TTL_MS), repo.put('python', second, TTL_MS)]);

    expect(await repo.get('python')).toEqual(second);
  });

  it('should drop all entries on close', async () => {
    const repo = createRepo();
    await repo.put('python', first, TTL_MS);
    await repo.close();

    expect(repo.size()).toBe(0);
  });
});

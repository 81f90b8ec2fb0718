import { err, ok, type Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createMemoryCache } from '@/infra/cache/adapters/memory-cache.js';
import { TaggedError } from '@/infra/cache/failures.js';
import { CacheTtl } from '@/infra/cache/ttl.js';
import { withResilientCache, withResilientCacheResult } from '@/infra/cache/with-cache.js';
import { createResilientCache } from '@/infra/cache/wrappers/resilient-cache.js';
import { makeCapturingLogger } from '@/tests/fixtures/fakes.js';

import type { StoredEntry } from '@/infra/cache/ports.js';

interface Programme {
  pid: string;
  title: string;
}

interface RepoError {
  type: 'DatabaseError' | 'NotFound';
  message: string;
}

const makeCache = () =>
  createResilientCache<Programme>({
    store: createMemoryCache<StoredEntry<Programme>>(),
    logger: makeCapturingLogger().logger,
    prefix: 'test',
    resilienceTtlSeconds: 86400,
    whitelistedFailureKinds: ['DatabaseError'],
  });

describe('withResilientCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('caches results per generated key', async () => {
    const cache = makeCache();
    const findByPid = vi.fn((pid: string) => Promise.resolve({ pid, title: `Title ${pid}` }));

    const cached = withResilientCache(findByPid, cache, {
      ttl: CacheTtl.NORMAL,
      keyGenerator: ([pid]) => cache.keyHelper('ProgrammeRepo', 'findByPid', pid),
    });

    expect(await cached('a')).toEqual({ pid: 'a', title: 'Title a' });
    expect(await cached('a')).toEqual({ pid: 'a', title: 'Title a' });
    expect(await cached('b')).toEqual({ pid: 'b', title: 'Title b' });

    expect(findByPid).toHaveBeenCalledTimes(2);
  });

  it('serves the last value when the wrapped function fails with a whitelisted kind', async () => {
    const cache = makeCache();
    const findByPid = vi
      .fn((pid: string) => Promise.resolve({ pid, title: 'Original' }))
      .mockImplementationOnce((pid: string) => Promise.resolve({ pid, title: 'Original' }))
      .mockImplementationOnce(() => Promise.reject(new TaggedError('DatabaseError', 'down')));

    const cached = withResilientCache(findByPid, cache, {
      ttl: CacheTtl.NORMAL,
      keyGenerator: ([pid]) => pid,
    });

    await cached('a');
    vi.setSystemTime(Date.now() + 301_000);

    expect(await cached('a')).toEqual({ pid: 'a', title: 'Original' });
    expect(cache.getStaleServedCount()).toBe(1);
  });
});

describe('withResilientCacheResult', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('caches only successful results', async () => {
    const cache = makeCache();
    const findByPid = vi.fn(
      (pid: string): Promise<Result<Programme, RepoError>> =>
        pid === 'missing'
          ? Promise.resolve(err({ type: 'NotFound', message: `No programme ${pid}` }))
          : Promise.resolve(ok({ pid, title: 'Found' }))
    );

    const cached = withResilientCacheResult(findByPid, cache, {
      ttl: CacheTtl.NORMAL,
      keyGenerator: ([pid]) => pid,
    });

    expect((await cached('a'))._unsafeUnwrap()).toEqual({ pid: 'a', title: 'Found' });
    expect((await cached('a'))._unsafeUnwrap()).toEqual({ pid: 'a', title: 'Found' });
    expect((await cached('missing'))._unsafeUnwrapErr().type).toBe('NotFound');
    expect((await cached('missing'))._unsafeUnwrapErr().type).toBe('NotFound');

    expect(findByPid).toHaveBeenCalledTimes(3);
  });
});

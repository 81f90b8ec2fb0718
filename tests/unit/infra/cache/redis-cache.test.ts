import { Decimal } from 'decimal.js';
import { Redis } from 'ioredis';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createRedisCacheFromClient,
  createRedisCacheWithClient,
} from '@/infra/cache/adapters/redis-cache.js';

import type { StoredEntry } from '@/infra/cache/ports.js';

describe('RedisCache', () => {
  let client: Redis;

  beforeEach(() => {
    // Never connects: every command used below is stubbed.
    client = new Redis({ lazyConnect: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    client.disconnect();
  });

  it('deserializes stored entries', async () => {
    vi.spyOn(client, 'get').mockResolvedValue(
      '{"value":{"__decimal__":"12.5"},"logicalExpiresAt":1700000000000}'
    );
    const cache = createRedisCacheFromClient<StoredEntry<Decimal>>(client);

    const result = await cache.get('app.resilient.total');

    const stored = result._unsafeUnwrap();
    expect(stored?.logicalExpiresAt).toBe(1700000000000);
    expect(stored?.value.equals(new Decimal('12.5'))).toBe(true);
    expect(client.get).toHaveBeenCalledWith('app.resilient.total');
  });

  it('returns undefined for missing keys and counts the miss', async () => {
    vi.spyOn(client, 'get').mockResolvedValue(null);
    const cache = createRedisCacheFromClient<string>(client);

    expect((await cache.get('missing'))._unsafeUnwrap()).toBeUndefined();
    expect(await cache.stats()).toEqual({ hits: 0, misses: 1, size: 0 });
  });

  it('maps command timeouts to TimeoutError', async () => {
    vi.spyOn(client, 'get').mockRejectedValue(new Error('Command timed out'));
    const cache = createRedisCacheFromClient<string>(client);

    const error = (await cache.get('key'))._unsafeUnwrapErr();

    expect(error.type).toBe('TimeoutError');
    expect(error.message).toBe('Failed to get key: key');
  });

  it('maps other failures to ConnectionError', async () => {
    vi.spyOn(client, 'del').mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379'));
    const cache = createRedisCacheFromClient<string>(client);

    expect((await cache.delete('key'))._unsafeUnwrapErr().type).toBe('ConnectionError');
  });

  it('reports whether a key was deleted', async () => {
    vi.spyOn(client, 'del').mockResolvedValueOnce(1).mockResolvedValueOnce(0);
    const cache = createRedisCacheFromClient<string>(client);

    expect((await cache.delete('present'))._unsafeUnwrap()).toBe(true);
    expect((await cache.delete('absent'))._unsafeUnwrap()).toBe(false);
  });

  it('returns SerializationError for corrupted payloads', async () => {
    vi.spyOn(client, 'get').mockResolvedValue('{not json');
    const cache = createRedisCacheFromClient<string>(client);

    expect((await cache.get('key'))._unsafeUnwrapErr().type).toBe('SerializationError');
  });

  describe('set', () => {
    const entry: StoredEntry<string> = { value: 'v1', logicalExpiresAt: 1700000300000 };
    const payload = '{"value":"v1","logicalExpiresAt":1700000300000}';

    it('writes with a millisecond expiry', async () => {
      const set = vi.spyOn(client, 'set').mockResolvedValue('OK');
      const cache = createRedisCacheFromClient<StoredEntry<string>>(client);

      const result = await cache.set('app.resilient.k', entry, { ttlMs: 86_400_000 });

      expect(result.isOk()).toBe(true);
      expect(set).toHaveBeenCalledWith('app.resilient.k', payload, 'PX', 86_400_000);
    });

    it('writes without expiry for indefinite entries', async () => {
      const set = vi.spyOn(client, 'set').mockResolvedValue('OK');
      const cache = createRedisCacheFromClient<StoredEntry<string>>(client);

      await cache.set('k', { value: 'v1', logicalExpiresAt: null }, { indefinite: true });

      expect(set).toHaveBeenCalledTimes(1);
      expect(set.mock.calls[0]).toEqual(['k', '{"value":"v1","logicalExpiresAt":null}']);
    });

    it('falls back to the default TTL', async () => {
      const set = vi.spyOn(client, 'set').mockResolvedValue('OK');
      const cache = createRedisCacheFromClient<StoredEntry<string>>(client, {
        defaultTtlMs: 30_000,
      });

      await cache.set('k', entry);

      expect(set).toHaveBeenCalledWith('k', payload, 'PX', 30_000);
    });

    it('uses one hour when no default TTL is configured', async () => {
      const set = vi.spyOn(client, 'set').mockResolvedValue('OK');
      const cache = createRedisCacheFromClient<StoredEntry<string>>(client);

      await cache.set('k', entry);

      expect(set).toHaveBeenCalledWith('k', payload, 'PX', 3_600_000);
    });

    it('returns SerializationError without calling Redis for unencodable values', async () => {
      const set = vi.spyOn(client, 'set').mockResolvedValue('OK');
      const cache = createRedisCacheFromClient<{ id: bigint }>(client);

      const error = (await cache.set('k', { id: 1n }))._unsafeUnwrapErr();

      expect(error.type).toBe('SerializationError');
      expect(set).not.toHaveBeenCalled();
    });

    it('maps write failures to ConnectionError', async () => {
      vi.spyOn(client, 'set').mockRejectedValue(new Error('Connection is closed.'));
      const cache = createRedisCacheFromClient<StoredEntry<string>>(client);

      const error = (await cache.set('k', entry))._unsafeUnwrapErr();

      expect(error.type).toBe('ConnectionError');
      expect(error.message).toBe('Failed to set key: k');
    });
  });

  describe('createRedisCacheWithClient', () => {
    it('applies the configured timeouts to the client', () => {
      const { client: owned } = createRedisCacheWithClient({
        url: 'redis://localhost:6379',
        connectTimeoutMs: 2500,
        commandTimeoutMs: 250,
      });

      expect(owned.options.connectTimeout).toBe(2500);
      expect(owned.options.commandTimeout).toBe(250);
      expect(owned.options.lazyConnect).toBe(true);
      owned.disconnect();
    });
  });
});

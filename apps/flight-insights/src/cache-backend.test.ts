import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ok, err } from 'neverthrow';
import { createFakeRedisClient, createRecordingLogger } from '@flight-insights/result-cache/testing';
import { openCacheBackend } from './cache-backend.js';
import { loadConfig } from './config.js';

const { connectRedisMock } = vi.hoisted(() => ({ connectRedisMock: vi.fn() }));

vi.mock('@flight-insights/result-cache', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@flight-insights/result-cache')>()),
  connectRedis: connectRedisMock,
}));

describe('openCacheBackend', () => {
  beforeEach(() => {
    connectRedisMock.mockReset();
  });

  describe('given the memory backend', () => {
    it('opens without touching Redis and applies the configured TTL', async () => {
      const logger = createRecordingLogger();
      const config = loadConfig({ CACHE_BACKEND: 'memory', CACHE_EXP_IN_MINS: '2' });

      const backend = await openCacheBackend(config, logger);

      expect(backend.isOk()).toBe(true);
      if (backend.isOk()) {
        await backend.value.cache.set('k', 1);
        await backend.value.close();
      }
      expect(connectRedisMock).not.toHaveBeenCalled();
      expect(logger.messages('info')).toEqual([
        'Using in-memory cache',
        'Stored key [k] with expiration of 2 minutes',
      ]);
    });
  });

  describe('given the Redis backend', () => {
    it('builds the cache over the shared connection', async () => {
      const logger = createRecordingLogger();
      const client = createFakeRedisClient();
      const close = vi.fn(() => Promise.resolve());
      connectRedisMock.mockResolvedValue(
        ok({ commands: client, address: 'localhost:6379/0', close })
      );
      const config = loadConfig({});

      const backend = await openCacheBackend(config, logger);

      expect(connectRedisMock).toHaveBeenCalledWith(config.redis, logger);
      expect(backend.isOk()).toBe(true);
      if (backend.isOk()) {
        await backend.value.cache.set('k', 'v');
        expect(client.data.get('k')?.value).toBe('"v"');

        await backend.value.close();
        expect(close).toHaveBeenCalledTimes(1);
      }
    });

    it('passes a connection failure through', async () => {
      const logger = createRecordingLogger();
      const failure = {
        code: 'CONNECTION_ERROR' as const,
        message: 'Could not connect to Redis at localhost:6379/0: connect ECONNREFUSED',
      };
      connectRedisMock.mockResolvedValue(err(failure));

      const backend = await openCacheBackend(loadConfig({}), logger);

      expect(backend.isErr()).toBe(true);
      if (backend.isErr()) {
        expect(backend.error).toEqual(failure);
      }
    });
  });
});

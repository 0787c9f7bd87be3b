import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionkeepErrorCodes, noopLogger } from '@sessionkeep/types';
import { RedisStoreClient } from './redis-store-client.js';

const redis = vi.hoisted(() => {
  const multi = {
    rPush: vi.fn(),
    hSet: vi.fn(),
    hSetNX: vi.fn(),
    expire: vi.fn(),
    exec: vi.fn(async () => []),
  };
  // A connection borrowed from the isolation pool
  const connection = {
    get: vi.fn(async (): Promise<string | null> => null),
    set: vi.fn(async (): Promise<string | null> => 'OK'),
    del: vi.fn(async () => 0),
    exists: vi.fn(async () => 0),
    expire: vi.fn(async () => true),
    ttl: vi.fn(async () => -2),
    scanIterator: vi.fn(async function* (): AsyncGenerator<string> {}),
    lRange: vi.fn(async (): Promise<string[]> => []),
    rPop: vi.fn(async (): Promise<string | null> => null),
    lLen: vi.fn(async () => 0),
    hGetAll: vi.fn(async () => ({})),
    eval: vi.fn(async (): Promise<unknown> => 0),
    multi: vi.fn(() => multi),
  };
  const client = {
    isOpen: false,
    isReady: false,
    on: vi.fn(),
    connect: vi.fn(async () => {
      client.isOpen = true;
      client.isReady = true;
    }),
    quit: vi.fn(async () => {
      client.isOpen = false;
      client.isReady = false;
    }),
    disconnect: vi.fn(async () => {
      client.isOpen = false;
      client.isReady = false;
    }),
    ping: vi.fn(async () => 'PONG'),
    executeIsolated: vi.fn(
      async <T>(operation: (isolated: typeof connection) => Promise<T>): Promise<T> =>
        operation(connection),
    ),
  };
  return { client, connection, multi, createClient: vi.fn(() => client) };
});

vi.mock('redis', () => ({ createClient: redis.createClient }));

describe('RedisStoreClient', () => {
  let store: RedisStoreClient;

  beforeEach(() => {
    vi.clearAllMocks();
    redis.client.isOpen = false;
    redis.client.isReady = false;
    store = new RedisStoreClient({
      url: 'redis://cache:6379',
      database: 2,
      maxConnections: 5,
      commandTimeoutMs: 50,
      logger: noopLogger,
    });
  });

  it('should create the client from its options', () => {
    expect(redis.createClient).toHaveBeenCalledWith({
      url: 'redis://cache:6379',
      database: 2,
      isolationPoolOptions: { max: 5 },
    });
    expect(redis.client.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('should connect once for concurrent first commands', async () => {
    await Promise.all([store.get('a'), store.get('b')]);

    expect(redis.client.connect).toHaveBeenCalledTimes(1);
    expect(redis.connection.get).toHaveBeenCalledTimes(2);
  });

  it('should run data commands on pooled connections and ping on the main one', async () => {
    await store.get('a');
    await store.ping();

    expect(redis.client.executeIsolated).toHaveBeenCalledTimes(1);
    expect(redis.client.ping).toHaveBeenCalledTimes(1);
  });

  describe('set', () => {
    it('should pass NX and EX through', async () => {
      expect(await store.set('lock', 'token', { onlyIfAbsent: true, ttlSeconds: 30 })).toBe(true);

      expect(redis.connection.set).toHaveBeenCalledWith('lock', 'token', { NX: true, EX: 30 });
    });

    it('should write without options', async () => {
      await store.set('k', 'v');

      expect(redis.connection.set).toHaveBeenCalledWith('k', 'v');
    });

    it('should report a refused NX write as false', async () => {
      redis.connection.set.mockResolvedValueOnce(null);

      expect(await store.set('lock', 'token', { onlyIfAbsent: true })).toBe(false);
      expect(redis.connection.set).toHaveBeenCalledWith('lock', 'token', { NX: true });
    });
  });

  it('should skip DEL for an empty key list', async () => {
    expect(await store.del([])).toBe(0);
    expect(redis.connection.del).not.toHaveBeenCalled();
  });

  it('should report existence as a boolean', async () => {
    redis.connection.exists.mockResolvedValueOnce(1);

    expect(await store.exists('k')).toBe(true);
  });

  it('should collect scanned keys without duplicates', async () => {
    redis.connection.scanIterator.mockImplementationOnce(async function* () {
      yield 'agent_context:a';
      yield 'agent_context:b';
      yield 'agent_context:a';
    });

    expect(await store.scanKeys('agent_context:*')).toEqual(['agent_context:a', 'agent_context:b']);
    expect(redis.connection.scanIterator).toHaveBeenCalledWith({ MATCH: 'agent_context:*', COUNT: 100 });
  });

  it('should compare and delete through a script', async () => {
    redis.connection.eval.mockResolvedValueOnce(1);

    expect(await store.deleteIfValue('session_lock:s1', 'token')).toBe(true);
    expect(redis.connection.eval).toHaveBeenCalledWith(expect.stringContaining('redis.call("del"'), {
      keys: ['session_lock:s1'],
      arguments: ['token'],
    });
  });

  it('should apply queued commands in one MULTI', async () => {
    await store
      .multi()
      .hSetNX('agent_session:s1', 'session_id', 's1')
      .rPush('agent_messages:s1', ['{}'])
      .expire('agent_messages:s1', 60)
      .exec();

    expect(redis.connection.multi).toHaveBeenCalledTimes(1);
    expect(redis.multi.hSetNX).toHaveBeenCalledWith('agent_session:s1', 'session_id', 's1');
    expect(redis.multi.rPush).toHaveBeenCalledWith('agent_messages:s1', ['{}']);
    expect(redis.multi.expire).toHaveBeenCalledWith('agent_messages:s1', 60);
    expect(redis.multi.exec).toHaveBeenCalledTimes(1);
  });

  describe('failures', () => {
    it('should raise STORE_UNAVAILABLE when a command fails', async () => {
      redis.connection.get.mockRejectedValueOnce(new Error('Socket closed unexpectedly'));

      await expect(store.get('k')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_UNAVAILABLE,
        message: 'Redis GET failed: Socket closed unexpectedly',
      });
    });

    it('should raise STORE_TIMEOUT when a command hangs', async () => {
      redis.connection.get.mockReturnValueOnce(new Promise<string | null>(() => {}));

      await expect(store.get('k')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_TIMEOUT,
        details: { command: 'GET', timeoutMs: 50 },
      });
    });

    it('should raise STORE_UNAVAILABLE when the connection fails', async () => {
      redis.client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(store.get('k')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_UNAVAILABLE,
        message: 'Redis CONNECT failed: ECONNREFUSED',
      });
    });

    it('should answer ping with false instead of throwing', async () => {
      redis.client.ping.mockRejectedValueOnce(new Error('ECONNRESET'));

      expect(await store.ping()).toBe(false);
    });
  });

  describe('close', () => {
    it('should quit an open connection', async () => {
      await store.connect();
      await store.close();

      expect(redis.client.quit).toHaveBeenCalledTimes(1);
    });

    it('should do nothing when never connected', async () => {
      await store.close();

      expect(redis.client.quit).not.toHaveBeenCalled();
      expect(redis.client.disconnect).not.toHaveBeenCalled();
    });

    it('should drop a connection that never became ready', async () => {
      redis.client.isOpen = true;
      redis.client.isReady = false;

      await store.close();

      expect(redis.client.disconnect).toHaveBeenCalledTimes(1);
      expect(redis.client.quit).not.toHaveBeenCalled();
    });

    it('should connect again after closing a failed connection', async () => {
      redis.client.connect.mockImplementationOnce(async () => {
        redis.client.isOpen = true;
        throw new Error('ECONNREFUSED');
      });
      await expect(store.get('k')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_UNAVAILABLE,
      });

      await store.close();
      await store.get('k');

      expect(redis.client.disconnect).toHaveBeenCalledTimes(1);
      expect(redis.client.connect).toHaveBeenCalledTimes(2);
    });
  });
});

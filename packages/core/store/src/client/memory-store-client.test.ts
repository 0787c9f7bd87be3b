import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionkeepErrorCodes } from '@sessionkeep/types';
import { MemoryStoreClient, globToRegExp } from './memory-store-client.js';

describe('globToRegExp', () => {
  it.each([
    ['agent_session:*', 'agent_session:abc', true],
    ['agent_session:*', 'agent_messages:abc', false],
    ['user-?', 'user-1', true],
    ['user-?', 'user-12', false],
    ['user-[ab]', 'user-b', true],
    ['user-[^ab]', 'user-b', false],
    ['user-[a-c]', 'user-c', true],
    ['app\\*', 'app*', true],
    ['app\\*', 'apps', false],
    ['a.b', 'axb', false],
    ['*', 'line\nbreak', true],
  ])('%s against %j should be %s', (pattern, key, expected) => {
    expect(globToRegExp(pattern).test(key)).toBe(expected);
  });

  it('should treat an unclosed bracket literally', () => {
    expect(globToRegExp('a[b').test('a[b')).toBe(true);
  });
});

describe('MemoryStoreClient', () => {
  let client: MemoryStoreClient;

  beforeEach(() => {
    client = new MemoryStoreClient();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('strings', () => {
    it('should set and get values', async () => {
      expect(await client.set('k', 'v')).toBe(true);
      expect(await client.get('k')).toBe('v');
      expect(await client.get('missing')).toBeNull();
    });

    it('should only set absent keys with onlyIfAbsent', async () => {
      await client.set('k', 'first');

      expect(await client.set('k', 'second', { onlyIfAbsent: true })).toBe(false);
      expect(await client.get('k')).toBe('first');
      expect(await client.set('other', 'value', { onlyIfAbsent: true })).toBe(true);
    });

    it('should delete only the matching value', async () => {
      await client.set('lock', 'token-a');

      expect(await client.deleteIfValue('lock', 'token-b')).toBe(false);
      expect(await client.deleteIfValue('lock', 'token-a')).toBe(true);
      expect(await client.exists('lock')).toBe(false);
    });

    it('should count deleted keys', async () => {
      await client.set('a', '1');
      await client.set('b', '2');

      expect(await client.del(['a', 'b', 'c'])).toBe(2);
      expect(await client.del([])).toBe(0);
    });
  });

  describe('expiry', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('should report -1 without expiry and -2 for absent keys', async () => {
      await client.set('k', 'v');

      expect(await client.ttl('k')).toBe(-1);
      expect(await client.ttl('missing')).toBe(-2);
    });

    it('should expire keys once their time is up', async () => {
      await client.set('k', 'v', { ttlSeconds: 1 });
      expect(await client.ttl('k')).toBe(1);

      vi.advanceTimersByTime(999);
      expect(await client.get('k')).toBe('v');

      vi.advanceTimersByTime(1);
      expect(await client.get('k')).toBeNull();
      expect(await client.ttl('k')).toBe(-2);
    });

    it('should let an expired key be set again with onlyIfAbsent', async () => {
      await client.set('lock', 'old', { ttlSeconds: 1 });
      vi.advanceTimersByTime(1000);

      expect(await client.set('lock', 'new', { onlyIfAbsent: true })).toBe(true);
    });

    it('should restart expiry with expire', async () => {
      await client.set('k', 'v', { ttlSeconds: 10 });
      vi.advanceTimersByTime(8000);

      expect(await client.expire('k', 10)).toBe(true);
      vi.advanceTimersByTime(8000);
      expect(await client.get('k')).toBe('v');
    });

    it('should delete the key when expire gets a non-positive time', async () => {
      await client.set('k', 'v');

      expect(await client.expire('k', 0)).toBe(true);
      expect(await client.exists('k')).toBe(false);
      expect(await client.expire('k', 10)).toBe(false);
    });
  });

  describe('lists', () => {
    beforeEach(async () => {
      await client.multi().rPush('list', ['a', 'b', 'c', 'd']).exec();
    });

    it('should resolve negative indexes from the tail', async () => {
      expect(await client.lRange('list', 0, -1)).toEqual(['a', 'b', 'c', 'd']);
      expect(await client.lRange('list', -2, -1)).toEqual(['c', 'd']);
      expect(await client.lRange('list', -10, 1)).toEqual(['a', 'b']);
      expect(await client.lRange('list', 3, 1)).toEqual([]);
      expect(await client.lRange('missing', 0, -1)).toEqual([]);
    });

    it('should pop from the tail and drop an emptied list', async () => {
      expect(await client.rPop('list')).toBe('d');
      expect(await client.lLen('list')).toBe(3);

      await client.rPop('list');
      await client.rPop('list');
      await client.rPop('list');

      expect(await client.exists('list')).toBe(false);
      expect(await client.rPop('list')).toBeNull();
    });
  });

  describe('hashes', () => {
    it('should only set new fields with hSetNX', async () => {
      await client
        .multi()
        .hSetNX('h', 'created', '1')
        .hSet('h', { updated: '1' })
        .exec();
      await client
        .multi()
        .hSetNX('h', 'created', '2')
        .hSet('h', { updated: '2' })
        .exec();

      expect(await client.hGetAll('h')).toEqual({ created: '1', updated: '2' });
      expect(await client.hGetAll('missing')).toEqual({});
    });
  });

  describe('transactions', () => {
    it('should apply nothing before exec', async () => {
      const tx = client.multi().rPush('list', ['a']);

      expect(await client.exists('list')).toBe(false);
      await tx.exec();
      expect(await client.lLen('list')).toBe(1);
    });
  });

  describe('scanKeys', () => {
    it('should return live keys matching the pattern', async () => {
      vi.useFakeTimers();
      await client.set('agent_context:a', '{}');
      await client.set('agent_context:b', '{}', { ttlSeconds: 1 });
      await client.set('agent_session:a', '{}');
      vi.advanceTimersByTime(1000);

      expect(await client.scanKeys('agent_context:*')).toEqual(['agent_context:a']);
    });
  });

  describe('errors', () => {
    it('should refuse commands against the wrong kind of value', async () => {
      await client.set('k', 'v');

      await expect(client.lRange('k', 0, -1)).rejects.toMatchObject({
        code: SessionkeepErrorCodes.INTERNAL,
      });
    });

    it('should refuse commands once closed', async () => {
      await client.close();

      expect(await client.ping()).toBe(false);
      await expect(client.get('k')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_UNAVAILABLE,
      });
    });

    it('should refuse writes once closed', async () => {
      await client.close();

      await expect(client.set('k', 'v')).rejects.toMatchObject({
        code: SessionkeepErrorCodes.STORE_UNAVAILABLE,
      });
      await client.connect();
      expect(await client.get('k')).toBeNull();
    });

    it('should serve again after reconnecting', async () => {
      await client.set('k', 'v');
      await client.close();
      await client.connect();

      expect(await client.ping()).toBe(true);
      expect(await client.get('k')).toBe('v');
    });
  });
});

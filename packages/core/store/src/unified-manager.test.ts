import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Type, type Static } from '@sinclair/typebox';
import { noopLogger } from '@sessionkeep/types';
import { MemoryStoreClient } from './client/memory-store-client.js';
import { createTypeBoxCodec } from './codec.js';
import { KeyLayout } from './keys.js';
import { UnifiedSessionManager } from './unified-manager.js';

const TravelContextSchema = Type.Object({
  session_id: Type.String(),
  user_id: Type.String(),
  destination: Type.Optional(Type.String()),
  preferences: Type.Array(Type.String(), { default: [] }),
});

type TravelContext = Static<typeof TravelContextSchema>;

describe('UnifiedSessionManager', () => {
  let client: MemoryStoreClient;
  let manager: UnifiedSessionManager<TravelContext>;
  const keys = new KeyLayout();

  function createManager(options: { ownsClient?: boolean; contextSeconds?: number } = {}) {
    return new UnifiedSessionManager<TravelContext>({
      client,
      codec: createTypeBoxCodec(TravelContextSchema, {
        summarize: (context) => ({
          destination: context.destination ?? null,
          preferences: context.preferences.length,
        }),
      }),
      createDefaultContext: ({ sessionId, userId }) => ({
        session_id: sessionId,
        user_id: userId,
        preferences: [],
      }),
      ttl: { contextSeconds: options.contextSeconds },
      ownsClient: options.ownsClient,
      logger: noopLogger,
    });
  }

  beforeEach(() => {
    client = new MemoryStoreClient();
    manager = createManager();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('getOrCreateContext', () => {
    it('should create the default context once', async () => {
      const created = await manager.getOrCreateContext('s1', 'alice');
      await manager.saveContext('s1', { ...created, destination: 'Lisbon' });

      const again = await manager.getOrCreateContext('s1', 'bob');

      expect(again).toEqual({
        session_id: 's1',
        user_id: 'alice',
        destination: 'Lisbon',
        preferences: [],
      });
    });

    it('should restart the expiry of an existing context', async () => {
      vi.useFakeTimers();
      manager = createManager({ contextSeconds: 100 });
      await manager.getOrCreateContext('s1', 'alice');
      vi.advanceTimersByTime(60_000);

      await manager.getOrCreateContext('s1', 'alice');

      expect(await client.ttl(keys.contextKey('s1'))).toBe(100);
    });
  });

  it('should patch fields of the stored context', async () => {
    await manager.getOrCreateContext('s1', 'alice');

    const patched = await manager.patchContext('s1', { destination: 'Porto' });

    expect(patched?.destination).toBe('Porto');
    expect(patched?.user_id).toBe('alice');
    expect(await manager.patchContext('missing', { destination: 'Porto' })).toBeNull();
  });

  it('should run locked read-modify-write', async () => {
    const count = await manager.withContext('s1', 'alice', (context) => {
      context.preferences.push('window seat');
      return context.preferences.length;
    });

    expect(count).toBe(1);
    expect((await manager.contexts.get('s1'))?.preferences).toEqual(['window seat']);
  });

  it('should delete messages and context together', async () => {
    await manager.log.append('s1', [{ role: 'user', content: 'hi' }]);
    await manager.getOrCreateContext('s1', 'alice');

    expect(await manager.deleteEverything('s1')).toEqual({
      messagesDeleted: true,
      contextDeleted: true,
    });
    expect(await manager.deleteEverything('s1')).toEqual({
      messagesDeleted: false,
      contextDeleted: false,
    });
  });

  describe('overview', () => {
    it('should summarize the context', async () => {
      await manager.log.append('s1', [{ role: 'user', content: 'hi' }]);
      await manager.saveContext('s1', {
        session_id: 's1',
        user_id: 'alice',
        destination: 'Lisbon',
        preferences: ['aisle'],
      });

      const overview = await manager.overview('s1');

      expect(overview.hasMessages).toBe(true);
      expect(overview.hasContext).toBe(true);
      expect(overview.sessionInfo?.sessionId).toBe('s1');
      expect(overview.context).toEqual({ destination: 'Lisbon', preferences: 1 });
    });

    it('should report an unknown session as empty', async () => {
      expect(await manager.overview('s1')).toEqual({
        sessionInfo: null,
        context: null,
        hasMessages: false,
        hasContext: false,
      });
    });
  });

  it('should list every session once', async () => {
    await manager.log.append('a', [{ n: 1 }]);
    await manager.log.append('b', [{ n: 1 }]);
    await manager.getOrCreateContext('b', 'alice');
    await manager.getOrCreateContext('c', 'alice');

    expect(await manager.listAllSessions()).toEqual({
      totalSessions: 3,
      sessionsWithMessages: 2,
      sessionsWithContexts: 2,
      sessionIds: ['a', 'b', 'c'],
    });
  });

  it('should report cleanup results', async () => {
    expect(await manager.cleanupExpired()).toEqual({ expiredContexts: 0 });
  });

  it('should report health with the store kind', async () => {
    const health = await manager.healthCheck();

    expect(health.healthy).toBe(true);
    expect(health.store).toBe('memory');
    expect(health.latencyMs).toBeGreaterThanOrEqual(0);
  });

  describe('close', () => {
    it('should leave a borrowed client open', async () => {
      await manager.close();

      expect(await client.ping()).toBe(true);
    });

    it('should close a client it owns', async () => {
      manager = createManager({ ownsClient: true });

      await manager.close();

      expect(await client.ping()).toBe(false);
    });
  });
});

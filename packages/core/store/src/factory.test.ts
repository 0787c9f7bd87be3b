import { describe, it, expect } from 'vitest';
import { withDefaults } from '@sessionkeep/config';
import { noopLogger } from '@sessionkeep/types';
import { MemoryStoreClient } from './client/memory-store-client.js';
import { createJsonCodec } from './codec.js';
import { createSessionManager, createStoreClient } from './factory.js';

describe('createStoreClient', () => {
  it('should build an in-process client for the memory provider', () => {
    const config = withDefaults({ store: { provider: 'memory' } });

    expect(createStoreClient(config.store)).toBeInstanceOf(MemoryStoreClient);
  });

  it('should build a Redis client without connecting', () => {
    const config = withDefaults({ store: { provider: 'redis', url: 'redis://cache:6379' } });

    expect(createStoreClient(config.store, noopLogger).kind).toBe('redis');
  });
});

describe('createSessionManager', () => {
  it('should apply prefixes and TTLs from the configuration', async () => {
    const client = new MemoryStoreClient();
    const config = withDefaults({
      store: { provider: 'memory' },
      keys: { messages_prefix: 'chat_log', context_prefix: 'chat_ctx' },
      ttl: { default_seconds: 600, context_seconds: 120 },
    });
    const manager = createSessionManager({
      config,
      codec: createJsonCodec(),
      createDefaultContext: ({ sessionId }) => ({ session_id: sessionId }),
      client,
      logger: noopLogger,
    });

    await manager.log.append('s1', [{ n: 1 }]);
    await manager.getOrCreateContext('s1', 'alice');

    expect(await client.ttl('chat_log:s1')).toBe(600);
    expect(await client.ttl('agent_session:s1')).toBe(600);
    expect(await client.ttl('chat_ctx:s1')).toBe(120);
  });

  it('should take lock settings from the configuration', () => {
    const manager = createSessionManager({
      config: withDefaults({ store: { provider: 'memory' }, lock: { retries: 1 } }),
      codec: createJsonCodec(),
      createDefaultContext: ({ sessionId }) => ({ session_id: sessionId }),
      client: new MemoryStoreClient(),
      logger: noopLogger,
    });

    expect(manager.locks.options).toEqual({ timeoutSeconds: 30, retries: 1, backoffBaseMs: 500 });
  });

  it('should not close a client it was given', async () => {
    const client = new MemoryStoreClient();
    const manager = createSessionManager({
      config: withDefaults({ store: { provider: 'memory' } }),
      codec: createJsonCodec(),
      createDefaultContext: ({ sessionId }) => ({ session_id: sessionId }),
      client,
      logger: noopLogger,
    });

    await manager.close();

    expect(await client.ping()).toBe(true);
  });
});

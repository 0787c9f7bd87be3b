/**
 * Build a session manager from a loaded configuration.
 */

import {
  ConsoleLogger,
  type ContextCodec,
  type DefaultContextFactory,
  type Logger,
  type StoreClient,
} from '@sessionkeep/types';
import { resolveTtlSeconds, type SessionkeepConfig, type StoreSection } from '@sessionkeep/config';
import { MemoryStoreClient } from './client/memory-store-client.js';
import { RedisStoreClient } from './client/redis-store-client.js';
import { KeyLayout } from './keys.js';
import { UnifiedSessionManager } from './unified-manager.js';

export function createStoreClient(store: StoreSection, logger?: Logger): StoreClient {
  if (store.provider === 'memory') {
    return new MemoryStoreClient();
  }
  return new RedisStoreClient({
    url: store.url,
    database: store.database,
    maxConnections: store.max_connections,
    commandTimeoutMs: store.command_timeout_ms,
    logger,
  });
}

export interface CreateSessionManagerOptions<T extends object> {
  config: SessionkeepConfig;
  codec: ContextCodec<T>;
  createDefaultContext: DefaultContextFactory<T>;
  /** Use an existing client; the manager will not close it */
  client?: StoreClient;
  logger?: Logger;
}

export function createSessionManager<T extends object>(
  options: CreateSessionManagerOptions<T>,
): UnifiedSessionManager<T> {
  const { config } = options;
  const logger = options.logger ?? new ConsoleLogger('sessionkeep', config.runtime.log_level);
  const client = options.client ?? createStoreClient(config.store, logger);

  return new UnifiedSessionManager({
    client,
    ownsClient: options.client === undefined,
    codec: options.codec,
    createDefaultContext: options.createDefaultContext,
    keys: KeyLayout.fromConfig(config.keys),
    ttl: {
      messagesSeconds: resolveTtlSeconds(config, 'messages'),
      sessionSeconds: resolveTtlSeconds(config, 'session'),
      contextSeconds: resolveTtlSeconds(config, 'context'),
    },
    lock: {
      timeoutSeconds: config.lock.timeout_seconds,
      retries: config.lock.retries,
      backoffBaseMs: config.lock.backoff_base_ms,
    },
    logger,
  });
}

/**
 * @sessionkeep/store - session and context persistence
 */

// Store clients
export { MemoryStoreClient, globToRegExp } from './client/memory-store-client.js';
export { RedisStoreClient, type RedisStoreClientOptions } from './client/redis-store-client.js';

// Keys
export {
  KeyLayout,
  DEFAULT_KEY_PREFIXES,
  escapeGlob,
  assertSessionId,
  assertTtl,
  type KeyPrefixes,
  type KeyFamily,
  type WriteOptions,
} from './keys.js';

// Codecs
export { createTypeBoxCodec, createJsonCodec, type TypeBoxCodecOptions } from './codec.js';

// Components
export { ConversationLog, type ConversationLogOptions } from './conversation-log.js';
export { ContextStore, type ContextStoreOptions } from './context-store.js';
export {
  SessionLock,
  SessionLockManager,
  DEFAULT_LOCK_OPTIONS,
  getLockOptions,
  type LockOptions,
  type SessionLockManagerOptions,
  type Sleep,
} from './lock.js';
export {
  ContextCoordinator,
  type ContextCoordinatorOptions,
  type ContextWork,
} from './coordinator.js';

// Facade
export {
  UnifiedSessionManager,
  type UnifiedSessionManagerOptions,
  type TtlOptions,
  type DeleteResult,
  type SessionOverview,
  type SessionListing,
  type CleanupResult,
  type HealthStatus,
} from './unified-manager.js';
export { AgentSession } from './agent-session.js';
export {
  createSessionManager,
  createStoreClient,
  type CreateSessionManagerOptions,
} from './factory.js';

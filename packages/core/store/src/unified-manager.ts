/**
 * Unified session manager: conversation log, context store and coordinator
 * behind one surface. Adds no locking of its own; use `withContext` for
 * exclusive read-modify-write.
 */

import {
  ConsoleLogger,
  type ContextCodec,
  type DefaultContextFactory,
  type Logger,
  type SessionMetadata,
  type StoreClient,
} from '@sessionkeep/types';
import { ConversationLog } from './conversation-log.js';
import { ContextStore } from './context-store.js';
import { ContextCoordinator, type ContextWork } from './coordinator.js';
import { KeyLayout, type WriteOptions } from './keys.js';
import { SessionLockManager, type LockOptions, type Sleep } from './lock.js';
import { AgentSession } from './agent-session.js';

export interface TtlOptions {
  messagesSeconds?: number;
  sessionSeconds?: number;
  contextSeconds?: number;
}

export interface UnifiedSessionManagerOptions<T extends object> {
  client: StoreClient;
  codec: ContextCodec<T>;
  createDefaultContext: DefaultContextFactory<T>;
  keys?: KeyLayout;
  ttl?: TtlOptions;
  lock?: Partial<LockOptions>;
  logger?: Logger;
  /** Close the client in `close()` (default: false) */
  ownsClient?: boolean;
  clock?: () => number;
  sleep?: Sleep;
}

export interface DeleteResult {
  messagesDeleted: boolean;
  contextDeleted: boolean;
}

export interface SessionOverview<T> {
  sessionInfo: SessionMetadata | null;
  /** The codec's summary when it has one, else the record */
  context: Record<string, unknown> | T | null;
  hasMessages: boolean;
  hasContext: boolean;
}

export interface SessionListing {
  totalSessions: number;
  sessionsWithMessages: number;
  sessionsWithContexts: number;
  sessionIds: string[];
}

export interface CleanupResult {
  expiredContexts: number;
}

export interface HealthStatus {
  healthy: boolean;
  store: StoreClient['kind'];
  latencyMs: number;
}

export class UnifiedSessionManager<T extends object> {
  readonly log: ConversationLog;
  readonly contexts: ContextStore<T>;
  readonly coordinator: ContextCoordinator<T>;
  readonly locks: SessionLockManager;
  private readonly client: StoreClient;
  private readonly codec: ContextCodec<T>;
  private readonly createDefaultContext: DefaultContextFactory<T>;
  private readonly ownsClient: boolean;
  private readonly logger: Logger;

  constructor(options: UnifiedSessionManagerOptions<T>) {
    const { client, codec, ttl = {} } = options;
    const keys = options.keys ?? new KeyLayout();
    const logger = options.logger ?? new ConsoleLogger('sessionkeep');

    this.client = client;
    this.codec = codec;
    this.createDefaultContext = options.createDefaultContext;
    this.ownsClient = options.ownsClient ?? false;
    this.logger = logger;

    this.log = new ConversationLog({
      client,
      keys,
      messagesTtlSeconds: ttl.messagesSeconds,
      sessionTtlSeconds: ttl.sessionSeconds,
      logger,
      clock: options.clock,
    });
    this.contexts = new ContextStore({
      client,
      codec,
      keys,
      ttlSeconds: ttl.contextSeconds,
      logger,
    });
    this.locks = new SessionLockManager({
      client,
      keys,
      lock: options.lock,
      logger,
      sleep: options.sleep,
    });
    this.coordinator = new ContextCoordinator({
      contexts: this.contexts,
      locks: this.locks,
      logger,
    });
  }

  /**
   * Existing context with its expiry restarted, or a freshly stored default.
   * Lock-free and racy for first-time callers; prefer `withContext`.
   */
  async getOrCreateContext(
    sessionId: string,
    userId: string,
    options: WriteOptions = {},
  ): Promise<T> {
    const existing = await this.contexts.get(sessionId);
    if (existing) {
      await this.contexts.extendTtl(sessionId, options.ttlSeconds);
      return existing;
    }
    return this.contexts.put(sessionId, this.createDefaultContext({ sessionId, userId }), options);
  }

  saveContext(sessionId: string, context: T, options: WriteOptions = {}): Promise<T> {
    return this.contexts.put(sessionId, context, options);
  }

  patchContext(sessionId: string, updates: Partial<T>, options: WriteOptions = {}): Promise<T | null> {
    return this.contexts.patch(sessionId, updates, options);
  }

  /**
   * Locked read-modify-write of the session's context
   */
  withContext<R>(
    sessionId: string,
    userId: string,
    work: ContextWork<T, R>,
    options: WriteOptions = {},
  ): Promise<R> {
    return this.coordinator.run(
      sessionId,
      () => this.createDefaultContext({ sessionId, userId }),
      work,
      options,
    );
  }

  async deleteEverything(sessionId: string): Promise<DeleteResult> {
    const messagesDeleted = await this.log.clear(sessionId);
    const contextDeleted = await this.contexts.delete(sessionId);
    return { messagesDeleted, contextDeleted };
  }

  async overview(sessionId: string): Promise<SessionOverview<T>> {
    const sessionInfo = await this.log.getSessionInfo(sessionId);
    const context = await this.contexts.get(sessionId);
    return {
      sessionInfo,
      context: context && this.codec.summarize ? this.codec.summarize(context) : context,
      hasMessages: sessionInfo !== null,
      hasContext: context !== null,
    };
  }

  async listAllSessions(): Promise<SessionListing> {
    const withMessages = await this.log.listSessions();
    const withContexts = await this.contexts.listActive();
    const sessionIds = [...new Set([...withMessages, ...withContexts])].sort();
    return {
      totalSessions: sessionIds.length,
      sessionsWithMessages: withMessages.length,
      sessionsWithContexts: withContexts.length,
      sessionIds,
    };
  }

  /**
   * Logs and metadata expire on their own; this reports contexts seen expiring.
   */
  async cleanupExpired(): Promise<CleanupResult> {
    const expiredContexts = await this.contexts.sweepExpired();
    if (expiredContexts > 0) {
      this.logger.info(`Observed ${expiredContexts} expired context(s)`);
    }
    return { expiredContexts };
  }

  /**
   * Per-session wrapper for request handlers
   */
  session(sessionId: string, userId: string, options: WriteOptions = {}): AgentSession<T> {
    return new AgentSession(this, sessionId, userId, options.ttlSeconds);
  }

  async healthCheck(): Promise<HealthStatus> {
    const started = Date.now();
    const healthy = await this.client.ping();
    return { healthy, store: this.client.kind, latencyMs: Date.now() - started };
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.close();
    }
  }
}

/**
 * One session's view of the unified manager. Holds ids and the TTL override
 * only; every call goes to the store.
 */

import type { ConversationItem, SessionMetadata } from '@sessionkeep/types';
import type { ContextWork } from './coordinator.js';
import type { WriteOptions } from './keys.js';
import type { DeleteResult, SessionOverview, UnifiedSessionManager } from './unified-manager.js';

export class AgentSession<T extends object> {
  constructor(
    private readonly manager: UnifiedSessionManager<T>,
    readonly sessionId: string,
    readonly userId: string,
    readonly ttlSeconds?: number,
  ) {}

  private get writeOptions(): WriteOptions {
    return { ttlSeconds: this.ttlSeconds };
  }

  // Conversation items

  getItems(limit?: number): Promise<ConversationItem[]> {
    return this.manager.log.read(this.sessionId, limit);
  }

  addItems(items: ConversationItem[]): Promise<void> {
    return this.manager.log.append(this.sessionId, items, this.writeOptions);
  }

  /**
   * Newest item, or null when the log is empty or the removed entry was corrupt
   */
  async popItem(): Promise<ConversationItem | null> {
    const result = await this.manager.log.popLast(this.sessionId, this.writeOptions);
    return result.status === 'popped' ? result.item : null;
  }

  size(): Promise<number> {
    return this.manager.log.size(this.sessionId);
  }

  clear(): Promise<boolean> {
    return this.manager.log.clear(this.sessionId);
  }

  getSessionInfo(): Promise<SessionMetadata | null> {
    return this.manager.log.getSessionInfo(this.sessionId);
  }

  // Context

  getContext(): Promise<T> {
    return this.manager.getOrCreateContext(this.sessionId, this.userId, this.writeOptions);
  }

  saveContext(context: T): Promise<T> {
    return this.manager.saveContext(this.sessionId, context, this.writeOptions);
  }

  /**
   * Re-read the stored context (creating the default if it has gone)
   */
  refreshContext(): Promise<T> {
    return this.getContext();
  }

  patchContext(updates: Partial<T>): Promise<T | null> {
    return this.manager.patchContext(this.sessionId, updates, this.writeOptions);
  }

  withContext<R>(work: ContextWork<T, R>): Promise<R> {
    return this.manager.withContext(this.sessionId, this.userId, work, this.writeOptions);
  }

  // Whole session

  overview(): Promise<SessionOverview<T>> {
    return this.manager.overview(this.sessionId);
  }

  deleteCompletely(): Promise<DeleteResult> {
    return this.manager.deleteEverything(this.sessionId);
  }
}

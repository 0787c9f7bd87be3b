/**
 * Conversation Log
 *
 * Ordered, append-only list of conversation items per session plus the
 * session metadata hash kept beside it. Both keys share the session's expiry.
 */

import {
  ConsoleLogger,
  ConversationItemSchema,
  createInvalidArgumentError,
  validateConversationItem,
  validateOrThrow,
  validateSessionMetadataHash,
  type ConversationItem,
  type Logger,
  type PopResult,
  type SessionMetadata,
  type StoreClient,
  type StoreTransaction,
} from '@sessionkeep/types';
import { KeyLayout, assertSessionId, assertTtl, type WriteOptions } from './keys.js';

const COMPONENT = 'conversation-log';

export interface ConversationLogOptions {
  client: StoreClient;
  keys?: KeyLayout;
  /** Expiry of the item list; undefined = no expiry */
  messagesTtlSeconds?: number;
  /** Expiry of the metadata hash; undefined = no expiry */
  sessionTtlSeconds?: number;
  logger?: Logger;
  /** Milliseconds since epoch */
  clock?: () => number;
}

function decodeItem(raw: string): ConversationItem | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = validateConversationItem(parsed);
  return result.success && result.data ? result.data : null;
}

export class ConversationLog {
  private readonly client: StoreClient;
  private readonly keys: KeyLayout;
  private readonly messagesTtl?: number;
  private readonly sessionTtl?: number;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private lastTimestamp = 0;

  constructor(options: ConversationLogOptions) {
    assertTtl(options.messagesTtlSeconds, COMPONENT);
    assertTtl(options.sessionTtlSeconds, COMPONENT);
    this.client = options.client;
    this.keys = options.keys ?? new KeyLayout();
    this.messagesTtl = options.messagesTtlSeconds;
    this.sessionTtl = options.sessionTtlSeconds;
    this.logger = options.logger ?? new ConsoleLogger(COMPONENT);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Append items to the tail in order. An empty batch touches nothing.
   */
  async append(
    sessionId: string,
    items: ConversationItem[],
    options: WriteOptions = {},
  ): Promise<void> {
    assertSessionId(sessionId, COMPONENT);
    assertTtl(options.ttlSeconds, COMPONENT);
    if (items.length === 0) return;

    const encoded = items.map((item) =>
      JSON.stringify(validateOrThrow(ConversationItemSchema, item, COMPONENT)),
    );

    const tx = this.stampMetadata(this.client.multi(), sessionId).rPush(
      this.keys.messagesKey(sessionId),
      encoded,
    );
    await this.applyExpiry(tx, sessionId, options.ttlSeconds).exec();
  }

  /**
   * Items oldest-first. With a limit, only the newest `limit` items.
   * Entries that fail to decode are dropped.
   */
  async read(sessionId: string, limit?: number): Promise<ConversationItem[]> {
    assertSessionId(sessionId, COMPONENT);
    if (limit !== undefined) {
      if (!Number.isSafeInteger(limit) || limit < 0) {
        throw createInvalidArgumentError('Limit must be a non-negative integer', {
          component: COMPONENT,
          details: { sessionId, limit },
        });
      }
      if (limit === 0) return [];
    }

    const start = limit === undefined ? 0 : -limit;
    const raw = await this.client.lRange(this.keys.messagesKey(sessionId), start, -1);

    const items: ConversationItem[] = [];
    for (const entry of raw) {
      const item = decodeItem(entry);
      if (item) items.push(item);
    }
    if (items.length < raw.length) {
      this.logger.debug(`Skipped ${raw.length - items.length} corrupt item(s) in session ${sessionId}`);
    }
    return items;
  }

  /**
   * Remove the newest item. A corrupt entry is still removed and reported as such.
   */
  async popLast(sessionId: string, options: WriteOptions = {}): Promise<PopResult> {
    assertSessionId(sessionId, COMPONENT);
    assertTtl(options.ttlSeconds, COMPONENT);

    const raw = await this.client.rPop(this.keys.messagesKey(sessionId));
    if (raw === null) {
      return { status: 'empty' };
    }

    const tx = this.stampMetadata(this.client.multi(), sessionId);
    await this.applyExpiry(tx, sessionId, options.ttlSeconds).exec();

    const item = decodeItem(raw);
    if (!item) {
      this.logger.warn(`Discarded corrupt last item of session ${sessionId}`);
      return { status: 'corrupt', raw };
    }
    return { status: 'popped', item };
  }

  /**
   * Delete items and metadata. True when either existed.
   */
  async clear(sessionId: string): Promise<boolean> {
    assertSessionId(sessionId, COMPONENT);
    const removed = await this.client.del([
      this.keys.sessionKey(sessionId),
      this.keys.messagesKey(sessionId),
    ]);
    return removed > 0;
  }

  /**
   * Physical entry count, corrupt entries included
   */
  async size(sessionId: string): Promise<number> {
    assertSessionId(sessionId, COMPONENT);
    return this.client.lLen(this.keys.messagesKey(sessionId));
  }

  async getSessionInfo(sessionId: string): Promise<SessionMetadata | null> {
    assertSessionId(sessionId, COMPONENT);
    const hash = await this.client.hGetAll(this.keys.sessionKey(sessionId));
    if (Object.keys(hash).length === 0) {
      return null;
    }

    const result = validateSessionMetadataHash(hash);
    if (!result.success || !result.data) {
      this.logger.warn(`Ignoring malformed metadata for session ${sessionId}`);
      return null;
    }
    return {
      sessionId: result.data.session_id,
      createdAt: Number(result.data.created_at),
      updatedAt: Number(result.data.updated_at),
    };
  }

  /**
   * Refresh `updated_at` and expiry of an existing session
   *
   * @returns false when the session has no metadata
   */
  async touch(sessionId: string, options: WriteOptions = {}): Promise<boolean> {
    assertSessionId(sessionId, COMPONENT);
    assertTtl(options.ttlSeconds, COMPONENT);
    if (!(await this.client.exists(this.keys.sessionKey(sessionId)))) {
      return false;
    }
    const tx = this.stampMetadata(this.client.multi(), sessionId);
    await this.applyExpiry(tx, sessionId, options.ttlSeconds).exec();
    return true;
  }

  /**
   * Session ids that have metadata, optionally filtered by an id glob
   */
  async listSessions(pattern = '*'): Promise<string[]> {
    const keys = await this.client.scanKeys(this.keys.pattern('session', pattern));
    const ids = new Set<string>();
    for (const key of keys) {
      const id = this.keys.sessionIdOf('session', key);
      if (id) ids.add(id);
    }
    return [...ids].sort();
  }

  /**
   * Queue metadata creation (fields only set when missing) and the `updated_at` refresh
   */
  private stampMetadata(tx: StoreTransaction, sessionId: string): StoreTransaction {
    const key = this.keys.sessionKey(sessionId);
    const now = this.timestamp();
    return tx
      .hSetNX(key, 'session_id', sessionId)
      .hSetNX(key, 'created_at', now)
      .hSet(key, { updated_at: now });
  }

  private applyExpiry(
    tx: StoreTransaction,
    sessionId: string,
    override?: number,
  ): StoreTransaction {
    const sessionTtl = override ?? this.sessionTtl;
    const messagesTtl = override ?? this.messagesTtl;
    if (sessionTtl) tx.expire(this.keys.sessionKey(sessionId), sessionTtl);
    if (messagesTtl) tx.expire(this.keys.messagesKey(sessionId), messagesTtl);
    return tx;
  }

  /**
   * Fractional epoch seconds, never going backwards within this instance
   */
  private timestamp(): string {
    const now = Math.max(this.clock(), this.lastTimestamp);
    this.lastTimestamp = now;
    return String(now / 1000);
  }
}

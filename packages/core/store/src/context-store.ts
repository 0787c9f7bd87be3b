/**
 * Context Store
 *
 * One serialized context record per session, written whole and read whole.
 */

import {
  ConsoleLogger,
  SessionkeepErrorCodes,
  hasErrorCode,
  type ContextCodec,
  type Logger,
  type StoreClient,
} from '@sessionkeep/types';
import { KeyLayout, assertSessionId, assertTtl, type WriteOptions } from './keys.js';

const COMPONENT = 'context-store';

export interface ContextStoreOptions<T> {
  client: StoreClient;
  codec: ContextCodec<T>;
  keys?: KeyLayout;
  /** Default expiry; undefined = no expiry */
  ttlSeconds?: number;
  logger?: Logger;
}

export class ContextStore<T extends object> {
  private readonly client: StoreClient;
  private readonly codec: ContextCodec<T>;
  private readonly keys: KeyLayout;
  private readonly ttlSeconds?: number;
  private readonly logger: Logger;

  constructor(options: ContextStoreOptions<T>) {
    assertTtl(options.ttlSeconds, COMPONENT);
    this.client = options.client;
    this.codec = options.codec;
    this.keys = options.keys ?? new KeyLayout();
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger ?? new ConsoleLogger(COMPONENT);
  }

  /**
   * Stored record, or null when absent, expired or undecodable
   */
  async get(sessionId: string): Promise<T | null> {
    assertSessionId(sessionId, COMPONENT);
    const raw = await this.client.get(this.keys.contextKey(sessionId));
    if (raw === null) return null;

    try {
      return this.codec.deserialize(raw);
    } catch (error) {
      if (
        hasErrorCode(error, SessionkeepErrorCodes.DECODE_FAILED) ||
        hasErrorCode(error, SessionkeepErrorCodes.VALIDATION)
      ) {
        this.logger.warn(`Treating corrupt context of session ${sessionId} as absent`, error);
        return null;
      }
      throw error;
    }
  }

  /**
   * Validate and overwrite the whole record
   *
   * @returns the record as stored (schema defaults applied)
   */
  async put(sessionId: string, record: T, options: WriteOptions = {}): Promise<T> {
    assertSessionId(sessionId, COMPONENT);
    assertTtl(options.ttlSeconds, COMPONENT);
    const validated = this.codec.validate(record);
    await this.client.set(this.keys.contextKey(sessionId), this.codec.serialize(validated), {
      ttlSeconds: options.ttlSeconds ?? this.ttlSeconds,
    });
    return validated;
  }

  /**
   * Existing record, or the stored default.
   * Not atomic: racing callers on an absent key may each write their default,
   * and the last write survives. Use the coordinator for exclusive access.
   */
  async getOrCreate(sessionId: string, defaultRecord: T, options: WriteOptions = {}): Promise<T> {
    const existing = await this.get(sessionId);
    if (existing) return existing;
    return this.put(sessionId, defaultRecord, options);
  }

  /**
   * Merge field updates into the stored record and write it back.
   * Returns null, writing nothing, when there is no record.
   *
   * @throws SessionkeepError (VALIDATION) if the merged record is invalid; the stored record is untouched
   */
  async patch(
    sessionId: string,
    updates: Partial<T>,
    options: WriteOptions = {},
  ): Promise<T | null> {
    const existing = await this.get(sessionId);
    if (!existing) return null;
    return this.put(sessionId, { ...existing, ...updates }, options);
  }

  async delete(sessionId: string): Promise<boolean> {
    assertSessionId(sessionId, COMPONENT);
    return (await this.client.del([this.keys.contextKey(sessionId)])) > 0;
  }

  /**
   * Restart the record's expiry. Without any TTL this only reports existence.
   */
  async extendTtl(sessionId: string, ttlSeconds?: number): Promise<boolean> {
    assertSessionId(sessionId, COMPONENT);
    assertTtl(ttlSeconds, COMPONENT);
    const key = this.keys.contextKey(sessionId);
    const ttl = ttlSeconds ?? this.ttlSeconds;
    if (!ttl) {
      return this.client.exists(key);
    }
    return this.client.expire(key, ttl);
  }

  /**
   * Session ids holding a context right now; a point-in-time snapshot
   */
  async listActive(): Promise<string[]> {
    const keys = await this.client.scanKeys(this.keys.pattern('context'));
    const ids = new Set<string>();
    for (const key of keys) {
      const id = this.keys.sessionIdOf('context', key);
      if (id) ids.add(id);
    }
    return [...ids].sort();
  }

  /**
   * Approximate count of context keys that were enumerated but had already
   * expired by the time their TTL was read. The store reclaims them on its own;
   * this is a metric, not an authoritative count.
   */
  async sweepExpired(): Promise<number> {
    const keys = await this.client.scanKeys(this.keys.pattern('context'));
    let expired = 0;
    for (const key of keys) {
      if ((await this.client.ttl(key)) === -2) {
        expired++;
      }
    }
    return expired;
  }
}

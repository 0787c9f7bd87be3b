/**
 * Store client contract and session-store record types.
 *
 * The core only needs a key/list/hash store with atomic per-key commands,
 * per-key expiry and a queued transaction. Redis satisfies it; so does the
 * in-process memory client.
 */

import type { ConversationItem } from './schemas.js';

export interface SetOptions {
  /** Expiry in seconds. Omitted means the key never expires. */
  ttlSeconds?: number;
  /** Only write when the key is absent (SET NX) */
  onlyIfAbsent?: boolean;
}

/**
 * Commands queued and applied atomically by `exec()`
 */
export interface StoreTransaction {
  rPush(key: string, values: string[]): StoreTransaction;
  hSet(key: string, fields: Record<string, string>): StoreTransaction;
  hSetNX(key: string, field: string, value: string): StoreTransaction;
  expire(key: string, seconds: number): StoreTransaction;
  exec(): Promise<void>;
}

export interface StoreClient {
  readonly kind: 'redis' | 'memory';
  connect(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<boolean>;

  get(key: string): Promise<string | null>;
  /** @returns whether the value was written */
  set(key: string, value: string, options?: SetOptions): Promise<boolean>;
  /** @returns number of keys removed */
  del(keys: string[]): Promise<number>;
  exists(key: string): Promise<boolean>;
  /** @returns whether the key existed and its expiry was set */
  expire(key: string, seconds: number): Promise<boolean>;
  /** Remaining seconds; -1 when the key has no expiry, -2 when it does not exist */
  ttl(key: string): Promise<number>;
  /** Point-in-time enumeration of keys matching a glob pattern */
  scanKeys(pattern: string): Promise<string[]>;

  lRange(key: string, start: number, stop: number): Promise<string[]>;
  rPop(key: string): Promise<string | null>;
  lLen(key: string): Promise<number>;
  hGetAll(key: string): Promise<Record<string, string>>;

  /** Delete the key only while it still holds `value` (owner-checked release) */
  deleteIfValue(key: string, value: string): Promise<boolean>;
  multi(): StoreTransaction;
}

/**
 * Outcome of removing the newest conversation item
 */
export type PopResult =
  | { status: 'popped'; item: ConversationItem }
  | { status: 'empty' }
  | { status: 'corrupt'; raw: string };

/**
 * Serialization and schema hook a context store is parameterized over
 */
export interface ContextCodec<T> {
  serialize(record: T): string;
  /** @throws SessionkeepError (DECODE_FAILED or VALIDATION) */
  deserialize(raw: string): T;
  /** @throws SessionkeepError (VALIDATION) */
  validate(value: unknown): T;
  /** Compact view used by session overviews */
  summarize?(record: T): Record<string, unknown>;
}

/**
 * Identifiers handed to an application's default-context factory
 */
export interface ContextIdentity {
  sessionId: string;
  userId: string;
}

export type DefaultContextFactory<T> = (identity: ContextIdentity) => T;

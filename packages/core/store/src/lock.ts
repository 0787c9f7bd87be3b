/**
 * Distributed per-session lock: SET NX EX with a random owner token,
 * released by compare-and-delete on that token.
 */

import { randomUUID } from 'node:crypto';
import {
  ConsoleLogger,
  createInvalidArgumentError,
  createLockNotAcquiredError,
  type Logger,
  type StoreClient,
} from '@sessionkeep/types';
import { KeyLayout, assertSessionId } from './keys.js';

const COMPONENT = 'session-lock';

export interface LockOptions {
  /** Lifetime of a held lock; bounds how long a crashed holder blocks others */
  timeoutSeconds: number;
  /** Attempts after the first one */
  retries: number;
  /** Wait before retry n is `backoffBaseMs * n` */
  backoffBaseMs: number;
}

export const DEFAULT_LOCK_OPTIONS: LockOptions = {
  timeoutSeconds: 30,
  retries: 5,
  backoffBaseMs: 500,
};

export function getLockOptions(options?: Partial<LockOptions>): LockOptions {
  const resolved = {
    timeoutSeconds: options?.timeoutSeconds ?? DEFAULT_LOCK_OPTIONS.timeoutSeconds,
    retries: options?.retries ?? DEFAULT_LOCK_OPTIONS.retries,
    backoffBaseMs: options?.backoffBaseMs ?? DEFAULT_LOCK_OPTIONS.backoffBaseMs,
  };
  if (
    !Number.isInteger(resolved.timeoutSeconds) ||
    resolved.timeoutSeconds < 1 ||
    !Number.isInteger(resolved.retries) ||
    resolved.retries < 0 ||
    resolved.backoffBaseMs < 0
  ) {
    throw createInvalidArgumentError('Invalid lock options', {
      component: COMPONENT,
      details: { ...resolved },
    });
  }
  return resolved;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * A held lock. Release is owner-checked and happens at most once.
 */
export class SessionLock {
  private released = false;

  constructor(
    private readonly client: StoreClient,
    readonly sessionId: string,
    readonly key: string,
    readonly token: string,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * @returns false when the lock had already expired or belongs to someone else
   */
  async release(): Promise<boolean> {
    if (this.released) return false;
    this.released = true;
    return this.client.deleteIfValue(this.key, this.token);
  }
}

export interface SessionLockManagerOptions {
  client: StoreClient;
  keys?: KeyLayout;
  lock?: Partial<LockOptions>;
  logger?: Logger;
  sleep?: Sleep;
}

export class SessionLockManager {
  readonly options: LockOptions;
  private readonly client: StoreClient;
  private readonly keys: KeyLayout;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(options: SessionLockManagerOptions) {
    this.client = options.client;
    this.keys = options.keys ?? new KeyLayout();
    this.options = getLockOptions(options.lock);
    this.logger = options.logger ?? new ConsoleLogger(COMPONENT);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Single attempt; null when another holder has the lock
   */
  async tryAcquire(sessionId: string): Promise<SessionLock | null> {
    assertSessionId(sessionId, COMPONENT);
    const key = this.keys.lockKey(sessionId);
    const token = randomUUID();
    const acquired = await this.client.set(key, token, {
      onlyIfAbsent: true,
      ttlSeconds: this.options.timeoutSeconds,
    });
    return acquired ? new SessionLock(this.client, sessionId, key, token) : null;
  }

  /**
   * Acquire with linear backoff
   *
   * @throws SessionkeepError (LOCK_NOT_ACQUIRED) once every retry has failed
   */
  async acquire(sessionId: string): Promise<SessionLock> {
    const first = await this.tryAcquire(sessionId);
    if (first) return first;

    const { retries, backoffBaseMs } = this.options;
    for (let attempt = 1; attempt <= retries; attempt += 1) {
      const delay = backoffBaseMs * attempt;
      this.logger.debug(
        `Lock for session ${sessionId} is held; retry ${attempt}/${retries} in ${delay}ms`,
      );
      await this.sleep(delay);
      const lock = await this.tryAcquire(sessionId);
      if (lock) return lock;
    }

    const attempts = retries + 1;
    this.logger.warn(`Could not acquire lock for session ${sessionId} after ${attempts} attempts`);
    throw createLockNotAcquiredError(`Could not acquire lock for session ${sessionId}`, {
      component: COMPONENT,
      details: { sessionId, attempts },
    });
  }
}

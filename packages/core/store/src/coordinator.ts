/**
 * Context Access Coordinator
 *
 * Lock-guarded fetch → work → persist over one session's context.
 */

import {
  ConsoleLogger,
  createLockReleaseFailedError,
  type Logger,
} from '@sessionkeep/types';
import type { ContextStore } from './context-store.js';
import type { WriteOptions } from './keys.js';
import type { SessionLock, SessionLockManager } from './lock.js';

const COMPONENT = 'coordinator';

/**
 * Caller logic run against the live context. Mutate the record in place;
 * it is persisted once the work resolves.
 */
export type ContextWork<T, R> = (context: T) => R | Promise<R>;

export interface ContextCoordinatorOptions<T extends object> {
  contexts: ContextStore<T>;
  locks: SessionLockManager;
  logger?: Logger;
}

export class ContextCoordinator<T extends object> {
  private readonly contexts: ContextStore<T>;
  private readonly locks: SessionLockManager;
  private readonly logger: Logger;

  constructor(options: ContextCoordinatorOptions<T>) {
    this.contexts = options.contexts;
    this.locks = options.locks;
    this.logger = options.logger ?? new ConsoleLogger(COMPONENT);
  }

  /**
   * Run `work` while holding the session lock. The context is persisted only
   * if `work` resolves; the lock is released on every path.
   *
   * Persisting happens before release, so LOCK_RELEASE_FAILED with reason
   * `expired` arrives after the context was already written, possibly over a
   * newer holder's write. Retrying such a call repeats `work`; only retry work
   * that is idempotent.
   *
   * @throws SessionkeepError (LOCK_NOT_ACQUIRED) when the lock stays busy
   * @throws SessionkeepError (LOCK_RELEASE_FAILED) when the work succeeded but the lock was lost or could not be released
   */
  async run<R>(
    sessionId: string,
    createDefault: () => T,
    work: ContextWork<T, R>,
    options: WriteOptions = {},
  ): Promise<R> {
    const lock = await this.locks.acquire(sessionId);
    let succeeded = false;
    try {
      const result = await this.execute(sessionId, createDefault, work, options);
      succeeded = true;
      return result;
    } finally {
      await this.release(lock, succeeded);
    }
  }

  /**
   * UNSAFE: same unit of work with no lock. Concurrent callers overwrite each
   * other's changes. Only for deployments with a single writer per session.
   */
  async unsafeRunWithoutLock<R>(
    sessionId: string,
    createDefault: () => T,
    work: ContextWork<T, R>,
    options: WriteOptions = {},
  ): Promise<R> {
    this.logger.debug(`Running unlocked unit of work for session ${sessionId}`);
    return this.execute(sessionId, createDefault, work, options);
  }

  private async execute<R>(
    sessionId: string,
    createDefault: () => T,
    work: ContextWork<T, R>,
    options: WriteOptions,
  ): Promise<R> {
    const context = await this.contexts.getOrCreate(sessionId, createDefault(), options);
    const result = await work(context);
    await this.contexts.put(sessionId, context, options);
    return result;
  }

  /**
   * Release never masks an error from the unit of work; it only throws when the work succeeded.
   */
  private async release(lock: SessionLock, workSucceeded: boolean): Promise<void> {
    const { sessionId } = lock;
    let released: boolean;
    try {
      released = await lock.release();
    } catch (error) {
      this.logger.error(`Failed to release lock for session ${sessionId}`, error);
      if (workSucceeded) {
        throw createLockReleaseFailedError(`Failed to release lock for session ${sessionId}`, {
          component: COMPONENT,
          details: { sessionId, reason: 'store' },
          cause: error instanceof Error ? error : undefined,
        });
      }
      return;
    }

    if (!released) {
      this.logger.warn(`Lock for session ${sessionId} expired before release`);
      if (workSucceeded) {
        throw createLockReleaseFailedError(`Lock for session ${sessionId} expired before release`, {
          component: COMPONENT,
          details: { sessionId, reason: 'expired' },
        });
      }
    }
  }
}

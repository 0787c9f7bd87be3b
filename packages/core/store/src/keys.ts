/**
 * Store key layout: `<prefix>:<sessionId>` for each key family.
 */

import { createInvalidArgumentError } from '@sessionkeep/types';
import type { KeysSection } from '@sessionkeep/config';

export interface KeyPrefixes {
  session: string;
  messages: string;
  context: string;
  lock: string;
}

export const DEFAULT_KEY_PREFIXES: KeyPrefixes = {
  session: 'agent_session',
  messages: 'agent_messages',
  context: 'agent_context',
  lock: 'session_lock',
};

export type KeyFamily = keyof KeyPrefixes;

/**
 * Escape glob metacharacters so a literal string matches only itself
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * @throws SessionkeepError (INVALID_ARGUMENT) for an empty id
 */
export function assertSessionId(sessionId: string, component: string): void {
  if (typeof sessionId !== 'string' || sessionId.length === 0) {
    throw createInvalidArgumentError('Session id must be a non-empty string', {
      component,
      details: { sessionId },
    });
  }
}

export interface WriteOptions {
  /** Overrides the configured expiry for every key this call touches */
  ttlSeconds?: number;
}

/**
 * @throws SessionkeepError (INVALID_ARGUMENT) unless the TTL is a positive integer
 */
export function assertTtl(ttlSeconds: number | undefined, component: string): void {
  if (ttlSeconds !== undefined && (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0)) {
    throw createInvalidArgumentError('TTL must be a positive integer number of seconds', {
      component,
      details: { ttlSeconds },
    });
  }
}

export class KeyLayout {
  readonly prefixes: KeyPrefixes;

  constructor(prefixes: Partial<KeyPrefixes> = {}) {
    this.prefixes = { ...DEFAULT_KEY_PREFIXES, ...prefixes };
  }

  static fromConfig(keys: KeysSection): KeyLayout {
    return new KeyLayout({
      session: keys.session_prefix,
      messages: keys.messages_prefix,
      context: keys.context_prefix,
      lock: keys.lock_prefix,
    });
  }

  key(family: KeyFamily, sessionId: string): string {
    return `${this.prefixes[family]}:${sessionId}`;
  }

  sessionKey(sessionId: string): string {
    return this.key('session', sessionId);
  }

  messagesKey(sessionId: string): string {
    return this.key('messages', sessionId);
  }

  contextKey(sessionId: string): string {
    return this.key('context', sessionId);
  }

  lockKey(sessionId: string): string {
    return this.key('lock', sessionId);
  }

  /**
   * Glob over one family. The prefix is matched literally; `idPattern` is a glob.
   */
  pattern(family: KeyFamily, idPattern = '*'): string {
    return `${escapeGlob(this.prefixes[family])}:${idPattern}`;
  }

  /**
   * Session id of a key in the given family, or null for a foreign key
   */
  sessionIdOf(family: KeyFamily, key: string): string | null {
    const head = `${this.prefixes[family]}:`;
    return key.startsWith(head) ? key.slice(head.length) : null;
  }
}

/**
 * In-process StoreClient.
 *
 * Holds strings, lists and hashes in a Map with per-key expiry checked against
 * the wall clock on access. Backs the `memory` provider and the test suites.
 */

import {
  createInternalError,
  createStoreUnavailableError,
  type SetOptions,
  type StoreClient,
  type StoreTransaction,
} from '@sessionkeep/types';

type Entry =
  | { type: 'string'; value: string; expiresAt?: number }
  | { type: 'list'; values: string[]; expiresAt?: number }
  | { type: 'hash'; fields: Map<string, string>; expiresAt?: number };

const COMPONENT = 'memory-store';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a Redis-style glob (`*`, `?`, `[...]`, `\` escapes) to a RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegExp(pattern.charAt(i));
    } else if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const end = pattern.indexOf(']', i + 2);
      if (end === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, end);
      const negate = body.startsWith('^');
      if (negate) body = body.slice(1);
      source += `[${negate ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = end;
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

/**
 * Resolve Redis-style list indexes (negative = from the tail) to a slice
 */
function resolveRange(length: number, start: number, stop: number): [number, number] {
  const from = Math.max(start < 0 ? length + start : start, 0);
  const to = Math.min(stop < 0 ? length + stop : stop, length - 1);
  return [from, to];
}

class MemoryTransaction implements StoreTransaction {
  private readonly ops: Array<() => void> = [];

  constructor(
    private readonly store: MemoryStoreClient,
    private readonly apply: (ops: Array<() => void>) => void,
  ) {}

  rPush(key: string, values: string[]): StoreTransaction {
    this.ops.push(() => this.store.rPushSync(key, values));
    return this;
  }

  hSet(key: string, fields: Record<string, string>): StoreTransaction {
    this.ops.push(() => this.store.hSetSync(key, fields, false));
    return this;
  }

  hSetNX(key: string, field: string, value: string): StoreTransaction {
    this.ops.push(() => this.store.hSetSync(key, { [field]: value }, true));
    return this;
  }

  expire(key: string, seconds: number): StoreTransaction {
    this.ops.push(() => {
      this.store.expireSync(key, seconds);
    });
    return this;
  }

  async exec(): Promise<void> {
    this.apply(this.ops.splice(0));
  }
}

export class MemoryStoreClient implements StoreClient {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, Entry>();
  private open = true;

  async connect(): Promise<void> {
    this.open = true;
  }

  async close(): Promise<void> {
    this.open = false;
  }

  async ping(): Promise<boolean> {
    return this.open;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.read(key);
    if (!entry) return null;
    if (entry.type !== 'string') throw this.wrongType(key);
    return entry.value;
  }

  async set(key: string, value: string, options: SetOptions = {}): Promise<boolean> {
    this.assertOpen();
    if (options.onlyIfAbsent && this.read(key)) {
      return false;
    }
    this.entries.set(key, {
      type: 'string',
      value,
      expiresAt: options.ttlSeconds ? Date.now() + options.ttlSeconds * 1000 : undefined,
    });
    return true;
  }

  async del(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.read(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.assertOpen();
    return this.expireSync(key, seconds);
  }

  async ttl(key: string): Promise<number> {
    const entry = this.read(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.round((entry.expiresAt - Date.now()) / 1000);
  }

  async scanKeys(pattern: string): Promise<string[]> {
    this.assertOpen();
    const matcher = globToRegExp(pattern);
    const keys: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (this.read(key) && matcher.test(key)) {
        keys.push(key);
      }
    }
    return keys;
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.readList(key);
    if (!list) return [];
    const [from, to] = resolveRange(list.length, start, stop);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async rPop(key: string): Promise<string | null> {
    const list = this.readList(key);
    if (!list) return null;
    const value = list.pop() ?? null;
    if (list.length === 0) this.entries.delete(key);
    return value;
  }

  async lLen(key: string): Promise<number> {
    return this.readList(key)?.length ?? 0;
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    const entry = this.read(key);
    if (!entry) return {};
    if (entry.type !== 'hash') throw this.wrongType(key);
    return Object.fromEntries(entry.fields);
  }

  async deleteIfValue(key: string, value: string): Promise<boolean> {
    const entry = this.read(key);
    if (entry?.type === 'string' && entry.value === value) {
      this.entries.delete(key);
      return true;
    }
    return false;
  }

  multi(): StoreTransaction {
    return new MemoryTransaction(this, (ops) => {
      this.assertOpen();
      for (const op of ops) op();
    });
  }

  // Synchronous primitives shared with MemoryTransaction

  rPushSync(key: string, values: string[]): void {
    const entry = this.read(key);
    if (!entry) {
      this.entries.set(key, { type: 'list', values: [...values] });
      return;
    }
    if (entry.type !== 'list') throw this.wrongType(key);
    entry.values.push(...values);
  }

  hSetSync(key: string, fields: Record<string, string>, onlyNew: boolean): void {
    let entry = this.read(key);
    if (!entry) {
      entry = { type: 'hash', fields: new Map() };
      this.entries.set(key, entry);
    }
    if (entry.type !== 'hash') throw this.wrongType(key);
    for (const [field, value] of Object.entries(fields)) {
      if (onlyNew && entry.fields.has(field)) continue;
      entry.fields.set(field, value);
    }
  }

  expireSync(key: string, seconds: number): boolean {
    const entry = this.read(key);
    if (!entry) return false;
    if (seconds <= 0) {
      this.entries.delete(key);
    } else {
      entry.expiresAt = Date.now() + seconds * 1000;
    }
    return true;
  }

  /**
   * Live entry for a key; drops it first if it has expired
   */
  private read(key: string): Entry | undefined {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (entry?.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private readList(key: string): string[] | undefined {
    const entry = this.read(key);
    if (!entry) return undefined;
    if (entry.type !== 'list') throw this.wrongType(key);
    return entry.values;
  }

  private assertOpen(): void {
    if (!this.open) {
      throw createStoreUnavailableError('Memory store is closed', { component: COMPONENT });
    }
  }

  private wrongType(key: string) {
    return createInternalError(`Operation against key "${key}" holding the wrong kind of value`, {
      component: COMPONENT,
      details: { key },
    });
  }
}

/**
 * Redis StoreClient backed by node-redis.
 */

import { createClient } from 'redis';
import {
  ConsoleLogger,
  createStoreTimeoutError,
  createStoreUnavailableError,
  isSessionkeepError,
  type Logger,
  type SetOptions,
  type StoreClient,
  type StoreTransaction,
} from '@sessionkeep/types';

type RedisClient = ReturnType<typeof createClient>;
type RedisMulti = ReturnType<RedisClient['multi']>;

const COMPONENT = 'redis-store';

// Compare-and-delete so only the token holder removes the key
const DELETE_IF_VALUE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export interface RedisStoreClientOptions {
  url: string;
  database?: number;
  /** Size cap of the connection pool data commands run on (default: 20) */
  maxConnections?: number;
  /** Per-command timeout (default: 2000) */
  commandTimeoutMs?: number;
  logger?: Logger;
}

class RedisTransaction implements StoreTransaction {
  private readonly ops: Array<(multi: RedisMulti) => void> = [];

  constructor(private readonly execute: (ops: Array<(multi: RedisMulti) => void>) => Promise<void>) {}

  rPush(key: string, values: string[]): StoreTransaction {
    this.ops.push((multi) => multi.rPush(key, values));
    return this;
  }

  hSet(key: string, fields: Record<string, string>): StoreTransaction {
    this.ops.push((multi) => multi.hSet(key, fields));
    return this;
  }

  hSetNX(key: string, field: string, value: string): StoreTransaction {
    this.ops.push((multi) => multi.hSetNX(key, field, value));
    return this;
  }

  expire(key: string, seconds: number): StoreTransaction {
    this.ops.push((multi) => multi.expire(key, seconds));
    return this;
  }

  exec(): Promise<void> {
    return this.execute(this.ops.splice(0));
  }
}

export class RedisStoreClient implements StoreClient {
  readonly kind = 'redis' as const;
  private readonly client: RedisClient;
  private readonly commandTimeoutMs: number;
  private readonly logger: Logger;
  private connecting: Promise<void> | null = null;

  constructor(options: RedisStoreClientOptions) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 2000;
    this.logger = options.logger ?? new ConsoleLogger(COMPONENT);
    this.client = createClient({
      url: options.url,
      database: options.database,
      isolationPoolOptions: { max: options.maxConnections ?? 20 },
    });
    this.client.on('error', (error: unknown) => {
      this.logger.debug('Redis client error', error);
    });
  }

  async connect(): Promise<void> {
    await this.ensureConnected();
  }

  /**
   * QUIT waits in the offline queue of a client that is not ready, so a
   * client that never connected (or is reconnecting) is dropped instead.
   */
  async close(): Promise<void> {
    this.connecting = null;
    if (!this.client.isOpen) return;
    if (this.client.isReady) {
      await this.client.quit();
    } else {
      await this.client.disconnect();
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.command('PING', () => this.client.ping());
      return true;
    } catch (error) {
      this.logger.warn('Redis ping failed', error);
      return false;
    }
  }

  get(key: string): Promise<string | null> {
    return this.pooled('GET', (connection) => connection.get(key));
  }

  async set(key: string, value: string, options: SetOptions = {}): Promise<boolean> {
    const { ttlSeconds, onlyIfAbsent } = options;
    const reply = await this.pooled('SET', (connection) => {
      if (onlyIfAbsent) {
        return ttlSeconds
          ? connection.set(key, value, { NX: true, EX: ttlSeconds })
          : connection.set(key, value, { NX: true });
      }
      return ttlSeconds
        ? connection.set(key, value, { EX: ttlSeconds })
        : connection.set(key, value);
    });
    return reply === 'OK';
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.pooled('DEL', (connection) => connection.del(keys));
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.pooled('EXISTS', (connection) => connection.exists(key));
    return count > 0;
  }

  expire(key: string, seconds: number): Promise<boolean> {
    return this.pooled('EXPIRE', (connection) => connection.expire(key, seconds));
  }

  ttl(key: string): Promise<number> {
    return this.pooled('TTL', (connection) => connection.ttl(key));
  }

  /**
   * SCAN-based enumeration; the whole iteration shares one command timeout
   */
  scanKeys(pattern: string): Promise<string[]> {
    return this.pooled('SCAN', async (connection) => {
      const keys = new Set<string>();
      for await (const key of connection.scanIterator({ MATCH: pattern, COUNT: 100 })) {
        keys.add(key);
      }
      return [...keys];
    });
  }

  lRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.pooled('LRANGE', (connection) => connection.lRange(key, start, stop));
  }

  rPop(key: string): Promise<string | null> {
    return this.pooled('RPOP', (connection) => connection.rPop(key));
  }

  lLen(key: string): Promise<number> {
    return this.pooled('LLEN', (connection) => connection.lLen(key));
  }

  hGetAll(key: string): Promise<Record<string, string>> {
    return this.pooled('HGETALL', (connection) => connection.hGetAll(key));
  }

  async deleteIfValue(key: string, value: string): Promise<boolean> {
    const reply = await this.pooled('EVAL', (connection) =>
      connection.eval(DELETE_IF_VALUE_SCRIPT, { keys: [key], arguments: [value] }),
    );
    return reply === 1;
  }

  multi(): StoreTransaction {
    return new RedisTransaction((ops) =>
      this.pooled('MULTI', async (connection) => {
        const multi = connection.multi();
        for (const op of ops) op(multi);
        await multi.exec();
      }),
    );
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isReady) return;
    if (!this.connecting) {
      this.connecting = this.withTimeout('CONNECT', async () => {
        if (!this.client.isOpen) {
          await this.client.connect();
        }
      }).finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  private async command<T>(name: string, operation: () => Promise<T>): Promise<T> {
    await this.ensureConnected();
    return this.withTimeout(name, operation);
  }

  /**
   * Run a data command on a connection borrowed from the isolation pool.
   * Waiting for a free connection counts against the command timeout.
   */
  private pooled<T>(name: string, operation: (connection: RedisClient) => Promise<T>): Promise<T> {
    return this.command(name, () => this.client.executeIsolated(operation));
  }

  /**
   * Run one store call under the command timeout. Failures never read as
   * "absent": a timeout is STORE_TIMEOUT, anything else STORE_UNAVAILABLE.
   */
  private async withTimeout<T>(name: string, operation: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          createStoreTimeoutError(`Redis ${name} timed out after ${this.commandTimeoutMs}ms`, {
            component: COMPONENT,
            details: { command: name, timeoutMs: this.commandTimeoutMs },
          }),
        );
      }, this.commandTimeoutMs);
    });

    try {
      return await Promise.race([operation(), timeout]);
    } catch (error) {
      if (isSessionkeepError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw createStoreUnavailableError(`Redis ${name} failed: ${message}`, {
        component: COMPONENT,
        details: { command: name },
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Simple logger interface
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'info'
  ) {}

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.log(`[${this.component}] INFO:`, message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(`[${this.component}] ERROR:`, message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`[${this.component}] WARN:`, message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`[${this.component}] DEBUG:`, message, ...args);
    }
  }

  /**
   * Logger for a sub-component sharing this logger's level
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.component}:${component}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  info: () => {},
  error: () => {},
  warn: () => {},
  debug: () => {},
};

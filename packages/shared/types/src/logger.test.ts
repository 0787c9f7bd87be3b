import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, isLogLevel } from './logger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the component and level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger('context-store');

    logger.info('stored', 's1');

    expect(logSpy).toHaveBeenCalledWith('[context-store] INFO:', 'stored', 's1');
  });

  it('drops messages below the configured level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger('lock', 'warn');

    logger.debug('retrying');
    logger.warn('exhausted');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[lock] WARN:', 'exhausted');
  });

  it('creates children that share the level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const child = new ConsoleLogger('sessionkeep', 'error').child('log');

    child.debug('skipped');
    child.error('failed');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[sessionkeep:log] ERROR:', 'failed');
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

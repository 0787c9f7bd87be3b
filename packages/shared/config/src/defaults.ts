/**
 * Default configuration values and merging
 */

import type {
  PartialSessionkeepConfig,
  SessionkeepConfig,
  TtlFamily,
} from './schema.js';

export const DEFAULT_CONFIG: SessionkeepConfig = {
  store: {
    provider: 'redis',
    url: 'redis://localhost:6379',
    database: 0,
    max_connections: 20,
    command_timeout_ms: 2000,
  },
  keys: {
    session_prefix: 'agent_session',
    messages_prefix: 'agent_messages',
    context_prefix: 'agent_context',
    lock_prefix: 'session_lock',
  },
  ttl: {
    default_seconds: 3600,
  },
  lock: {
    timeout_seconds: 30,
    retries: 5,
    backoff_base_ms: 500,
  },
  runtime: {
    log_level: 'info',
  },
};

/**
 * Merge two partial configurations section by section, overlay winning
 */
export function mergeConfig(
  base: PartialSessionkeepConfig,
  overlay: PartialSessionkeepConfig
): PartialSessionkeepConfig {
  return {
    store: { ...base.store, ...overlay.store },
    keys: { ...base.keys, ...overlay.keys },
    ttl: { ...base.ttl, ...overlay.ttl },
    lock: { ...base.lock, ...overlay.lock },
    runtime: { ...base.runtime, ...overlay.runtime },
  };
}

/**
 * Fill every missing value from DEFAULT_CONFIG
 */
export function withDefaults(partial: PartialSessionkeepConfig = {}): SessionkeepConfig {
  return {
    store: { ...DEFAULT_CONFIG.store, ...partial.store },
    keys: { ...DEFAULT_CONFIG.keys, ...partial.keys },
    ttl: { ...DEFAULT_CONFIG.ttl, ...partial.ttl },
    lock: { ...DEFAULT_CONFIG.lock, ...partial.lock },
    runtime: { ...DEFAULT_CONFIG.runtime, ...partial.runtime },
  };
}

/**
 * Effective TTL for a key family: the family override, else the default.
 * Returns undefined when the family should not expire.
 */
export function resolveTtlSeconds(
  config: SessionkeepConfig,
  family: TtlFamily
): number | undefined {
  const override =
    family === 'messages'
      ? config.ttl.messages_seconds
      : family === 'session'
        ? config.ttl.session_seconds
        : config.ttl.context_seconds;
  const ttl = override ?? config.ttl.default_seconds;
  return ttl && ttl > 0 ? ttl : undefined;
}

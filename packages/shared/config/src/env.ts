/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { PartialSessionkeepConfig } from './schema.js';
import { mergeConfig } from './defaults.js';
import { toPartialConfig } from './loader.js';

type Section = keyof PartialSessionkeepConfig;

interface EnvMapping {
  section: Section;
  key: string;
  kind: 'string' | 'integer';
}

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, EnvMapping> = {
  // Store settings
  SESSIONKEEP_STORE_PROVIDER: { section: 'store', key: 'provider', kind: 'string' },
  SESSIONKEEP_REDIS_URL: { section: 'store', key: 'url', kind: 'string' },
  SESSIONKEEP_REDIS_DB: { section: 'store', key: 'database', kind: 'integer' },
  SESSIONKEEP_MAX_CONNECTIONS: { section: 'store', key: 'max_connections', kind: 'integer' },
  SESSIONKEEP_COMMAND_TIMEOUT_MS: { section: 'store', key: 'command_timeout_ms', kind: 'integer' },

  // Key prefixes
  SESSIONKEEP_SESSION_PREFIX: { section: 'keys', key: 'session_prefix', kind: 'string' },
  SESSIONKEEP_MESSAGES_PREFIX: { section: 'keys', key: 'messages_prefix', kind: 'string' },
  SESSIONKEEP_CONTEXT_PREFIX: { section: 'keys', key: 'context_prefix', kind: 'string' },
  SESSIONKEEP_LOCK_PREFIX: { section: 'keys', key: 'lock_prefix', kind: 'string' },

  // Expiry
  SESSIONKEEP_DEFAULT_TTL: { section: 'ttl', key: 'default_seconds', kind: 'integer' },

  // Lock settings
  SESSIONKEEP_LOCK_TIMEOUT: { section: 'lock', key: 'timeout_seconds', kind: 'integer' },
  SESSIONKEEP_LOCK_RETRIES: { section: 'lock', key: 'retries', kind: 'integer' },
  SESSIONKEEP_LOCK_BACKOFF_MS: { section: 'lock', key: 'backoff_base_ms', kind: 'integer' },

  // Runtime settings
  SESSIONKEEP_LOG_LEVEL: { section: 'runtime', key: 'log_level', kind: 'string' },
};

/**
 * Parse environment variable value to the mapped type.
 * Unparseable integers stay strings so the shape check reports them.
 */
function parseEnvValue(value: string, kind: EnvMapping['kind']): string | number {
  if (kind === 'integer') {
    const num = Number(value.trim());
    if (value.trim() !== '' && Number.isInteger(num)) return num;
  }
  return value;
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(): PartialSessionkeepConfig {
  const overlay: Partial<Record<Section, Record<string, string | number>>> = {};

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = process.env[envVar];
    if (value !== undefined && value !== '') {
      const section = overlay[mapping.section] ?? {};
      section[mapping.key] = parseEnvValue(value, mapping.kind);
      overlay[mapping.section] = section;
    }
  }

  return toPartialConfig(overlay, 'environment');
}

/**
 * Apply environment variable overlay to configuration
 */
export function applyEnvOverlay(config: PartialSessionkeepConfig): PartialSessionkeepConfig {
  return mergeConfig(config, createEnvOverlay());
}

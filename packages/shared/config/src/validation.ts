/**
 * Configuration Validation
 *
 * Validates sessionkeep.toml configuration for correctness
 */

import type { SessionkeepConfig } from './schema.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const VALID_PROVIDERS: readonly string[] = ['redis', 'memory'];
const VALID_URL_SCHEMES: readonly string[] = ['redis:', 'rediss:'];
const VALID_LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

/**
 * Validate store connection settings
 */
function validateStoreSection(config: SessionkeepConfig, errors: string[]): void {
  const { provider, url, database, max_connections, command_timeout_ms } = config.store;

  if (!VALID_PROVIDERS.includes(provider)) {
    errors.push(
      `Invalid store.provider: "${provider}". Must be one of: ${VALID_PROVIDERS.join(', ')}`,
    );
  }

  if (provider === 'redis') {
    if (!url || url.trim() === '') {
      errors.push('store.url is required when store.provider = "redis"');
    } else {
      let protocol: string | null = null;
      try {
        protocol = new URL(url).protocol;
      } catch {
        errors.push(`Invalid store.url: "${url}" is not a URL`);
      }
      if (protocol !== null && !VALID_URL_SCHEMES.includes(protocol)) {
        errors.push(
          `Invalid store.url scheme: "${protocol}". Must be one of: ${VALID_URL_SCHEMES.join(', ')}`,
        );
      }
    }
  }

  if (database < 0) {
    errors.push('store.database must be 0 or greater');
  }

  if (max_connections < 1) {
    errors.push('store.max_connections must be at least 1');
  }

  if (command_timeout_ms < 1) {
    errors.push('store.command_timeout_ms must be at least 1');
  }
}

/**
 * Validate key prefixes. Families must not share a keyspace.
 */
function validateKeysSection(config: SessionkeepConfig, errors: string[]): void {
  const prefixes: Array<[string, string]> = [
    ['keys.session_prefix', config.keys.session_prefix],
    ['keys.messages_prefix', config.keys.messages_prefix],
    ['keys.context_prefix', config.keys.context_prefix],
    ['keys.lock_prefix', config.keys.lock_prefix],
  ];

  const seen = new Map<string, string>();
  for (const [name, value] of prefixes) {
    if (!value || value.trim() === '') {
      errors.push(`${name} is required and cannot be empty`);
      continue;
    }
    if (value.includes(':')) {
      errors.push(`${name} must not contain ":"`);
    }
    const owner = seen.get(value);
    if (owner) {
      errors.push(`${name} duplicates ${owner} ("${value}")`);
    } else {
      seen.set(value, name);
    }
  }
}

/**
 * Validate expiry settings
 */
function validateTtlSection(config: SessionkeepConfig, errors: string[], warnings: string[]): void {
  const entries: Array<[string, number | undefined]> = [
    ['ttl.default_seconds', config.ttl.default_seconds],
    ['ttl.messages_seconds', config.ttl.messages_seconds],
    ['ttl.session_seconds', config.ttl.session_seconds],
    ['ttl.context_seconds', config.ttl.context_seconds],
  ];

  for (const [name, value] of entries) {
    if (value !== undefined && value < 0) {
      errors.push(`${name} must be 0 or greater`);
    }
  }

  if (entries.every(([, value]) => !value)) {
    warnings.push('No TTL configured - session keys will never expire');
  }
}

/**
 * Validate lock settings
 */
function validateLockSection(config: SessionkeepConfig, errors: string[], warnings: string[]): void {
  const { timeout_seconds, retries, backoff_base_ms } = config.lock;

  if (timeout_seconds < 1) {
    errors.push('lock.timeout_seconds must be at least 1');
  }

  if (retries < 0) {
    errors.push('lock.retries must be 0 or greater');
  }

  if (backoff_base_ms < 0) {
    errors.push('lock.backoff_base_ms must be 0 or greater');
  }

  // Waits are base * 1, base * 2, ... base * retries
  const retryWindowMs = (backoff_base_ms * retries * (retries + 1)) / 2;
  if (timeout_seconds >= 1 && retryWindowMs > timeout_seconds * 1000) {
    warnings.push(
      `lock.timeout_seconds (${timeout_seconds}s) is shorter than the worst-case retry window (${retryWindowMs}ms)`,
    );
  }
}

/**
 * Validate runtime configuration
 */
function validateRuntimeSection(config: SessionkeepConfig, errors: string[]): void {
  if (!VALID_LOG_LEVELS.includes(config.runtime.log_level)) {
    errors.push(
      `Invalid runtime.log_level: "${config.runtime.log_level}". Must be one of: ${VALID_LOG_LEVELS.join(', ')}`,
    );
  }
}

/**
 * Validate complete configuration
 */
export function validateConfig(config: SessionkeepConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  validateStoreSection(config, errors);
  validateKeysSection(config, errors);
  validateTtlSection(config, errors, warnings);
  validateLockSection(config, errors, warnings);
  validateRuntimeSection(config, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate configuration and throw if invalid
 */
export function validateConfigOrThrow(config: SessionkeepConfig): void {
  const result = validateConfig(config);

  if (!result.valid) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.join('\n')}`,
      result.errors,
    );
  }

  // Log warnings if any
  if (result.warnings.length > 0) {
    console.warn('Configuration warnings:');
    for (const warning of result.warnings) {
      console.warn(`  - ${warning}`);
    }
  }
}

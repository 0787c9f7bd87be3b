/**
 * Main Configuration Loading
 *
 * Convenience function that combines loading, overlay, defaults and validation
 */

import type { PartialSessionkeepConfig, SessionkeepConfig } from './schema.js';
import { findConfigFile, loadConfig } from './loader.js';
import { applyEnvOverlay } from './env.js';
import { withDefaults } from './defaults.js';
import { validateConfigOrThrow } from './validation.js';

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Custom path to sessionkeep.toml (optional) */
  configPath?: string;
  /** Whether to apply environment variable overlays (default: true) */
  applyEnv?: boolean;
  /** Whether to validate the configuration (default: true) */
  validate?: boolean;
  /** Fall back to defaults when no file is found (default: false) */
  allowMissing?: boolean;
}

/**
 * Load, overlay, default and validate configuration in one call
 *
 * @throws ConfigLoadError if loading fails
 * @throws ConfigValidationError if validation fails
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): SessionkeepConfig {
  const { configPath, applyEnv = true, validate = true, allowMissing = false } = options;

  // An explicit path must exist; discovery may come up empty
  let partial: PartialSessionkeepConfig = {};
  if (configPath || !allowMissing || findConfigFile()) {
    partial = loadConfig(configPath);
  }

  if (applyEnv) {
    partial = applyEnvOverlay(partial);
  }

  const config = withDefaults(partial);

  if (validate) {
    validateConfigOrThrow(config);
  }

  return config;
}

/**
 * @sessionkeep/config - Configuration System
 *
 * Provides TOML parsing, environment variable overlays, defaults and
 * validation for sessionkeep configuration.
 */

// Export schema types
export {
  SessionkeepConfigSchema,
  PartialSessionkeepConfigSchema,
  type SessionkeepConfig,
  type PartialSessionkeepConfig,
  type StoreSection,
  type StoreProvider,
  type KeysSection,
  type TtlSection,
  type LockSection,
  type RuntimeSection,
  type TtlFamily,
} from './schema.js';

// Export defaults
export { DEFAULT_CONFIG, mergeConfig, withDefaults, resolveTtlSeconds } from './defaults.js';

// Export loader functions
export {
  loadConfig,
  loadTomlFile,
  parseToml,
  findConfigFile,
  getConfigSearchPaths,
  toPartialConfig,
  ConfigLoadError,
  CONFIG_FILE_NAME,
} from './loader.js';

// Export environment overlay functions
export { createEnvOverlay, applyEnvOverlay } from './env.js';

// Export validation functions
export {
  validateConfig,
  validateConfigOrThrow,
  ConfigValidationError,
  type ValidationResult,
} from './validation.js';

// Main convenience function that loads, overlays, and validates config
export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';

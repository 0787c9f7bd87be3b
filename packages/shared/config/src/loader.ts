/**
 * TOML Configuration Loader
 *
 * Loads and parses sessionkeep.toml configuration files
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { validate, formatValidationErrors } from '@sessionkeep/types';
import { PartialSessionkeepConfigSchema, type PartialSessionkeepConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'sessionkeep.toml';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.cause = cause;
  }
}

/**
 * Search paths for sessionkeep.toml in order of precedence
 */
export function getConfigSearchPaths(): string[] {
  const paths: string[] = [];

  // 1. Explicit override
  if (process.env.SESSIONKEEP_CONFIG_PATH) {
    paths.push(path.resolve(process.env.SESSIONKEEP_CONFIG_PATH));
  }

  // 2. Current directory
  paths.push(path.join(process.cwd(), CONFIG_FILE_NAME));

  // 3. Home directory
  const homeDir = process.env.HOME || process.env.USERPROFILE;
  if (homeDir) {
    paths.push(path.join(homeDir, '.sessionkeep', CONFIG_FILE_NAME));
  }

  return paths;
}

/**
 * Find sessionkeep.toml in search paths
 */
export function findConfigFile(searchPaths?: string[]): string | null {
  const paths = searchPaths ?? getConfigSearchPaths();

  for (const configPath of paths) {
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Check a parsed document against the partial config shape
 */
export function toPartialConfig(parsed: unknown, source: string): PartialSessionkeepConfig {
  const result = validate(PartialSessionkeepConfigSchema, parsed);
  if (!result.success || !result.data) {
    throw new ConfigLoadError(
      `Invalid configuration in ${source}: ${formatValidationErrors(result.errors ?? [])}`
    );
  }
  return result.data;
}

/**
 * Parse TOML string into a partial configuration
 */
export function parseToml(content: string): PartialSessionkeepConfig {
  let parsed: unknown;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to parse TOML: ${error.message}`, error);
    }
    throw new ConfigLoadError('Failed to parse TOML');
  }
  return toPartialConfig(parsed, 'TOML document');
}

/**
 * Load and parse TOML configuration from file
 */
export function loadTomlFile(filePath: string): PartialSessionkeepConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to load config from ${filePath}: ${error.message}`, error);
    }
    throw new ConfigLoadError(`Failed to load config from ${filePath}`);
  }

  try {
    return parseToml(content);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigLoadError(`Failed to load config from ${filePath}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Load configuration from default locations
 *
 * @param customPath Optional custom path to sessionkeep.toml
 * @throws ConfigLoadError if no config file is found or parsing fails
 */
export function loadConfig(customPath?: string): PartialSessionkeepConfig {
  let configPath: string | null;

  if (customPath) {
    if (!fs.existsSync(customPath)) {
      throw new ConfigLoadError(`Configuration file not found: ${customPath}`);
    }
    configPath = customPath;
  } else {
    configPath = findConfigFile();
    if (!configPath) {
      throw new ConfigLoadError(`No ${CONFIG_FILE_NAME} file found in search paths`);
    }
  }

  return loadTomlFile(configPath);
}

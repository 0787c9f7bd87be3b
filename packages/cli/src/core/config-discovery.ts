/**
 * Config discovery for the CLI
 * Adds --config, directory tree walking and SESSIONKEEP_CONFIG_PATH support
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_FILE_NAME } from '@sessionkeep/config';
import { ConfigNotFoundError } from './errors.js';

/**
 * Get all config search paths in order of precedence
 */
export function getConfigSearchPaths(explicitPath?: string): string[] {
  const paths: string[] = [];

  // 1. --config flag (highest priority)
  if (explicitPath) {
    paths.push(path.resolve(explicitPath));
  }

  // 2. Explicit override via environment variable
  if (process.env.SESSIONKEEP_CONFIG_PATH) {
    paths.push(path.resolve(process.env.SESSIONKEEP_CONFIG_PATH));
  }

  // 3. Current directory
  paths.push(path.join(process.cwd(), CONFIG_FILE_NAME));

  // 4. Walk up directory tree (like .git discovery)
  let current = path.dirname(process.cwd());
  const root = path.parse(current).root;
  while (current !== root) {
    paths.push(path.join(current, CONFIG_FILE_NAME));
    current = path.dirname(current);
  }

  // 5. Home directory fallback
  const homeDir = process.env.HOME || process.env.USERPROFILE;
  if (homeDir) {
    paths.push(path.join(homeDir, '.sessionkeep', CONFIG_FILE_NAME));
  }

  return paths;
}

/**
 * Find sessionkeep.toml. An explicit path must exist; it never falls through.
 *
 * @returns Absolute path to config file, or null if not found
 * @throws ConfigNotFoundError if an explicit path does not exist
 */
export function findConfigFile(explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigNotFoundError([resolved]);
    }
    return resolved;
  }

  for (const configPath of getConfigSearchPaths()) {
    if (fs.existsSync(configPath)) {
      return path.resolve(configPath);
    }
  }

  return null;
}

/**
 * Find sessionkeep.toml or throw ConfigNotFoundError
 */
export function findConfigFileOrThrow(explicitPath?: string): string {
  const configPath = findConfigFile(explicitPath);

  if (!configPath) {
    throw new ConfigNotFoundError(getConfigSearchPaths(explicitPath));
  }

  return configPath;
}

/**
 * How commands reach configuration and the store. Tests swap in their own.
 */

import {
  loadAndValidateConfig,
  loadTomlFile,
  validateConfig,
  withDefaults,
  type SessionkeepConfig,
  type ValidationResult,
} from '@sessionkeep/config';
import { ConsoleLogger, type ContextIdentity, type JsonObject } from '@sessionkeep/types';
import { createJsonCodec, createSessionManager, type UnifiedSessionManager } from '@sessionkeep/store';
import { findConfigFile, findConfigFileOrThrow } from './config-discovery.js';

export type SessionManager = UnifiedSessionManager<JsonObject>;

/**
 * Context record the CLI creates for a session that has none
 */
export function createCliContext({ sessionId, userId }: ContextIdentity): JsonObject {
  return { session_id: sessionId, user_id: userId };
}

export interface LoadedConfig {
  config: SessionkeepConfig;
  /** Undefined when running on defaults and environment only */
  configPath?: string;
}

export interface CommandContext {
  /** Full configuration: file (if any), environment, defaults */
  loadConfig(explicitPath?: string): LoadedConfig;
  /** Check one file without the environment overlay */
  checkConfigFile(explicitPath?: string): { configPath: string; result: ValidationResult };
  openManager(config: SessionkeepConfig): SessionManager;
}

export const defaultCommandContext: CommandContext = {
  loadConfig(explicitPath) {
    const configPath = findConfigFile(explicitPath) ?? undefined;
    const config = loadAndValidateConfig({ configPath, allowMissing: true });
    return { config, configPath };
  },

  checkConfigFile(explicitPath) {
    const configPath = findConfigFileOrThrow(explicitPath);
    return { configPath, result: validateConfig(withDefaults(loadTomlFile(configPath))) };
  },

  openManager(config) {
    // info goes to stdout, which belongs to command output
    const logger = new ConsoleLogger('sessionkeep', config.runtime.log_level === 'debug' ? 'debug' : 'error');
    return createSessionManager({
      config,
      codec: createJsonCodec(),
      createDefaultContext: createCliContext,
      logger,
    });
  },
};

/**
 * Open a manager for the duration of `work` and always close it
 */
export async function withManager<R>(
  context: CommandContext,
  config: SessionkeepConfig,
  work: (manager: SessionManager) => Promise<R>,
): Promise<R> {
  const manager = context.openManager(config);
  try {
    return await work(manager);
  } finally {
    await manager.close();
  }
}

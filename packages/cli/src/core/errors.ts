/**
 * Custom error types for the sessionkeep CLI
 */

import {
  ConfigLoadError,
  ConfigValidationError as ConfigCheckError,
} from '@sessionkeep/config';
import { isSessionkeepError, isTransientStoreError } from '@sessionkeep/types';

export class CLIError extends Error {
  public details?: unknown;

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'CLIError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigNotFoundError extends CLIError {
  constructor(searchedPaths: string[]) {
    const pathList = searchedPaths.map((p) => `  - ${p}`).join('\n');
    super(
      'No sessionkeep.toml configuration file found',
      'CONFIG_NOT_FOUND',
      2,
      `Pass --config <path>, or set SESSIONKEEP_CONFIG_PATH to specify the location.\n\nSearched paths:\n${pathList}`,
    );
  }
}

export class ConfigValidationError extends CLIError {
  constructor(message: string, details?: unknown) {
    super(
      `Configuration validation failed: ${message}`,
      'CONFIG_VALIDATION_FAILED',
      2,
      'Check your sessionkeep.toml file for errors. Run: sessionkeep config validate',
    );
    if (details) {
      this.details = details;
    }
  }
}

export class SessionNotFoundError extends CLIError {
  constructor(sessionId: string) {
    super(
      `Session not found: ${sessionId}`,
      'SESSION_NOT_FOUND',
      1,
      'Run: sessionkeep sessions list',
    );
    this.details = { session_id: sessionId };
  }
}

export class StoreUnreachableError extends CLIError {
  constructor(store: string) {
    super(
      `Store is not reachable (${store})`,
      'STORE_UNREACHABLE',
      3,
      'Check store.url in sessionkeep.toml or SESSIONKEEP_REDIS_URL.',
    );
  }
}

/**
 * Map any thrown value to a CLIError
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof ConfigCheckError) {
    return new ConfigValidationError(error.errors.join(', '), error.errors);
  }
  if (error instanceof ConfigLoadError) {
    return new CLIError(error.message, 'CONFIG_LOAD_FAILED', 2);
  }
  if (isSessionkeepError(error)) {
    const cliError = new CLIError(error.message, error.code, isTransientStoreError(error) ? 3 : 1);
    cliError.details = error.details;
    return cliError;
  }
  if (error instanceof Error) {
    return new CLIError(error.message, 'UNKNOWN_ERROR');
  }
  return new CLIError(String(error), 'UNKNOWN_ERROR');
}

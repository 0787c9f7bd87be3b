/**
 * Shared TypeScript types for the sessionkeep CLI
 */

/**
 * Standard JSON output envelope for all CLI commands
 */
export interface CommandOutput<T = unknown> {
  /** Success flag */
  ok: boolean;
  /** Command name (e.g., "sessions list", "ping") */
  command: string;
  /** Command-specific data (only present if ok=true) */
  data?: T;
  /** Error information (only present if ok=false) */
  error?: {
    /** Machine-readable error code */
    code: string;
    /** Human-readable error message */
    message: string;
    /** Additional error context */
    details?: unknown;
  };
  /** Metadata about the command execution */
  meta: {
    /** ISO 8601 timestamp */
    timestamp: string;
    /** CLI version */
    version: string;
    /** Path to sessionkeep.toml file used (if applicable) */
    config_path?: string;
    /** Command execution duration in milliseconds */
    duration_ms?: number;
  };
}

/**
 * Options every command receives from the program
 */
export interface GlobalOptions {
  json?: boolean;
  config?: string;
}

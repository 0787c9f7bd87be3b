// Shared types for Sessionkeep

// ============================================================================
// Schemas
// ============================================================================

export {
  ConversationItemSchema,
  SessionMetadataHashSchema,
  JsonObjectSchema,
  type ConversationItem,
  type SessionMetadataHash,
  type SessionMetadata,
  type JsonObject,
} from './schemas.js';

// ============================================================================
// Store Contract
// ============================================================================

export type {
  StoreClient,
  StoreTransaction,
  SetOptions,
  PopResult,
  ContextCodec,
  ContextIdentity,
  DefaultContextFactory,
} from './store-types.js';

// ============================================================================
// Errors
// ============================================================================

export {
  SessionkeepError,
  SessionkeepErrorCodes,
  type SessionkeepErrorCode,
  type SessionkeepErrorData,
  type CreateErrorOptions,
  createConfigError,
  createValidationError,
  createNotFoundError,
  createLockNotAcquiredError,
  createLockReleaseFailedError,
  createStoreUnavailableError,
  createStoreTimeoutError,
  createDecodeFailedError,
  createInvalidArgumentError,
  createInternalError,
  isSessionkeepError,
  hasErrorCode,
  isTransientStoreError,
  wrapError,
  extractErrorInfo,
} from './errors.js';

// ============================================================================
// Validation
// ============================================================================

export {
  validate,
  validateOrThrow,
  isValid,
  clean,
  applyDefaults,
  formatValidationErrors,
  validateConversationItem,
  validateSessionMetadataHash,
  type ValidationError,
  type ValidationResult,
} from './validation.js';

// ============================================================================
// Logging
// ============================================================================

export {
  ConsoleLogger,
  noopLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';

/**
 * Runtime validation for records crossing the store boundary.
 *
 * Uses compiled TypeBox checkers so every stored payload is checked against
 * its schema on the way in and on the way out.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { Value, type ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import { createValidationError } from './errors.js';
import {
  ConversationItemSchema,
  SessionMetadataHashSchema,
  type ConversationItem,
  type SessionMetadataHash,
} from './schemas.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Validation error with detailed information
 */
export interface ValidationError {
  /** Field path that failed validation */
  path: string;
  /** Expected type or value */
  expected: string;
  /** Actual value received */
  received: unknown;
  /** Human-readable error message */
  message: string;
}

/**
 * Result of a validation operation
 */
export interface ValidationResult<T> {
  /** Whether validation succeeded */
  success: boolean;
  /** Validated data (if successful) */
  data?: T;
  /** Validation errors (if failed) */
  errors?: ValidationError[];
}

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * Cache for compiled type checkers
 * TypeBox compilers are expensive to create, so we cache them
 */
const compilerCache = new Map<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  const cached = compilerCache.get(schema);
  if (cached) {
    return cached as TypeCheck<T>;
  }
  const compiler = TypeCompiler.Compile(schema);
  compilerCache.set(schema, compiler);
  return compiler;
}

// ============================================================================
// Core Validation Functions
// ============================================================================

function getSchemaTypeName(schema: Record<string, unknown>): string {
  if (schema.$id) return String(schema.$id);
  if (schema.type) return String(schema.type);
  if (schema.anyOf) return 'union';
  if (schema.allOf) return 'intersection';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationError {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

/**
 * Validate data against a TypeBox schema
 *
 * @returns Validation result with typed data or errors
 */
export function validate<T extends TSchema>(schema: T, data: unknown): ValidationResult<Static<T>> {
  const compiler = getCompiler(schema);

  if (compiler.Check(data)) {
    return {
      success: true,
      data,
    };
  }

  const errors = [...compiler.Errors(data)].map(convertError);
  return {
    success: false,
    errors,
  };
}

/**
 * Render validation errors as a single line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
}

/**
 * Validate data and throw a SessionkeepError if invalid
 *
 * @param component - Component name attached to the thrown error
 * @throws SessionkeepError with code VALIDATION
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  component = 'validation'
): Static<T> {
  const compiler = getCompiler(schema);
  if (compiler.Check(data)) {
    return data;
  }

  const errors = [...compiler.Errors(data)].map(convertError);
  throw createValidationError(`Validation failed: ${formatValidationErrors(errors)}`, {
    component,
    details: {
      errors: errors.map((e) => ({ path: e.path, message: e.message })),
    },
  });
}

/**
 * Check if data is valid against a schema (boolean check only)
 */
export function isValid<T extends TSchema>(schema: T, data: unknown): data is Static<T> {
  return getCompiler(schema).Check(data);
}

/**
 * Remove properties the schema does not declare
 */
export function clean<T extends TSchema>(schema: T, data: unknown): unknown {
  return Value.Clean(schema, Value.Clone(data));
}

/**
 * Fill in schema defaults on a copy of the data.
 * The result still has to be checked; defaults do not make bad data valid.
 */
export function applyDefaults<T extends TSchema>(schema: T, data: unknown): unknown {
  return Value.Default(schema, Value.Clone(data));
}

// ============================================================================
// Pre-compiled Record Validators
// ============================================================================

/**
 * Validate a decoded conversation item
 */
export function validateConversationItem(data: unknown): ValidationResult<ConversationItem> {
  return validate(ConversationItemSchema, data);
}

/**
 * Validate a raw session metadata hash as returned by the store
 */
export function validateSessionMetadataHash(data: unknown): ValidationResult<SessionMetadataHash> {
  return validate(SessionMetadataHashSchema, data);
}

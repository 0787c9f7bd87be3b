/**
 * Context codecs: JSON text on the wire, TypeBox schema on both sides.
 */

import type { Static, TSchema } from '@sinclair/typebox';
import {
  JsonObjectSchema,
  applyDefaults,
  createDecodeFailedError,
  validateOrThrow,
  type ContextCodec,
  type JsonObject,
} from '@sessionkeep/types';

const COMPONENT = 'codec';

export interface TypeBoxCodecOptions<T> {
  /** Compact view used by session overviews */
  summarize?: (record: T) => Record<string, unknown>;
}

/**
 * Codec for records described by a TypeBox schema.
 * Schema defaults fill missing fields before the record is checked.
 */
export function createTypeBoxCodec<S extends TSchema>(
  schema: S,
  options: TypeBoxCodecOptions<Static<S>> = {},
): ContextCodec<Static<S>> {
  const validate = (value: unknown): Static<S> =>
    validateOrThrow(schema, applyDefaults(schema, value), COMPONENT);

  return {
    serialize: (record) => JSON.stringify(record),
    deserialize: (raw) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw createDecodeFailedError('Stored context is not valid JSON', {
          component: COMPONENT,
          cause: error instanceof Error ? error : undefined,
        });
      }
      return validate(parsed);
    },
    validate,
    summarize: options.summarize,
  };
}

/**
 * Codec for schemaless contexts: any JSON object
 */
export function createJsonCodec(
  options: TypeBoxCodecOptions<JsonObject> = {},
): ContextCodec<JsonObject> {
  return createTypeBoxCodec(JsonObjectSchema, options);
}

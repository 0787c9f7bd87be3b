/**
 * Configuration Schema for Sessionkeep
 *
 * TypeBox schemas matching the sessionkeep.toml structure. The partial schema
 * describes what a file or the environment may supply; the full schema is the
 * shape after defaults are applied.
 */

import { Type, type Static } from '@sinclair/typebox';

const LogLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
]);

/**
 * Store connection settings
 */
export const StoreSectionSchema = Type.Object({
  provider: Type.Union([Type.Literal('redis'), Type.Literal('memory')]),
  url: Type.String(),
  database: Type.Integer(),
  max_connections: Type.Integer(),
  command_timeout_ms: Type.Integer(),
});

/**
 * Key prefixes, one per key family
 */
export const KeysSectionSchema = Type.Object({
  session_prefix: Type.String(),
  messages_prefix: Type.String(),
  context_prefix: Type.String(),
  lock_prefix: Type.String(),
});

/**
 * Expiry settings in seconds. 0 disables expiry for that family.
 */
export const TtlSectionSchema = Type.Object({
  default_seconds: Type.Optional(Type.Integer()),
  messages_seconds: Type.Optional(Type.Integer()),
  session_seconds: Type.Optional(Type.Integer()),
  context_seconds: Type.Optional(Type.Integer()),
});

/**
 * Distributed lock settings
 */
export const LockSectionSchema = Type.Object({
  timeout_seconds: Type.Integer(),
  retries: Type.Integer(),
  backoff_base_ms: Type.Integer(),
});

export const RuntimeSectionSchema = Type.Object({
  log_level: LogLevelSchema,
});

export const SessionkeepConfigSchema = Type.Object({
  store: StoreSectionSchema,
  keys: KeysSectionSchema,
  ttl: TtlSectionSchema,
  lock: LockSectionSchema,
  runtime: RuntimeSectionSchema,
});

/**
 * What a TOML file or the environment overlay may provide
 */
export const PartialSessionkeepConfigSchema = Type.Object({
  store: Type.Optional(Type.Partial(StoreSectionSchema)),
  keys: Type.Optional(Type.Partial(KeysSectionSchema)),
  ttl: Type.Optional(TtlSectionSchema),
  lock: Type.Optional(Type.Partial(LockSectionSchema)),
  runtime: Type.Optional(Type.Partial(RuntimeSectionSchema)),
});

export type StoreSection = Static<typeof StoreSectionSchema>;
export type StoreProvider = StoreSection['provider'];
export type KeysSection = Static<typeof KeysSectionSchema>;
export type TtlSection = Static<typeof TtlSectionSchema>;
export type LockSection = Static<typeof LockSectionSchema>;
export type RuntimeSection = Static<typeof RuntimeSectionSchema>;
export type SessionkeepConfig = Static<typeof SessionkeepConfigSchema>;
export type PartialSessionkeepConfig = Static<typeof PartialSessionkeepConfigSchema>;

/**
 * Key families that carry their own TTL
 */
export type TtlFamily = 'messages' | 'session' | 'context';

/**
 * TypeBox schemas for records persisted by the session store
 */

import { Type, type Static } from '@sinclair/typebox';

// ============================================================================
// Conversation Items
// ============================================================================

/**
 * One conversation item. The store keeps it opaque: any JSON object is accepted,
 * typically `{ role, content }` plus framework-specific fields.
 */
export const ConversationItemSchema = Type.Record(Type.String(), Type.Unknown(), {
  $id: 'ConversationItem',
  description: 'Opaque conversation item (JSON object)',
});

export type ConversationItem = Static<typeof ConversationItemSchema>;

// ============================================================================
// Session Metadata
// ============================================================================

/**
 * Session metadata hash exactly as the store holds it.
 * Timestamps are decimal strings of fractional epoch seconds.
 */
export const SessionMetadataHashSchema = Type.Object(
  {
    session_id: Type.String({ minLength: 1 }),
    created_at: Type.String({ pattern: '^[0-9]+(\\.[0-9]+)?$' }),
    updated_at: Type.String({ pattern: '^[0-9]+(\\.[0-9]+)?$' }),
  },
  { $id: 'SessionMetadataHash' }
);

export type SessionMetadataHash = Static<typeof SessionMetadataHashSchema>;

/**
 * Decoded session metadata (fractional epoch seconds)
 */
export interface SessionMetadata {
  sessionId: string;
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// JSON Context Records
// ============================================================================

/**
 * Context record with no application schema: any JSON object
 */
export const JsonObjectSchema = Type.Record(Type.String(), Type.Unknown(), {
  $id: 'JsonObject',
});

export type JsonObject = Static<typeof JsonObjectSchema>;


/**
 * Conversation session types
 */

import type { z } from 'zod';
import type {
  conversationSessionSchema,
  conversationStepSchema,
  sessionFieldsSchema,
} from '../schemas/session.schema';

export type ConversationStep = z.infer<typeof conversationStepSchema>;

export type SessionFields = z.infer<typeof sessionFieldsSchema>;

/**
 * Per-call dialogue state, keyed by call id
 * `version` increases by one on every successful save
 */
export type ConversationSession = z.infer<typeof conversationSessionSchema>;

/**
 * Storage contract shared by the durable and in-process stores
 */
export interface SessionStore {
  /**
   * Load the session for a call; an unknown call yields a fresh session at ask_name
   */
  get(callId: string): Promise<ConversationSession>;

  /**
   * Persist a session and refresh its TTL
   * @returns The stored revision (version incremented)
   * @throws {SessionConflictError} If a newer revision was stored since `session` was read
   */
  save(session: ConversationSession): Promise<ConversationSession>;

  /**
   * Explicitly return a call to its initial state. The only way back to ask_name.
   */
  reset(callId: string, reason: string): Promise<ConversationSession>;
}

export interface SessionDefaults {
  ttlSeconds: number;
  durationMinutes: number;
}

export type Clock = () => Date;

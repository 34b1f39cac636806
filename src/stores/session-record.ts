import { conversationSessionSchema } from '../schemas/session.schema';
import { SessionCorruptedError } from '../utils/errors';
import type { ConversationSession, SessionDefaults } from '../types/session.types';

export function sessionKey(callId: string): string {
  return `call_session:${callId}`;
}

/**
 * Fresh session for a call that has no stored state
 */
export function createInitialSession(
  callId: string,
  defaults: SessionDefaults,
  now: Date
): ConversationSession {
  const timestamp = now.toISOString();
  return {
    call_id: callId,
    current_step: 'ask_name',
    fields: { duration_minutes: defaults.durationMinutes },
    retry_counts: {},
    created_at: timestamp,
    updated_at: timestamp,
    ttl_seconds: defaults.ttlSeconds,
    version: 0,
  };
}

/**
 * Decode a stored record
 * @throws {SessionCorruptedError} If the payload is not JSON, fails the schema or belongs to another call
 */
export function parseSessionRecord(callId: string, raw: string): ConversationSession {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    throw new SessionCorruptedError(callId, 'payload is not valid JSON');
  }

  const result = conversationSessionSchema.safeParse(decoded);
  if (!result.success) {
    const detail = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new SessionCorruptedError(callId, detail);
  }

  if (result.data.call_id !== callId) {
    throw new SessionCorruptedError(callId, `record belongs to call '${result.data.call_id}'`);
  }

  return result.data;
}

/**
 * Conversation turn types
 */

import type { ConversationSession } from './session.types';

export interface TurnInput {
  callId: string;
  callerNumber: string;
  speechText: string;
}

/**
 * Webhook reply for one turn
 */
export interface TurnReply {
  next_prompt: string;
  terminal: boolean;
}

/**
 * Why a turn did not advance (or advanced without creating anything)
 * Recorded in logs; never thrown
 */
export type TurnIssue =
  | { kind: 'extraction_failed'; field: 'name' | 'phone' | 'time' | 'confirmation'; reason: string }
  | { kind: 'validation_failed'; field: 'time'; reason: 'in_past' | 'closed_day' | 'outside_hours' }
  | { kind: 'booking_failed'; reason: 'booking_unavailable' }
  | { kind: 'booking_conflict'; appointmentId: string };

export interface StepOutcome {
  session: ConversationSession;
  prompt: string;
  layer?: string;
  issue?: TurnIssue;
}

/**
 * Zod schema for the persisted conversation session record
 * Every record read back from a store is parsed through it
 */

import { z } from 'zod';

export const CONVERSATION_STEPS = ['ask_name', 'ask_mobile', 'ask_time', 'confirm', 'complete'] as const;

export const conversationStepSchema = z.enum(CONVERSATION_STEPS);

const isoTimestamp = z.string().datetime({ offset: true });

export const sessionFieldsSchema = z.object({
  full_name: z.string().min(1).optional(),
  phone: z.string().regex(/^\+[1-9]\d{6,14}$/, 'Phone must be E.164').optional(),
  start_time_utc: isoTimestamp.optional(),
  duration_minutes: z.number().int().positive(),
});

export const conversationSessionSchema = z.object({
  call_id: z.string().min(1),
  caller_number: z.string().optional(),
  current_step: conversationStepSchema,
  fields: sessionFieldsSchema,
  retry_counts: z.record(conversationStepSchema, z.number().int().min(0)),
  suggested_start_utc: isoTimestamp.optional(),
  appointment_id: z.string().optional(),
  created_at: isoTimestamp,
  updated_at: isoTimestamp,
  ttl_seconds: z.number().int().positive(),
  version: z.number().int().min(0),
});

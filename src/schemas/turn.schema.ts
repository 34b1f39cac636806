/**
 * Request schemas for the turn webhook, the Twilio adapter and the operator routes
 */

import { z } from 'zod';

export const turnRequestSchema = z.object({
  call_id: z.string().trim().min(1, 'call_id is required').max(128),
  caller_number: z.string().trim().max(32),
  speech_text: z.string().max(2000),
});

/**
 * Subset of the Twilio <Gather> callback we read
 */
export const twilioGatherSchema = z.object({
  CallSid: z.string().min(1),
  From: z.string().default(''),
  SpeechResult: z.string().default(''),
});

export const callIdParamsSchema = z.object({
  callId: z.string().trim().min(1).max(128),
});

export const resetSessionSchema = z.object({
  reason: z.string().trim().min(3, 'A reason is required for the audit log').max(500),
});

export type TurnRequest = z.infer<typeof turnRequestSchema>;
export type TwilioGather = z.infer<typeof twilioGatherSchema>;
export type ResetSessionRequest = z.infer<typeof resetSessionSchema>;

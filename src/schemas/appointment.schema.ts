/**
 * Zod schema for rows of the appointments table
 */

import { z } from 'zod';

export const appointmentStatusSchema = z.enum(['scheduled', 'cancelled', 'completed']);

export const appointmentRowSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  start_time_utc: z.string(),
  end_time_utc: z.string(),
  duration_minutes: z.number().int().positive(),
  status: appointmentStatusSchema,
  source_call_id: z.string().min(1),
  calendar_event_id: z.string().nullable(),
  created_at: z.string(),
});

/**
 * Response body of the calendar-sync webhook
 */
export const calendarEventResponseSchema = z.object({
  id: z.string().min(1),
});

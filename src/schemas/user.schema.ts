/**
 * Zod schema for rows of the users table
 */

import { z } from 'zod';

/**
 * Phone number validation (E.164 format)
 */
export const phoneNumberSchema = z
  .string()
  .regex(/^\+[1-9]\d{6,14}$/, 'Invalid phone number format. Use E.164 format (e.g., +14035550123)');

export const userRowSchema = z.object({
  id: z.string().min(1),
  full_name: z.string().min(1),
  phone: phoneNumberSchema,
  created_at: z.string(),
});

/**
 * Booking domain types and persistence contracts
 */

import type { z } from 'zod';
import type { userRowSchema } from '../schemas/user.schema';
import type { appointmentRowSchema, appointmentStatusSchema } from '../schemas/appointment.schema';

export type User = z.infer<typeof userRowSchema>;

export type Appointment = z.infer<typeof appointmentRowSchema>;

export type AppointmentStatus = z.infer<typeof appointmentStatusSchema>;

export interface CreateAppointmentInput {
  userId: string;
  startTimeUtc: Date;
  durationMinutes: number;
  sourceCallId: string;
}

export interface UserRepository {
  /**
   * Find the user owning `phone`, creating one if absent
   */
  upsertByPhone(phone: string, fullName: string): Promise<User>;
}

export interface AppointmentRepository {
  findBySourceCallId(sourceCallId: string): Promise<Appointment | null>;

  /**
   * Insert an appointment; a duplicate source_call_id yields the stored row with created=false
   */
  create(input: CreateAppointmentInput): Promise<{ appointment: Appointment; created: boolean }>;

  attachCalendarEvent(appointmentId: string, calendarEventId: string): Promise<Appointment>;
}

/**
 * External calendar the booking is mirrored to
 * @returns The external event id, or null when sync is not configured
 */
export interface CalendarSyncClient {
  createEvent(appointment: Appointment, user: User): Promise<string | null>;
}

export type BookingOutcome =
  | { status: 'booked'; appointment: Appointment; created: boolean }
  | { status: 'failed'; reason: 'booking_unavailable' };

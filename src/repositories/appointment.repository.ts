/**
 * Appointment repository for database operations
 * source_call_id is unique, which makes booking idempotent per call
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { addMinutes } from 'date-fns';
import getDatabase from '../config/database';
import { createChildLogger } from '../config/logger';
import { DatabaseError } from '../utils/errors';
import { appointmentRowSchema } from '../schemas/appointment.schema';
import type {
  Appointment,
  AppointmentRepository,
  CreateAppointmentInput,
} from '../types/booking.types';

const NO_ROWS = 'PGRST116';
const UNIQUE_VIOLATION = '23505';

export class SupabaseAppointmentRepository implements AppointmentRepository {
  private log = createChildLogger({ repository: 'appointment' });

  constructor(private readonly database: () => SupabaseClient = getDatabase) {}

  private get db(): SupabaseClient {
    return this.database();
  }

  /**
   * Find the appointment booked by a call
   * @param sourceCallId - Call id that produced the booking
   */
  async findBySourceCallId(sourceCallId: string): Promise<Appointment | null> {
    const { data, error } = await this.db
      .from('appointments')
      .select('*')
      .eq('source_call_id', sourceCallId)
      .single();

    if (error) {
      if (error.code === NO_ROWS) {
        return null;
      }
      this.log.error({ err: error, sourceCallId }, 'Failed to find appointment by call');
      throw new DatabaseError('Failed to find appointment');
    }

    return this.toAppointment(data);
  }

  /**
   * Create new appointment
   * Losing an insert race on source_call_id returns the stored row instead of failing
   */
  async create(input: CreateAppointmentInput): Promise<{ appointment: Appointment; created: boolean }> {
    const { data, error } = await this.db
      .from('appointments')
      .insert({
        user_id: input.userId,
        start_time_utc: input.startTimeUtc.toISOString(),
        end_time_utc: addMinutes(input.startTimeUtc, input.durationMinutes).toISOString(),
        duration_minutes: input.durationMinutes,
        status: 'scheduled',
        source_call_id: input.sourceCallId,
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const existing = await this.findBySourceCallId(input.sourceCallId);
        if (existing) {
          this.log.info({ appointmentId: existing.id, sourceCallId: input.sourceCallId }, 'Appointment already booked for call');
          return { appointment: existing, created: false };
        }
      }
      this.log.error({ err: error, sourceCallId: input.sourceCallId }, 'Failed to create appointment');
      throw new DatabaseError('Failed to create appointment');
    }

    const appointment = this.toAppointment(data);
    this.log.info(
      { appointmentId: appointment.id, userId: input.userId, sourceCallId: input.sourceCallId },
      'Appointment created'
    );
    return { appointment, created: true };
  }

  /**
   * Record the external calendar event for an appointment
   */
  async attachCalendarEvent(appointmentId: string, calendarEventId: string): Promise<Appointment> {
    const { data, error } = await this.db
      .from('appointments')
      .update({ calendar_event_id: calendarEventId })
      .eq('id', appointmentId)
      .select()
      .single();

    if (error) {
      this.log.error({ err: error, appointmentId }, 'Failed to attach calendar event');
      throw new DatabaseError('Failed to attach calendar event');
    }

    return this.toAppointment(data);
  }

  private toAppointment(row: unknown): Appointment {
    const parsed = appointmentRowSchema.safeParse(row);
    if (!parsed.success) {
      this.log.error({ issues: parsed.error.errors }, 'Unexpected appointments row shape');
      throw new DatabaseError('Unexpected appointments row shape');
    }
    return parsed.data;
  }
}

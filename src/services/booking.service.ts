/**
 * Booking service - finalizes a confirmed conversation into User + Appointment
 */

import { createChildLogger } from '../config/logger';
import { ValidationError } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phone.utils';
import type {
  Appointment,
  AppointmentRepository,
  BookingOutcome,
  CalendarSyncClient,
  User,
  UserRepository,
} from '../types/booking.types';
import type { ConversationSession } from '../types/session.types';

export class BookingService {
  private log = createChildLogger({ service: 'booking' });

  constructor(
    private readonly users: UserRepository,
    private readonly appointments: AppointmentRepository,
    private readonly calendar: CalendarSyncClient
  ) {}

  /**
   * Book the appointment collected in `session`
   * Idempotent on the call id: a second finalize returns the first appointment.
   * Storage failures come back as `booking_unavailable`, never as a throw.
   *
   * @throws {ValidationError} If name, phone or start time is missing
   */
  async finalize(session: ConversationSession): Promise<BookingOutcome> {
    const { full_name: fullName, phone, start_time_utc: startTime, duration_minutes } = session.fields;
    if (!fullName || !phone || !startTime) {
      throw new ValidationError('Session is missing booking fields', { callId: session.call_id });
    }

    let appointment: Appointment;
    let created: boolean;
    let user: User;

    try {
      const existing = await this.appointments.findBySourceCallId(session.call_id);
      if (existing) {
        this.log.info({ callId: session.call_id, appointmentId: existing.id }, 'Booking already exists for call');
        return { status: 'booked', appointment: existing, created: false };
      }

      user = await this.users.upsertByPhone(phone, fullName);
      ({ appointment, created } = await this.appointments.create({
        userId: user.id,
        startTimeUtc: new Date(startTime),
        durationMinutes: duration_minutes,
        sourceCallId: session.call_id,
      }));
    } catch (error) {
      this.log.error(
        { err: error, callId: session.call_id, phone: maskPhoneNumber(phone) },
        'Booking failed'
      );
      return { status: 'failed', reason: 'booking_unavailable' };
    }

    if (created) {
      appointment = await this.syncCalendar(appointment, user);
    }

    this.log.info(
      { callId: session.call_id, appointmentId: appointment.id, created },
      'Booking finalized'
    );
    return { status: 'booked', appointment, created };
  }

  /**
   * Best effort: a sync failure is logged and the booking stands
   */
  private async syncCalendar(appointment: Appointment, user: User): Promise<Appointment> {
    try {
      const eventId = await this.calendar.createEvent(appointment, user);
      if (!eventId) {
        return appointment;
      }
      return await this.appointments.attachCalendarEvent(appointment.id, eventId);
    } catch (error) {
      this.log.warn(
        { err: error, appointmentId: appointment.id },
        'Calendar sync failed, appointment kept'
      );
      return appointment;
    }
  }
}

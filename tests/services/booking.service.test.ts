import { BookingService } from '../../src/services/booking.service';
import { createInitialSession } from '../../src/stores/session-record';
import { ExternalServiceError, ValidationError } from '../../src/utils/errors';
import {
  InMemoryAppointmentRepository,
  InMemoryUserRepository,
  RecordingCalendar,
  UnavailableUserRepository,
} from '../fakes/repositories.fake';
import { NOW, SESSION_DEFAULTS } from '../fakes/fixtures';
import type { Appointment } from '../../src/types/booking.types';
import type { ConversationSession } from '../../src/types/session.types';

function confirmedSession(callId = 'call-1'): ConversationSession {
  const session = createInitialSession(callId, SESSION_DEFAULTS, NOW);
  return {
    ...session,
    current_step: 'confirm',
    fields: {
      ...session.fields,
      full_name: 'Johnny Walker',
      phone: '+18153288957',
      start_time_utc: '2026-10-22T15:30:00.000Z',
    },
  };
}

/**
 * Never finds the earlier booking, so only the unique constraint can stop a duplicate
 */
class BlindAppointmentRepository extends InMemoryAppointmentRepository {
  async findBySourceCallId(): Promise<Appointment | null> {
    return null;
  }
}

describe('BookingService', () => {
  test('finalizing twice returns the first appointment', async () => {
    const appointments = new InMemoryAppointmentRepository();
    const calendar = new RecordingCalendar();
    const booking = new BookingService(new InMemoryUserRepository(), appointments, calendar);

    const first = await booking.finalize(confirmedSession());
    const second = await booking.finalize(confirmedSession());

    expect(first).toMatchObject({ status: 'booked', created: true, appointment: { id: 'appt-1' } });
    expect(second).toMatchObject({ status: 'booked', created: false, appointment: { id: 'appt-1' } });
    expect(appointments.appointments).toHaveLength(1);
    expect(calendar.events).toHaveLength(1);
  });

  test('a lost insert race still yields one appointment', async () => {
    const appointments = new BlindAppointmentRepository();
    const calendar = new RecordingCalendar();
    const booking = new BookingService(new InMemoryUserRepository(), appointments, calendar);

    await booking.finalize(confirmedSession());
    const again = await booking.finalize(confirmedSession());

    expect(again).toMatchObject({ status: 'booked', created: false, appointment: { id: 'appt-1' } });
    expect(appointments.appointments).toHaveLength(1);
    expect(calendar.events).toHaveLength(1);
  });

  test('the same phone books under one user', async () => {
    const users = new InMemoryUserRepository();
    const appointments = new InMemoryAppointmentRepository();
    const booking = new BookingService(users, appointments, new RecordingCalendar(null));

    await booking.finalize(confirmedSession('call-1'));
    await booking.finalize(confirmedSession('call-2'));

    expect(users.users).toHaveLength(1);
    expect(appointments.appointments.map((appointment) => appointment.user_id)).toEqual(['user-1', 'user-1']);
  });

  test('a calendar failure keeps the booking', async () => {
    const appointments = new InMemoryAppointmentRepository();
    const booking = new BookingService(
      new InMemoryUserRepository(),
      appointments,
      new RecordingCalendar(new ExternalServiceError('Calendar', 'timeout of 5000ms exceeded'))
    );

    const outcome = await booking.finalize(confirmedSession());

    expect(outcome).toMatchObject({ status: 'booked', created: true, appointment: { calendar_event_id: null } });
    expect(appointments.appointments).toHaveLength(1);
  });

  test('storage failures are reported as booking_unavailable', async () => {
    const booking = new BookingService(
      new UnavailableUserRepository(),
      new InMemoryAppointmentRepository(),
      new RecordingCalendar()
    );

    await expect(booking.finalize(confirmedSession())).resolves.toEqual({
      status: 'failed',
      reason: 'booking_unavailable',
    });
  });

  test('refuses a session without collected fields', async () => {
    const booking = new BookingService(
      new InMemoryUserRepository(),
      new InMemoryAppointmentRepository(),
      new RecordingCalendar()
    );

    await expect(booking.finalize(createInitialSession('call-1', SESSION_DEFAULTS, NOW))).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

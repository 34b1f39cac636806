/**
 * Calendar sync clients
 * Mirrors a booked appointment to an external calendar through a webhook
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { createChildLogger } from '../config/logger';
import { ExternalServiceError } from '../utils/errors';
import { calendarEventResponseSchema } from '../schemas/appointment.schema';
import type { Appointment, CalendarSyncClient, User } from '../types/booking.types';

export class HttpCalendarSyncClient implements CalendarSyncClient {
  private client: AxiosInstance;
  private log = createChildLogger({ service: 'calendar-sync' });

  constructor(options: { baseUrl: string; token?: string; timeoutMs?: number }) {
    this.client = axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ''),
      timeout: options.timeoutMs ?? 5000,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'voice-booking-intake/1.0.0',
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
      },
    });

    this.client.interceptors.response.use(
      (response) => {
        this.log.debug({ status: response.status, url: response.config.url }, 'Calendar sync response');
        return response;
      },
      (error: AxiosError) => {
        this.log.warn(
          { status: error.response?.status, url: error.config?.url, code: error.code },
          'Calendar sync request failed'
        );
        return Promise.reject(error);
      }
    );
  }

  /**
   * Create a calendar event for an appointment
   * @returns External event id
   * @throws {ExternalServiceError} On transport errors or an unexpected response body
   */
  async createEvent(appointment: Appointment, user: User): Promise<string> {
    try {
      const response = await this.client.post<unknown>('/events', {
        title: `Appointment: ${user.full_name}`,
        start: appointment.start_time_utc,
        end: appointment.end_time_utc,
        attendee: { name: user.full_name, phone: user.phone },
        external_id: appointment.id,
      });

      const body = calendarEventResponseSchema.safeParse(response.data);
      if (!body.success) {
        throw new ExternalServiceError('Calendar', 'response did not include an event id');
      }

      this.log.info({ appointmentId: appointment.id, eventId: body.data.id }, 'Calendar event created');
      return body.data.id;
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'unknown error';
      throw new ExternalServiceError('Calendar', message, { appointmentId: appointment.id });
    }
  }
}

/**
 * Used when CALENDAR_SYNC_URL is unset
 */
export class DisabledCalendarSyncClient implements CalendarSyncClient {
  async createEvent(): Promise<string | null> {
    return null;
  }
}

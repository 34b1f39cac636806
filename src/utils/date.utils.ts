/**
 * Utility functions for date and time operations
 * Wall-clock values are always interpreted in an explicit IANA timezone
 */

import { format } from 'date-fns';
import { formatInTimeZone, fromZonedTime, toZonedTime } from 'date-fns-tz';

/**
 * Calendar and clock fields as the caller meant them, without a timezone
 */
export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
}

/**
 * Convert a wall-clock time in `timezone` to a UTC Date
 */
export function wallClockToUtc(wall: WallClock, timezone: string): Date {
  const pad = (value: number) => String(value).padStart(2, '0');
  const local = `${wall.year}-${pad(wall.month)}-${pad(wall.day)}T${pad(wall.hour)}:${pad(wall.minute)}:00`;
  return fromZonedTime(local, timezone);
}

/**
 * Local view of an instant: a Date whose getters return the wall clock in `timezone`
 * Used as the reference point for relative-date parsing
 */
export function zonedReference(instant: Date, timezone: string): Date {
  return toZonedTime(instant, timezone);
}

/**
 * Read a zoned reference back as wall-clock fields
 */
export function wallClockOf(local: Date): WallClock {
  return {
    year: local.getFullYear(),
    month: local.getMonth() + 1,
    day: local.getDate(),
    hour: local.getHours(),
    minute: local.getMinutes(),
  };
}

/**
 * Format a zoned reference as a calendar date, e.g. "October 22, 2026"
 */
export function formatCalendarDate(local: Date): string {
  return format(local, 'MMMM d, yyyy');
}

/**
 * Spoken form of an appointment time, e.g. "Thursday, October 22 at 9:30 AM"
 */
export function formatForSpeech(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, "EEEE, MMMM d 'at' h:mm a");
}

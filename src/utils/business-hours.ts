/**
 * Business-hours rules
 * Pure functions over a weekly schedule in the business timezone
 */

import { addDays, format } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';

/**
 * Opening window in minutes since local midnight, close exclusive for appointment ends
 */
export interface DailyWindow {
  open: number;
  close: number;
}

export interface BusinessHours {
  timezone: string;
  /**
   * Indexed by weekday (0=Sunday, 6=Saturday); null means closed
   */
  weekly: ReadonlyArray<DailyWindow | null>;
  slotMinutes: number;
  lookaheadDays: number;
}

export type HoursCheck =
  | { ok: true }
  | { ok: false; reason: 'in_past' | 'closed_day' | 'outside_hours' };

/**
 * Build a weekly schedule from a list of open days and a default window
 * @param overrides - Per-weekday windows that replace the default
 */
export function buildBusinessHours(options: {
  timezone: string;
  days: number[];
  open: number;
  close: number;
  overrides?: ReadonlyMap<number, DailyWindow>;
  slotMinutes: number;
  lookaheadDays: number;
}): BusinessHours {
  const weekly = Array.from({ length: 7 }, (_unused, day): DailyWindow | null => {
    if (!options.days.includes(day)) {
      return null;
    }
    return options.overrides?.get(day) ?? { open: options.open, close: options.close };
  });

  return {
    timezone: options.timezone,
    weekly,
    slotMinutes: options.slotMinutes,
    lookaheadDays: options.lookaheadDays,
  };
}

function localMinutes(local: Date): number {
  return local.getHours() * 60 + local.getMinutes();
}

/**
 * True when the whole appointment fits inside one opening window
 */
export function isWithinBusinessHours(
  startUtc: Date,
  durationMinutes: number,
  hours: BusinessHours
): boolean {
  return checkBusinessHours(startUtc, durationMinutes, hours).ok;
}

/**
 * Same as isWithinBusinessHours, with the reason when it fails
 */
export function checkBusinessHours(
  startUtc: Date,
  durationMinutes: number,
  hours: BusinessHours
): HoursCheck {
  const local = toZonedTime(startUtc, hours.timezone);
  const window = hours.weekly[local.getDay()];

  if (!window) {
    return { ok: false, reason: 'closed_day' };
  }

  const start = localMinutes(local);
  if (start < window.open || start + durationMinutes > window.close) {
    return { ok: false, reason: 'outside_hours' };
  }

  return { ok: true };
}

/**
 * Validate a requested start: not in the past and inside business hours
 */
export function validateAppointmentTime(
  startUtc: Date,
  durationMinutes: number,
  hours: BusinessHours,
  now: Date
): HoursCheck {
  if (startUtc.getTime() < now.getTime()) {
    return { ok: false, reason: 'in_past' };
  }
  return checkBusinessHours(startUtc, durationMinutes, hours);
}

/**
 * Earliest slot-aligned start at or after `fromUtc` where the appointment fits
 * Walks at most `lookaheadDays` calendar days
 * @returns The opening in UTC, or null when none exists in the lookahead
 */
export function nextOpening(
  fromUtc: Date,
  durationMinutes: number,
  hours: BusinessHours
): Date | null {
  const local = toZonedTime(fromUtc, hours.timezone);
  const partialMinute = local.getSeconds() > 0 || local.getMilliseconds() > 0 ? 1 : 0;
  const firstDayMinutes = localMinutes(local) + partialMinute;

  for (let offset = 0; offset < hours.lookaheadDays; offset += 1) {
    const day = addDays(local, offset);
    const window = hours.weekly[day.getDay()];
    if (!window) {
      continue;
    }

    let candidate = window.open;
    if (offset === 0 && firstDayMinutes > window.open) {
      candidate = Math.ceil(firstDayMinutes / hours.slotMinutes) * hours.slotMinutes;
    }

    if (candidate + durationMinutes <= window.close) {
      const wallClock = `${format(day, 'yyyy-MM-dd')}T${formatMinutes(candidate)}:00`;
      return fromZonedTime(wallClock, hours.timezone);
    }
  }

  return null;
}

/**
 * Minutes since midnight as "HH:mm"
 */
export function formatMinutes(minutes: number): string {
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0');
  const mm = String(minutes % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}

import { buildBusinessHours, type BusinessHours } from '../../src/utils/business-hours';
import type { SessionDefaults } from '../../src/types/session.types';

export const TIMEZONE = 'America/Edmonton';

/**
 * Monday 2026-10-19, 12:00 in Edmonton (MDT, UTC-6)
 */
export const NOW = new Date('2026-10-19T18:00:00.000Z');

export const SESSION_DEFAULTS: SessionDefaults = { ttlSeconds: 900, durationMinutes: 30 };

/**
 * Monday to Friday, opening at `open` and closing at 17:00
 */
export function weekdayHours(open = '09:00'): BusinessHours {
  const [hh, mm] = open.split(':').map(Number);
  return buildBusinessHours({
    timezone: TIMEZONE,
    days: [1, 2, 3, 4, 5],
    open: hh * 60 + mm,
    close: 17 * 60,
    slotMinutes: 30,
    lookaheadDays: 14,
  });
}

import {
  buildBusinessHours,
  checkBusinessHours,
  formatMinutes,
  isWithinBusinessHours,
  nextOpening,
  validateAppointmentTime,
} from '../../src/utils/business-hours';
import { NOW, TIMEZONE, weekdayHours } from '../fakes/fixtures';

describe('business hours', () => {
  const hours = weekdayHours();

  test('accepts an appointment inside the window', () => {
    // Thursday 09:30 MDT
    expect(checkBusinessHours(new Date('2026-10-22T15:30:00Z'), 30, hours)).toEqual({ ok: true });
  });

  test('the appointment must end by closing time', () => {
    expect(isWithinBusinessHours(new Date('2026-10-22T22:30:00Z'), 30, hours)).toBe(true);
    expect(checkBusinessHours(new Date('2026-10-22T22:45:00Z'), 30, hours)).toEqual({
      ok: false,
      reason: 'outside_hours',
    });
  });

  test('rejects starts before opening', () => {
    expect(checkBusinessHours(new Date('2026-10-22T14:30:00Z'), 30, hours)).toEqual({
      ok: false,
      reason: 'outside_hours',
    });
  });

  test('rejects closed days', () => {
    // Saturday 10:00 MDT
    expect(checkBusinessHours(new Date('2026-10-24T16:00:00Z'), 30, hours)).toEqual({
      ok: false,
      reason: 'closed_day',
    });
  });

  test('rejects times already passed', () => {
    expect(validateAppointmentTime(new Date('2026-10-19T17:00:00Z'), 30, hours, NOW)).toEqual({
      ok: false,
      reason: 'in_past',
    });
  });

  test('per-day overrides replace the default window', () => {
    const withSaturday = buildBusinessHours({
      timezone: TIMEZONE,
      days: [1, 2, 3, 4, 5, 6],
      open: 540,
      close: 1020,
      overrides: new Map([[6, { open: 540, close: 840 }]]),
      slotMinutes: 30,
      lookaheadDays: 14,
    });

    expect(withSaturday.weekly[0]).toBeNull();
    expect(withSaturday.weekly[1]).toEqual({ open: 540, close: 1020 });
    expect(withSaturday.weekly[6]).toEqual({ open: 540, close: 840 });
    // Saturday 13:30 fits, 14:00 does not
    expect(isWithinBusinessHours(new Date('2026-10-24T19:30:00Z'), 30, withSaturday)).toBe(true);
    expect(isWithinBusinessHours(new Date('2026-10-24T20:00:00Z'), 30, withSaturday)).toBe(false);
  });

  describe('nextOpening', () => {
    test('rounds up to the next slot on the same day', () => {
      // Monday 10:10 MDT -> 10:30
      expect(nextOpening(new Date('2026-10-19T16:10:00Z'), 30, hours)?.toISOString()).toBe(
        '2026-10-19T16:30:00.000Z'
      );
    });

    test('moves to opening time when asked before opening', () => {
      // Thursday 07:00 MDT -> 09:00
      expect(nextOpening(new Date('2026-10-22T13:00:00Z'), 30, hours)?.toISOString()).toBe(
        '2026-10-22T15:00:00.000Z'
      );
    });

    test('skips the weekend after a late Friday request', () => {
      // Friday 16:45 MDT -> Monday 09:00
      expect(nextOpening(new Date('2026-10-23T22:45:00Z'), 30, hours)?.toISOString()).toBe(
        '2026-10-26T15:00:00.000Z'
      );
    });

    test('resolves the opening in the offset in force on that day', () => {
      // Friday 17:00 MDT; the following Monday is in MST (UTC-7)
      expect(nextOpening(new Date('2026-10-30T23:00:00Z'), 30, hours)?.toISOString()).toBe(
        '2026-11-02T16:00:00.000Z'
      );
    });

    test('returns null when nothing opens within the lookahead', () => {
      const closed = buildBusinessHours({
        timezone: TIMEZONE,
        days: [],
        open: 540,
        close: 1020,
        slotMinutes: 30,
        lookaheadDays: 14,
      });
      expect(nextOpening(NOW, 30, closed)).toBeNull();
    });
  });

  test('formatMinutes', () => {
    expect(formatMinutes(570)).toBe('09:30');
    expect(formatMinutes(1020)).toBe('17:00');
  });
});

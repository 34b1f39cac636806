import { formatForSpeech, wallClockOf, wallClockToUtc, zonedReference } from '../../src/utils/date.utils';
import { NOW, TIMEZONE } from '../fakes/fixtures';

describe('date utils', () => {
  test('converts business-local wall clock to UTC', () => {
    expect(wallClockToUtc({ year: 2026, month: 10, day: 22, hour: 9, minute: 30 }, TIMEZONE).toISOString()).toBe(
      '2026-10-22T15:30:00.000Z'
    );
    // After the switch back to standard time
    expect(wallClockToUtc({ year: 2026, month: 11, day: 2, hour: 9, minute: 0 }, TIMEZONE).toISOString()).toBe(
      '2026-11-02T16:00:00.000Z'
    );
  });

  test('reads the local wall clock of an instant', () => {
    expect(wallClockOf(zonedReference(NOW, TIMEZONE))).toEqual({
      year: 2026,
      month: 10,
      day: 19,
      hour: 12,
      minute: 0,
    });
  });

  test('formats appointment times for speech', () => {
    expect(formatForSpeech(new Date('2026-10-22T15:30:00Z'), TIMEZONE)).toBe('Thursday, October 22 at 9:30 AM');
  });
});

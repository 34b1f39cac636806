import { prepareTimePhrase } from '../../../src/services/extraction/relative-dates';
import { wallClockOf, zonedReference } from '../../../src/utils/date.utils';
import { NOW, TIMEZONE } from '../../fakes/fixtures';

describe('prepareTimePhrase', () => {
  const reference = zonedReference(NOW, TIMEZONE);

  test('"next week" moves the anchor to the following Monday', () => {
    const prepared = prepareTimePhrase('Next week. Thursday at 9:30 a.m.', reference);

    expect(prepared.text).toBe('Thursday at 9:30 am');
    expect(wallClockOf(prepared.reference)).toEqual({ year: 2026, month: 10, day: 26, hour: 0, minute: 0 });
  });

  test('"this week" is dropped and keeps the anchor', () => {
    const prepared = prepareTimePhrase('this week on Friday at 3pm', reference);

    expect(prepared.text).toBe('on Friday at 3pm');
    expect(prepared.reference).toBe(reference);
  });

  test('relative days become calendar dates', () => {
    expect(prepareTimePhrase('tomorrow at 2 p.m.', reference).text).toBe('October 20, 2026 at 2 pm');
    expect(prepareTimePhrase('today at 4', reference).text).toBe('October 19, 2026 at 4');
    expect(prepareTimePhrase('the day after tomorrow, 10am', reference).text).toBe('October 21, 2026, 10am');
  });
});

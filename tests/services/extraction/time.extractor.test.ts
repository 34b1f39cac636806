import { parseExplicitTime } from '../../../src/services/extraction/time.extractor';
import { zonedReference } from '../../../src/utils/date.utils';
import { ScriptedLlm } from '../../fakes/llm.fake';
import { NOW, TIMEZONE } from '../../fakes/fixtures';
import { buildExtraction, turnContext } from './extraction-service.helper';

async function extractIso(transcript: string): Promise<string | null> {
  const result = await buildExtraction().extractTime(transcript, turnContext());
  return result.status === 'success' ? result.value.toISOString() : null;
}

describe('time extraction', () => {
  // Turns run on Monday 2026-10-19 at 12:00 business time

  test('weekday and clock time', async () => {
    await expect(buildExtraction().extractTime('Thursday at 9:30am', turnContext())).resolves.toEqual({
      status: 'success',
      value: new Date('2026-10-22T15:30:00.000Z'),
      layer: 'calendar_phrase',
    });
  });

  test('"next week" anchors the weekday on the following week', async () => {
    await expect(extractIso('Next week. Thursday at 9:30 a.m.')).resolves.toBe('2026-10-29T15:30:00.000Z');
  });

  test('relative days', async () => {
    await expect(extractIso('tomorrow at 2pm')).resolves.toBe('2026-10-20T20:00:00.000Z');
    await expect(extractIso('the day after tomorrow at 10 a.m.')).resolves.toBe('2026-10-21T16:00:00.000Z');
  });

  test('an early hour without am or pm is read as afternoon', async () => {
    await expect(extractIso('Thursday at 3')).resolves.toBe('2026-10-22T21:00:00.000Z');
    await expect(extractIso('tomorrow at 2')).resolves.toBe('2026-10-20T20:00:00.000Z');
    await expect(extractIso('Thursday at 10')).resolves.toBe('2026-10-22T16:00:00.000Z');
    await expect(extractIso('Thursday at 3am')).resolves.toBe('2026-10-22T09:00:00.000Z');
  });

  test('times after the switch to standard time use the new offset', async () => {
    await expect(extractIso('November 3 at 9am')).resolves.toBe('2026-11-03T16:00:00.000Z');
  });

  test('a day without a time of day asks for the hour', async () => {
    await expect(buildExtraction().extractTime('Thursday', turnContext())).resolves.toEqual({
      status: 'failed',
      reason: 'no_time_of_day',
    });
  });

  test('no time at all', async () => {
    await expect(buildExtraction().extractTime('whatever suits the doctor', turnContext())).resolves.toEqual({
      status: 'failed',
      reason: 'no_time_found',
    });
  });

  test('falls back to the LLM and parses its answer locally', async () => {
    const llm = new ScriptedLlm(['2026-10-23T11:00']);
    const result = await buildExtraction({ llm }).extractTime('whatever suits the doctor', turnContext());

    expect(result).toEqual({ status: 'success', value: new Date('2026-10-23T17:00:00.000Z'), layer: 'llm' });
    expect(llm.requests[0].instruction).toContain('Monday, 2026-10-19 at 12:00 in America/Edmonton');
  });

  describe('parseExplicitTime', () => {
    const reference = zonedReference(NOW, TIMEZONE);

    test('written US dates are business-local', () => {
      expect(parseExplicitTime('10/22/2026 2:30 PM', reference, TIMEZONE)?.toISOString()).toBe(
        '2026-10-22T20:30:00.000Z'
      );
    });

    test('ISO values with an offset are absolute', () => {
      expect(parseExplicitTime('2026-10-22T09:30:00-06:00', reference, TIMEZONE)?.toISOString()).toBe(
        '2026-10-22T15:30:00.000Z'
      );
    });

    test('anything else is rejected', () => {
      expect(parseExplicitTime('sometime soon', reference, TIMEZONE)).toBeNull();
    });
  });
});

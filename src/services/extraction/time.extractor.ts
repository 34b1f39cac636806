/**
 * Appointment time extraction chain
 * calendar phrases (chrono) -> explicit formats (date-fns) -> LLM, resolved in the business timezone
 */

import * as chrono from 'chrono-node';
import { isValid, parse, parseISO } from 'date-fns';
import { timeInstruction } from '../../config/extraction-prompts';
import { wallClockOf, wallClockToUtc, zonedReference } from '../../utils/date.utils';
import { prepareTimePhrase } from './relative-dates';
import type {
  ExtractionChain,
  ExtractionLayer,
  LlmCompletionClient,
} from '../../types/extraction.types';

const EXPLICIT_FORMATS = [
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd h:mm a',
  'yyyy-MM-dd h a',
  'MM/dd/yyyy HH:mm',
  'MM/dd/yyyy h:mm a',
  'MMMM d, yyyy h:mm a',
  'MMMM d yyyy h:mm a',
  'MMMM d h:mm a',
  'MMMM d h a',
];

// Hours said without am/pm that are read as afternoon ("Thursday at 3")
const BARE_AFTERNOON_HOURS = { first: 1, last: 6 };

const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Calendar-phrase layer: "Thursday at 9:30am", "October 22 at 2pm", ...
 * Only results with a stated hour count; a bare 1 to 6 o'clock is read as afternoon
 * @param reference - Zoned reference the phrase is relative to
 */
export function parseCalendarPhrase(text: string, reference: Date, timezone: string): Date | null {
  const results = chrono.parse(text, reference, { forwardDate: true });

  for (const result of results) {
    const { start } = result;
    if (!start.isCertain('hour')) {
      continue;
    }

    const year = start.get('year');
    const month = start.get('month');
    const day = start.get('day');
    const stated = start.get('hour');
    const hour =
      stated !== null &&
      !start.isCertain('meridiem') &&
      stated >= BARE_AFTERNOON_HOURS.first &&
      stated <= BARE_AFTERNOON_HOURS.last
        ? stated + 12
        : stated;
    const minute = start.get('minute') ?? 0;
    if (year === null || month === null || day === null || hour === null) {
      continue;
    }

    return wallClockToUtc({ year, month, day, hour, minute }, timezone);
  }

  return null;
}

/**
 * True when the text names a day but no time of day
 */
export function mentionsDayWithoutHour(text: string, reference: Date): boolean {
  const results = chrono.parse(text, reference, { forwardDate: true });
  return results.length > 0 && results.every((result) => !result.start.isCertain('hour'));
}

/**
 * Explicit-format layer: ISO-8601 and a fixed list of written formats
 * ISO values with an offset are absolute; everything else is business-local
 */
export function parseExplicitTime(text: string, reference: Date, timezone: string): Date | null {
  const cleaned = text.trim().replace(/[.,]+$/, '');

  if (ISO_WITH_OFFSET.test(cleaned)) {
    const instant = parseISO(cleaned);
    return isValid(instant) ? instant : null;
  }

  for (const pattern of EXPLICIT_FORMATS) {
    const parsed = parse(cleaned, pattern, reference);
    if (isValid(parsed)) {
      return wallClockToUtc(wallClockOf(parsed), timezone);
    }
  }

  return null;
}

export interface TimeChainOptions {
  timezone: string;
  llm: LlmCompletionClient;
  llmTimeoutMs: number;
}

/**
 * Build the chain for one turn; relative phrases resolve against `now`
 */
export function buildTimeChain(options: TimeChainOptions, now: Date): ExtractionChain<Date> {
  const { timezone, llm } = options;
  const reference = zonedReference(now, timezone);

  const calendarPhrase: ExtractionLayer<Date> = {
    name: 'calendar_phrase',
    extract: async (transcript) => {
      const prepared = prepareTimePhrase(transcript, reference);
      return parseCalendarPhrase(prepared.text, prepared.reference, timezone);
    },
  };

  const explicitFormat: ExtractionLayer<Date> = {
    name: 'explicit_format',
    extract: async (transcript) => {
      const prepared = prepareTimePhrase(transcript, reference);
      return parseExplicitTime(prepared.text, prepared.reference, timezone);
    },
  };

  const llmGuess: ExtractionLayer<Date> = {
    name: 'llm',
    timeoutMs: options.llmTimeoutMs,
    extract: async (transcript, signal) => {
      if (!llm.enabled) {
        return null;
      }
      const reply = await llm.complete({ instruction: timeInstruction(now, timezone), transcript }, signal);
      if (!reply) {
        return null;
      }
      return (
        parseExplicitTime(reply, reference, timezone) ??
        parseCalendarPhrase(reply, reference, timezone)
      );
    },
  };

  return {
    field: 'time',
    failureReason: 'no_time_found',
    layers: [calendarPhrase, explicitFormat, llmGuess],
  };
}

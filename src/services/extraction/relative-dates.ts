/**
 * Relative-day preprocessing for time transcripts
 * Rewrites phrases the calendar parser handles poorly into explicit dates
 */

import { addDays, addWeeks, startOfWeek } from 'date-fns';
import { formatCalendarDate } from '../../utils/date.utils';

export interface PreparedTimeText {
  text: string;
  /**
   * Zoned reference (getters return business-local wall clock)
   */
  reference: Date;
}

const WEEK_PHRASE = /\b(next|this)\s+week\b[.,]?/gi;

/**
 * Normalize spoken meridiems and anchor relative days
 * @param transcript - Raw time answer
 * @param reference - Zoned reference for "now"
 */
export function prepareTimePhrase(transcript: string, reference: Date): PreparedTimeText {
  let text = transcript.replace(/\b([ap])\.\s*m\b\.?/gi, (_match, letter: string) => `${letter}m`);
  let anchor = reference;

  text = text.replace(WEEK_PHRASE, (_match, which: string) => {
    if (which.toLowerCase() === 'next') {
      anchor = startOfWeek(addWeeks(reference, 1), { weekStartsOn: 1 });
    }
    return ' ';
  });

  text = text
    .replace(/\b(?:the\s+)?day after tomorrow\b/gi, () => formatCalendarDate(addDays(reference, 2)))
    .replace(/\btomorrow\b/gi, () => formatCalendarDate(addDays(reference, 1)))
    .replace(/\btoday\b/gi, () => formatCalendarDate(reference));

  return {
    text: text.replace(/\s+/g, ' ').replace(/^[\s.,]+/, '').trim(),
    reference: anchor,
  };
}

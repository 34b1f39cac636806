import { formatInTimeZone } from 'date-fns-tz';

/**
 * Instructions for the last-resort LLM layers
 * Each asks for one bare value so the reply can be re-validated locally
 */

export function phoneInstruction(): string {
  return [
    'You read speech-to-text transcripts from a phone call.',
    'The caller was asked for their mobile number. The transcript may spell digits as words',
    '(e.g. "oh" for zero, "double five"), mis-hear them, or include filler words.',
    'Reply with the phone number as digits only, including the country code if one was said.',
    'If no phone number can be recovered, reply NONE.',
  ].join(' ');
}

export function nameInstruction(): string {
  return [
    'You read speech-to-text transcripts from a phone call.',
    'The caller was asked for their full name.',
    'Reply with only the first and last name, e.g. "Jane Smith".',
    'Ignore filler words, greetings and anything that is not part of a name.',
    'If no first and last name can be recovered, reply NONE.',
  ].join(' ');
}

/**
 * @param now - Turn start; the model resolves relative days against it
 * @param timezone - Business timezone the answer must be expressed in
 */
export function timeInstruction(now: Date, timezone: string): string {
  const today = formatInTimeZone(now, timezone, "EEEE, yyyy-MM-dd 'at' HH:mm");
  return [
    'You read speech-to-text transcripts from a phone call.',
    'The caller was asked when they would like an appointment.',
    `It is currently ${today} in ${timezone}.`,
    'Reply with the requested local start time as YYYY-MM-DDTHH:mm (24-hour), nothing else.',
    'Resolve relative days like "tomorrow" or "next Tuesday" against the current date.',
    'If no specific day and time of day was requested, reply NONE.',
  ].join(' ');
}

/**
 * Caller-facing prompts for each conversation step
 */

import { formatForSpeech } from '../utils/date.utils';
import { formatPhoneForSpeech } from '../utils/phone.utils';
import type { ConversationSession, ConversationStep } from '../types/session.types';

function firstName(session: ConversationSession): string {
  return session.fields.full_name?.split(' ')[0] ?? 'there';
}

export const prompts = {
  greeting: (): string =>
    "Hi there! Thanks for calling. I'll help you book your appointment today. What's your full name?",

  askName: (): string => 'May I have your first and last name, please?',

  retryName: (): string =>
    "Sorry, I didn't catch your name. Could you say your first and last name?",

  askMobile: (session: ConversationSession): string =>
    `Thanks, ${firstName(session)}. What's the best mobile number to reach you?`,

  retryMobile: (): string =>
    "Sorry, I didn't get that number. Could you say your mobile number one digit at a time?",

  askTime: (): string => 'What day and time would you like to come in?',

  retryTime: (): string =>
    "Sorry, I couldn't work out a day and time. You can say something like Thursday at 10 AM.",

  missingTimeOfDay: (): string => 'What time of day would suit you on that day?',

  timeInPast: (): string => 'That time has already passed. What other day and time would suit you?',

  outsideHours: (suggestion: Date | null, timezone: string): string =>
    suggestion
      ? `Sorry, we're not open then. The next available opening is ${formatForSpeech(suggestion, timezone)}. Would that work, or would you like a different time?`
      : "Sorry, we're not open then, and I couldn't find an opening in the next two weeks. Could you suggest another time?",

  confirm: (session: ConversationSession, timezone: string): string => {
    const { full_name: fullName, phone, start_time_utc: start } = session.fields;
    const when = start ? formatForSpeech(new Date(start), timezone) : 'the time you chose';
    const mobile = phone ? formatPhoneForSpeech(phone) : 'the number you gave';
    return `Just to confirm: ${fullName ?? 'your appointment'}, mobile ${mobile}, on ${when}. Shall I book that?`;
  },

  retryConfirm: (): string => 'Sorry, was that a yes or a no? Shall I book the appointment?',

  declined: (): string => 'No problem. What day and time would you prefer instead?',

  booked: (session: ConversationSession, timezone: string): string => {
    const start = session.fields.start_time_utc;
    const when = start ? formatForSpeech(new Date(start), timezone) : 'the time you chose';
    return `You're all set, ${firstName(session)}. Your appointment is booked for ${when}. Thank you for calling. Goodbye!`;
  },

  bookingUnavailable: (): string =>
    "Sorry, I couldn't complete the booking just now. Shall I try again?",

  alreadyComplete: (): string =>
    'Your appointment is already booked. Thank you for calling. Goodbye!',
};

/**
 * The question a caller is expected to answer at `step`
 * Used when a turn has to be answered without new progress
 */
export function promptForStep(session: ConversationSession, timezone: string): string {
  const step: ConversationStep = session.current_step;
  switch (step) {
    case 'ask_name':
      return prompts.askName();
    case 'ask_mobile':
      return prompts.askMobile(session);
    case 'ask_time':
      return prompts.askTime();
    case 'confirm':
      return prompts.confirm(session, timezone);
    case 'complete':
      return prompts.alreadyComplete();
  }
}

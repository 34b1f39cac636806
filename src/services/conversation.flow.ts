/**
 * Conversation state machine
 * ask_name -> ask_mobile -> ask_time -> confirm -> complete, with same-step retries.
 * Nothing in here moves a call back to ask_name; only an explicit store reset does.
 */

import { InvalidTransitionError } from '../utils/errors';
import { nextOpening, validateAppointmentTime, type BusinessHours } from '../utils/business-hours';
import { prompts } from './conversation.prompts';
import type { BookingService } from './booking.service';
import type { ExtractionService } from './extraction/extraction.service';
import type { ExtractionContext } from '../types/extraction.types';
import type { ConversationSession, ConversationStep } from '../types/session.types';
import type { StepOutcome } from '../types/conversation.types';

export const ALLOWED_TRANSITIONS: Readonly<Record<ConversationStep, readonly ConversationStep[]>> = {
  ask_name: ['ask_mobile'],
  ask_mobile: ['ask_time'],
  ask_time: ['confirm'],
  confirm: ['complete', 'ask_time'],
  complete: [],
};

/**
 * Move a session along an edge of the transition table
 * @throws {InvalidTransitionError} For an edge not in the table or a target whose prerequisites are unset
 */
export function transition(session: ConversationSession, to: ConversationStep): ConversationSession {
  const from = session.current_step;
  if (!ALLOWED_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }

  const { fields } = session;
  if (to === 'ask_time' && (!fields.full_name || !fields.phone)) {
    throw new InvalidTransitionError(from, to, 'name and phone must be collected first');
  }
  if (to === 'confirm' && !fields.start_time_utc) {
    throw new InvalidTransitionError(from, to, 'start time must be collected first');
  }
  if (to === 'complete' && !session.appointment_id) {
    throw new InvalidTransitionError(from, to, 'appointment must be booked first');
  }

  return { ...session, current_step: to };
}

function withRetry(session: ConversationSession): ConversationSession {
  const step = session.current_step;
  return {
    ...session,
    retry_counts: { ...session.retry_counts, [step]: (session.retry_counts[step] ?? 0) + 1 },
  };
}

const AFFIRMATIVE_WORDS = new Set([
  'yes', 'yeah', 'yep', 'yup', 'sure', 'ok', 'okay', 'confirm', 'confirmed', 'correct',
  'book', 'absolutely', 'definitely', 'perfect',
]);
const AFFIRMATIVE_PHRASES = ['sounds good', 'that works', 'go ahead', "that's right", 'please do'];
const NEGATIVE_WORDS = new Set(['no', 'nope', 'nah', 'cancel', 'change', 'wrong', 'different', 'not', "don't"]);

export type ConfirmationAnswer = 'affirmative' | 'negative' | 'unclear';

/**
 * Classify a yes/no answer; mixed or empty answers are unclear
 */
export function classifyConfirmation(text: string): ConfirmationAnswer {
  const normalized = text.toLowerCase().replace(/[^a-z'\s]/g, ' ').replace(/\s+/g, ' ').trim();
  const words = normalized.split(' ');

  const affirmative =
    words.some((word) => AFFIRMATIVE_WORDS.has(word)) ||
    AFFIRMATIVE_PHRASES.some((phrase) => normalized.includes(phrase));
  const negative = words.some((word) => NEGATIVE_WORDS.has(word));

  if (affirmative && !negative) return 'affirmative';
  if (negative && !affirmative) return 'negative';
  return 'unclear';
}

export interface FlowDependencies {
  extraction: ExtractionService;
  booking: BookingService;
  hours: BusinessHours;
  context: ExtractionContext;
}

async function handleAskName(
  session: ConversationSession,
  speech: string,
  deps: FlowDependencies
): Promise<StepOutcome> {
  const result = await deps.extraction.extractName(speech, deps.context);
  if (result.status === 'failed') {
    return {
      session: withRetry(session),
      prompt: prompts.retryName(),
      issue: { kind: 'extraction_failed', field: 'name', reason: result.reason },
    };
  }

  const next = transition({ ...session, fields: { ...session.fields, full_name: result.value } }, 'ask_mobile');
  return { session: next, prompt: prompts.askMobile(next), layer: result.layer };
}

async function handleAskMobile(
  session: ConversationSession,
  speech: string,
  deps: FlowDependencies
): Promise<StepOutcome> {
  const result = await deps.extraction.extractPhone(speech, deps.context);
  if (result.status === 'failed') {
    return {
      session: withRetry(session),
      prompt: prompts.retryMobile(),
      issue: { kind: 'extraction_failed', field: 'phone', reason: result.reason },
    };
  }

  const next = transition({ ...session, fields: { ...session.fields, phone: result.value } }, 'ask_time');
  return { session: next, prompt: prompts.askTime(), layer: result.layer };
}

async function handleAskTime(
  session: ConversationSession,
  speech: string,
  deps: FlowDependencies
): Promise<StepOutcome> {
  const { hours, context } = deps;
  const duration = session.fields.duration_minutes;

  let start: Date;
  let layer: string;

  // A new time wins; a plain "yes" accepts the opening offered last turn
  const result = await deps.extraction.extractTime(speech, context);
  if (result.status === 'success') {
    start = result.value;
    layer = result.layer;
  } else if (session.suggested_start_utc && classifyConfirmation(speech) === 'affirmative') {
    start = new Date(session.suggested_start_utc);
    layer = 'suggested_opening';
  } else {
    return {
      session: withRetry(session),
      prompt: result.reason === 'no_time_of_day' ? prompts.missingTimeOfDay() : prompts.retryTime(),
      issue: { kind: 'extraction_failed', field: 'time', reason: result.reason },
    };
  }

  const check = validateAppointmentTime(start, duration, hours, context.now);
  if (!check.ok) {
    const suggestion = check.reason === 'in_past' ? null : nextOpening(start, duration, hours);
    return {
      session: { ...withRetry(session), suggested_start_utc: suggestion?.toISOString() },
      prompt: check.reason === 'in_past' ? prompts.timeInPast() : prompts.outsideHours(suggestion, hours.timezone),
      layer,
      issue: { kind: 'validation_failed', field: 'time', reason: check.reason },
    };
  }

  const next = transition(
    {
      ...session,
      suggested_start_utc: undefined,
      fields: { ...session.fields, start_time_utc: start.toISOString() },
    },
    'confirm'
  );
  return { session: next, prompt: prompts.confirm(next, hours.timezone), layer };
}

async function handleConfirm(
  session: ConversationSession,
  speech: string,
  deps: FlowDependencies
): Promise<StepOutcome> {
  const answer = classifyConfirmation(speech);

  if (answer === 'negative') {
    const next = transition(
      { ...session, fields: { ...session.fields, start_time_utc: undefined } },
      'ask_time'
    );
    return { session: next, prompt: prompts.declined() };
  }

  if (answer === 'unclear') {
    return {
      session: withRetry(session),
      prompt: prompts.retryConfirm(),
      issue: { kind: 'extraction_failed', field: 'confirmation', reason: 'unclear_answer' },
    };
  }

  const outcome = await deps.booking.finalize(session);
  if (outcome.status === 'failed') {
    return {
      session: withRetry(session),
      prompt: prompts.bookingUnavailable(),
      issue: { kind: 'booking_failed', reason: outcome.reason },
    };
  }

  const next = transition({ ...session, appointment_id: outcome.appointment.id }, 'complete');
  return {
    session: next,
    prompt: prompts.booked(next, deps.hours.timezone),
    issue: outcome.created ? undefined : { kind: 'booking_conflict', appointmentId: outcome.appointment.id },
  };
}

/**
 * Run the handler owned by the session's current step
 */
export async function runStep(
  session: ConversationSession,
  speech: string,
  deps: FlowDependencies
): Promise<StepOutcome> {
  switch (session.current_step) {
    case 'ask_name':
      return handleAskName(session, speech, deps);
    case 'ask_mobile':
      return handleAskMobile(session, speech, deps);
    case 'ask_time':
      return handleAskTime(session, speech, deps);
    case 'confirm':
      return handleConfirm(session, speech, deps);
    case 'complete':
      return { session, prompt: prompts.alreadyComplete() };
  }
}

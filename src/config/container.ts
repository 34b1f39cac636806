/**
 * Default wiring of services from the environment
 */

import {
  config,
  businessDays,
  businessHoursStart,
  businessHoursEnd,
  businessHoursOverrides,
} from './env';
import logger from './logger';
import { MemorySessionStore } from '../stores/memory-session.store';
import { RedisSessionBackend, RedisSessionStore } from '../stores/redis-session.store';
import { buildBusinessHours, type BusinessHours } from '../utils/business-hours';
import { ExtractionService } from '../services/extraction/extraction.service';
import {
  DisabledCompletionClient,
  OpenAiCompletionClient,
  RetryingCompletionClient,
} from '../services/llm.service';
import { CompromiseRecognizer } from '../services/ner.service';
import { BookingService } from '../services/booking.service';
import { DisabledCalendarSyncClient, HttpCalendarSyncClient } from '../services/calendar-sync.service';
import { SupabaseUserRepository } from '../repositories/user.repository';
import { SupabaseAppointmentRepository } from '../repositories/appointment.repository';
import { ConversationService } from '../services/conversation.service';
import type { LlmCompletionClient } from '../types/extraction.types';
import type { SessionStore } from '../types/session.types';

export interface Container {
  conversation: ConversationService;
}

export function businessHoursFromConfig(): BusinessHours {
  return buildBusinessHours({
    timezone: config.BUSINESS_TIMEZONE,
    days: businessDays,
    open: businessHoursStart,
    close: businessHoursEnd,
    overrides: businessHoursOverrides,
    slotMinutes: config.BUSINESS_SLOT_MINUTES,
    lookaheadDays: config.BUSINESS_LOOKAHEAD_DAYS,
  });
}

function createSessionStore(): SessionStore {
  const defaults = {
    ttlSeconds: config.SESSION_TTL_SECONDS,
    durationMinutes: config.APPOINTMENT_DURATION_MINUTES,
  };
  const memory = new MemorySessionStore(defaults);

  if (!config.REDIS_ENABLED) {
    logger.warn('Redis disabled, sessions are kept in process only');
    return memory;
  }
  return new RedisSessionStore(new RedisSessionBackend(), memory, defaults);
}

function createLlmClient(): LlmCompletionClient {
  if (!config.LLM_ENABLED || !config.OPENAI_API_KEY) {
    return new DisabledCompletionClient();
  }
  return new RetryingCompletionClient(
    new OpenAiCompletionClient({
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_MODEL,
      baseURL: config.OPENAI_BASE_URL,
      timeoutMs: config.LLM_TIMEOUT_MS,
    })
  );
}

export function createContainer(): Container {
  const llm = createLlmClient();

  const extraction = new ExtractionService({
    region: config.DEFAULT_PHONE_REGION,
    timezone: config.BUSINESS_TIMEZONE,
    ner: new CompromiseRecognizer(),
    nerTimeoutMs: config.NER_TIMEOUT_MS,
    llm,
    llmTimeoutMs: config.LLM_TIMEOUT_MS,
  });

  const calendar = config.CALENDAR_SYNC_URL
    ? new HttpCalendarSyncClient({ baseUrl: config.CALENDAR_SYNC_URL, token: config.CALENDAR_SYNC_TOKEN })
    : new DisabledCalendarSyncClient();

  const booking = new BookingService(
    new SupabaseUserRepository(),
    new SupabaseAppointmentRepository(),
    calendar
  );

  const conversation = new ConversationService({
    store: createSessionStore(),
    extraction,
    booking,
    hours: businessHoursFromConfig(),
    turnBudgetMs: config.TURN_BUDGET_MS,
  });

  return { conversation };
}

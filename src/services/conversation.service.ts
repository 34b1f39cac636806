/**
 * Conversation service - handles one webhook turn end to end
 * load session -> run the current step -> save atomically -> reply
 */

import { createChildLogger, logPerformance } from '../config/logger';
import { SessionConflictError } from '../utils/errors';
import { isAnonymousCaller, maskPhoneNumber } from '../utils/phone.utils';
import { promptForStep, prompts } from './conversation.prompts';
import { runStep } from './conversation.flow';
import type { BookingService } from './booking.service';
import type { ExtractionService } from './extraction/extraction.service';
import type { BusinessHours } from '../utils/business-hours';
import type { Clock, ConversationSession, SessionStore } from '../types/session.types';
import type { TurnInput, TurnReply } from '../types/conversation.types';

export interface ConversationDependencies {
  store: SessionStore;
  extraction: ExtractionService;
  booking: BookingService;
  hours: BusinessHours;
  turnBudgetMs: number;
  clock?: Clock;
}

export class ConversationService {
  private log = createChildLogger({ service: 'conversation' });
  private readonly clock: Clock;

  constructor(private readonly deps: ConversationDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Process one caller utterance
   * @throws {SessionCorruptedError} If the stored session cannot be decoded
   * @throws {InvalidTransitionError} If the step handlers request an illegal move
   */
  async handleTurn(input: TurnInput): Promise<TurnReply> {
    const startedAt = Date.now();
    const now = this.clock();
    const { store, hours } = this.deps;

    const loaded = await store.get(input.callId);

    if (loaded.current_step === 'complete') {
      this.log.info({ callId: input.callId }, 'Turn received after booking completed');
      return { next_prompt: prompts.alreadyComplete(), terminal: true };
    }

    const session: ConversationSession =
      loaded.caller_number || isAnonymousCaller(input.callerNumber)
        ? loaded
        : { ...loaded, caller_number: input.callerNumber };

    const outcome = await runStep(session, input.speechText, {
      extraction: this.deps.extraction,
      booking: this.deps.booking,
      hours,
      context: { now, deadline: startedAt + this.deps.turnBudgetMs },
    });

    let saved: ConversationSession;
    try {
      saved = await store.save(outcome.session);
    } catch (error) {
      if (!(error instanceof SessionConflictError)) {
        throw error;
      }
      // Another turn for this call won; answer from its state
      const latest = await store.get(input.callId);
      this.log.warn(
        { callId: input.callId, step: latest.current_step },
        'Concurrent turn detected, replying from latest session'
      );
      return {
        next_prompt: promptForStep(latest, hours.timezone),
        terminal: latest.current_step === 'complete',
      };
    }

    const duration = Date.now() - startedAt;
    this.log.info(
      {
        callId: input.callId,
        caller: maskPhoneNumber(session.caller_number),
        fromStep: loaded.current_step,
        toStep: saved.current_step,
        layer: outcome.layer,
        issue: outcome.issue,
        retries: saved.retry_counts[saved.current_step] ?? 0,
        version: saved.version,
      },
      'Turn handled'
    );
    logPerformance('conversation_turn', duration, { callId: input.callId });

    return { next_prompt: outcome.prompt, terminal: saved.current_step === 'complete' };
  }

  /**
   * Current session for a call (operator inspection)
   */
  getSession(callId: string): Promise<ConversationSession> {
    return this.deps.store.get(callId);
  }

  /**
   * Explicit, audited reset back to ask_name
   */
  async resetSession(callId: string, reason: string, requestedBy: string): Promise<ConversationSession> {
    this.log.warn({ event: 'session_reset_requested', callId, reason, requestedBy }, 'Session reset requested');
    return this.deps.store.reset(callId, reason);
  }
}

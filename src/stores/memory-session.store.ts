/**
 * In-process session store
 * Used on its own when Redis is disabled, and as the fallback and mirror of the Redis store
 */

import { createChildLogger } from '../config/logger';
import { SessionConflictError } from '../utils/errors';
import { createInitialSession } from './session-record';
import type {
  Clock,
  ConversationSession,
  SessionDefaults,
  SessionStore,
} from '../types/session.types';

const SWEEP_THRESHOLD = 1000;

interface StoredSession {
  session: ConversationSession;
  expiresAt: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private log = createChildLogger({ store: 'memory-session' });

  constructor(
    private readonly defaults: SessionDefaults,
    private readonly clock: Clock = () => new Date()
  ) {}

  async get(callId: string): Promise<ConversationSession> {
    return this.peek(callId) ?? createInitialSession(callId, this.defaults, this.clock());
  }

  async save(session: ConversationSession): Promise<ConversationSession> {
    const stored = this.peek(session.call_id);

    if (stored && stored.version > session.version) {
      throw new SessionConflictError(session.call_id, session.version);
    }

    const next: ConversationSession = {
      ...session,
      version: session.version + 1,
      updated_at: this.clock().toISOString(),
    };
    this.remember(next);
    return next;
  }

  async reset(callId: string, reason: string): Promise<ConversationSession> {
    const current = await this.get(callId);
    const fresh = createInitialSession(callId, this.defaults, this.clock());

    this.log.warn(
      { event: 'session_reset', callId, fromStep: current.current_step, reason },
      'Session reset'
    );

    return this.save({ ...fresh, version: current.version });
  }

  /**
   * Stored, unexpired session or null
   */
  peek(callId: string): ConversationSession | null {
    const entry = this.sessions.get(callId);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= this.clock().getTime()) {
      this.sessions.delete(callId);
      return null;
    }

    return entry.session;
  }

  /**
   * Store a revision as-is, without the version check
   */
  remember(session: ConversationSession): void {
    if (this.sessions.size >= SWEEP_THRESHOLD) {
      this.sweepExpired();
    }
    this.sessions.set(session.call_id, {
      session,
      expiresAt: this.clock().getTime() + session.ttl_seconds * 1000,
    });
  }

  sweepExpired(): number {
    const now = this.clock().getTime();
    let removed = 0;
    for (const [callId, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(callId);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Redis-backed session store with in-process fallback
 * A Redis failure is logged as store_degraded and the turn continues on the
 * in-process store; it never reads as "no session"
 */

import { getRedisClient } from '../config/redis';
import { createChildLogger } from '../config/logger';
import { SessionConflictError, SessionCorruptedError } from '../utils/errors';
import { MemorySessionStore } from './memory-session.store';
import { createInitialSession, parseSessionRecord, sessionKey } from './session-record';
import type {
  Clock,
  ConversationSession,
  SessionDefaults,
  SessionStore,
} from '../types/session.types';

/**
 * Raw key/value operations the store needs from its backend
 */
export interface SessionBackend {
  read(key: string): Promise<string | null>;

  /**
   * Write `value` with a TTL unless the stored record carries a version newer than `expectedVersion`
   * @returns false when the write was refused
   */
  compareAndSet(key: string, expectedVersion: number, value: string, ttlSeconds: number): Promise<boolean>;

  /**
   * Unconditional write, used only to overwrite a record that cannot be decoded
   */
  write(key: string, value: string, ttlSeconds: number): Promise<void>;
}

// Refuses the write when the stored record is newer than the revision the caller read
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current then
  local ok, decoded = pcall(cjson.decode, current)
  if ok and type(decoded) == 'table' and tonumber(decoded['version']) ~= nil
    and tonumber(decoded['version']) > tonumber(ARGV[1]) then
    return 0
  end
end
redis.call('SET', KEYS[1], ARGV[2], 'EX', tonumber(ARGV[3]))
return 1
`;

export class RedisSessionBackend implements SessionBackend {
  async read(key: string): Promise<string | null> {
    const client = await getRedisClient();
    return client.get(key);
  }

  async compareAndSet(
    key: string,
    expectedVersion: number,
    value: string,
    ttlSeconds: number
  ): Promise<boolean> {
    const client = await getRedisClient();
    const reply = await client.eval(COMPARE_AND_SET_SCRIPT, {
      keys: [key],
      arguments: [String(expectedVersion), value, String(ttlSeconds)],
    });
    return reply === 1;
  }

  async write(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = await getRedisClient();
    await client.set(key, value, { EX: ttlSeconds });
  }
}

export class RedisSessionStore implements SessionStore {
  private log = createChildLogger({ store: 'redis-session' });

  constructor(
    private readonly backend: SessionBackend,
    private readonly fallback: MemorySessionStore,
    private readonly defaults: SessionDefaults,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Load a session
   * A newer in-process mirror wins over the Redis copy, which covers writes
   * made while Redis was unreachable
   * @throws {SessionCorruptedError} If the stored record cannot be decoded
   */
  async get(callId: string): Promise<ConversationSession> {
    let raw: string | null;
    try {
      raw = await this.backend.read(sessionKey(callId));
    } catch (error) {
      this.degraded('get', callId, error);
      return this.fallback.get(callId);
    }

    const mirrored = this.fallback.peek(callId);

    if (raw === null) {
      return mirrored ?? createInitialSession(callId, this.defaults, this.clock());
    }

    const session = parseSessionRecord(callId, raw);
    if (mirrored && mirrored.version > session.version) {
      return mirrored;
    }

    this.fallback.remember(session);
    return session;
  }

  async save(session: ConversationSession): Promise<ConversationSession> {
    const next: ConversationSession = {
      ...session,
      version: session.version + 1,
      updated_at: this.clock().toISOString(),
    };

    let written: boolean;
    try {
      written = await this.backend.compareAndSet(
        sessionKey(session.call_id),
        session.version,
        JSON.stringify(next),
        next.ttl_seconds
      );
    } catch (error) {
      this.degraded('save', session.call_id, error);
      return this.fallback.save(session);
    }

    if (!written) {
      this.log.warn(
        { callId: session.call_id, expectedVersion: session.version },
        'Refused stale session write'
      );
      throw new SessionConflictError(session.call_id, session.version);
    }

    this.fallback.remember(next);
    return next;
  }

  /**
   * Reset a call to ask_name. Also the recovery path for a corrupted record.
   */
  async reset(callId: string, reason: string): Promise<ConversationSession> {
    const fresh = createInitialSession(callId, this.defaults, this.clock());

    let current: ConversationSession;
    try {
      current = await this.get(callId);
    } catch (error) {
      if (!(error instanceof SessionCorruptedError)) {
        throw error;
      }
      this.log.warn({ event: 'session_reset', callId, reason, corrupted: true }, 'Overwriting corrupted session');
      const next: ConversationSession = { ...fresh, version: 1 };
      await this.backend.write(sessionKey(callId), JSON.stringify(next), next.ttl_seconds);
      this.fallback.remember(next);
      return next;
    }

    this.log.warn(
      { event: 'session_reset', callId, fromStep: current.current_step, reason },
      'Session reset'
    );

    return this.save({ ...fresh, version: current.version });
  }

  private degraded(operation: 'get' | 'save', callId: string, error: unknown): void {
    this.log.warn(
      { event: 'store_degraded', operation, callId, err: error },
      'Session backend unavailable, using in-process store'
    );
  }
}

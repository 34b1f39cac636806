import { MemorySessionStore } from '../../src/stores/memory-session.store';
import { SessionConflictError } from '../../src/utils/errors';
import { NOW, SESSION_DEFAULTS } from '../fakes/fixtures';

describe('MemorySessionStore', () => {
  let now: Date;
  let store: MemorySessionStore;

  beforeEach(() => {
    now = NOW;
    store = new MemorySessionStore(SESSION_DEFAULTS, () => now);
  });

  test('a fresh call starts at ask_name', async () => {
    const session = await store.get('call-1');

    expect(session).toEqual({
      call_id: 'call-1',
      current_step: 'ask_name',
      fields: { duration_minutes: 30 },
      retry_counts: {},
      created_at: '2026-10-19T18:00:00.000Z',
      updated_at: '2026-10-19T18:00:00.000Z',
      ttl_seconds: 900,
      version: 0,
    });
    expect(store.size).toBe(0);
  });

  test('save then get returns the same step and fields', async () => {
    const session = await store.get('call-1');
    const saved = await store.save({
      ...session,
      current_step: 'ask_mobile',
      fields: { ...session.fields, full_name: 'Johnny Walker' },
    });

    expect(saved.version).toBe(1);
    const loaded = await store.get('call-1');
    expect(loaded.current_step).toBe('ask_mobile');
    expect(loaded.fields).toEqual({ duration_minutes: 30, full_name: 'Johnny Walker' });
  });

  test('a stale save is refused and leaves the stored state alone', async () => {
    const first = await store.get('call-1');
    await store.save({ ...first, current_step: 'ask_mobile' });
    const second = await store.get('call-1');
    await store.save({ ...second, current_step: 'ask_time', fields: { ...second.fields, phone: '+18153288957' } });

    await expect(store.save({ ...first, current_step: 'ask_name' })).rejects.toBeInstanceOf(SessionConflictError);
    expect((await store.get('call-1')).current_step).toBe('ask_time');
  });

  test('sessions expire after their TTL', async () => {
    const session = await store.get('call-1');
    await store.save({ ...session, current_step: 'ask_mobile' });

    now = new Date(NOW.getTime() + 901_000);
    const expired = await store.get('call-1');

    expect(expired.current_step).toBe('ask_name');
    expect(expired.version).toBe(0);
    expect(store.size).toBe(0);
  });

  test('reset goes back to ask_name with a newer version', async () => {
    const session = await store.get('call-1');
    await store.save({ ...session, current_step: 'confirm' });

    const reset = await store.reset('call-1', 'caller asked to start over');

    expect(reset.current_step).toBe('ask_name');
    expect(reset.fields).toEqual({ duration_minutes: 30 });
    expect(reset.version).toBe(2);
  });

  test('sweepExpired drops only expired entries', async () => {
    await store.save(await store.get('call-1'));
    now = new Date(NOW.getTime() + 600_000);
    await store.save(await store.get('call-2'));

    now = new Date(NOW.getTime() + 901_000);
    expect(store.sweepExpired()).toBe(1);
    expect(store.peek('call-1')).toBeNull();
    expect(store.peek('call-2')?.call_id).toBe('call-2');
  });
});

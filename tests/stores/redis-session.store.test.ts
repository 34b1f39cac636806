import { MemorySessionStore } from '../../src/stores/memory-session.store';
import { RedisSessionStore } from '../../src/stores/redis-session.store';
import { sessionKey } from '../../src/stores/session-record';
import { SessionConflictError, SessionCorruptedError } from '../../src/utils/errors';
import { FakeSessionBackend } from '../fakes/session-backend.fake';
import { NOW, SESSION_DEFAULTS } from '../fakes/fixtures';

describe('RedisSessionStore', () => {
  let backend: FakeSessionBackend;
  let store: RedisSessionStore;

  beforeEach(() => {
    backend = new FakeSessionBackend();
    const clock = () => NOW;
    store = new RedisSessionStore(backend, new MemorySessionStore(SESSION_DEFAULTS, clock), SESSION_DEFAULTS, clock);
  });

  test('persists sessions under the call key', async () => {
    const session = await store.get('call-1');
    await store.save({ ...session, current_step: 'ask_mobile', fields: { ...session.fields, full_name: 'Johnny Walker' } });

    const raw = backend.data.get('call_session:call-1');
    expect(raw).toBeDefined();
    expect(JSON.parse(raw ?? '{}')).toMatchObject({
      call_id: 'call-1',
      current_step: 'ask_mobile',
      fields: { full_name: 'Johnny Walker', duration_minutes: 30 },
      version: 1,
    });
    expect((await store.get('call-1')).current_step).toBe('ask_mobile');
  });

  test('rejects a stale write', async () => {
    const first = await store.get('call-1');
    await store.save({ ...first, current_step: 'ask_mobile' });

    await expect(store.save({ ...first, current_step: 'ask_name' })).rejects.toBeInstanceOf(SessionConflictError);
    expect((await store.get('call-1')).current_step).toBe('ask_mobile');
  });

  test('keeps working on the in-process store while Redis is down', async () => {
    const session = await store.get('call-1');
    await store.save({ ...session, current_step: 'ask_mobile' });

    backend.down = true;
    const during = await store.get('call-1');
    expect(during.current_step).toBe('ask_mobile');
    await store.save({ ...during, current_step: 'ask_time' });

    backend.down = false;
    const after = await store.get('call-1');
    expect(after.current_step).toBe('ask_time');
    expect(after.version).toBe(2);

    // The first write after recovery brings Redis up to date
    await store.save({ ...after, current_step: 'confirm' });
    expect(JSON.parse(backend.data.get(sessionKey('call-1')) ?? '{}')).toMatchObject({
      current_step: 'confirm',
      version: 3,
    });
  });

  test('an outage on a brand-new call still starts at ask_name', async () => {
    backend.down = true;
    const session = await store.get('call-2');
    expect(session.current_step).toBe('ask_name');
    await expect(store.save(session)).resolves.toMatchObject({ version: 1 });
  });

  test('corrupted records are reported, never treated as missing', async () => {
    backend.data.set(sessionKey('call-3'), '{not json');
    await expect(store.get('call-3')).rejects.toBeInstanceOf(SessionCorruptedError);

    backend.data.set(sessionKey('call-3'), JSON.stringify({ call_id: 'call-3', current_step: 'dancing' }));
    await expect(store.get('call-3')).rejects.toBeInstanceOf(SessionCorruptedError);
  });

  test('a record stored under the wrong call id is corrupted', async () => {
    const other = await store.get('call-4');
    backend.data.set(sessionKey('call-5'), JSON.stringify({ ...other, version: 1 }));

    await expect(store.get('call-5')).rejects.toBeInstanceOf(SessionCorruptedError);
  });

  test('reset overwrites a corrupted record', async () => {
    backend.data.set(sessionKey('call-3'), '{not json');

    const reset = await store.reset('call-3', 'record could not be read');

    expect(reset.current_step).toBe('ask_name');
    expect(reset.version).toBe(1);
    await expect(store.get('call-3')).resolves.toMatchObject({ current_step: 'ask_name', version: 1 });
  });
});

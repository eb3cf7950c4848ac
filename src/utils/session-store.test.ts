import { SessionStore } from './session-store';

describe('SessionStore', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('keeps state and merges data per user', () => {
    const store = new SessionStore<'ip' | 'port'>();
    store.start(1, 'ip');
    store.advance(1, 'port', { ip: '203.0.113.10' });

    expect(store.get(1)).toMatchObject({ state: 'port', data: { ip: '203.0.113.10' } });
    expect(store.get(2)).toBeNull();
    expect(store.advance(2, 'port')).toBeNull();
  });

  test('forgets sessions after the ttl', () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1000);
    const store = new SessionStore<'ip'>(500);
    store.start(1, 'ip');

    now.mockReturnValue(1400);
    expect(store.get(1)).not.toBeNull();

    now.mockReturnValue(2000);
    expect(store.get(1)).toBeNull();
  });

  test('clears a session', () => {
    const store = new SessionStore<'ip'>();
    store.start(1, 'ip');

    expect(store.clear(1)).toBe(true);
    expect(store.get(1)).toBeNull();
  });
});

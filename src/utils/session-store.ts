/**
 * Состояние многошаговых диалогов, по одному на пользователя.
 * Хранится в памяти процесса и теряется при перезапуске.
 */
export interface DialogSession<S extends string> {
  state: S;
  data: Record<string, string>;
  updatedAt: number;
}

export class SessionStore<S extends string> {
  private sessions = new Map<number, DialogSession<S>>();

  constructor(private ttlMs = 15 * 60 * 1000) {}

  get(userId: number): DialogSession<S> | null {
    const session = this.sessions.get(userId);
    if (!session) return null;
    if (Date.now() - session.updatedAt > this.ttlMs) {
      this.sessions.delete(userId);
      return null;
    }
    return session;
  }

  start(userId: number, state: S): DialogSession<S> {
    const session: DialogSession<S> = { state, data: {}, updatedAt: Date.now() };
    this.sessions.set(userId, session);
    return session;
  }

  advance(userId: number, state: S, data: Record<string, string> = {}): DialogSession<S> | null {
    const session = this.get(userId);
    if (!session) return null;
    session.state = state;
    session.data = { ...session.data, ...data };
    session.updatedAt = Date.now();
    return session;
  }

  clear(userId: number): boolean {
    return this.sessions.delete(userId);
  }
}

import type { Session } from '../types.js';

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  createSession(clientName: string, sessionId: string, nextRequestId: number, now: number): Session {
    return { sessionId, clientName, connectedAt: now, lastActivityAt: now, nextRequestId };
  }

  /** Last write wins for a client name. Returns the entry it replaced, if any. */
  put(session: Session): Session | undefined {
    const prev = this.sessions.get(session.clientName);
    this.sessions.set(session.clientName, session);
    return prev;
  }

  /** Removes the entry only while it is still `session`. */
  removeIfCurrent(session: Session): boolean {
    if (this.sessions.get(session.clientName) !== session) return false;
    return this.sessions.delete(session.clientName);
  }

  remove(clientName: string): Session | undefined {
    const s = this.sessions.get(clientName);
    this.sessions.delete(clientName);
    return s;
  }

  get(clientName: string): Session | undefined { return this.sessions.get(clientName); }
  list(): Session[] { return [...this.sessions.values()]; }
  size(): number { return this.sessions.size; }
}

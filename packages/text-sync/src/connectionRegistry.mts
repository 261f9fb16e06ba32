import { randomUUID } from "node:crypto";

/**
 * Outbound half of one client connection. The registry never owns the
 * underlying socket; it only pushes payloads into it and closes it when
 * the session is dropped.
 */
export interface SessionChannel {
  /** Resolves once the payload has been handed to the transport. */
  send(payload: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface Session {
  readonly id: string;
  userId: string | null;
  readonly channel: SessionChannel;
}

export class ConnectionRegistry {
  private readonly sessions = new Map<string, Session>();

  get size(): number {
    return this.sessions.size;
  }

  register(channel: SessionChannel, userId: string | null = null): Session {
    const session: Session = {
      id: randomUUID(),
      userId,
      channel
    };
    this.sessions.set(session.id, session);
    return session;
  }

  unregister(id: string): boolean {
    return this.sessions.delete(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  setUserId(id: string, userId: string | null): void {
    const session = this.sessions.get(id);
    if (session) session.userId = userId;
  }

  /**
   * Visits the sessions registered when the call starts. Sessions added
   * while it runs are not visited; sessions removed while it runs are
   * skipped when their turn comes.
   */
  forEach(fn: (session: Session) => void): void {
    for (const session of Array.from(this.sessions.values())) {
      if (this.sessions.get(session.id) !== session) continue;
      fn(session);
    }
  }
}

import type { Session } from "@shared/conversation";

export interface SessionStoreOptions {
  ttlMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

/**
 * In-memory conversation sessions keyed by user id, one per user.
 * A session idle for longer than the TTL is gone: reads evict it lazily
 * and the sweep timer clears the ones nobody reads again.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();
  private sweepTimer?: NodeJS.Timeout;
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get(userId: string): Session | undefined {
    const session = this.sessions.get(userId);
    if (!session) return undefined;

    if (this.isExpired(session)) {
      this.sessions.delete(userId);
      console.log(`[Sessions] Session for ${userId} expired`);
      return undefined;
    }
    return session;
  }

  // Stamps lastActivityAt
  save(session: Session): Session {
    const saved: Session = { ...session, lastActivityAt: this.now() };
    this.sessions.set(session.userId, saved);
    return saved;
  }

  // Returns whether a live session was discarded
  delete(userId: string): boolean {
    const live = this.get(userId) !== undefined;
    this.sessions.delete(userId);
    return live;
  }

  sweep(): number {
    let evicted = 0;
    this.sessions.forEach((session, userId) => {
      if (this.isExpired(session)) {
        this.sessions.delete(userId);
        evicted++;
      }
    });

    if (evicted > 0) {
      console.log(`[Sessions] Swept ${evicted} expired sessions`);
    }
    return evicted;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: Session): boolean {
    return this.now() - session.lastActivityAt > this.options.ttlMs;
  }
}

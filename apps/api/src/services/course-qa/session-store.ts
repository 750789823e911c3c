import { randomUUID } from 'crypto';
import { createLogger } from '../logger';
import { ConversationContext } from './conversation';
import type { RetrievalDeps } from './router';

const log = createLogger('session-store');

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

export type ConversationSession = {
  id: string;
  createdAt: Date;
  lastActiveAt: Date;
  context: ConversationContext;
};

export type SessionStoreOptions = {
  idleTimeoutMs?: number;
  maxSessions?: number;
  now?: () => Date;
};

/**
 * In-memory registry of live conversations.
 * A session lives until `delete`, until it sits idle past the timeout, or
 * until it is the least recently used one when the cap is reached.
 * Nothing survives a restart.
 */
export class SessionStore {
  private sessions = new Map<string, ConversationSession>();
  private idleTimeoutMs: number;
  private maxSessions: number;
  private now: () => Date;

  constructor(private deps: RetrievalDeps, options: SessionStoreOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.now = options.now ?? (() => new Date());
  }

  create(): ConversationSession {
    this.evictIdle();
    // Map iteration order is insertion order and `get` re-inserts, so the first key is least recently used
    for (const id of this.sessions.keys()) {
      if (this.sessions.size < this.maxSessions) break;
      this.sessions.delete(id);
      log.info({ sessionId: id }, 'session evicted at capacity');
    }

    const now = this.now();
    const session: ConversationSession = {
      id: randomUUID(),
      createdAt: now,
      lastActiveAt: now,
      context: new ConversationContext(this.deps),
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /** Look up a session and mark it active. Expired sessions are dropped. */
  get(id: string): ConversationSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;

    const now = this.now();
    if (this.isExpired(session, now)) {
      this.sessions.delete(id);
      return undefined;
    }
    session.lastActiveAt = now;
    this.sessions.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: ConversationSession, now: Date): boolean {
    return now.getTime() - session.lastActiveAt.getTime() > this.idleTimeoutMs;
  }

  private evictIdle(): void {
    const now = this.now();
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        log.info({ sessionId: id }, 'idle session expired');
      }
    }
  }
}

/**
 * SessionStore
 * In-memory dialogue sessions keyed by user id.
 *
 * withSession() checks a session out under a per-user mutex, so two turns for
 * the same user never interleave while different users run concurrently.
 * Idle sessions are evicted after the TTL by an explicit cleanup timer.
 */

import { KeyedMutex } from '../../lib/concurrency/keyed-mutex.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { createSession, type DialogueSession } from './dialogue.types.js';

export interface SessionSnapshot {
  userId: string;
  context: DialogueSession['context'];
  entities: DialogueSession['entities'];
  pendingClarification: DialogueSession['pendingClarification'];
  hunt: DialogueSession['hunt'];
  pairing: DialogueSession['pairing'];
  turnCount: number;
  lastMode: DialogueSession['lastMode'];
  updatedAt: string;
}

export interface SessionStoreOptions {
  ttlMs?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

export class SessionStore {
  private sessions = new Map<string, DialogueSession>();
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;
  private cleanupInterval: NodeJS.Timeout | undefined;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 30 * 60 * 1000;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run fn with exclusive access to the user's session (created on first contact).
   * The session is stamped as used when fn settles, success or not.
   */
  async withSession<T>(userId: string, fn: (session: DialogueSession) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(userId, async () => {
      const session = this.getOrCreate(userId);
      try {
        return await fn(session);
      } finally {
        session.updatedAt = this.now();
      }
    });
  }

  /** Current session, or null when unknown or expired */
  get(userId: string): DialogueSession | null {
    const session = this.sessions.get(userId);
    if (!session) return null;

    if (this.isExpired(session)) {
      this.sessions.delete(userId);
      logger.debug({ event: 'session_expired', userId }, '[SessionStore] Expired session');
      return null;
    }
    return session;
  }

  snapshot(userId: string): SessionSnapshot | null {
    const session = this.get(userId);
    if (!session) return null;
    return {
      userId: session.userId,
      context: structuredClone(session.context),
      entities: structuredClone(session.entities),
      pendingClarification: session.pendingClarification ? { ...session.pendingClarification } : null,
      hunt: structuredClone(session.hunt),
      pairing: structuredClone(session.pairing),
      turnCount: session.turnCount,
      lastMode: session.lastMode,
      updatedAt: new Date(session.updatedAt).toISOString()
    };
  }

  clear(userId: string): boolean {
    const existed = this.sessions.delete(userId);
    if (existed) {
      logger.info({ event: 'session_cleared', userId }, '[SessionStore] Cleared session');
    }
    return existed;
  }

  size(): number {
    return this.sessions.size;
  }

  /** Remove expired sessions that are not in the middle of a turn */
  cleanup(): number {
    let cleaned = 0;
    for (const [userId, session] of this.sessions.entries()) {
      if (this.isExpired(session) && !this.mutex.isLocked(userId)) {
        this.sessions.delete(userId);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      logger.info({ event: 'session_cleanup', cleaned, remaining: this.sessions.size }, '[SessionStore] Cleaned up expired sessions');
    }
    return cleaned;
  }

  startCleanup(): void {
    if (this.cleanupInterval) return;
    this.cleanupInterval = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  /** Stop the cleanup timer and drop all sessions (graceful shutdown) */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.sessions.clear();
    logger.info('[SessionStore] Destroyed');
  }

  private getOrCreate(userId: string): DialogueSession {
    const existing = this.get(userId);
    if (existing) return existing;
    const session = createSession(userId, this.now());
    this.sessions.set(userId, session);
    logger.debug({ event: 'session_created', userId }, '[SessionStore] Created session');
    return session;
  }

  private isExpired(session: DialogueSession): boolean {
    return this.now() - session.updatedAt > this.ttlMs;
  }
}

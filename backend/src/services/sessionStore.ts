import { v4 as uuidv4 } from 'uuid';

/**
 * Session Store
 * Opaque admin session tokens held in memory. Lost on restart.
 */

export interface SessionStoreOptions {
  ttlMs: number;
  maxSessions: number;
  now?: () => number;
}

export class SessionStore {
  // Map keeps insertion order, so the first entry is always the oldest session
  private readonly sessions = new Map<string, number>();
  readonly ttlMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSessions = options.maxSessions;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.prune();
    return this.sessions.size;
  }

  /**
   * Mint a new session token
   */
  create(): string {
    this.prune();

    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }

    const token = uuidv4();
    this.sessions.set(token, this.now() + this.ttlMs);
    return token;
  }

  has(token: string | undefined): boolean {
    if (!token) {
      return false;
    }
    const expiresAt = this.sessions.get(token);
    if (expiresAt === undefined) {
      return false;
    }
    if (expiresAt <= this.now()) {
      this.sessions.delete(token);
      return false;
    }
    return true;
  }

  revoke(token: string | undefined): void {
    if (token) {
      this.sessions.delete(token);
    }
  }

  private prune(): void {
    const now = this.now();
    for (const [token, expiresAt] of this.sessions) {
      if (expiresAt <= now) {
        this.sessions.delete(token);
      }
    }
  }
}

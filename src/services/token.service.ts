import { randomBytes } from 'crypto';
import type { SessionUser } from '../types/index.js';

interface SessionData {
  user: SessionUser;
  createdAt: number;
}

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

// Operator sessions, kept in memory; a restart logs everyone out
export class SessionStore {
  private readonly sessions = new Map<string, SessionData>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  issue(user: SessionUser): string {
    const token = randomBytes(24).toString('hex');
    this.sessions.set(token, { user, createdAt: this.clock() });
    return token;
  }

  verify(token: string | undefined | null): SessionUser | null {
    if (!token) return null;
    const data = this.sessions.get(token);
    if (!data) return null;
    if (this.clock() - data.createdAt > this.ttlMs) {
      this.sessions.delete(token);
      return null;
    }
    return data.user;
  }

  revoke(token: string | undefined | null): boolean {
    return token ? this.sessions.delete(token) : false;
  }

  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [token, data] of this.sessions) {
      if (now - data.createdAt > this.ttlMs) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
    this.sessions.clear();
  }
}

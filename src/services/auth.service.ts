import bcrypt from 'bcryptjs';
import { addMinutes } from 'date-fns';
import { eq } from 'drizzle-orm';
import type { ComplaintDb } from '../db/index.js';
import type { ConnectionPool } from '../db/pool.js';
import { loginAudit, users } from '../db/schema.js';
import { AuthError, ForbiddenError, ValidationError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { SessionUser } from '../types/index.js';
import type { SessionStore } from './token.service.js';

const log = logger.child('[auth]');

export const BCRYPT_ROUNDS = 10;

export type AuditAction = 'LOGIN_SUCCESS' | 'LOGIN_FAILED' | 'LOGIN_ATTEMPT_LOCKED' | 'LOGOUT';

export interface AuthConfig {
  maxLoginAttempts: number;
  lockoutMinutes: number;
}

export interface LoginResult {
  token: string;
  user: SessionUser;
}

export type AuthService = ReturnType<typeof createAuthService>;

export function createAuthService(
  pool: ConnectionPool<ComplaintDb>,
  sessions: SessionStore,
  config: AuthConfig,
  now: () => Date = () => new Date(),
) {
  async function audit(action: AuditAction, username: string, userId: number | null, detail: string | null, ip?: string): Promise<void> {
    try {
      await pool.withConnection((db) => db.insert(loginAudit).values({ userId, username, action, detail, ip: ip ?? null }));
    } catch (err) {
      log.warn('Login audit write failed', { username, action, error: errorMessage(err) });
    }
  }

  return {
    async login(rawUsername: unknown, rawPassword: unknown, ip?: string): Promise<LoginResult> {
      const username = typeof rawUsername === 'string' ? rawUsername.trim() : '';
      const password = typeof rawPassword === 'string' ? rawPassword : '';
      if (!username || !password) throw new ValidationError('Username and password are required');

      const [user] = await pool.withConnection((db) => db.select().from(users).where(eq(users.username, username)));
      if (!user) {
        await audit('LOGIN_FAILED', username, null, 'unknown user', ip);
        throw new AuthError('Invalid username or password');
      }

      const current = now();
      const lockedUntil = user.lockedUntil ? new Date(user.lockedUntil) : null;
      if (lockedUntil && lockedUntil > current) {
        const minutes = Math.ceil((lockedUntil.getTime() - current.getTime()) / 60_000);
        await audit('LOGIN_ATTEMPT_LOCKED', username, user.id, null, ip);
        throw new ForbiddenError(`Account locked. Try again in ${minutes} minute(s).`);
      }
      if (!user.isActive) {
        await audit('LOGIN_FAILED', username, user.id, 'account disabled', ip);
        throw new ForbiddenError('Account is disabled');
      }

      if (!(await bcrypt.compare(password, user.passwordHash))) {
        // an expired lock starts a fresh count
        const failures = (lockedUntil ? 0 : user.failedAttempts) + 1;
        const lock = failures >= config.maxLoginAttempts ? addMinutes(current, config.lockoutMinutes).toISOString() : null;
        await pool.withConnection((db) =>
          db.update(users).set({ failedAttempts: failures, lockedUntil: lock }).where(eq(users.id, user.id)),
        );
        await audit('LOGIN_FAILED', username, user.id, lock ? `locked until ${lock}` : `attempt ${failures}`, ip);
        if (lock) log.warn('Account locked', { username, failures });
        throw new AuthError('Invalid username or password');
      }

      await pool.withConnection((db) =>
        db.update(users)
          .set({ failedAttempts: 0, lockedUntil: null, lastLoginAt: current.toISOString() })
          .where(eq(users.id, user.id)),
      );
      await audit('LOGIN_SUCCESS', username, user.id, null, ip);

      const sessionUser: SessionUser = {
        userId: user.id,
        username: user.username,
        fullName: user.fullName || user.username,
        role: user.role,
      };
      log.info('Operator logged in', { username });
      return { token: sessions.issue(sessionUser), user: sessionUser };
    },

    async logout(token: string | undefined, ip?: string): Promise<boolean> {
      const user = sessions.verify(token);
      const revoked = sessions.revoke(token);
      if (user) await audit('LOGOUT', user.username, user.userId, null, ip);
      return revoked;
    },

    authenticate(token: string | undefined): SessionUser | null {
      return sessions.verify(token);
    },
  };
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

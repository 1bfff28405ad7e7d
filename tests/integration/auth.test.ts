import { eq } from 'drizzle-orm';
import type { Container } from '../../src/container.js';
import { loginAudit, users } from '../../src/db/schema.js';
import { seedAdminUser } from '../../src/db/seed.js';
import { AuthError, ForbiddenError, ValidationError } from '../../src/lib/errors.js';
import { createAuthService } from '../../src/services/auth.service.js';
import { SessionStore } from '../../src/services/token.service.js';
import { createTestContainer } from '../helpers/testContainer.js';

describe('operator auth', () => {
  let container: Container;

  beforeEach(async () => {
    container = await createTestContainer();
  });

  afterEach(() => container.stop());

  it('logs in the seeded admin and issues a session', async () => {
    const { token, user } = await container.auth.login('admin', 'test-secret', '127.0.0.1');
    expect(user).toEqual({ userId: 1, username: 'admin', fullName: 'Administrator', role: 'admin' });
    expect(container.auth.authenticate(token)).toEqual(user);

    await expect(container.auth.logout(token, '127.0.0.1')).resolves.toBe(true);
    expect(container.auth.authenticate(token)).toBeNull();

    const audit = await container.stores.complaints.withConnection((db) => db.select().from(loginAudit));
    expect(audit.map((a) => a.action)).toEqual(['LOGIN_SUCCESS', 'LOGOUT']);
  });

  it('does not seed twice', async () => {
    await expect(seedAdminUser(container.stores.complaints, { username: 'other', password: 'test-secret' })).resolves.toBe(false);
  });

  it('needs both fields', async () => {
    await expect(container.auth.login('admin', '')).rejects.toBeInstanceOf(ValidationError);
    await expect(container.auth.login(undefined, 'test-secret')).rejects.toThrow('Username and password are required');
  });

  it('gives the same answer for an unknown user and a wrong password', async () => {
    await expect(container.auth.login('ghost', 'test-secret')).rejects.toThrow(new AuthError('Invalid username or password'));
    await expect(container.auth.login('admin', 'wrong')).rejects.toThrow(new AuthError('Invalid username or password'));
  });

  it('refuses a disabled account', async () => {
    await container.stores.complaints.withConnection((db) =>
      db.update(users).set({ isActive: false }).where(eq(users.username, 'admin')),
    );
    await expect(container.auth.login('admin', 'test-secret')).rejects.toThrow(new ForbiddenError('Account is disabled'));
  });

  describe('lockout', () => {
    let clock: Date;

    const authAt = () =>
      createAuthService(
        container.stores.complaints,
        new SessionStore(60_000),
        { maxLoginAttempts: 3, lockoutMinutes: 30 },
        () => clock,
      );

    beforeEach(() => {
      clock = new Date('2025-01-14T08:00:00.000Z');
    });

    it('locks after the maximum failures, even for the right password', async () => {
      const auth = authAt();
      for (let i = 0; i < 3; i++) {
        await expect(auth.login('admin', 'wrong')).rejects.toBeInstanceOf(AuthError);
      }

      clock = new Date('2025-01-14T08:10:00.000Z');
      await expect(auth.login('admin', 'test-secret')).rejects.toThrow(
        new ForbiddenError('Account locked. Try again in 20 minute(s).'),
      );

      const [row] = await container.stores.complaints.withConnection((db) =>
        db.select().from(users).where(eq(users.username, 'admin')),
      );
      expect(row?.failedAttempts).toBe(3);
      expect(row?.lockedUntil).toBe('2025-01-14T08:30:00.000Z');
    });

    it('lets the user back in once the lock expires', async () => {
      const auth = authAt();
      for (let i = 0; i < 3; i++) {
        await expect(auth.login('admin', 'wrong')).rejects.toBeInstanceOf(AuthError);
      }

      clock = new Date('2025-01-14T08:31:00.000Z');
      const { user } = await auth.login('admin', 'test-secret');
      expect(user.username).toBe('admin');

      const [row] = await container.stores.complaints.withConnection((db) =>
        db.select().from(users).where(eq(users.username, 'admin')),
      );
      expect(row).toMatchObject({ failedAttempts: 0, lockedUntil: null, lastLoginAt: '2025-01-14T08:31:00.000Z' });
    });

    it('starts a fresh count after an expired lock', async () => {
      const auth = authAt();
      for (let i = 0; i < 3; i++) {
        await expect(auth.login('admin', 'wrong')).rejects.toBeInstanceOf(AuthError);
      }

      clock = new Date('2025-01-14T08:31:00.000Z');
      await expect(auth.login('admin', 'wrong')).rejects.toBeInstanceOf(AuthError);
      await expect(auth.login('admin', 'test-secret')).resolves.toMatchObject({ user: { username: 'admin' } });
    });
  });
});

import { SessionStore } from '../../../src/services/token.service.js';
import type { SessionUser } from '../../../src/types/index.js';

const user: SessionUser = { userId: 1, username: 'admin', fullName: 'Administrator', role: 'admin' };

describe('SessionStore', () => {
  let clock: number;
  let sessions: SessionStore;

  beforeEach(() => {
    clock = 1_000_000;
    sessions = new SessionStore(60_000, () => clock);
  });

  it('issues distinct hex tokens', () => {
    const a = sessions.issue(user);
    const b = sessions.issue(user);
    expect(a).toMatch(/^[0-9a-f]{48}$/);
    expect(a).not.toBe(b);
    expect(sessions.size).toBe(2);
  });

  it('verifies until the ttl runs out', () => {
    const token = sessions.issue(user);
    clock += 60_000;
    expect(sessions.verify(token)).toEqual(user);
    clock += 1;
    expect(sessions.verify(token)).toBeNull();
    expect(sessions.size).toBe(0);
  });

  it('rejects missing and unknown tokens', () => {
    expect(sessions.verify(undefined)).toBeNull();
    expect(sessions.verify('nope')).toBeNull();
  });

  it('revokes a token once', () => {
    const token = sessions.issue(user);
    expect(sessions.revoke(token)).toBe(true);
    expect(sessions.revoke(token)).toBe(false);
    expect(sessions.verify(token)).toBeNull();
  });

  it('sweeps expired sessions only', () => {
    sessions.issue(user);
    clock += 30_000;
    const fresh = sessions.issue(user);
    clock += 40_000;

    expect(sessions.sweep()).toBe(1);
    expect(sessions.verify(fresh)).toEqual(user);
  });
});

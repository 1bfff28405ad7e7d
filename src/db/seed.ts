import { count } from 'drizzle-orm';
import { logger } from '../lib/logger.js';
import { hashPassword } from '../services/auth.service.js';
import type { ComplaintDb } from './index.js';
import type { ConnectionPool } from './pool.js';
import { users } from './schema.js';

const log = logger.child('[db/seed]');

// First operator account, only when the users table is empty
export async function seedAdminUser(
  pool: ConnectionPool<ComplaintDb>,
  credentials: { username: string; password: string },
): Promise<boolean> {
  const [row] = await pool.withConnection((db) => db.select({ n: count() }).from(users));
  if (row && row.n > 0) return false;
  if (!credentials.username || !credentials.password) {
    log.warn('ADMIN_USERNAME/ADMIN_PASSWORD not set, no operator seeded');
    return false;
  }

  const passwordHash = await hashPassword(credentials.password);
  await pool.withConnection((db) =>
    db.insert(users).values({
      username: credentials.username,
      passwordHash,
      fullName: 'Administrator',
      role: 'admin',
    }),
  );
  log.info('Seeded admin operator', { username: credentials.username });
  return true;
}

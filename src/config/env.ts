import 'dotenv/config';

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function flag(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value || '').trim().toLowerCase());
}

export const env = {
  port: int(process.env.PORT, 3100),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Stores
  complaintsDbUrl: process.env.COMPLAINTS_DB_URL || 'file:data/complaints.db',
  jobOrdersDbUrl: process.env.JOBORDERS_DB_URL || 'file:data/joblist.db',
  poolMax: int(process.env.DB_POOL_MAX, 20),
  poolAcquireTimeoutMs: int(process.env.DB_POOL_ACQUIRE_TIMEOUT_MS, 5000),

  // Realtime
  statsIntervalMs: int(process.env.STATS_INTERVAL_MS, 30_000),

  // Operator auth
  sessionTtlMinutes: int(process.env.SESSION_TTL_MINUTES, 480),
  maxLoginAttempts: int(process.env.MAX_LOGIN_ATTEMPTS, 5),
  lockoutMinutes: int(process.env.LOCKOUT_MINUTES, 30),
  adminUsername: process.env.ADMIN_USERNAME || '',
  adminPassword: process.env.ADMIN_PASSWORD || '',

  // Sibling node + dialogue engine
  relayUrl: process.env.RELAY_URL || '',
  syncSecret: process.env.SYNC_SECRET || '',
  dialogueEngineUrl: process.env.DIALOGUE_ENGINE_URL || '',
  outboundTimeoutMs: int(process.env.OUTBOUND_TIMEOUT_MS, 5000),

  autoAssignWebReports: flag(process.env.AUTO_ASSIGN_WEB_REPORTS),
};

export type AppConfig = typeof env;

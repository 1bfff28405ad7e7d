import type { Client } from '@libsql/client';
import { logger } from '../lib/logger.js';

const log = logger.child('[db/migrate]');

const complaintTables = [
  `CREATE TABLE IF NOT EXISTS outage_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    reference_no TEXT,
    job_order_id TEXT,
    conversation_id TEXT,
    full_name TEXT NOT NULL,
    contact_number TEXT NOT NULL,
    email TEXT,
    account_number TEXT,
    address TEXT NOT NULL,
    details TEXT NOT NULL,
    incident_type TEXT,
    affected_area TEXT,
    incident_time TEXT,
    duration TEXT,
    landmark TEXT,
    latitude REAL,
    longitude REAL,
    accuracy REAL,
    priority TEXT NOT NULL DEFAULT 'LOW',
    status TEXT NOT NULL DEFAULT 'NEW',
    hidden INTEGER NOT NULL DEFAULT 0,
    source TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    resolved_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS meter_concerns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    reference_no TEXT,
    job_order_id TEXT,
    conversation_id TEXT,
    account_no TEXT NOT NULL,
    name TEXT NOT NULL,
    address TEXT NOT NULL,
    contact_number TEXT NOT NULL,
    concern TEXT NOT NULL,
    latitude REAL,
    longitude REAL,
    accuracy REAL,
    priority TEXT NOT NULL DEFAULT 'LOW',
    status TEXT NOT NULL DEFAULT 'NEW',
    hidden INTEGER NOT NULL DEFAULT 0,
    source TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    resolved_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS agent_queue (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    reference_no TEXT,
    job_order_id TEXT,
    conversation_id TEXT,
    full_name TEXT NOT NULL,
    contact_number TEXT NOT NULL,
    address TEXT NOT NULL,
    concern TEXT NOT NULL,
    latitude REAL,
    longitude REAL,
    accuracy REAL,
    priority TEXT NOT NULL DEFAULT 'LOW',
    status TEXT NOT NULL DEFAULT 'NEW',
    hidden INTEGER NOT NULL DEFAULT 0,
    resumed INTEGER NOT NULL DEFAULT 0,
    source TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    resolved_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS consumer_accounts (
    account_no TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    address TEXT,
    is_active INTEGER NOT NULL DEFAULT 1
  )`,
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    full_name TEXT,
    role TEXT NOT NULL DEFAULT 'operator',
    is_active INTEGER NOT NULL DEFAULT 1,
    failed_attempts INTEGER NOT NULL DEFAULT 0,
    locked_until TEXT,
    last_login_at TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS login_audit (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER,
    username TEXT NOT NULL,
    action TEXT NOT NULL,
    detail TEXT,
    ip TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE TABLE IF NOT EXISTS status_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    family TEXT NOT NULL,
    record_id INTEGER NOT NULL,
    from_status TEXT,
    to_status TEXT,
    action TEXT NOT NULL,
    actor TEXT,
    note TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )`,
  `CREATE INDEX IF NOT EXISTS idx_outage_reports_address_created ON outage_reports (address, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_outage_reports_reference ON outage_reports (reference_no)`,
  `CREATE INDEX IF NOT EXISTS idx_status_logs_record ON status_logs (family, record_id)`,
];

const jobOrderTables = [
  `CREATE TABLE IF NOT EXISTS job_orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    unique_id TEXT NOT NULL UNIQUE,
    creator TEXT NOT NULL,
    created TEXT NOT NULL,
    follower TEXT NOT NULL,
    followed TEXT NOT NULL,
    name TEXT NOT NULL,
    spinners TEXT NOT NULL,
    town0 TEXT NOT NULL,
    brgy0 TEXT NOT NULL,
    town TEXT NOT NULL,
    brgy TEXT NOT NULL,
    town2 TEXT NOT NULL,
    brgy2 TEXT NOT NULL,
    assignedto TEXT NOT NULL,
    status TEXT NOT NULL,
    subs TEXT NOT NULL,
    feeder TEXT NOT NULL,
    section TEXT NOT NULL,
    cause TEXT NOT NULL,
    equip TEXT NOT NULL,
    type TEXT NOT NULL,
    notes TEXT NOT NULL,
    landmark TEXT NOT NULL,
    phone TEXT NOT NULL,
    location TEXT NOT NULL,
    latitude TEXT NOT NULL,
    longitude TEXT NOT NULL,
    actiontaken TEXT NOT NULL
  )`,
];

// Columns added after the first deployment
const complaintAlterations = [
  `ALTER TABLE agent_queue ADD COLUMN resumed INTEGER NOT NULL DEFAULT 0`,
  `ALTER TABLE outage_reports ADD COLUMN resolved_at TEXT`,
  `ALTER TABLE meter_concerns ADD COLUMN resolved_at TEXT`,
  `ALTER TABLE agent_queue ADD COLUMN resolved_at TEXT`,
];

function isDuplicateColumn(err: unknown): boolean {
  return err instanceof Error && /duplicate column/i.test(err.message);
}

export async function migrateComplaintStore(client: Client) {
  log.info('Running complaint store migrations');
  for (const sql of complaintTables) {
    await client.execute(sql);
  }
  for (const sql of complaintAlterations) {
    try {
      await client.execute(sql);
    } catch (err) {
      if (!isDuplicateColumn(err)) throw err;
    }
  }
  log.info('Complaint store ready');
}

export async function migrateJobOrderStore(client: Client) {
  log.info('Running job order store migrations');
  for (const sql of jobOrderTables) {
    await client.execute(sql);
  }
  log.info('Job order store ready');
}

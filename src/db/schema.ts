import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

const now = () => new Date().toISOString();

// Power outage reports (chatbot, web form, SMS, edge node)
export const outageReports = sqliteTable('outage_reports', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  referenceNo: text('reference_no'),                 // JO-YYYYMMDD-NNNN
  jobOrderId: text('job_order_id'),                  // job order store unique_id
  conversationId: text('conversation_id'),
  fullName: text('full_name').notNull(),
  contactNumber: text('contact_number').notNull(),
  email: text('email'),
  accountNumber: text('account_number'),
  address: text('address').notNull(),
  details: text('details').notNull(),
  incidentType: text('incident_type'),               // power_outage, fallen_wire, ...
  affectedArea: text('affected_area'),
  incidentTime: text('incident_time'),
  duration: text('duration'),
  landmark: text('landmark'),
  latitude: real('latitude'),
  longitude: real('longitude'),
  accuracy: real('accuracy'),
  priority: text('priority').notNull().default('LOW'),
  status: text('status').notNull().default('NEW'),
  hidden: integer('hidden', { mode: 'boolean' }).notNull().default(false),
  source: text('source').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(now),
  resolvedAt: text('resolved_at'),
});

// Meter and billing concerns
export const meterConcerns = sqliteTable('meter_concerns', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  referenceNo: text('reference_no'),
  jobOrderId: text('job_order_id'),
  conversationId: text('conversation_id'),
  accountNo: text('account_no').notNull(),
  name: text('name').notNull(),
  address: text('address').notNull(),
  contactNumber: text('contact_number').notNull(),
  concern: text('concern').notNull(),
  latitude: real('latitude'),
  longitude: real('longitude'),
  accuracy: real('accuracy'),
  priority: text('priority').notNull().default('LOW'),
  status: text('status').notNull().default('NEW'),
  hidden: integer('hidden', { mode: 'boolean' }).notNull().default(false),
  source: text('source').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(now),
  resolvedAt: text('resolved_at'),
});

// Requests to talk to a live agent
export const agentQueue = sqliteTable('agent_queue', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  referenceNo: text('reference_no'),
  jobOrderId: text('job_order_id'),
  conversationId: text('conversation_id'),           // dialogue engine sender id
  fullName: text('full_name').notNull(),
  contactNumber: text('contact_number').notNull(),
  address: text('address').notNull(),
  concern: text('concern').notNull(),
  latitude: real('latitude'),
  longitude: real('longitude'),
  accuracy: real('accuracy'),
  priority: text('priority').notNull().default('LOW'),
  status: text('status').notNull().default('NEW'),
  hidden: integer('hidden', { mode: 'boolean' }).notNull().default(false),
  resumed: integer('resumed', { mode: 'boolean' }).notNull().default(false),
  source: text('source').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(now),
  resolvedAt: text('resolved_at'),
});

export const consumerAccounts = sqliteTable('consumer_accounts', {
  accountNo: text('account_no').primaryKey(),
  name: text('name').notNull(),
  address: text('address'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
});

// Dashboard operators
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  fullName: text('full_name'),
  role: text('role').notNull().default('operator'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  failedAttempts: integer('failed_attempts').notNull().default(0),
  lockedUntil: text('locked_until'),
  lastLoginAt: text('last_login_at'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

export const loginAudit = sqliteTable('login_audit', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id'),
  username: text('username').notNull(),
  action: text('action').notNull(),                  // LOGIN_SUCCESS, LOGIN_FAILED, LOGIN_ATTEMPT_LOCKED, LOGOUT
  detail: text('detail'),
  ip: text('ip'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

// Every lifecycle action (status, hide, assignment)
export const statusLogs = sqliteTable('status_logs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  family: text('family').notNull(),
  recordId: integer('record_id').notNull(),
  fromStatus: text('from_status'),
  toStatus: text('to_status'),
  action: text('action').notNull(),                  // status_changed, hidden, job_order_assigned
  actor: text('actor'),
  note: text('note'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

import { and, asc, count, desc, eq, gte, isNull, lt, lte, ne, sql, type SQL } from 'drizzle-orm';
import type { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import type { ConnectionPool } from '../db/pool.js';
import type { ComplaintDb } from '../db/index.js';
import { outageReports, meterConcerns, agentQueue, consumerAccounts, statusLogs } from '../db/schema.js';
import type { Complaint, Family, GeoLocation, IssueType, NewComplaintInput } from '../types/index.js';
import { FAMILIES } from '../types/index.js';

type OutageRow = typeof outageReports.$inferSelect;
type MeterRow = typeof meterConcerns.$inferSelect;
type AgentRow = typeof agentQueue.$inferSelect;

// Columns every family table has under the same name
export interface FamilyColumns {
  id: AnySQLiteColumn;
  status: AnySQLiteColumn;
  priority: AnySQLiteColumn;
  hidden: AnySQLiteColumn;
  createdAt: AnySQLiteColumn;
  address: AnySQLiteColumn;
  latitude: AnySQLiteColumn;
  longitude: AnySQLiteColumn;
}

export interface FamilyDef {
  family: Family;
  label: string;
  prefix: 'PO' | 'BC' | 'SR';
  issueType: IssueType;
  columns: FamilyColumns;
  searchColumns: AnySQLiteColumn[];
  // Always-on conditions for the triage view
  visibleConditions: SQL[];
}

export const FAMILY_DEFS: Record<Family, FamilyDef> = {
  outage_report: {
    family: 'outage_report',
    label: 'Power Outage',
    prefix: 'PO',
    issueType: 'POWER_OUTAGE',
    columns: outageReports,
    searchColumns: [outageReports.fullName, outageReports.address, outageReports.details],
    visibleConditions: [],
  },
  meter_concern: {
    family: 'meter_concern',
    label: 'Billing',
    prefix: 'BC',
    issueType: 'BILLING',
    columns: meterConcerns,
    searchColumns: [meterConcerns.accountNo, meterConcerns.name, meterConcerns.concern],
    visibleConditions: [],
  },
  agent_queue: {
    family: 'agent_queue',
    label: 'Service',
    prefix: 'SR',
    issueType: 'SERVICE',
    columns: agentQueue,
    searchColumns: [agentQueue.conversationId, agentQueue.fullName, agentQueue.concern],
    // resumed conversations are back with the chatbot
    visibleConditions: [eq(agentQueue.resumed, false)],
  },
};

// Route segments use family keys; the legacy table name is accepted for outages
const FAMILY_ALIASES: Record<string, Family> = {
  power_outage_reports: 'outage_report',
  meter_concerns: 'meter_concern',
};

export function parseFamily(raw: string | undefined): Family | null {
  const key = (raw || '').trim().toLowerCase();
  const found = FAMILIES.find((f) => f === key);
  return found ?? FAMILY_ALIASES[key] ?? null;
}

export function formatDisplayId(family: Family, recordId: number): string {
  return `${FAMILY_DEFS[family].prefix}-${String(recordId).padStart(6, '0')}`;
}

export function summarize(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function location(latitude: number | null, longitude: number | null, accuracy: number | null): GeoLocation | null {
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude, accuracy };
}

function upper(value: string | null, fallback: string): string {
  const v = (value || '').trim().toUpperCase();
  return v || fallback;
}

function baseComplaint(family: Family, row: {
  id: number;
  referenceNo: string | null;
  jobOrderId: string | null;
  priority: string;
  status: string;
  hidden: boolean;
  source: string;
  createdAt: string;
  resolvedAt: string | null;
  latitude: number | null;
  longitude: number | null;
  accuracy: number | null;
}) {
  return {
    family,
    recordId: row.id,
    displayId: formatDisplayId(family, row.id),
    referenceNo: row.referenceNo,
    jobOrderId: row.jobOrderId,
    issueType: FAMILY_DEFS[family].issueType,
    priority: upper(row.priority, 'LOW'),
    status: upper(row.status, 'NEW'),
    hidden: row.hidden,
    source: row.source,
    createdAt: row.createdAt,
    resolvedAt: row.resolvedAt,
    location: location(row.latitude, row.longitude, row.accuracy),
  };
}

export function fromOutageRow(row: OutageRow): Complaint {
  return {
    ...baseComplaint('outage_report', row),
    customerName: row.fullName,
    customerContact: row.contactNumber,
    customerId: row.accountNumber,
    address: row.address,
    description: row.details,
    summary: summarize(row.details),
  };
}

export function fromMeterRow(row: MeterRow): Complaint {
  return {
    ...baseComplaint('meter_concern', row),
    customerName: row.name,
    customerContact: row.contactNumber,
    customerId: row.accountNo,
    address: row.address,
    description: row.concern,
    summary: summarize(row.concern),
  };
}

export function fromAgentRow(row: AgentRow): Complaint {
  return {
    ...baseComplaint('agent_queue', row),
    customerName: row.fullName,
    customerContact: row.contactNumber,
    customerId: null,
    address: row.address,
    description: row.concern,
    summary: summarize(row.concern),
  };
}

// Mutable fields shared by all three tables
export interface RowPatch {
  status?: string;
  hidden?: boolean;
  jobOrderId?: string;
  resolvedAt?: string | null;
  latitude?: number;
  longitude?: number;
  accuracy?: number | null;
}

export interface ActionLogEntry {
  family: Family;
  recordId: number;
  action: 'status_changed' | 'hidden' | 'job_order_assigned' | 'location_updated' | 'conversation_resumed';
  fromStatus?: string | null;
  toStatus?: string | null;
  actor?: string | null;
  note?: string | null;
}

export type ComplaintRepository = ReturnType<typeof createComplaintRepository>;

export function createComplaintRepository(pool: ConnectionPool<ComplaintDb>) {
  async function selectRows(db: ComplaintDb, family: Family, where?: SQL): Promise<Complaint[]> {
    switch (family) {
      case 'outage_report': {
        const rows = await db.select().from(outageReports).where(where).orderBy(desc(outageReports.createdAt));
        return rows.map(fromOutageRow);
      }
      case 'meter_concern': {
        const rows = await db.select().from(meterConcerns).where(where).orderBy(desc(meterConcerns.createdAt));
        return rows.map(fromMeterRow);
      }
      case 'agent_queue': {
        const rows = await db.select().from(agentQueue).where(where).orderBy(desc(agentQueue.createdAt));
        return rows.map(fromAgentRow);
      }
    }
  }

  return {
    pool,

    async select(family: Family, where?: SQL): Promise<Complaint[]> {
      return pool.withConnection((db) => selectRows(db, family, where));
    },

    async findById(family: Family, recordId: number): Promise<Complaint | null> {
      const { columns } = FAMILY_DEFS[family];
      const [row] = await pool.withConnection((db) => selectRows(db, family, eq(columns.id, recordId)));
      return row ?? null;
    },

    async insert(input: NewComplaintInput): Promise<Complaint> {
      const common = {
        referenceNo: input.referenceNo ?? null,
        conversationId: input.conversationId ?? null,
        contactNumber: input.customerContact,
        address: input.address,
        latitude: input.location?.latitude ?? null,
        longitude: input.location?.longitude ?? null,
        accuracy: input.location?.accuracy ?? null,
        priority: input.priority,
        status: input.status ?? 'NEW',
        source: input.source,
        ...(input.createdAt ? { createdAt: input.createdAt } : {}),
      };

      return pool.withConnection(async (db) => {
        switch (input.family) {
          case 'outage_report': {
            const [row] = await db.insert(outageReports).values({
              ...common,
              fullName: input.customerName,
              details: input.description,
              email: input.email ?? null,
              accountNumber: input.accountNumber ?? null,
              incidentType: input.incident?.type ?? null,
              affectedArea: input.incident?.affectedArea ?? null,
              incidentTime: input.incident?.time ?? null,
              duration: input.incident?.duration ?? null,
              landmark: input.incident?.landmark ?? null,
            }).returning();
            return fromOutageRow(row);
          }
          case 'meter_concern': {
            const [row] = await db.insert(meterConcerns).values({
              ...common,
              name: input.customerName,
              accountNo: input.accountNumber || 'N/A',
              concern: input.description,
            }).returning();
            return fromMeterRow(row);
          }
          case 'agent_queue': {
            const [row] = await db.insert(agentQueue).values({
              ...common,
              fullName: input.customerName,
              concern: input.description,
            }).returning();
            return fromAgentRow(row);
          }
        }
      });
    },

    // Most recent unresolved, visible outage report at this address within [dayStart, nextDayStart)
    async findOpenOutageAt(address: string, dayStart: string, nextDayStart: string): Promise<Complaint | null> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select().from(outageReports)
          .where(and(
            sql`lower(trim(${outageReports.address})) = ${address.trim().toLowerCase()}`,
            gte(outageReports.createdAt, dayStart),
            lt(outageReports.createdAt, nextDayStart),
            eq(outageReports.hidden, false),
            ne(outageReports.status, 'RESOLVED'),
          ))
          .orderBy(desc(outageReports.createdAt), desc(outageReports.id))
          .limit(1);
        return row ? fromOutageRow(row) : null;
      });
    },

    // Any outage report from this contact number within [dayStart, nextDayStart)
    async findOutageByContactOn(contact: string, dayStart: string, nextDayStart: string): Promise<Complaint | null> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select().from(outageReports)
          .where(and(
            eq(outageReports.contactNumber, contact.trim()),
            gte(outageReports.createdAt, dayStart),
            lt(outageReports.createdAt, nextDayStart),
          ))
          .orderBy(desc(outageReports.id))
          .limit(1);
        return row ? fromOutageRow(row) : null;
      });
    },

    // Outage reports created at or after `since`, newest first, with the fields the sibling node keeps
    async outagesSince(since: string): Promise<{ complaint: Complaint; email: string | null; incidentType: string | null }[]> {
      return pool.withConnection(async (db) => {
        const rows = await db.select().from(outageReports)
          .where(gte(outageReports.createdAt, since))
          .orderBy(desc(outageReports.createdAt), desc(outageReports.id));
        return rows.map((row) => ({ complaint: fromOutageRow(row), email: row.email, incidentType: row.incidentType }));
      });
    },

    // Follow-up lookup by the JO- reference given at intake
    async findByReference(referenceNo: string): Promise<Complaint | null> {
      return pool.withConnection(async (db) => {
        const [outage] = await db.select().from(outageReports)
          .where(eq(outageReports.referenceNo, referenceNo))
          .orderBy(desc(outageReports.id))
          .limit(1);
        if (outage) return fromOutageRow(outage);
        const [meter] = await db.select().from(meterConcerns)
          .where(eq(meterConcerns.referenceNo, referenceNo))
          .orderBy(desc(meterConcerns.id))
          .limit(1);
        return meter ? fromMeterRow(meter) : null;
      });
    },

    /**
     * Applies a patch to one row and returns the number of rows changed.
     * `onlyIfUnlinked` adds `job_order_id IS NULL` so a link is never overwritten.
     */
    async update(family: Family, recordId: number, patch: RowPatch, opts: { onlyIfUnlinked?: boolean } = {}): Promise<number> {
      return pool.withConnection(async (db) => {
        switch (family) {
          case 'outage_report': {
            const rows = await db.update(outageReports).set(patch)
              .where(and(eq(outageReports.id, recordId), opts.onlyIfUnlinked ? isNull(outageReports.jobOrderId) : undefined))
              .returning({ id: outageReports.id });
            return rows.length;
          }
          case 'meter_concern': {
            const rows = await db.update(meterConcerns).set(patch)
              .where(and(eq(meterConcerns.id, recordId), opts.onlyIfUnlinked ? isNull(meterConcerns.jobOrderId) : undefined))
              .returning({ id: meterConcerns.id });
            return rows.length;
          }
          case 'agent_queue': {
            const rows = await db.update(agentQueue).set(patch)
              .where(and(eq(agentQueue.id, recordId), opts.onlyIfUnlinked ? isNull(agentQueue.jobOrderId) : undefined))
              .returning({ id: agentQueue.id });
            return rows.length;
          }
        }
      });
    },

    async outageLandmark(recordId: number): Promise<string | null> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select({ landmark: outageReports.landmark })
          .from(outageReports)
          .where(eq(outageReports.id, recordId));
        return row?.landmark ?? null;
      });
    },

    async markResumed(recordId: number): Promise<number> {
      return pool.withConnection(async (db) => {
        const rows = await db.update(agentQueue).set({ resumed: true })
          .where(eq(agentQueue.id, recordId))
          .returning({ id: agentQueue.id });
        return rows.length;
      });
    },

    async findConversationId(recordId: number): Promise<string | null | undefined> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select({ conversationId: agentQueue.conversationId })
          .from(agentQueue)
          .where(eq(agentQueue.id, recordId));
        return row ? row.conversationId : undefined;
      });
    },

    // Waiting agent requests, first come first served
    async queuedAgentRequests(): Promise<Complaint[]> {
      return pool.withConnection(async (db) => {
        const rows = await db.select().from(agentQueue)
          .where(and(eq(agentQueue.status, 'NEW'), eq(agentQueue.hidden, false), eq(agentQueue.resumed, false)))
          .orderBy(asc(agentQueue.id));
        return rows.map(fromAgentRow);
      });
    },

    async queuePosition(recordId: number): Promise<number> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select({ n: count() }).from(agentQueue)
          .where(and(
            eq(agentQueue.status, 'NEW'),
            eq(agentQueue.hidden, false),
            eq(agentQueue.resumed, false),
            lte(agentQueue.id, recordId),
          ));
        return row ? row.n : 0;
      });
    },

    async accountExists(accountNo: string): Promise<boolean> {
      return pool.withConnection(async (db) => {
        const [row] = await db.select({ accountNo: consumerAccounts.accountNo })
          .from(consumerAccounts)
          .where(and(eq(consumerAccounts.accountNo, accountNo), eq(consumerAccounts.isActive, true)));
        return Boolean(row);
      });
    },

    async logAction(entry: ActionLogEntry): Promise<void> {
      await pool.withConnection((db) => db.insert(statusLogs).values({
        family: entry.family,
        recordId: entry.recordId,
        action: entry.action,
        fromStatus: entry.fromStatus ?? null,
        toStatus: entry.toStatus ?? null,
        actor: entry.actor ?? null,
        note: entry.note ?? null,
      }));
    },

    async history(family: Family, recordId: number) {
      return pool.withConnection((db) => db.select().from(statusLogs)
        .where(and(eq(statusLogs.family, family), eq(statusLogs.recordId, recordId)))
        .orderBy(asc(statusLogs.id)));
    },
  };
}

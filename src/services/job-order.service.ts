import { randomUUID } from 'crypto';
import { format } from 'date-fns';
import type { ConnectionPool } from '../db/pool.js';
import type { JobOrderDb } from '../db/index.js';
import { jobOrders, type JobOrderRow } from '../db/joblist.schema.js';
import type { Complaint } from '../types/index.js';

// Service-area spellings → the town name the field crew system expects
const TOWN_NAMES: ReadonlyArray<[string, string]> = [
  ['tubungan', 'Tubungan'],
  ['alimodian', 'Alimodian'],
  ['cabatuan', 'Cabatuan'],
  ['guimbal', 'Guimbal'],
  ['igbaras', 'Igbaras'],
  ['leganes', 'Leganes'],
  ['leon', 'Leon'],
  ['miag-ao', 'Miag-ao'],
  ['miagao', 'Miag-ao'],
  ['oton', 'Oton'],
  ['pavia', 'Pavia'],
  ['san joaquin', 'San Joaquin'],
  ['san miguel', 'San Miguel'],
  ['sta. barbara', 'Sta. Barbara'],
  ['sta barbara', 'Sta. Barbara'],
  ['tigbauan', 'Tigbauan'],
];

const HIGH_URGENCY_WORDS = ['power', 'outage', 'emergency'];

export const JOB_ORDER_PLACEHOLDERS = {
  town: 'Select Town',
  brgy: 'Select Brgy',
  status: 'Select Status',
  subs: 'Substation',
  feeder: 'Feeder',
  section: 'Category',
  equip: 'Equipment',
} as const;

function titleCase(text: string): string {
  return text.replace(/\S+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Barangay = first comma-separated part without the "Brgy."/"Barangay" word.
 * Town = first known service-area town mentioned anywhere, '' otherwise.
 */
export function extractLocationParts(address: string | null | undefined): { barangay: string; town: string } {
  const lowered = (address || '').trim().toLowerCase();
  if (!lowered) return { barangay: '', town: '' };

  const town = TOWN_NAMES.find(([key]) => lowered.includes(key))?.[1] ?? '';
  const firstPart = lowered.replace(/\b(brgy|barangay)\b\.?/g, '').split(',')[0] ?? '';
  const barangay = titleCase(firstPart.replace(/^[\s.]+/, '').trim());
  return { barangay, town };
}

/** 10-digit numeric id taken from a random UUID. */
export function generateJobOrderId(): string {
  const hex = randomUUID().replace(/-/g, '');
  return BigInt(`0x${hex}`).toString().slice(0, 10);
}

export function jobOrderType(concern: string): 'high' | 'low' {
  const lowered = concern.toLowerCase();
  return HIGH_URGENCY_WORDS.some((w) => lowered.includes(w)) ? 'high' : 'low';
}

export function jobOrderNotes(complaint: Pick<Complaint, 'referenceNo' | 'priority' | 'description'>): string {
  const base = `Priority: ${complaint.priority} | ${complaint.description}`;
  return complaint.referenceNo ? `Original Job Order: ${complaint.referenceNo} | ${base}` : base;
}

export interface JobOrderExtras {
  landmark?: string | null;
}

/** Maps a complaint onto the 28 text columns of the job order store. */
export function buildJobOrder(
  complaint: Complaint,
  uniqueId: string,
  now: Date = new Date(),
  extras: JobOrderExtras = {},
): JobOrderRow {
  const { barangay, town } = extractLocationParts(complaint.address);
  const stamp = format(now, 'MM/dd/yy hh:mm:ss a');
  const phone = complaint.customerContact || '';

  return {
    uniqueId,
    creator: phone || complaint.customerName || 'Dashboard',
    created: stamp,
    follower: phone || complaint.customerName || 'Unknown',
    followed: stamp,
    name: complaint.customerName,
    spinners: phone,
    town0: town,
    brgy0: barangay,
    town: JOB_ORDER_PLACEHOLDERS.town,
    brgy: JOB_ORDER_PLACEHOLDERS.brgy,
    town2: town,
    brgy2: barangay,
    assignedto: town,
    status: JOB_ORDER_PLACEHOLDERS.status,
    subs: JOB_ORDER_PLACEHOLDERS.subs,
    feeder: JOB_ORDER_PLACEHOLDERS.feeder,
    section: JOB_ORDER_PLACEHOLDERS.section,
    cause: complaint.description,
    equip: JOB_ORDER_PLACEHOLDERS.equip,
    type: jobOrderType(complaint.description),
    notes: jobOrderNotes(complaint),
    landmark: extras.landmark || '',
    phone,
    location: complaint.address,
    latitude: complaint.location ? String(complaint.location.latitude) : '',
    longitude: complaint.location ? String(complaint.location.longitude) : '',
    actiontaken: 'Pending',
  };
}

export type JobOrderStore = ReturnType<typeof createJobOrderStore>;

export function createJobOrderStore(pool: ConnectionPool<JobOrderDb>) {
  return {
    pool,

    async insert(row: JobOrderRow): Promise<void> {
      await pool.withConnection((db) => db.insert(jobOrders).values(row));
    },

    async findByUniqueId(uniqueId: string): Promise<JobOrderRow | null> {
      return pool.withConnection(async (db) => {
        const found = await db.query.jobOrders.findFirst({
          where: (t, { eq }) => eq(t.uniqueId, uniqueId),
        });
        return found ?? null;
      });
    },
  };
}

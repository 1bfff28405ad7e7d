import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { PRIORITIES, STATUSES, type Complaint, type ComplaintStatus, type Priority } from '../types/index.js';
import type { IntakeService } from '../services/intake.service.js';
import { classifyOutagePriority } from '../services/priority.service.js';

const log = logger.child('[intake/sync]');

const nullableNumber = z.union([z.number(), z.string(), z.null()]).optional()
  .transform((v) => {
    if (v === undefined || v === null || v === '') return null;
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  });

// Outage report relayed by the public edge node
export const SyncPayloadSchema = z.object({
  report_id: z.union([z.number(), z.string()]).optional(),
  full_name: z.string().trim().min(1),
  contact_number: z.string().trim().min(1),
  address: z.string().trim().min(1),
  details: z.string().trim().min(1),
  email: z.string().nullish(),
  latitude: nullableNumber,
  longitude: nullableNumber,
  incident_type: z.string().nullish(),
  priority: z.string().nullish(),
  timestamp: z.string().nullish(),
});

export type SyncPayload = z.infer<typeof SyncPayloadSchema>;

export function syncPriority(payload: Pick<SyncPayload, 'priority' | 'details' | 'incident_type'>): Priority {
  const claimed = (payload.priority || '').trim().toUpperCase();
  return PRIORITIES.find((p) => p === claimed) ?? classifyOutagePriority(payload.details, payload.incident_type);
}

// Row of the sibling node's export feed; same fields plus its own status
export const FeedItemSchema = SyncPayloadSchema.extend({
  status: z.string().nullish(),
  source: z.string().nullish(),
});

export interface CatchUpResult {
  synced: number;
  skipped: number;
  invalid: number;
}

function feedStatus(raw: string | null | undefined): ComplaintStatus {
  const claimed = (raw || '').trim().toUpperCase();
  return STATUSES.find((s) => s === claimed) ?? 'NEW';
}

function locationOf(payload: Pick<SyncPayload, 'latitude' | 'longitude'>) {
  return payload.latitude !== null && payload.longitude !== null
    ? { latitude: payload.latitude, longitude: payload.longitude, accuracy: null }
    : null;
}

export type SyncIntake = ReturnType<typeof createSyncIntake>;

export function createSyncIntake(intake: IntakeService, now: () => Date = () => new Date()) {
  function createdAtOf(timestamp: string | null | undefined): string {
    const parsed = timestamp ? parseISO(timestamp) : null;
    return parsed && isValid(parsed) ? parsed.toISOString() : now().toISOString();
  }

  return {
    async receive(body: unknown): Promise<Complaint> {
      const parsed = SyncPayloadSchema.safeParse(body);
      if (!parsed.success) {
        log.warn('Invalid sync payload', { issues: parsed.error.flatten().fieldErrors });
        throw new ValidationError('Missing required fields');
      }
      const payload = parsed.data;

      const complaint = await intake.submit({
        family: 'outage_report',
        customerName: payload.full_name,
        customerContact: payload.contact_number,
        address: payload.address,
        description: payload.details,
        priority: syncPriority(payload),
        source: 'AWS-EC2-Public',
        email: payload.email ?? null,
        location: locationOf(payload),
        incident: { type: payload.incident_type ?? null },
      });
      log.info('Synced report from edge node', { remoteId: payload.report_id, displayId: complaint.displayId });
      return complaint;
    },

    /**
     * Stores the feed rows this node does not have yet, one per contact number
     * and day. Rows that fail validation are counted and skipped.
     */
    async catchUp(items: unknown[]): Promise<CatchUpResult> {
      const result: CatchUpResult = { synced: 0, skipped: 0, invalid: 0 };
      for (const item of items) {
        const parsed = FeedItemSchema.safeParse(item);
        if (!parsed.success) {
          result.invalid += 1;
          continue;
        }
        const payload = parsed.data;
        const outcome = await intake.submitCopiedOutage({
          customerName: payload.full_name,
          customerContact: payload.contact_number,
          address: payload.address,
          description: payload.details,
          priority: syncPriority(payload),
          status: feedStatus(payload.status),
          source: 'Synced from EC2',
          createdAt: createdAtOf(payload.timestamp),
          email: payload.email ?? null,
          location: locationOf(payload),
          incident: { type: payload.incident_type ?? null },
        });
        if (outcome.kind === 'created') result.synced += 1;
        else result.skipped += 1;
      }
      log.info('Catch-up sync finished', { ...result });
      return result;
    },
  };
}

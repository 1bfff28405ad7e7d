import { addDays, format, startOfDay } from 'date-fns';
import { errorMessage } from '../lib/errors.js';
import { KeyedLock } from '../lib/keyed-lock.js';
import { logger } from '../lib/logger.js';
import type { Complaint, IntakeResult, NewComplaintInput } from '../types/index.js';
import type { ComplaintRepository } from './complaint.service.js';
import type { RealtimeNotifier } from './notification.service.js';

const log = logger.child('[intake]');

/** Customer-facing reference, e.g. JO-20250114-4821. */
export function generateReferenceNo(now: Date = new Date(), random: () => number = Math.random): string {
  const suffix = 1000 + Math.floor(random() * 9000);
  return `JO-${format(now, 'yyyyMMdd')}-${suffix}`;
}

// What the customer is told when the outage was already reported
export function duplicateIdentifier(existing: Complaint): string {
  return existing.referenceNo || existing.jobOrderId || existing.displayId;
}

// Reports at the same address, compared the way the duplicate lookup compares them
export function addressKey(address: string): string {
  return `address:${address.trim().toLowerCase()}`;
}

export interface IntakeDeps {
  complaints: ComplaintRepository;
  notifier: RealtimeNotifier;
  now?: () => Date;
}

export type IntakeService = ReturnType<typeof createIntakeService>;

export function createIntakeService(deps: IntakeDeps) {
  const { complaints, notifier } = deps;
  const now = deps.now ?? (() => new Date());
  // Holds the duplicate lookup and the insert together per address or contact
  const lock = new KeyedLock();

  return {
    /** Persists one complaint and tells the dashboards. Store errors propagate; nothing is written on failure. */
    async submit(input: NewComplaintInput): Promise<Complaint> {
      const complaint = await complaints.insert(input);
      log.info('Complaint saved', {
        displayId: complaint.displayId,
        family: complaint.family,
        priority: complaint.priority,
        source: complaint.source,
      });
      notifier.complaintCreated(complaint);
      await notifier.broadcastStats();
      return complaint;
    },

    /**
     * Open outage at the same address reported earlier today, if any.
     * A failed lookup counts as "no duplicate".
     */
    async findDuplicateOutage(address: string): Promise<Complaint | null> {
      const dayStart = startOfDay(now());
      try {
        return await complaints.findOpenOutageAt(
          address,
          dayStart.toISOString(),
          addDays(dayStart, 1).toISOString(),
        );
      } catch (err) {
        log.warn('Duplicate check failed, accepting report', { address, error: errorMessage(err) });
        return null;
      }
    },

    async submitOutage(input: Omit<NewComplaintInput, 'family'>, opts: { dedup: boolean }): Promise<IntakeResult> {
      const create = async (): Promise<IntakeResult> => {
        const complaint = await this.submit({
          ...input,
          family: 'outage_report',
          referenceNo: input.referenceNo ?? generateReferenceNo(now()),
        });
        return { kind: 'created', complaint };
      };
      if (!opts.dedup) return create();

      return lock.run(addressKey(input.address), async (): Promise<IntakeResult> => {
        const existing = await this.findDuplicateOutage(input.address);
        if (existing) {
          const identifier = duplicateIdentifier(existing);
          log.info('Duplicate outage report', { address: input.address, identifier });
          return { kind: 'duplicate', existing, identifier };
        }
        return create();
      });
    },

    /**
     * Copies a report pulled from the sibling node unless one from the same
     * contact number already exists on that calendar day.
     */
    async submitCopiedOutage(input: Omit<NewComplaintInput, 'family'> & { createdAt: string }): Promise<IntakeResult> {
      return lock.run(`contact:${input.customerContact.trim()}`, async (): Promise<IntakeResult> => {
        const dayStart = startOfDay(new Date(input.createdAt));
        const existing = await complaints.findOutageByContactOn(
          input.customerContact,
          dayStart.toISOString(),
          addDays(dayStart, 1).toISOString(),
        );
        if (existing) return { kind: 'duplicate', existing, identifier: duplicateIdentifier(existing) };
        const complaint = await this.submit({ ...input, family: 'outage_report' });
        return { kind: 'created', complaint };
      });
    },
  };
}

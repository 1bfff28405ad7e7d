import { STATUSES } from '../types/index.js';
import type { Complaint, ComplaintStatus, Family, GeoLocation } from '../types/index.js';
import {
  ConflictError,
  CrossStoreInconsistencyError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { ActionLogEntry, ComplaintRepository } from './complaint.service.js';
import type { DialogueClient } from './dialogue.service.js';
import { buildJobOrder, generateJobOrderId, type JobOrderStore } from './job-order.service.js';
import type { RealtimeNotifier } from './notification.service.js';

const log = logger.child('[lifecycle]');

export const INVALID_STATUS_MESSAGE = `Invalid status. Must be one of: ${STATUSES.join(', ')}`;

export function parseStatus(raw: unknown): ComplaintStatus | null {
  const value = typeof raw === 'string' ? raw.trim().toUpperCase() : '';
  return STATUSES.find((s) => s === value) ?? null;
}

export interface LifecycleDeps {
  complaints: ComplaintRepository;
  jobOrders: JobOrderStore;
  notifier: RealtimeNotifier;
  dialogue: DialogueClient;
  now?: () => Date;
}

export interface StatusChangeResult {
  complaint: Complaint;
  oldStatus: string;
}

export interface AssignmentResult {
  complaint: Complaint;
  jobOrderId: string;
}

export type LifecycleManager = ReturnType<typeof createLifecycleManager>;

export function createLifecycleManager(deps: LifecycleDeps) {
  const { complaints, jobOrders, notifier, dialogue } = deps;
  const now = deps.now ?? (() => new Date());

  async function requireComplaint(family: Family, recordId: number): Promise<Complaint> {
    const complaint = await complaints.findById(family, recordId);
    if (!complaint) throw new NotFoundError();
    return complaint;
  }

  // Audit rows trail the write they describe; losing one must not undo it
  async function audit(entry: ActionLogEntry): Promise<void> {
    try {
      await complaints.logAction(entry);
    } catch (err) {
      log.warn('Status log write failed', { ...entry, error: errorMessage(err) });
    }
  }

  return {
    async updateStatus(family: Family, recordId: number, rawStatus: unknown, actor?: string): Promise<StatusChangeResult> {
      const status = parseStatus(rawStatus);
      if (!status) throw new ValidationError(INVALID_STATUS_MESSAGE);

      const current = await requireComplaint(family, recordId);
      const resolvedAt = status === 'RESOLVED' ? now().toISOString() : null;
      const changed = await complaints.update(family, recordId, { status, resolvedAt });
      if (changed === 0) throw new NotFoundError();

      await audit({ family, recordId, action: 'status_changed', fromStatus: current.status, toStatus: status, actor });
      log.info('Status updated', { family, recordId, from: current.status, to: status });

      notifier.statusChanged({ family, recordId, oldStatus: current.status, newStatus: status });
      await notifier.broadcastStats();
      return { complaint: { ...current, status, resolvedAt }, oldStatus: current.status };
    },

    /** Soft delete. Hiding an already hidden complaint is a no-op. */
    async hide(family: Family, recordId: number, actor?: string): Promise<{ changed: boolean }> {
      const current = await requireComplaint(family, recordId);
      if (current.hidden) return { changed: false };

      await complaints.update(family, recordId, { hidden: true });
      await audit({ family, recordId, action: 'hidden', fromStatus: current.status, toStatus: current.status, actor });
      log.info('Complaint hidden', { family, recordId });

      notifier.complaintHidden(family, recordId);
      await notifier.broadcastStats();
      return { changed: true };
    },

    /**
     * Creates the job order, then links it to the complaint.
     * The two stores share no transaction: a failed link leaves an orphan job order
     * and raises CrossStoreInconsistencyError for manual reconciliation.
     */
    async assignJobOrder(family: Family, recordId: number, actor?: string): Promise<AssignmentResult> {
      const complaint = await requireComplaint(family, recordId);
      if (complaint.jobOrderId) {
        throw new ConflictError(`${complaint.displayId} already has job order ${complaint.jobOrderId}`);
      }

      const jobOrderId = generateJobOrderId();
      const landmark = family === 'outage_report' ? await complaints.outageLandmark(recordId) : null;
      await jobOrders.insert(buildJobOrder(complaint, jobOrderId, now(), { landmark }));

      let linked = 0;
      try {
        linked = await complaints.update(
          family,
          recordId,
          { status: 'ASSIGNED', jobOrderId, resolvedAt: null },
          { onlyIfUnlinked: true },
        );
      } catch (err) {
        const inconsistency = new CrossStoreInconsistencyError(family, recordId, jobOrderId, err);
        log.error(inconsistency.message, err, { family, recordId, jobOrderId });
        throw inconsistency;
      }
      if (linked === 0) {
        // another assignment won the race, or the row vanished
        const inconsistency = new CrossStoreInconsistencyError(family, recordId, jobOrderId);
        log.error(inconsistency.message, undefined, { family, recordId, jobOrderId });
        throw inconsistency;
      }

      await audit({
        family,
        recordId,
        action: 'job_order_assigned',
        fromStatus: complaint.status,
        toStatus: 'ASSIGNED',
        actor,
        note: jobOrderId,
      });
      log.info('Job order assigned', { family, recordId, jobOrderId });

      notifier.statusChanged({ family, recordId, oldStatus: complaint.status, newStatus: 'ASSIGNED', jobOrderId });
      await notifier.broadcastStats();
      return { complaint: { ...complaint, status: 'ASSIGNED', jobOrderId, resolvedAt: null }, jobOrderId };
    },

    async updateLocation(family: Family, recordId: number, input: { latitude: unknown; longitude: unknown; accuracy?: unknown }, actor?: string): Promise<Complaint> {
      const location = parseLocation(input);
      await requireComplaint(family, recordId);
      await complaints.update(family, recordId, location);
      await audit({
        family,
        recordId,
        action: 'location_updated',
        actor,
        note: `${location.latitude},${location.longitude}`,
      });
      return requireComplaint(family, recordId);
    },

    /** Returns the conversation to the chatbot and takes the request off the queue. */
    async resumeConversation(recordId: number, actor?: string): Promise<{ notified: boolean }> {
      const conversationId = await complaints.findConversationId(recordId);
      if (conversationId === undefined) throw new NotFoundError();

      const notified = conversationId ? await dialogue.resume(conversationId) : false;
      await complaints.markResumed(recordId);
      await audit({ family: 'agent_queue', recordId, action: 'conversation_resumed', actor, note: conversationId });

      await notifier.broadcastStats();
      return { notified };
    },
  };
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

export function parseLocation(input: { latitude: unknown; longitude: unknown; accuracy?: unknown }): GeoLocation {
  const latitude = toNumber(input.latitude);
  const longitude = toNumber(input.longitude);
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError('Invalid latitude');
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError('Invalid longitude');
  }
  const accuracy = input.accuracy === undefined || input.accuracy === null || input.accuracy === ''
    ? null
    : toNumber(input.accuracy);
  return { latitude, longitude, accuracy: accuracy !== null && Number.isFinite(accuracy) ? accuracy : null };
}

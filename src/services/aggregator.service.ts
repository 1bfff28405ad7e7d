import { addDays, startOfDay } from 'date-fns';
import { FAMILIES } from '../types/index.js';
import type { Complaint, ComplaintFilters, DashboardStats, Family } from '../types/index.js';
import { PartialFailureError, errorMessage } from '../lib/errors.js';
import { logger, type Logger } from '../lib/logger.js';
import { FAMILY_DEFS, type ComplaintRepository } from './complaint.service.js';
import { buildQuerySpec, familyCondition } from './query-spec.js';

export const STATUS_RANK: Readonly<Record<string, number>> = { NEW: 0, ASSIGNED: 1, IN_PROGRESS: 2, RESOLVED: 3 };
export const PRIORITY_RANK: Readonly<Record<string, number>> = { CRITICAL: 0, HIGH: 1, MEDIUM: 2, LOW: 3 };
const UNKNOWN_RANK = 4;

export function statusRank(status: string): number {
  return STATUS_RANK[status.toUpperCase()] ?? UNKNOWN_RANK;
}

export function priorityRank(priority: string): number {
  return PRIORITY_RANK[priority.toUpperCase()] ?? UNKNOWN_RANK;
}

function createdAtMs(c: Complaint): number {
  const ms = Date.parse(c.createdAt);
  return Number.isNaN(ms) ? 0 : ms;
}

/**
 * Triage order: (statusRank, priorityRank, -createdAt) ascending.
 * Unresolved before resolved, then most severe, then most recent.
 */
export function compareComplaints(a: Complaint, b: Complaint): number {
  return (
    statusRank(a.status) - statusRank(b.status) ||
    priorityRank(a.priority) - priorityRank(b.priority) ||
    createdAtMs(b) - createdAtMs(a)
  );
}

export function rankComplaints(complaints: Complaint[]): Complaint[] {
  return [...complaints].sort(compareComplaints);
}

export function isToday(iso: string | null, now: Date = new Date()): boolean {
  if (!iso) return false;
  const t = Date.parse(iso);
  const start = startOfDay(now).getTime();
  return t >= start && t < addDays(startOfDay(now), 1).getTime();
}

export type Aggregator = ReturnType<typeof createAggregator>;

export function createAggregator(complaints: ComplaintRepository, log: Logger = logger.child('[aggregator]')) {
  async function readFamily(family: Family, filters: ComplaintFilters): Promise<Complaint[]> {
    const spec = buildQuerySpec(filters);
    const where = familyCondition(FAMILY_DEFS[family], spec);
    if (where === null) return [];
    try {
      return await complaints.select(family, where);
    } catch (err) {
      const partial = new PartialFailureError(family, err);
      log.warn(partial.message, { family, code: partial.code });
      return [];
    }
  }

  return {
    /**
     * Merged, ranked view over all families. Never throws: a failing family is
     * skipped and an unreachable store yields an empty list.
     */
    async aggregate(filters: ComplaintFilters = {}): Promise<Complaint[]> {
      try {
        const perFamily = await Promise.all(FAMILIES.map((family) => readFamily(family, filters)));
        return rankComplaints(perFamily.flat());
      } catch (err) {
        log.error('Aggregation failed', err);
        return [];
      }
    },

    async withLocation(filters: ComplaintFilters = {}): Promise<Complaint[]> {
      const all = await this.aggregate(filters);
      return all.filter((c) => c.location !== null);
    },

    async find(family: Family, recordId: number): Promise<Complaint | null> {
      return complaints.findById(family, recordId);
    },

    async agentQueue(): Promise<Complaint[]> {
      try {
        return await complaints.queuedAgentRequests();
      } catch (err) {
        log.warn('Agent queue unavailable', { error: errorMessage(err) });
        return [];
      }
    },

    async stats(now: Date = new Date()): Promise<DashboardStats> {
      const [visible, queue] = await Promise.all([this.aggregate({}), this.agentQueue()]);
      return {
        totalActive: visible.length,
        inQueue: queue.length,
        criticalCount: visible.filter((c) => c.priority === 'CRITICAL').length,
        resolvedToday: visible.filter((c) => c.status === 'RESOLVED' && isToday(c.resolvedAt, now)).length,
      };
    },
  };
}

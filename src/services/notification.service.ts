import { NotificationDeliveryError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Complaint, DashboardStats, Family, Observer, RealtimeEvent } from '../types/index.js';

const log = logger.child('[realtime]');

export const CRITICAL_ALERT_MESSAGE = '🚨 CRITICAL PRIORITY COMPLAINT';

export type StatsProvider = () => Promise<DashboardStats>;

type StatusChange = Extract<RealtimeEvent, { type: 'status_update' }>['payload'];

/**
 * Fan-out of dashboard events to connected observers.
 * Delivery is best effort: an observer that throws is dropped, the rest still receive the event.
 */
export class RealtimeNotifier {
  private readonly observers = new Map<string, Observer>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly statsProvider: StatsProvider,
    private readonly intervalMs: number,
  ) {}

  get observerCount(): number {
    return this.observers.size;
  }

  subscribe(observer: Observer): () => void {
    this.observers.set(observer.id, observer);
    log.info('Observer connected', { observerId: observer.id, count: this.observers.size });
    this.broadcastUserCount();
    return () => this.unsubscribe(observer.id);
  }

  unsubscribe(observerId: string): void {
    if (!this.observers.delete(observerId)) return;
    log.info('Observer disconnected', { observerId, count: this.observers.size });
    this.broadcastUserCount();
  }

  /** Returns the number of observers the event reached. */
  broadcast(event: RealtimeEvent): number {
    let delivered = 0;
    for (const observer of [...this.observers.values()]) {
      try {
        observer.send(event);
        delivered++;
      } catch (err) {
        const failure = new NotificationDeliveryError(observer.id, err);
        log.warn(failure.message, { event: event.type, error: errorMessage(err) });
        this.observers.delete(observer.id);
      }
    }
    return delivered;
  }

  complaintCreated(complaint: Complaint): void {
    this.broadcast({ type: 'new_complaint', payload: complaint });
    if (complaint.priority === 'CRITICAL') {
      log.warn('Critical complaint', { displayId: complaint.displayId });
      this.broadcast({
        type: 'critical_alert',
        payload: { message: CRITICAL_ALERT_MESSAGE, sound: true, complaint },
      });
    }
  }

  statusChanged(change: StatusChange): void {
    this.broadcast({ type: 'status_update', payload: change });
  }

  complaintHidden(family: Family, recordId: number): void {
    this.broadcast({ type: 'complaint_hidden', payload: { family, recordId } });
  }

  // Never rejects; a failing stats query is logged and the tick is skipped
  async broadcastStats(): Promise<void> {
    try {
      const stats = await this.statsProvider();
      this.broadcast({ type: 'stats_update', payload: stats });
    } catch (err) {
      log.error('Stats broadcast failed', err);
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.broadcastStats();
    }, this.intervalMs);
    this.timer.unref();
    log.info('Stats broadcast started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.observers.clear();
  }

  private broadcastUserCount(): void {
    this.broadcast({ type: 'user_count_update', payload: { count: this.observers.size } });
  }
}

import { CRITICAL_ALERT_MESSAGE, RealtimeNotifier } from '../../../src/services/notification.service.js';
import type { DashboardStats } from '../../../src/types/index.js';
import { RecordingObserver, complaintFixture } from '../../helpers/fixtures.js';

const stats: DashboardStats = { totalActive: 4, inQueue: 1, criticalCount: 2, resolvedToday: 0 };

describe('RealtimeNotifier', () => {
  let notifier: RealtimeNotifier;

  beforeEach(() => {
    notifier = new RealtimeNotifier(async () => stats, 60_000);
  });

  afterEach(() => notifier.stop());

  it('broadcasts the observer count on connect and disconnect', () => {
    const first = new RecordingObserver('a');
    const second = new RecordingObserver('b');
    notifier.subscribe(first);
    const unsubscribe = notifier.subscribe(second);
    unsubscribe();

    expect(first.ofType('user_count_update').map((e) => e.payload.count)).toEqual([1, 2, 1]);
    expect(notifier.observerCount).toBe(1);
  });

  it('ignores unsubscribing an unknown observer', () => {
    const observer = new RecordingObserver();
    notifier.subscribe(observer);
    notifier.unsubscribe('nobody');
    expect(observer.events).toHaveLength(1);
  });

  it('sends a critical alert only for CRITICAL complaints', () => {
    const observer = new RecordingObserver();
    notifier.subscribe(observer);
    const critical = complaintFixture({ priority: 'CRITICAL' });

    notifier.complaintCreated(complaintFixture({ priority: 'HIGH' }));
    notifier.complaintCreated(critical);

    expect(observer.ofType('new_complaint')).toHaveLength(2);
    expect(observer.ofType('critical_alert')).toEqual([
      { type: 'critical_alert', payload: { message: CRITICAL_ALERT_MESSAGE, sound: true, complaint: critical } },
    ]);
  });

  it('drops an observer that fails and keeps delivering to the rest', () => {
    const healthy = new RecordingObserver('healthy');
    const broken = new RecordingObserver('broken');
    notifier.subscribe(healthy);
    notifier.subscribe(broken);
    broken.failing = true;

    const delivered = notifier.broadcast({ type: 'complaint_hidden', payload: { family: 'outage_report', recordId: 3 } });

    expect(delivered).toBe(1);
    expect(notifier.observerCount).toBe(1);
    expect(healthy.ofType('complaint_hidden')).toHaveLength(1);
  });

  it('broadcasts fresh stats', async () => {
    const observer = new RecordingObserver();
    notifier.subscribe(observer);
    await notifier.broadcastStats();
    expect(observer.ofType('stats_update')).toEqual([{ type: 'stats_update', payload: stats }]);
  });

  it('swallows a failing stats query', async () => {
    const failing = new RealtimeNotifier(async () => {
      throw new Error('store down');
    }, 60_000);
    const observer = new RecordingObserver();
    failing.subscribe(observer);

    await expect(failing.broadcastStats()).resolves.toBeUndefined();
    expect(observer.ofType('stats_update')).toHaveLength(0);
    failing.stop();
  });

  it('broadcasts stats on every interval tick', async () => {
    jest.useFakeTimers();
    try {
      const ticking = new RealtimeNotifier(async () => stats, 1000);
      const observer = new RecordingObserver();
      ticking.subscribe(observer);
      ticking.start();

      await jest.advanceTimersByTimeAsync(3000);
      expect(observer.ofType('stats_update')).toHaveLength(3);

      ticking.stop();
      expect(ticking.observerCount).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });
});

import { subDays } from 'date-fns';
import { Router } from 'express';
import type { Container } from '../container.js';
import { AuthError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { FEED_WINDOW_DAYS, toFeedItem } from '../services/relay.service.js';
import { actorOf, requireSession, requireSessionOrSecret, secretMatches, sendError } from '../api/middleware.js';

const log = logger.child('[webhook/sync]');

// Node-to-node traffic: push from the edge node, export feed, catch-up pull
export function syncWebhook(container: Container): Router {
  const { sync, config, complaints, relay, auth } = container;
  const router = Router();

  router.post('/api/webhook/new_complaint', async (req, res) => {
    try {
      if (config.syncSecret && !secretMatches(config.syncSecret, req.header('x-sync-secret'))) {
        throw new AuthError('Invalid sync secret');
      }
      const complaint = await sync.receive(req.body);
      res.json({ success: true, report_id: complaint.recordId, display_id: complaint.displayId });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  // Last week of outage reports, read by the sibling node when it catches up
  router.get('/api/export_complaints', requireSessionOrSecret(auth, config.syncSecret), async (_req, res) => {
    try {
      const since = subDays(new Date(), FEED_WINDOW_DAYS).toISOString();
      const rows = await complaints.outagesSince(since);
      res.json({
        success: true,
        complaints: rows.map(({ complaint, email, incidentType }) => toFeedItem(complaint, { email, incidentType })),
      });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.post('/api/sync_from_peer', requireSession(auth), async (_req, res) => {
    try {
      const items = await relay.pull();
      const result = await sync.catchUp(items);
      log.info('Catch-up requested', { by: actorOf(res), ...result });
      res.json({
        success: true,
        ...result,
        message: `Synced ${result.synced} new complaints from the sibling node`,
      });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}

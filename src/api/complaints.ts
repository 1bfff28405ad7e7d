import { Router } from 'express';
import type { Container } from '../container.js';
import type { JobOrderRow } from '../db/joblist.schema.js';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { actorOf, familyParam, filtersFromQuery, idParam, requireSession, sendError, sessionUser } from './middleware.js';

const log = logger.child('[api/complaints]');

export function complaintsApi(container: Container): Router {
  const { aggregator, lifecycle, complaints, jobOrders, auth } = container;
  const router = Router();
  const session = requireSession(auth);

  // ========== Dashboard ==========
  router.get('/', session, async (req, res) => {
    try {
      const filters = filtersFromQuery(req.query);
      const [list, stats, queue] = await Promise.all([
        aggregator.aggregate(filters),
        aggregator.stats(),
        aggregator.agentQueue(),
      ]);
      res.json({ success: true, user: sessionUser(res), filters, complaints: list, stats, queue });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/complaints', session, async (req, res) => {
    try {
      const list = await aggregator.aggregate(filtersFromQuery(req.query));
      res.json({ success: true, complaints: list, count: list.length });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/complaints_with_location', session, async (req, res) => {
    try {
      const list = await aggregator.withLocation(filtersFromQuery(req.query));
      res.json({ success: true, complaints: list, count: list.length });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/dashboard_stats', session, async (_req, res) => {
    try {
      res.json({ success: true, stats: await aggregator.stats() });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/agent_queue', session, async (_req, res) => {
    try {
      const queue = await aggregator.agentQueue();
      res.json({ success: true, queue, count: queue.length });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  // ========== Detail ==========
  router.get('/view/:family/:id', session, async (req, res) => {
    try {
      const family = familyParam(req);
      const id = idParam(req);
      const complaint = await aggregator.find(family, id);
      if (!complaint) throw new NotFoundError();
      const history = await complaints.history(family, id);
      let jobOrder: JobOrderRow | null = null;
      if (complaint.jobOrderId) {
        try {
          jobOrder = await jobOrders.findByUniqueId(complaint.jobOrderId);
        } catch (err) {
          log.warn('Job order store unavailable', { jobOrderId: complaint.jobOrderId, error: errorMessage(err) });
        }
      }
      res.json({ success: true, complaint, history, jobOrder });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/job_orders/:uniqueId', session, async (req, res) => {
    try {
      const jobOrder = await jobOrders.findByUniqueId(req.params.uniqueId ?? '');
      if (!jobOrder) throw new NotFoundError('Job order not found');
      res.json({ success: true, jobOrder });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/verify_status/:family/:id', session, async (req, res) => {
    try {
      const complaint = await aggregator.find(familyParam(req), idParam(req));
      if (!complaint) throw new NotFoundError();
      res.json({
        success: true,
        family: complaint.family,
        recordId: complaint.recordId,
        status: complaint.status,
        jobOrderId: complaint.jobOrderId,
        hidden: complaint.hidden,
      });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  // ========== Lifecycle ==========
  router.post('/update_status/:family/:id', session, async (req, res) => {
    try {
      const { complaint, oldStatus } = await lifecycle.updateStatus(
        familyParam(req),
        idParam(req),
        req.body?.status,
        actorOf(res),
      );
      res.json({
        success: true,
        message: `Status updated to ${complaint.status}`,
        oldStatus,
        newStatus: complaint.status,
      });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.post(['/hide_complaint/:family/:id', '/delete_complaint/:family/:id'], session, async (req, res) => {
    try {
      const { changed } = await lifecycle.hide(familyParam(req), idParam(req), actorOf(res));
      res.json({ success: true, changed, message: changed ? 'Complaint hidden' : 'Complaint was already hidden' });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.post('/assign_job_order/:family/:id', session, async (req, res) => {
    try {
      const { jobOrderId } = await lifecycle.assignJobOrder(familyParam(req), idParam(req), actorOf(res));
      res.json({ success: true, jobOrderId, message: `Job order ${jobOrderId} created` });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.post('/api/update_location/:family/:id', session, async (req, res) => {
    try {
      const body: { latitude?: unknown; longitude?: unknown; accuracy?: unknown } = req.body ?? {};
      const complaint = await lifecycle.updateLocation(
        familyParam(req),
        idParam(req),
        { latitude: body.latitude, longitude: body.longitude, accuracy: body.accuracy },
        actorOf(res),
      );
      res.json({ success: true, location: complaint.location });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.post('/resume_conversation/:id', session, async (req, res) => {
    try {
      const { notified } = await lifecycle.resumeConversation(idParam(req), actorOf(res));
      res.json({ success: true, notified });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}

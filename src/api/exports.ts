import { Router } from 'express';
import type { Container } from '../container.js';
import { logger } from '../lib/logger.js';
import { exportFileName, toCsv, toXlsx } from '../services/export.service.js';
import { actorOf, filtersFromQuery, requireSession, sendError } from './middleware.js';

const log = logger.child('[api/export]');

export function exportsApi(container: Container): Router {
  const { aggregator, auth } = container;
  const router = Router();
  const session = requireSession(auth);

  router.get('/api/export_csv', session, async (req, res) => {
    try {
      const list = await aggregator.aggregate(filtersFromQuery(req.query));
      const filename = exportFileName('csv');
      log.info('CSV export', { by: actorOf(res), count: list.length });
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.send(toCsv(list));
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/api/export_excel', session, async (req, res) => {
    try {
      const list = await aggregator.aggregate(filtersFromQuery(req.query));
      const filename = exportFileName('xlsx');
      const data = await toXlsx(list);
      log.info('Excel export', { by: actorOf(res), count: list.length });
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.send(data);
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}

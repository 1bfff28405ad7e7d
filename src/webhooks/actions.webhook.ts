import { Router } from 'express';
import type { Container } from '../container.js';
import { logger } from '../lib/logger.js';
import { sendError } from '../api/middleware.js';

const log = logger.child('[webhook/actions]');

// Action server endpoint called by the dialogue engine
export function actionsWebhook(container: Container): Router {
  const { actions } = container;
  const router = Router();

  router.get('/webhook/actions', (_req, res) => {
    res.json({ success: true, actions: actions.names });
  });

  router.post('/webhook/actions', async (req, res) => {
    try {
      res.json(await actions.run(req.body));
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}

import { Router } from 'express';
import type { Container } from '../container.js';
import { logger } from '../lib/logger.js';
import { bearerToken, sendError } from './middleware.js';

const log = logger.child('[api/auth]');

export function authApi(container: Container): Router {
  const { auth } = container;
  const router = Router();

  router.get('/login', (req, res) => {
    res.json({ success: true, authenticated: auth.authenticate(bearerToken(req)) !== null });
  });

  router.post('/login', async (req, res) => {
    try {
      const body: { username?: unknown; password?: unknown } = req.body ?? {};
      const { token, user } = await auth.login(body.username, body.password, req.ip);
      res.json({ success: true, token, user });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  router.get('/logout', async (req, res) => {
    try {
      const revoked = await auth.logout(bearerToken(req), req.ip);
      res.json({ success: true, revoked });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}

import { Router } from 'express';
import type { Container } from '../container.js';
import { SMS_ERROR_MESSAGE, twimlMessage } from '../adapters/sms.adapter.js';
import { logger } from '../lib/logger.js';
import { queryString } from '../api/middleware.js';

const log = logger.child('[webhook/sms]');

// Inbound SMS provider webhook (form-encoded); answers in TwiML
export function smsWebhook(container: Container): Router {
  const { sms } = container;
  const router = Router();

  router.post('/api/sms/webhook', async (req, res) => {
    try {
      const body: Record<string, unknown> = req.body ?? {};
      const reply = await sms.receive({
        from: queryString(body.From) ?? '',
        body: queryString(body.Body) ?? '',
        messageSid: queryString(body.MessageSid),
      });
      res.status(reply.status).type('text/xml').send(reply.twiml);
    } catch (e) {
      log.error('SMS webhook failed', e);
      res.status(500).type('text/xml').send(twimlMessage(SMS_ERROR_MESSAGE));
    }
  });

  return router;
}

import express, { type Express } from 'express';
import type { Container } from './container.js';
import { authApi } from './api/auth.js';
import { complaintsApi } from './api/complaints.js';
import { eventsApi } from './api/events.js';
import { exportsApi } from './api/exports.js';
import { intakeApi } from './api/intake.js';
import { actionsWebhook } from './webhooks/actions.webhook.js';
import { smsWebhook } from './webhooks/sms.webhook.js';
import { syncWebhook } from './webhooks/sync.webhook.js';

export function createApp(container: Container): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'Cooperative Complaint Triage',
      observers: container.notifier.observerCount,
      pools: [container.stores.complaints.stats, container.stores.jobOrders.stats],
      timestamp: new Date().toISOString(),
    });
  });

  // Intake (public)
  app.use(actionsWebhook(container));
  app.use(smsWebhook(container));
  app.use(syncWebhook(container));
  app.use(intakeApi(container));

  // Operator dashboard
  app.use(authApi(container));
  app.use(complaintsApi(container));
  app.use(exportsApi(container));
  app.use(eventsApi(container));

  return app;
}

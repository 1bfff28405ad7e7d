import { env } from './config/env.js';
import { createApp } from './app.js';
import { createContainer } from './container.js';
import { logger } from './lib/logger.js';

const log = logger.child('[server]');

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled promise rejection', reason);
});

// Migrate + Seed + Start
async function start() {
  const container = createContainer(env);
  await container.init();

  const app = createApp(container);
  const server = app.listen(env.port, () => {
    container.start();
    log.info('Complaint triage service running', { url: `http://localhost:${env.port}` });
    log.info('Endpoints', {
      dashboard: '/',
      events: '/api/events',
      webForm: '/api/submit_power_outage',
      sms: '/api/sms/webhook',
      chatbotActions: '/webhook/actions',
      health: '/health',
    });
  });

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    server.close(() => {
      container.stop();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  log.error('Startup failed', err);
  process.exitCode = 1;
});

import type { AxiosInstance } from 'axios';
import type { AppConfig } from './config/env.js';
import { openStores } from './db/index.js';
import { seedAdminUser } from './db/seed.js';
import { createSmsIntake } from './adapters/sms.adapter.js';
import { createSyncIntake } from './adapters/sync.adapter.js';
import { createWebFormIntake } from './adapters/webform.adapter.js';
import { createActionRegistry } from './chatbot/actions.js';
import { createAggregator } from './services/aggregator.service.js';
import { createAuthService } from './services/auth.service.js';
import { createComplaintRepository } from './services/complaint.service.js';
import { createDialogueClient } from './services/dialogue.service.js';
import { createIntakeService } from './services/intake.service.js';
import { createJobOrderStore } from './services/job-order.service.js';
import { createLifecycleManager } from './services/lifecycle.service.js';
import { RealtimeNotifier } from './services/notification.service.js';
import { createRelayClient } from './services/relay.service.js';
import { SessionStore } from './services/token.service.js';

export interface ContainerOptions {
  // outbound HTTP client shared by the relay and dialogue engine calls
  http?: AxiosInstance;
}

/** Builds every service once; nothing in the app reaches for a module-level singleton. */
export function createContainer(config: AppConfig, options: ContainerOptions = {}) {
  const stores = openStores(config);
  const complaints = createComplaintRepository(stores.complaints);
  const jobOrders = createJobOrderStore(stores.jobOrders);
  const aggregator = createAggregator(complaints);
  const notifier = new RealtimeNotifier(() => aggregator.stats(), config.statsIntervalMs);
  const sessions = new SessionStore(config.sessionTtlMinutes * 60_000);
  const auth = createAuthService(stores.complaints, sessions, config);
  const dialogue = createDialogueClient(config, options.http);
  const relay = createRelayClient(config, options.http);
  const lifecycle = createLifecycleManager({ complaints, jobOrders, notifier, dialogue });
  const intake = createIntakeService({ complaints, notifier });

  return {
    config,
    stores,
    complaints,
    jobOrders,
    aggregator,
    notifier,
    sessions,
    auth,
    lifecycle,
    intake,
    relay,
    webForm: createWebFormIntake({ intake, lifecycle, relay, autoAssign: config.autoAssignWebReports }),
    sms: createSmsIntake(intake),
    sync: createSyncIntake(intake),
    actions: createActionRegistry({ complaints, intake, lifecycle }),

    async init(): Promise<void> {
      await stores.migrate();
      await seedAdminUser(stores.complaints, { username: config.adminUsername, password: config.adminPassword });
    },

    start(): void {
      notifier.start();
      sessions.start();
    },

    stop(): void {
      notifier.stop();
      sessions.stop();
      stores.close();
    },
  };
}

export type Container = ReturnType<typeof createContainer>;

import type { AppConfig } from '../config/env.js';
import type { Logger } from '../config/logger.js';
import { createPgStore } from '../db/pgStore.js';
import type { SqlPool } from '../db/pool.js';
import type { MailGatewayStore } from '../db/store.js';
import { createAuthService } from './authService.js';
import { createExternalApiClient } from './externalApi.js';
import { createForwarder } from './forwarding.js';
import { createGraphClient } from './graphApi.js';
import { createKeyedLock } from './keyedLock.js';
import { createMailSyncService } from './mailSync.js';
import { createMicrosoftOAuthClient } from './microsoftOAuth.js';
import type { ForwardingClient, GraphClient, OAuthClient } from './ports.js';
import { createInProcessSyncTrigger, createQueueSyncTrigger } from './queue.js';
import type { SyncTrigger } from './queue.js';
import { createMaintenanceSweeps, createScheduler } from './scheduler.js';
import { createTokenCipher } from './tokenEncryption.js';
import { createWebhookService } from './webhooks.js';

export interface ServicePorts {
  store: MailGatewayStore;
  oauth: OAuthClient;
  graph: GraphClient;
  forwardingClient: ForwardingClient;
}

export const createPorts = (config: AppConfig, logger: Logger, pool: SqlPool): ServicePorts => ({
  store: createPgStore(pool, createTokenCipher(config.encryption.key, config.encryption.salt)),
  oauth: createMicrosoftOAuthClient({
    graphBaseUrl: config.microsoft.graphBaseUrl,
    timeoutMs: config.microsoft.timeoutMs,
    logger,
  }),
  graph: createGraphClient({
    baseUrl: config.microsoft.graphBaseUrl,
    timeoutMs: config.microsoft.timeoutMs,
    logger,
  }),
  forwardingClient: createExternalApiClient(),
});

/**
 * Wires the orchestrators over a set of ports. The auth and mail services
 * share one keyed lock so that per-account work is serialized across both.
 */
export const createServices = (deps: {
  config: AppConfig;
  logger: Logger;
  ports: ServicePorts;
  trigger?: SyncTrigger;
  now?: () => number;
}) => {
  const { config, logger, ports } = deps;
  const now = deps.now ?? Date.now;
  const locks = createKeyedLock();

  const auth = createAuthService({ store: ports.store, oauth: ports.oauth, config, logger, locks, now });
  const forwarder = createForwarder({ store: ports.store, client: ports.forwardingClient, config, logger, now });
  const mail = createMailSyncService({
    store: ports.store,
    graph: ports.graph,
    auth,
    forwarder,
    logger,
    locks,
    now,
  });

  const trigger = deps.trigger ?? (config.syncQueueEnabled
    ? createQueueSyncTrigger({ connectionString: config.databaseUrl, logger })
    : createInProcessSyncTrigger({
      runDeltaSync: (accountId, folderId) => mail.deltaSync({ accountId, folder: folderId }),
      logger,
    }));

  const webhooks = createWebhookService({
    store: ports.store,
    graph: ports.graph,
    auth,
    trigger,
    config,
    logger,
    now,
  });

  const maintenance = createMaintenanceSweeps({ store: ports.store, auth, webhooks, forwarder, config, logger, now });

  return {
    config,
    logger,
    store: ports.store,
    auth,
    mail,
    forwarder,
    webhooks,
    trigger,
    maintenance,
    createScheduler: () => createScheduler({ tasks: maintenance.tasks(), logger, now }),
  };
};

export type Services = ReturnType<typeof createServices>;

import crypto from 'node:crypto';
import type { AppConfig } from '../config/env.js';
import type { Logger } from '../config/logger.js';
import type { MailGatewayStore } from '../db/store.js';
import {
  AccountNotFoundError,
  ErrorCodes,
  ExternalApiError,
  InvalidWebhookNotificationError,
  UpstreamHttpError,
  ValidationError,
  WebhookNotFoundError,
  WebhookSubscriptionError,
  describeError,
} from '../shared/errors.js';
import type { WebhookSubscriptionRecord } from '../shared/types.js';
import type { AuthService } from './authService.js';
import type { GraphClient, GraphSubscription } from './ports.js';
import type { SyncTrigger } from './queue.js';

export const DEFAULT_CHANGE_TYPES = ['created', 'updated'];
const MAX_LIFETIME_MINUTES = 4230;

export interface WebhookSetupInput {
  accountId: string;
  folder?: string;
  changeTypes?: string[];
  notificationUrl?: string;
}

/** One entry of Graph's `value` array; only the routing fields are read. */
export interface WebhookChange {
  subscriptionId: string;
  clientState?: string | null;
  changeType?: string;
  resource?: string;
}

export interface NotificationBatchResult {
  accepted: string[];
  rejected: { subscriptionId: string; reason: string }[];
  // valid groups whose sync request could not be queued
  failed: string[];
}

export interface WebhookServiceDeps {
  store: MailGatewayStore;
  graph: GraphClient;
  auth: Pick<AuthService, 'getValidAccessToken'>;
  trigger: SyncTrigger;
  config: Pick<AppConfig, 'webhook'>;
  logger: Logger;
  now?: () => number;
}

const sameSecret = (expected: string, actual: string) => {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(actual, 'utf8');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

const isGone = (error: unknown) => error instanceof UpstreamHttpError && error.status === 404;

export const createWebhookService = (deps: WebhookServiceDeps) => {
  const { store, graph, auth, trigger } = deps;
  const now = deps.now ?? Date.now;
  const log = deps.logger.child({ component: 'webhooks' });
  const lifetimeMs = Math.min(deps.config.webhook.lifetimeMinutes, MAX_LIFETIME_MINUTES) * 60_000;

  const nextExpiry = () => new Date(now() + lifetimeMs);

  const requireWebhook = async (subscriptionId: string) => {
    const webhook = await store.getWebhook(subscriptionId);
    if (!webhook) {
      throw new WebhookNotFoundError(subscriptionId);
    }
    return webhook;
  };

  const setup = async (input: WebhookSetupInput): Promise<WebhookSubscriptionRecord> => {
    const notificationUrl = input.notificationUrl ?? deps.config.webhook.notificationUrl;
    if (!notificationUrl) {
      throw new ValidationError(
        'notificationUrl is required when WEBHOOK_NOTIFICATION_URL is not configured',
        {},
        ErrorCodes.MISSING_REQUIRED_FIELD,
      );
    }
    const account = await store.getAccount(input.accountId);
    if (!account) {
      throw new AccountNotFoundError(input.accountId);
    }

    const folder = input.folder ?? 'inbox';
    const changeTypes = input.changeTypes ?? DEFAULT_CHANGE_TYPES;
    const resource = `me/mailFolders('${folder}')/messages`;
    const clientState = crypto.randomBytes(32).toString('base64url');
    const accessToken = await auth.getValidAccessToken(account.id);

    let created: GraphSubscription;
    try {
      created = await graph.createSubscription(accessToken, {
        resource,
        changeTypes,
        notificationUrl,
        clientState,
        expiresAt: nextExpiry(),
      });
    } catch (error) {
      log.warn({ err: error, accountId: account.id, operation: 'setupWebhook' }, 'subscription create failed');
      if (error instanceof ExternalApiError) {
        throw new WebhookSubscriptionError(
          `Failed to create webhook subscription: ${describeError(error)}`,
          { accountId: account.id, resource },
          error,
        );
      }
      throw error;
    }

    const saved = await store.saveWebhook({
      subscriptionId: created.id,
      accountId: account.id,
      resource,
      folderId: folder,
      changeTypes,
      notificationUrl,
      clientState,
      expiresAt: created.expirationDateTime,
      isActive: true,
    });
    log.info(
      { accountId: account.id, subscriptionId: saved.subscriptionId, expiresAt: saved.expiresAt.toISOString() },
      'webhook subscription created',
    );
    return saved;
  };

  const renew = async (subscriptionId: string): Promise<WebhookSubscriptionRecord> => {
    const webhook = await requireWebhook(subscriptionId);
    if (!webhook.isActive) {
      throw new WebhookSubscriptionError('Webhook subscription is inactive', { subscriptionId });
    }
    const accessToken = await auth.getValidAccessToken(webhook.accountId);

    let renewed: GraphSubscription;
    try {
      renewed = await graph.renewSubscription(accessToken, subscriptionId, nextExpiry());
    } catch (error) {
      if (isGone(error)) {
        await store.deactivateWebhook(subscriptionId);
        log.warn({ subscriptionId, accountId: webhook.accountId }, 'subscription gone upstream, deactivated');
        throw new WebhookSubscriptionError(
          'Webhook subscription no longer exists upstream',
          { subscriptionId, deactivated: true },
          error,
        );
      }
      log.warn({ err: error, subscriptionId, operation: 'renewWebhook' }, 'subscription renew failed');
      if (error instanceof ExternalApiError) {
        throw new WebhookSubscriptionError(
          `Failed to renew webhook subscription: ${describeError(error)}`,
          { subscriptionId },
          error,
        );
      }
      throw error;
    }

    const updated = await store.updateWebhookExpiry(subscriptionId, renewed.expirationDateTime);
    if (!updated) {
      throw new WebhookNotFoundError(subscriptionId);
    }
    log.info({ subscriptionId, expiresAt: updated.expiresAt.toISOString() }, 'webhook subscription renewed');
    return updated;
  };

  const remove = async (subscriptionId: string): Promise<{ subscriptionId: string; upstreamDeleted: boolean }> => {
    const webhook = await requireWebhook(subscriptionId);
    let upstreamDeleted = false;
    if (webhook.isActive) {
      try {
        const accessToken = await auth.getValidAccessToken(webhook.accountId);
        await graph.deleteSubscription(accessToken, subscriptionId);
        upstreamDeleted = true;
      } catch (error) {
        upstreamDeleted = isGone(error);
        if (!upstreamDeleted) {
          log.warn(
            { err: error, subscriptionId, accountId: webhook.accountId, operation: 'deleteWebhook' },
            'upstream subscription delete failed, deactivating locally',
          );
        }
      }
    }
    await store.deactivateWebhook(subscriptionId);
    log.info({ subscriptionId, upstreamDeleted }, 'webhook subscription deleted');
    return { subscriptionId, upstreamDeleted };
  };

  /**
   * Validates a notification against the stored subscription and requests a
   * delta sync for its folder. The payload itself is never stored; the delta
   * endpoint is the only data source.
   */
  const handleNotification = async (
    subscriptionId: string,
    clientState: string | null | undefined,
    changes: WebhookChange[] = [],
  ): Promise<{ accountId: string; folderId: string }> => {
    const webhook = await store.getWebhook(subscriptionId);
    if (!webhook) {
      log.warn({ subscriptionId }, 'notification for unknown subscription');
      throw new InvalidWebhookNotificationError(subscriptionId, 'unknown_subscription');
    }
    if (!webhook.isActive) {
      log.warn({ subscriptionId }, 'notification for inactive subscription');
      throw new InvalidWebhookNotificationError(subscriptionId, 'inactive_subscription');
    }
    if (!clientState || !sameSecret(webhook.clientState, clientState)) {
      log.warn({ subscriptionId, accountId: webhook.accountId }, 'notification client state mismatch');
      throw new InvalidWebhookNotificationError(subscriptionId, 'client_state_mismatch');
    }

    await trigger.requestDeltaSync(webhook.accountId, webhook.folderId);
    log.debug(
      { subscriptionId, accountId: webhook.accountId, changes: changes.length },
      'delta sync requested from notification',
    );
    return { accountId: webhook.accountId, folderId: webhook.folderId };
  };

  const handleNotifications = async (changes: WebhookChange[]): Promise<NotificationBatchResult> => {
    const groups = new Map<string, WebhookChange[]>();
    for (const change of changes) {
      const group = groups.get(change.subscriptionId);
      if (group) {
        group.push(change);
      } else {
        groups.set(change.subscriptionId, [change]);
      }
    }

    const result: NotificationBatchResult = { accepted: [], rejected: [], failed: [] };
    for (const [subscriptionId, group] of groups) {
      // Every change in a group must carry the stored client state.
      const states = new Set(group.map((change) => change.clientState ?? ''));
      const clientState = states.size === 1 ? group[0]?.clientState : null;
      try {
        await handleNotification(subscriptionId, clientState, group);
        result.accepted.push(subscriptionId);
      } catch (error) {
        if (error instanceof InvalidWebhookNotificationError) {
          const reason = error.details.reason;
          result.rejected.push({ subscriptionId, reason: typeof reason === 'string' ? reason : 'invalid' });
          continue;
        }
        log.error({ err: error, subscriptionId }, 'failed to handle webhook notification group');
        result.failed.push(subscriptionId);
      }
    }
    return result;
  };

  const list = (accountId?: string) => store.listWebhooks(accountId);

  return {
    setup,
    renew,
    remove,
    handleNotification,
    handleNotifications,
    list,
  };
};

export type WebhookService = ReturnType<typeof createWebhookService>;

import { setTimeout as delay } from 'node:timers/promises';
import type { AppConfig } from '../config/env.js';
import type { Logger } from '../config/logger.js';
import type { MailGatewayStore, PurgeResult } from '../db/store.js';
import { describeError } from '../shared/errors.js';
import type { AuthService } from './authService.js';
import type { Forwarder, RetrySweepResult } from './forwarding.js';
import type { WebhookService } from './webhooks.js';

const DAY_MS = 24 * 60 * 60_000;

export type TaskName = 'tokenRefresh' | 'webhookRenewal' | 'failedCallRetry' | 'cleanup';

export interface ScheduledTask {
  name: TaskName;
  intervalMs: number;
  run: () => Promise<unknown>;
}

export interface SweepResult {
  processed: number;
  succeeded: number;
  failed: number;
}

export interface MaintenanceDeps {
  store: MailGatewayStore;
  auth: Pick<AuthService, 'refreshToken'>;
  webhooks: Pick<WebhookService, 'renew'>;
  forwarder: Pick<Forwarder, 'retryFailedCalls'>;
  config: Pick<AppConfig, 'scheduler'>;
  logger: Logger;
  now?: () => number;
}

/**
 * The four sweeps. Each isolates its items: one failing refresh or renewal is
 * logged and the rest proceed.
 */
export const createMaintenanceSweeps = (deps: MaintenanceDeps) => {
  const { store, auth, webhooks, forwarder } = deps;
  const settings = deps.config.scheduler;
  const now = deps.now ?? Date.now;
  const log = deps.logger.child({ component: 'maintenance' });

  const refreshExpiringTokens = async (): Promise<SweepResult> => {
    const tokens = await store.listTokensExpiringBefore(new Date(now() + settings.tokenRefreshLeadMs));
    const result: SweepResult = { processed: tokens.length, succeeded: 0, failed: 0 };
    for (const token of tokens) {
      try {
        await auth.refreshToken(token.accountId);
        result.succeeded += 1;
      } catch (error) {
        result.failed += 1;
        log.warn({ err: error, accountId: token.accountId, operation: 'tokenRefresh' }, 'scheduled token refresh failed');
      }
    }
    if (result.processed > 0) {
      log.info(result, 'token refresh sweep finished');
    }
    return result;
  };

  const renewExpiringWebhooks = async (): Promise<SweepResult> => {
    const expiring = await store.listWebhooksExpiringBefore(new Date(now() + settings.webhookRenewalLeadMs));
    const result: SweepResult = { processed: expiring.length, succeeded: 0, failed: 0 };
    for (const webhook of expiring) {
      try {
        await webhooks.renew(webhook.subscriptionId);
        result.succeeded += 1;
      } catch (error) {
        result.failed += 1;
        log.warn(
          { err: error, subscriptionId: webhook.subscriptionId, accountId: webhook.accountId, operation: 'webhookRenewal' },
          'scheduled webhook renewal failed',
        );
      }
    }
    if (result.processed > 0) {
      log.info(result, 'webhook renewal sweep finished');
    }
    return result;
  };

  const retryFailedCalls = async (): Promise<RetrySweepResult> => {
    const result = await forwarder.retryFailedCalls();
    if (result.attempted > 0) {
      log.info(result, 'external call retry sweep finished');
    }
    return result;
  };

  const cleanup = async (): Promise<PurgeResult> => {
    const nowMs = now();
    const result = await store.purge({
      tokensBefore: new Date(nowMs - settings.tokenRetentionDays * DAY_MS),
      logsBefore: new Date(nowMs - settings.logRetentionDays * DAY_MS),
      webhooksBefore: new Date(nowMs - settings.webhookRetentionDays * DAY_MS),
      oauthStatesBefore: new Date(nowMs),
    });
    log.info(result, 'cleanup sweep finished');
    return result;
  };

  const tasks = (): ScheduledTask[] => [
    { name: 'tokenRefresh', intervalMs: settings.tokenRefreshIntervalMs, run: refreshExpiringTokens },
    { name: 'webhookRenewal', intervalMs: settings.webhookRenewalIntervalMs, run: renewExpiringWebhooks },
    { name: 'failedCallRetry', intervalMs: settings.failedCallRetryIntervalMs, run: retryFailedCalls },
    { name: 'cleanup', intervalMs: settings.cleanupIntervalMs, run: cleanup },
  ];

  return {
    refreshExpiringTokens,
    renewExpiringWebhooks,
    retryFailedCalls,
    cleanup,
    tasks,
  };
};

export type MaintenanceSweeps = ReturnType<typeof createMaintenanceSweeps>;

export interface TaskStatus {
  name: TaskName;
  intervalMs: number;
  state: 'stopped' | 'idle' | 'running';
  runs: number;
  failures: number;
  lastStartedAt: Date | null;
  lastFinishedAt: Date | null;
  lastError: string | null;
}

export type WaitFn = (ms: number, signal: AbortSignal) => Promise<void>;

const abortableWait: WaitFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

/**
 * One independent loop per task. A loop's iteration failing is recorded and
 * logged; the loop carries on at its next interval. `stop()` resolves only
 * once every in-flight iteration has finished.
 */
export const createScheduler = (options: {
  tasks: ScheduledTask[];
  logger: Logger;
  wait?: WaitFn;
  now?: () => number;
}) => {
  const log = options.logger.child({ component: 'scheduler' });
  const wait = options.wait ?? abortableWait;
  const now = options.now ?? Date.now;

  const statuses = new Map<TaskName, TaskStatus>(
    options.tasks.map((task) => [task.name, {
      name: task.name,
      intervalMs: task.intervalMs,
      state: 'stopped',
      runs: 0,
      failures: 0,
      lastStartedAt: null,
      lastFinishedAt: null,
      lastError: null,
    }]),
  );

  let controller: AbortController | null = null;
  let loops: Promise<void>[] = [];

  const runOnce = async (task: ScheduledTask, status: TaskStatus) => {
    status.state = 'running';
    status.lastStartedAt = new Date(now());
    try {
      await task.run();
      status.lastError = null;
    } catch (error) {
      status.failures += 1;
      status.lastError = describeError(error);
      log.error({ err: error, task: task.name }, 'scheduled task failed');
    } finally {
      status.runs += 1;
      status.lastFinishedAt = new Date(now());
      status.state = 'idle';
    }
  };

  const loop = async (task: ScheduledTask, signal: AbortSignal) => {
    const status = statuses.get(task.name);
    if (!status) {
      return;
    }
    status.state = 'idle';
    while (!signal.aborted) {
      await runOnce(task, status);
      if (signal.aborted) {
        break;
      }
      await wait(task.intervalMs, signal);
    }
    status.state = 'stopped';
  };

  const start = () => {
    if (controller) {
      log.warn('scheduler already running');
      return;
    }
    const current = new AbortController();
    controller = current;
    loops = options.tasks.map((task) => loop(task, current.signal));
    log.info({ tasks: options.tasks.map((task) => task.name) }, 'scheduler started');
  };

  const stop = async () => {
    if (!controller) {
      return;
    }
    controller.abort();
    const running = loops;
    controller = null;
    loops = [];
    await Promise.all(running);
    log.info('scheduler stopped');
  };

  const status = (): TaskStatus[] =>
    [...statuses.values()].map((entry) => ({ ...entry }));

  return {
    start,
    stop,
    status,
    isRunning: () => controller !== null,
  };
};

export type Scheduler = ReturnType<typeof createScheduler>;

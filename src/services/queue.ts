import { makeWorkerUtils } from 'graphile-worker';
import type { WorkerUtils } from 'graphile-worker';
import { z } from 'zod';
import type { Logger } from '../config/logger.js';

export const DELTA_SYNC_TASK = 'deltaSync';

export const deltaSyncPayloadSchema = z.object({
  accountId: z.string().uuid(),
  folderId: z.string().min(1),
});

export type DeltaSyncJobPayload = z.infer<typeof deltaSyncPayloadSchema>;

export const deltaSyncJobKey = (accountId: string, folderId: string) => `delta:${accountId}:${folderId}`;

/**
 * Where webhook notifications send their work. Requests for the same
 * (account, folder) made while one is outstanding collapse into a single
 * follow-up run.
 */
export interface SyncTrigger {
  requestDeltaSync(accountId: string, folderId: string): Promise<void>;
  close(): Promise<void>;
}

export const createQueueSyncTrigger = (options: {
  connectionString: string;
  logger: Logger;
  maxAttempts?: number;
}): SyncTrigger => {
  const log = options.logger.child({ component: 'sync-queue' });
  let utils: Promise<WorkerUtils> | null = null;

  const getUtils = () => {
    if (!utils) {
      utils = makeWorkerUtils({ connectionString: options.connectionString });
    }
    return utils;
  };

  return {
    requestDeltaSync: async (accountId, folderId) => {
      const queue = await getUtils();
      const payload: DeltaSyncJobPayload = { accountId, folderId };
      await queue.addJob(DELTA_SYNC_TASK, payload, {
        maxAttempts: options.maxAttempts ?? 5,
        jobKey: deltaSyncJobKey(accountId, folderId),
        // a job already running for the key gets one more run after it
        jobKeyMode: 'preserve_run_at',
      });
      log.debug({ accountId, folderId }, 'delta sync job queued');
    },
    close: async () => {
      if (!utils) {
        return;
      }
      const queue = await utils;
      utils = null;
      await queue.release();
    },
  };
};

export type InProcessSyncTrigger = SyncTrigger & { whenIdle(): Promise<void> };

/** Runs delta syncs detached from the caller, in this process. */
export const createInProcessSyncTrigger = (options: {
  runDeltaSync: (accountId: string, folderId: string) => Promise<unknown>;
  logger: Logger;
}): InProcessSyncTrigger => {
  const log = options.logger.child({ component: 'sync-trigger' });
  // key -> whether another run was requested while this one was going
  const pending = new Map<string, boolean>();
  const inFlight = new Set<Promise<void>>();

  const drain = async (key: string, accountId: string, folderId: string) => {
    try {
      do {
        pending.set(key, false);
        try {
          await options.runDeltaSync(accountId, folderId);
        } catch (error) {
          log.error({ err: error, accountId, folderId }, 'in-process delta sync failed');
        }
      } while (pending.get(key));
    } finally {
      pending.delete(key);
    }
  };

  return {
    requestDeltaSync: async (accountId, folderId) => {
      const key = deltaSyncJobKey(accountId, folderId);
      if (pending.has(key)) {
        pending.set(key, true);
        return;
      }
      pending.set(key, false);
      const run = drain(key, accountId, folderId);
      inFlight.add(run);
      void run.finally(() => inFlight.delete(run));
    },
    whenIdle: async () => {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },
    close: async () => {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },
  };
};

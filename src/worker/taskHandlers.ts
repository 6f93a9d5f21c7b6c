import type { Job, TaskList } from 'graphile-worker';
import type { Logger } from '../config/logger.js';
import { AccountNotFoundError, NoValidTokenError } from '../shared/errors.js';
import type { MailSyncService } from '../services/mailSync.js';
import { DELTA_SYNC_TASK, deltaSyncPayloadSchema } from '../services/queue.js';

export const deltaSyncTask = (
  mail: Pick<MailSyncService, 'deltaSync'>,
  logger: Logger,
) => async (payload: unknown, helpers: { job: Pick<Job, 'id'> }) => {
  const parsed = deltaSyncPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    logger.error({ jobId: helpers.job.id, issues: parsed.error.issues }, 'dropping malformed deltaSync job');
    return;
  }
  const { accountId, folderId } = parsed.data;
  try {
    const result = await mail.deltaSync({ accountId, folder: folderId });
    logger.debug({ jobId: helpers.job.id, accountId, folderId, accounts: result.accounts.length }, 'deltaSync job done');
  } catch (error) {
    // Retrying cannot help until the account is authenticated again.
    if (error instanceof NoValidTokenError || error instanceof AccountNotFoundError) {
      logger.warn({ jobId: helpers.job.id, accountId, folderId, err: error }, 'deltaSync job abandoned');
      return;
    }
    throw error;
  }
};

export const createTaskList = (mail: Pick<MailSyncService, 'deltaSync'>, logger: Logger): TaskList => ({
  [DELTA_SYNC_TASK]: deltaSyncTask(mail, logger.child({ component: 'worker' })),
});

import type { Logger } from '../config/logger.js';
import type { HistoryFilter, MailGatewayStore } from '../db/store.js';
import {
  AccountNotFoundError,
  DeltaLinkExpiredError,
  ErrorCodes,
  ExternalApiError,
  MailSendError,
  NoValidTokenError,
  ValidationError,
  describeError,
} from '../shared/errors.js';
import type { AccountRecord, MailMessageRecord, QueryType } from '../shared/types.js';
import type { AuthService } from './authService.js';
import type { Forwarder } from './forwarding.js';
import {
  buildMessageFilter,
  extractDeltaToken,
  toGraphOutgoingMessage,
  toMailMessage,
} from './graphMessages.js';
import type { GraphMessage, MailQueryFilters, OutgoingMail } from './graphMessages.js';
import { createKeyedLock } from './keyedLock.js';
import type { KeyedLock } from './keyedLock.js';
import type { DeltaPage, GraphClient } from './ports.js';

export const DEFAULT_FOLDER = 'inbox';
export const DEFAULT_TOP = 50;
export const MAX_TOP = 1000;

export interface MailQueryInput {
  accountId?: string | null;
  folder?: string;
  filters?: MailQueryFilters;
  top?: number;
  select?: string[];
}

export interface SkippedAccount {
  accountId: string;
  reason: 'reauthentication_required' | 'inactive' | 'error';
  message: string;
}

export interface AccountQueryResult {
  accountId: string;
  messagesFound: number;
  newMessages: number;
}

export interface MailQueryResult {
  messages: MailMessageRecord[];
  totalFound: number;
  newCount: number;
  accounts: AccountQueryResult[];
  skipped: SkippedAccount[];
}

export interface DeltaSyncAccountResult {
  accountId: string;
  folder: string;
  new: number;
  updated: number;
  deleted: number;
  baseline: boolean;
  nextToken: string | null;
}

export interface DeltaSyncResult {
  accounts: DeltaSyncAccountResult[];
  skipped: SkippedAccount[];
}

export interface SendMailInput extends OutgoingMail {
  accountId: string;
  saveToSentItems?: boolean;
}

export interface MailSyncDeps {
  store: MailGatewayStore;
  graph: GraphClient;
  auth: Pick<AuthService, 'getValidAccessToken'>;
  forwarder: Pick<Forwarder, 'forwardMessage'>;
  logger: Logger;
  locks?: KeyedLock;
  now?: () => number;
}

const describeFilters = (filters: MailQueryFilters) => ({
  ...(filters.dateFrom ? { dateFrom: filters.dateFrom.toISOString() } : {}),
  ...(filters.dateTo ? { dateTo: filters.dateTo.toISOString() } : {}),
  ...(filters.senderEmail ? { senderEmail: filters.senderEmail } : {}),
  ...(filters.isRead !== undefined ? { isRead: filters.isRead } : {}),
  ...(filters.importance ? { importance: filters.importance } : {}),
  ...(filters.subjectContains ? { subjectContains: filters.subjectContains } : {}),
  ...(filters.search ? { search: filters.search } : {}),
});

const skipReasonOf = (error: unknown): SkippedAccount['reason'] =>
  error instanceof NoValidTokenError ? 'reauthentication_required' : 'error';

/**
 * Manual queries, delta sync and send. Mail work for one account runs under
 * the `mail:<accountId>` lock; dedup itself is the store's
 * insert-if-absent, so concurrent paths still produce one row per message.
 */
export const createMailSyncService = (deps: MailSyncDeps) => {
  const { store, graph, auth, forwarder } = deps;
  const locks = deps.locks ?? createKeyedLock();
  const now = deps.now ?? Date.now;
  const log = deps.logger.child({ component: 'mail-sync' });

  const mailLock = <T>(accountId: string, fn: () => Promise<T>) => locks.run(`mail:${accountId}`, fn);

  const resolveTargets = async (accountId: string | null | undefined) => {
    if (accountId) {
      const account = await store.getAccount(accountId);
      if (!account) {
        throw new AccountNotFoundError(accountId);
      }
      return { batch: false, accounts: [account] };
    }
    const accounts = await store.listAccounts();
    return { batch: true, accounts };
  };

  const recordHistory = async (entry: {
    accountId: string;
    queryType: QueryType;
    queryParameters: Record<string, unknown>;
    messagesFound: number;
    newMessages: number;
    startedAt: number;
    error?: unknown;
  }) => {
    try {
      await store.appendQueryHistory({
        accountId: entry.accountId,
        queryType: entry.queryType,
        queryParameters: entry.queryParameters,
        messagesFound: entry.messagesFound,
        newMessages: entry.newMessages,
        executionTimeMs: Math.max(0, now() - entry.startedAt),
        success: entry.error === undefined,
        errorMessage: entry.error === undefined ? null : describeError(entry.error),
      });
    } catch (historyError) {
      log.error({ err: historyError, accountId: entry.accountId }, 'failed to append query history');
    }
  };

  const forwardStored = async (account: AccountRecord, message: MailMessageRecord) => {
    try {
      await forwarder.forwardMessage(account, message);
    } catch (error) {
      log.error(
        { err: error, accountId: account.id, messageId: message.messageId },
        'failed to record external forwarding',
      );
    }
  };

  // New messages are forwarded as they are stored, before anything later in
  // the round can fail.
  const storeMessages = async (account: AccountRecord, folder: string, graphMessages: GraphMessage[]) => {
    const all: MailMessageRecord[] = [];
    const inserted: MailMessageRecord[] = [];
    const existing: MailMessageRecord[] = [];
    for (const graphMessage of graphMessages) {
      const result = await store.insertMessageIfAbsent(toMailMessage(account, folder, graphMessage));
      all.push(result.message);
      if (result.inserted) {
        inserted.push(result.message);
        await forwardStored(account, result.message);
      } else {
        existing.push(result.message);
      }
    }
    return { all, inserted, existing };
  };

  // Batch mode isolates each account; single-account mode raises.
  const runPerAccount = async <R>(
    batch: boolean,
    accounts: AccountRecord[],
    operation: string,
    fn: (account: AccountRecord) => Promise<R>,
  ) => {
    const results: R[] = [];
    const skipped: SkippedAccount[] = [];
    for (const account of accounts) {
      if (batch && account.status !== 'active') {
        skipped.push({ accountId: account.id, reason: 'inactive', message: `Account is ${account.status}` });
        continue;
      }
      try {
        results.push(await fn(account));
      } catch (error) {
        if (!batch) {
          throw error;
        }
        const reason = skipReasonOf(error);
        skipped.push({ accountId: account.id, reason, message: describeError(error) });
        if (reason === 'reauthentication_required') {
          log.warn({ accountId: account.id, operation }, 'skipping account without a valid token');
        } else {
          log.error({ err: error, accountId: account.id, operation }, 'account failed during batch');
        }
      }
    }
    return { results, skipped };
  };

  const queryAccount = async (
    account: AccountRecord,
    folder: string,
    filters: MailQueryFilters,
    top: number,
    select: string[] | undefined,
  ) => mailLock(account.id, async () => {
    const startedAt = now();
    const queryParameters = { folder, top, ...describeFilters(filters) };
    try {
      const accessToken = await auth.getValidAccessToken(account.id);
      const graphMessages = await graph.listMessages(accessToken, {
        folder,
        filter: buildMessageFilter(filters),
        search: filters.search ?? null,
        ...(select ? { select } : {}),
        top,
        orderBy: filters.search ? null : 'receivedDateTime desc',
      });
      const stored = await storeMessages(account, folder, graphMessages);
      await recordHistory({
        accountId: account.id,
        queryType: 'manual',
        queryParameters,
        messagesFound: graphMessages.length,
        newMessages: stored.inserted.length,
        startedAt,
      });
      log.info(
        { accountId: account.id, folder, found: graphMessages.length, new: stored.inserted.length },
        'mail query completed',
      );
      return { accountId: account.id, messages: stored.all, newMessages: stored.inserted.length };
    } catch (error) {
      await recordHistory({
        accountId: account.id,
        queryType: 'manual',
        queryParameters,
        messagesFound: 0,
        newMessages: 0,
        startedAt,
        error,
      });
      throw error;
    }
  });

  const query = async (input: MailQueryInput): Promise<MailQueryResult> => {
    const folder = input.folder ?? DEFAULT_FOLDER;
    const filters = input.filters ?? {};
    const top = input.top ?? DEFAULT_TOP;
    if (!Number.isInteger(top) || top < 1 || top > MAX_TOP) {
      throw new ValidationError(`top must be an integer between 1 and ${MAX_TOP}`, { top }, ErrorCodes.INVALID_INPUT);
    }
    if (filters.dateFrom && filters.dateTo && filters.dateFrom > filters.dateTo) {
      throw new ValidationError('dateFrom must not be after dateTo', describeFilters(filters));
    }

    const { batch, accounts } = await resolveTargets(input.accountId);
    const { results, skipped } = await runPerAccount(batch, accounts, 'query', (account) =>
      queryAccount(account, folder, filters, top, input.select));

    const messages = results.flatMap((result) => result.messages);
    return {
      messages,
      totalFound: messages.length,
      newCount: results.reduce((sum, result) => sum + result.newMessages, 0),
      accounts: results.map((result) => ({
        accountId: result.accountId,
        messagesFound: result.messages.length,
        newMessages: result.newMessages,
      })),
      skipped,
    };
  };

  const fetchDelta = async (account: AccountRecord, folder: string, accessToken: string) => {
    const link = await store.getActiveDeltaLink(account.id, folder);
    if (!link) {
      return { page: await graph.getDeltaMessages(accessToken, { folder, deltaToken: null }), baseline: true };
    }

    let page: DeltaPage;
    try {
      page = await graph.getDeltaMessages(accessToken, { folder, deltaToken: link.deltaToken });
    } catch (error) {
      if (!(error instanceof DeltaLinkExpiredError)) {
        throw error;
      }
      log.warn({ accountId: account.id, folder }, 'delta link expired, running a baseline round');
      await store.deactivateDeltaLinks(account.id, folder);
      return { page: await graph.getDeltaMessages(accessToken, { folder, deltaToken: null }), baseline: true };
    }
    await store.touchDeltaLink(link.id, new Date(now()));
    return { page, baseline: false };
  };

  const deltaSyncAccount = (account: AccountRecord, folder: string) => mailLock(account.id, async () => {
    const startedAt = now();
    let baseline = false;
    try {
      const accessToken = await auth.getValidAccessToken(account.id);
      const fetched = await fetchDelta(account, folder, accessToken);
      baseline = fetched.baseline;
      const { page } = fetched;

      const stored = await storeMessages(account, folder, page.messages);
      let updated = 0;
      for (const message of stored.existing) {
        const source = page.messages.find((candidate) => candidate.id === message.messageId);
        const refreshed = await store.refreshMessageFlags(account.id, message.messageId, {
          isRead: source?.isRead ?? message.isRead,
          categories: source?.categories ?? message.categories,
        });
        if (refreshed) {
          updated += 1;
        }
      }

      const nextToken = page.deltaLink ? extractDeltaToken(page.deltaLink) : null;
      if (nextToken) {
        await store.saveDeltaLink(account.id, folder, nextToken);
      } else {
        log.warn({ accountId: account.id, folder }, 'delta round ended without a delta link');
      }

      await recordHistory({
        accountId: account.id,
        queryType: 'delta',
        queryParameters: { folder, baseline },
        messagesFound: page.messages.length,
        newMessages: stored.inserted.length,
        startedAt,
      });

      const result: DeltaSyncAccountResult = {
        accountId: account.id,
        folder,
        new: stored.inserted.length,
        updated,
        deleted: page.removedIds.length,
        baseline,
        nextToken,
      };
      log.info(
        { accountId: account.id, folder, new: result.new, updated, deleted: result.deleted, baseline },
        'delta sync completed',
      );
      return result;
    } catch (error) {
      await recordHistory({
        accountId: account.id,
        queryType: 'delta',
        queryParameters: { folder, baseline },
        messagesFound: 0,
        newMessages: 0,
        startedAt,
        error,
      });
      throw error;
    }
  });

  const deltaSync = async (input: { accountId?: string | null; folder?: string }): Promise<DeltaSyncResult> => {
    const folder = input.folder ?? DEFAULT_FOLDER;
    const { batch, accounts } = await resolveTargets(input.accountId);
    const { results, skipped } = await runPerAccount(batch, accounts, 'deltaSync', (account) =>
      deltaSyncAccount(account, folder));
    return { accounts: results, skipped };
  };

  const send = async (input: SendMailInput): Promise<{ accountId: string; messageId: string | null; sentAt: Date }> => {
    const recipients = [...input.to, ...(input.cc ?? []), ...(input.bcc ?? [])];
    if (recipients.length === 0) {
      throw new ValidationError('At least one recipient is required', {}, ErrorCodes.MISSING_REQUIRED_FIELD);
    }
    const account = await store.getAccount(input.accountId);
    if (!account) {
      throw new AccountNotFoundError(input.accountId);
    }

    const accessToken = await auth.getValidAccessToken(account.id);
    try {
      const result = await graph.sendMail(accessToken, {
        message: toGraphOutgoingMessage(input),
        saveToSentItems: input.saveToSentItems ?? true,
      });
      log.info({ accountId: account.id, recipients: recipients.length }, 'mail sent');
      return { accountId: account.id, messageId: result.messageId, sentAt: new Date(now()) };
    } catch (error) {
      log.warn({ err: error, accountId: account.id, operation: 'send' }, 'mail send failed');
      if (error instanceof ExternalApiError) {
        throw new MailSendError(account.id, error);
      }
      throw error;
    }
  };

  const listQueryHistory = (filter: HistoryFilter) => store.listQueryHistory(filter);

  return {
    query,
    deltaSync,
    send,
    listQueryHistory,
  };
};

export type MailSyncService = ReturnType<typeof createMailSyncService>;

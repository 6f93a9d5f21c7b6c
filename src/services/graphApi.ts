import { z } from 'zod';
import type { Logger } from '../config/logger.js';
import {
  DeltaLinkExpiredError,
  ErrorCodes,
  ExternalApiError,
  UpstreamHttpError,
} from '../shared/errors.js';
import { graphMessageSchema, isRemovedEntry } from './graphMessages.js';
import type { GraphMessage } from './graphMessages.js';
import { defaultSleep, fetchWithTimeout, nextBackoffMs, parseRetryAfterMs, readBody } from './http.js';
import type { FetchLike, Sleep } from './http.js';
import type { DeltaPage, GraphClient, GraphSubscription } from './ports.js';

const DEFAULT_SELECT = [
  'id',
  'internetMessageId',
  'subject',
  'bodyPreview',
  'body',
  'importance',
  'isRead',
  'hasAttachments',
  'receivedDateTime',
  'sentDateTime',
  'from',
  'sender',
  'toRecipients',
  'ccRecipients',
  'bccRecipients',
  'parentFolderId',
  'categories',
];

const SYNC_STATE_ERROR = /syncstatenotfound|syncstateinvalid|resyncrequired/i;

const graphErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

const messagePageSchema = z.object({
  value: z.array(graphMessageSchema),
  '@odata.nextLink': z.string().optional(),
  '@odata.deltaLink': z.string().optional(),
});

const subscriptionSchema = z.object({
  id: z.string().min(1),
  resource: z.string(),
  changeType: z.string(),
  notificationUrl: z.string(),
  clientState: z.string().nullish(),
  expirationDateTime: z.string().datetime({ offset: true }),
});

export const parseGraphError = (body: unknown) => {
  const parsed = graphErrorSchema.safeParse(body);
  return parsed.success
    ? { code: parsed.data.error.code ?? null, description: parsed.data.error.message ?? null }
    : { code: null, description: typeof body === 'string' ? body.slice(0, 500) : null };
};

const unexpectedPayload = (operation: string, issues: z.ZodIssue[]) =>
  new ExternalApiError(
    ErrorCodes.EXTERNAL_API_ERROR,
    `${operation}: unexpected response payload`,
    false,
    { operation, issues: issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
  );

const toSubscription = (operation: string, body: unknown): GraphSubscription => {
  const parsed = subscriptionSchema.safeParse(body);
  if (!parsed.success) {
    throw unexpectedPayload(operation, parsed.error.issues);
  }
  return {
    id: parsed.data.id,
    resource: parsed.data.resource,
    changeType: parsed.data.changeType,
    notificationUrl: parsed.data.notificationUrl,
    clientState: parsed.data.clientState ?? null,
    expirationDateTime: new Date(parsed.data.expirationDateTime),
  };
};

// Delegated tokens always address the signed-in mailbox.
const folderPath = (folder: string) => `/me/mailFolders/${encodeURIComponent(folder)}/messages`;

export interface GraphApiOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  maxAttempts?: number;
  maxDeltaPages?: number;
}

/**
 * Microsoft Graph v1.0 over plain fetch. Throttling (429), 408 and 5xx
 * answers and transport timeouts are retried with exponential backoff,
 * honouring Retry-After; other rejections are raised at once.
 */
export const createGraphClient = (options: GraphApiOptions): GraphClient => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const maxDeltaPages = options.maxDeltaPages ?? 50;
  const log = options.logger.child({ component: 'graph-api' });

  const request = async (
    operation: string,
    accessToken: string,
    pathOrUrl: string,
    init: { method?: string; body?: unknown } = {},
  ): Promise<{ status: number; body: unknown }> => {
    const url = pathOrUrl.startsWith('https://') || pathOrUrl.startsWith('http://')
      ? pathOrUrl
      : `${options.baseUrl}${pathOrUrl}`;

    for (let attempt = 0; ; attempt += 1) {
      const lastAttempt = attempt >= maxAttempts - 1;
      let response: Response;
      try {
        response = await fetchWithTimeout(
          fetchImpl,
          operation,
          url,
          {
            method: init.method ?? 'GET',
            headers: {
              Authorization: `Bearer ${accessToken}`,
              Accept: 'application/json',
              ...(init.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
            },
            ...(init.body !== undefined ? { body: JSON.stringify(init.body) } : {}),
          },
          options.timeoutMs,
        );
      } catch (error) {
        if (lastAttempt || !(error instanceof ExternalApiError) || !error.retryable) {
          throw error;
        }
        log.warn({ operation, attempt: attempt + 1, err: error }, 'graph request failed, retrying');
        await sleep(nextBackoffMs(attempt));
        continue;
      }

      if (response.ok) {
        const body = response.status === 202 || response.status === 204 ? null : await readBody(response);
        return { status: response.status, body };
      }

      const provider = parseGraphError(await readBody(response));
      const error = new UpstreamHttpError(operation, response.status, {
        ...provider,
        retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after')),
      });
      if (!error.retryable || lastAttempt) {
        throw error;
      }
      log.warn({ operation, attempt: attempt + 1, status: response.status }, 'graph request throttled, retrying');
      await sleep(error.retryAfterMs ?? nextBackoffMs(attempt));
    }
  };

  const readPage = async (operation: string, accessToken: string, url: string) => {
    const { body } = await request(operation, accessToken, url);
    const parsed = messagePageSchema.safeParse(body);
    if (!parsed.success) {
      throw unexpectedPayload(operation, parsed.error.issues);
    }
    return parsed.data;
  };

  return {
    listMessages: async (accessToken, params) => {
      const search = new URLSearchParams();
      search.set('$top', String(params.top));
      search.set('$select', (params.select ?? DEFAULT_SELECT).join(','));
      if (params.filter) {
        search.set('$filter', params.filter);
      }
      if (params.search) {
        search.set('$search', `"${params.search.replace(/"/g, '')}"`);
      } else if (params.orderBy) {
        search.set('$orderby', params.orderBy);
      }
      const page = await readPage(
        'listMessages',
        accessToken,
        `${folderPath(params.folder)}?${search.toString()}`,
      );
      return page.value;
    },

    getDeltaMessages: async (accessToken, params): Promise<DeltaPage> => {
      const initial = new URLSearchParams();
      if (params.deltaToken) {
        initial.set('$deltatoken', params.deltaToken);
      } else {
        initial.set('$select', DEFAULT_SELECT.join(','));
      }

      let url: string | null = `${folderPath(params.folder)}/delta?${initial.toString()}`;
      const messages: GraphMessage[] = [];
      const removedIds: string[] = [];

      for (let pageCount = 0; url; pageCount += 1) {
        if (pageCount >= maxDeltaPages) {
          log.warn({ folder: params.folder, pages: pageCount }, 'delta sync stopped at page limit');
          return { messages, removedIds, deltaLink: null };
        }

        let page: z.infer<typeof messagePageSchema>;
        try {
          page = await readPage('getDeltaMessages', accessToken, url);
        } catch (error) {
          if (
            error instanceof UpstreamHttpError
            && params.deltaToken
            && (error.status === 410 || SYNC_STATE_ERROR.test(error.providerCode ?? ''))
          ) {
            throw new DeltaLinkExpiredError({ folder: params.folder, status: error.status });
          }
          throw error;
        }

        for (const item of page.value) {
          if (isRemovedEntry(item)) {
            removedIds.push(item.id);
          } else {
            messages.push(item);
          }
        }

        if (page['@odata.deltaLink']) {
          return { messages, removedIds, deltaLink: page['@odata.deltaLink'] };
        }
        url = page['@odata.nextLink'] ?? null;
      }

      return { messages, removedIds, deltaLink: null };
    },

    sendMail: async (accessToken, params) => {
      await request('sendMail', accessToken, '/me/sendMail', {
        method: 'POST',
        body: { message: params.message, saveToSentItems: params.saveToSentItems },
      });
      return { messageId: null };
    },

    createSubscription: async (accessToken, params) => {
      const { body } = await request('createSubscription', accessToken, '/subscriptions', {
        method: 'POST',
        body: {
          changeType: params.changeTypes.join(','),
          notificationUrl: params.notificationUrl,
          resource: params.resource,
          expirationDateTime: params.expiresAt.toISOString(),
          clientState: params.clientState,
        },
      });
      return toSubscription('createSubscription', body);
    },

    renewSubscription: async (accessToken, subscriptionId, expiresAt) => {
      const { body } = await request(
        'renewSubscription',
        accessToken,
        `/subscriptions/${encodeURIComponent(subscriptionId)}`,
        { method: 'PATCH', body: { expirationDateTime: expiresAt.toISOString() } },
      );
      return toSubscription('renewSubscription', body);
    },

    deleteSubscription: async (accessToken, subscriptionId) => {
      await request(
        'deleteSubscription',
        accessToken,
        `/subscriptions/${encodeURIComponent(subscriptionId)}`,
        { method: 'DELETE' },
      );
    },
  };
};

import type { TokenCipher } from '../services/tokenEncryption.js';
import {
  DuplicateAccountError,
  ErrorCodes,
  PersistenceError,
  describeError,
  isAppError,
} from '../shared/errors.js';
import type {
  AccountRecord,
  AuthenticationLogRecord,
  AuthorizationCodeAccountRecord,
  DeltaLinkRecord,
  DeviceCodeAccountRecord,
  ExternalApiCallRecord,
  FlowAccountRecord,
  MailMessageRecord,
  MailQueryHistoryRecord,
  OAuthStateRecord,
  TokenRecord,
  WebhookSubscriptionRecord,
} from '../shared/types.js';
import { withTransaction } from './pool.js';
import type { SqlPool } from './pool.js';
import type { MailGatewayStore } from './store.js';

const ACCOUNT_COLUMNS = `id, email, user_id AS "userId", tenant_id AS "tenantId", client_id AS "clientId",
       authentication_flow AS "authenticationFlow", status, scopes,
       created_at AS "createdAt", updated_at AS "updatedAt", last_authenticated_at AS "lastAuthenticatedAt"`;

const TOKEN_COLUMNS = `account_id AS "accountId", access_token AS "accessToken", refresh_token AS "refreshToken",
       token_type AS "tokenType", expires_at AS "expiresAt", scopes, status,
       created_at AS "createdAt", updated_at AS "updatedAt"`;

const DEVICE_CODE_COLUMNS = `account_id AS "accountId", device_code AS "deviceCode", user_code AS "userCode",
       verification_uri AS "verificationUri", expires_in AS "expiresIn", interval_seconds AS "interval",
       issued_at AS "issuedAt", created_at AS "createdAt", updated_at AS "updatedAt"`;

const MESSAGE_COLUMNS = `id, account_id AS "accountId", message_id AS "messageId",
       internet_message_id AS "internetMessageId", subject, sender_email AS "senderEmail",
       sender_name AS "senderName", recipients, cc_recipients AS "ccRecipients",
       bcc_recipients AS "bccRecipients", body_preview AS "bodyPreview", body_content AS "bodyContent",
       body_content_type AS "bodyContentType", importance, is_read AS "isRead",
       has_attachments AS "hasAttachments", received_at AS "receivedAt", sent_at AS "sentAt",
       direction, folder_id AS "folderId", categories, created_at AS "createdAt", updated_at AS "updatedAt"`;

const HISTORY_COLUMNS = `id, account_id AS "accountId", query_type AS "queryType",
       query_parameters AS "queryParameters", messages_found AS "messagesFound",
       new_messages AS "newMessages", execution_time_ms AS "executionTimeMs", success,
       error_message AS "errorMessage", queried_at AS "queriedAt"`;

const DELTA_LINK_COLUMNS = `id, account_id AS "accountId", folder_id AS "folderId", delta_token AS "deltaToken",
       is_active AS "isActive", created_at AS "createdAt", last_used_at AS "lastUsedAt"`;

const WEBHOOK_COLUMNS = `subscription_id AS "subscriptionId", account_id AS "accountId", resource,
       folder_id AS "folderId", change_types AS "changeTypes", notification_url AS "notificationUrl",
       client_state AS "clientState", expires_at AS "expiresAt", is_active AS "isActive",
       created_at AS "createdAt", updated_at AS "updatedAt"`;

const AUTH_LOG_COLUMNS = `id, account_id AS "accountId", email, event_type AS "eventType",
       authentication_flow AS "authenticationFlow", success, error_code AS "errorCode",
       error_message AS "errorMessage", created_at AS "createdAt"`;

const EXTERNAL_CALL_COLUMNS = `id, account_id AS "accountId", message_id AS "messageId", endpoint_url AS "endpointUrl",
       http_method AS "httpMethod", request_payload AS "requestPayload", response_status AS "responseStatus",
       response_body AS "responseBody", success, retry_count AS "retryCount", max_retries AS "maxRetries",
       created_at AS "createdAt", last_attempt_at AS "lastAttemptAt", completed_at AS "completedAt"`;

const DEFAULT_LIST_LIMIT = 100;

const pgErrorCode = (error: unknown): string | null => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
};

const isUniqueViolation = (error: unknown) => pgErrorCode(error) === '23505';

const toPersistenceError = (operation: string, error: unknown): PersistenceError => {
  const code = pgErrorCode(error) ?? '';
  if (code.startsWith('23')) {
    return new PersistenceError(
      ErrorCodes.DATABASE_CONSTRAINT_VIOLATION,
      `${operation}: constraint violation`,
      { operation, sqlState: code },
      error,
    );
  }
  if (code.startsWith('08') || code === 'ECONNREFUSED' || code === '57P01') {
    return new PersistenceError(
      ErrorCodes.DATABASE_CONNECTION_ERROR,
      `${operation}: database unavailable`,
      { operation, sqlState: code },
      error,
    );
  }
  return new PersistenceError(
    ErrorCodes.DATABASE_TRANSACTION_ERROR,
    `${operation} failed: ${describeError(error)}`,
    { operation, sqlState: code || null },
    error,
  );
};

const limitOf = (limit: number | undefined) =>
  Math.min(Math.max(1, Math.floor(limit ?? DEFAULT_LIST_LIMIT)), 1000);

/**
 * PostgreSQL-backed store. Each method runs as one statement or one
 * transaction on a pooled client; nothing holds a client between calls.
 * Access/refresh tokens, client secrets and PKCE verifiers are encrypted
 * before they reach SQL.
 */
export const createPgStore = (pool: SqlPool, cipher: TokenCipher): MailGatewayStore => {
  const guard = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      throw toPersistenceError(operation, error);
    }
  };

  const decryptToken = (row: TokenRecord): TokenRecord => ({
    ...row,
    accessToken: cipher.decrypt(row.accessToken),
    refreshToken: row.refreshToken ? cipher.decrypt(row.refreshToken) : null,
  });

  return {
    createAccount: (account, flow) =>
      guard('createAccount', async () => {
        try {
          return await withTransaction(pool, async (client) => {
            const existing = await client.query<{ id: string }>(
              'SELECT id FROM accounts WHERE LOWER(email) = LOWER($1)',
              [account.email],
            );
            if (existing.rows.length > 0) {
              throw new DuplicateAccountError(account.email);
            }

            const inserted = await client.query<AccountRecord>(
              `INSERT INTO accounts (id, email, user_id, tenant_id, client_id, authentication_flow, status, scopes)
               VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
               RETURNING ${ACCOUNT_COLUMNS}`,
              [
                account.id,
                account.email,
                account.userId,
                account.tenantId,
                account.clientId,
                account.authenticationFlow,
                account.status,
                account.scopes,
              ],
            );

            if (flow.flow === 'authorization_code') {
              await client.query(
                `INSERT INTO authorization_code_accounts (account_id, client_secret, redirect_uri, authority)
                 VALUES ($1, $2, $3, $4)`,
                [account.id, cipher.encrypt(flow.data.clientSecret), flow.data.redirectUri, flow.data.authority],
              );
            } else {
              await client.query('INSERT INTO device_code_accounts (account_id) VALUES ($1)', [account.id]);
            }

            const created = inserted.rows[0];
            if (!created) {
              throw new PersistenceError(ErrorCodes.DATABASE_TRANSACTION_ERROR, 'Account insert returned no row');
            }
            return created;
          });
        } catch (error) {
          if (isUniqueViolation(error)) {
            throw new DuplicateAccountError(account.email);
          }
          throw error;
        }
      }),

    getAccount: (accountId) =>
      guard('getAccount', async () => {
        const result = await pool.query<AccountRecord>(
          `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
          [accountId],
        );
        return result.rows[0] ?? null;
      }),

    getAccountByEmail: (email) =>
      guard('getAccountByEmail', async () => {
        const result = await pool.query<AccountRecord>(
          `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE LOWER(email) = LOWER($1)`,
          [email],
        );
        return result.rows[0] ?? null;
      }),

    listAccounts: () =>
      guard('listAccounts', async () => {
        const result = await pool.query<AccountRecord>(
          `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY created_at ASC`,
        );
        return result.rows;
      }),

    updateAccount: (accountId, patch) =>
      guard('updateAccount', async () => {
        const values: unknown[] = [accountId];
        const setClauses: string[] = [];

        if (patch.status !== undefined) {
          values.push(patch.status);
          setClauses.push(`status = $${values.length}`);
        }
        if (patch.scopes !== undefined) {
          values.push(patch.scopes);
          setClauses.push(`scopes = $${values.length}`);
        }
        if (patch.lastAuthenticatedAt !== undefined) {
          values.push(patch.lastAuthenticatedAt);
          setClauses.push(`last_authenticated_at = $${values.length}`);
        }
        setClauses.push('updated_at = NOW()');

        const result = await pool.query<AccountRecord>(
          `UPDATE accounts SET ${setClauses.join(', ')} WHERE id = $1 RETURNING ${ACCOUNT_COLUMNS}`,
          values,
        );
        return result.rows[0] ?? null;
      }),

    deleteAccount: (accountId) =>
      guard('deleteAccount', () =>
        withTransaction(pool, async (client) => {
          const dependents = [
            'external_api_calls',
            'mail_query_history',
            'mail_messages',
            'delta_links',
            'webhook_subscriptions',
            'authentication_logs',
            'tokens',
            'oauth_states',
            'authorization_code_accounts',
            'device_code_accounts',
          ];
          for (const table of dependents) {
            await client.query(`DELETE FROM ${table} WHERE account_id = $1`, [accountId]);
          }
          const result = await client.query('DELETE FROM accounts WHERE id = $1', [accountId]);
          return result.rowCount > 0;
        })),

    getFlowAccount: (accountId) =>
      guard('getFlowAccount', async (): Promise<FlowAccountRecord | null> => {
        const account = await pool.query<{ flow: AccountRecord['authenticationFlow'] }>(
          'SELECT authentication_flow AS "flow" FROM accounts WHERE id = $1',
          [accountId],
        );
        const flow = account.rows[0]?.flow;
        if (!flow) {
          return null;
        }

        if (flow === 'authorization_code') {
          const result = await pool.query<AuthorizationCodeAccountRecord>(
            `SELECT account_id AS "accountId", client_secret AS "clientSecret", redirect_uri AS "redirectUri",
                    authority, created_at AS "createdAt"
               FROM authorization_code_accounts
              WHERE account_id = $1`,
            [accountId],
          );
          const row = result.rows[0];
          return row ? { flow, data: { ...row, clientSecret: cipher.decrypt(row.clientSecret) } } : null;
        }

        const result = await pool.query<DeviceCodeAccountRecord>(
          `SELECT ${DEVICE_CODE_COLUMNS} FROM device_code_accounts WHERE account_id = $1`,
          [accountId],
        );
        const row = result.rows[0];
        return row ? { flow, data: row } : null;
      }),

    updateDeviceCode: (accountId, update) =>
      guard('updateDeviceCode', async () => {
        const result = await pool.query<DeviceCodeAccountRecord>(
          `UPDATE device_code_accounts
              SET device_code = $2, user_code = $3, verification_uri = $4, expires_in = $5,
                  interval_seconds = $6, issued_at = $7, updated_at = NOW()
            WHERE account_id = $1
        RETURNING ${DEVICE_CODE_COLUMNS}`,
          [
            accountId,
            update.deviceCode,
            update.userCode,
            update.verificationUri,
            update.expiresIn,
            update.interval,
            update.issuedAt,
          ],
        );
        const row = result.rows[0];
        if (!row) {
          throw new PersistenceError(
            ErrorCodes.DATABASE_TRANSACTION_ERROR,
            'Device code account row missing',
            { accountId },
          );
        }
        return row;
      }),

    saveOAuthState: (state) =>
      guard('saveOAuthState', async () => {
        await pool.query(
          `INSERT INTO oauth_states (state, account_id, code_verifier, expires_at)
           VALUES ($1, $2, $3, $4)`,
          [state.state, state.accountId, cipher.encrypt(state.codeVerifier), state.expiresAt],
        );
      }),

    consumeOAuthState: (state, accountId) =>
      guard('consumeOAuthState', async () => {
        const result = await pool.query<OAuthStateRecord>(
          `DELETE FROM oauth_states WHERE state = $1 AND ($2::uuid IS NULL OR account_id = $2::uuid)
           RETURNING state, account_id AS "accountId", code_verifier AS "codeVerifier",
                     expires_at AS "expiresAt", created_at AS "createdAt"`,
          [state, accountId ?? null],
        );
        const row = result.rows[0];
        return row ? { ...row, codeVerifier: cipher.decrypt(row.codeVerifier) } : null;
      }),

    hasPendingOAuthState: (accountId, now) =>
      guard('hasPendingOAuthState', async () => {
        const result = await pool.query<{ pending: boolean }>(
          'SELECT EXISTS (SELECT 1 FROM oauth_states WHERE account_id = $1 AND expires_at > $2) AS "pending"',
          [accountId, now],
        );
        return result.rows[0]?.pending === true;
      }),

    getToken: (accountId) =>
      guard('getToken', async () => {
        const result = await pool.query<TokenRecord>(
          `SELECT ${TOKEN_COLUMNS} FROM tokens WHERE account_id = $1`,
          [accountId],
        );
        const row = result.rows[0];
        return row ? decryptToken(row) : null;
      }),

    saveToken: (token) =>
      guard('saveToken', async () => {
        const result = await pool.query<TokenRecord>(
          `INSERT INTO tokens (account_id, access_token, refresh_token, token_type, expires_at, scopes, status)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           ON CONFLICT (account_id) DO UPDATE
              SET access_token = EXCLUDED.access_token,
                  refresh_token = EXCLUDED.refresh_token,
                  token_type = EXCLUDED.token_type,
                  expires_at = EXCLUDED.expires_at,
                  scopes = EXCLUDED.scopes,
                  status = EXCLUDED.status,
                  updated_at = NOW()
           RETURNING ${TOKEN_COLUMNS}`,
          [
            token.accountId,
            cipher.encrypt(token.accessToken),
            token.refreshToken ? cipher.encrypt(token.refreshToken) : null,
            token.tokenType,
            token.expiresAt,
            token.scopes,
            token.status,
          ],
        );
        const row = result.rows[0];
        if (!row) {
          throw new PersistenceError(ErrorCodes.DATABASE_TRANSACTION_ERROR, 'Token upsert returned no row');
        }
        return decryptToken(row);
      }),

    setTokenStatus: (accountId, status) =>
      guard('setTokenStatus', async () => {
        await pool.query(
          'UPDATE tokens SET status = $2, updated_at = NOW() WHERE account_id = $1',
          [accountId, status],
        );
      }),

    deleteToken: (accountId) =>
      guard('deleteToken', async () => {
        const result = await pool.query('DELETE FROM tokens WHERE account_id = $1', [accountId]);
        return result.rowCount > 0;
      }),

    listTokensExpiringBefore: (cutoff) =>
      guard('listTokensExpiringBefore', async () => {
        const result = await pool.query<TokenRecord>(
          `SELECT ${TOKEN_COLUMNS}
             FROM tokens
            WHERE status IN ('valid', 'expired')
              AND refresh_token IS NOT NULL
              AND expires_at <= $1
            ORDER BY expires_at ASC`,
          [cutoff],
        );
        return result.rows.map(decryptToken);
      }),

    insertMessageIfAbsent: (message) =>
      guard('insertMessageIfAbsent', async () => {
        const inserted = await pool.query<MailMessageRecord>(
          `INSERT INTO mail_messages (
             account_id, message_id, internet_message_id, subject, sender_email, sender_name,
             recipients, cc_recipients, bcc_recipients, body_preview, body_content, body_content_type,
             importance, is_read, has_attachments, received_at, sent_at, direction, folder_id, categories
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20)
           ON CONFLICT (account_id, message_id) DO NOTHING
           RETURNING ${MESSAGE_COLUMNS}`,
          [
            message.accountId,
            message.messageId,
            message.internetMessageId,
            message.subject,
            message.senderEmail,
            message.senderName,
            message.recipients,
            message.ccRecipients,
            message.bccRecipients,
            message.bodyPreview,
            message.bodyContent,
            message.bodyContentType,
            message.importance,
            message.isRead,
            message.hasAttachments,
            message.receivedAt,
            message.sentAt,
            message.direction,
            message.folderId,
            message.categories,
          ],
        );
        const created = inserted.rows[0];
        if (created) {
          return { inserted: true, message: created };
        }

        const existing = await pool.query<MailMessageRecord>(
          `SELECT ${MESSAGE_COLUMNS} FROM mail_messages WHERE account_id = $1 AND message_id = $2`,
          [message.accountId, message.messageId],
        );
        const row = existing.rows[0];
        if (!row) {
          throw new PersistenceError(
            ErrorCodes.DATABASE_TRANSACTION_ERROR,
            'Message conflicted on insert but could not be read back',
            { accountId: message.accountId, messageId: message.messageId },
          );
        }
        return { inserted: false, message: row };
      }),

    refreshMessageFlags: (accountId, messageId, flags) =>
      guard('refreshMessageFlags', async () => {
        const result = await pool.query(
          `UPDATE mail_messages
              SET is_read = $3, categories = $4, updated_at = NOW()
            WHERE account_id = $1 AND message_id = $2
              AND (is_read IS DISTINCT FROM $3 OR categories IS DISTINCT FROM $4)`,
          [accountId, messageId, flags.isRead, flags.categories],
        );
        return result.rowCount > 0;
      }),

    appendQueryHistory: (entry) =>
      guard('appendQueryHistory', async () => {
        await pool.query(
          `INSERT INTO mail_query_history (
             account_id, query_type, query_parameters, messages_found, new_messages,
             execution_time_ms, success, error_message
           ) VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7, $8)`,
          [
            entry.accountId,
            entry.queryType,
            JSON.stringify(entry.queryParameters),
            entry.messagesFound,
            entry.newMessages,
            Math.round(entry.executionTimeMs),
            entry.success,
            entry.errorMessage,
          ],
        );
      }),

    listQueryHistory: (filter) =>
      guard('listQueryHistory', async () => {
        const values: unknown[] = [];
        const where: string[] = [];
        if (filter.accountId !== undefined) {
          values.push(filter.accountId);
          where.push(`account_id = $${values.length}`);
        }
        if (filter.queryType !== undefined) {
          values.push(filter.queryType);
          where.push(`query_type = $${values.length}`);
        }
        values.push(limitOf(filter.limit));
        const result = await pool.query<MailQueryHistoryRecord>(
          `SELECT ${HISTORY_COLUMNS}
             FROM mail_query_history
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY queried_at DESC
            LIMIT $${values.length}`,
          values,
        );
        return result.rows;
      }),

    getActiveDeltaLink: (accountId, folderId) =>
      guard('getActiveDeltaLink', async () => {
        const result = await pool.query<DeltaLinkRecord>(
          `SELECT ${DELTA_LINK_COLUMNS}
             FROM delta_links
            WHERE account_id = $1 AND folder_id = $2 AND is_active
            ORDER BY created_at DESC
            LIMIT 1`,
          [accountId, folderId],
        );
        return result.rows[0] ?? null;
      }),

    saveDeltaLink: (accountId, folderId, deltaToken) =>
      guard('saveDeltaLink', () =>
        withTransaction(pool, async (client) => {
          await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`delta:${accountId}:${folderId}`]);
          await client.query(
            'UPDATE delta_links SET is_active = FALSE WHERE account_id = $1 AND folder_id = $2 AND is_active',
            [accountId, folderId],
          );
          const result = await client.query<DeltaLinkRecord>(
            `INSERT INTO delta_links (account_id, folder_id, delta_token, is_active)
             VALUES ($1, $2, $3, TRUE)
             RETURNING ${DELTA_LINK_COLUMNS}`,
            [accountId, folderId, deltaToken],
          );
          const row = result.rows[0];
          if (!row) {
            throw new PersistenceError(ErrorCodes.DATABASE_TRANSACTION_ERROR, 'Delta link insert returned no row');
          }
          return row;
        })),

    deactivateDeltaLinks: (accountId, folderId) =>
      guard('deactivateDeltaLinks', async () => {
        const result = await pool.query(
          'UPDATE delta_links SET is_active = FALSE WHERE account_id = $1 AND folder_id = $2 AND is_active',
          [accountId, folderId],
        );
        return result.rowCount;
      }),

    touchDeltaLink: (id, usedAt) =>
      guard('touchDeltaLink', async () => {
        await pool.query('UPDATE delta_links SET last_used_at = $2 WHERE id = $1', [id, usedAt]);
      }),

    saveWebhook: (subscription) =>
      guard('saveWebhook', async () => {
        const result = await pool.query<WebhookSubscriptionRecord>(
          `INSERT INTO webhook_subscriptions (
             subscription_id, account_id, resource, folder_id, change_types,
             notification_url, client_state, expires_at, is_active
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           RETURNING ${WEBHOOK_COLUMNS}`,
          [
            subscription.subscriptionId,
            subscription.accountId,
            subscription.resource,
            subscription.folderId,
            subscription.changeTypes,
            subscription.notificationUrl,
            subscription.clientState,
            subscription.expiresAt,
            subscription.isActive,
          ],
        );
        const row = result.rows[0];
        if (!row) {
          throw new PersistenceError(ErrorCodes.DATABASE_TRANSACTION_ERROR, 'Webhook insert returned no row');
        }
        return row;
      }),

    getWebhook: (subscriptionId) =>
      guard('getWebhook', async () => {
        const result = await pool.query<WebhookSubscriptionRecord>(
          `SELECT ${WEBHOOK_COLUMNS} FROM webhook_subscriptions WHERE subscription_id = $1`,
          [subscriptionId],
        );
        return result.rows[0] ?? null;
      }),

    listWebhooks: (accountId) =>
      guard('listWebhooks', async () => {
        const result = accountId === undefined
          ? await pool.query<WebhookSubscriptionRecord>(
            `SELECT ${WEBHOOK_COLUMNS} FROM webhook_subscriptions ORDER BY created_at DESC`,
          )
          : await pool.query<WebhookSubscriptionRecord>(
            `SELECT ${WEBHOOK_COLUMNS} FROM webhook_subscriptions WHERE account_id = $1 ORDER BY created_at DESC`,
            [accountId],
          );
        return result.rows;
      }),

    listWebhooksExpiringBefore: (cutoff) =>
      guard('listWebhooksExpiringBefore', async () => {
        const result = await pool.query<WebhookSubscriptionRecord>(
          `SELECT ${WEBHOOK_COLUMNS}
             FROM webhook_subscriptions
            WHERE is_active AND expires_at <= $1
            ORDER BY expires_at ASC`,
          [cutoff],
        );
        return result.rows;
      }),

    updateWebhookExpiry: (subscriptionId, expiresAt) =>
      guard('updateWebhookExpiry', async () => {
        const result = await pool.query<WebhookSubscriptionRecord>(
          `UPDATE webhook_subscriptions
              SET expires_at = $2, updated_at = NOW()
            WHERE subscription_id = $1
        RETURNING ${WEBHOOK_COLUMNS}`,
          [subscriptionId, expiresAt],
        );
        return result.rows[0] ?? null;
      }),

    deactivateWebhook: (subscriptionId) =>
      guard('deactivateWebhook', async () => {
        const result = await pool.query(
          'UPDATE webhook_subscriptions SET is_active = FALSE, updated_at = NOW() WHERE subscription_id = $1',
          [subscriptionId],
        );
        return result.rowCount > 0;
      }),

    appendAuthLog: (entry) =>
      guard('appendAuthLog', async () => {
        await pool.query(
          `INSERT INTO authentication_logs (
             account_id, email, event_type, authentication_flow, success, error_code, error_message
           ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            entry.accountId,
            entry.email,
            entry.eventType,
            entry.authenticationFlow,
            entry.success,
            entry.errorCode,
            entry.errorMessage,
          ],
        );
      }),

    listAuthLogs: (filter) =>
      guard('listAuthLogs', async () => {
        const values: unknown[] = [];
        const where: string[] = [];
        if (filter.accountId !== undefined) {
          values.push(filter.accountId);
          where.push(`account_id = $${values.length}`);
        }
        if (filter.success !== undefined) {
          values.push(filter.success);
          where.push(`success = $${values.length}`);
        }
        if (filter.from !== undefined) {
          values.push(filter.from);
          where.push(`created_at >= $${values.length}`);
        }
        if (filter.to !== undefined) {
          values.push(filter.to);
          where.push(`created_at <= $${values.length}`);
        }
        values.push(limitOf(filter.limit));
        const result = await pool.query<AuthenticationLogRecord>(
          `SELECT ${AUTH_LOG_COLUMNS}
             FROM authentication_logs
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY created_at DESC
            LIMIT $${values.length}`,
          values,
        );
        return result.rows;
      }),

    createExternalCall: (call) =>
      guard('createExternalCall', async () => {
        const result = await pool.query<ExternalApiCallRecord>(
          `INSERT INTO external_api_calls (
             account_id, message_id, endpoint_url, http_method, request_payload, max_retries, last_attempt_at
           ) VALUES ($1, $2, $3, 'POST', $4::jsonb, $5, NOW())
           RETURNING ${EXTERNAL_CALL_COLUMNS}`,
          [call.accountId, call.messageId, call.endpointUrl, JSON.stringify(call.requestPayload), call.maxRetries],
        );
        const row = result.rows[0];
        if (!row) {
          throw new PersistenceError(ErrorCodes.DATABASE_TRANSACTION_ERROR, 'External call insert returned no row');
        }
        return row;
      }),

    getExternalCall: (callId) =>
      guard('getExternalCall', async () => {
        const result = await pool.query<ExternalApiCallRecord>(
          `SELECT ${EXTERNAL_CALL_COLUMNS} FROM external_api_calls WHERE id = $1`,
          [callId],
        );
        return result.rows[0] ?? null;
      }),

    claimExternalCallRetry: (callId, attemptedAt, staleBefore) =>
      guard('claimExternalCallRetry', async () => {
        const result = await pool.query<ExternalApiCallRecord>(
          `UPDATE external_api_calls
              SET retry_count = retry_count + 1, last_attempt_at = $2, completed_at = NULL
            WHERE id = $1
              AND success = FALSE
              AND retry_count < max_retries
              AND (completed_at IS NOT NULL OR COALESCE(last_attempt_at, created_at) < $3)
        RETURNING ${EXTERNAL_CALL_COLUMNS}`,
          [callId, attemptedAt, staleBefore],
        );
        return result.rows[0] ?? null;
      }),

    completeExternalCall: (callId, outcome, completedAt) =>
      guard('completeExternalCall', async () => {
        const result = await pool.query<ExternalApiCallRecord>(
          `UPDATE external_api_calls
              SET success = $2, response_status = $3, response_body = $4, completed_at = $5
            WHERE id = $1
        RETURNING ${EXTERNAL_CALL_COLUMNS}`,
          [callId, outcome.success, outcome.responseStatus, outcome.responseBody, completedAt],
        );
        return result.rows[0] ?? null;
      }),

    listRetryableExternalCalls: (staleBefore, limit) =>
      guard('listRetryableExternalCalls', async () => {
        const result = await pool.query<ExternalApiCallRecord>(
          `SELECT ${EXTERNAL_CALL_COLUMNS}
             FROM external_api_calls
            WHERE success = FALSE
              AND retry_count < max_retries
              AND (completed_at IS NOT NULL OR COALESCE(last_attempt_at, created_at) < $1)
            ORDER BY created_at ASC
            LIMIT $2`,
          [staleBefore, limit],
        );
        return result.rows;
      }),

    listExternalCalls: (filter) =>
      guard('listExternalCalls', async () => {
        const values: unknown[] = [];
        const where: string[] = [];
        if (filter.accountId !== undefined) {
          values.push(filter.accountId);
          where.push(`account_id = $${values.length}`);
        }
        if (filter.success !== undefined) {
          values.push(filter.success);
          where.push(`success = $${values.length}`);
        }
        values.push(limitOf(filter.limit));
        const result = await pool.query<ExternalApiCallRecord>(
          `SELECT ${EXTERNAL_CALL_COLUMNS}
             FROM external_api_calls
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY created_at DESC
            LIMIT $${values.length}`,
          values,
        );
        return result.rows;
      }),

    purge: (cutoffs) =>
      guard('purge', async () => {
        const oauthStates = await pool.query('DELETE FROM oauth_states WHERE expires_at < $1', [
          cutoffs.oauthStatesBefore,
        ]);
        const tokens = await pool.query(
          "DELETE FROM tokens WHERE status <> 'valid' AND updated_at < $1",
          [cutoffs.tokensBefore],
        );
        const authLogs = await pool.query('DELETE FROM authentication_logs WHERE created_at < $1', [
          cutoffs.logsBefore,
        ]);
        const queryHistory = await pool.query('DELETE FROM mail_query_history WHERE queried_at < $1', [
          cutoffs.logsBefore,
        ]);
        const externalCalls = await pool.query(
          `DELETE FROM external_api_calls
            WHERE completed_at IS NOT NULL
              AND completed_at < $1
              AND (success OR retry_count >= max_retries)`,
          [cutoffs.logsBefore],
        );
        const webhooks = await pool.query(
          'DELETE FROM webhook_subscriptions WHERE is_active = FALSE AND updated_at < $1',
          [cutoffs.webhooksBefore],
        );
        return {
          oauthStates: oauthStates.rowCount,
          tokens: tokens.rowCount,
          authLogs: authLogs.rowCount,
          queryHistory: queryHistory.rowCount,
          externalCalls: externalCalls.rowCount,
          webhooks: webhooks.rowCount,
        };
      }),
  };
};

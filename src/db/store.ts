import type {
  AccountRecord,
  AccountStatus,
  AuthenticationLogRecord,
  AuthorizationCodeAccountRecord,
  DeltaLinkRecord,
  DeviceCodeAccountRecord,
  ExternalApiCallOutcome,
  ExternalApiCallRecord,
  FlowAccountRecord,
  MailMessageRecord,
  MailQueryHistoryRecord,
  NewAuthenticationLog,
  NewMailMessage,
  NewMailQueryHistory,
  OAuthStateRecord,
  TokenRecord,
  TokenStatus,
  WebhookSubscriptionRecord,
} from '../shared/types.js';

export type NewAccount = Omit<AccountRecord, 'createdAt' | 'updatedAt' | 'lastAuthenticatedAt'>;

export type NewFlowAccount =
  | { flow: 'authorization_code'; data: Omit<AuthorizationCodeAccountRecord, 'accountId' | 'createdAt'> }
  | { flow: 'device_code' };

export type DeviceCodeUpdate = Pick<
  DeviceCodeAccountRecord,
  'deviceCode' | 'userCode' | 'verificationUri' | 'expiresIn' | 'interval' | 'issuedAt'
>;

export type TokenWrite = Omit<TokenRecord, 'createdAt' | 'updatedAt'>;

export type NewWebhookSubscription = Omit<WebhookSubscriptionRecord, 'createdAt' | 'updatedAt'>;

export type NewExternalApiCall = Pick<
  ExternalApiCallRecord,
  'accountId' | 'messageId' | 'endpointUrl' | 'requestPayload' | 'maxRetries'
>;

export interface InsertMessageResult {
  inserted: boolean;
  message: MailMessageRecord;
}

export interface AuthLogFilter {
  accountId?: string;
  success?: boolean;
  from?: Date;
  to?: Date;
  limit?: number;
}

export interface HistoryFilter {
  accountId?: string;
  queryType?: MailQueryHistoryRecord['queryType'];
  limit?: number;
}

export interface ExternalCallFilter {
  accountId?: string;
  success?: boolean;
  limit?: number;
}

export interface PurgeCutoffs {
  tokensBefore: Date;
  logsBefore: Date;
  webhooksBefore: Date;
  oauthStatesBefore: Date;
}

export interface PurgeResult {
  oauthStates: number;
  tokens: number;
  authLogs: number;
  queryHistory: number;
  externalCalls: number;
  webhooks: number;
}

/**
 * Durable state of the gateway. Every method is one logical unit of work;
 * implementations own the transaction boundaries. Two operations carry
 * atomicity guarantees callers rely on:
 *
 * - `saveToken` is an upsert keyed by account id, never a second row.
 * - `saveDeltaLink` deactivates every active link for the (account, folder)
 *   pair and inserts the new one in the same transaction.
 *
 * `insertMessageIfAbsent` is the dedup point: existence of
 * (accountId, messageId) is checked by the same statement that inserts.
 */
export interface MailGatewayStore {
  // accounts
  createAccount(account: NewAccount, flow: NewFlowAccount): Promise<AccountRecord>;
  getAccount(accountId: string): Promise<AccountRecord | null>;
  getAccountByEmail(email: string): Promise<AccountRecord | null>;
  listAccounts(): Promise<AccountRecord[]>;
  updateAccount(
    accountId: string,
    patch: { status?: AccountStatus; scopes?: string[]; lastAuthenticatedAt?: Date },
  ): Promise<AccountRecord | null>;
  deleteAccount(accountId: string): Promise<boolean>;

  // flow data
  getFlowAccount(accountId: string): Promise<FlowAccountRecord | null>;
  updateDeviceCode(accountId: string, update: DeviceCodeUpdate): Promise<DeviceCodeAccountRecord>;

  // pkce state
  saveOAuthState(state: Omit<OAuthStateRecord, 'createdAt'>): Promise<void>;
  /**
   * Deletes and returns the state row; a state can be consumed once. With
   * `accountId`, a row owned by another account is left in place.
   */
  consumeOAuthState(state: string, accountId?: string): Promise<OAuthStateRecord | null>;
  hasPendingOAuthState(accountId: string, now: Date): Promise<boolean>;

  // tokens
  getToken(accountId: string): Promise<TokenRecord | null>;
  saveToken(token: TokenWrite): Promise<TokenRecord>;
  setTokenStatus(accountId: string, status: TokenStatus): Promise<void>;
  deleteToken(accountId: string): Promise<boolean>;
  listTokensExpiringBefore(cutoff: Date): Promise<TokenRecord[]>;

  // messages
  insertMessageIfAbsent(message: NewMailMessage): Promise<InsertMessageResult>;
  /** True only when a stored row actually changed. */
  refreshMessageFlags(
    accountId: string,
    messageId: string,
    flags: { isRead: boolean; categories: string[] },
  ): Promise<boolean>;

  // query history
  appendQueryHistory(entry: NewMailQueryHistory): Promise<void>;
  listQueryHistory(filter: HistoryFilter): Promise<MailQueryHistoryRecord[]>;

  // delta links
  getActiveDeltaLink(accountId: string, folderId: string): Promise<DeltaLinkRecord | null>;
  saveDeltaLink(accountId: string, folderId: string, deltaToken: string): Promise<DeltaLinkRecord>;
  deactivateDeltaLinks(accountId: string, folderId: string): Promise<number>;
  touchDeltaLink(id: string, usedAt: Date): Promise<void>;

  // webhooks
  saveWebhook(subscription: NewWebhookSubscription): Promise<WebhookSubscriptionRecord>;
  getWebhook(subscriptionId: string): Promise<WebhookSubscriptionRecord | null>;
  listWebhooks(accountId?: string): Promise<WebhookSubscriptionRecord[]>;
  listWebhooksExpiringBefore(cutoff: Date): Promise<WebhookSubscriptionRecord[]>;
  updateWebhookExpiry(subscriptionId: string, expiresAt: Date): Promise<WebhookSubscriptionRecord | null>;
  deactivateWebhook(subscriptionId: string): Promise<boolean>;

  // audit
  appendAuthLog(entry: NewAuthenticationLog): Promise<void>;
  listAuthLogs(filter: AuthLogFilter): Promise<AuthenticationLogRecord[]>;

  // external forwarding
  createExternalCall(call: NewExternalApiCall): Promise<ExternalApiCallRecord>;
  getExternalCall(callId: string): Promise<ExternalApiCallRecord | null>;
  /**
   * Claims a failed call for another attempt: bumps `retryCount` and clears
   * `completedAt`, but only while the call is unsuccessful and below its
   * ceiling, and not still in flight (pending rows qualify once their last
   * attempt is older than `staleBefore`). Returns null when refused.
   */
  claimExternalCallRetry(
    callId: string,
    attemptedAt: Date,
    staleBefore: Date,
  ): Promise<ExternalApiCallRecord | null>;
  completeExternalCall(
    callId: string,
    outcome: ExternalApiCallOutcome,
    completedAt: Date,
  ): Promise<ExternalApiCallRecord | null>;
  listRetryableExternalCalls(staleBefore: Date, limit: number): Promise<ExternalApiCallRecord[]>;
  listExternalCalls(filter: ExternalCallFilter): Promise<ExternalApiCallRecord[]>;

  // maintenance
  purge(cutoffs: PurgeCutoffs): Promise<PurgeResult>;
}

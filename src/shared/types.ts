export type AuthenticationFlow = 'authorization_code' | 'device_code';
export type AccountStatus = 'active' | 'inactive' | 'suspended';
export type TokenStatus = 'valid' | 'expired' | 'revoked' | 'invalid';
export type MailImportance = 'low' | 'normal' | 'high';
export type MailDirection = 'sent' | 'received';
export type BodyType = 'text' | 'html';
export type QueryType = 'manual' | 'delta';
export type AuthEventType =
  | 'registration'
  | 'authentication_started'
  | 'authentication'
  | 'token_refresh'
  | 'logout';

export const AUTHENTICATION_FLOWS: readonly AuthenticationFlow[] = ['authorization_code', 'device_code'];
export const ACCOUNT_STATUSES: readonly AccountStatus[] = ['active', 'inactive', 'suspended'];
export const MAIL_IMPORTANCES: readonly MailImportance[] = ['low', 'normal', 'high'];

export interface AccountRecord {
  id: string;
  email: string;
  userId: string;
  tenantId: string;
  clientId: string;
  authenticationFlow: AuthenticationFlow;
  status: AccountStatus;
  scopes: string[];
  createdAt: Date;
  updatedAt: Date;
  lastAuthenticatedAt: Date | null;
}

export interface AuthorizationCodeAccountRecord {
  accountId: string;
  clientSecret: string;
  redirectUri: string;
  authority: string;
  createdAt: Date;
}

export interface DeviceCodeAccountRecord {
  accountId: string;
  deviceCode: string | null;
  userCode: string | null;
  verificationUri: string | null;
  expiresIn: number | null;
  interval: number | null;
  issuedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type FlowAccountRecord =
  | { flow: 'authorization_code'; data: AuthorizationCodeAccountRecord }
  | { flow: 'device_code'; data: DeviceCodeAccountRecord };

export interface OAuthStateRecord {
  state: string;
  accountId: string;
  codeVerifier: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface TokenRecord {
  accountId: string;
  accessToken: string;
  refreshToken: string | null;
  tokenType: string;
  expiresAt: Date;
  scopes: string[];
  status: TokenStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface MailMessageRecord {
  id: string;
  accountId: string;
  messageId: string;
  internetMessageId: string | null;
  subject: string;
  senderEmail: string;
  senderName: string | null;
  recipients: string[];
  ccRecipients: string[];
  bccRecipients: string[];
  bodyPreview: string | null;
  bodyContent: string | null;
  bodyContentType: BodyType;
  importance: MailImportance;
  isRead: boolean;
  hasAttachments: boolean;
  receivedAt: Date;
  sentAt: Date | null;
  direction: MailDirection;
  folderId: string;
  categories: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type NewMailMessage = Omit<MailMessageRecord, 'id' | 'createdAt' | 'updatedAt'>;

export interface MailQueryHistoryRecord {
  id: string;
  accountId: string;
  queryType: QueryType;
  queryParameters: Record<string, unknown>;
  messagesFound: number;
  newMessages: number;
  executionTimeMs: number;
  success: boolean;
  errorMessage: string | null;
  queriedAt: Date;
}

export type NewMailQueryHistory = Omit<MailQueryHistoryRecord, 'id' | 'queriedAt'>;

export interface DeltaLinkRecord {
  id: string;
  accountId: string;
  folderId: string;
  deltaToken: string;
  isActive: boolean;
  createdAt: Date;
  lastUsedAt: Date | null;
}

export interface WebhookSubscriptionRecord {
  subscriptionId: string;
  accountId: string;
  resource: string;
  folderId: string;
  changeTypes: string[];
  notificationUrl: string;
  clientState: string;
  expiresAt: Date;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface AuthenticationLogRecord {
  id: string;
  accountId: string | null;
  email: string | null;
  eventType: AuthEventType;
  authenticationFlow: AuthenticationFlow | null;
  success: boolean;
  errorCode: string | null;
  errorMessage: string | null;
  createdAt: Date;
}

export type NewAuthenticationLog = Omit<AuthenticationLogRecord, 'id' | 'createdAt'>;

export interface ExternalApiCallRecord {
  id: string;
  accountId: string;
  messageId: string;
  endpointUrl: string;
  httpMethod: 'POST';
  requestPayload: Record<string, unknown>;
  responseStatus: number | null;
  responseBody: string | null;
  success: boolean;
  retryCount: number;
  maxRetries: number;
  createdAt: Date;
  lastAttemptAt: Date | null;
  completedAt: Date | null;
}

export type ExternalApiCallOutcome = {
  success: boolean;
  responseStatus: number | null;
  responseBody: string | null;
};

export const isTokenExpired = (token: Pick<TokenRecord, 'expiresAt'>, nowMs = Date.now()) =>
  nowMs >= token.expiresAt.getTime();

export const tokenExpiresInSeconds = (token: Pick<TokenRecord, 'expiresAt'>, nowMs = Date.now()) =>
  Math.max(0, Math.floor((token.expiresAt.getTime() - nowMs) / 1000));

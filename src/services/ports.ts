import type { GraphMessage, GraphOutgoingMessage } from './graphMessages.js';

// identity provider

export interface TokenGrant {
  accessToken: string;
  refreshToken: string | null;
  tokenType: string;
  expiresIn: number;
  scopes: string[];
}

export interface DeviceCodeGrant {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  expiresIn: number;
  interval: number;
  message: string | null;
}

export type DevicePollResult =
  | { status: 'pending' }
  | { status: 'slow_down'; interval: number | null }
  | { status: 'success'; grant: TokenGrant }
  | { status: 'failed'; error: string; description: string | null };

interface ClientParams {
  /** Authority base including the tenant, e.g. `https://login.microsoftonline.com/common`. */
  authority: string;
  clientId: string;
}

export interface AuthorizationUrlParams extends ClientParams {
  redirectUri: string;
  scopes: string[];
  state: string;
  codeChallenge: string;
}

export interface CodeExchangeParams extends ClientParams {
  clientSecret: string | null;
  redirectUri: string;
  scopes: string[];
  code: string;
  codeVerifier: string;
}

export interface RefreshParams extends ClientParams {
  clientSecret: string | null;
  refreshToken: string;
  scopes: string[];
}

export interface OAuthClient {
  buildAuthorizationUrl(params: AuthorizationUrlParams): string;
  exchangeCode(params: CodeExchangeParams): Promise<TokenGrant>;
  startDeviceCode(params: ClientParams & { scopes: string[] }): Promise<DeviceCodeGrant>;
  pollDeviceCode(params: ClientParams & { deviceCode: string }): Promise<DevicePollResult>;
  refresh(params: RefreshParams): Promise<TokenGrant>;
  revoke(params: { accessToken: string }): Promise<void>;
}

// mailbox

export interface MessageListParams {
  folder: string;
  filter: string | null;
  search: string | null;
  select?: string[];
  top: number;
  orderBy: string | null;
}

export interface DeltaParams {
  folder: string;
  deltaToken: string | null;
}

export interface DeltaPage {
  messages: GraphMessage[];
  removedIds: string[];
  deltaLink: string | null;
}

export interface GraphSubscription {
  id: string;
  resource: string;
  changeType: string;
  notificationUrl: string;
  clientState: string | null;
  expirationDateTime: Date;
}

export interface CreateSubscriptionParams {
  resource: string;
  changeTypes: string[];
  notificationUrl: string;
  clientState: string;
  expiresAt: Date;
}

export interface GraphClient {
  listMessages(accessToken: string, params: MessageListParams): Promise<GraphMessage[]>;
  getDeltaMessages(accessToken: string, params: DeltaParams): Promise<DeltaPage>;
  sendMail(
    accessToken: string,
    params: { message: GraphOutgoingMessage; saveToSentItems: boolean },
  ): Promise<{ messageId: string | null }>;
  createSubscription(accessToken: string, params: CreateSubscriptionParams): Promise<GraphSubscription>;
  renewSubscription(accessToken: string, subscriptionId: string, expiresAt: Date): Promise<GraphSubscription>;
  deleteSubscription(accessToken: string, subscriptionId: string): Promise<void>;
}

// downstream

export interface ForwardingResponse {
  status: number;
  body: string;
}

export interface ForwardingClient {
  sendMailData(endpoint: string, payload: Record<string, unknown>, timeoutMs: number): Promise<ForwardingResponse>;
}

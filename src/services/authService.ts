import { randomBytes, randomUUID } from 'node:crypto';
import type { AppConfig } from '../config/env.js';
import type { Logger } from '../config/logger.js';
import type { MailGatewayStore } from '../db/store.js';
import {
  AccountNotFoundError,
  AuthenticationFailedError,
  DeviceAuthorizationFailedError,
  DeviceCodeNotStartedError,
  ErrorCodes,
  ExternalApiError,
  NoRefreshTokenError,
  NoValidTokenError,
  SystemError,
  UnsupportedAuthenticationFlowError,
  ValidationError,
  describeError,
  isAppError,
} from '../shared/errors.js';
import { isTokenExpired, tokenExpiresInSeconds } from '../shared/types.js';
import type {
  AccountRecord,
  AccountStatus,
  AuthEventType,
  AuthenticationFlow,
  AuthenticationLogRecord,
  DeviceCodeAccountRecord,
  TokenRecord,
} from '../shared/types.js';
import { createKeyedLock } from './keyedLock.js';
import type { KeyedLock } from './keyedLock.js';
import { createPkcePair } from './microsoftOAuth.js';
import type { OAuthClient, TokenGrant } from './ports.js';

export type TokenHealth = 'valid' | 'expired' | 'invalid' | 'none';
export type AuthState = 'registered' | 'awaiting_user_action' | 'authenticated' | 'expired' | 'revoked';

export interface AccountView {
  account: AccountRecord;
  tokenStatus: TokenHealth;
  tokenExpiresIn: number | null;
  authState: AuthState;
}

export interface RegisterInput {
  email: string;
  userId: string;
  authenticationFlow: AuthenticationFlow;
  scopes?: string[];
}

export type BeginAuthenticationResult =
  | {
    flow: 'authorization_code';
    requiresUserAction: true;
    authorizationUrl: string;
    state: string;
    expiresAt: Date;
  }
  | {
    flow: 'device_code';
    requiresUserAction: true;
    userCode: string;
    verificationUri: string;
    expiresIn: number;
    interval: number;
    message: string | null;
  };

export interface AuthenticatedResult {
  accountId: string;
  expiresAt: Date;
  scopes: string[];
}

export type DevicePollOutcome =
  | { status: 'pending'; interval: number }
  | { status: 'slow_down'; interval: number }
  | ({ status: 'authenticated' } & AuthenticatedResult);

export interface CallbackInput {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export interface AuthServiceDeps {
  store: MailGatewayStore;
  oauth: OAuthClient;
  config: Pick<AppConfig, 'microsoft'>;
  logger: Logger;
  locks?: KeyedLock;
  now?: () => number;
}

const DEFAULT_DEVICE_INTERVAL_SECONDS = 5;
const SLOW_DOWN_STEP_SECONDS = 5;

const CLEARED_DEVICE_CODE = {
  deviceCode: null,
  userCode: null,
  verificationUri: null,
  expiresIn: null,
  interval: null,
  issuedAt: null,
};

const normalizeEmail = (email: string) => email.trim().toLowerCase();

const deviceCodeExpired = (data: DeviceCodeAccountRecord, nowMs: number) =>
  data.issuedAt !== null
  && data.expiresIn !== null
  && nowMs >= data.issuedAt.getTime() + data.expiresIn * 1000;

export const tokenHealth = (token: TokenRecord | null, nowMs: number): TokenHealth => {
  if (!token) {
    return 'none';
  }
  if (token.status === 'invalid' || token.status === 'revoked') {
    return 'invalid';
  }
  if (token.status === 'expired' || isTokenExpired(token, nowMs)) {
    return 'expired';
  }
  return 'valid';
};

/**
 * Owns the account authentication state machine:
 * REGISTERED -> AWAITING_USER_ACTION -> AUTHENTICATED <-> EXPIRED -> REVOKED.
 *
 * Every register/begin/complete/refresh/revoke call, and every poll that
 * ends the device flow, appends exactly one authentication log row.
 * Token writes for one account are serialized through the keyed lock.
 */
export const createAuthService = (deps: AuthServiceDeps) => {
  const { store, oauth } = deps;
  const microsoft = deps.config.microsoft;
  const locks = deps.locks ?? createKeyedLock();
  const now = deps.now ?? Date.now;
  const log = deps.logger.child({ component: 'auth' });

  const tokenLock = <T>(accountId: string, fn: () => Promise<T>) => locks.run(`token:${accountId}`, fn);
  const defaultAuthority = (tenantId: string) => `${microsoft.authorityHost}/${tenantId}`;

  const audit = async (
    event: {
      accountId: string | null;
      email?: string | null;
      eventType: AuthEventType;
      flow: AuthenticationFlow | null;
    },
    error?: unknown,
  ) => {
    try {
      await store.appendAuthLog({
        accountId: event.accountId,
        email: event.email ?? null,
        eventType: event.eventType,
        authenticationFlow: event.flow,
        success: error === undefined,
        errorCode: error === undefined ? null : isAppError(error) ? error.code : ErrorCodes.INTERNAL_ERROR,
        errorMessage: error === undefined ? null : describeError(error),
      });
    } catch (auditError) {
      log.error(
        { err: auditError, accountId: event.accountId, eventType: event.eventType },
        'failed to append authentication log',
      );
    }
  };

  // Port errors arrive already classified; only the account context is missing.
  const translate = (accountId: string, operation: string, error: unknown): Error => {
    if (error instanceof AuthenticationFailedError && error.details.accountId === null) {
      return new AuthenticationFailedError(
        accountId,
        error.message,
        { code: error.providerCode, description: error.providerDescription },
        error,
        error.code,
      );
    }
    if (isAppError(error)) {
      return error;
    }
    return new SystemError(ErrorCodes.INTERNAL_ERROR, `${operation} failed: ${describeError(error)}`, { accountId }, error);
  };

  const requireAccount = async (accountId: string) => {
    const account = await store.getAccount(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  };

  const requireFlow = async (account: AccountRecord, expected: AuthenticationFlow) => {
    const flowAccount = await store.getFlowAccount(account.id);
    if (!flowAccount || account.authenticationFlow !== expected) {
      throw new UnsupportedAuthenticationFlowError(account.id, expected, account.authenticationFlow);
    }
    return flowAccount;
  };

  const persistGrant = async (account: AccountRecord, grant: TokenGrant, previousRefreshToken: string | null) => {
    const expiresAt = new Date(now() + grant.expiresIn * 1000);
    const token = await store.saveToken({
      accountId: account.id,
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken ?? previousRefreshToken,
      tokenType: grant.tokenType,
      expiresAt,
      scopes: grant.scopes,
      status: 'valid',
    });
    return token;
  };

  const markAuthenticated = async (account: AccountRecord, token: TokenRecord): Promise<AuthenticatedResult> => {
    await store.updateAccount(account.id, {
      lastAuthenticatedAt: new Date(now()),
      ...(token.scopes.length > 0 ? { scopes: token.scopes } : {}),
    });
    return { accountId: account.id, expiresAt: token.expiresAt, scopes: token.scopes };
  };

  const project = async (account: AccountRecord): Promise<AccountView> => {
    const nowMs = now();
    const token = await store.getToken(account.id);
    const health = tokenHealth(token, nowMs);

    let authState: AuthState;
    if (health === 'valid') {
      authState = 'authenticated';
    } else if (health === 'expired' || (health === 'invalid' && token?.status === 'invalid')) {
      authState = 'expired';
    } else if (await awaitingUserAction(account, nowMs)) {
      authState = 'awaiting_user_action';
    } else if (health === 'invalid' || account.lastAuthenticatedAt) {
      authState = 'revoked';
    } else {
      authState = 'registered';
    }

    return {
      account,
      tokenStatus: health,
      tokenExpiresIn: token ? tokenExpiresInSeconds(token, nowMs) : null,
      authState,
    };
  };

  const awaitingUserAction = async (account: AccountRecord, nowMs: number) => {
    if (account.authenticationFlow === 'authorization_code') {
      return store.hasPendingOAuthState(account.id, new Date(nowMs));
    }
    const flowAccount = await store.getFlowAccount(account.id);
    return flowAccount?.flow === 'device_code'
      && flowAccount.data.deviceCode !== null
      && !deviceCodeExpired(flowAccount.data, nowMs);
  };

  const exchangeAuthorizationCode = async (account: AccountRecord, code: string, codeVerifier: string) => {
    const flowAccount = await requireFlow(account, 'authorization_code');
    if (flowAccount.flow !== 'authorization_code') {
      throw new UnsupportedAuthenticationFlowError(account.id, 'authorization_code', flowAccount.flow);
    }
    const grant = await oauth.exchangeCode({
      authority: flowAccount.data.authority,
      clientId: account.clientId,
      clientSecret: flowAccount.data.clientSecret || null,
      redirectUri: flowAccount.data.redirectUri,
      scopes: account.scopes,
      code,
      codeVerifier,
    });
    const token = await persistGrant(account, grant, null);
    return markAuthenticated(account, token);
  };

  const register = async (input: RegisterInput): Promise<{ accountId: string; account: AccountRecord }> => {
    const email = normalizeEmail(input.email);
    const flow = input.authenticationFlow;
    try {
      if (!email || !input.userId.trim()) {
        throw new ValidationError('email and userId are required', { email, userId: input.userId });
      }
      const account = await store.createAccount(
        {
          id: randomUUID(),
          email,
          userId: input.userId.trim(),
          tenantId: microsoft.tenantId,
          clientId: microsoft.clientId,
          authenticationFlow: flow,
          status: 'active',
          scopes: input.scopes && input.scopes.length > 0 ? [...input.scopes] : [...microsoft.scopes],
        },
        flow === 'authorization_code'
          ? {
            flow,
            data: {
              clientSecret: microsoft.clientSecret,
              redirectUri: microsoft.redirectUri,
              authority: defaultAuthority(microsoft.tenantId),
            },
          }
          : { flow },
      );
      await audit({ accountId: account.id, email, eventType: 'registration', flow });
      log.info({ accountId: account.id, authenticationFlow: flow }, 'account registered');
      return { accountId: account.id, account };
    } catch (error) {
      await audit({ accountId: null, email, eventType: 'registration', flow }, error);
      log.warn({ err: error, authenticationFlow: flow }, 'account registration failed');
      throw error;
    }
  };

  const beginAuthentication = async (accountId: string): Promise<BeginAuthenticationResult> => {
    let account: AccountRecord | null = null;
    try {
      account = await requireAccount(accountId);
      const flowAccount = await store.getFlowAccount(account.id);
      if (!flowAccount) {
        throw new UnsupportedAuthenticationFlowError(account.id, account.authenticationFlow, 'none');
      }

      let result: BeginAuthenticationResult;
      if (flowAccount.flow === 'authorization_code') {
        const { codeVerifier, codeChallenge } = createPkcePair();
        const state = randomBytes(24).toString('base64url');
        const expiresAt = new Date(now() + microsoft.oauthStateTtlMs);
        await store.saveOAuthState({ state, accountId: account.id, codeVerifier, expiresAt });
        const authorizationUrl = oauth.buildAuthorizationUrl({
          authority: flowAccount.data.authority,
          clientId: account.clientId,
          redirectUri: flowAccount.data.redirectUri,
          scopes: account.scopes,
          state,
          codeChallenge,
        });
        result = { flow: 'authorization_code', requiresUserAction: true, authorizationUrl, state, expiresAt };
      } else {
        const grant = await oauth.startDeviceCode({
          authority: defaultAuthority(account.tenantId),
          clientId: account.clientId,
          scopes: account.scopes,
        });
        await store.updateDeviceCode(account.id, {
          deviceCode: grant.deviceCode,
          userCode: grant.userCode,
          verificationUri: grant.verificationUri,
          expiresIn: grant.expiresIn,
          interval: grant.interval,
          issuedAt: new Date(now()),
        });
        result = {
          flow: 'device_code',
          requiresUserAction: true,
          userCode: grant.userCode,
          verificationUri: grant.verificationUri,
          expiresIn: grant.expiresIn,
          interval: grant.interval,
          message: grant.message,
        };
      }

      await audit({ accountId: account.id, eventType: 'authentication_started', flow: result.flow });
      log.info({ accountId, authenticationFlow: result.flow }, 'authentication started');
      return result;
    } catch (error) {
      const translated = translate(accountId, 'beginAuthentication', error);
      await audit(
        { accountId: account?.id ?? null, eventType: 'authentication_started', flow: account?.authenticationFlow ?? null },
        translated,
      );
      log.warn({ err: translated, accountId, operation: 'beginAuthentication' }, 'authentication start failed');
      throw translated;
    }
  };

  const invalidState = (accountId: string | null) =>
    new AuthenticationFailedError(
      accountId,
      'Invalid or expired OAuth state',
      { code: 'invalid_state', description: 'The state parameter is unknown, already used or expired' },
      undefined,
      ErrorCodes.OAUTH_CALLBACK_ERROR,
    );

  const completeAuthorizationCode = async (
    accountId: string,
    code: string,
    state: string,
  ): Promise<AuthenticatedResult> => {
    let account: AccountRecord | null = null;
    try {
      account = await requireAccount(accountId);
      const current = account;
      return await tokenLock(accountId, async () => {
        const stateRow = await store.consumeOAuthState(state, current.id);
        if (!stateRow || stateRow.expiresAt.getTime() <= now()) {
          throw invalidState(current.id);
        }
        const result = await exchangeAuthorizationCode(current, code, stateRow.codeVerifier);
        await audit({ accountId: current.id, eventType: 'authentication', flow: 'authorization_code' });
        log.info({ accountId }, 'authorization code exchanged');
        return result;
      });
    } catch (error) {
      const translated = translate(accountId, 'completeAuthorizationCode', error);
      await audit(
        { accountId: account?.id ?? null, eventType: 'authentication', flow: 'authorization_code' },
        translated,
      );
      log.warn({ err: translated, accountId, operation: 'completeAuthorizationCode' }, 'authorization code exchange failed');
      throw translated;
    }
  };

  const completeAuthorizationCallback = async (input: CallbackInput): Promise<AuthenticatedResult> => {
    if (input.error) {
      const stateRow = input.state ? await store.consumeOAuthState(input.state) : null;
      const accountId = stateRow?.accountId ?? null;
      const error = new AuthenticationFailedError(
        accountId,
        input.errorDescription ?? `Authorization failed: ${input.error}`,
        { code: input.error, description: input.errorDescription ?? null },
        undefined,
        ErrorCodes.OAUTH_CALLBACK_ERROR,
      );
      await audit({ accountId, eventType: 'authentication', flow: 'authorization_code' }, error);
      log.warn({ accountId, providerCode: input.error }, 'identity provider returned an authorization error');
      throw error;
    }
    if (!input.code || !input.state) {
      throw new ValidationError('code and state are required', {}, ErrorCodes.MISSING_REQUIRED_FIELD);
    }

    const stateRow = await store.consumeOAuthState(input.state);
    if (!stateRow || stateRow.expiresAt.getTime() <= now()) {
      const error = invalidState(stateRow?.accountId ?? null);
      await audit({ accountId: stateRow?.accountId ?? null, eventType: 'authentication', flow: 'authorization_code' }, error);
      throw error;
    }

    const accountId = stateRow.accountId;
    const code = input.code;
    try {
      const account = await requireAccount(accountId);
      const result = await tokenLock(accountId, () => exchangeAuthorizationCode(account, code, stateRow.codeVerifier));
      await audit({ accountId, eventType: 'authentication', flow: 'authorization_code' });
      log.info({ accountId }, 'authorization callback completed');
      return result;
    } catch (error) {
      const translated = translate(accountId, 'completeAuthorizationCallback', error);
      await audit({ accountId, eventType: 'authentication', flow: 'authorization_code' }, translated);
      log.warn({ err: translated, accountId, operation: 'completeAuthorizationCallback' }, 'authorization callback failed');
      throw translated;
    }
  };

  const pollDeviceCode = async (accountId: string): Promise<DevicePollOutcome> => {
    let account: AccountRecord | null = null;
    try {
      account = await requireAccount(accountId);
      const current = account;
      const outcome = await tokenLock(accountId, async (): Promise<DevicePollOutcome> => {
        const flowAccount = await requireFlow(current, 'device_code');
        if (flowAccount.flow !== 'device_code') {
          throw new UnsupportedAuthenticationFlowError(current.id, 'device_code', flowAccount.flow);
        }
        const data = flowAccount.data;
        if (!data.deviceCode) {
          throw new DeviceCodeNotStartedError(current.id);
        }
        if (deviceCodeExpired(data, now())) {
          await store.updateDeviceCode(current.id, CLEARED_DEVICE_CODE);
          throw new DeviceAuthorizationFailedError(current.id, 'expired_token', 'Device code expired before authorization');
        }

        const result = await oauth.pollDeviceCode({
          authority: defaultAuthority(current.tenantId),
          clientId: current.clientId,
          deviceCode: data.deviceCode,
        });
        const interval = data.interval ?? DEFAULT_DEVICE_INTERVAL_SECONDS;

        switch (result.status) {
          case 'pending':
            return { status: 'pending', interval };
          case 'slow_down': {
            const nextInterval = result.interval ?? interval + SLOW_DOWN_STEP_SECONDS;
            await store.updateDeviceCode(current.id, {
              deviceCode: data.deviceCode,
              userCode: data.userCode,
              verificationUri: data.verificationUri,
              expiresIn: data.expiresIn,
              interval: nextInterval,
              issuedAt: data.issuedAt,
            });
            return { status: 'slow_down', interval: nextInterval };
          }
          case 'failed':
            await store.updateDeviceCode(current.id, CLEARED_DEVICE_CODE);
            throw new DeviceAuthorizationFailedError(current.id, result.error, result.description);
          case 'success': {
            const token = await persistGrant(current, result.grant, null);
            await store.updateDeviceCode(current.id, CLEARED_DEVICE_CODE);
            const authenticated = await markAuthenticated(current, token);
            return { status: 'authenticated', ...authenticated };
          }
        }
      });

      if (outcome.status === 'authenticated') {
        await audit({ accountId, eventType: 'authentication', flow: 'device_code' });
        log.info({ accountId }, 'device code authorized');
      } else {
        log.debug({ accountId, status: outcome.status }, 'device code still pending');
      }
      return outcome;
    } catch (error) {
      const translated = translate(accountId, 'pollDeviceCode', error);
      await audit({ accountId: account?.id ?? null, eventType: 'authentication', flow: 'device_code' }, translated);
      log.warn({ err: translated, accountId, operation: 'pollDeviceCode' }, 'device code authorization failed');
      throw translated;
    }
  };

  const refreshToken = async (accountId: string): Promise<AuthenticatedResult> => {
    let account: AccountRecord | null = null;
    try {
      account = await requireAccount(accountId);
      const current = account;
      const seen = await store.getToken(current.id);
      const result = await tokenLock(accountId, async () => {
        const token = await store.getToken(current.id);
        // A refresh that finished while this caller waited already did the work.
        if (
          token && seen && token.accessToken !== seen.accessToken
          && token.status === 'valid' && !isTokenExpired(token, now())
        ) {
          return { accountId: current.id, expiresAt: token.expiresAt, scopes: token.scopes };
        }
        if (!token?.refreshToken) {
          throw new NoRefreshTokenError(current.id);
        }

        const flowAccount = await store.getFlowAccount(current.id);
        const authorizationCode = flowAccount?.flow === 'authorization_code' ? flowAccount.data : null;
        let grant: TokenGrant;
        try {
          grant = await oauth.refresh({
            authority: authorizationCode?.authority ?? defaultAuthority(current.tenantId),
            clientId: current.clientId,
            clientSecret: authorizationCode?.clientSecret || null,
            refreshToken: token.refreshToken,
            scopes: current.scopes,
          });
        } catch (error) {
          if (error instanceof AuthenticationFailedError) {
            await store.setTokenStatus(current.id, 'invalid');
          }
          throw error;
        }

        const saved = await persistGrant(current, grant, token.refreshToken);
        return { accountId: current.id, expiresAt: saved.expiresAt, scopes: saved.scopes };
      });
      await audit({ accountId, eventType: 'token_refresh', flow: current.authenticationFlow });
      log.info({ accountId, expiresAt: result.expiresAt.toISOString() }, 'token refreshed');
      return result;
    } catch (error) {
      const translated = translate(accountId, 'refreshToken', error);
      await audit(
        { accountId: account?.id ?? null, eventType: 'token_refresh', flow: account?.authenticationFlow ?? null },
        translated,
      );
      const retryable = translated instanceof ExternalApiError && translated.retryable;
      log.warn({ err: translated, accountId, operation: 'refreshToken', retryable }, 'token refresh failed');
      throw translated;
    }
  };

  const revoke = async (accountId: string): Promise<{ accountId: string; upstreamRevoked: boolean }> => {
    let account: AccountRecord | null = null;
    try {
      account = await requireAccount(accountId);
      const current = account;
      const upstreamRevoked = await tokenLock(accountId, async () => {
        const token = await store.getToken(current.id);
        let revoked = false;
        if (token?.accessToken && token.status === 'valid' && !isTokenExpired(token, now())) {
          try {
            await oauth.revoke({ accessToken: token.accessToken });
            revoked = true;
          } catch (error) {
            log.warn({ err: error, accountId, operation: 'revoke' }, 'upstream revocation failed, deleting local token');
          }
        }
        await store.deleteToken(current.id);
        if (current.authenticationFlow === 'device_code') {
          await store.updateDeviceCode(current.id, CLEARED_DEVICE_CODE);
        }
        return revoked;
      });
      await audit({ accountId, eventType: 'logout', flow: current.authenticationFlow });
      log.info({ accountId, upstreamRevoked }, 'token revoked');
      return { accountId, upstreamRevoked };
    } catch (error) {
      const translated = translate(accountId, 'revoke', error);
      await audit(
        { accountId: account?.id ?? null, eventType: 'logout', flow: account?.authenticationFlow ?? null },
        translated,
      );
      log.warn({ err: translated, accountId, operation: 'revoke' }, 'revocation failed');
      throw translated;
    }
  };

  /**
   * Access token for a mail operation. Never refreshes; a token that is not
   * usable as stored raises NoValidTokenError.
   */
  const getValidAccessToken = async (accountId: string): Promise<string> => {
    const token = await store.getToken(accountId);
    if (!token) {
      throw new NoValidTokenError(accountId, 'missing');
    }
    if (token.status === 'invalid' || token.status === 'revoked') {
      throw new NoValidTokenError(accountId, token.status);
    }
    if (token.status === 'expired' || isTokenExpired(token, now())) {
      throw new NoValidTokenError(accountId, 'expired');
    }
    return token.accessToken;
  };

  const getAccount = async (accountId: string) => {
    const account = await store.getAccount(accountId);
    return account ? project(account) : null;
  };

  const getAccountByEmail = async (email: string) => {
    const account = await store.getAccountByEmail(normalizeEmail(email));
    return account ? project(account) : null;
  };

  const listAccounts = async () => {
    const accounts = await store.listAccounts();
    const views: AccountView[] = [];
    for (const account of accounts) {
      views.push(await project(account));
    }
    return views;
  };

  const updateAccount = async (accountId: string, patch: { status?: AccountStatus; scopes?: string[] }) => {
    const updated = await store.updateAccount(accountId, patch);
    if (!updated) {
      throw new AccountNotFoundError(accountId);
    }
    log.info({ accountId, status: patch.status, scopes: patch.scopes }, 'account updated');
    return project(updated);
  };

  const deleteAccount = async (accountId: string) => {
    const deleted = await tokenLock(accountId, () => store.deleteAccount(accountId));
    if (!deleted) {
      throw new AccountNotFoundError(accountId);
    }
    log.info({ accountId }, 'account deleted');
  };

  const getAuthenticationLogs = (filter: {
    accountId?: string;
    success?: boolean;
    from?: Date;
    to?: Date;
    limit?: number;
  }): Promise<AuthenticationLogRecord[]> => store.listAuthLogs(filter);

  return {
    register,
    beginAuthentication,
    completeAuthorizationCode,
    completeAuthorizationCallback,
    pollDeviceCode,
    refreshToken,
    revoke,
    getValidAccessToken,
    getAccount,
    getAccountByEmail,
    listAccounts,
    updateAccount,
    deleteAccount,
    getAuthenticationLogs,
  };
};

export type AuthService = ReturnType<typeof createAuthService>;

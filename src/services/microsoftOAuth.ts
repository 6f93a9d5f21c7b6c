import { createHash, randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from '../config/logger.js';
import { AuthenticationFailedError, ErrorCodes, UpstreamHttpError } from '../shared/errors.js';
import { parseGraphError } from './graphApi.js';
import { fetchWithTimeout, parseRetryAfterMs, readBody } from './http.js';
import type { FetchLike } from './http.js';
import type { DeviceCodeGrant, DevicePollResult, OAuthClient, TokenGrant } from './ports.js';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().int().positive(),
  scope: z.string().optional(),
});

const deviceCodeResponseSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_uri: z.string().min(1),
  expires_in: z.coerce.number().int().positive(),
  interval: z.coerce.number().int().positive().default(5),
  message: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export const createPkcePair = () => {
  const codeVerifier = randomBytes(32).toString('base64url');
  const codeChallenge = createHash('sha256').update(codeVerifier).digest('base64url');
  return { codeVerifier, codeChallenge };
};

const providerError = (body: unknown) => {
  const parsed = errorResponseSchema.safeParse(body);
  return parsed.success
    ? { code: parsed.data.error, description: parsed.data.error_description ?? null }
    : { code: null, description: null };
};

const toGrant = (body: unknown, requestedScopes: string[]): TokenGrant => {
  const parsed = tokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new AuthenticationFailedError(null, 'Identity provider returned a malformed token response');
  }
  const scope = parsed.data.scope?.trim();
  return {
    accessToken: parsed.data.access_token,
    refreshToken: parsed.data.refresh_token ?? null,
    tokenType: parsed.data.token_type,
    expiresIn: parsed.data.expires_in,
    scopes: scope ? scope.split(/\s+/) : [...requestedScopes],
  };
};

export interface MicrosoftOAuthOptions {
  graphBaseUrl: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
}

/**
 * Microsoft identity platform v2.0 endpoints. HTTP 400/401 token-endpoint
 * rejections surface as AuthenticationFailedError carrying the provider's
 * `error`/`error_description`; everything else as UpstreamHttpError.
 */
export const createMicrosoftOAuthClient = (options: MicrosoftOAuthOptions): OAuthClient => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = options.logger.child({ component: 'microsoft-oauth' });

  const postForm = async (operation: string, url: string, form: Record<string, string>) => {
    const response = await fetchWithTimeout(
      fetchImpl,
      operation,
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(form).toString(),
      },
      options.timeoutMs,
    );
    return { response, body: await readBody(response) };
  };

  const failTokenRequest = (operation: string, response: Response, body: unknown): never => {
    const provider = providerError(body);
    log.warn(
      { operation, status: response.status, providerCode: provider.code },
      'identity provider rejected request',
    );
    if (response.status === 400 || response.status === 401) {
      throw new AuthenticationFailedError(
        null,
        provider.description ?? `${operation} rejected by identity provider`,
        provider,
        undefined,
        operation === 'refresh' ? ErrorCodes.TOKEN_REFRESH_FAILED : ErrorCodes.INVALID_CREDENTIALS,
      );
    }
    throw new UpstreamHttpError(operation, response.status, {
      ...provider,
      retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after')),
    });
  };

  const withSecret = (form: Record<string, string>, clientSecret: string | null) =>
    clientSecret ? { ...form, client_secret: clientSecret } : form;

  return {
    buildAuthorizationUrl: (params) => {
      const url = new URL(`${params.authority}/oauth2/v2.0/authorize`);
      url.searchParams.set('client_id', params.clientId);
      url.searchParams.set('response_type', 'code');
      url.searchParams.set('redirect_uri', params.redirectUri);
      url.searchParams.set('response_mode', 'query');
      url.searchParams.set('scope', params.scopes.join(' '));
      url.searchParams.set('state', params.state);
      url.searchParams.set('code_challenge', params.codeChallenge);
      url.searchParams.set('code_challenge_method', 'S256');
      return url.toString();
    },

    exchangeCode: async (params) => {
      const { response, body } = await postForm(
        'exchangeCode',
        `${params.authority}/oauth2/v2.0/token`,
        withSecret({
          grant_type: 'authorization_code',
          client_id: params.clientId,
          code: params.code,
          redirect_uri: params.redirectUri,
          code_verifier: params.codeVerifier,
          scope: params.scopes.join(' '),
        }, params.clientSecret),
      );
      if (!response.ok) {
        return failTokenRequest('exchangeCode', response, body);
      }
      return toGrant(body, params.scopes);
    },

    startDeviceCode: async (params): Promise<DeviceCodeGrant> => {
      const { response, body } = await postForm(
        'startDeviceCode',
        `${params.authority}/oauth2/v2.0/devicecode`,
        { client_id: params.clientId, scope: params.scopes.join(' ') },
      );
      if (!response.ok) {
        return failTokenRequest('startDeviceCode', response, body);
      }
      const parsed = deviceCodeResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new AuthenticationFailedError(null, 'Identity provider returned a malformed device code response');
      }
      return {
        deviceCode: parsed.data.device_code,
        userCode: parsed.data.user_code,
        verificationUri: parsed.data.verification_uri,
        expiresIn: parsed.data.expires_in,
        interval: parsed.data.interval,
        message: parsed.data.message ?? null,
      };
    },

    pollDeviceCode: async (params): Promise<DevicePollResult> => {
      const { response, body } = await postForm(
        'pollDeviceCode',
        `${params.authority}/oauth2/v2.0/token`,
        {
          grant_type: DEVICE_CODE_GRANT,
          client_id: params.clientId,
          device_code: params.deviceCode,
        },
      );
      if (response.ok) {
        return { status: 'success', grant: toGrant(body, []) };
      }

      const provider = providerError(body);
      if (response.status === 400 && provider.code) {
        if (provider.code === 'authorization_pending') {
          return { status: 'pending' };
        }
        if (provider.code === 'slow_down') {
          const interval = z.object({ interval: z.coerce.number().int().positive() }).safeParse(body);
          return { status: 'slow_down', interval: interval.success ? interval.data.interval : null };
        }
        return { status: 'failed', error: provider.code, description: provider.description };
      }
      return failTokenRequest('pollDeviceCode', response, body);
    },

    refresh: async (params) => {
      const { response, body } = await postForm(
        'refresh',
        `${params.authority}/oauth2/v2.0/token`,
        withSecret({
          grant_type: 'refresh_token',
          client_id: params.clientId,
          refresh_token: params.refreshToken,
          scope: params.scopes.join(' '),
        }, params.clientSecret),
      );
      if (!response.ok) {
        return failTokenRequest('refresh', response, body);
      }
      return toGrant(body, params.scopes);
    },

    revoke: async ({ accessToken }) => {
      const response = await fetchWithTimeout(
        fetchImpl,
        'revoke',
        `${options.graphBaseUrl}/me/revokeSignInSessions`,
        {
          method: 'POST',
          headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
        },
        options.timeoutMs,
      );
      if (!response.ok) {
        throw new UpstreamHttpError('revoke', response.status, parseGraphError(await readBody(response)));
      }
    },
  };
};

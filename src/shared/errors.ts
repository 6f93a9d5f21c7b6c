export type ErrorKind =
  | 'authentication'
  | 'mail'
  | 'external_api'
  | 'persistence'
  | 'validation'
  | 'system';

export const ErrorCodes = {
  INVALID_CREDENTIALS: 'AUTH001',
  TOKEN_EXPIRED: 'AUTH002',
  INSUFFICIENT_PERMISSIONS: 'AUTH003',
  ACCOUNT_NOT_FOUND: 'AUTH004',
  ACCOUNT_ALREADY_EXISTS: 'AUTH005',
  INVALID_AUTHENTICATION_FLOW: 'AUTH006',
  OAUTH_CALLBACK_ERROR: 'AUTH007',
  TOKEN_REFRESH_FAILED: 'AUTH008',
  DEVICE_CODE_EXPIRED: 'AUTH009',
  DEVICE_CODE_PENDING: 'AUTH010',
  DEVICE_CODE_DECLINED: 'AUTH011',

  MAIL_NOT_FOUND: 'MAIL001',
  QUOTA_EXCEEDED: 'MAIL002',
  INVALID_MAIL_QUERY: 'MAIL003',
  MAIL_SEND_FAILED: 'MAIL004',
  WEBHOOK_SUBSCRIPTION_FAILED: 'MAIL005',
  DELTA_LINK_EXPIRED: 'MAIL006',
  ATTACHMENT_TOO_LARGE: 'MAIL007',
  INVALID_WEBHOOK_NOTIFICATION: 'MAIL008',

  EXTERNAL_API_TIMEOUT: 'EXT001',
  EXTERNAL_API_ERROR: 'EXT002',
  EXTERNAL_API_UNAUTHORIZED: 'EXT003',
  EXTERNAL_API_RATE_LIMITED: 'EXT004',
  EXTERNAL_API_UNAVAILABLE: 'EXT005',

  DATABASE_CONNECTION_ERROR: 'DB001',
  DATABASE_CONSTRAINT_VIOLATION: 'DB002',
  DATABASE_TRANSACTION_ERROR: 'DB003',

  INVALID_INPUT: 'VAL001',
  MISSING_REQUIRED_FIELD: 'VAL002',

  INTERNAL_ERROR: 'SYS001',
  SERVICE_UNAVAILABLE: 'SYS002',
  CONFIGURATION_ERROR: 'SYS003',
  RATE_LIMIT_EXCEEDED: 'SYS004',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

// authentication

export class AuthenticationError extends AppError {
  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super('authentication', code, message, details, cause);
  }
}

export class DuplicateAccountError extends AuthenticationError {
  constructor(email: string) {
    super(ErrorCodes.ACCOUNT_ALREADY_EXISTS, `Account with email ${email} already exists`, { email });
  }
}

export class AccountNotFoundError extends AuthenticationError {
  constructor(accountId: string) {
    super(ErrorCodes.ACCOUNT_NOT_FOUND, `Account not found: ${accountId}`, { accountId });
  }
}

export class UnsupportedAuthenticationFlowError extends AuthenticationError {
  constructor(accountId: string, expected: string, actual: string) {
    super(
      ErrorCodes.INVALID_AUTHENTICATION_FLOW,
      `Account ${accountId} uses ${actual}, not ${expected}`,
      { accountId, expected, actual },
    );
  }
}

/**
 * The identity provider rejected an exchange. `providerCode` and
 * `providerDescription` carry the provider's own `error` and
 * `error_description` so callers can show them verbatim.
 */
export class AuthenticationFailedError extends AuthenticationError {
  readonly providerCode: string | null;
  readonly providerDescription: string | null;

  constructor(
    accountId: string | null,
    message: string,
    provider: { code?: string | null; description?: string | null } = {},
    cause?: unknown,
    code: ErrorCode = ErrorCodes.INVALID_CREDENTIALS,
  ) {
    super(code, message, {
      accountId,
      providerCode: provider.code ?? null,
      providerDescription: provider.description ?? null,
    }, cause);
    this.providerCode = provider.code ?? null;
    this.providerDescription = provider.description ?? null;
  }
}

const DEVICE_FAILURE_CODES: Record<string, ErrorCode> = {
  expired_token: ErrorCodes.DEVICE_CODE_EXPIRED,
  authorization_declined: ErrorCodes.DEVICE_CODE_DECLINED,
  bad_verification_code: ErrorCodes.INVALID_CREDENTIALS,
};

export class DeviceAuthorizationFailedError extends AuthenticationError {
  readonly reason: string;

  constructor(accountId: string, reason: string, description: string | null = null) {
    super(
      DEVICE_FAILURE_CODES[reason] ?? ErrorCodes.INVALID_CREDENTIALS,
      `Device authorization failed: ${reason}`,
      { accountId, providerCode: reason, providerDescription: description },
    );
    this.reason = reason;
  }
}

export class DeviceCodeNotStartedError extends AuthenticationError {
  constructor(accountId: string) {
    super(
      ErrorCodes.DEVICE_CODE_PENDING,
      'Device code flow has not been started for this account',
      { accountId },
    );
  }
}

export class NoRefreshTokenError extends AuthenticationError {
  constructor(accountId: string) {
    super(ErrorCodes.TOKEN_REFRESH_FAILED, 'No refresh token available', { accountId });
  }
}

/**
 * Raised when a mail operation needs an access token and the account has
 * none that is usable. The remedy is always to authenticate again.
 */
export class NoValidTokenError extends AuthenticationError {
  readonly reauthenticationRequired = true;

  constructor(accountId: string, reason: 'missing' | 'expired' | 'invalid' | 'revoked') {
    super(ErrorCodes.TOKEN_EXPIRED, 'Reauthentication required: no valid token', {
      accountId,
      reason,
      reauthenticationRequired: true,
    });
  }
}

// mail

export class MailError extends AppError {
  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super('mail', code, message, details, cause);
  }
}

export class MailSendError extends MailError {
  constructor(accountId: string, cause: unknown) {
    super(ErrorCodes.MAIL_SEND_FAILED, `Failed to send mail: ${describeError(cause)}`, { accountId }, cause);
  }
}

export class DeltaLinkExpiredError extends MailError {
  constructor(details: ErrorDetails = {}) {
    super(ErrorCodes.DELTA_LINK_EXPIRED, 'Delta link expired or invalid', details);
  }
}

export class WebhookSubscriptionError extends MailError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(ErrorCodes.WEBHOOK_SUBSCRIPTION_FAILED, message, details, cause);
  }
}

export class WebhookNotFoundError extends MailError {
  constructor(subscriptionId: string) {
    super(ErrorCodes.MAIL_NOT_FOUND, `Webhook subscription not found: ${subscriptionId}`, { subscriptionId });
  }
}

export class InvalidWebhookNotificationError extends MailError {
  constructor(subscriptionId: string, reason: 'unknown_subscription' | 'inactive_subscription' | 'client_state_mismatch') {
    super(ErrorCodes.INVALID_WEBHOOK_NOTIFICATION, 'Invalid webhook notification', { subscriptionId, reason });
  }
}

export class ExternalCallNotFoundError extends MailError {
  constructor(callId: string) {
    super(ErrorCodes.MAIL_NOT_FOUND, `External API call not found: ${callId}`, { callId });
  }
}

// external api

export class ExternalApiError extends AppError {
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable: boolean, details: ErrorDetails = {}, cause?: unknown) {
    super('external_api', code, message, details, cause);
    this.retryable = retryable;
  }
}

export class UpstreamTimeoutError extends ExternalApiError {
  constructor(operation: string, timeoutMs: number, cause?: unknown) {
    super(ErrorCodes.EXTERNAL_API_TIMEOUT, `${operation} timed out after ${timeoutMs}ms`, true, { operation, timeoutMs }, cause);
  }
}

const statusToCode = (status: number): ErrorCode => {
  if (status === 401 || status === 403) return ErrorCodes.EXTERNAL_API_UNAUTHORIZED;
  if (status === 429) return ErrorCodes.EXTERNAL_API_RATE_LIMITED;
  if (status === 503) return ErrorCodes.EXTERNAL_API_UNAVAILABLE;
  return ErrorCodes.EXTERNAL_API_ERROR;
};

export const isRetryableStatus = (status: number) =>
  status === 408 || status === 429 || (status >= 500 && status <= 599);

export class UpstreamHttpError extends ExternalApiError {
  readonly status: number;
  readonly providerCode: string | null;
  readonly providerDescription: string | null;
  readonly retryAfterMs: number | null;

  constructor(
    operation: string,
    status: number,
    provider: { code?: string | null; description?: string | null; retryAfterMs?: number | null } = {},
  ) {
    const providerCode = provider.code ?? null;
    const providerDescription = provider.description ?? null;
    super(
      statusToCode(status),
      `${operation} failed with HTTP ${status}${providerCode ? ` (${providerCode})` : ''}`,
      isRetryableStatus(status),
      { operation, status, providerCode, providerDescription },
    );
    this.status = status;
    this.providerCode = providerCode;
    this.providerDescription = providerDescription;
    this.retryAfterMs = provider.retryAfterMs ?? null;
  }
}

export class UpstreamUnavailableError extends ExternalApiError {
  constructor(operation: string, cause: unknown) {
    super(ErrorCodes.EXTERNAL_API_UNAVAILABLE, `${operation} failed: ${describeError(cause)}`, true, { operation }, cause);
  }
}

// persistence

export class PersistenceError extends AppError {
  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super('persistence', code, message, details, cause);
  }
}

// validation

export class ValidationError extends AppError {
  constructor(message: string, details: ErrorDetails = {}, code: ErrorCode = ErrorCodes.INVALID_INPUT) {
    super('validation', code, message, details);
  }
}

// system

export class SystemError extends AppError {
  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super('system', code, message, details, cause);
  }
}

export class ConfigurationError extends SystemError {
  constructor(issues: string[]) {
    super(ErrorCodes.CONFIGURATION_ERROR, `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

export class DecryptionError extends SystemError {
  constructor(reason: string) {
    super(ErrorCodes.INTERNAL_ERROR, `Failed to decrypt value: ${reason}`, { reason });
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

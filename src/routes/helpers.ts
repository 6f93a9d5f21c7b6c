import { z } from 'zod';
import { AppError, ErrorCodes, ValidationError } from '../shared/errors.js';
import type { ErrorCode } from '../shared/errors.js';

export const parseInput = <T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  where: 'body' | 'query' | 'params',
): z.output<T> => {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid request ${where}`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
};

export const accountIdParams = z.object({ accountId: z.string().uuid() });

// Query strings carry booleans as text.
export const booleanParam = z.enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const limitParam = z.coerce.number().int().min(1).max(1000);

export const dateParam = z.string().datetime({ offset: true }).transform((value) => new Date(value));

export const importanceParam = z.enum(['low', 'normal', 'high']);

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCodes.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCodes.ACCOUNT_ALREADY_EXISTS]: 409,
  [ErrorCodes.INVALID_AUTHENTICATION_FLOW]: 400,
  [ErrorCodes.DEVICE_CODE_PENDING]: 409,
  [ErrorCodes.DEVICE_CODE_EXPIRED]: 410,
  [ErrorCodes.INSUFFICIENT_PERMISSIONS]: 403,
  [ErrorCodes.MAIL_NOT_FOUND]: 404,
  [ErrorCodes.INVALID_MAIL_QUERY]: 400,
  [ErrorCodes.INVALID_WEBHOOK_NOTIFICATION]: 403,
  [ErrorCodes.DELTA_LINK_EXPIRED]: 409,
  [ErrorCodes.QUOTA_EXCEEDED]: 507,
  [ErrorCodes.ATTACHMENT_TOO_LARGE]: 413,
  [ErrorCodes.EXTERNAL_API_TIMEOUT]: 504,
  [ErrorCodes.EXTERNAL_API_RATE_LIMITED]: 429,
  [ErrorCodes.EXTERNAL_API_UNAVAILABLE]: 503,
  [ErrorCodes.DATABASE_CONNECTION_ERROR]: 503,
  [ErrorCodes.DATABASE_CONSTRAINT_VIOLATION]: 409,
  [ErrorCodes.SERVICE_UNAVAILABLE]: 503,
  [ErrorCodes.RATE_LIMIT_EXCEEDED]: 429,
};

const STATUS_BY_KIND: Record<AppError['kind'], number> = {
  authentication: 401,
  mail: 502,
  external_api: 502,
  persistence: 500,
  validation: 400,
  system: 500,
};

export const statusForError = (error: AppError) => STATUS_BY_CODE[error.code] ?? STATUS_BY_KIND[error.kind];

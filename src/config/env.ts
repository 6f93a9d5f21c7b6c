import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';

export const loadEnvFiles = (cwd = process.cwd()) => {
  const cwdEnvPath = path.resolve(cwd, '.env');
  const repoEnvPath = path.resolve(cwd, '..', '.env');

  dotenv.config({ path: cwdEnvPath });
  if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
    dotenv.config({ path: repoEnvPath, override: false });
  }
};

const DEFAULT_SCOPES = [
  'offline_access',
  'https://graph.microsoft.com/Mail.Read',
  'https://graph.microsoft.com/Mail.Send',
  'https://graph.microsoft.com/User.Read',
];

const intFrom = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const booleanFrom = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform((value) => value === 'true');

const optionalUrl = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().url().optional(),
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intFrom(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1),
  ENCRYPTION_KEY: z.string().min(32),
  ENCRYPTION_SALT: z.string().min(8),

  MS_TENANT_ID: z.string().min(1).default('common'),
  MS_CLIENT_ID: z.string().min(1),
  MS_CLIENT_SECRET: z.string().default(''),
  MS_REDIRECT_URI: z.string().url().default('http://localhost:3000/api/oauth/callback'),
  MS_AUTHORITY_HOST: z.string().url().default('https://login.microsoftonline.com'),
  MS_SCOPES: z.string().optional(),
  GRAPH_BASE_URL: z.string().url().default('https://graph.microsoft.com/v1.0'),
  GRAPH_TIMEOUT_MS: intFrom(30_000),
  OAUTH_STATE_TTL_MS: intFrom(10 * 60_000),

  WEBHOOK_NOTIFICATION_URL: optionalUrl,
  WEBHOOK_LIFETIME_MINUTES: z.coerce.number().int().min(45).max(4230).default(4200),

  EXTERNAL_API_ENDPOINT: optionalUrl,
  EXTERNAL_API_TIMEOUT_MS: intFrom(30_000),
  EXTERNAL_API_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  SCHEDULER_TOKEN_REFRESH_INTERVAL_MS: intFrom(60_000),
  SCHEDULER_WEBHOOK_RENEWAL_INTERVAL_MS: intFrom(5 * 60_000),
  SCHEDULER_FAILED_CALL_RETRY_INTERVAL_MS: intFrom(2 * 60_000),
  SCHEDULER_CLEANUP_INTERVAL_MS: intFrom(60 * 60_000),
  TOKEN_REFRESH_LEAD_MS: intFrom(5 * 60_000),
  WEBHOOK_RENEWAL_LEAD_MS: intFrom(30 * 60_000),
  CLEANUP_TOKEN_AGE_DAYS: intFrom(30),
  CLEANUP_LOG_AGE_DAYS: intFrom(90),
  CLEANUP_WEBHOOK_AGE_DAYS: intFrom(7),

  SYNC_QUEUE_ENABLED: booleanFrom(false),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  logLevel: string;
  databaseUrl: string;
  encryption: {
    key: string;
    salt: string;
  };
  microsoft: {
    tenantId: string;
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    authorityHost: string;
    scopes: string[];
    graphBaseUrl: string;
    timeoutMs: number;
    oauthStateTtlMs: number;
  };
  webhook: {
    notificationUrl: string | null;
    lifetimeMinutes: number;
  };
  externalApi: {
    endpoint: string | null;
    timeoutMs: number;
    maxRetries: number;
  };
  scheduler: {
    tokenRefreshIntervalMs: number;
    webhookRenewalIntervalMs: number;
    failedCallRetryIntervalMs: number;
    cleanupIntervalMs: number;
    tokenRefreshLeadMs: number;
    webhookRenewalLeadMs: number;
    tokenRetentionDays: number;
    logRetentionDays: number;
    webhookRetentionDays: number;
  };
  syncQueueEnabled: boolean;
}

const parseScopes = (value: string | undefined) => {
  const scopes = String(value ?? '')
    .split(/[\s,]+/)
    .map((scope) => scope.trim())
    .filter(Boolean);
  return scopes.length > 0 ? scopes : [...DEFAULT_SCOPES];
};

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const values = parsed.data;

  if (values.NODE_ENV === 'production' && !values.MS_REDIRECT_URI.startsWith('https://')) {
    throw new ConfigurationError(['MS_REDIRECT_URI: must use HTTPS in production']);
  }

  const config: AppConfig = {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    databaseUrl: values.DATABASE_URL,
    encryption: {
      key: values.ENCRYPTION_KEY,
      salt: values.ENCRYPTION_SALT,
    },
    microsoft: {
      tenantId: values.MS_TENANT_ID,
      clientId: values.MS_CLIENT_ID,
      clientSecret: values.MS_CLIENT_SECRET,
      redirectUri: values.MS_REDIRECT_URI,
      authorityHost: values.MS_AUTHORITY_HOST.replace(/\/+$/, ''),
      scopes: parseScopes(values.MS_SCOPES),
      graphBaseUrl: values.GRAPH_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: values.GRAPH_TIMEOUT_MS,
      oauthStateTtlMs: values.OAUTH_STATE_TTL_MS,
    },
    webhook: {
      notificationUrl: values.WEBHOOK_NOTIFICATION_URL ?? null,
      lifetimeMinutes: values.WEBHOOK_LIFETIME_MINUTES,
    },
    externalApi: {
      endpoint: values.EXTERNAL_API_ENDPOINT ?? null,
      timeoutMs: values.EXTERNAL_API_TIMEOUT_MS,
      maxRetries: values.EXTERNAL_API_MAX_RETRIES,
    },
    scheduler: {
      tokenRefreshIntervalMs: values.SCHEDULER_TOKEN_REFRESH_INTERVAL_MS,
      webhookRenewalIntervalMs: values.SCHEDULER_WEBHOOK_RENEWAL_INTERVAL_MS,
      failedCallRetryIntervalMs: values.SCHEDULER_FAILED_CALL_RETRY_INTERVAL_MS,
      cleanupIntervalMs: values.SCHEDULER_CLEANUP_INTERVAL_MS,
      tokenRefreshLeadMs: values.TOKEN_REFRESH_LEAD_MS,
      webhookRenewalLeadMs: values.WEBHOOK_RENEWAL_LEAD_MS,
      tokenRetentionDays: values.CLEANUP_TOKEN_AGE_DAYS,
      logRetentionDays: values.CLEANUP_LOG_AGE_DAYS,
      webhookRetentionDays: values.CLEANUP_WEBHOOK_AGE_DAYS,
    },
    syncQueueEnabled: values.SYNC_QUEUE_ENABLED,
  };

  return Object.freeze(config);
};
